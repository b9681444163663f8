import { test } from "node:test";
import assert from "node:assert/strict";
import { createTestEntry } from "../testHelpers.ts";
import { TimerTable, upperBound } from "./timerTable.ts";

function buildTable() {
  return new TimerTable("ranked", [
    createTestEntry({ name: "river", offset: 180 }),
    createTestEntry({ name: "game_start", offset: 0 }),
    createTestEntry({ name: "jungle", offset: 60 }),
    createTestEntry({ name: "gold", offset: 60 }),
    createTestEntry({ name: "fangtooth", offset: 240, respawnTime: 300 })
  ]);
}

function collectNames(table: TimerTable, step: number, end: number) {
  const names: string[] = [];
  for (let elapsed = 0; elapsed < end; elapsed += step) {
    const window = { previousElapsed: elapsed, elapsed: Math.min(end, elapsed + step) };
    names.push(...table.dueEntries(window).map((entry) => entry.name));
  }
  return names;
}

test("entries are ordered by offset then name", () => {
  const table = buildTable();
  assert.deepEqual(
    table.list().map((entry) => entry.name),
    ["game_start", "gold", "jungle", "river", "fangtooth"]
  );
  assert.equal(table.size, 5);
});

test("dueEntries uses a half-open window", () => {
  const table = buildTable();
  assert.deepEqual(
    table.dueEntries({ previousElapsed: 0, elapsed: 60 }).map((entry) => entry.name),
    ["gold", "jungle"]
  );
  assert.deepEqual(table.dueEntries({ previousElapsed: 60, elapsed: 179 }), []);
  assert.deepEqual(table.dueEntries({ previousElapsed: 60, elapsed: 60 }), []);
  assert.deepEqual(table.dueEntries({ previousElapsed: 120, elapsed: 60 }), []);
});

test("tick granularity never duplicates or skips entries", () => {
  const table = buildTable();
  const expected = ["gold", "jungle", "river", "fangtooth"];
  for (const step of [1, 7, 60, 300]) {
    assert.deepEqual(collectNames(table, step, 300), expected, `step ${step}`);
  }
});

test("entriesAt, get and respawnableEntries", () => {
  const table = buildTable();
  assert.deepEqual(
    table.entriesAt(0).map((entry) => entry.name),
    ["game_start"]
  );
  assert.equal(table.get("river")?.offset, 180);
  assert.equal(table.get("missing"), null);
  assert.deepEqual(
    table.respawnableEntries().map((entry) => entry.name),
    ["fangtooth"]
  );
});

test("upperBound finds the first offset above the probe", () => {
  const entries = buildTable().list();
  assert.equal(upperBound(entries, -1), 0);
  assert.equal(upperBound(entries, 0), 1);
  assert.equal(upperBound(entries, 60), 3);
  assert.equal(upperBound(entries, 1000), 5);
});
