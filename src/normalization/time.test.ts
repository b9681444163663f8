import { test } from "node:test";
import assert from "node:assert/strict";
import { formatGameClock, parseGameClock } from "./time.ts";
import { TimerError } from "../timers/timerErrors.ts";

test("parseGameClock reads M:SS, MM:SS and plain seconds", () => {
  assert.equal(parseGameClock("4:05"), 245);
  assert.equal(parseGameClock("04:05"), 245);
  assert.equal(parseGameClock("12:00"), 720);
  assert.equal(parseGameClock(" 0:00 "), 0);
  assert.equal(parseGameClock("245"), 245);
  assert.equal(parseGameClock(245), 245);
  assert.equal(parseGameClock("100:30"), 6030);
});

test("parseGameClock rejects malformed input with invalid_time_format", () => {
  for (const input of ["", "abc", "4:60", "4:5", "-1", "1:2:3", -5, 1.5, null]) {
    assert.throws(
      () => parseGameClock(input),
      (error: unknown) => error instanceof TimerError && error.code === "invalid_time_format",
      `expected ${String(input)} to be rejected`
    );
  }
});

test("formatGameClock renders minutes and zero-padded seconds", () => {
  assert.equal(formatGameClock(0), "0:00");
  assert.equal(formatGameClock(245), "4:05");
  assert.equal(formatGameClock(3600), "60:00");
});

test("clock strings survive a parse/format round trip", () => {
  for (const clock of ["0:00", "04:05", "9:59", "30:00", "45:07"]) {
    const seconds = parseGameClock(clock);
    assert.equal(parseGameClock(formatGameClock(seconds)), seconds);
  }
});
