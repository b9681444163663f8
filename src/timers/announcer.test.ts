import { test } from "node:test";
import assert from "node:assert/strict";
import { RecordingOutput, createTestEntry } from "../testHelpers.ts";
import { Announcer } from "./announcer.ts";
import { GameSession } from "./gameSession.ts";
import { TimerTable } from "./timerTable.ts";
import { createDefaultCategorySettings } from "./timerTypes.ts";

const riverEntry = createTestEntry({
  name: "first_river_spawn",
  offset: 180,
  category: "objective",
  messages: ["First river buffs spawning now"]
});

function buildSession(masterVolume = 1) {
  const session = new GameSession({
    guildId: "guild-1",
    mode: "ranked",
    table: new TimerTable("ranked", [riverEntry]),
    categorySettings: createDefaultCategorySettings(),
    masterVolume,
    voiceChannelId: "voice-1"
  });
  session.start(180);
  return session;
}

test("announce dispatches text with the effective volume", () => {
  const output = new RecordingOutput();
  const announcer = new Announcer(output);
  const session = buildSession(0.8);
  session.setCategoryState("objective", { volume: 0.5 });

  const outcome = announcer.announce(riverEntry, session);
  assert.equal(outcome.announced, true);
  assert.deepEqual(output.requests, [
    {
      guildId: "guild-1",
      voiceChannelId: "voice-1",
      text: "First river buffs spawning now",
      volume: 0.4,
      category: "objective",
      entryName: "first_river_spawn",
      elapsed: 180
    }
  ]);
});

test("muted categories are skipped without reaching the output", () => {
  const output = new RecordingOutput();
  const announcer = new Announcer(output);
  const session = buildSession();
  session.setCategoryState("objective", { muted: true });

  assert.deepEqual(announcer.announce(riverEntry, session), { announced: false, reason: "muted" });
  assert.equal(output.requests.length, 0);

  session.setCategoryState("objective", { muted: false });
  assert.equal(announcer.announce(riverEntry, session).announced, true);
  assert.equal(output.requests.length, 1);
});

test("entries with no phrasing report no_message", () => {
  const output = new RecordingOutput();
  const announcer = new Announcer(output);
  const silent = createTestEntry({ name: "silent", offset: 10, messages: [] });
  assert.deepEqual(announcer.announce(silent, buildSession()), { announced: false, reason: "no_message" });
});
