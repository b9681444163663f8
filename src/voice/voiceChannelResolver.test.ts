import { test } from "node:test";
import assert from "node:assert/strict";
import { pickVoiceChannel, type VoiceChannelCandidate } from "./voiceChannelResolver.ts";

const channels: VoiceChannelCandidate[] = [
  { id: "lobby", name: "Lobby", humanCount: 1, joinable: true },
  { id: "ranked", name: "Ranked", humanCount: 4, joinable: true },
  { id: "locked", name: "Locked", humanCount: 9, joinable: false },
  { id: "empty", name: "Empty", humanCount: 0, joinable: true }
];

test("an explicit channel wins when it is joinable", () => {
  assert.deepEqual(pickVoiceChannel({ explicitChannelId: "empty", requesterChannelId: "lobby", channels }), {
    channelId: "empty",
    reason: "explicit"
  });
  assert.equal(pickVoiceChannel({ explicitChannelId: "locked", channels }), null);
  assert.equal(pickVoiceChannel({ explicitChannelId: "missing", channels }), null);
});

test("the requester's channel comes next", () => {
  assert.deepEqual(pickVoiceChannel({ requesterChannelId: "lobby", channels }), {
    channelId: "lobby",
    reason: "requester"
  });
});

test("otherwise the joinable channel with the most humans is picked", () => {
  assert.deepEqual(pickVoiceChannel({ requesterChannelId: "locked", channels }), {
    channelId: "ranked",
    reason: "most_members"
  });
});

test("no occupied channel means no pick", () => {
  assert.equal(pickVoiceChannel({ channels: [channels[3]] }), null);
  assert.equal(pickVoiceChannel({ channels: [] }), null);
});
