import { test } from "node:test";
import assert from "node:assert/strict";
import { createDefaultGuildSettings } from "../settings/settingsSchema.ts";
import { normalizeGuildSettings } from "./settingsNormalization.ts";

test("normalizeGuildSettings returns defaults for anything but an object", () => {
  assert.deepEqual(normalizeGuildSettings(null), createDefaultGuildSettings());
  assert.deepEqual(normalizeGuildSettings("loud"), createDefaultGuildSettings());
  assert.deepEqual(normalizeGuildSettings([1, 2]), createDefaultGuildSettings());
});

test("normalizeGuildSettings clamps volumes and keeps known categories only", () => {
  const normalized = normalizeGuildSettings({
    masterVolume: 3,
    categories: {
      objective: { muted: true, volume: -1 },
      buff: { muted: "yes", volume: 0.4 },
      weather: { muted: true, volume: 0.2 }
    }
  });
  assert.equal(normalized.masterVolume, 1);
  assert.deepEqual(normalized.categories.objective, { muted: true, volume: 0 });
  assert.deepEqual(normalized.categories.buff, { muted: false, volume: 0.4 });
  assert.deepEqual(normalized.categories.farm, { muted: false, volume: 1 });
  assert.equal(Object.hasOwn(normalized.categories, "weather"), false);
});

test("normalizeGuildSettings validates speech preferences", () => {
  const normalized = normalizeGuildSettings({
    tts: {
      voice: "robot",
      speed: 12,
      numberToWords: false,
      pronunciations: {
        " Fangtooth ": " fang tooth ",
        empty: "   ",
        count: 3
      }
    }
  });
  assert.deepEqual(normalized.tts, {
    voice: "alloy",
    speed: 4,
    numberToWords: false,
    pronunciations: { fangtooth: "fang tooth" }
  });
});

test("a null speed keeps the default instead of reading as zero", () => {
  assert.equal(normalizeGuildSettings({ tts: { speed: null } }).tts.speed, 1);
  assert.equal(normalizeGuildSettings({ tts: { speed: 0.1 } }).tts.speed, 0.25);
});
