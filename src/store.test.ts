import { test } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { Store, type LoggedAction } from "./store.ts";
import { withTempDir } from "./testHelpers.ts";

test("guild settings patches persist and reload", async () => {
  await withTempDir("timer-store", async (dir) => {
    const settingsPath = path.join(dir, "nested", "guild-settings.json");
    const store = new Store({ settingsPath });
    await store.init();

    const patched = await store.patchGuildSettings("guild-1", {
      masterVolume: 0.5,
      categories: { objective: { muted: true } },
      tts: { voice: "nova" }
    });
    assert.equal(patched.masterVolume, 0.5);
    assert.deepEqual(patched.categories.objective, { muted: true, volume: 1 });
    assert.equal(patched.tts.voice, "nova");
    assert.equal(patched.tts.speed, 1);

    await store.patchGuildSettings("guild-1", { categories: { objective: { volume: 0.3 } } });

    const reloaded = new Store({ settingsPath });
    await reloaded.init();
    assert.deepEqual(reloaded.listGuildIds(), ["guild-1"]);
    const settings = reloaded.getGuildSettings("guild-1");
    assert.equal(settings.masterVolume, 0.5);
    assert.deepEqual(settings.categories.objective, { muted: true, volume: 0.3 });
    assert.equal(settings.tts.voice, "nova");
  });
});

test("an unreadable settings file is reported and ignored", async () => {
  await withTempDir("timer-store", async (dir) => {
    const settingsPath = path.join(dir, "guild-settings.json");
    await fs.writeFile(settingsPath, "not json", "utf8");
    const store = new Store({ settingsPath });
    await store.init();

    const [warning] = store.getRecentActions(1);
    assert.equal(warning?.kind, "config_warning");
    assert.equal(warning?.content, "guild_settings_unreadable");
    assert.deepEqual(store.listGuildIds(), []);
    assert.equal(store.getGuildSettings("guild-1").masterVolume, 1);
  });
});

test("the action log keeps the newest entries up to its capacity", () => {
  const store = new Store({ settingsPath: "unused.json", maxActions: 3 });
  for (let index = 1; index <= 5; index += 1) {
    store.logAction({ kind: index % 2 ? "timer_runtime" : "voice_error", content: `event ${index}` });
  }

  assert.deepEqual(
    store.getRecentActions(10).map((action) => action.id),
    [5, 4, 3]
  );
  assert.deepEqual(
    store.getRecentActions(10, "timer_runtime").map((action) => action.content),
    ["event 5", "event 3"]
  );
  assert.equal(store.countActions("voice_error"), 1);
  assert.deepEqual(store.getStats(), {
    guildsConfigured: 0,
    actionsBuffered: 3,
    errors: 1,
    byKind: { timer_runtime: 2, voice_error: 1 }
  });
});

test("logAction trims long content and notifies the listener after the call returns", async () => {
  const store = new Store({ settingsPath: "unused.json" });
  const seen: LoggedAction[] = [];
  store.onActionLogged = (action) => {
    seen.push(action);
  };

  const logged = store.logAction({ kind: "tts_call", guildId: "guild-1", content: "x".repeat(2500) });
  assert.equal(logged.content?.length, 2000);
  assert.equal(logged.channelId, null);
  assert.equal(seen.length, 0);

  await new Promise<void>((resolve) => setImmediate(resolve));
  assert.equal(seen.length, 1);
  assert.equal(seen[0]?.guildId, "guild-1");
});
