import { test } from "node:test";
import assert from "node:assert/strict";
import { sleep } from "../normalization/time.ts";
import { createDefaultGuildSettings, type GuildSettings } from "../settings/settingsSchema.ts";
import type { ActionInput, GuildSettingsPatch } from "../store.ts";
import { RecordingOutput, withTempDir, writeModeFile } from "../testHelpers.ts";
import { Announcer } from "./announcer.ts";
import { GameTimerManager } from "./gameTimerManager.ts";
import { TimerConfigStore } from "./timerConfigStore.ts";
import { TimerError } from "./timerErrors.ts";

const rankedDocument = {
  game_start: { time: 0, messages: ["Welcome to the arena"], category: "early_game" },
  jungle_spawn: { time: 60, messages: ["Jungle camps are spawning now"], category: "buff" },
  fangtooth_spawn: {
    time: 240,
    messages: ["Fangtooth is now online"],
    category: "objective",
    respawn_time: 300,
    respawn_window: 30
  }
};

class FakeStore {
  readonly actions: ActionInput[] = [];
  readonly patches: GuildSettingsPatch[] = [];
  settings: GuildSettings = createDefaultGuildSettings();

  logAction(action: ActionInput) {
    this.actions.push(action);
  }

  getGuildSettings() {
    return this.settings;
  }

  async patchGuildSettings(_guildId: string, patch: GuildSettingsPatch) {
    this.patches.push(patch);
    return this.settings;
  }

  contents(kind: string) {
    return this.actions.filter((action) => action.kind === kind).map((action) => action.content);
  }
}

async function withManager(run: (context: { manager: GameTimerManager; store: FakeStore; output: RecordingOutput; dir: string; configStore: TimerConfigStore }) => Promise<void>) {
  await withTempDir("timer-manager", async (dir) => {
    await writeModeFile(dir, "ranked", rankedDocument);
    const store = new FakeStore();
    const configStore = new TimerConfigStore({ configDir: dir });
    await configStore.loadAll();
    const output = new RecordingOutput();
    const manager = new GameTimerManager({
      store,
      configStore,
      announcer: new Announcer(output),
      messageSeed: "test-seed"
    });
    try {
      await run({ manager, store, output, dir, configStore });
    } finally {
      manager.dispose();
    }
  });
}

function hasCode(code: string) {
  return (error: unknown) => error instanceof TimerError && error.code === code;
}

test("start announces the entries at the start offset right away", async () => {
  await withManager(async ({ manager, output, store }) => {
    const result = await manager.start("guild-1", { time: "0:00", voiceChannelId: "voice-1" });
    assert.equal(result.replaced, false);
    assert.equal(result.session.mode, "ranked");
    assert.deepEqual(output.entryNames(), ["game_start"]);
    assert.equal(output.requests[0].voiceChannelId, "voice-1");
    assert.deepEqual(store.contents("timer_runtime"), ["session_started", "timer_announced"]);
  });
});

test("a bad start time leaves the running session untouched", async () => {
  await withManager(async ({ manager }) => {
    await manager.start("guild-1", { time: "1:00" });
    manager.tick("guild-1", 5);
    await assert.rejects(manager.start("guild-1", { time: "soon" }), hasCode("invalid_time_format"));
    const snapshot = manager.getSession("guild-1");
    assert.equal(snapshot.state, "running");
    assert.equal(snapshot.elapsed, 65);
  });
});

test("starting twice replaces the running session", async () => {
  await withManager(async ({ manager, store }) => {
    await manager.start("guild-1", { time: 100 });
    const second = await manager.start("guild-1", { time: 200 });
    assert.equal(second.replaced, true);
    assert.equal(second.session.elapsed, 200);
    assert.equal(manager.listSessions().length, 1);
    assert.ok(store.contents("timer_runtime").includes("session_replaced"));
  });
});

test("unknown modes start on the ranked table with a warning", async () => {
  await withManager(async ({ manager, store }) => {
    const result = await manager.start("guild-1", { mode: "turbo" });
    assert.equal(result.session.mode, "ranked");
    assert.deepEqual(
      result.warnings.map((warning) => warning.code),
      ["unknown_mode"]
    );
    assert.deepEqual(store.contents("timer_warning"), ["unknown_mode"]);
  });
});

test("custom mode runs on the ranked table until it has timers of its own", async () => {
  await withManager(async ({ manager, store }) => {
    const result = await manager.start("guild-1", { mode: "custom" });
    assert.equal(result.session.mode, "custom");
    assert.equal(result.session.tableMode, "ranked");
    assert.deepEqual(
      result.warnings.map((warning) => warning.message),
      ["No timers are loaded for custom; using ranked timers."]
    );
    assert.deepEqual(store.contents("timer_warning"), ["unknown_mode"]);
  });
});

test("muted categories stay silent while the clock keeps running", async () => {
  await withManager(async ({ manager, output, store }) => {
    await manager.start("guild-1", { time: 0 });
    const state = await manager.setCategoryState("guild-1", "objective", { muted: true });
    assert.deepEqual(state, { muted: true, volume: 1 });
    assert.deepEqual(store.patches, [{ categories: { objective: { muted: true, volume: 1 } } }]);

    for (let second = 0; second < 240; second += 1) await manager.tickAll();
    assert.deepEqual(output.entryNames(), ["game_start", "jungle_spawn"]);
    assert.ok(store.contents("timer_runtime").includes("timer_skipped"));
    assert.equal(manager.getSession("guild-1").elapsed, 240);
  });
});

test("category updates validate the category and volume", async () => {
  await withManager(async ({ manager }) => {
    await assert.rejects(manager.setCategoryState("guild-1", "baron", { muted: true }), hasCode("unknown_category"));
    await assert.rejects(manager.setCategoryState("guild-1", "farm", { volume: 1.5 }), hasCode("invalid_volume"));
    const saved = await manager.setCategoryState("guild-1", "farm", { volume: 0.5 });
    assert.deepEqual(saved, { muted: false, volume: 1 });
  });
});

test("recordKill schedules predictions and logs supersession", async () => {
  await withManager(async ({ manager, output, store }) => {
    await manager.start("guild-1", { time: "4:05" });
    const first = await manager.recordKill("guild-1", "fangtooth_spawn");
    assert.equal(first.prediction.respawnAt, 545);

    await manager.recordKill("guild-1", "fangtooth_spawn", "4:10");
    assert.ok(store.contents("timer_runtime").includes("respawn_prediction_superseded"));

    manager.tick("guild-1", 520 - 245);
    assert.deepEqual(output.entryNames(), ["fangtooth_spawn:pre_window"]);
  });
});

test("commands on a missing session report session_not_found", async () => {
  await withManager(async ({ manager }) => {
    await assert.rejects(manager.stop("guild-9"), hasCode("session_not_found"));
    await assert.rejects(manager.recordKill("guild-9", "fangtooth_spawn"), hasCode("session_not_found"));
    assert.equal(await manager.endSession("guild-9"), false);
  });
});

test("stop then endSession returns the guild to idle", async () => {
  await withManager(async ({ manager }) => {
    await manager.start("guild-1", { time: 0 });
    const stopped = await manager.stop("guild-1");
    assert.equal(stopped.state, "stopped");
    assert.deepEqual(manager.tick("guild-1", 60), []);
    assert.equal(await manager.endSession("guild-1"), true);
    assert.deepEqual(manager.listSessions(), []);
  });
});

test("reloading a mode swaps the table for running sessions", async () => {
  await withManager(async ({ manager, output, dir }) => {
    await manager.start("guild-1", { time: 0 });
    await writeModeFile(dir, "ranked", {
      quick_check: { time: 10, messages: ["Ten seconds in"], category: "reminder" }
    });
    const result = await manager.reloadMode("ranked");
    assert.equal(result.sessionsUpdated, 1);
    assert.equal(result.entries, 1);

    manager.tick("guild-1", 10);
    assert.deepEqual(output.entryNames(), ["game_start", "quick_check"]);
  });
});

test("upserted timers reach sessions already running", async () => {
  await withManager(async ({ manager, output }) => {
    await manager.start("guild-1", { time: 0 });
    const entry = await manager.upsertTimer("ranked", "ward_check", {
      time: 30,
      messages: ["Check your wards"],
      category: "reminder"
    });
    assert.equal(entry?.label, "Ward Check");
    manager.tick("guild-1", 30);
    assert.deepEqual(output.entryNames(), ["game_start", "ward_check"]);
    await assert.rejects(manager.upsertTimer("turbo", "x", {}), hasCode("unknown_mode"));
  });
});

test("commands for one guild run one at a time", async () => {
  await withManager(async ({ manager }) => {
    const order: string[] = [];
    const slow = manager.withGuildLock("guild-1", async () => {
      order.push("slow:start");
      await sleep(20);
      order.push("slow:end");
    });
    const fast = manager.withGuildLock("guild-1", async () => {
      order.push("fast");
    });
    const otherGuild = manager.withGuildLock("guild-2", async () => {
      order.push("other");
    });
    await Promise.all([slow, fast, otherGuild]);
    assert.deepEqual(order, ["slow:start", "other", "slow:end", "fast"]);
  });
});

test("interval ticks wait for a command holding the guild lock", async () => {
  await withManager(async ({ manager }) => {
    await manager.start("guild-1", { time: 0 });
    const seen: number[] = [];
    const command = manager.withGuildLock("guild-1", async () => {
      await sleep(20);
      seen.push(manager.getSession("guild-1").elapsed);
    });
    const ticking = manager.tickAll(60);
    const [, fired] = await Promise.all([command, ticking]);
    seen.push(manager.getSession("guild-1").elapsed);
    assert.deepEqual(seen, [0, 60]);
    assert.equal(fired, 1);
  });
});

test("listTimers filters by category and rejects unknown ones", async () => {
  await withManager(async ({ manager }) => {
    assert.deepEqual(
      manager.listTimers("ranked", "objective").map((entry) => entry.name),
      ["fangtooth_spawn"]
    );
    assert.equal(manager.listTimers("ranked").length, 3);
    assert.deepEqual(manager.listTimers("ranked", "farm"), []);
    assert.throws(() => manager.listTimers("ranked", "weather"), hasCode("unknown_category"));
  });
});

test("say sends operator text through the announcement output", async () => {
  await withManager(async ({ manager, output, store }) => {
    await assert.rejects(manager.say("guild-1", "Group at mid"), hasCode("session_not_found"));
    await manager.start("guild-1", { time: 0, voiceChannelId: "voice-7" });
    await manager.setCategoryState("guild-1", "reminder", { muted: true });

    const request = await manager.say("guild-1", "  Group at mid  ", "user-1");
    assert.deepEqual(request, {
      guildId: "guild-1",
      voiceChannelId: "voice-7",
      text: "Group at mid",
      volume: 1,
      category: "reminder",
      entryName: "operator_say",
      elapsed: 0
    });
    assert.deepEqual(output.entryNames(), ["game_start", "operator_say"]);
    assert.deepEqual(store.contents("timer_runtime").slice(-1), ["say_dispatched"]);

    await assert.rejects(manager.say("guild-1", "   "), hasCode("empty_announcement"));
    await manager.stop("guild-1");
    await assert.rejects(manager.say("guild-1", "Too late"), hasCode("session_not_running"));
  });
});
