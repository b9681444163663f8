import type { ActionInput, GuildSettingsPatch } from "../store.ts";
import type { GuildSettings } from "../settings/settingsSchema.ts";
import { parseGameClock } from "../normalization/time.ts";
import { errorMessage } from "../utils.ts";
import type { AnnouncementRequest, Announcer } from "./announcer.ts";
import { GameSession, type GameSessionSnapshot } from "./gameSession.ts";
import type { KillRecordResult } from "./respawnPredictor.ts";
import { FALLBACK_MODE, type TimerConfigStore } from "./timerConfigStore.ts";
import { TimerError, type TimerWarning } from "./timerErrors.ts";
import {
  isGameMode,
  isTimerCategory,
  type CategoryState,
  type GameMode,
  type TimerEntry
} from "./timerTypes.ts";

export type ManagerStore = {
  logAction(action: ActionInput): unknown;
  getGuildSettings(guildId: string): GuildSettings;
  patchGuildSettings(guildId: string, patch: GuildSettingsPatch): Promise<GuildSettings>;
};

export type GameTimerManagerOptions = {
  store: ManagerStore;
  configStore: Pick<TimerConfigStore, "getTable" | "reloadMode" | "upsertTimer" | "removeTimer" | "listTimers">;
  announcer: Announcer;
  defaultMode?: GameMode;
  messageSeed?: string;
  tickIntervalMs?: number;
};

export type StartSessionInput = {
  time?: unknown;
  mode?: string;
  voiceChannelId?: string | null;
  userId?: string | null;
};

export type StartSessionResult = {
  session: GameSessionSnapshot;
  warnings: TimerWarning[];
  replaced: boolean;
};

export type CategoryUpdateInput = {
  muted?: boolean;
  volume?: number | null;
};

export class GameTimerManager {
  private readonly store: ManagerStore;
  private readonly configStore: GameTimerManagerOptions["configStore"];
  private readonly announcer: Announcer;
  private readonly defaultMode: GameMode;
  private readonly messageSeed: string;
  private readonly tickIntervalMs: number;
  private readonly sessions = new Map<string, GameSession>();
  private readonly guildLocks = new Map<string, Promise<void>>();
  private tickTimer: ReturnType<typeof setInterval> | null = null;

  constructor({
    store,
    configStore,
    announcer,
    defaultMode = "ranked",
    messageSeed = "lane-guardian",
    tickIntervalMs = 1000
  }: GameTimerManagerOptions) {
    this.store = store;
    this.configStore = configStore;
    this.announcer = announcer;
    this.defaultMode = defaultMode;
    this.messageSeed = messageSeed;
    this.tickIntervalMs = Math.max(50, Math.floor(tickIntervalMs));
  }

  async withGuildLock<T>(guildId: string, fn: () => T | Promise<T>): Promise<T> {
    const previous = this.guildLocks.get(guildId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.guildLocks.set(guildId, current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.guildLocks.get(guildId) === current) {
        this.guildLocks.delete(guildId);
      }
    }
  }

  start(guildId: string, input: StartSessionInput = {}): Promise<StartSessionResult> {
    return this.withGuildLock(guildId, () => {
      // parse before touching state so a bad offset leaves the old session alone
      const offset = parseGameClock(input.time ?? 0);
      const requestedMode = input.mode?.trim() || this.defaultMode;
      const { table, warnings } = this.configStore.getTable(requestedMode);
      const mode = isGameMode(requestedMode) ? requestedMode : FALLBACK_MODE;

      const existing = this.sessions.get(guildId);
      const replaced = existing?.state === "running";
      if (existing && replaced) {
        existing.stop();
        this.store.logAction({
          kind: "timer_runtime",
          guildId,
          userId: input.userId,
          content: "session_replaced",
          metadata: { previousMode: existing.mode, previousElapsed: existing.elapsed }
        });
      }

      const settings = this.store.getGuildSettings(guildId);
      const session = new GameSession({
        guildId,
        mode,
        table,
        categorySettings: settings.categories,
        masterVolume: settings.masterVolume,
        seed: `${this.messageSeed}:${guildId}`,
        voiceChannelId: input.voiceChannelId ?? null
      });
      const dueAtStart = session.start(offset);
      this.sessions.set(guildId, session);

      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        channelId: session.voiceChannelId,
        userId: input.userId,
        content: "session_started",
        metadata: { mode, tableMode: table.mode, offset, entries: table.size }
      });
      for (const warning of warnings) {
        this.store.logAction({
          kind: "timer_warning",
          guildId,
          content: warning.code,
          metadata: { mode: warning.mode, message: warning.message }
        });
      }
      this.announceEntries(session, dueAtStart);
      return { session: session.snapshot(), warnings, replaced };
    });
  }

  stop(guildId: string): Promise<GameSessionSnapshot> {
    return this.withGuildLock(guildId, () => {
      const session = this.requireSession(guildId);
      session.stop();
      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        content: "session_stopped",
        metadata: { elapsed: session.elapsed, mode: session.mode }
      });
      return session.snapshot();
    });
  }

  /** Stops and forgets the guild's session, returning it to idle. */
  endSession(guildId: string, reason = "requested"): Promise<boolean> {
    return this.withGuildLock(guildId, () => {
      const session = this.sessions.get(guildId);
      if (!session) return false;
      session.stop();
      this.sessions.delete(guildId);
      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        content: "session_ended",
        metadata: { reason, elapsed: session.elapsed }
      });
      return true;
    });
  }

  recordKill(guildId: string, objective: string, at?: unknown): Promise<KillRecordResult> {
    return this.withGuildLock(guildId, () => {
      const killTime = at === undefined || at === null || at === "" ? undefined : parseGameClock(at);
      const session = this.requireSession(guildId);
      const result = session.recordKill(objective, killTime);

      if (result.supersededBeforeRespawn && result.superseded) {
        this.store.logAction({
          kind: "timer_runtime",
          guildId,
          content: "respawn_prediction_superseded",
          metadata: {
            objective,
            previousKillTime: result.superseded.killTime,
            previousRespawnAt: result.superseded.respawnAt
          }
        });
      }
      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        content: "kill_recorded",
        metadata: {
          objective,
          killTime: result.prediction.killTime,
          respawnAt: result.prediction.respawnAt,
          scheduled: result.prediction.pending.length
        }
      });
      return result;
    });
  }

  setCategoryState(guildId: string, category: string, input: CategoryUpdateInput): Promise<CategoryState> {
    return this.withGuildLock(guildId, async () => {
      if (!isTimerCategory(category)) {
        throw new TimerError("unknown_category", `Unknown timer category "${category}".`);
      }
      const volume = input.volume ?? undefined;
      if (volume !== undefined && (!Number.isFinite(volume) || volume < 0 || volume > 1)) {
        throw new TimerError("invalid_volume", "Volume must be a number between 0.0 and 1.0.");
      }
      const muted = input.muted;

      const session = this.sessions.get(guildId);
      const applied = session
        ? session.setCategoryState(category, { muted, volume })
        : null;
      const categories: NonNullable<GuildSettingsPatch["categories"]> = {};
      categories[category] = applied ?? { muted, volume };
      const saved = await this.store.patchGuildSettings(guildId, { categories });
      const state = applied ?? saved.categories[category];
      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        content: "category_updated",
        metadata: { category, muted: state.muted, volume: state.volume }
      });
      return state;
    });
  }

  async reloadMode(mode: string) {
    if (!isGameMode(mode)) {
      throw new TimerError("unknown_mode", `Unknown game mode "${mode}".`);
    }
    const result = await this.configStore.reloadMode(mode);
    const swapped = this.swapTables(mode);
    this.store.logAction({
      kind: "config_runtime",
      content: "mode_reloaded",
      metadata: { mode, entries: result.table.size, warnings: result.warnings.length, sessionsUpdated: swapped }
    });
    return { mode, entries: result.table.size, warnings: result.warnings, sessionsUpdated: swapped };
  }

  async upsertTimer(mode: string, name: string, raw: unknown): Promise<TimerEntry | null> {
    if (!isGameMode(mode)) {
      throw new TimerError("unknown_mode", `Unknown game mode "${mode}".`);
    }
    const table = await this.configStore.upsertTimer(mode, name, raw);
    this.swapTables(mode);
    return table.get(name);
  }

  async removeTimer(mode: string, name: string) {
    if (!isGameMode(mode)) {
      throw new TimerError("unknown_mode", `Unknown game mode "${mode}".`);
    }
    await this.configStore.removeTimer(mode, name);
    this.swapTables(mode);
  }

  listTimers(mode: string, category?: string): readonly TimerEntry[] {
    if (!isGameMode(mode)) {
      throw new TimerError("unknown_mode", `Unknown game mode "${mode}".`);
    }
    const entries = this.configStore.listTimers(mode);
    if (category === undefined) return entries;
    if (!isTimerCategory(category)) {
      throw new TimerError("unknown_category", `Unknown timer category "${category}".`);
    }
    return entries.filter((entry) => entry.category === category);
  }

  /** Speaks operator text into the session's channel through the announcement queue. */
  say(guildId: string, text: string, userId?: string | null): Promise<AnnouncementRequest> {
    return this.withGuildLock(guildId, () => {
      const session = this.requireSession(guildId);
      if (session.state !== "running") {
        throw new TimerError("session_not_running", "No game timer is running for this server.");
      }
      const trimmed = text.trim();
      if (!trimmed) {
        throw new TimerError("empty_announcement", "Announcement text must not be empty.");
      }
      const request = this.announcer.say(session, trimmed);
      this.store.logAction({
        kind: "timer_runtime",
        guildId,
        channelId: session.voiceChannelId,
        userId,
        content: "say_dispatched",
        metadata: { textChars: trimmed.length, elapsed: session.elapsed }
      });
      return request;
    });
  }

  // Live sessions pick up the new table on their next tick.
  private swapTables(mode: GameMode) {
    let swapped = 0;
    for (const session of this.sessions.values()) {
      if (session.mode !== mode && session.tableMode !== mode) continue;
      const { table } = this.configStore.getTable(session.mode);
      session.replaceTable(table);
      swapped += 1;
    }
    return swapped;
  }

  tick(guildId: string, step = 1): TimerEntry[] {
    const session = this.sessions.get(guildId);
    if (!session) return [];
    const due = session.tick(step);
    this.announceEntries(session, due);
    return due;
  }

  /** Ticks every session behind its guild lock, so a tick never lands inside a command. */
  async tickAll(step = 1) {
    const counts = await Promise.all(
      [...this.sessions.keys()].map((guildId) =>
        this.withGuildLock(guildId, () => this.tick(guildId, step).length).catch((error: unknown) => {
          this.store.logAction({
            kind: "timer_error",
            guildId,
            content: "tick_failed",
            metadata: { error: errorMessage(error) }
          });
          return 0;
        })
      )
    );
    return counts.reduce((total, count) => total + count, 0);
  }

  private announceEntries(session: GameSession, entries: readonly TimerEntry[]) {
    for (const entry of entries) {
      const outcome = this.announcer.announce(entry, session);
      this.store.logAction({
        kind: "timer_runtime",
        guildId: session.guildId,
        content: outcome.announced ? "timer_announced" : "timer_skipped",
        metadata: {
          entry: entry.name,
          category: entry.category,
          elapsed: session.elapsed,
          reason: outcome.announced ? null : outcome.reason
        }
      });
    }
  }

  startTicking() {
    if (this.tickTimer) return;
    const stepSeconds = this.tickIntervalMs / 1000;
    this.tickTimer = setInterval(() => {
      this.tickAll(stepSeconds).catch((error: unknown) => {
        this.store.logAction({
          kind: "timer_error",
          content: "tick_loop_failed",
          metadata: { error: errorMessage(error) }
        });
      });
    }, this.tickIntervalMs);
    this.tickTimer.unref();
  }

  stopTicking() {
    if (!this.tickTimer) return;
    clearInterval(this.tickTimer);
    this.tickTimer = null;
  }

  getSession(guildId: string): GameSessionSnapshot {
    return this.requireSession(guildId).snapshot();
  }

  hasRunningSession(guildId: string) {
    return this.sessions.get(guildId)?.state === "running";
  }

  sessionChannelId(guildId: string) {
    return this.sessions.get(guildId)?.voiceChannelId ?? null;
  }

  listSessions(): GameSessionSnapshot[] {
    return [...this.sessions.values()].map((session) => session.snapshot());
  }

  countRunning() {
    let running = 0;
    for (const session of this.sessions.values()) {
      if (session.state === "running") running += 1;
    }
    return running;
  }

  private requireSession(guildId: string) {
    const session = this.sessions.get(guildId);
    if (!session) {
      throw new TimerError("session_not_found", "No game timer exists for this server.");
    }
    return session;
  }

  dispose() {
    this.stopTicking();
    for (const session of this.sessions.values()) session.stop();
    this.sessions.clear();
    this.guildLocks.clear();
  }
}
