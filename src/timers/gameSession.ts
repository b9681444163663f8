import { formatGameClock } from "../normalization/time.ts";
import { clamp } from "../utils.ts";
import { MessageRotation } from "./messageRotation.ts";
import { RespawnPredictor, type KillRecordResult, type ObjectiveStatus } from "./respawnPredictor.ts";
import { TimerError } from "./timerErrors.ts";
import type { TimerTable } from "./timerTable.ts";
import {
  cloneCategorySettings,
  compareEntries,
  type CategorySettings,
  type CategoryState,
  type GameMode,
  type SessionState,
  type TimerCategory,
  type TimerEntry
} from "./timerTypes.ts";

export type GameSessionOptions = {
  guildId: string;
  mode: GameMode;
  table: TimerTable;
  categorySettings: CategorySettings;
  masterVolume?: number;
  seed?: string;
  voiceChannelId?: string | null;
};

export type CategoryStatePatch = {
  muted?: boolean;
  volume?: number;
};

export type GameSessionSnapshot = {
  guildId: string;
  state: SessionState;
  mode: GameMode;
  tableMode: GameMode;
  elapsed: number;
  clock: string;
  startOffset: number;
  startedAt: string | null;
  voiceChannelId: string | null;
  masterVolume: number;
  categories: CategorySettings;
  objectives: ObjectiveStatus[];
  upcoming: { name: string; offset: number; clock: string; source: string }[];
};

const UPCOMING_PREVIEW_LIMIT = 5;

export class GameSession {
  readonly guildId: string;
  readonly mode: GameMode;
  readonly voiceChannelId: string | null;
  readonly masterVolume: number;
  readonly rotation: MessageRotation;
  private table: TimerTable;
  private readonly categories: CategorySettings;
  private readonly predictor = new RespawnPredictor();
  private currentState: SessionState = "idle";
  // whole milliseconds, so sub-second ticks add up without float drift
  private elapsedMs = 0;
  private startOffset = 0;
  private startedAt: string | null = null;

  constructor({
    guildId,
    mode,
    table,
    categorySettings,
    masterVolume = 1,
    seed = "lane-guardian",
    voiceChannelId = null
  }: GameSessionOptions) {
    this.guildId = guildId;
    this.mode = mode;
    this.table = table;
    this.categories = cloneCategorySettings(categorySettings);
    this.masterVolume = clamp(masterVolume, 0, 1);
    this.rotation = new MessageRotation(seed);
    this.voiceChannelId = voiceChannelId;
  }

  get state() {
    return this.currentState;
  }

  get elapsed() {
    return this.elapsedMs / 1000;
  }

  get tableMode() {
    return this.table.mode;
  }

  /** Returns the authored entries that are due at the start offset itself. */
  start(initialOffset: number, startedAt = new Date().toISOString()): TimerEntry[] {
    if (!Number.isInteger(initialOffset) || initialOffset < 0) {
      throw new TimerError("invalid_time_format", `Start offset must be a non-negative whole number, got ${initialOffset}.`);
    }
    this.predictor.clear();
    this.rotation.reset();
    this.elapsedMs = initialOffset * 1000;
    this.startOffset = initialOffset;
    this.startedAt = startedAt;
    this.currentState = "running";
    return this.table.entriesAt(initialOffset);
  }

  tick(step = 1): TimerEntry[] {
    if (this.currentState !== "running") return [];
    const stepMs = Number.isFinite(step) ? Math.round(step * 1000) : 0;
    if (stepMs <= 0) return [];

    const previousElapsed = this.elapsed;
    this.elapsedMs += stepMs;
    const window = { previousElapsed, elapsed: this.elapsed };
    return [...this.table.dueEntries(window), ...this.predictor.dueEntries(window)].sort(compareEntries);
  }

  recordKill(objectiveName: string, killTime = Math.floor(this.elapsed)): KillRecordResult {
    if (this.currentState !== "running") {
      throw new TimerError("session_not_running", "No game timer is running for this server.");
    }
    const entry = this.table.get(objectiveName);
    if (!entry) {
      throw new TimerError("unknown_objective", `No timer named "${objectiveName}" in the ${this.table.mode} table.`);
    }
    if (entry.respawnTime === null) {
      throw new TimerError("objective_not_respawnable", `"${objectiveName}" has no respawn time configured.`);
    }
    if (!Number.isInteger(killTime) || killTime < 0) {
      throw new TimerError("invalid_time_format", `Kill time must be a non-negative whole number, got ${killTime}.`);
    }
    return this.predictor.recordKill(entry, killTime, this.elapsed);
  }

  stop() {
    this.currentState = "stopped";
    this.predictor.clear();
  }

  replaceTable(table: TimerTable) {
    this.table = table;
  }

  categoryState(category: TimerCategory): CategoryState {
    return { ...this.categories[category] };
  }

  setCategoryState(category: TimerCategory, patch: CategoryStatePatch): CategoryState {
    const current = this.categories[category];
    const next: CategoryState = {
      muted: patch.muted ?? current.muted,
      volume: patch.volume === undefined ? current.volume : clamp(patch.volume, 0, 1)
    };
    this.categories[category] = next;
    return { ...next };
  }

  isMuted(category: TimerCategory) {
    return this.categories[category].muted;
  }

  volumeFor(category: TimerCategory) {
    return clamp(this.masterVolume * this.categories[category].volume, 0, 1);
  }

  pendingPredictions(): TimerEntry[] {
    return this.predictor.pendingEntries();
  }

  snapshot(): GameSessionSnapshot {
    const upcomingStatic = this.table.dueEntries({
      previousElapsed: this.elapsed,
      elapsed: Number.MAX_SAFE_INTEGER
    });
    const upcoming = [...upcomingStatic.slice(0, UPCOMING_PREVIEW_LIMIT), ...this.predictor.pendingEntries()]
      .sort(compareEntries)
      .slice(0, UPCOMING_PREVIEW_LIMIT)
      .map((entry) => ({
        name: entry.name,
        offset: entry.offset,
        clock: formatGameClock(entry.offset),
        source: entry.source
      }));

    return {
      guildId: this.guildId,
      state: this.currentState,
      mode: this.mode,
      tableMode: this.table.mode,
      elapsed: this.elapsed,
      clock: formatGameClock(this.elapsed),
      startOffset: this.startOffset,
      startedAt: this.startedAt,
      voiceChannelId: this.voiceChannelId,
      masterVolume: this.masterVolume,
      categories: cloneCategorySettings(this.categories),
      objectives: this.table.respawnableEntries().map((entry) => this.predictor.objectiveStatus(entry)),
      upcoming
    };
  }
}
