export const GAME_MODES = ["ranked", "nitro", "aram", "custom"] as const;
export type GameMode = (typeof GAME_MODES)[number];

export const TIMER_CATEGORIES = [
  "early_game",
  "mid_game",
  "late_game",
  "objective",
  "buff",
  "farm",
  "reminder"
] as const;
export type TimerCategory = (typeof TIMER_CATEGORIES)[number];

export type PredictedEntrySource = "pre_window" | "respawn" | "post_window" | "buff_expiry";
export type TimerEntrySource = "static" | PredictedEntrySource;

export type TimerEntry = {
  name: string;
  label: string;
  offset: number;
  messages: readonly string[];
  category: TimerCategory;
  respawnTime: number | null;
  respawnWindow: number;
  buffDuration: number | null;
  respawnMessages: readonly string[];
  source: TimerEntrySource;
  objective: string | null;
};

export type CategoryState = {
  muted: boolean;
  volume: number;
};

export type CategorySettings = Record<TimerCategory, CategoryState>;

export type SessionState = "idle" | "running" | "stopped";

export function isGameMode(value: unknown): value is GameMode {
  return typeof value === "string" && GAME_MODES.some((mode) => mode === value);
}

export function isTimerCategory(value: unknown): value is TimerCategory {
  return typeof value === "string" && TIMER_CATEGORIES.some((category) => category === value);
}

export function compareEntries(left: TimerEntry, right: TimerEntry) {
  if (left.offset !== right.offset) return left.offset - right.offset;
  return left.name.localeCompare(right.name);
}

export function createDefaultCategorySettings(): CategorySettings {
  return {
    early_game: { muted: false, volume: 1 },
    mid_game: { muted: false, volume: 1 },
    late_game: { muted: false, volume: 1 },
    objective: { muted: false, volume: 1 },
    buff: { muted: false, volume: 1 },
    farm: { muted: false, volume: 1 },
    reminder: { muted: false, volume: 1 }
  };
}

export function cloneCategorySettings(source: CategorySettings): CategorySettings {
  const copy = createDefaultCategorySettings();
  for (const category of TIMER_CATEGORIES) {
    copy[category] = { ...source[category] };
  }
  return copy;
}
