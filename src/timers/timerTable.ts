import { compareEntries, type GameMode, type TimerEntry } from "./timerTypes.ts";

export type DueWindow = {
  previousElapsed: number;
  elapsed: number;
};

// Index of the first entry whose offset is strictly greater than `offset`.
export function upperBound(entries: readonly TimerEntry[], offset: number) {
  let low = 0;
  let high = entries.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (entries[mid].offset <= offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Read-only snapshot of one mode's authored timers, ordered by offset. A
 * reload builds a new table instead of mutating this one, so sessions can
 * share it freely.
 */
export class TimerTable {
  readonly mode: GameMode;
  readonly loadedAt: string;
  private readonly entries: readonly TimerEntry[];
  private readonly byName: ReadonlyMap<string, TimerEntry>;

  constructor(mode: GameMode, entries: Iterable<TimerEntry>, loadedAt = new Date().toISOString()) {
    this.mode = mode;
    this.loadedAt = loadedAt;
    this.entries = Object.freeze([...entries].sort(compareEntries));
    this.byName = new Map(this.entries.map((entry) => [entry.name, entry]));
  }

  static empty(mode: GameMode) {
    return new TimerTable(mode, []);
  }

  get size() {
    return this.entries.length;
  }

  list(): readonly TimerEntry[] {
    return this.entries;
  }

  get(name: string): TimerEntry | null {
    return this.byName.get(name) ?? null;
  }

  respawnableEntries(): TimerEntry[] {
    return this.entries.filter((entry) => entry.respawnTime !== null);
  }

  /** Entries with offset in the half-open interval (previousElapsed, elapsed]. */
  dueEntries({ previousElapsed, elapsed }: DueWindow): TimerEntry[] {
    if (!(elapsed > previousElapsed)) return [];
    const from = upperBound(this.entries, previousElapsed);
    const to = upperBound(this.entries, elapsed);
    return this.entries.slice(from, to);
  }

  entriesAt(offset: number): TimerEntry[] {
    return this.entries.filter((entry) => entry.offset === offset);
  }
}
