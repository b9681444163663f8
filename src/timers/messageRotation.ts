import { hash32 } from "../utils.ts";
import type { TimerEntry } from "./timerTypes.ts";

/**
 * Seeded round-robin over an entry's phrasings. The starting variant comes
 * from hash32(`${seed}:${entry.name}`); each later announcement of the same
 * entry moves one variant forward.
 */
export class MessageRotation {
  readonly seed: string;
  private readonly counters = new Map<string, number>();

  constructor(seed: string) {
    this.seed = seed;
  }

  variantIndex(entry: TimerEntry, count: number) {
    if (!entry.messages.length) return -1;
    return (hash32(`${this.seed}:${entry.name}`) + count) % entry.messages.length;
  }

  next(entry: TimerEntry): string | null {
    const count = this.counters.get(entry.name) ?? 0;
    const index = this.variantIndex(entry, count);
    if (index < 0) return null;
    this.counters.set(entry.name, count + 1);
    return entry.messages[index] ?? null;
  }

  reset() {
    this.counters.clear();
  }
}
