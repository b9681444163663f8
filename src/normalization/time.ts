import { TimerError } from "../timers/timerErrors.ts";

const CLOCK_PATTERN = /^(\d{1,3}):([0-5]\d)$/;
const SECONDS_PATTERN = /^\d{1,5}$/;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, Math.floor(Number(ms) || 0))));
}

/**
 * Parses a game clock reading into whole seconds. Accepts `M:SS`, `MM:SS`
 * or a bare count of seconds; numbers must be non-negative integers.
 */
export function parseGameClock(input: unknown): number {
  if (typeof input === "number") {
    if (Number.isInteger(input) && input >= 0) return input;
    throw new TimerError("invalid_time_format", `Game time must be a non-negative whole number of seconds, got ${input}.`);
  }

  const text = String(input ?? "").trim();
  if (SECONDS_PATTERN.test(text)) return Number(text);

  const match = CLOCK_PATTERN.exec(text);
  if (!match) {
    throw new TimerError("invalid_time_format", `Could not read "${text}" as a game time; use M:SS, e.g. 4:05.`);
  }
  return Number(match[1]) * 60 + Number(match[2]);
}

export function formatGameClock(totalSeconds: number) {
  const safe = Math.max(0, Math.floor(Number(totalSeconds) || 0));
  const minutes = Math.floor(safe / 60);
  const seconds = safe % 60;
  return `${minutes}:${String(seconds).padStart(2, "0")}`;
}
