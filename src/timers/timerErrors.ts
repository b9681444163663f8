export type TimerErrorCode =
  | "invalid_time_format"
  | "unknown_mode"
  | "unknown_objective"
  | "objective_not_respawnable"
  | "session_not_running"
  | "session_not_found"
  | "unknown_category"
  | "invalid_volume"
  | "invalid_timer_entry"
  | "unknown_timer"
  | "no_voice_channel"
  | "guild_unavailable"
  | "empty_announcement";

export class TimerError extends Error {
  constructor(
    public readonly code: TimerErrorCode,
    message: string,
    public readonly details: readonly string[] = []
  ) {
    super(message);
    this.name = "TimerError";
  }
}

export function isTimerError(error: unknown): error is TimerError {
  return error instanceof TimerError;
}

export type TimerWarningCode = "unknown_mode" | "malformed_timer_entry" | "malformed_timer_file";

export type TimerWarning = {
  code: TimerWarningCode;
  message: string;
  mode: string;
  entryName?: string;
  details?: string[];
};
