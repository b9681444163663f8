import type { GameSession } from "./gameSession.ts";
import type { TimerCategory, TimerEntry } from "./timerTypes.ts";

export const OPERATOR_ENTRY_NAME = "operator_say";

export type AnnouncementRequest = {
  guildId: string;
  voiceChannelId: string | null;
  text: string;
  volume: number;
  category: TimerCategory;
  entryName: string;
  elapsed: number;
};

/**
 * Delivery boundary for announcements. Implementations must not block the
 * tick loop: dispatch queues the request and returns.
 */
export interface AnnouncementOutput {
  dispatch(request: AnnouncementRequest): void;
}

export type AnnounceOutcome =
  | { announced: true; request: AnnouncementRequest }
  | { announced: false; reason: "muted" | "no_message" };

export class Announcer {
  private readonly output: AnnouncementOutput;

  constructor(output: AnnouncementOutput) {
    this.output = output;
  }

  announce(entry: TimerEntry, session: GameSession): AnnounceOutcome {
    if (session.isMuted(entry.category)) {
      return { announced: false, reason: "muted" };
    }
    const text = session.rotation.next(entry);
    if (!text) {
      return { announced: false, reason: "no_message" };
    }
    const request: AnnouncementRequest = {
      guildId: session.guildId,
      voiceChannelId: session.voiceChannelId,
      text,
      volume: session.volumeFor(entry.category),
      category: entry.category,
      entryName: entry.name,
      elapsed: session.elapsed
    };
    this.output.dispatch(request);
    return { announced: true, request };
  }

  /** Operator text goes out at master volume and ignores category mutes. */
  say(session: GameSession, text: string): AnnouncementRequest {
    const request: AnnouncementRequest = {
      guildId: session.guildId,
      voiceChannelId: session.voiceChannelId,
      text,
      volume: session.masterVolume,
      category: "reminder",
      entryName: OPERATOR_ENTRY_NAME,
      elapsed: session.elapsed
    };
    this.output.dispatch(request);
    return request;
  }
}
