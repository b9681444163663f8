import type { AnnouncementOutput, AnnouncementRequest } from "../timers/announcer.ts";
import type { GuildSettings } from "../settings/settingsSchema.ts";
import type { ActionInput } from "../store.ts";
import { errorMessage } from "../utils.ts";
import { convertTtsPcmToDiscordPcm } from "./pcmAudio.ts";
import { prepareSpeechText } from "./speechText.ts";
import type { SynthesizeInput } from "./ttsService.ts";

export type PlaybackRequest = {
  guildId: string;
  channelId: string;
  pcm: Buffer;
  volume: number;
};

/** Plays 48 kHz stereo PCM into a guild's voice channel. */
export interface VoicePlayer {
  play(request: PlaybackRequest): Promise<void>;
}

export type VoiceAnnouncementOutputOptions = {
  store: {
    logAction(action: ActionInput): unknown;
    getGuildSettings(guildId: string): GuildSettings;
  };
  tts: { synthesize(input: SynthesizeInput): Promise<Buffer> };
  player: VoicePlayer;
  maxQueuedPerGuild?: number;
};

/**
 * Voice side of the announcement boundary. Each guild gets its own promise
 * chain so callouts play in order without holding up the tick loop.
 */
export class VoiceAnnouncementOutput implements AnnouncementOutput {
  private readonly store: VoiceAnnouncementOutputOptions["store"];
  private readonly tts: VoiceAnnouncementOutputOptions["tts"];
  private readonly player: VoicePlayer;
  private readonly maxQueuedPerGuild: number;
  private readonly queues = new Map<string, Promise<void>>();
  private readonly queued = new Map<string, number>();

  constructor({ store, tts, player, maxQueuedPerGuild = 8 }: VoiceAnnouncementOutputOptions) {
    this.store = store;
    this.tts = tts;
    this.player = player;
    this.maxQueuedPerGuild = Math.max(1, maxQueuedPerGuild);
  }

  dispatch(request: AnnouncementRequest) {
    const pending = this.queued.get(request.guildId) ?? 0;
    if (pending >= this.maxQueuedPerGuild) {
      this.store.logAction({
        kind: "voice_error",
        guildId: request.guildId,
        content: "announcement_dropped",
        metadata: { entry: request.entryName, reason: "queue_full", pending }
      });
      return;
    }
    this.queued.set(request.guildId, pending + 1);

    const previous = this.queues.get(request.guildId) ?? Promise.resolve();
    const current = previous
      .then(() => this.deliver(request))
      .finally(() => {
        const remaining = (this.queued.get(request.guildId) ?? 1) - 1;
        if (remaining <= 0) {
          this.queued.delete(request.guildId);
        } else {
          this.queued.set(request.guildId, remaining);
        }
        if (this.queues.get(request.guildId) === current) {
          this.queues.delete(request.guildId);
        }
      });
    this.queues.set(request.guildId, current);
  }

  /** Resolves once everything queued for the guild has been attempted. */
  async drain(guildId: string) {
    await this.queues.get(guildId);
  }

  pendingCount(guildId: string) {
    return this.queued.get(guildId) ?? 0;
  }

  // never rejects: failures are logged so the chain keeps moving
  private async deliver(request: AnnouncementRequest) {
    if (!request.voiceChannelId) {
      this.store.logAction({
        kind: "voice_error",
        guildId: request.guildId,
        content: "announcement_without_channel",
        metadata: { entry: request.entryName }
      });
      return;
    }

    try {
      const { tts } = this.store.getGuildSettings(request.guildId);
      const text = prepareSpeechText(request.text, tts);
      const speech = await this.tts.synthesize({
        text,
        voice: tts.voice,
        speed: tts.speed,
        trace: { guildId: request.guildId, channelId: request.voiceChannelId, source: "timer_announcement" }
      });
      await this.player.play({
        guildId: request.guildId,
        channelId: request.voiceChannelId,
        pcm: convertTtsPcmToDiscordPcm(speech),
        volume: request.volume
      });
      this.store.logAction({
        kind: "voice_runtime",
        guildId: request.guildId,
        channelId: request.voiceChannelId,
        content: "announcement_played",
        metadata: { entry: request.entryName, category: request.category, volume: request.volume, text }
      });
    } catch (error) {
      this.store.logAction({
        kind: "voice_error",
        guildId: request.guildId,
        channelId: request.voiceChannelId,
        content: "announcement_failed",
        metadata: { entry: request.entryName, error: errorMessage(error) }
      });
    }
  }
}
