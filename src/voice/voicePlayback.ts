import { Readable } from "node:stream";
import {
  AudioPlayerStatus,
  createAudioPlayer,
  createAudioResource,
  entersState,
  joinVoiceChannel,
  StreamType,
  VoiceConnectionStatus,
  type AudioPlayer,
  type VoiceConnection
} from "@discordjs/voice";
import type { Guild } from "discord.js";
import type { ActionInput } from "../store.ts";
import { TimerError } from "../timers/timerErrors.ts";
import { clamp, errorMessage } from "../utils.ts";
import type { PlaybackRequest, VoicePlayer } from "./announcementOutput.ts";

const RECONNECT_GRACE_MS = 5_000;

type VoiceLink = {
  channelId: string;
  connection: VoiceConnection;
  player: AudioPlayer;
  idleTimer: ReturnType<typeof setTimeout> | null;
};

export type DiscordVoicePlayerOptions = {
  resolveGuild: (guildId: string) => Pick<Guild, "voiceAdapterCreator"> | null;
  store: { logAction(action: ActionInput): unknown };
  // a guild with no running timer is left after this much silence
  idleDisconnectMs?: number;
  keepConnected?: (guildId: string) => boolean;
  connectTimeoutMs?: number;
  playbackTimeoutMs?: number;
};

export class DiscordVoicePlayer implements VoicePlayer {
  private readonly resolveGuild: DiscordVoicePlayerOptions["resolveGuild"];
  private readonly store: DiscordVoicePlayerOptions["store"];
  private readonly idleDisconnectMs: number;
  private readonly keepConnected: (guildId: string) => boolean;
  private readonly connectTimeoutMs: number;
  private readonly playbackTimeoutMs: number;
  private readonly links = new Map<string, VoiceLink>();

  constructor({
    resolveGuild,
    store,
    idleDisconnectMs = 300_000,
    keepConnected = () => false,
    connectTimeoutMs = 15_000,
    playbackTimeoutMs = 60_000
  }: DiscordVoicePlayerOptions) {
    this.resolveGuild = resolveGuild;
    this.store = store;
    this.idleDisconnectMs = idleDisconnectMs;
    this.keepConnected = keepConnected;
    this.connectTimeoutMs = connectTimeoutMs;
    this.playbackTimeoutMs = playbackTimeoutMs;
  }

  async play({ guildId, channelId, pcm, volume }: PlaybackRequest) {
    if (!pcm.length) return;
    const link = await this.ensureLink(guildId, channelId);
    this.clearIdleTimer(link);

    const resource = createAudioResource(Readable.from([pcm]), {
      inputType: StreamType.Raw,
      inlineVolume: true
    });
    resource.volume?.setVolume(clamp(volume, 0, 1));
    link.player.play(resource);
    try {
      await entersState(link.player, AudioPlayerStatus.Idle, this.playbackTimeoutMs);
    } finally {
      this.scheduleIdleDisconnect(guildId, link);
    }
  }

  isConnected(guildId: string) {
    return this.links.has(guildId);
  }

  connectedChannelId(guildId: string) {
    return this.links.get(guildId)?.channelId ?? null;
  }

  connectedCount() {
    return this.links.size;
  }

  disconnect(guildId: string, reason: string) {
    const link = this.links.get(guildId);
    if (!link) return false;
    this.links.delete(guildId);
    this.clearIdleTimer(link);
    link.player.stop(true);
    if (link.connection.state.status !== VoiceConnectionStatus.Destroyed) {
      link.connection.destroy();
    }
    this.store.logAction({
      kind: "voice_runtime",
      guildId,
      channelId: link.channelId,
      content: "voice_disconnected",
      metadata: { reason }
    });
    return true;
  }

  dispose() {
    for (const guildId of [...this.links.keys()]) {
      this.disconnect(guildId, "shutdown");
    }
  }

  private async ensureLink(guildId: string, channelId: string): Promise<VoiceLink> {
    const existing = this.links.get(guildId);
    if (existing && existing.channelId === channelId) return existing;
    if (existing) this.disconnect(guildId, "channel_changed");

    const guild = this.resolveGuild(guildId);
    if (!guild) {
      throw new TimerError("guild_unavailable", `Guild ${guildId} is not available to the bot.`);
    }

    const connection = joinVoiceChannel({
      channelId,
      guildId,
      adapterCreator: guild.voiceAdapterCreator,
      selfDeaf: true,
      selfMute: false
    });
    try {
      await entersState(connection, VoiceConnectionStatus.Ready, this.connectTimeoutMs);
    } catch (error) {
      connection.destroy();
      throw error;
    }

    const player = createAudioPlayer();
    player.on("error", (error) => {
      this.store.logAction({
        kind: "voice_error",
        guildId,
        channelId,
        content: "audio_player_error",
        metadata: { error: errorMessage(error) }
      });
    });
    connection.subscribe(player);
    connection.on(VoiceConnectionStatus.Disconnected, () => {
      this.recoverOrDrop(guildId, connection).catch((error: unknown) => {
        this.store.logAction({
          kind: "voice_error",
          guildId,
          content: "voice_reconnect_failed",
          metadata: { error: errorMessage(error) }
        });
      });
    });

    const link: VoiceLink = { channelId, connection, player, idleTimer: null };
    this.links.set(guildId, link);
    this.store.logAction({
      kind: "voice_runtime",
      guildId,
      channelId,
      content: "voice_connected"
    });
    return link;
  }

  // A disconnect that does not start reconnecting within the grace period is final.
  private async recoverOrDrop(guildId: string, connection: VoiceConnection) {
    try {
      await Promise.race([
        entersState(connection, VoiceConnectionStatus.Signalling, RECONNECT_GRACE_MS),
        entersState(connection, VoiceConnectionStatus.Connecting, RECONNECT_GRACE_MS)
      ]);
    } catch {
      if (this.links.get(guildId)?.connection === connection) {
        this.disconnect(guildId, "connection_lost");
      }
    }
  }

  private clearIdleTimer(link: VoiceLink) {
    if (!link.idleTimer) return;
    clearTimeout(link.idleTimer);
    link.idleTimer = null;
  }

  private scheduleIdleDisconnect(guildId: string, link: VoiceLink) {
    this.clearIdleTimer(link);
    if (this.idleDisconnectMs <= 0) return;
    link.idleTimer = setTimeout(() => {
      link.idleTimer = null;
      if (this.keepConnected(guildId)) {
        this.scheduleIdleDisconnect(guildId, link);
        return;
      }
      this.disconnect(guildId, "idle");
    }, this.idleDisconnectMs);
    link.idleTimer.unref();
  }
}
