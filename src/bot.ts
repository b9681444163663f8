import { Client, GatewayIntentBits, type Guild } from "discord.js";
import type { AppConfig } from "./config.ts";
import type { Store } from "./store.ts";
import { Announcer } from "./timers/announcer.ts";
import { GameTimerManager, type StartSessionResult } from "./timers/gameTimerManager.ts";
import type { GameSessionSnapshot } from "./timers/gameSession.ts";
import type { TimerConfigStore } from "./timers/timerConfigStore.ts";
import { TimerError } from "./timers/timerErrors.ts";
import { errorMessage } from "./utils.ts";
import { VoiceAnnouncementOutput } from "./voice/announcementOutput.ts";
import type { TtsService } from "./voice/ttsService.ts";
import { pickVoiceChannel, type VoiceChannelCandidate } from "./voice/voiceChannelResolver.ts";
import { DiscordVoicePlayer } from "./voice/voicePlayback.ts";

export type StartRequest = {
  time?: unknown;
  mode?: string;
  channelId?: string | null;
  userId?: string | null;
};

export type BotRuntimeState = {
  isReady: boolean;
  userTag: string | null;
  guildCount: number;
  voiceConnections: number;
  activeTimers: number;
  sessions: number;
};

/** What the control API needs from the bot. */
export interface TimerBotFacade {
  readonly manager: GameTimerManager;
  startSession(guildId: string, request: StartRequest): Promise<StartSessionResult>;
  stopSession(guildId: string): Promise<GameSessionSnapshot>;
  endSession(guildId: string): Promise<boolean>;
  getRuntimeState(): BotRuntimeState;
}

/** The parts of a guild the bot reads when picking and watching voice channels. */
export interface VoiceGuildView {
  voiceChannels(): VoiceChannelCandidate[];
  memberChannelId(userId: string): string | null;
  humansIn(channelId: string): number;
}

export type VoiceStateChange = {
  guildId: string;
  previousChannelId: string | null;
  channelId: string | null;
};

export function listVoiceCandidates(guild: Guild): VoiceChannelCandidate[] {
  const candidates: VoiceChannelCandidate[] = [];
  for (const channel of guild.channels.cache.values()) {
    if (!channel.isVoiceBased()) continue;
    candidates.push({
      id: channel.id,
      name: channel.name,
      humanCount: channel.members.filter((member) => !member.user.bot).size,
      joinable: channel.joinable
    });
  }
  return candidates;
}

export function discordGuildView(guild: Guild): VoiceGuildView {
  return {
    voiceChannels: () => listVoiceCandidates(guild),
    memberChannelId: (userId) => guild.voiceStates.cache.get(userId)?.channelId ?? null,
    humansIn(channelId) {
      const channel = guild.channels.cache.get(channelId);
      return channel?.isVoiceBased() ? channel.members.filter((member) => !member.user.bot).size : 0;
    }
  };
}

export type TimerBotOptions = {
  appConfig: AppConfig;
  store: Store;
  configStore: TimerConfigStore;
  tts: TtsService;
  // defaults to the client's guild cache
  resolveGuild?: (guildId: string) => VoiceGuildView | null;
};

export class TimerBot implements TimerBotFacade {
  readonly client: Client;
  readonly manager: GameTimerManager;
  readonly voicePlayer: DiscordVoicePlayer;
  private readonly appConfig: AppConfig;
  private readonly store: Store;
  private readonly resolveGuild: (guildId: string) => VoiceGuildView | null;

  constructor({ appConfig, store, configStore, tts, resolveGuild }: TimerBotOptions) {
    this.appConfig = appConfig;
    this.store = store;
    this.resolveGuild =
      resolveGuild ??
      ((guildId) => {
        const guild = this.client.guilds.cache.get(guildId);
        return guild ? discordGuildView(guild) : null;
      });

    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates]
    });
    this.voicePlayer = new DiscordVoicePlayer({
      resolveGuild: (guildId) => this.client.guilds.cache.get(guildId) ?? null,
      store,
      idleDisconnectMs: appConfig.voiceIdleDisconnectSeconds * 1000,
      keepConnected: (guildId) => this.manager.hasRunningSession(guildId)
    });
    const output = new VoiceAnnouncementOutput({ store, tts, player: this.voicePlayer });
    this.manager = new GameTimerManager({
      store,
      configStore,
      announcer: new Announcer(output),
      defaultMode: appConfig.defaultMode,
      messageSeed: appConfig.messageSeed,
      tickIntervalMs: appConfig.tickIntervalMs
    });

    this.registerEvents();
  }

  registerEvents() {
    this.client.on("ready", (client) => {
      this.store.logAction({
        kind: "bot_runtime",
        userId: client.user.id,
        content: "gateway_ready",
        metadata: { userTag: client.user.tag, guilds: client.guilds.cache.size }
      });
    });

    this.client.on("shardDisconnect", (event, shardId) => {
      this.store.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_shard_disconnect: shard=${shardId} code=${event.code}`
      });
    });

    this.client.on("error", (error) => {
      this.store.logAction({
        kind: "bot_error",
        userId: this.client.user?.id,
        content: `gateway_error: ${errorMessage(error)}`
      });
    });

    this.client.on("voiceStateUpdate", (oldState, newState) => {
      const change = { guildId: newState.guild.id, previousChannelId: oldState.channelId, channelId: newState.channelId };
      this.handleVoiceStateChange(change).catch((error: unknown) => {
        this.store.logAction({
          kind: "bot_error",
          guildId: newState.guild.id,
          content: `voice_state_update: ${errorMessage(error)}`
        });
      });
    });
  }

  async startSession(guildId: string, request: StartRequest) {
    const guild = this.resolveGuild(guildId);
    if (!guild) {
      throw new TimerError("guild_unavailable", `Guild ${guildId} is not available to the bot.`);
    }
    const requesterChannelId = request.userId ? guild.memberChannelId(request.userId) : null;
    const pick = pickVoiceChannel({
      explicitChannelId: request.channelId,
      requesterChannelId,
      channels: guild.voiceChannels()
    });
    if (!pick) {
      throw new TimerError("no_voice_channel", "No joinable voice channel with players in it was found.");
    }

    const result = await this.manager.start(guildId, {
      time: request.time,
      mode: request.mode,
      voiceChannelId: pick.channelId,
      userId: request.userId
    });
    this.store.logAction({
      kind: "voice_runtime",
      guildId,
      channelId: pick.channelId,
      content: "voice_channel_selected",
      metadata: { reason: pick.reason }
    });
    return result;
  }

  async stopSession(guildId: string) {
    const snapshot = await this.manager.stop(guildId);
    this.voicePlayer.disconnect(guildId, "session_stopped");
    return snapshot;
  }

  async endSession(guildId: string) {
    const ended = await this.manager.endSession(guildId);
    this.voicePlayer.disconnect(guildId, "session_ended");
    return ended;
  }

  // Stops the timer when the last human leaves its voice channel.
  async handleVoiceStateChange({ guildId, previousChannelId, channelId }: VoiceStateChange) {
    if (!this.appConfig.autoStopOnEmptyChannel) return;
    const sessionChannelId = this.manager.sessionChannelId(guildId);
    if (!sessionChannelId || previousChannelId !== sessionChannelId) return;
    if (channelId === sessionChannelId) return;
    if (!this.manager.hasRunningSession(guildId)) return;

    const humansLeft = this.resolveGuild(guildId)?.humansIn(sessionChannelId) ?? 0;
    if (humansLeft > 0) return;

    this.store.logAction({
      kind: "timer_runtime",
      guildId,
      channelId: sessionChannelId,
      content: "voice_channel_empty"
    });
    await this.stopSession(guildId);
  }

  async start() {
    await this.client.login(this.appConfig.discordToken);
    this.manager.startTicking();
  }

  async stop() {
    this.manager.dispose();
    this.voicePlayer.dispose();
    await this.client.destroy();
  }

  getRuntimeState(): BotRuntimeState {
    return {
      isReady: this.client.isReady(),
      userTag: this.client.user?.tag ?? null,
      guildCount: this.client.guilds.cache.size,
      voiceConnections: this.voicePlayer.connectedCount(),
      activeTimers: this.manager.countRunning(),
      sessions: this.manager.listSessions().length
    };
  }
}
