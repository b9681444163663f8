import dotenv from "dotenv";
import { parseBooleanFlag, parseBoundedInt, parseNumberOrFallback } from "./normalization/valueParsers.ts";
import { TTS_SPEED_MAX, TTS_SPEED_MIN, isTtsVoice, type TtsVoice } from "./settings/settingsSchema.ts";
import { isGameMode, type GameMode } from "./timers/timerTypes.ts";
import { clamp } from "./utils.ts";

dotenv.config();

type Env = Record<string, string | undefined>;

export function loadAppConfig(env: Env = process.env) {
  return {
    discordToken: env.DISCORD_TOKEN ?? "",
    openaiApiKey: env.OPENAI_API_KEY ?? "",
    controlHost: normalizeControlHost(env.CONTROL_HOST),
    controlPort: parseBoundedInt(env.CONTROL_PORT, 8081, 0, 65_535),
    controlToken: env.CONTROL_TOKEN ?? "",
    timerConfigDir: env.TIMER_CONFIG_DIR?.trim() || "config/timers",
    guildSettingsPath: env.GUILD_SETTINGS_PATH?.trim() || "data/guild-settings.json",
    defaultMode: normalizeDefaultMode(env.DEFAULT_MODE),
    tickIntervalMs: parseBoundedInt(env.TICK_INTERVAL_MS, 1000, 100, 10_000),
    messageSeed: env.MESSAGE_SEED?.trim() || "lane-guardian",
    ttsModel: env.TTS_MODEL?.trim() || "gpt-4o-mini-tts",
    ttsVoice: normalizeTtsVoice(env.TTS_VOICE),
    ttsSpeed: clamp(parseNumberOrFallback(env.TTS_SPEED, 1), TTS_SPEED_MIN, TTS_SPEED_MAX),
    autoStopOnEmptyChannel: parseBooleanFlag(env.AUTO_STOP_ON_EMPTY_CHANNEL, true),
    voiceIdleDisconnectSeconds: parseBoundedInt(env.VOICE_IDLE_DISCONNECT_SECONDS, 300, 0, 86_400),
    runtimeStructuredLogsEnabled: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_ENABLED, true),
    runtimeStructuredLogsStdout: parseBooleanFlag(env.RUNTIME_STRUCTURED_LOGS_STDOUT, true),
    runtimeStructuredLogsFilePath: env.RUNTIME_STRUCTURED_LOGS_FILE_PATH ?? "data/logs/runtime-actions.ndjson"
  };
}

export type AppConfig = ReturnType<typeof loadAppConfig>;

export const appConfig: AppConfig = loadAppConfig();

export function ensureRuntimeEnv(config: AppConfig = appConfig) {
  if (!config.discordToken) {
    throw new Error("Missing DISCORD_TOKEN in environment.");
  }
  if (!config.openaiApiKey) {
    throw new Error("Missing OPENAI_API_KEY in environment.");
  }
}

export function normalizeControlHost(value: string | undefined) {
  const normalized = String(value || "").trim();
  return normalized || "127.0.0.1";
}

function normalizeDefaultMode(value: string | undefined): GameMode {
  const normalized = String(value || "").trim().toLowerCase();
  return isGameMode(normalized) ? normalized : "ranked";
}

function normalizeTtsVoice(value: string | undefined): TtsVoice {
  const normalized = String(value || "").trim().toLowerCase();
  return isTtsVoice(normalized) ? normalized : "alloy";
}
