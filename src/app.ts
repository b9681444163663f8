import path from "node:path";
import { fileURLToPath } from "node:url";
import OpenAI from "openai";
import { appConfig, ensureRuntimeEnv, type AppConfig } from "./config.ts";
import { createControlServer } from "./controlServer.ts";
import { TimerBot } from "./bot.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";
import { Store } from "./store.ts";
import { TimerConfigStore } from "./timers/timerConfigStore.ts";
import { errorMessage } from "./utils.ts";
import { TtsService } from "./voice/ttsService.ts";

export async function main(config: AppConfig = appConfig) {
  ensureRuntimeEnv(config);

  const store = new Store({ settingsPath: path.resolve(process.cwd(), config.guildSettingsPath) });
  const runtimeLogger = new RuntimeActionLogger({
    enabled: config.runtimeStructuredLogsEnabled,
    writeToStdout: config.runtimeStructuredLogsStdout,
    logFilePath: config.runtimeStructuredLogsFilePath
  });
  runtimeLogger.attachToStore(store);
  await store.init();

  const configStore = new TimerConfigStore({
    configDir: path.resolve(process.cwd(), config.timerConfigDir),
    store
  });
  await configStore.loadAll();

  const openai = new OpenAI({ apiKey: config.openaiApiKey });
  const tts = new TtsService({
    speechClient: openai.audio.speech,
    store,
    model: config.ttsModel,
    defaultVoice: config.ttsVoice,
    defaultSpeed: config.ttsSpeed
  });

  const bot = new TimerBot({ appConfig: config, store, configStore, tts });
  const control = createControlServer({ appConfig: config, store, bot });

  await bot.start();

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;

    console.log(`Shutting down (${signal})...`);

    try {
      await bot.stop();
    } catch (error) {
      console.error("Bot shutdown failed:", errorMessage(error));
    }

    await new Promise<void>((resolve) => control.server.close(() => resolve()));
    await store.flush();
    runtimeLogger.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

export function isDirectExecution(argv: readonly string[] = process.argv) {
  const entry = argv[1];
  if (!entry) return false;
  return path.resolve(entry) === fileURLToPath(import.meta.url);
}

export async function runCli() {
  try {
    await main();
  } catch (error) {
    console.error("Fatal startup error:", error);
    process.exit(1);
  }
}

if (isDirectExecution()) {
  void runCli();
}
