import fs from "node:fs/promises";
import os from "node:os";
import type { Server } from "node:http";
import path from "node:path";
import type { BotRuntimeState, StartRequest, TimerBotFacade } from "./bot.ts";
import { createControlServer } from "./controlServer.ts";
import { Store } from "./store.ts";
import { Announcer, type AnnouncementOutput, type AnnouncementRequest } from "./timers/announcer.ts";
import { GameTimerManager } from "./timers/gameTimerManager.ts";
import { TimerConfigStore } from "./timers/timerConfigStore.ts";
import type { TimerEntry } from "./timers/timerTypes.ts";

export function createTestEntry(overrides: Partial<TimerEntry> & Pick<TimerEntry, "name" | "offset">): TimerEntry {
  return {
    label: overrides.name,
    messages: [`${overrides.name} message`],
    category: "reminder",
    respawnTime: null,
    respawnWindow: 0,
    buffDuration: null,
    respawnMessages: [],
    source: "static",
    objective: null,
    ...overrides
  };
}

export class RecordingOutput implements AnnouncementOutput {
  readonly requests: AnnouncementRequest[] = [];

  dispatch(request: AnnouncementRequest) {
    this.requests.push(request);
  }

  entryNames() {
    return this.requests.map((request) => request.entryName);
  }
}

export async function withTempDir<T>(prefix: string, run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  try {
    return await run(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

export async function writeModeFile(dir: string, mode: string, document: unknown) {
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(path.join(dir, `${mode}.json`), `${JSON.stringify(document, null, 2)}\n`, "utf8");
}

export function isListenPermissionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? String(error.code).toUpperCase() : "";
  return (
    code === "EPERM" ||
    code === "EACCES" ||
    (code === "EADDRINUSE" && /port\s+0\s+in\s+use/i.test(error.message)) ||
    /listen\s+EPERM|listen\s+EACCES/i.test(error.message)
  );
}

/** Routes the facade to a real manager; voice selection is replaced by the request's channel. */
export class FakeTimerBot implements TimerBotFacade {
  readonly startRequests: StartRequest[] = [];

  constructor(readonly manager: GameTimerManager) {}

  startSession(guildId: string, request: StartRequest) {
    this.startRequests.push(request);
    return this.manager.start(guildId, {
      time: request.time,
      mode: request.mode,
      voiceChannelId: request.channelId ?? "voice-1",
      userId: request.userId
    });
  }

  stopSession(guildId: string) {
    return this.manager.stop(guildId);
  }

  endSession(guildId: string) {
    return this.manager.endSession(guildId);
  }

  getRuntimeState(): BotRuntimeState {
    return {
      isReady: true,
      userTag: "timer-bot#0001",
      guildCount: 1,
      voiceConnections: 0,
      activeTimers: this.manager.countRunning(),
      sessions: this.manager.listSessions().length
    };
  }
}

export type TestControlServerContext = {
  baseUrl: string;
  store: Store;
  manager: GameTimerManager;
  output: RecordingOutput;
  bot: FakeTimerBot;
  configDir: string;
};

type TestControlServerOptions = {
  controlToken?: string;
  modes?: Record<string, unknown>;
};

export async function withControlServer(
  { controlToken = "", modes = {} }: TestControlServerOptions,
  run: (context: TestControlServerContext) => Promise<void>
): Promise<{ skipped: boolean; reason?: string }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "timer-control-"));
  const configDir = path.join(dir, "timers");
  let server: Server | null = null;
  try {
    for (const [mode, document] of Object.entries(modes)) {
      await writeModeFile(configDir, mode, document);
    }
    const store = new Store({ settingsPath: path.join(dir, "guild-settings.json") });
    await store.init();
    const configStore = new TimerConfigStore({ configDir, store });
    await configStore.loadAll();
    const output = new RecordingOutput();
    const manager = new GameTimerManager({ store, configStore, announcer: new Announcer(output) });
    const bot = new FakeTimerBot(manager);

    const control = createControlServer({
      appConfig: { controlHost: "127.0.0.1", controlPort: 0, controlToken },
      store,
      bot
    });
    server = control.server;
    await waitForListening(control.server);

    const address = control.server.address();
    const port = typeof address === "object" && address ? address.port : 0;
    if (!Number.isInteger(port) || port <= 0) {
      throw new Error("control test server did not provide a valid port");
    }

    try {
      await run({ baseUrl: `http://127.0.0.1:${port}`, store, manager, output, bot, configDir });
    } finally {
      manager.dispose();
      await store.flush();
    }
  } catch (error) {
    if (isListenPermissionError(error)) {
      return { skipped: true, reason: "listen_permission_denied" };
    }
    throw error;
  } finally {
    if (server?.listening) {
      const listening = server;
      await new Promise<void>((resolve) => {
        listening.close(() => resolve());
      });
    }
    await fs.rm(dir, { recursive: true, force: true });
  }
  return { skipped: false };
}

function waitForListening(server: Server) {
  if (server.listening) return Promise.resolve();
  return new Promise<void>((resolve, reject) => {
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    server.once("listening", onListening);
    server.once("error", onError);
  });
}
