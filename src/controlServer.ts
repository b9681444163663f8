import express from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { TimerBotFacade } from "./bot.ts";
import type { AppConfig } from "./config.ts";
import { normalizeControlHost } from "./config.ts";
import { parseBoundedInt } from "./normalization/valueParsers.ts";
import {
  MAX_PRONUNCIATIONS,
  TTS_SPEED_MAX,
  TTS_SPEED_MIN,
  TTS_VOICES
} from "./settings/settingsSchema.ts";
import type { Store } from "./store.ts";
import { isTimerError, type TimerErrorCode } from "./timers/timerErrors.ts";
import { formatZodIssues } from "./timers/timerSchema.ts";
import { errorMessage } from "./utils.ts";

const CONTROL_JSON_LIMIT = "256kb";
const NOT_FOUND_CODES: ReadonlySet<TimerErrorCode> = new Set(["session_not_found", "unknown_timer"]);

const GUILD_PATH_RE = /^\/api\/(?:sessions|guilds)\/([^/?]+)/;

const ClockValueSchema = z.union([z.string(), z.number()]);

const StartBodySchema = z.object({
  time: ClockValueSchema.optional(),
  mode: z.string().optional(),
  channelId: z.string().nullable().optional(),
  userId: z.string().nullable().optional()
});

const KillBodySchema = z.object({
  objective: z.string().trim().min(1),
  at: ClockValueSchema.nullable().optional()
});

const CategoryBodySchema = z.object({
  muted: z.boolean().optional(),
  volume: z.number().nullable().optional()
});

const SayBodySchema = z.object({
  text: z.string().trim().min(1).max(500),
  userId: z.string().nullable().optional()
});

const GuildSettingsBodySchema = z
  .object({
    masterVolume: z.number().min(0).max(1).optional(),
    tts: z
      .object({
        voice: z.enum(TTS_VOICES).optional(),
        speed: z.number().min(TTS_SPEED_MIN).max(TTS_SPEED_MAX).optional(),
        numberToWords: z.boolean().optional(),
        pronunciations: z
          .record(z.string().trim().min(1), z.string().trim().min(1))
          .refine((value) => Object.keys(value).length <= MAX_PRONUNCIATIONS, {
            message: `At most ${MAX_PRONUNCIATIONS} pronunciations.`
          })
          .optional()
      })
      .strict()
      .optional()
  })
  .strict();

class RequestValidationError extends Error {
  constructor(readonly details: string[]) {
    super("Request body is invalid.");
    this.name = "RequestValidationError";
  }
}

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestValidationError(formatZodIssues(parsed.error.issues));
  }
  return parsed.data;
}

function guildIdFromPath(url: string) {
  const match = GUILD_PATH_RE.exec(url);
  return match?.[1] ? decodeURIComponent(match[1]) : null;
}

export type ControlServerOptions = {
  appConfig: Pick<AppConfig, "controlHost" | "controlPort" | "controlToken">;
  store: Pick<Store, "logAction" | "getRecentActions" | "getStats" | "getGuildSettings" | "patchGuildSettings">;
  bot: TimerBotFacade;
};

export function createControlServer({ appConfig, store, bot }: ControlServerOptions) {
  const app = express();
  const { manager } = bot;

  app.use(express.json({ limit: CONTROL_JSON_LIMIT }));

  app.use("/api", (req, res, next) => {
    const controlToken = appConfig.controlToken.trim();
    if (!controlToken) return next();
    if (req.get("x-control-token") === controlToken) return next();
    return res.status(401).json({ error: "unauthorized", message: "Provide x-control-token." });
  });

  app.use("/api", (req, res, next) => {
    if (req.method === "GET") return next();
    res.on("finish", () => {
      store.logAction({
        kind: "control_request",
        guildId: guildIdFromPath(req.originalUrl),
        content: `${req.method} ${req.originalUrl}`,
        metadata: { status: res.statusCode }
      });
    });
    return next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      uptimeSeconds: Math.floor(process.uptime()),
      runtime: bot.getRuntimeState(),
      stats: store.getStats()
    });
  });

  app.get("/api/sessions", (_req, res) => {
    res.json({ sessions: manager.listSessions() });
  });

  app.get("/api/sessions/:guildId", (req, res, next) => {
    try {
      res.json(manager.getSession(req.params.guildId));
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:guildId/start", async (req, res, next) => {
    try {
      const body = parseBody(StartBodySchema, req.body);
      const result = await bot.startSession(req.params.guildId, body);
      res.status(result.replaced ? 200 : 201).json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:guildId/stop", async (req, res, next) => {
    try {
      res.json(await bot.stopSession(req.params.guildId));
    } catch (error) {
      next(error);
    }
  });

  app.delete("/api/sessions/:guildId", async (req, res, next) => {
    try {
      const ended = await bot.endSession(req.params.guildId);
      res.json({ ended });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:guildId/kills", async (req, res, next) => {
    try {
      const body = parseBody(KillBodySchema, req.body);
      const result = await manager.recordKill(req.params.guildId, body.objective, body.at);
      res.status(201).json({
        objective: result.prediction.objective,
        killTime: result.prediction.killTime,
        respawnAt: result.prediction.respawnAt,
        scheduled: result.prediction.pending.map((entry) => ({ name: entry.name, offset: entry.offset })),
        superseded: result.superseded !== null
      });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/sessions/:guildId/say", async (req, res, next) => {
    try {
      const body = parseBody(SayBodySchema, req.body);
      const request = await manager.say(req.params.guildId, body.text, body.userId);
      res.status(202).json({ text: request.text, voiceChannelId: request.voiceChannelId, volume: request.volume });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/guilds/:guildId/settings", (req, res) => {
    res.json(store.getGuildSettings(req.params.guildId));
  });

  // volume changes apply from the next session start; speech settings from the next callout
  app.put("/api/guilds/:guildId/settings", async (req, res, next) => {
    try {
      const body = parseBody(GuildSettingsBodySchema, req.body);
      const settings = await store.patchGuildSettings(req.params.guildId, body);
      store.logAction({
        kind: "config_runtime",
        guildId: req.params.guildId,
        content: "guild_settings_updated",
        metadata: { fields: Object.keys(body) }
      });
      res.json(settings);
    } catch (error) {
      next(error);
    }
  });

  app.put("/api/sessions/:guildId/categories/:category", async (req, res, next) => {
    try {
      const body = parseBody(CategoryBodySchema, req.body);
      const state = await manager.setCategoryState(req.params.guildId, req.params.category, body);
      res.json({ category: req.params.category, ...state });
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/modes/:mode/timers", (req, res, next) => {
    try {
      const category = typeof req.query.category === "string" ? req.query.category.trim() : "";
      res.json({
        mode: req.params.mode,
        timers: manager.listTimers(req.params.mode, category || undefined)
      });
    } catch (error) {
      next(error);
    }
  });

  app.put("/api/modes/:mode/timers/:name", async (req, res, next) => {
    try {
      const entry = await manager.upsertTimer(req.params.mode, req.params.name, req.body);
      res.json({ mode: req.params.mode, timer: entry });
    } catch (error) {
      next(error);
    }
  });

  app.delete("/api/modes/:mode/timers/:name", async (req, res, next) => {
    try {
      await manager.removeTimer(req.params.mode, req.params.name);
      res.json({ mode: req.params.mode, removed: req.params.name });
    } catch (error) {
      next(error);
    }
  });

  app.post("/api/modes/:mode/reload", async (req, res, next) => {
    try {
      res.json(await manager.reloadMode(req.params.mode));
    } catch (error) {
      next(error);
    }
  });

  app.get("/api/actions", (req, res) => {
    const limit = parseBoundedInt(req.query.limit, 200, 1, 1000);
    const kind = typeof req.query.kind === "string" && req.query.kind.trim() ? req.query.kind.trim() : undefined;
    res.json(store.getRecentActions(limit, kind));
  });

  app.use("/api", (_req, res) => {
    res.status(404).json({ error: "not_found" });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "invalid_json", message: error.message, details: [] });
      return;
    }
    if (error instanceof RequestValidationError) {
      res.status(400).json({ error: "invalid_request", message: error.message, details: error.details });
      return;
    }
    if (isTimerError(error)) {
      res
        .status(NOT_FOUND_CODES.has(error.code) ? 404 : 400)
        .json({ error: error.code, message: error.message, details: error.details });
      return;
    }
    store.logAction({
      kind: "control_error",
      content: `${req.method} ${req.originalUrl}: ${errorMessage(error)}`
    });
    res.status(500).json({ error: "internal_error", message: errorMessage(error) });
  });

  const controlHost = normalizeControlHost(appConfig.controlHost);
  const server = app.listen(appConfig.controlPort, controlHost, () => {
    console.log(`Control API listening on http://${controlHost}:${appConfig.controlPort}`);
  });

  return { app, server };
}
