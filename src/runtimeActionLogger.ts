import fs from "node:fs";
import path from "node:path";
import type { LoggedAction, Store } from "./store.ts";
import { isPlainRecord, nowIso } from "./utils.ts";

const MAX_STRING_LENGTH = 2_000;
const MAX_DEPTH = 6;
const MAX_ARRAY_LENGTH = 80;
const MAX_OBJECT_KEYS = 80;
const REDACTED_VALUE = "[REDACTED]";
const OMISSION_VALUE = "[OMITTED]";
const CIRCULAR_VALUE = "[CIRCULAR]";
const TRUNCATED_VALUE = "[TRUNCATED]";
const SENSITIVE_KEY_PATTERN = /(api[-_]?key|token|secret|authorization|password|cookie|bearer|private[-_]?key)/i;
// keys that match the pattern above but only carry counts or identifiers
const SAFE_KEY_PATTERN = /^(tokens|tokenCount|sessionId)$/;

// ── ANSI helpers ───────────────────────────────────────────────────────
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const WHITE = "\x1b[37m";
const BLACK = "\x1b[30m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_YELLOW = "\x1b[43m";
const BG_BLUE = "\x1b[44m";
const BG_MAGENTA = "\x1b[45m";
const BG_CYAN = "\x1b[46m";

export type RuntimeAgent = "timer" | "voice" | "config" | "control" | "bot" | "runtime";
export type RuntimeLevel = "error" | "warn" | "info";

const AGENT_STYLES: Record<RuntimeAgent, { bg: string; fg: string }> = {
  timer: { bg: BG_MAGENTA, fg: BLACK },
  voice: { bg: BG_CYAN, fg: BLACK },
  config: { bg: BG_YELLOW, fg: BLACK },
  control: { bg: BG_BLUE, fg: WHITE },
  bot: { bg: BG_GREEN, fg: BLACK },
  runtime: { bg: "\x1b[100m", fg: WHITE } // bright-black bg
};

export type SanitizedValue = string | number | boolean | null | SanitizedValue[] | { [key: string]: SanitizedValue };

export type RuntimeActionEvent = {
  ts: string;
  source: "store_action";
  level: RuntimeLevel;
  kind: string;
  event: string;
  agent: RuntimeAgent;
  guild_id: string | null;
  channel_id: string | null;
  user_id: string | null;
  content: string | null;
  metadata: SanitizedValue;
};

function formatAgentBadge(agent: RuntimeAgent) {
  const style = AGENT_STYLES[agent];
  const label = ` ${agent.padEnd(8)} `;
  return `${style.bg}${style.fg}${BOLD}${label}${RESET}`;
}

function formatMetadataInline(metadata: SanitizedValue) {
  if (!metadata || typeof metadata !== "object" || Array.isArray(metadata)) return "";
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null) continue;
    const text = typeof value === "object" ? JSON.stringify(value) : String(value);
    if (text.length > 80) continue; // skip bulky values
    parts.push(`${DIM}${key}${RESET}${DIM}=${RESET}${text}`);
  }
  return parts.length > 0 ? `  ${parts.join("  ")}` : "";
}

export function formatPrettyLine(payload: RuntimeActionEvent) {
  const time = payload.ts.slice(11, 19); // HH:MM:SS
  const timePart = `${DIM}${time}${RESET}`;
  const agentPart = formatAgentBadge(payload.agent);
  let eventPart = `${BOLD}${WHITE}${payload.event}${RESET}`;
  if (payload.level === "error") {
    eventPart = `${BG_RED}${WHITE}${BOLD} ${payload.event} ${RESET}`;
  } else if (payload.level === "warn") {
    eventPart = `${BG_YELLOW}${BLACK}${BOLD} ${payload.event} ${RESET}`;
  }
  const guildPart = payload.guild_id ? `  ${DIM}guild=${RESET}${payload.guild_id}` : "";
  return `${timePart} ${agentPart} ${eventPart}${guildPart}${formatMetadataInline(payload.metadata)}\n`;
}

function truncateString(value: unknown, maxLength = MAX_STRING_LENGTH) {
  const text = String(value ?? "");
  if (!text) return "";
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 1))}…`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isPlainRecord(value)) return false;
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

type SanitizeContext = {
  depth?: number;
  keyName?: string;
  seen?: WeakSet<object>;
};

export function sanitizeValue(value: unknown, { depth = 0, keyName = "", seen = new WeakSet() }: SanitizeContext = {}): SanitizedValue {
  if (keyName && SENSITIVE_KEY_PATTERN.test(keyName) && !SAFE_KEY_PATTERN.test(keyName)) {
    return REDACTED_VALUE;
  }

  if (value === null || value === undefined) return null;
  if (typeof value === "string") return truncateString(value);
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value;
  if (typeof value === "bigint") return String(value);
  if (typeof value === "function" || typeof value === "symbol") return null;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) {
    return {
      name: truncateString(value.name || "Error", 120),
      message: truncateString(value.message, 300)
    };
  }

  if (depth >= MAX_DEPTH) return OMISSION_VALUE;

  if (Array.isArray(value)) {
    const output: SanitizedValue[] = value
      .slice(0, MAX_ARRAY_LENGTH)
      .map((item: unknown) => sanitizeValue(item, { depth: depth + 1, seen }));
    if (value.length > MAX_ARRAY_LENGTH) output.push(TRUNCATED_VALUE);
    return output;
  }

  if (!isPlainObject(value)) return truncateString(value);
  if (seen.has(value)) return CIRCULAR_VALUE;
  seen.add(value);

  const output: { [key: string]: SanitizedValue } = {};
  const entries = Object.entries(value);
  for (const [entryKey, entryValue] of entries.slice(0, MAX_OBJECT_KEYS)) {
    output[entryKey] = sanitizeValue(entryValue, { depth: depth + 1, keyName: entryKey, seen });
  }
  if (entries.length > MAX_OBJECT_KEYS) {
    output._truncatedKeys = entries.length - MAX_OBJECT_KEYS;
  }
  seen.delete(value);
  return output;
}

function normalizeIdentifier(value: unknown, maxLength = 120) {
  const normalized = truncateString(value, maxLength).trim();
  return normalized || null;
}

export function levelForKind(kind: string): RuntimeLevel {
  const normalizedKind = kind.toLowerCase();
  if (normalizedKind.endsWith("_error")) return "error";
  if (normalizedKind.endsWith("_warning")) return "warn";
  return "info";
}

const AGENT_PREFIXES: readonly [string, RuntimeAgent][] = [
  ["timer_", "timer"],
  ["voice_", "voice"],
  ["tts_", "voice"],
  ["config_", "config"],
  ["control_", "control"],
  ["bot_", "bot"]
];

export function agentForKind(kind: string): RuntimeAgent {
  for (const [prefix, agent] of AGENT_PREFIXES) {
    if (kind.startsWith(prefix)) return agent;
  }
  return "runtime";
}

export function normalizeRuntimeActionEvent(action: Partial<LoggedAction>): RuntimeActionEvent {
  const kind = normalizeIdentifier(action.kind) || "bot_runtime";
  return {
    ts: normalizeIdentifier(action.createdAt, 40) || nowIso(),
    source: "store_action",
    level: levelForKind(kind),
    kind,
    event: normalizeIdentifier(action.content, 180) || kind,
    agent: agentForKind(kind),
    guild_id: normalizeIdentifier(action.guildId, 80),
    channel_id: normalizeIdentifier(action.channelId, 80),
    user_id: normalizeIdentifier(action.userId, 80),
    content: normalizeIdentifier(action.content, MAX_STRING_LENGTH),
    metadata: sanitizeValue(action.metadata, { keyName: "metadata" })
  };
}

function resolveLogFilePath(value: string) {
  const normalized = value.trim();
  if (!normalized) return "";
  return path.isAbsolute(normalized) ? normalized : path.resolve(process.cwd(), normalized);
}

export type RuntimeActionLoggerOptions = {
  enabled?: boolean;
  writeToStdout?: boolean;
  logFilePath?: string;
  writeLine?: ((line: string, payload: RuntimeActionEvent) => void) | null;
};

export class RuntimeActionLogger {
  readonly enabled: boolean;
  readonly writeToStdout: boolean;
  readonly logFilePath: string;
  private readonly writeLine: ((line: string, payload: RuntimeActionEvent) => void) | null;
  private fileStream: fs.WriteStream | null = null;

  constructor({ enabled = true, writeToStdout = true, logFilePath = "", writeLine = null }: RuntimeActionLoggerOptions = {}) {
    this.enabled = enabled;
    this.writeToStdout = writeToStdout;
    this.writeLine = writeLine;
    this.logFilePath = resolveLogFilePath(logFilePath);

    if (this.enabled && this.logFilePath) {
      fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });
      const stream = fs.createWriteStream(this.logFilePath, { flags: "a", encoding: "utf8" });
      stream.on("error", (error) => {
        process.stderr.write(`runtime action log file disabled: ${error.message}\n`);
        this.fileStream = null;
      });
      this.fileStream = stream;
    }
  }

  attachToStore(store: Pick<Store, "onActionLogged">) {
    const previousActionListener = store.onActionLogged;
    store.onActionLogged = (action) => {
      previousActionListener?.(action);
      this.logAction(action);
    };
  }

  logAction(action: Partial<LoggedAction>) {
    if (!this.enabled) return;
    const payload = normalizeRuntimeActionEvent(action);
    const line = `${JSON.stringify(payload)}\n`;

    this.writeLine?.(line, payload);
    if (this.writeToStdout) {
      process.stdout.write(formatPrettyLine(payload));
    }
    this.fileStream?.write(line);
  }

  close() {
    if (!this.fileStream) return;
    this.fileStream.end();
    this.fileStream = null;
  }
}
