import { z } from "zod";
import { humanizeIdentifier, isPlainRecord } from "../utils.ts";
import { TIMER_CATEGORIES, type TimerEntry } from "./timerTypes.ts";

const ENTRY_NAME_PATTERN = /^[a-z0-9_]{1,64}$/;
const MAX_MESSAGE_LENGTH = 300;

const MessageSchema = z.string().trim().min(1, "message must not be empty").max(MAX_MESSAGE_LENGTH);
const NonNegativeInt = z.number().int().min(0);
const PositiveInt = z.number().int().min(1);

export const TimerEntryNameSchema = z
  .string()
  .regex(ENTRY_NAME_PATTERN, "Expected pattern ^[a-z0-9_]{1,64}$");

// Older timer files stored a single `message` string.
function upgradeLegacyMessage(raw: unknown) {
  if (!isPlainRecord(raw)) return raw;
  if (raw.messages !== undefined || typeof raw.message !== "string") return raw;
  const { message, ...rest } = raw;
  return { ...rest, messages: [message] };
}

export const TimerEntryFileSchema = z.preprocess(
  upgradeLegacyMessage,
  z
    .object({
      time: NonNegativeInt,
      messages: z.array(MessageSchema).min(1, "at least one message is required"),
      category: z.enum(TIMER_CATEGORIES),
      label: z.string().trim().min(1).max(60).optional(),
      respawn_time: PositiveInt.optional(),
      respawn_window: NonNegativeInt.optional(),
      buff_duration: PositiveInt.optional(),
      respawn_messages: z.array(MessageSchema).min(1).optional()
    })
    .superRefine((entry, ctx) => {
      if (entry.respawn_window !== undefined && entry.respawn_time === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "respawn_window requires respawn_time",
          path: ["respawn_window"]
        });
      }
      if (
        entry.respawn_window !== undefined &&
        entry.respawn_time !== undefined &&
        entry.respawn_window >= entry.respawn_time
      ) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "respawn_window must be smaller than respawn_time",
          path: ["respawn_window"]
        });
      }
    })
);

export type TimerEntryFile = z.infer<typeof TimerEntryFileSchema>;

export function formatZodIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const jsonPath = issue.path.length ? `$.${issue.path.map((part) => String(part)).join(".")}` : "$";
    return `${jsonPath}: ${issue.message}`;
  });
}

export function defaultEntryLabel(name: string) {
  return humanizeIdentifier(name.replace(/_(spawn|respawn)$/, ""));
}

export function toTimerEntry(name: string, parsed: TimerEntryFile): TimerEntry {
  return {
    name,
    label: parsed.label ?? defaultEntryLabel(name),
    offset: parsed.time,
    messages: parsed.messages,
    category: parsed.category,
    respawnTime: parsed.respawn_time ?? null,
    respawnWindow: parsed.respawn_window ?? 0,
    buffDuration: parsed.buff_duration ?? null,
    respawnMessages: parsed.respawn_messages ?? [],
    source: "static",
    objective: null
  };
}

export function toTimerEntryFile(entry: TimerEntry): TimerEntryFile {
  const file: TimerEntryFile = {
    time: entry.offset,
    messages: [...entry.messages],
    category: entry.category
  };
  if (entry.label !== defaultEntryLabel(entry.name)) file.label = entry.label;
  if (entry.respawnTime !== null) file.respawn_time = entry.respawnTime;
  if (entry.respawnTime !== null && entry.respawnWindow > 0) file.respawn_window = entry.respawnWindow;
  if (entry.buffDuration !== null) file.buff_duration = entry.buffDuration;
  if (entry.respawnMessages.length) file.respawn_messages = [...entry.respawnMessages];
  return file;
}
