import {
  MAX_PRONUNCIATIONS,
  TTS_SPEED_MAX,
  TTS_SPEED_MIN,
  createDefaultGuildSettings,
  isTtsVoice,
  type GuildSettings,
  type GuildTtsSettings
} from "../settings/settingsSchema.ts";
import { TIMER_CATEGORIES, createDefaultCategorySettings, type CategorySettings } from "../timers/timerTypes.ts";
import { clamp, isPlainRecord } from "../utils.ts";

function normalizeUnitInterval(value: unknown, fallback: number) {
  const parsed = Number(value);
  if (value === null || value === undefined || !Number.isFinite(parsed)) return fallback;
  return clamp(parsed, 0, 1);
}

function normalizeCategories(raw: unknown): CategorySettings {
  const categories = createDefaultCategorySettings();
  if (!isPlainRecord(raw)) return categories;
  for (const category of TIMER_CATEGORIES) {
    const entry = raw[category];
    if (!isPlainRecord(entry)) continue;
    categories[category] = {
      muted: entry.muted === true,
      volume: normalizeUnitInterval(entry.volume, categories[category].volume)
    };
  }
  return categories;
}

function normalizePronunciations(raw: unknown): Record<string, string> {
  const output: Record<string, string> = {};
  if (!isPlainRecord(raw)) return output;
  let count = 0;
  for (const [word, spoken] of Object.entries(raw)) {
    if (count >= MAX_PRONUNCIATIONS) break;
    const key = word.trim().toLowerCase().slice(0, 40);
    const value = typeof spoken === "string" ? spoken.trim().slice(0, 80) : "";
    if (!key || !value) continue;
    output[key] = value;
    count += 1;
  }
  return output;
}

function normalizeTts(raw: unknown, defaults: GuildTtsSettings): GuildTtsSettings {
  if (!isPlainRecord(raw)) return { ...defaults, pronunciations: {} };
  const speed = Number(raw.speed);
  return {
    voice: isTtsVoice(raw.voice) ? raw.voice : defaults.voice,
    speed: Number.isFinite(speed) && raw.speed !== null ? clamp(speed, TTS_SPEED_MIN, TTS_SPEED_MAX) : defaults.speed,
    numberToWords: typeof raw.numberToWords === "boolean" ? raw.numberToWords : defaults.numberToWords,
    pronunciations: normalizePronunciations(raw.pronunciations)
  };
}

export function normalizeGuildSettings(raw: unknown): GuildSettings {
  const defaults = createDefaultGuildSettings();
  if (!isPlainRecord(raw)) return defaults;
  return {
    masterVolume: normalizeUnitInterval(raw.masterVolume, defaults.masterVolume),
    categories: normalizeCategories(raw.categories),
    tts: normalizeTts(raw.tts, defaults.tts)
  };
}
