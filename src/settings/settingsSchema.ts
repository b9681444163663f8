import { createDefaultCategorySettings, type CategorySettings } from "../timers/timerTypes.ts";

export const TTS_VOICES = ["alloy", "ash", "coral", "echo", "fable", "onyx", "nova", "sage", "shimmer"] as const;
export type TtsVoice = (typeof TTS_VOICES)[number];

export const TTS_SPEED_MIN = 0.25;
export const TTS_SPEED_MAX = 4;
export const MAX_PRONUNCIATIONS = 64;

export type GuildTtsSettings = {
  voice: TtsVoice;
  speed: number;
  numberToWords: boolean;
  // word → replacement spoken instead
  pronunciations: Record<string, string>;
};

export type GuildSettings = {
  masterVolume: number;
  categories: CategorySettings;
  tts: GuildTtsSettings;
};

export function createDefaultGuildSettings(): GuildSettings {
  return {
    masterVolume: 1,
    categories: createDefaultCategorySettings(),
    tts: {
      voice: "alloy",
      speed: 1,
      numberToWords: true,
      pronunciations: {}
    }
  };
}

export function isTtsVoice(value: unknown): value is TtsVoice {
  return typeof value === "string" && TTS_VOICES.some((voice) => voice === value);
}
