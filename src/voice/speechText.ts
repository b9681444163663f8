import type { GuildTtsSettings } from "../settings/settingsSchema.ts";

const UNITS = ["zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine"];
const TEENS = [
  "ten",
  "eleven",
  "twelve",
  "thirteen",
  "fourteen",
  "fifteen",
  "sixteen",
  "seventeen",
  "eighteen",
  "nineteen"
];
const TENS = ["", "", "twenty", "thirty", "forty", "fifty", "sixty", "seventy", "eighty", "ninety"];

// standalone integers only; clock readings such as 4:05 are left alone
const STANDALONE_NUMBER_PATTERN = /(?<![\d:.])\d+(?![\d:]|\.\d)/g;
const MAX_SPEECH_CHARS = 4000;

/** Spells out 0–99; larger values come back as digits. */
export function numberToWords(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value >= 100) return String(value);
  if (value < 10) return UNITS[value];
  if (value < 20) return TEENS[value - 10];
  const unit = value % 10;
  const ten = Math.floor(value / 10);
  return unit ? `${TENS[ten]}-${UNITS[unit]}` : TENS[ten];
}

export function spellOutNumbers(text: string) {
  return text.replace(STANDALONE_NUMBER_PATTERN, (match) => numberToWords(Number(match)));
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function applyPronunciations(text: string, pronunciations: Readonly<Record<string, string>>) {
  let output = text;
  for (const [word, spoken] of Object.entries(pronunciations)) {
    if (!word) continue;
    output = output.replace(new RegExp(`\\b${escapeRegExp(word)}\\b`, "gi"), spoken);
  }
  return output;
}

export function prepareSpeechText(text: string, tts: Pick<GuildTtsSettings, "numberToWords" | "pronunciations">) {
  let output = text.replace(/\s+/g, " ").trim();
  if (tts.numberToWords) output = spellOutNumbers(output);
  output = applyPronunciations(output, tts.pronunciations);
  return output.slice(0, MAX_SPEECH_CHARS);
}
