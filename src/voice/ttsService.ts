import type { ActionInput } from "../store.ts";
import { TTS_SPEED_MAX, TTS_SPEED_MIN, type TtsVoice } from "../settings/settingsSchema.ts";
import { clamp, errorMessage } from "../utils.ts";

export type SpeechCreateBody = {
  model: string;
  voice: TtsVoice;
  input: string;
  speed: number;
  response_format: "pcm";
};

/** The slice of `openai.audio.speech` the bot uses. */
export interface SpeechClient {
  create(body: SpeechCreateBody): PromiseLike<{ arrayBuffer(): Promise<ArrayBuffer> }>;
}

export type SpeechTrace = {
  guildId?: string | null;
  channelId?: string | null;
  source?: string;
};

export type SynthesizeInput = {
  text: string;
  voice?: TtsVoice;
  speed?: number;
  trace?: SpeechTrace;
};

export type TtsServiceOptions = {
  speechClient: SpeechClient | null;
  store: { logAction(action: ActionInput): unknown };
  model?: string;
  defaultVoice?: TtsVoice;
  defaultSpeed?: number;
};

export class TtsService {
  private readonly speechClient: SpeechClient | null;
  private readonly store: TtsServiceOptions["store"];
  readonly model: string;
  readonly defaultVoice: TtsVoice;
  readonly defaultSpeed: number;

  constructor({ speechClient, store, model = "gpt-4o-mini-tts", defaultVoice = "alloy", defaultSpeed = 1 }: TtsServiceOptions) {
    this.speechClient = speechClient;
    this.store = store;
    this.model = model.trim() || "gpt-4o-mini-tts";
    this.defaultVoice = defaultVoice;
    this.defaultSpeed = clamp(defaultSpeed, TTS_SPEED_MIN, TTS_SPEED_MAX);
  }

  isAvailable() {
    return this.speechClient !== null;
  }

  /** Returns 24 kHz mono 16-bit PCM. */
  async synthesize({ text, voice = this.defaultVoice, speed = this.defaultSpeed, trace = {} }: SynthesizeInput): Promise<Buffer> {
    if (!this.speechClient) {
      throw new Error("Speech synthesis requires OPENAI_API_KEY.");
    }
    const input = text.trim();
    if (!input) {
      throw new Error("Speech synthesis requires non-empty text.");
    }
    const resolvedSpeed = clamp(Number.isFinite(speed) ? speed : this.defaultSpeed, TTS_SPEED_MIN, TTS_SPEED_MAX);

    try {
      const response = await this.speechClient.create({
        model: this.model,
        voice,
        input,
        speed: resolvedSpeed,
        response_format: "pcm"
      });
      const audioBuffer = Buffer.from(await response.arrayBuffer());
      if (!audioBuffer.length) {
        throw new Error("Speech synthesis returned empty audio.");
      }

      this.store.logAction({
        kind: "tts_call",
        guildId: trace.guildId,
        channelId: trace.channelId,
        content: this.model,
        metadata: {
          model: this.model,
          voice,
          speed: resolvedSpeed,
          textChars: input.length,
          audioBytes: audioBuffer.length,
          source: trace.source ?? "unknown"
        }
      });
      return audioBuffer;
    } catch (error) {
      this.store.logAction({
        kind: "tts_error",
        guildId: trace.guildId,
        channelId: trace.channelId,
        content: errorMessage(error),
        metadata: { model: this.model, voice, source: trace.source ?? "unknown" }
      });
      throw error;
    }
  }
}
