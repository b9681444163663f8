export const DISCORD_SAMPLE_RATE = 48000;
export const TTS_SAMPLE_RATE = 24000;

function clamp16(value: number) {
  return Math.max(-32768, Math.min(32767, value));
}

function toAlignedInt16Samples(input: Buffer | Uint8Array) {
  const source = Buffer.isBuffer(input) ? input : Buffer.from(input);
  const evenByteLength = source.length - (source.length % 2);
  if (evenByteLength <= 0) {
    return new Int16Array(0);
  }

  const view = source.subarray(0, evenByteLength);
  if (view.byteOffset % 2 === 0) {
    return new Int16Array(view.buffer, view.byteOffset, evenByteLength / 2);
  }

  const aligned = Buffer.from(view);
  return new Int16Array(aligned.buffer, aligned.byteOffset, aligned.length / 2);
}

function int16ArrayToBuffer(samples: Int16Array) {
  if (!samples.length) return Buffer.alloc(0);
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
}

/** Linear-interpolation resampler for 16-bit little-endian mono PCM. */
export function resampleMono16(input: Buffer | Uint8Array, inputSampleRate: number, outputSampleRate: number) {
  if (inputSampleRate <= 0 || outputSampleRate <= 0) return Buffer.alloc(0);

  const inputSamples = toAlignedInt16Samples(input);
  if (inputSamples.length <= 0) return Buffer.alloc(0);
  if (inputSampleRate === outputSampleRate) return int16ArrayToBuffer(inputSamples);
  if (inputSamples.length <= 1) return Buffer.alloc(0);

  const ratio = inputSampleRate / outputSampleRate;
  const outputSampleCount = Math.max(1, Math.floor(inputSamples.length / ratio));
  const outputSamples = new Int16Array(outputSampleCount);

  for (let index = 0; index < outputSampleCount; index += 1) {
    const sourcePosition = index * ratio;
    const sourceIndex = Math.floor(sourcePosition);
    const nextIndex = Math.min(sourceIndex + 1, inputSamples.length - 1);
    const fraction = sourcePosition - sourceIndex;

    const first = inputSamples[sourceIndex];
    const second = inputSamples[nextIndex];
    outputSamples[index] = clamp16(Math.round(first + fraction * (second - first)));
  }

  return int16ArrayToBuffer(outputSamples);
}

export function mono16ToStereo16(input: Buffer | Uint8Array) {
  const inputSamples = toAlignedInt16Samples(input);
  const sampleCount = inputSamples.length;
  if (sampleCount <= 0) return Buffer.alloc(0);

  const outputSamples = new Int16Array(sampleCount * 2);
  for (let index = 0; index < sampleCount; index += 1) {
    const sample = inputSamples[index];
    outputSamples[index * 2] = sample;
    outputSamples[index * 2 + 1] = sample;
  }

  return int16ArrayToBuffer(outputSamples);
}

// Speech API pcm output is 24 kHz mono; Discord raw playback wants 48 kHz stereo.
export function convertTtsPcmToDiscordPcm(ttsPcm: Buffer | Uint8Array, inputSampleRate = TTS_SAMPLE_RATE) {
  const mono48k = resampleMono16(ttsPcm, inputSampleRate, DISCORD_SAMPLE_RATE);
  if (!mono48k.length) return Buffer.alloc(0);
  return mono16ToStereo16(mono48k);
}
