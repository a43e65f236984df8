import type { AmplitudeSample, AudioBuffer } from '../../types';

const BYTES_PER_SAMPLE = 2; // s16le

export const peakOf = (pcm: Buffer): number => {
  let peak = 0;
  for (let index = 0; index + 1 < pcm.length; index += BYTES_PER_SAMPLE) {
    const sample = Math.abs(pcm.readInt16LE(index));
    if (sample > peak) {
      peak = sample;
    }
  }

  return peak;
};

export const measureLevel = (pcm: Buffer, at: number): AmplitudeSample => {
  let sumSquares = 0;
  let sampleCount = 0;
  let peak = 0;

  for (let index = 0; index + 1 < pcm.length; index += BYTES_PER_SAMPLE) {
    const value = pcm.readInt16LE(index);
    sumSquares += value * value;
    sampleCount += 1;
    peak = Math.max(peak, Math.abs(value));
  }

  if (sampleCount === 0) {
    return { rms: 0, peak: 0, at };
  }

  return {
    rms: Math.min(1, Math.sqrt(sumSquares / sampleCount) / 32768),
    peak: Math.min(1, peak / 32768),
    at
  };
};

export const durationOf = (byteLength: number, sampleRate: number, channels: number): number =>
  (Math.floor(byteLength / (BYTES_PER_SAMPLE * channels)) / sampleRate) * 1000;

/** Freezes captured PCM into the buffer handed to a processing job. */
export const createAudioBuffer = (pcm: Buffer, sampleRate: number, channels: number): AudioBuffer =>
  Object.freeze({
    pcm,
    sampleRate,
    channels,
    durationMs: durationOf(pcm.length, sampleRate, channels),
    peakAmplitude: peakOf(pcm)
  });
