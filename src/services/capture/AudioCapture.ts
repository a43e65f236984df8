import type { AmplitudeSample, AudioBuffer } from '../../types';

/**
 * Exclusive owner of the input device. One `start` pairs with at most one
 * `stop` (which hands the finished buffer over) or `abort`.
 *
 * `level` events arrive at a fixed cadence while capturing. `fault` reports a
 * device failure after `start` resolved; the capture has already been torn
 * down and its audio discarded when it fires.
 */
export interface AudioCapture {
  on(event: 'level', listener: (sample: AmplitudeSample) => void): this;
  on(event: 'fault', listener: (error: Error) => void): this;
  off(event: 'level', listener: (sample: AmplitudeSample) => void): this;
  off(event: 'fault', listener: (error: Error) => void): this;
  isCapturing(): boolean;
  start(): Promise<void>;
  stop(): Promise<AudioBuffer>;
  abort(): Promise<void>;
}
