import path from 'node:path';
import { ModelLoadError, TranscriptionError, describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AppConfig, AudioBuffer, TranscriptResult } from '../../types';
import { PersistentJsonWorker, type ModelWorker } from '../process/PersistentJsonWorker';

export type WhisperTranscriberConfig = Pick<
  AppConfig,
  | 'pythonBin'
  | 'transcriberScriptPath'
  | 'whisperModel'
  | 'whisperDevice'
  | 'whisperComputeType'
  | 'whisperLanguage'
  | 'confidenceFloor'
  | 'transcriptionTimeoutMs'
  | 'modelLoadTimeoutMs'
>;

interface WorkerTranscript {
  text?: unknown;
  avgLogProb?: unknown;
  language?: unknown;
}

const SILENCE_MARKERS = /^[[(](blank_audio|silence|no speech|music|inaudible)[\])]$/i;
const PUNCTUATION_ONLY = /^[\s\p{P}\p{S}]*$/u;

/** Whether a transcript carries no words worth correcting or typing. */
export const isEmptyTranscript = (text: string): boolean => {
  const trimmed = text.trim();
  return trimmed.length === 0 || PUNCTUATION_ONLY.test(trimmed) || SILENCE_MARKERS.test(trimmed);
};

export class WhisperTranscriber {
  private readonly worker: ModelWorker;
  private loadPromise: Promise<void> | undefined;

  public constructor(
    private readonly config: WhisperTranscriberConfig,
    private readonly logger?: StructuredLogger,
    worker?: ModelWorker
  ) {
    this.worker =
      worker ??
      new PersistentJsonWorker({
        name: 'asr',
        command: config.pythonBin,
        args: [
          path.resolve(config.transcriberScriptPath),
          '--model',
          config.whisperModel,
          '--device',
          config.whisperDevice,
          '--compute-type',
          config.whisperComputeType
        ],
        env: { ...process.env, PYTHONUNBUFFERED: '1' },
        logger
      });
  }

  /**
   * Loads the model once per process. A failed load stays cached: later calls
   * reject with the same error without touching the worker again.
   */
  public warmup(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.loadModel();
    }

    return this.loadPromise;
  }

  public async transcribe(buffer: AudioBuffer): Promise<TranscriptResult> {
    await this.warmup();

    const startedAt = Date.now();
    let response: WorkerTranscript;
    try {
      response = await this.worker.request<WorkerTranscript>(
        {
          action: 'transcribe',
          audioBase64: buffer.pcm.toString('base64'),
          sampleRate: buffer.sampleRate,
          channels: buffer.channels,
          language: this.config.whisperLanguage ?? null
        },
        this.config.transcriptionTimeoutMs
      );
    } catch (error) {
      throw new TranscriptionError(describeError(error), error);
    }

    const result = this.toResult(response);
    this.logger?.info('Transcription finished', {
      elapsedMs: Date.now() - startedAt,
      audioMs: Math.round(buffer.durationMs),
      characters: result.text.length,
      avgLogProb: result.avgLogProb,
      lowConfidence: result.lowConfidence
    });

    return result;
  }

  public async shutdown(): Promise<void> {
    await this.worker.stop();
  }

  private async loadModel(): Promise<void> {
    const startedAt = Date.now();
    this.logger?.info('Loading speech model', {
      model: this.config.whisperModel,
      device: this.config.whisperDevice,
      computeType: this.config.whisperComputeType
    });

    try {
      await this.worker.start();
      await this.worker.request({ action: 'load' }, this.config.modelLoadTimeoutMs);
    } catch (error) {
      const failure = new ModelLoadError(this.config.whisperModel, describeError(error), error);
      this.logger?.error('Speech model failed to load', { detail: failure.message });
      throw failure;
    }

    this.logger?.info('Speech model ready', {
      model: this.config.whisperModel,
      elapsedMs: Date.now() - startedAt
    });
  }

  private toResult(response: WorkerTranscript): TranscriptResult {
    if (!response || typeof response !== 'object') {
      throw new TranscriptionError('worker returned no transcript');
    }

    const text = typeof response.text === 'string' ? response.text.trim() : '';
    const avgLogProb =
      typeof response.avgLogProb === 'number' && Number.isFinite(response.avgLogProb)
        ? response.avgLogProb
        : undefined;
    const language = typeof response.language === 'string' ? response.language : undefined;

    return Object.freeze({
      text,
      avgLogProb,
      language,
      lowConfidence: avgLogProb !== undefined && avgLogProb < this.config.confidenceFloor,
      isEmpty: isEmptyTranscript(text)
    });
  }
}
