import { EventEmitter } from 'node:events';
import {
  CorrectionServerError,
  MalformedResponseError,
  ModelNotFoundError,
  describeError,
  isTransientError
} from '../errors';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyTracker, type LatencySummary } from '../perf/LatencyTracker';
import type { AudioCapture } from '../services/capture/AudioCapture';
import { selectTypedTexts, type InjectOptions } from '../services/inject/TextInjector';
import type {
  AmplitudeSample,
  AppConfig,
  AudioBuffer,
  CorrectionResult,
  CorrectionSkipReason,
  InjectionOutcome,
  JobOutcome,
  JobRecord,
  PipelineEvent,
  PipelineState,
  RecordingSession,
  ToggleAck,
  TranscriptResult
} from '../types';
import { withRetry } from '../utils/retry';
import { withTimeout } from '../utils/timeout';
import { PipelineStateHolder } from './PipelineStateHolder';

interface TranscriberService {
  transcribe: (buffer: AudioBuffer) => Promise<TranscriptResult>;
  shutdown: () => Promise<void>;
}

interface CorrectorService {
  correct: (text: string, model: string) => Promise<CorrectionResult>;
}

interface InjectorService {
  inject: (text: string, options?: InjectOptions) => Promise<InjectionOutcome>;
}

export interface PipelineDependencies {
  capture: AudioCapture;
  transcriber: TranscriberService;
  corrector: CorrectorService;
  injector: InjectorService;
}

export type PipelineSettings = Pick<
  AppConfig,
  | 'minRecordingMs'
  | 'silencePeakThreshold'
  | 'transcriptionTimeoutMs'
  | 'correctionEnabled'
  | 'correctionModel'
  | 'correctionTimeoutMs'
  | 'correctionRetries'
  | 'correctionBackoffMs'
  | 'autoTypeEnabled'
  | 'autoTypeMode'
>;

export interface PipelineCoordinatorOptions {
  stateHolder?: PipelineStateHolder;
  now?: () => number;
  logger?: StructuredLogger;
}

interface StageTimings {
  transcribeMs: number;
  correctMs: number;
  injectMs: number;
}

const skipReasonOf = (error: unknown): CorrectionSkipReason => {
  if (error instanceof ModelNotFoundError) {
    return 'model-missing';
  }

  if (error instanceof MalformedResponseError) {
    return 'malformed';
  }

  if (error instanceof CorrectionServerError) {
    return 'server-error';
  }

  return 'unreachable';
};

export declare interface PipelineCoordinator {
  on(event: 'event', listener: (event: PipelineEvent) => void): this;
  on(event: 'stateChanged', listener: (state: PipelineState) => void): this;
  on(event: 'audioLevel', listener: (sample: AmplitudeSample) => void): this;
}

/**
 * Drives one toggle-controlled recording at a time through
 * gate, transcription, correction and typing, and always lands back in idle.
 */
export class PipelineCoordinator extends EventEmitter {
  private readonly stateHolder: PipelineStateHolder;
  private readonly now: () => number;
  private readonly logger?: StructuredLogger;
  private readonly latencyTracker = new LatencyTracker();
  private readonly inFlight = new Set<Promise<void>>();
  private nextSessionId = 0;
  private session: RecordingSession | undefined;
  private captureStarted: Promise<boolean> = Promise.resolve(false);
  private shuttingDown = false;

  public constructor(
    private readonly deps: PipelineDependencies,
    private readonly settings: PipelineSettings,
    options: PipelineCoordinatorOptions = {}
  ) {
    super();
    this.stateHolder = options.stateHolder ?? new PipelineStateHolder();
    this.now = options.now ?? Date.now;
    this.logger = options.logger;

    this.deps.capture.on('level', (sample) => {
      if (this.stateHolder.get() === 'recording') {
        this.emit('audioLevel', sample);
      }
    });

    this.deps.capture.on('fault', (error) => {
      this.handleCaptureFault(error);
    });
  }

  public getState(): PipelineState {
    return this.stateHolder.get();
  }

  public getActiveSession(): RecordingSession | undefined {
    return this.session ? { ...this.session } : undefined;
  }

  public getLatencySummary(): LatencySummary {
    return this.latencyTracker.summarize();
  }

  public toggle(): ToggleAck {
    if (this.shuttingDown) {
      throw new Error('Pipeline is shutting down');
    }

    if (this.stateHolder.compareAndSet('idle', 'recording')) {
      this.nextSessionId += 1;
      const session: RecordingSession = { id: this.nextSessionId, startedAt: this.now() };
      this.session = session;
      this.emitState('recording');

      const started = this.beginCapture(session);
      this.captureStarted = started;
      this.track(started.then(() => undefined));
      return { kind: 'starting', sessionId: session.id };
    }

    const current = this.session;
    if (current && this.stateHolder.compareAndSet('recording', 'processing')) {
      this.emitState('processing');
      this.track(this.finishRecording(current, this.captureStarted));
      return { kind: 'stopping', sessionId: current.id };
    }

    const activeSessionId = current?.id ?? this.nextSessionId;
    this.logger?.info('Toggle rejected while processing', { activeSessionId });
    this.emitEvent({ type: 'ToggleRejected', reason: 'busy', activeSessionId });
    return { kind: 'busy', activeSessionId };
  }

  /** Resolves once no start, stop or job work is in flight. */
  public async waitForIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  public async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      await this.waitForIdle();
      return;
    }

    this.shuttingDown = true;
    const current = this.session;

    if (current && this.stateHolder.get() === 'recording') {
      await this.captureStarted;
      if (this.stateHolder.compareAndSet('recording', 'idle')) {
        await this.deps.capture.abort();
        this.session = undefined;
        this.emitState('idle');
        this.logger?.info('Recording discarded on shutdown', { sessionId: current.id });
      }
    }

    await this.waitForIdle();
    await this.deps.transcriber.shutdown();
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.logger?.error('Unexpected pipeline failure', { detail: describeError(error) });
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });

    this.inFlight.add(tracked);
  }

  private async beginCapture(session: RecordingSession): Promise<boolean> {
    try {
      await this.deps.capture.start();
    } catch (error) {
      const detail = describeError(error);
      this.logger?.warn('Audio capture could not start', { sessionId: session.id, detail });
      this.emitEvent({ type: 'RecordingFailed', sessionId: session.id, phase: 'start', error: detail });

      if (this.session === session && this.stateHolder.compareAndSet('recording', 'idle')) {
        this.session = undefined;
        this.emitState('idle');
      }

      return false;
    }

    this.logger?.info('Recording started', { sessionId: session.id });
    this.emitEvent({ type: 'RecordingStarted', sessionId: session.id, startedAt: session.startedAt });
    return true;
  }

  private handleCaptureFault(error: Error): void {
    const current = this.session;
    if (!current || !this.stateHolder.compareAndSet('recording', 'idle')) {
      this.logger?.warn('Audio capture failed outside recording', {
        sessionId: current?.id,
        state: this.stateHolder.get(),
        detail: error.message
      });
      return;
    }

    this.session = undefined;
    this.logger?.warn('Audio capture failed while recording', {
      sessionId: current.id,
      detail: error.message
    });
    this.emitEvent({ type: 'RecordingFailed', sessionId: current.id, phase: 'capture', error: error.message });
    this.emitState('idle');
  }

  private async finishRecording(session: RecordingSession, started: Promise<boolean>): Promise<void> {
    try {
      if (!(await started)) {
        return;
      }

      let buffer: AudioBuffer;
      try {
        buffer = await this.deps.capture.stop();
      } catch (error) {
        const detail = describeError(error);
        this.logger?.warn('Audio capture could not stop cleanly', { sessionId: session.id, detail });
        this.emitEvent({ type: 'RecordingFailed', sessionId: session.id, phase: 'stop', error: detail });
        return;
      }

      session.endedAt = this.now();
      session.durationMs = buffer.durationMs;
      this.emitEvent({ type: 'RecordingStopped', sessionId: session.id, durationMs: buffer.durationMs });

      await this.runJob(session, buffer);
    } finally {
      if (this.session === session) {
        this.session = undefined;
      }

      if (this.stateHolder.compareAndSet('processing', 'idle')) {
        this.emitState('idle');
      }
    }
  }

  private async runJob(session: RecordingSession, buffer: AudioBuffer): Promise<void> {
    const job: JobRecord = { sessionId: session.id, stage: 'gate', startedAt: this.now() };
    const timings: StageTimings = { transcribeMs: 0, correctMs: 0, injectMs: 0 };

    let outcome: JobOutcome;
    try {
      outcome = await this.runStages(job, buffer, timings);
    } catch (error) {
      this.logger?.error('Processing job failed unexpectedly', {
        sessionId: session.id,
        stage: job.stage,
        detail: describeError(error)
      });
      outcome = job.stage === 'injecting' ? 'injection-failed' : 'transcription-failed';
    }

    job.stage = 'done';
    job.outcome = outcome;
    job.finishedAt = this.now();

    if (outcome === 'completed' || outcome === 'injection-skipped') {
      this.latencyTracker.push({ ...timings, totalMs: job.finishedAt - job.startedAt });
      this.logger?.info('Job latency summary', { ...this.latencyTracker.summarize() });
    }

    this.logger?.info('Job finished', { sessionId: session.id, outcome });
    this.emitEvent({ type: 'JobFinished', job: { ...job } });
  }

  private async runStages(job: JobRecord, buffer: AudioBuffer, timings: StageTimings): Promise<JobOutcome> {
    const sessionId = job.sessionId;

    if (buffer.durationMs < this.settings.minRecordingMs) {
      this.emitEvent({
        type: 'TooShort',
        sessionId,
        durationMs: buffer.durationMs,
        minimumMs: this.settings.minRecordingMs
      });
      return 'too-short';
    }

    if (buffer.peakAmplitude < this.settings.silencePeakThreshold) {
      this.logger?.info('Recording is silent; skipping transcription', {
        sessionId,
        peakAmplitude: buffer.peakAmplitude
      });
      this.emitEvent({ type: 'NoSpeechDetected', sessionId, reason: 'silence' });
      return 'no-speech';
    }

    job.stage = 'transcribing';
    let transcript: TranscriptResult;
    const transcribeStartedAt = this.now();
    try {
      transcript = await withTimeout(
        this.deps.transcriber.transcribe(buffer),
        this.settings.transcriptionTimeoutMs,
        'Transcription'
      );
    } catch (error) {
      const detail = describeError(error);
      this.logger?.warn('Transcription failed', { sessionId, detail });
      this.emitEvent({ type: 'TranscriptionFailed', sessionId, error: detail });
      return 'transcription-failed';
    } finally {
      timings.transcribeMs = this.now() - transcribeStartedAt;
    }

    if (transcript.isEmpty) {
      this.emitEvent({ type: 'NoSpeechDetected', sessionId, reason: 'empty-transcript' });
      return 'no-speech';
    }

    let corrected: string | null = null;
    if (this.settings.correctionEnabled) {
      job.stage = 'correcting';
      const correctStartedAt = this.now();
      corrected = await this.correct(sessionId, transcript.text);
      timings.correctMs = this.now() - correctStartedAt;
    }

    this.emitEvent({
      type: 'TranscriptReady',
      sessionId,
      raw: transcript.text,
      corrected,
      lowConfidence: transcript.lowConfidence
    });

    if (!this.settings.autoTypeEnabled) {
      return 'completed';
    }

    job.stage = 'injecting';
    const injectStartedAt = this.now();
    try {
      for (const typed of selectTypedTexts(this.settings.autoTypeMode, transcript.text, corrected)) {
        let outcome: InjectionOutcome;
        try {
          outcome = await this.deps.injector.inject(typed.text, { leadingSpace: typed.leadingSpace });
        } catch (error) {
          const detail = describeError(error);
          this.logger?.warn('Auto-typing failed', { sessionId, detail });
          this.emitEvent({ type: 'InjectionFailed', sessionId, error: detail });
          return 'injection-failed';
        }

        if (outcome.kind === 'skipped') {
          this.emitEvent({ type: 'InjectionSkipped', sessionId, app: outcome.app });
          return 'injection-skipped';
        }

        this.emitEvent({
          type: 'TextInjected',
          sessionId,
          variant: typed.variant,
          characters: outcome.characters
        });
      }
    } finally {
      timings.injectMs = this.now() - injectStartedAt;
    }

    return 'completed';
  }

  private async correct(sessionId: number, text: string): Promise<string | null> {
    const model = this.settings.correctionModel;

    try {
      const result = await withRetry(
        () =>
          withTimeout(this.deps.corrector.correct(text, model), this.settings.correctionTimeoutMs, 'Correction'),
        {
          maxAttempts: this.settings.correctionRetries + 1,
          initialDelayMs: this.settings.correctionBackoffMs,
          shouldRetry: (error) => isTransientError(error),
          onRetry: (error, attempt, delayMs) => {
            this.logger?.warn('Correction attempt failed; retrying', {
              sessionId,
              attempt,
              delayMs,
              detail: describeError(error)
            });
          }
        }
      );

      return result.text;
    } catch (error) {
      const reason = skipReasonOf(error);
      const detail = describeError(error);
      this.logger?.warn('Correction skipped; keeping the raw transcript', { sessionId, reason, detail });
      this.emitEvent({ type: 'CorrectionSkipped', sessionId, reason, error: detail });
      return null;
    }
  }

  private emitState(state: PipelineState): void {
    this.logger?.debug('Pipeline state changed', { state });
    this.safeEmit('stateChanged', state);
  }

  private emitEvent(event: PipelineEvent): void {
    this.safeEmit('event', event);
  }

  private safeEmit(name: 'event' | 'stateChanged', payload: PipelineEvent | PipelineState): void {
    try {
      this.emit(name, payload);
    } catch (error) {
      this.logger?.error('Pipeline listener threw', { event: name, detail: describeError(error) });
    }
  }
}
