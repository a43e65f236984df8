export type PipelineState = 'idle' | 'recording' | 'processing';
export type AutoTypeMode = 'raw' | 'corrected' | 'both';
export type CorrectionStyle = 'transcription' | 'minimal' | 'formal' | 'code';
export type KeystrokeBackendKind = 'auto' | 'osascript' | 'xdotool';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RecordingSession {
  id: number;
  startedAt: number;
  endedAt?: number;
  durationMs?: number;
}

export interface AudioBuffer {
  readonly pcm: Buffer;
  readonly sampleRate: number;
  readonly channels: number;
  readonly durationMs: number;
  /** Largest absolute s16 sample value in the buffer. */
  readonly peakAmplitude: number;
}

export interface AmplitudeSample {
  rms: number;
  peak: number;
  at: number;
}

export interface TranscriptResult {
  readonly text: string;
  readonly avgLogProb?: number;
  readonly language?: string;
  readonly lowConfidence: boolean;
  readonly isEmpty: boolean;
}

export interface CorrectionResult {
  readonly text: string;
  readonly model: string;
}

export type InjectionOutcome =
  | { kind: 'typed'; characters: number }
  | { kind: 'skipped'; app: string };

export type JobStage = 'gate' | 'transcribing' | 'correcting' | 'injecting' | 'done';

export type JobOutcome =
  | 'too-short'
  | 'no-speech'
  | 'transcription-failed'
  | 'completed'
  | 'injection-skipped'
  | 'injection-failed';

export interface JobRecord {
  sessionId: number;
  stage: JobStage;
  outcome?: JobOutcome;
  startedAt: number;
  finishedAt?: number;
}

export type CorrectionSkipReason = 'model-missing' | 'malformed' | 'unreachable' | 'server-error';

export type PipelineEvent =
  | { type: 'RecordingStarted'; sessionId: number; startedAt: number }
  | { type: 'RecordingStopped'; sessionId: number; durationMs: number }
  | { type: 'RecordingFailed'; sessionId: number; phase: 'start' | 'capture' | 'stop'; error: string }
  | { type: 'ToggleRejected'; reason: 'busy'; activeSessionId: number }
  | { type: 'TooShort'; sessionId: number; durationMs: number; minimumMs: number }
  | { type: 'NoSpeechDetected'; sessionId: number; reason: 'silence' | 'empty-transcript' }
  | { type: 'TranscriptionFailed'; sessionId: number; error: string }
  | { type: 'CorrectionSkipped'; sessionId: number; reason: CorrectionSkipReason; error: string }
  | {
      type: 'TranscriptReady';
      sessionId: number;
      raw: string;
      corrected: string | null;
      lowConfidence: boolean;
    }
  | { type: 'TextInjected'; sessionId: number; variant: 'raw' | 'corrected'; characters: number }
  | { type: 'InjectionSkipped'; sessionId: number; app: string }
  | { type: 'InjectionFailed'; sessionId: number; error: string }
  | { type: 'JobFinished'; job: JobRecord };

export type PipelineEventType = PipelineEvent['type'];

export type ToggleAck =
  | { kind: 'starting'; sessionId: number }
  | { kind: 'stopping'; sessionId: number }
  | { kind: 'busy'; activeSessionId: number };

export interface AppConfig {
  hotkey: string;
  hotkeyDebounceMs: number;
  ffmpegBin: string;
  ffmpegInputFormat: string;
  ffmpegInput: string;
  sampleRate: number;
  channels: number;
  levelIntervalMs: number;
  minRecordingMs: number;
  silencePeakThreshold: number;
  pythonBin: string;
  transcriberScriptPath: string;
  whisperModel: string;
  whisperDevice: string;
  whisperComputeType: string;
  whisperLanguage?: string;
  confidenceFloor: number;
  transcriptionTimeoutMs: number;
  modelLoadTimeoutMs: number;
  correctionEnabled: boolean;
  correctionModel: string;
  correctionStyle: CorrectionStyle;
  correctionTemperature: number;
  ollamaHost: string;
  ollamaPort: number;
  correctionTimeoutMs: number;
  correctionRetries: number;
  correctionBackoffMs: number;
  autoTypeEnabled: boolean;
  autoTypeMode: AutoTypeMode;
  autoTypeDelayMs: number;
  autoTypeCharDelayMs: number;
  autoTypeExcludedApps: string[];
  keystrokeBackend: KeystrokeBackendKind;
  copyToClipboard: boolean;
  logTranscriptions: boolean;
  transcriptLogPath: string;
  logDir: string;
  logLevel: LogLevel;
}
