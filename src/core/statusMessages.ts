import type { PipelineEvent, PipelineState } from '../types';

const STATE_LABELS: Record<PipelineState, string> = {
  idle: 'Idle',
  recording: 'Recording',
  processing: 'Processing'
};

export const describeState = (state: PipelineState): string => STATE_LABELS[state];

const seconds = (ms: number): string => `${(ms / 1000).toFixed(1)}s`;

const preview = (text: string, limit = 60): string =>
  text.length <= limit ? text : `${text.slice(0, limit - 1)}…`;

/** One human-readable status line per pipeline event. */
export const describeEvent = (event: PipelineEvent): string => {
  switch (event.type) {
    case 'RecordingStarted':
      return 'Recording... press the hotkey again to stop';
    case 'RecordingStopped':
      return `Recorded ${seconds(event.durationMs)}, transcribing`;
    case 'RecordingFailed':
      if (event.phase === 'start') {
        return `Could not start recording: ${event.error}`;
      }
      return event.phase === 'capture'
        ? `Recording interrupted: ${event.error}`
        : `Could not finish recording: ${event.error}`;
    case 'ToggleRejected':
      return 'Still processing the previous recording';
    case 'TooShort':
      return `Recording too short (${seconds(event.durationMs)}, minimum ${seconds(event.minimumMs)})`;
    case 'NoSpeechDetected':
      return event.reason === 'silence' ? 'Only silence was recorded' : 'No speech detected';
    case 'TranscriptionFailed':
      return `Transcription failed: ${event.error}`;
    case 'CorrectionSkipped':
      return event.reason === 'model-missing'
        ? `Correction skipped: ${event.error}`
        : `Correction unavailable (${event.reason}), using the raw transcript`;
    case 'TranscriptReady': {
      const text = event.corrected ?? event.raw;
      const flag = event.lowConfidence ? ' (low confidence)' : '';
      return `Transcript${flag}: ${preview(text)}`;
    }
    case 'TextInjected':
      return `Typed ${event.characters} characters (${event.variant})`;
    case 'InjectionSkipped':
      return `Typing skipped in ${event.app}`;
    case 'InjectionFailed':
      return `Typing failed: ${event.error}`;
    case 'JobFinished':
      return `Done (${event.job.outcome ?? 'unknown'})`;
  }
};
