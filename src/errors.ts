export type ErrorCode =
  | 'CAPTURE_DEVICE'
  | 'CAPTURE_NOT_ACTIVE'
  | 'MODEL_LOAD'
  | 'TRANSCRIPTION'
  | 'CORRECTION_CONNECTION'
  | 'MODEL_NOT_FOUND'
  | 'MALFORMED_RESPONSE'
  | 'CORRECTION_SERVER'
  | 'INJECTION'
  | 'STAGE_TIMEOUT';

/**
 * Base error for every failure a pipeline stage can report. `transient` marks
 * failures that a retry can plausibly fix.
 */
export class HushtypeError extends Error {
  public readonly code: ErrorCode;
  public readonly transient: boolean;
  public readonly context?: Record<string, unknown>;

  public constructor(
    message: string,
    code: ErrorCode,
    transient = false,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.code = code;
    this.transient = transient;
    this.context = context;
    this.name = this.constructor.name;
  }
}

export class CaptureDeviceError extends HushtypeError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CAPTURE_DEVICE', false, context);
  }
}

export class CaptureNotActiveError extends HushtypeError {
  public constructor() {
    super('No audio capture is active', 'CAPTURE_NOT_ACTIVE');
  }
}

export class ModelLoadError extends HushtypeError {
  public constructor(model: string, detail: string, cause?: unknown) {
    super(`Speech model '${model}' failed to load: ${detail}`, 'MODEL_LOAD', false, { model }, { cause });
  }
}

export class TranscriptionError extends HushtypeError {
  public constructor(detail: string, cause?: unknown) {
    super(`Transcription failed: ${detail}`, 'TRANSCRIPTION', false, undefined, { cause });
  }
}

export class CorrectionConnectionError extends HushtypeError {
  public constructor(baseUrl: string, detail: string, cause?: unknown, transient = true) {
    super(
      `Correction service at ${baseUrl} is unreachable: ${detail}`,
      'CORRECTION_CONNECTION',
      transient,
      { baseUrl },
      { cause }
    );
  }
}

export class ModelNotFoundError extends HushtypeError {
  public readonly model: string;

  public constructor(model: string) {
    super(
      `Correction model '${model}' is not installed. Run 'ollama pull ${model}' or select another model.`,
      'MODEL_NOT_FOUND',
      false,
      { model }
    );
    this.model = model;
  }
}

export class MalformedResponseError extends HushtypeError {
  public constructor(detail: string) {
    super(`Correction service returned an unusable response: ${detail}`, 'MALFORMED_RESPONSE');
  }
}

export class CorrectionServerError extends HushtypeError {
  public readonly statusCode: number;

  public constructor(statusCode: number, detail: string) {
    super(
      `Correction service responded with HTTP ${statusCode}${detail ? `: ${detail}` : ''}`,
      'CORRECTION_SERVER',
      statusCode === 502 || statusCode === 503 || statusCode === 504,
      { statusCode }
    );
    this.statusCode = statusCode;
  }
}

export class InjectionError extends HushtypeError {
  public constructor(detail: string, cause?: unknown) {
    super(
      `Typing into the focused application failed (check accessibility permission): ${detail}`,
      'INJECTION',
      false,
      undefined,
      { cause }
    );
  }
}

export class StageTimeoutError extends HushtypeError {
  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT', true, { label, timeoutMs });
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isTransientError = (error: unknown): boolean =>
  error instanceof HushtypeError && error.transient;
