import { request, type Dispatcher } from 'undici';
import {
  CorrectionConnectionError,
  CorrectionServerError,
  MalformedResponseError,
  ModelNotFoundError,
  describeError
} from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { CorrectionResult, CorrectionStyle } from '../../types';
import { buildCorrectionPrompt, cleanCorrectionOutput } from './prompt';

export interface OllamaCorrectorOptions {
  baseUrl: string;
  style: CorrectionStyle;
  temperature: number;
  timeoutMs: number;
  /** Longest acceptable output, as a multiple of the input length. */
  maxGrowth?: number;
  dispatcher?: Dispatcher;
  logger?: StructuredLogger;
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_SOCKET'
]);

const errorCodeOf = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }

  return undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const errorMessageOf = (body: string): string => {
  const parsed = parseJson(body);
  if (isRecord(parsed) && typeof parsed.error === 'string') {
    return parsed.error;
  }

  return body.trim().slice(0, 200);
};

const namesMissingModel = (detail: string): boolean => /model/i.test(detail) && /not found/i.test(detail);

export class OllamaCorrector {
  private readonly baseUrl: string;

  public constructor(private readonly options: OllamaCorrectorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  public getBaseUrl(): string {
    return this.baseUrl;
  }

  public async correct(text: string, model: string): Promise<CorrectionResult> {
    const prompt = buildCorrectionPrompt(this.options.style, text);
    const { statusCode, body } = await this.send('POST', '/api/generate', {
      model,
      prompt,
      stream: false,
      options: {
        temperature: this.options.temperature
      }
    });

    if (statusCode < 200 || statusCode >= 300) {
      const detail = errorMessageOf(body);
      if (statusCode === 404 || namesMissingModel(detail)) {
        throw new ModelNotFoundError(model);
      }

      throw new CorrectionServerError(statusCode, detail);
    }

    const corrected = cleanCorrectionOutput(this.extractText(body, model));
    if (!corrected) {
      throw new MalformedResponseError('empty output');
    }

    const maxGrowth = this.options.maxGrowth ?? 3;
    if (corrected.length > Math.max(text.trim().length, 1) * maxGrowth) {
      throw new MalformedResponseError(
        `output (${corrected.length} chars) is far longer than the input (${text.trim().length} chars)`
      );
    }

    this.options.logger?.debug('Correction received', {
      model,
      inputChars: text.length,
      outputChars: corrected.length
    });

    return { text: corrected, model };
  }

  public async listAvailableModels(): Promise<string[]> {
    const { statusCode, body } = await this.send('GET', '/api/tags');
    if (statusCode < 200 || statusCode >= 300) {
      throw new CorrectionServerError(statusCode, errorMessageOf(body));
    }

    const parsed = parseJson(body);
    if (!isRecord(parsed) || !Array.isArray(parsed.models)) {
      throw new MalformedResponseError('model list is missing');
    }

    return parsed.models.flatMap((entry: unknown) =>
      isRecord(entry) && typeof entry.name === 'string' ? [entry.name] : []
    );
  }

  public async isAvailable(): Promise<boolean> {
    try {
      await this.listAvailableModels();
      return true;
    } catch (error) {
      this.options.logger?.debug('Correction service probe failed', {
        baseUrl: this.baseUrl,
        detail: describeError(error)
      });
      return false;
    }
  }

  private extractText(body: string, model: string): string {
    const parsed = parseJson(body);
    if (parsed === undefined) {
      return body;
    }

    if (!isRecord(parsed)) {
      throw new MalformedResponseError('unexpected JSON payload');
    }

    if (typeof parsed.error === 'string') {
      if (namesMissingModel(parsed.error)) {
        throw new ModelNotFoundError(model);
      }

      throw new MalformedResponseError(parsed.error);
    }

    if (typeof parsed.response === 'string') {
      return parsed.response;
    }

    if (isRecord(parsed.message) && typeof parsed.message.content === 'string') {
      return parsed.message.content;
    }

    throw new MalformedResponseError('no response text in payload');
  }

  private async send(
    method: 'GET' | 'POST',
    pathname: string,
    payload?: Record<string, unknown>
  ): Promise<{ statusCode: number; body: string }> {
    try {
      const res = await request(`${this.baseUrl}${pathname}`, {
        method,
        headers: payload ? { 'content-type': 'application/json' } : undefined,
        body: payload ? JSON.stringify(payload) : undefined,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        dispatcher: this.options.dispatcher
      });

      return { statusCode: res.statusCode, body: await res.body.text() };
    } catch (error) {
      const code = errorCodeOf(error);
      const transient = code !== undefined && TRANSIENT_CODES.has(code);
      throw new CorrectionConnectionError(this.baseUrl, describeError(error), error, transient);
    }
  }
}
