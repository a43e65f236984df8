import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CorrectionConnectionError,
  CorrectionServerError,
  MalformedResponseError,
  ModelNotFoundError,
  isTransientError
} from '../../errors';
import { OllamaCorrector } from './OllamaCorrector';
import { buildCorrectionPrompt, cleanCorrectionOutput } from './prompt';

const BASE_URL = 'http://localhost:11434';

describe('OllamaCorrector', () => {
  let mockAgent: MockAgent;
  let corrector: OllamaCorrector;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    corrector = new OllamaCorrector({
      baseUrl: `${BASE_URL}/`,
      style: 'transcription',
      temperature: 0.2,
      timeoutMs: 1000,
      dispatcher: mockAgent
    });
  });

  afterEach(async () => {
    await mockAgent.close();
  });

  const generate = () => mockAgent.get(BASE_URL).intercept({ path: '/api/generate', method: 'POST' });

  it('posts a non-streaming generate request and returns the cleaned response', async () => {
    let sentBody = '';
    mockAgent
      .get(BASE_URL)
      .intercept({
        path: '/api/generate',
        method: 'POST',
        body: (body) => {
          sentBody = body;
          return true;
        }
      })
      .reply(200, { response: '"Can you check the logs?"', done: true });

    const result = await corrector.correct('um can you check the logs', 'llama3.2:3b');

    expect(result).toEqual({ text: 'Can you check the logs?', model: 'llama3.2:3b' });
    expect(JSON.parse(sentBody)).toEqual({
      model: 'llama3.2:3b',
      prompt: buildCorrectionPrompt('transcription', 'um can you check the logs'),
      stream: false,
      options: { temperature: 0.2 }
    });
  });

  it('accepts chat-shaped payloads', async () => {
    generate().reply(200, { message: { role: 'assistant', content: 'Ship it today.' } });

    const result = await corrector.correct('ship it today', 'llama3.2:3b');

    expect(result.text).toBe('Ship it today.');
  });

  it('accepts plain-text bodies', async () => {
    generate().reply(200, 'Corrected text: Meet me at noon.');

    const result = await corrector.correct('meet me at noon', 'llama3.2:3b');

    expect(result.text).toBe('Meet me at noon.');
  });

  it('maps 404 to ModelNotFoundError with a pull hint', async () => {
    generate().reply(404, { error: "model 'mistral' not found, try pulling it first" });

    const error = await corrector.correct('hello there', 'mistral').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ModelNotFoundError);
    expect(error).toHaveProperty(
      'message',
      "Correction model 'mistral' is not installed. Run 'ollama pull mistral' or select another model."
    );
    expect(isTransientError(error)).toBe(false);
  });

  it('treats an error body naming a missing model as ModelNotFoundError', async () => {
    generate().reply(500, { error: 'model "phi3" not found' });

    await expect(corrector.correct('hello there', 'phi3')).rejects.toBeInstanceOf(ModelNotFoundError);
  });

  it('rejects output far longer than the input as malformed', async () => {
    generate().reply(200, { response: 'Sure! Here is a long explanation of what you might have meant.' });

    const error = await corrector.correct('ok go', 'llama3.2:3b').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(isTransientError(error)).toBe(false);
  });

  it('rejects empty output as malformed', async () => {
    generate().reply(200, { response: '   ' });

    await expect(corrector.correct('hello there', 'llama3.2:3b')).rejects.toThrow(
      'Correction service returned an unusable response: empty output'
    );
  });

  it('rejects a JSON payload without text as malformed', async () => {
    generate().reply(200, { done: true });

    await expect(corrector.correct('hello there', 'llama3.2:3b')).rejects.toThrow(
      'Correction service returned an unusable response: no response text in payload'
    );
  });

  it('classifies 503 as a transient server error and 500 as permanent', async () => {
    generate().reply(503, 'loading model');
    generate().reply(500, 'boom');

    const unavailable = await corrector.correct('hello there', 'llama3.2:3b').catch((reason: unknown) => reason);
    const broken = await corrector.correct('hello there', 'llama3.2:3b').catch((reason: unknown) => reason);

    expect(unavailable).toBeInstanceOf(CorrectionServerError);
    expect(unavailable).toHaveProperty('message', 'Correction service responded with HTTP 503: loading model');
    expect(isTransientError(unavailable)).toBe(true);
    expect(broken).toBeInstanceOf(CorrectionServerError);
    expect(isTransientError(broken)).toBe(false);
  });

  it('classifies a refused connection as transient', async () => {
    generate().replyWithError(Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:11434'), { code: 'ECONNREFUSED' }));

    const error = await corrector.correct('hello there', 'llama3.2:3b').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(CorrectionConnectionError);
    expect(error).toHaveProperty(
      'message',
      'Correction service at http://localhost:11434 is unreachable: connect ECONNREFUSED 127.0.0.1:11434'
    );
    expect(isTransientError(error)).toBe(true);
  });

  it('lists installed model names', async () => {
    mockAgent
      .get(BASE_URL)
      .intercept({ path: '/api/tags', method: 'GET' })
      .reply(200, { models: [{ name: 'llama3.2:3b', size: 1 }, { name: 'mistral:7b' }, { size: 2 }] });

    await expect(corrector.listAvailableModels()).resolves.toEqual(['llama3.2:3b', 'mistral:7b']);
  });

  it('reports availability from the tags endpoint', async () => {
    mockAgent.get(BASE_URL).intercept({ path: '/api/tags', method: 'GET' }).reply(200, { models: [] });
    mockAgent
      .get(BASE_URL)
      .intercept({ path: '/api/tags', method: 'GET' })
      .replyWithError(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

    await expect(corrector.isAvailable()).resolves.toBe(true);
    await expect(corrector.isAvailable()).resolves.toBe(false);
  });
});

describe('cleanCorrectionOutput', () => {
  it('strips labels and wrapping quotes', () => {
    expect(cleanCorrectionOutput('  Corrected text: "Hello, world."  ')).toBe('Hello, world.');
    expect(cleanCorrectionOutput('“Fine.”')).toBe('Fine.');
    expect(cleanCorrectionOutput("It's fine")).toBe("It's fine");
  });
});

describe('buildCorrectionPrompt', () => {
  it('embeds the trimmed transcript and ends with an output cue', () => {
    const prompt = buildCorrectionPrompt('code', '  const x equals one ');

    expect(prompt).toContain('Input: const x equals one\n\nOutput:');
    expect(prompt.endsWith('Output:')).toBe(true);
    expect(prompt).toContain('The speaker is dictating source code');
  });
});
