import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import { CaptureDeviceError, CaptureNotActiveError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AudioBuffer } from '../../types';
import type { AudioCapture } from './AudioCapture';
import { createAudioBuffer, measureLevel } from './pcm';

const DEFAULT_STARTUP_GRACE_MS = 300;
const STOP_KILL_TIMEOUT_MS = 2000;
const STDERR_TAIL_LIMIT = 4000;

/** The slice of a child process the capture relies on. */
export interface CaptureProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type CaptureProcessFactory = (command: string, args: string[]) => CaptureProcess;

export interface FfmpegAudioCaptureOptions {
  ffmpegBin: string;
  inputFormat: string;
  input: string;
  sampleRate: number;
  channels: number;
  levelIntervalMs: number;
  startupGraceMs?: number;
  processFactory?: CaptureProcessFactory;
  logger?: StructuredLogger;
}

interface ActiveCapture {
  child: CaptureProcess;
  chunks: Buffer[];
  bytes: number;
  levelChunks: Buffer[];
  stderrLog: string;
  startSettled: boolean;
  settleStart: (error?: Error) => void;
  graceTimer?: NodeJS.Timeout;
  levelTimer?: NodeJS.Timeout;
  stopping: boolean;
  exited: boolean;
  exitCode: number | null;
  onExit?: (code: number | null) => void;
}

const spawnCaptureProcess: CaptureProcessFactory = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

const normalizeMicError = (raw: string): string => {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return 'Microphone permission denied. Grant microphone access to the terminal running hushtype, then retry.';
  }

  if (/Device or resource busy|busy/i.test(detail)) {
    return 'Microphone is busy in another application.';
  }

  if (/ENOENT/.test(detail)) {
    return 'ffmpeg was not found. Install ffmpeg or set HUSHTYPE_FFMPEG_BIN.';
  }

  if (/Input\/output error|No such file|device not found|could not find|Connection refused/i.test(detail)) {
    return 'Microphone input device is unavailable. Check HUSHTYPE_FFMPEG_INPUT and that a microphone is connected.';
  }

  if (detail) {
    return `Microphone capture failed: ${detail}`;
  }

  return 'Microphone capture failed. Verify ffmpeg availability and microphone permissions.';
};

const tail = (text: string, limit: number): string =>
  text.length <= limit ? text : text.slice(text.length - limit);

export class FfmpegAudioCapture extends EventEmitter implements AudioCapture {
  private active: ActiveCapture | undefined;
  private readonly processFactory: CaptureProcessFactory;
  private readonly startupGraceMs: number;

  public constructor(private readonly options: FfmpegAudioCaptureOptions) {
    super();
    this.processFactory = options.processFactory ?? spawnCaptureProcess;
    this.startupGraceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;
  }

  public isCapturing(): boolean {
    return Boolean(this.active && this.active.startSettled && !this.active.stopping);
  }

  public async start(): Promise<void> {
    if (this.active) {
      throw new Error('Audio capture is already active');
    }

    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat,
      '-i',
      this.options.input,
      '-ac',
      String(this.options.channels),
      '-ar',
      String(this.options.sampleRate),
      '-f',
      's16le',
      '-acodec',
      'pcm_s16le',
      'pipe:1'
    ];

    let child: CaptureProcess;
    try {
      child = this.processFactory(this.options.ffmpegBin, args);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new CaptureDeviceError(normalizeMicError(detail));
    }

    let resolveStart: () => void = () => undefined;
    let rejectStart: (error: Error) => void = () => undefined;
    const ready = new Promise<void>((resolve, reject) => {
      resolveStart = resolve;
      rejectStart = reject;
    });

    const capture: ActiveCapture = {
      child,
      chunks: [],
      bytes: 0,
      levelChunks: [],
      stderrLog: '',
      startSettled: false,
      settleStart: (error) => {
        if (capture.startSettled) {
          return;
        }

        capture.startSettled = true;
        if (capture.graceTimer) {
          clearTimeout(capture.graceTimer);
        }

        if (error) {
          rejectStart(error);
          return;
        }

        resolveStart();
      },
      stopping: false,
      exited: false,
      exitCode: null
    };

    this.active = capture;

    child.stdout.on('data', (chunk: Buffer) => {
      capture.chunks.push(chunk);
      capture.bytes += chunk.length;
      capture.levelChunks.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer) => {
      capture.stderrLog = tail(`${capture.stderrLog}${chunk.toString()}`, STDERR_TAIL_LIMIT);
    });

    child.on('error', (error: Error) => {
      this.handleProcessEnded(capture, normalizeMicError(error.message), null);
    });

    child.on('close', (code: number | null) => {
      this.handleProcessEnded(
        capture,
        normalizeMicError(`${capture.stderrLog}\nexit code=${code}`),
        code
      );
    });

    child.once('spawn', () => {
      capture.graceTimer = setTimeout(() => {
        if (child.exitCode !== null) {
          capture.settleStart(new CaptureDeviceError(normalizeMicError(capture.stderrLog)));
          return;
        }

        capture.settleStart();
      }, this.startupGraceMs);
    });

    try {
      await ready;
    } catch (error) {
      if (this.active === capture) {
        this.active = undefined;
      }

      if (!capture.exited) {
        child.kill('SIGKILL');
      }

      throw error;
    }

    if (capture.stopping) {
      return;
    }

    capture.levelTimer = setInterval(() => {
      this.emitLevel(capture);
    }, this.options.levelIntervalMs);

    this.options.logger?.info('Audio capture started', {
      inputFormat: this.options.inputFormat,
      input: this.options.input,
      sampleRate: this.options.sampleRate,
      channels: this.options.channels
    });
  }

  public async stop(): Promise<AudioBuffer> {
    const capture = this.active;
    if (!capture || capture.stopping || !capture.startSettled) {
      throw new CaptureNotActiveError();
    }

    capture.stopping = true;
    this.clearLevelTimer(capture);

    const code = await this.waitForExit(capture, 'SIGINT');
    if (this.active === capture) {
      this.active = undefined;
    }

    // ffmpeg exits 255 on SIGINT; a null code means it died by signal.
    if (code !== null && code !== 0 && code !== 255 && code !== 130) {
      throw new CaptureDeviceError(normalizeMicError(`${capture.stderrLog}\nexit code=${code}`));
    }

    const buffer = createAudioBuffer(
      Buffer.concat(capture.chunks, capture.bytes),
      this.options.sampleRate,
      this.options.channels
    );
    capture.chunks = [];
    capture.levelChunks = [];

    this.options.logger?.info('Audio capture stopped', {
      durationMs: Math.round(buffer.durationMs),
      bytes: buffer.pcm.length
    });

    return buffer;
  }

  public async abort(): Promise<void> {
    const capture = this.active;
    if (!capture || capture.stopping) {
      return;
    }

    capture.stopping = true;
    this.clearLevelTimer(capture);
    capture.settleStart(new CaptureDeviceError('Audio capture aborted'));
    await this.waitForExit(capture, 'SIGKILL');
    capture.chunks = [];
    capture.levelChunks = [];

    if (this.active === capture) {
      this.active = undefined;
    }

    this.options.logger?.info('Audio capture aborted');
  }

  private waitForExit(capture: ActiveCapture, signal: NodeJS.Signals): Promise<number | null> {
    if (capture.exited) {
      return Promise.resolve(capture.exitCode);
    }

    return new Promise<number | null>((resolve) => {
      const killTimer = setTimeout(() => {
        capture.child.kill('SIGKILL');
      }, STOP_KILL_TIMEOUT_MS);

      capture.onExit = (code) => {
        clearTimeout(killTimer);
        resolve(code);
      };

      capture.child.kill(signal);
    });
  }

  private handleProcessEnded(capture: ActiveCapture, detail: string, code: number | null): void {
    if (capture.exited) {
      return;
    }

    capture.exited = true;
    capture.exitCode = code;
    this.clearLevelTimer(capture);

    if (!capture.startSettled) {
      capture.settleStart(new CaptureDeviceError(detail));
      return;
    }

    if (capture.stopping) {
      capture.onExit?.(code);
      return;
    }

    if (this.active === capture) {
      this.active = undefined;
    }

    capture.chunks = [];
    capture.levelChunks = [];

    this.options.logger?.warn('Audio capture ended unexpectedly', { detail, code });
    this.emit('fault', new CaptureDeviceError(`Microphone stopped unexpectedly. ${detail}`, { code }));
  }

  private emitLevel(capture: ActiveCapture): void {
    const pcm = Buffer.concat(capture.levelChunks);
    // A sample split across ticks stays queued for the next one.
    const aligned = pcm.length - (pcm.length % 2);
    capture.levelChunks = aligned < pcm.length ? [pcm.subarray(aligned)] : [];
    this.emit('level', measureLevel(pcm.subarray(0, aligned), Date.now()));
  }

  private clearLevelTimer(capture: ActiveCapture): void {
    if (capture.levelTimer) {
      clearInterval(capture.levelTimer);
      capture.levelTimer = undefined;
    }
  }
}
