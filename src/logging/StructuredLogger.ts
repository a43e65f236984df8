import fs from 'node:fs/promises';
import path from 'node:path';
import type { LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface StructuredLoggerOptions {
  minLevel?: LogLevel;
  /** Mirror entries to the console. On by default. */
  console?: boolean;
}

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();
  private readonly minRank: number;
  private readonly mirrorToConsole: boolean;

  private constructor(
    private readonly filePath: string,
    options: StructuredLoggerOptions
  ) {
    this.minRank = LEVEL_RANK[options.minLevel ?? 'info'];
    this.mirrorToConsole = options.console ?? true;
  }

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `hushtype-${datePrefix}.log`);

    return new StructuredLogger(filePath, options);
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /** Resolves once every entry written so far has reached the file. */
  public flush(): Promise<void> {
    return this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[hushtype] Failed to write log file: ${detail}`);
      });

    if (!this.mirrorToConsole) {
      return;
    }

    if (level === 'error') {
      console.error(`[hushtype] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[hushtype] ${message}`, context);
      return;
    }

    console.log(`[hushtype] ${message}`, context);
  }
}
