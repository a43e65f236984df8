import fs from 'node:fs/promises';
import path from 'node:path';
import { describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { PipelineEvent } from '../../types';

interface JournalEntry {
  ts: string;
  sessionId: number;
  kind: 'transcript' | 'job';
  [key: string]: unknown;
}

const toEntry = (event: PipelineEvent, ts: string): JournalEntry | undefined => {
  if (event.type === 'TranscriptReady') {
    return {
      ts,
      sessionId: event.sessionId,
      kind: 'transcript',
      raw: event.raw,
      corrected: event.corrected,
      lowConfidence: event.lowConfidence
    };
  }

  if (event.type === 'JobFinished') {
    const { job } = event;
    return {
      ts,
      sessionId: job.sessionId,
      kind: 'job',
      outcome: job.outcome,
      durationMs: job.finishedAt === undefined ? undefined : job.finishedAt - job.startedAt
    };
  }

  return undefined;
};

/** Append-only JSON-lines record of transcripts and job outcomes. */
export class TranscriptJournal {
  private writeQueue: Promise<void> = Promise.resolve();
  private directoryReady: Promise<void> | undefined;

  public constructor(
    private readonly filePath: string,
    private readonly logger?: StructuredLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  public getPath(): string {
    return this.filePath;
  }

  public record(event: PipelineEvent): void {
    const entry = toEntry(event, this.now().toISOString());
    if (!entry) {
      return;
    }

    const line = `${JSON.stringify(entry)}\n`;
    this.writeQueue = this.writeQueue
      .then(async () => {
        await this.ensureDirectory();
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error: unknown) => {
        this.logger?.error('Failed to write transcript journal', {
          path: this.filePath,
          detail: describeError(error)
        });
      });
  }

  public flush(): Promise<void> {
    return this.writeQueue;
  }

  private ensureDirectory(): Promise<void> {
    if (!this.directoryReady) {
      this.directoryReady = fs.mkdir(path.dirname(this.filePath), { recursive: true }).then(() => undefined);
    }

    return this.directoryReady;
  }
}
