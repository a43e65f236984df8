import { describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { PipelineEvent } from '../../types';
import { runCommand, type CommandRunner } from '../process/runCommand';

interface ClipboardCommand {
  command: string;
  args: string[];
}

export const clipboardCommandFor = (platform: NodeJS.Platform): ClipboardCommand | undefined => {
  if (platform === 'darwin') {
    return { command: 'pbcopy', args: [] };
  }

  if (platform === 'linux') {
    return { command: 'xclip', args: ['-selection', 'clipboard'] };
  }

  return undefined;
};

export interface ClipboardWriterOptions {
  platform?: NodeJS.Platform;
  commandRunner?: CommandRunner;
  timeoutMs?: number;
  logger?: StructuredLogger;
}

/** Copies the final text of each transcript to the system clipboard. */
export class ClipboardWriter {
  private readonly clipboardCommand: ClipboardCommand | undefined;
  private readonly commandRunner: CommandRunner;
  private pending: Promise<void> = Promise.resolve();

  public constructor(private readonly options: ClipboardWriterOptions = {}) {
    this.clipboardCommand = clipboardCommandFor(options.platform ?? process.platform);
    this.commandRunner = options.commandRunner ?? runCommand;
  }

  public isSupported(): boolean {
    return this.clipboardCommand !== undefined;
  }

  public handle(event: PipelineEvent): void {
    if (event.type !== 'TranscriptReady') {
      return;
    }

    const text = (event.corrected ?? event.raw).trim();
    if (!text) {
      return;
    }

    this.pending = this.pending.then(() => this.copy(text));
  }

  /** Resolves once every queued copy has finished. */
  public flush(): Promise<void> {
    return this.pending;
  }

  private async copy(text: string): Promise<void> {
    const clipboard = this.clipboardCommand;
    if (!clipboard) {
      this.options.logger?.debug('No clipboard command for this platform');
      return;
    }

    try {
      await this.commandRunner(clipboard.command, clipboard.args, {
        stdin: text,
        timeoutMs: this.options.timeoutMs ?? 2000
      });
      this.options.logger?.debug('Copied transcript to clipboard', { characters: text.length });
    } catch (error) {
      this.options.logger?.warn('Clipboard copy failed', {
        command: clipboard.command,
        detail: describeError(error)
      });
    }
  }
}
