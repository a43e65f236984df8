import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { describeEvent, describeState } from '../core/statusMessages';
import { describeError } from '../errors';
import type { LatencySummary } from '../perf/LatencyTracker';
import type { PipelineEvent, PipelineState, ToggleAck } from '../types';

export interface ConsolePipeline {
  toggle(): ToggleAck;
  getState(): PipelineState;
  getLatencySummary(): LatencySummary;
  on(event: 'event', listener: (event: PipelineEvent) => void): unknown;
  on(event: 'stateChanged', listener: (state: PipelineState) => void): unknown;
}

export interface TerminalConsoleOptions {
  pipeline: ConsolePipeline;
  input: Readable;
  output: Writable;
  hotkey: string;
  listModels?: () => Promise<string[]>;
  onQuit: () => Promise<void> | void;
}

const HELP_LINES = [
  'Commands:',
  '  <enter>   Start/stop recording (same as the hotkey)',
  '  /status   Print the pipeline state and stage latencies',
  '  /models   List the correction models Ollama has installed',
  '  /help     Show this help',
  '  /quit     Exit'
];

/** Line-oriented control surface on stdin/stdout beside the global hotkey. */
export class TerminalConsole {
  private rl: readline.Interface | undefined;
  private commandChain: Promise<void> = Promise.resolve();

  public constructor(private readonly options: TerminalConsoleOptions) {
    options.pipeline.on('event', (event) => {
      this.print(describeEvent(event));
    });

    options.pipeline.on('stateChanged', (state) => {
      this.print(`[${describeState(state).toLowerCase()}]`);
    });
  }

  public start(): void {
    if (this.rl) {
      return;
    }

    this.print(`Press ${this.options.hotkey} or <enter> to start and stop recording. /help lists commands.`);
    this.rl = readline.createInterface({ input: this.options.input, terminal: false });
    this.rl.on('line', (line) => {
      this.handleLine(line);
    });
  }

  public close(): void {
    this.rl?.close();
    this.rl = undefined;
  }

  /** Resolves once every queued command has finished. */
  public idle(): Promise<void> {
    return this.commandChain;
  }

  public handleLine(line: string): void {
    const input = line.trim();

    if (input === '') {
      this.toggle();
      return;
    }

    if (input === '/status') {
      this.printStatus();
      return;
    }

    if (input === '/models') {
      this.queue(() => this.printModels());
      return;
    }

    if (input === '/help') {
      HELP_LINES.forEach((helpLine) => this.print(helpLine));
      return;
    }

    if (input === '/quit') {
      this.queue(async () => {
        await this.options.onQuit();
      });
      return;
    }

    this.print('Unknown command. Use /help, /status, /models, or /quit.');
  }

  public print(line: string): void {
    this.options.output.write(`${line}\n`);
  }

  private toggle(): void {
    try {
      this.options.pipeline.toggle();
    } catch (error) {
      this.print(`[error] ${describeError(error)}`);
    }
  }

  private printStatus(): void {
    const summary = this.options.pipeline.getLatencySummary();
    this.print(`[status] state=${this.options.pipeline.getState()} jobs=${summary.jobs}`);
    if (summary.jobs > 0) {
      this.print(
        `[status] p50 transcribe=${summary.transcribeMs.p50}ms correct=${summary.correctMs.p50}ms total=${summary.totalMs.p50}ms`
      );
    }
  }

  private async printModels(): Promise<void> {
    if (!this.options.listModels) {
      this.print('Correction is disabled.');
      return;
    }

    const models = await this.options.listModels();
    if (models.length === 0) {
      this.print('Ollama has no models installed.');
      return;
    }

    models.forEach((model) => this.print(`  ${model}`));
  }

  private queue(fn: () => Promise<void>): void {
    this.commandChain = this.commandChain.then(fn).catch((error: unknown) => {
      this.print(`[error] ${describeError(error)}`);
    });
  }
}
