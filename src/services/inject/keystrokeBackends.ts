import type { KeystrokeBackendKind } from '../../types';
import { runCommand, type CommandRunner } from '../process/runCommand';

export type SpecialKey = 'return' | 'tab';

/** Sends synthetic keystrokes to whatever application has focus. */
export interface KeystrokeBackend {
  readonly name: string;
  frontmostApplication(): Promise<string | undefined>;
  typeCharacter(character: string): Promise<void>;
  pressKey(key: SpecialKey): Promise<void>;
}

const COMMAND_TIMEOUT_MS = 4000;

const MAC_KEY_CODES: Record<SpecialKey, string> = {
  return: '36',
  tab: '48'
};

const XDOTOOL_KEYS: Record<SpecialKey, string> = {
  return: 'Return',
  tab: 'Tab'
};

export class OsascriptKeystrokeBackend implements KeystrokeBackend {
  public readonly name = 'osascript';

  public constructor(private readonly commandRunner: CommandRunner = runCommand) {}

  public async frontmostApplication(): Promise<string | undefined> {
    const { stdout } = await this.commandRunner(
      'osascript',
      ['-e', 'tell application "System Events" to get name of first application process whose frontmost is true'],
      { timeoutMs: COMMAND_TIMEOUT_MS }
    );

    return stdout.trim() || undefined;
  }

  public async typeCharacter(character: string): Promise<void> {
    await this.commandRunner(
      'osascript',
      [
        '-e',
        'on run argv',
        '-e',
        'tell application "System Events" to keystroke (item 1 of argv)',
        '-e',
        'end run',
        '--',
        character
      ],
      { timeoutMs: COMMAND_TIMEOUT_MS }
    );
  }

  public async pressKey(key: SpecialKey): Promise<void> {
    await this.commandRunner(
      'osascript',
      ['-e', `tell application "System Events" to key code ${MAC_KEY_CODES[key]}`],
      { timeoutMs: COMMAND_TIMEOUT_MS }
    );
  }
}

export class XdotoolKeystrokeBackend implements KeystrokeBackend {
  public readonly name = 'xdotool';

  public constructor(private readonly commandRunner: CommandRunner = runCommand) {}

  public async frontmostApplication(): Promise<string | undefined> {
    const { stdout } = await this.commandRunner('xdotool', ['getactivewindow', 'getwindowname'], {
      timeoutMs: COMMAND_TIMEOUT_MS
    });

    return stdout.trim() || undefined;
  }

  public async typeCharacter(character: string): Promise<void> {
    await this.commandRunner('xdotool', ['type', '--delay', '0', '--', character], {
      timeoutMs: COMMAND_TIMEOUT_MS
    });
  }

  public async pressKey(key: SpecialKey): Promise<void> {
    await this.commandRunner('xdotool', ['key', XDOTOOL_KEYS[key]], { timeoutMs: COMMAND_TIMEOUT_MS });
  }
}

export const createKeystrokeBackend = (
  kind: KeystrokeBackendKind,
  platform: NodeJS.Platform = process.platform,
  commandRunner: CommandRunner = runCommand
): KeystrokeBackend => {
  const resolved = kind === 'auto' ? (platform === 'darwin' ? 'osascript' : 'xdotool') : kind;
  return resolved === 'osascript'
    ? new OsascriptKeystrokeBackend(commandRunner)
    : new XdotoolKeystrokeBackend(commandRunner);
};
