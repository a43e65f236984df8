import { describe, expect, it } from 'vitest';
import { InjectionError } from '../../errors';
import type { CommandRunner } from '../process/runCommand';
import { ExclusionPolicy } from './ExclusionPolicy';
import { createKeystrokeBackend, type KeystrokeBackend, type SpecialKey } from './keystrokeBackends';
import { TextInjector, prepareTypedText, selectTypedTexts } from './TextInjector';

class FakeKeystrokeBackend implements KeystrokeBackend {
  public readonly name = 'fake';
  public readonly sent: string[] = [];
  public frontmostQueries = 0;
  public failOnCharacter: string | undefined;

  public constructor(public app: string | undefined | Error = 'TextEdit') {}

  public async frontmostApplication(): Promise<string | undefined> {
    this.frontmostQueries += 1;
    if (this.app instanceof Error) {
      throw this.app;
    }
    return this.app;
  }

  public async typeCharacter(character: string): Promise<void> {
    if (character === this.failOnCharacter) {
      throw new Error('osascript is not allowed to send keystrokes');
    }
    this.sent.push(character);
  }

  public async pressKey(key: SpecialKey): Promise<void> {
    this.sent.push(`<${key}>`);
  }
}

const createInjector = (backend: KeystrokeBackend, entries = ['Keychain Access', 'Login Window', '1Password']) => {
  const sleeps: number[] = [];
  const injector = new TextInjector({
    backend,
    policy: new ExclusionPolicy(entries),
    delayMs: 1000,
    charDelayMs: 20,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });
  return { injector, sleeps };
};

describe('prepareTypedText', () => {
  it.each([
    ['  hello there friend  ', 'hello there friend.'],
    ['hello there', 'hello there'],
    ['is it done?', 'is it done?'],
    ['we shipped it!', 'we shipped it!'],
    ['', '']
  ])('%j -> %j', (input, expected) => {
    expect(prepareTypedText(input)).toBe(expected);
  });
});

describe('selectTypedTexts', () => {
  it('types only the raw text in raw mode', () => {
    expect(selectTypedTexts('raw', 'a b', 'A b.')).toEqual([{ variant: 'raw', text: 'a b', leadingSpace: false }]);
  });

  it('falls back to raw when correction is absent', () => {
    expect(selectTypedTexts('corrected', 'a b', null)).toEqual([{ variant: 'raw', text: 'a b', leadingSpace: false }]);
    expect(selectTypedTexts('corrected', 'a b', 'A b.')).toEqual([
      { variant: 'corrected', text: 'A b.', leadingSpace: false }
    ]);
  });

  it('types raw then a different corrected text in both mode', () => {
    expect(selectTypedTexts('both', 'a b', 'A b.')).toEqual([
      { variant: 'raw', text: 'a b', leadingSpace: false },
      { variant: 'corrected', text: 'A b.', leadingSpace: true }
    ]);
    expect(selectTypedTexts('both', 'a b', 'a b')).toEqual([{ variant: 'raw', text: 'a b', leadingSpace: false }]);
    expect(selectTypedTexts('both', 'a b', null)).toEqual([{ variant: 'raw', text: 'a b', leadingSpace: false }]);
  });
});

describe('ExclusionPolicy', () => {
  it('matches case-insensitive substrings and reports the entry', () => {
    const policy = new ExclusionPolicy(['1Password', 'Keychain Access']);

    expect(policy.matches('1password 8')).toBe('1Password');
    expect(policy.matches('KEYCHAIN ACCESS')).toBe('Keychain Access');
    expect(policy.matches('Terminal')).toBeUndefined();
  });

  it('returns new policies instead of mutating', () => {
    const policy = new ExclusionPolicy(['1Password']);
    const extended = policy.with('Bitwarden');

    expect(policy.list()).toEqual(['1Password']);
    expect(extended.list()).toEqual(['1Password', 'Bitwarden']);
    expect(extended.without('1PASSWORD').list()).toEqual(['Bitwarden']);
    expect(Object.isFrozen(policy.list())).toBe(true);
  });
});

describe('TextInjector', () => {
  it('waits, then types one character at a time with the configured pacing', async () => {
    const backend = new FakeKeystrokeBackend();
    const { injector, sleeps } = createInjector(backend);

    const outcome = await injector.inject(' hi ');

    expect(outcome).toEqual({ kind: 'typed', characters: 2 });
    expect(backend.sent).toEqual(['h', 'i']);
    expect(sleeps).toEqual([1000, 20]);
  });

  it('sends newlines and tabs as key presses', async () => {
    const backend = new FakeKeystrokeBackend();
    const { injector } = createInjector(backend);

    await injector.inject('a\tb\nc');

    expect(backend.sent).toEqual(['a', '<tab>', 'b', '<return>', 'c', '.']);
  });

  it('prefixes a space when asked', async () => {
    const backend = new FakeKeystrokeBackend();
    const { injector } = createInjector(backend);

    const outcome = await injector.inject('ok', { leadingSpace: true });

    expect(outcome).toEqual({ kind: 'typed', characters: 3 });
    expect(backend.sent).toEqual([' ', 'o', 'k']);
  });

  it('sends no keystroke into an excluded application', async () => {
    const backend = new FakeKeystrokeBackend('1Password 7');
    const { injector } = createInjector(backend);

    const outcome = await injector.inject('my secret words');

    expect(outcome).toEqual({ kind: 'skipped', app: '1Password 7' });
    expect(backend.sent).toEqual([]);
  });

  it('applies a swapped policy on the next run', async () => {
    const backend = new FakeKeystrokeBackend('Slack');
    const { injector } = createInjector(backend);

    await injector.inject('first');
    injector.setExclusionPolicy(injector.getExclusionPolicy().with('slack'));
    const outcome = await injector.inject('second');

    expect(backend.sent.join('')).toBe('first');
    expect(outcome).toEqual({ kind: 'skipped', app: 'Slack' });
  });

  it('types when the foreground application cannot be determined', async () => {
    const backend = new FakeKeystrokeBackend(new Error('System Events unavailable'));
    const { injector } = createInjector(backend);

    const outcome = await injector.inject('go');

    expect(outcome).toEqual({ kind: 'typed', characters: 2 });
  });

  it('treats empty text as a no-op', async () => {
    const backend = new FakeKeystrokeBackend();
    const { injector, sleeps } = createInjector(backend);

    await expect(injector.inject('   ')).resolves.toEqual({ kind: 'typed', characters: 0 });
    expect(backend.frontmostQueries).toBe(0);
    expect(sleeps).toEqual([]);
  });

  it('wraps backend failures in InjectionError', async () => {
    const backend = new FakeKeystrokeBackend();
    backend.failOnCharacter = 'b';
    const { injector } = createInjector(backend);

    const error = await injector.inject('ab').catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(InjectionError);
    expect(backend.sent).toEqual(['a']);
  });
});

describe('createKeystrokeBackend', () => {
  const recordingRunner = () => {
    const calls: Array<{ command: string; args: string[] }> = [];
    const runner: CommandRunner = async (command, args) => {
      calls.push({ command, args });
      return { stdout: 'Terminal\n', stderr: '' };
    };
    return { calls, runner };
  };

  it('drives osascript on macOS', async () => {
    const { calls, runner } = recordingRunner();
    const backend = createKeystrokeBackend('auto', 'darwin', runner);

    await expect(backend.frontmostApplication()).resolves.toBe('Terminal');
    await backend.typeCharacter('"');
    await backend.pressKey('return');

    expect(backend.name).toBe('osascript');
    expect(calls[1].args.slice(-2)).toEqual(['--', '"']);
    expect(calls[2].args).toEqual(['-e', 'tell application "System Events" to key code 36']);
  });

  it('drives xdotool elsewhere', async () => {
    const { calls, runner } = recordingRunner();
    const backend = createKeystrokeBackend('auto', 'linux', runner);

    await backend.typeCharacter('-');
    await backend.pressKey('tab');

    expect(backend.name).toBe('xdotool');
    expect(calls).toEqual([
      { command: 'xdotool', args: ['type', '--delay', '0', '--', '-'] },
      { command: 'xdotool', args: ['key', 'Tab'] }
    ]);
  });
});
