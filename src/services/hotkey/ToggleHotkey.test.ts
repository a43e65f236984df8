import type { IGlobalKeyListener } from 'node-global-key-listener';
import { describe, expect, it } from 'vitest';
import { ToggleHotkey, parseHotkey, type KeyEventSource } from './ToggleHotkey';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

class FakeKeySource implements KeyEventSource {
  public readonly listeners: IGlobalKeyListener[] = [];
  public killed = false;

  public async addListener(listener: IGlobalKeyListener): Promise<void> {
    this.listeners.push(listener);
  }

  public removeListener(listener: IGlobalKeyListener): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  public kill(): void {
    this.killed = true;
  }
}

const createHotkey = (accelerator = 'F9', debounceMs = 40) => {
  let clock = 1000;
  let toggles = 0;
  const hotkey = new ToggleHotkey({
    accelerator,
    debounceMs,
    onToggle: () => {
      toggles += 1;
    },
    now: () => clock
  });
  return {
    hotkey,
    advance: (ms: number) => {
      clock += ms;
    },
    toggles: () => toggles
  };
};

describe('parseHotkey', () => {
  it('accepts a bare function key', () => {
    expect(parseHotkey('F9')).toEqual({ source: 'F9', triggerKey: 'F9', requiredModifierGroups: [] });
  });

  it('maps modifier aliases to both sides of the keyboard', () => {
    const parsed = parseHotkey('Ctrl+Shift+Space');

    expect(parsed.triggerKey).toBe('SPACE');
    expect(parsed.requiredModifierGroups).toEqual([
      ['LEFT CTRL', 'RIGHT CTRL'],
      ['LEFT SHIFT', 'RIGHT SHIFT']
    ]);
  });

  it('rejects two trigger keys and unknown tokens', () => {
    expect(() => parseHotkey('A+B')).toThrow('Hotkey must define exactly one non-modifier key: A+B');
    expect(() => parseHotkey('Ctrl+Hyper')).toThrow("Unsupported hotkey token 'Hyper' in Ctrl+Hyper");
    expect(() => parseHotkey('Ctrl')).toThrow('Hotkey missing a trigger key: Ctrl');
  });
});

describe('ToggleHotkey', () => {
  it('fires once per press and latches key repeat', async () => {
    const { hotkey, toggles } = createHotkey();

    expect(hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true })).toBe(true);
    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    await flush();

    expect(toggles()).toBe(1);
  });

  it('fires again after release', async () => {
    const { hotkey, advance, toggles } = createHotkey();

    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    advance(300);
    hotkey.handleKeyEvent({ name: 'F9', state: 'UP' }, {});
    advance(300);
    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    await flush();

    expect(toggles()).toBe(2);
  });

  it('drops a second press inside the debounce window', async () => {
    const { hotkey, advance, toggles } = createHotkey('F9', 40);

    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    advance(5);
    hotkey.handleKeyEvent({ name: 'F9', state: 'UP' }, {});
    advance(10);
    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    await flush();

    expect(toggles()).toBe(1);
  });

  it('requires the modifiers to be held', async () => {
    const { hotkey, toggles } = createHotkey('Ctrl+Space');

    expect(hotkey.handleKeyEvent({ name: 'SPACE', state: 'DOWN' }, { SPACE: true })).toBe(false);
    expect(
      hotkey.handleKeyEvent({ name: 'SPACE', state: 'DOWN' }, { SPACE: true, 'RIGHT CTRL': true })
    ).toBe(true);
    await flush();

    expect(toggles()).toBe(1);
  });

  it('ignores other keys', async () => {
    const { hotkey, toggles } = createHotkey();

    expect(hotkey.handleKeyEvent({ name: 'A', state: 'DOWN' }, { A: true })).toBe(false);
    await flush();

    expect(toggles()).toBe(0);
  });

  it('keeps listening when the callback rejects', async () => {
    let calls = 0;
    const hotkey = new ToggleHotkey({
      accelerator: 'F9',
      debounceMs: 0,
      onToggle: async () => {
        calls += 1;
        throw new Error('boom');
      }
    });

    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    hotkey.handleKeyEvent({ name: 'F9', state: 'UP' }, {});
    hotkey.handleKeyEvent({ name: 'F9', state: 'DOWN' }, { F9: true });
    await flush();

    expect(calls).toBe(2);
  });

  it('subscribes on start and releases the source on stop', async () => {
    const source = new FakeKeySource();
    const hotkey = new ToggleHotkey({
      accelerator: 'F9',
      debounceMs: 40,
      onToggle: () => undefined,
      createSource: () => source
    });

    await hotkey.start();
    await hotkey.start();
    expect(source.listeners).toHaveLength(1);

    hotkey.stop();
    expect(source.listeners).toHaveLength(0);
    expect(source.killed).toBe(true);
  });
});
