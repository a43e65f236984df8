import {
  GlobalKeyboardListener,
  type IGlobalKey,
  type IGlobalKeyEvent,
  type IGlobalKeyListener
} from 'node-global-key-listener';
import type { StructuredLogger } from '../../logging/StructuredLogger';

export interface ParsedHotkey {
  source: string;
  triggerKey: IGlobalKey;
  requiredModifierGroups: IGlobalKey[][];
}

export type KeyDownMap = Partial<Record<IGlobalKey, boolean>>;

/** The part of `GlobalKeyboardListener` the hotkey uses. */
export interface KeyEventSource {
  addListener(listener: IGlobalKeyListener): Promise<void>;
  removeListener(listener: IGlobalKeyListener): void;
  kill(): void;
}

export interface ToggleHotkeyOptions {
  accelerator: string;
  debounceMs: number;
  onToggle: () => Promise<void> | void;
  createSource?: () => KeyEventSource;
  now?: () => number;
  logger?: StructuredLogger;
}

const MODIFIER_ALIASES: Record<string, IGlobalKey[]> = {
  command: ['LEFT META', 'RIGHT META'],
  cmd: ['LEFT META', 'RIGHT META'],
  meta: ['LEFT META', 'RIGHT META'],
  super: ['LEFT META', 'RIGHT META'],
  control: ['LEFT CTRL', 'RIGHT CTRL'],
  ctrl: ['LEFT CTRL', 'RIGHT CTRL'],
  shift: ['LEFT SHIFT', 'RIGHT SHIFT'],
  alt: ['LEFT ALT', 'RIGHT ALT'],
  option: ['LEFT ALT', 'RIGHT ALT'],
  commandorcontrol: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL'],
  cmdorctrl: ['LEFT META', 'RIGHT META', 'LEFT CTRL', 'RIGHT CTRL']
};

const SPECIAL_KEY_ALIASES: Record<string, IGlobalKey> = {
  space: 'SPACE',
  enter: 'RETURN',
  return: 'RETURN',
  tab: 'TAB',
  escape: 'ESCAPE',
  esc: 'ESCAPE',
  backspace: 'BACKSPACE',
  delete: 'DELETE',
  home: 'HOME',
  end: 'END',
  pageup: 'PAGE UP',
  pagedown: 'PAGE DOWN'
};

const normalizeMainKeyToken = (token: string): IGlobalKey | undefined => {
  const trimmed = token.trim();
  if (/^[a-z]$/i.test(trimmed)) {
    return trimmed.toUpperCase() as IGlobalKey;
  }

  if (/^[0-9]$/.test(trimmed)) {
    return trimmed as IGlobalKey;
  }

  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(trimmed)) {
    return trimmed.toUpperCase() as IGlobalKey;
  }

  return undefined;
};

/** Parses `F9`, `Ctrl+Space` or `CommandOrControl+Shift+D`. Modifiers are optional. */
export const parseHotkey = (accelerator: string): ParsedHotkey => {
  const tokens = accelerator
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);

  if (tokens.length === 0) {
    throw new Error('Hotkey is empty');
  }

  const modifierGroups: IGlobalKey[][] = [];
  let trigger: IGlobalKey | undefined;

  for (const token of tokens) {
    const normalized = token.toLowerCase();
    const modifierGroup = MODIFIER_ALIASES[normalized];
    if (modifierGroup) {
      modifierGroups.push(modifierGroup);
      continue;
    }

    const candidate = SPECIAL_KEY_ALIASES[normalized] ?? normalizeMainKeyToken(token);
    if (!candidate) {
      throw new Error(`Unsupported hotkey token '${token}' in ${accelerator}`);
    }

    if (trigger) {
      throw new Error(`Hotkey must define exactly one non-modifier key: ${accelerator}`);
    }

    trigger = candidate;
  }

  if (!trigger) {
    throw new Error(`Hotkey missing a trigger key: ${accelerator}`);
  }

  return {
    source: accelerator,
    triggerKey: trigger,
    requiredModifierGroups: modifierGroups
  };
};

const hasAnyKeyDown = (down: KeyDownMap, keys: IGlobalKey[]): boolean => keys.some((key) => down[key]);

/**
 * One global key combination mapped to a toggle callback. Holding the key
 * fires once; a press within `debounceMs` of the previous toggle is dropped.
 */
export class ToggleHotkey {
  private readonly parsedHotkey: ParsedHotkey;
  private readonly handler: IGlobalKeyListener;
  private readonly now: () => number;
  private source: KeyEventSource | undefined;
  private latched = false;
  private lastToggleAt: number | undefined;

  public constructor(private readonly options: ToggleHotkeyOptions) {
    this.parsedHotkey = parseHotkey(options.accelerator);
    this.now = options.now ?? Date.now;
    this.handler = (event, down) => this.handleKeyEvent(event, down);
  }

  public describeBinding(): string {
    return this.parsedHotkey.source;
  }

  public async start(): Promise<void> {
    if (this.source) {
      return;
    }

    const source: KeyEventSource = this.options.createSource?.() ?? new GlobalKeyboardListener();
    await source.addListener(this.handler);
    this.source = source;
    this.options.logger?.info('Toggle hotkey listener started', {
      hotkey: this.describeBinding()
    });
  }

  public stop(): void {
    const source = this.source;
    if (!source) {
      return;
    }

    source.removeListener(this.handler);
    source.kill();
    this.source = undefined;
    this.latched = false;

    this.options.logger?.info('Toggle hotkey listener stopped');
  }

  /** Returns true when the event belongs to the hotkey and should be swallowed. */
  public handleKeyEvent(event: Pick<IGlobalKeyEvent, 'name' | 'state'>, down: KeyDownMap): boolean {
    if (event.name !== this.parsedHotkey.triggerKey) {
      return false;
    }

    if (event.state === 'UP') {
      const wasLatched = this.latched;
      this.latched = false;
      return wasLatched;
    }

    if (!this.areModifiersHeld(down)) {
      return false;
    }

    if (this.latched) {
      return true;
    }

    this.latched = true;
    const at = this.now();
    if (this.lastToggleAt !== undefined && at - this.lastToggleAt < this.options.debounceMs) {
      this.options.logger?.debug('Toggle hotkey press debounced', {
        sinceLastMs: at - this.lastToggleAt
      });
      return true;
    }

    this.lastToggleAt = at;
    this.invokeSafely();
    return true;
  }

  private areModifiersHeld(down: KeyDownMap): boolean {
    return this.parsedHotkey.requiredModifierGroups.every((group) => hasAnyKeyDown(down, group));
  }

  private invokeSafely(): void {
    Promise.resolve()
      .then(() => this.options.onToggle())
      .catch((error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.options.logger?.error('Toggle hotkey callback failed', {
          detail
        });
      });
  }
}
