import { InjectionError, describeError } from '../../errors';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { AutoTypeMode, InjectionOutcome } from '../../types';
import type { ExclusionPolicy } from './ExclusionPolicy';
import type { KeystrokeBackend } from './keystrokeBackends';

export interface TextInjectorOptions {
  backend: KeystrokeBackend;
  policy: ExclusionPolicy;
  delayMs: number;
  charDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: StructuredLogger;
}

export interface InjectOptions {
  /** Type a space before the text, separating it from a previous variant. */
  leadingSpace?: boolean;
}

export interface TypedText {
  variant: 'raw' | 'corrected';
  text: string;
  leadingSpace: boolean;
}

const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return;
  }

  await new Promise((resolve) => setTimeout(resolve, ms));
};

/** Trims and closes sentences of more than two words with a period. */
export const prepareTypedText = (text: string): string => {
  const trimmed = text.trim();
  if (!trimmed || /[.!?]$/.test(trimmed)) {
    return trimmed;
  }

  return trimmed.split(/\s+/).length > 2 ? `${trimmed}.` : trimmed;
};

/** Which texts to type, in order, for an auto-type mode. */
export const selectTypedTexts = (mode: AutoTypeMode, raw: string, corrected: string | null): TypedText[] => {
  if (mode === 'raw') {
    return [{ variant: 'raw', text: raw, leadingSpace: false }];
  }

  if (mode === 'corrected') {
    return corrected === null
      ? [{ variant: 'raw', text: raw, leadingSpace: false }]
      : [{ variant: 'corrected', text: corrected, leadingSpace: false }];
  }

  const texts: TypedText[] = [{ variant: 'raw', text: raw, leadingSpace: false }];
  if (corrected !== null && corrected.trim() !== raw.trim()) {
    texts.push({ variant: 'corrected', text: corrected, leadingSpace: true });
  }

  return texts;
};

export class TextInjector {
  private policy: ExclusionPolicy;
  private readonly sleep: (ms: number) => Promise<void>;

  public constructor(private readonly options: TextInjectorOptions) {
    this.policy = options.policy;
    this.sleep = options.sleep ?? sleep;
  }

  public getExclusionPolicy(): ExclusionPolicy {
    return this.policy;
  }

  /** Takes effect from the next `inject` call; a run in progress keeps its policy. */
  public setExclusionPolicy(policy: ExclusionPolicy): void {
    this.policy = policy;
  }

  public async inject(text: string, options: InjectOptions = {}): Promise<InjectionOutcome> {
    const prepared = prepareTypedText(text);
    if (!prepared) {
      return { kind: 'typed', characters: 0 };
    }

    const policy = this.policy;
    await this.sleep(this.options.delayMs);

    const app = await this.frontmostApplication();
    if (app !== undefined) {
      const matched = policy.matches(app);
      if (matched !== undefined) {
        this.options.logger?.info('Auto-typing blocked in excluded application', { app, matched });
        return { kind: 'skipped', app };
      }
    }

    const payload = options.leadingSpace ? ` ${prepared}` : prepared;
    const characters = Array.from(payload);

    try {
      for (let index = 0; index < characters.length; index += 1) {
        if (index > 0) {
          await this.sleep(this.options.charDelayMs);
        }

        await this.typeOne(characters[index]);
      }
    } catch (error) {
      throw new InjectionError(describeError(error), error);
    }

    this.options.logger?.info('Auto-typing finished', {
      backend: this.options.backend.name,
      app,
      characters: characters.length
    });

    return { kind: 'typed', characters: characters.length };
  }

  private async frontmostApplication(): Promise<string | undefined> {
    try {
      return await this.options.backend.frontmostApplication();
    } catch (error) {
      this.options.logger?.warn('Could not determine the foreground application; typing anyway', {
        detail: describeError(error)
      });
      return undefined;
    }
  }

  private async typeOne(character: string): Promise<void> {
    if (character === '\n') {
      await this.options.backend.pressKey('return');
      return;
    }

    if (character === '\t') {
      await this.options.backend.pressKey('tab');
      return;
    }

    await this.options.backend.typeCharacter(character);
  }
}
