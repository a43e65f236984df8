import { describe, expect, it } from 'vitest';
import { createShutdown } from './shutdown';

const createParts = () => {
  const steps: string[] = [];
  let releaseJournal: () => void = () => undefined;

  const parts = {
    stopInput: () => {
      steps.push('stop-input');
    },
    pipeline: {
      shutdown: async () => {
        steps.push('pipeline');
      }
    },
    outputs: [
      {
        flush: () =>
          new Promise<void>((resolve) => {
            releaseJournal = () => {
              steps.push('journal');
              resolve();
            };
          })
      },
      {
        flush: async () => {
          steps.push('clipboard');
        }
      }
    ],
    logger: {
      info: () => undefined,
      flush: async () => {
        steps.push('logger');
      }
    },
    exit: () => {
      steps.push('exit');
    }
  };

  return { parts, steps, releaseJournal: () => releaseJournal() };
};

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('createShutdown', () => {
  it('waits for queued output writes before flushing the log and exiting', async () => {
    const { parts, steps, releaseJournal } = createParts();
    const shutdown = createShutdown(parts);

    const done = shutdown();
    await flush();
    expect(steps).toEqual(['stop-input', 'pipeline', 'clipboard']);

    releaseJournal();
    await done;

    expect(steps).toEqual(['stop-input', 'pipeline', 'clipboard', 'journal', 'logger', 'exit']);
  });

  it('runs once however often it is triggered', async () => {
    const { parts, steps, releaseJournal } = createParts();
    const shutdown = createShutdown(parts);

    const first = shutdown();
    const second = shutdown();
    await flush();
    releaseJournal();
    await Promise.all([first, second]);

    expect(first).toBe(second);
    expect(steps.filter((step) => step === 'exit')).toHaveLength(1);
  });
});
