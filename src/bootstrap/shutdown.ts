import type { StructuredLogger } from '../logging/StructuredLogger';

interface Flushable {
  flush: () => Promise<void>;
}

export interface ShutdownParts {
  /** Stops hotkey and console input so no new toggle arrives. */
  stopInput: () => void;
  pipeline: { shutdown: () => Promise<void> };
  /** Journal, clipboard and anything else with queued writes. */
  outputs: Flushable[];
  logger: Pick<StructuredLogger, 'info' | 'flush'>;
  exit: () => void;
}

/**
 * Builds the idempotent shutdown used by signals and `/quit`: input stops,
 * the in-flight job finishes, queued output and log writes land, then exit.
 */
export const createShutdown = (parts: ShutdownParts): (() => Promise<void>) => {
  let shuttingDown: Promise<void> | undefined;

  return () => {
    if (!shuttingDown) {
      shuttingDown = (async () => {
        parts.logger.info('hushtype shutting down');
        parts.stopInput();
        await parts.pipeline.shutdown();
        await Promise.all(parts.outputs.map((output) => output.flush()));
        await parts.logger.flush();
        parts.exit();
      })();
    }

    return shuttingDown;
  };
};
