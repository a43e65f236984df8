import { StageTimeoutError } from '../errors';

/**
 * Settles with `promise` or rejects with `StageTimeoutError` after `timeoutMs`.
 * The wrapped work is not cancelled; a late result is dropped.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timeoutHandle = setTimeout(() => {
      reject(new StageTimeoutError(label, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timeoutHandle);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeoutHandle);
        reject(error);
      }
    );
  });
