import { CancelledError, DeadlineExceededError } from '../provisioning/errors';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Resolve after `ms` milliseconds, or reject with a CancelledError as soon as
 * `signal` aborts.
 */
export const sleep: Sleeper = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Run `task` with a signal that aborts when `signal` aborts or `ms` elapses.
 * Settles with the task, or rejects with CancelledError or
 * DeadlineExceededError without waiting for a task that ignores its signal.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const controller = new AbortController();

    const settle = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    const onAbort = () => {
      settle();
      controller.abort();
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      settle();
      controller.abort();
      reject(new DeadlineExceededError(`deadline of ${ms} ms exceeded`));
    }, Math.max(ms, 0));

    signal?.addEventListener('abort', onAbort, { once: true });

    void task(controller.signal).then(
      value => {
        settle();
        resolve(value);
      },
      (error: unknown) => {
        settle();
        reject(error);
      }
    );
  });
}
