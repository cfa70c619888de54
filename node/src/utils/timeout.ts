// Deadline + cancellation for calls into external services.
import { TimeoutError } from '@/services/errors';

export interface DeadlineOptions {
  timeoutMs: number;
  label: string;
  /** Caller's signal; aborting it aborts the task's signal too. */
  signal?: AbortSignal;
}

/**
 * Runs `task` with its own AbortSignal that fires when the deadline passes or
 * the caller aborts. Rejects as soon as either happens, even if the task
 * ignores its signal.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, label, signal }: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      controller.abort(signal?.reason);
      cleanup();
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      cleanup();
      reject(err);
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onParentAbort);
    };
    signal?.addEventListener('abort', onParentAbort, { once: true });

    // A synchronous throw from `task` becomes a rejection, so cleanup still runs.
    new Promise<T>((start) => start(task(controller.signal))).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}
