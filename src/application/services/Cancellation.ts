import { TaskCancelledError } from '../../domain/errors/AppErrors';

/**
 * Throws TaskCancelledError when the signal has fired.
 */
export function ensureNotCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new TaskCancelledError();
  }
}

/**
 * Waits `ms`, rejecting with TaskCancelledError as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new TaskCancelledError());
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new TaskCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races a promise against a deadline. The underlying work is not stopped;
 * callers pass a derived signal when it must be.
 */
export async function withDeadline<T>(work: Promise<T>, ms: number, onTimeout: () => T): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<T>(resolve => {
    timer = setTimeout(() => resolve(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface Deadline {
  signal: AbortSignal;
  /** Clears the timer and detaches from the parent */
  dispose(): void;
}

/**
 * A signal that fires when the parent fires or after `ms`.
 */
export function createDeadline(ms: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort();
  const timer = setTimeout(() => controller.abort(), ms);
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
