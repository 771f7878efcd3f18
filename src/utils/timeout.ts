import { DeadlineExceededError } from './errors';

/**
 * Operation that can be cancelled through the signal it is handed
 */
export type CancellableOperation<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Race an operation against a hard deadline.
 *
 * Whichever settles first wins. If the deadline wins, the operation's
 * signal is aborted with the DeadlineExceededError so in-flight work
 * (e.g. an axios request) is torn down, and whatever it produces later
 * is dropped. If the operation wins, the timer is cleared.
 */
export async function withDeadline<T>(
  operation: CancellableOperation<T>,
  timeoutMs: number,
  label = 'operation'
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Sleep that stops early (rejecting) when the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
