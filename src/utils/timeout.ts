import { TimeoutError, RouteCancelledError } from '../router/router.errors.js';

/**
 * Run an external call under its own deadline, chained to the caller's signal.
 *
 * The task receives a signal that aborts on timeout or when the parent
 * aborts. The returned promise settles as soon as either happens, even if
 * the task itself ignores the signal (pg queries do).
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(operation, timeoutMs)),
    timeoutMs
  );
  const onParentAbort = () => controller.abort(new RouteCancelledError(operation));

  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  try {
    return await new Promise<T>((resolve, reject) => {
      const { signal } = controller;
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      task(signal).then(resolve, reject);
    });
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
