/**
 * Raised when a task does not settle before its deadline.
 */
export class DeadlineExceededError extends Error {
  public readonly name = 'DeadlineExceededError';

  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
  }
}

/**
 * Run `task` with a deadline.
 *
 * The task receives an AbortSignal that fires when the deadline passes or the
 * optional parent signal aborts. The returned promise rejects at that moment
 * even if the task ignores the signal.
 *
 * @param task - Work to bound; should forward the signal to its I/O
 * @param timeoutMs - Deadline in milliseconds
 * @param parentSignal - Caller cancellation, propagated to the task
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    throw parentSignal.reason;
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new DeadlineExceededError(timeoutMs)),
    timeoutMs,
  );
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(controller.signal.reason),
      { once: true },
    );
  });

  try {
    return await Promise.race([task(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
