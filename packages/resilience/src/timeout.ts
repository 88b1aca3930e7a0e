/**
 * Error thrown when an operation exceeds its time budget
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run an operation with a time budget
 *
 * The operation receives an AbortSignal that fires when the budget runs out,
 * so cooperative work can stop early. The returned promise rejects with
 * TimeoutError as soon as the budget is exceeded, whether or not the
 * operation honours the signal. Work that blocks the event loop keeps the
 * timer from firing; a value that arrives after the budget has run out is
 * still rejected as a timeout.
 *
 * @param fn - Operation to run
 * @param timeoutMs - Budget in milliseconds
 * @param label - Name used in the timeout message
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label = 'operation',
): Promise<T> {
  const controller = new AbortController();
  const started = Date.now();

  return new Promise<T>((resolve, reject) => {
    const expire = (): void => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    };
    const timer = setTimeout(expire, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        if (Date.now() - started > timeoutMs) {
          expire();
          return;
        }
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/**
 * Check whether an error is a timeout
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}
