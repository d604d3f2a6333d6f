/**
 * Timeout Guard
 * Prevent operations from hanging indefinitely
 *
 * Wraps promises with timeout and abort protection so a pipeline stage
 * stays bounded even when an external store is slow
 */

export class TimeoutError extends Error {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class OperationAbortedError extends Error {
  constructor(public operation: string, public reason?: string) {
    super(`${operation} aborted${reason ? `: ${reason}` : ''}`);
    this.name = 'OperationAbortedError';
  }
}

/**
 * Wrap a promise with a timeout
 *
 * If the promise doesn't resolve within timeoutMs,
 * optionally calls onTimeout then rejects with TimeoutError
 *
 * @param operation - Name of operation (for error messages)
 * @param onTimeout - Optional callback when timeout triggers (e.g. () => controller.abort('reason'))
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });
  return Promise.race([promise, timeoutPromise]).finally(() => clearTimeout(timeoutId));
}

/**
 * Race a promise against an AbortSignal
 *
 * The underlying work is not rolled back; its late result is simply dropped.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operation: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // Keep the dropped promise from surfacing as unhandled
    promise.catch(() => undefined);
    return Promise.reject(new OperationAbortedError(operation, abortReason(signal)));
  }

  let onAbort: (() => void) | undefined;
  const abortPromise = new Promise<never>((_, reject) => {
    onAbort = () => reject(new OperationAbortedError(operation, abortReason(signal)));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([promise, abortPromise]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}

/**
 * Milliseconds left until deadlineAt (never negative)
 */
export function remainingMs(deadlineAt: number, now: number = Date.now()): number {
  return Math.max(0, deadlineAt - now);
}

/**
 * Check if error is a timeout error
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError || (error instanceof Error && error.name === 'TimeoutError');
}

export function isAbortError(error: unknown): error is OperationAbortedError {
  return error instanceof OperationAbortedError ||
    (error instanceof Error && (error.name === 'OperationAbortedError' || error.name === 'AbortError'));
}

function abortReason(signal: AbortSignal): string | undefined {
  const reason: unknown = signal.reason;
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return undefined;
}
