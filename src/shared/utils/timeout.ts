// Timeout helpers for the pipeline's suspension points.
//
// Each remote call or device read is bounded by an explicit time budget and
// observes the session's cancellation token. The helpers report the outcome
// as a value instead of throwing for timeout and cancellation, so callers can
// map each outcome onto their own error taxonomy.

import {
  type CancellationReason,
  type CancellationToken,
  isCanceledError,
  raceWithCancellation,
} from './cancellation';

interface TimeoutMarkerError extends Error {
  isTimeout: true;
}

function isTimeoutMarker(error: unknown): error is TimeoutMarkerError {
  return error instanceof Error && 'isTimeout' in error && error.isTimeout === true;
}

export type TimedOperationOutcome = 'ok' | 'timeout' | 'canceled';

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number }
  | { kind: 'canceled'; durationMs: number; cancellationReason: CancellationReason };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Cancellation token; cancellation abandons the operation immediately. */
  token?: CancellationToken;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
  /** Receives the result of an operation that settled after it was abandoned. */
  onDiscarded?: (outcome: { value?: unknown; error?: unknown }) => void;
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout or cancellation.
 *
 * - A token that is already canceled returns `canceled` without starting the
 *   operation.
 * - Cancelling the token while the operation runs resolves to `canceled` at
 *   once; the operation's late result goes to `onDiscarded`.
 * - Errors carrying `cancellationReason` (from `throwIfCanceled`) map to
 *   `canceled`; every other error is rethrown.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, token, now = Date.now, onDiscarded } = options;
  const start = now();

  if (token?.isCanceled) {
    return { kind: 'canceled', durationMs: 0, cancellationReason: token.reason };
  }

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error: TimeoutMarkerError = Object.assign(
        new Error(`Timed operation exceeded ${timeoutMs}ms`),
        { isTimeout: true as const }
      );
      reject(error);
    }, timeoutMs);
  });

  const running = new Promise<T>((resolve) => resolve(operation()));

  try {
    const value = await raceWithCancellation(
      Promise.race([running, timeoutPromise]),
      token,
      onDiscarded
    );
    return { kind: 'ok', durationMs: now() - start, value };
  } catch (error) {
    const durationMs = now() - start;

    if (isTimeoutMarker(error)) {
      running.then(
        (value) => onDiscarded?.({ value }),
        (lateError: unknown) => onDiscarded?.({ error: lateError })
      );
      return { kind: 'timeout', durationMs };
    }

    if (isCanceledError(error)) {
      return { kind: 'canceled', durationMs, cancellationReason: error.cancellationReason };
    }

    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}
