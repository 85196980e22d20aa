// Cooperative cancellation for the voice-turn pipeline.
//
// A session owns one CancellationSource; aborting the session cancels its
// token, and every suspension point (listening, transcription, synthesis,
// engine search) observes it through raceWithCancellation or onCanceled.

export type CancellationReason = unknown;

export interface CancellationToken {
  readonly isCanceled: boolean;
  readonly reason: CancellationReason | undefined;
  /** Throws an Error carrying `cancellationReason` when canceled. */
  throwIfCanceled(context?: string): void;
  /**
   * Registers a listener fired once on cancellation (immediately when the
   * token is already canceled). Returns an unsubscribe function.
   */
  onCanceled(listener: (reason: CancellationReason) => void): () => void;
}

export interface CancellationSource {
  readonly token: CancellationToken;
  /** Idempotent; the first reason wins. */
  cancel(reason?: CancellationReason): void;
}

export interface CanceledError extends Error {
  cancellationReason: CancellationReason;
}

export function createCanceledError(reason: CancellationReason, context?: string): CanceledError {
  const message = context ? `Operation canceled (${context})` : 'Operation canceled';
  return Object.assign(new Error(message), { cancellationReason: reason });
}

export function isCanceledError(error: unknown): error is CanceledError {
  return error instanceof Error && 'cancellationReason' in error;
}

export function createCancellationSource(): CancellationSource {
  let canceled = false;
  let reason: CancellationReason | undefined;
  const listeners = new Set<(reason: CancellationReason) => void>();

  const token: CancellationToken = {
    get isCanceled() {
      return canceled;
    },
    get reason() {
      return reason;
    },
    throwIfCanceled(context?: string) {
      if (canceled) {
        throw createCanceledError(reason, context);
      }
    },
    onCanceled(listener) {
      if (canceled) {
        listener(reason);
        return () => undefined;
      }
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  return {
    token,
    cancel(nextReason?: CancellationReason) {
      if (canceled) return;
      canceled = true;
      reason = nextReason;
      const pending = Array.from(listeners);
      listeners.clear();
      for (const listener of pending) {
        listener(nextReason);
      }
    },
  };
}

/**
 * Await `promise`, or reject with a CanceledError as soon as `token` is
 * canceled. An abandoned promise keeps running; its eventual outcome is
 * handed to `onDiscarded` and otherwise ignored.
 */
export function raceWithCancellation<T>(
  promise: Promise<T>,
  token: CancellationToken | undefined,
  onDiscarded?: (outcome: { value?: T; error?: unknown }) => void
): Promise<T> {
  if (!token) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const unsubscribe = token.onCanceled((reason) => {
      if (settled) return;
      settled = true;
      reject(createCanceledError(reason));
    });

    promise.then(
      (value) => {
        unsubscribe();
        if (settled) {
          onDiscarded?.({ value });
          return;
        }
        settled = true;
        resolve(value);
      },
      (error: unknown) => {
        unsubscribe();
        if (settled) {
          onDiscarded?.({ error });
          return;
        }
        settled = true;
        reject(error);
      }
    );
  });
}
