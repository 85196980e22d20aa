import type { CancellationToken } from '../../shared/utils/cancellation';

/**
 * AbortSignal tied to a cancellation token, so canceling the session aborts
 * the in-flight HTTP request. Call `dispose` once the request settles.
 */
export function signalFromToken(token: CancellationToken | undefined): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  const dispose = token ? token.onCanceled(() => controller.abort()) : () => undefined;
  return { signal: controller.signal, dispose };
}
