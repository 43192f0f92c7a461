/**
 * A signal that aborts when the caller's signal does or after `ms`.
 */
export function withTimeout(signal: AbortSignal | undefined, ms: number): AbortSignal {
  const timeout = AbortSignal.timeout(ms);
  if (!signal) return timeout;

  const controller = new AbortController();
  const abort = () => controller.abort(signal.aborted ? signal.reason : timeout.reason);
  if (signal.aborted) {
    abort();
  } else {
    signal.addEventListener("abort", abort, { once: true });
    timeout.addEventListener("abort", abort, { once: true });
  }
  return controller.signal;
}
