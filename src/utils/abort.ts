/**
 * Abort when either the per-call timeout fires or the caller cancels.
 * Call dispose() once the guarded operation settles.
 */
export function linkAbort(timeoutMs: number, external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onExternalAbort = () => controller.abort();
  if (external) {
    if (external.aborted) controller.abort();
    else external.addEventListener("abort", onExternalAbort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timeoutId);
      external?.removeEventListener("abort", onExternalAbort);
    },
  };
}
