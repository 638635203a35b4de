import type { DelayFn } from "./ports/timer.js";

/**
 * Wait for `ms` through `delay`, returning early when the signal aborts.
 * Callers check `signal.aborted` afterwards to tell the two apart.
 */
export async function abortableDelay(
  delay: DelayFn,
  ms: number,
  signal?: AbortSignal
): Promise<void> {
  if (!signal) {
    await delay(ms);
    return;
  }
  if (signal.aborted) return;

  let onAbort: () => void = () => {};
  const aborted = new Promise<void>((resolve) => {
    onAbort = resolve;
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    await Promise.race([delay(ms), aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}
