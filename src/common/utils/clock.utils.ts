/**
 * Epoch-aligned milliseconds from the monotonic clock.
 * Unlike Date.now() this never steps backwards when the system clock is adjusted.
 */
export function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}
