/*
Fixed-interval schedule helpers. Times are monotonic milliseconds.
The schedule is anchored at the first wake time; wakeups stay on that grid
no matter how long a cycle took.
*/

/**
 * Advances `wakeAt` by whole intervals until it is no earlier than `now`.
 * Missed slots are skipped, so a long pause yields at most one immediate cycle.
 */
export function alignWakeTime(wakeAt: number, now: number, intervalMs: number): number {
  if (intervalMs <= 0) {
    throw new RangeError(`intervalMs must be positive (got ${intervalMs})`);
  }
  if (wakeAt >= now) return wakeAt;

  const missed = Math.ceil((now - wakeAt) / intervalMs);
  return wakeAt + missed * intervalMs;
}

/** Initial offset of target `index` so `targetCount` targets spread evenly over one interval. */
export function staggerOffsetMs(index: number, targetCount: number, intervalMs: number): number {
  if (targetCount <= 0) return 0;
  return (index * intervalMs) / targetCount;
}
