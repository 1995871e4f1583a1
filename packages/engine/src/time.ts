/**
 * Fixed-interval tick arithmetic. Times are milliseconds on one clock;
 * tick `n` covers `[t0 + n * interval, t0 + (n + 1) * interval)`.
 */

function assertInterval(intervalMs: number): void {
  if (!(intervalMs > 0)) {
    throw new RangeError(`Tick interval must be positive, got ${intervalMs}.`);
  }
}

/**
 * Tick containing `nowMs`: floor((now - t0) / interval), or -1 before `t0Ms`.
 */
export function getCurrentTick(
  nowMs: number,
  t0Ms: number,
  intervalMs: number,
): number {
  assertInterval(intervalMs);
  if (nowMs < t0Ms) return -1;
  return Math.floor((nowMs - t0Ms) / intervalMs);
}

/** Time at which `tick` ends and the next one begins. */
export function getTickDeadline(
  tick: number,
  t0Ms: number,
  intervalMs: number,
): number {
  assertInterval(intervalMs);
  return t0Ms + (tick + 1) * intervalMs;
}

export function getTickStartTime(
  tick: number,
  t0Ms: number,
  intervalMs: number,
): number {
  assertInterval(intervalMs);
  return t0Ms + tick * intervalMs;
}
