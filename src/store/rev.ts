let lastRevTime = 0
let revCounter = 0

/**
 * Monotonically increasing sort key: time(base36) + per-millisecond counter.
 * Never goes backwards, even if the clock does.
 */
export function generateRev(nowMs: number = Date.now()): string {
  if (nowMs <= lastRevTime) {
    revCounter++
  } else {
    lastRevTime = nowMs
    revCounter = 0
  }
  return `${lastRevTime.toString(36).padStart(9, '0')}${revCounter.toString(36).padStart(4, '0')}`
}
