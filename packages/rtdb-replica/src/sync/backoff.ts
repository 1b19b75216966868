/**
 * @file Backoff
 *
 * Exponential backoff with jitter, shared by the in-session reconnect loop
 * and the supervisor.
 *
 * @module rtdb-replica/sync/backoff
 */

/**
 * Backoff parameters.
 */
export interface BackoffPolicy {
  /** Delay before the first retry */
  baseDelayMs: number
  /** Upper bound for any single delay */
  maxDelayMs: number
  /**
   * Fraction of the delay used as symmetric random jitter
   * (0.1 means ±5%).
   * @default 0
   */
  jitterFactor?: number
}

/** Exponent cap; keeps `2^attempt` finite for any attempt count */
const MAX_EXPONENT = 30

/**
 * Computes the delay before retry number `attempt` (0-based):
 * `baseDelayMs * 2^attempt`, jittered, capped at `maxDelayMs`.
 *
 * @param random - Source of randomness in [0, 1)
 *
 * @example
 * ```typescript
 * const policy = { baseDelayMs: 1000, maxDelayMs: 30000 }
 * calculateDelay(0, policy) // 1000
 * calculateDelay(3, policy) // 8000
 * calculateDelay(9, policy) // 30000
 * ```
 */
export function calculateDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  let delay = policy.baseDelayMs * Math.pow(2, Math.min(attempt, MAX_EXPONENT))

  const jitterFactor = policy.jitterFactor ?? 0
  if (jitterFactor > 0) {
    const jitter = delay * jitterFactor
    delay = delay - jitter / 2 + random() * jitter
  }

  return Math.max(0, Math.min(delay, policy.maxDelayMs))
}

/**
 * Waits `ms` milliseconds, or until `signal` aborts.
 *
 * @returns `true` if the full delay elapsed, `false` if aborted
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false)
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
