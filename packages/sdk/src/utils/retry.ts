/**
 * Backoff and sleep helpers for the request executor
 */

import { DEFAULT_CONFIG } from '../core/constants'
import { RequestAbortedError } from './error'

/**
 * Exponential backoff delay in milliseconds for a zero-based attempt.
 *
 * A positive server hint (seconds) raises the base delay when it is larger
 * than `baseDelayMs`. Jitter adds up to a quarter of the delay on top. The
 * result never exceeds `maxDelayMs`.
 *
 * @example
 * ```ts
 * calculateBackoffDelay(2, undefined, 1000) // between 4000 and 5000
 * calculateBackoffDelay(0, 5, 1000)         // between 5000 and 6250
 * ```
 */
export function calculateBackoffDelay(
  attempt: number,
  retryAfterSeconds: number | undefined,
  baseDelayMs: number,
  random: () => number = Math.random,
  maxDelayMs: number = DEFAULT_CONFIG.HTTP_CLIENT.MAX_DELAY
): number {
  const hintMs = retryAfterSeconds !== undefined && retryAfterSeconds > 0 ? retryAfterSeconds * 1000 : 0
  const base = Math.max(baseDelayMs, hintMs)
  const delay = base * 2 ** attempt
  const jitter = random() * DEFAULT_CONFIG.BACKOFF_JITTER_RATIO * delay
  return Math.min(delay + jitter, maxDelayMs)
}

// setTimeout fires at once for anything above this
const MAX_TIMER_DELAY = 2 ** 31 - 1

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Resolve after `ms` milliseconds, or reject with RequestAbortedError as soon
 * as `signal` fires.
 */
export const sleep: SleepFn = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestAbortedError('Request was aborted during backoff', signal.reason))
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new RequestAbortedError('Request was aborted during backoff', signal?.reason))
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, Math.min(ms, MAX_TIMER_DELAY))

    signal?.addEventListener('abort', onAbort, { once: true })
  })

/**
 * Combine several optional signals into one that aborts when any of them does.
 * Returns a cleanup function that detaches the listeners.
 */
export function combineSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal
  cleanup: () => void
} {
  const controller = new AbortController()
  const listeners: Array<[AbortSignal, () => void]> = []

  for (const source of signals) {
    if (!source) {
      continue
    }
    if (source.aborted) {
      controller.abort(source.reason)
      break
    }
    const onAbort = () => controller.abort(source.reason)
    source.addEventListener('abort', onAbort, { once: true })
    listeners.push([source, onAbort])
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const [source, onAbort] of listeners) {
        source.removeEventListener('abort', onAbort)
      }
    },
  }
}
