import { afterEach, describe, expect, it, vi } from 'vitest'
import { RequestAbortedError } from '../src/utils/error'
import { calculateBackoffDelay, combineSignals, sleep } from '../src/utils/retry'

describe('calculateBackoffDelay', () => {
  it('should double the base delay per attempt without jitter', () => {
    expect(calculateBackoffDelay(0, undefined, 1000, () => 0)).toBe(1000)
    expect(calculateBackoffDelay(1, undefined, 1000, () => 0)).toBe(2000)
    expect(calculateBackoffDelay(2, undefined, 1000, () => 0)).toBe(4000)
  })

  it('should add at most a quarter of the delay as jitter', () => {
    expect(calculateBackoffDelay(2, undefined, 1000, () => 0.5)).toBe(4500)
    expect(calculateBackoffDelay(2, undefined, 1000, () => 0.999)).toBeLessThan(5000)
  })

  it('should stay within [d*2^a, d*2^a*1.25) for random jitter', () => {
    for (let attempt = 0; attempt < 6; attempt++) {
      for (let i = 0; i < 20; i++) {
        const delay = calculateBackoffDelay(attempt, undefined, 250)
        const floor = 250 * 2 ** attempt
        expect(delay).toBeGreaterThanOrEqual(floor)
        expect(delay).toBeLessThan(floor * 1.25)
      }
    }
  })

  it('should use a larger server hint as the base', () => {
    expect(calculateBackoffDelay(0, 5, 1000, () => 0)).toBe(5000)
    expect(calculateBackoffDelay(1, 5, 1000, () => 0)).toBe(10000)
  })

  it('should keep the configured base when the hint is smaller', () => {
    expect(calculateBackoffDelay(1, 0.5, 1000, () => 0)).toBe(2000)
  })

  it('should ignore zero and negative hints', () => {
    expect(calculateBackoffDelay(0, 0, 1000, () => 0)).toBe(1000)
    expect(calculateBackoffDelay(0, -3, 1000, () => 0)).toBe(1000)
  })

  it('should cap the delay at five minutes', () => {
    expect(calculateBackoffDelay(22, undefined, 1000, () => 0)).toBe(300000)
    expect(calculateBackoffDelay(3, 3600, 1000, () => 0.9)).toBe(300000)
    expect(calculateBackoffDelay(8, undefined, 1000, () => 0)).toBe(256000)
  })

  it('should take an explicit cap', () => {
    expect(calculateBackoffDelay(4, undefined, 1000, () => 0, 10000)).toBe(10000)
  })
})

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should resolve after the delay', async () => {
    vi.useFakeTimers()
    const done = vi.fn()
    const pending = sleep(1000).then(done)

    await vi.advanceTimersByTimeAsync(999)
    expect(done).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(1)
    await pending
    expect(done).toHaveBeenCalledOnce()
  })

  it('should not fire early for delays beyond the timer range', async () => {
    vi.useFakeTimers()
    const done = vi.fn()
    const pending = sleep(2 ** 32).then(done)

    await vi.advanceTimersByTimeAsync(1000)
    expect(done).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(2 ** 31)
    await pending
    expect(done).toHaveBeenCalledOnce()
  })

  it('should reject when the signal fires', async () => {
    vi.useFakeTimers()
    const controller = new AbortController()
    const pending = sleep(60000, controller.signal)

    controller.abort()

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError)
  })

  it('should reject at once for an aborted signal', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(sleep(60000, controller.signal)).rejects.toBeInstanceOf(RequestAbortedError)
  })
})

describe('combineSignals', () => {
  it('should abort when any source aborts', () => {
    const first = new AbortController()
    const second = new AbortController()
    const { signal } = combineSignals(first.signal, undefined, second.signal)

    expect(signal.aborted).toBe(false)
    second.abort('stop')

    expect(signal.aborted).toBe(true)
    expect(signal.reason).toBe('stop')
  })

  it('should start aborted when a source already is', () => {
    const source = new AbortController()
    source.abort()

    expect(combineSignals(source.signal).signal.aborted).toBe(true)
  })

  it('should stop following sources after cleanup', () => {
    const source = new AbortController()
    const { signal, cleanup } = combineSignals(source.signal)

    cleanup()
    source.abort()

    expect(signal.aborted).toBe(false)
  })
})
