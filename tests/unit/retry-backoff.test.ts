import { describe, it, expect, vi, afterEach } from 'vitest'
import { RetryBackoff } from '../../engine/services/RetryBackoff'

const CONFIG = { initialDelayMs: 1000, maxDelayMs: 5000, multiplier: 2, jitter: false }

describe('RetryBackoff', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should grow exponentially up to the cap', () => {
    const backoff = new RetryBackoff(CONFIG)
    expect([1, 2, 3, 4, 5].map((n) => backoff.getDelay(n))).toEqual([1000, 2000, 4000, 5000, 5000])
  })

  it('should jitter by at most 20%', () => {
    expect(new RetryBackoff({ ...CONFIG, jitter: true }, () => 0).getDelay(1)).toBe(800)
    expect(new RetryBackoff({ ...CONFIG, jitter: true }, () => 1).getDelay(1)).toBe(1200)
    expect(new RetryBackoff({ ...CONFIG, jitter: true }, () => 0.5).getDelay(2)).toBe(2000)
  })

  it('should run the attempt after the delay', () => {
    vi.useFakeTimers()
    const backoff = new RetryBackoff(CONFIG)
    const onAttempt = vi.fn()

    backoff.schedule('item-1', 2, onAttempt)
    expect(backoff.has('item-1')).toBe(true)

    vi.advanceTimersByTime(1999)
    expect(onAttempt).not.toHaveBeenCalled()
    vi.advanceTimersByTime(1)
    expect(onAttempt).toHaveBeenCalledTimes(1)
    expect(backoff.size).toBe(0)
  })

  it('should replace a pending timer for the same key', () => {
    vi.useFakeTimers()
    const backoff = new RetryBackoff(CONFIG)
    const first = vi.fn()
    const second = vi.fn()

    backoff.schedule('item-1', 1, first)
    backoff.schedule('item-1', 1, second)
    vi.advanceTimersByTime(1000)

    expect(first).not.toHaveBeenCalled()
    expect(second).toHaveBeenCalledTimes(1)
  })

  it('should cancel pending retries', () => {
    vi.useFakeTimers()
    const backoff = new RetryBackoff(CONFIG)
    const onAttempt = vi.fn()
    const cancelled = vi.fn()
    backoff.on('cancelled', cancelled)

    backoff.schedule('item-1', 1, onAttempt)
    backoff.schedule('item-2', 1, onAttempt)
    backoff.cancelAll()
    vi.advanceTimersByTime(10_000)

    expect(onAttempt).not.toHaveBeenCalled()
    expect(cancelled).toHaveBeenCalledTimes(2)
    expect(backoff.cancel('item-1')).toBe(false)
  })

  it('should expose when the retry is due', () => {
    vi.useFakeTimers()
    vi.setSystemTime(10_000)
    const backoff = new RetryBackoff(CONFIG)

    expect(backoff.schedule('item-1', 3, () => {})).toBe(14_000)
    expect(backoff.nextRetryAt('item-1')).toBe(14_000)
    expect(backoff.nextRetryAt('other')).toBeNull()
  })

  it('should read the due time from the injected clock', () => {
    vi.useFakeTimers()
    const backoff = new RetryBackoff(CONFIG, Math.random, () => 500)

    expect(backoff.schedule('item-1', 1, () => {})).toBe(1500)
  })
})
