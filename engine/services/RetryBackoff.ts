import { EventEmitter } from 'events'

export interface BackoffConfig {
  initialDelayMs: number
  maxDelayMs: number
  multiplier: number
  jitter: boolean
}

interface PendingRetry {
  timer: ReturnType<typeof setTimeout>
  attempt: number
  nextRetryAt: number
}

/**
 * RetryBackoff: Exponential backoff timers, one per key (a transfer item id).
 *
 * Events:
 *   'waiting'   → (key, delayMs, attempt, nextRetryAt)
 *   'attempt'   → (key, attempt)
 *   'cancelled' → (key)
 */
export class RetryBackoff extends EventEmitter {
  private config: BackoffConfig
  private pending: Map<string, PendingRetry> = new Map()
  private readonly random: () => number
  private readonly now: () => number

  constructor(config: BackoffConfig, random: () => number = Math.random, now: () => number = Date.now) {
    super()
    this.config = config
    this.random = random
    this.now = now
  }

  /** Update the config at runtime; pending timers keep their delay */
  updateConfig(config: BackoffConfig): void {
    this.config = config
  }

  /**
   * Delay before retry number `attempt` (1-based):
   * initialDelay * (multiplier ^ (attempt - 1)), capped at maxDelay, ±20% jitter.
   */
  getDelay(attempt: number): number {
    const n = Math.max(1, attempt)
    const baseDelay = this.config.initialDelayMs * Math.pow(this.config.multiplier, n - 1)
    const capped = Math.min(baseDelay, this.config.maxDelayMs)

    if (this.config.jitter) {
      const jitterRange = capped * 0.2
      return Math.max(0, Math.round(capped + (this.random() * jitterRange * 2 - jitterRange)))
    }
    return capped
  }

  /** Run `onAttempt` after the backoff for `attempt`; replaces any pending timer for the key */
  schedule(key: string, attempt: number, onAttempt: () => void): number {
    this.cancel(key)

    const delayMs = this.getDelay(attempt)
    const nextRetryAt = this.now() + delayMs
    const timer = setTimeout(() => {
      this.pending.delete(key)
      this.emit('attempt', key, attempt)
      onAttempt()
    }, delayMs)

    this.pending.set(key, { timer, attempt, nextRetryAt })
    this.emit('waiting', key, delayMs, attempt, nextRetryAt)
    return nextRetryAt
  }

  has(key: string): boolean {
    return this.pending.has(key)
  }

  nextRetryAt(key: string): number | null {
    return this.pending.get(key)?.nextRetryAt ?? null
  }

  /** Drop a pending retry; returns whether one existed */
  cancel(key: string): boolean {
    const entry = this.pending.get(key)
    if (!entry) return false
    clearTimeout(entry.timer)
    this.pending.delete(key)
    this.emit('cancelled', key)
    return true
  }

  cancelAll(): void {
    for (const key of Array.from(this.pending.keys())) {
      this.cancel(key)
    }
  }

  get size(): number {
    return this.pending.size
  }
}
