import { Transform, type TransformCallback } from 'stream'
import { createHash, type Hash } from 'crypto'
import { CancelledError } from '../errors'

export interface ProgressGateOptions {
  signal?: AbortSignal
  onProgress?: (bytesTransferred: number) => void
  /** Minimum time between two progress reports */
  minIntervalMs?: number
  /** Minimum byte delta between two progress reports */
  minBytes?: number
  /** KB/s, 0 = unlimited */
  bandwidthLimit?: number
  now?: () => number
}

export const DEFAULT_PROGRESS_INTERVAL_MS = 250
export const DEFAULT_PROGRESS_MIN_BYTES = 512 * 1024

/**
 * ProgressGate: Pass-through stream every connector pipes its bytes through.
 *
 * Between chunks it checks the abort signal, reports progress at most once per
 * interval or byte delta, throttles to a KB/s limit and hashes what passed.
 */
export class ProgressGate extends Transform {
  private transferred = 0
  private lastReportedBytes = 0
  private lastReportAt: number
  private readonly startTime: number
  private readonly hash: Hash = createHash('sha256')
  private readonly bytesPerSecond: number
  private readonly minIntervalMs: number
  private readonly minBytes: number
  private readonly signal?: AbortSignal
  private readonly onProgress?: (bytesTransferred: number) => void
  private readonly now: () => number
  private readonly onAbort = (): void => {
    this.destroy(abortReason(this.signal))
  }

  constructor(options: ProgressGateOptions = {}) {
    super()
    this.signal = options.signal
    this.onProgress = options.onProgress
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS
    this.minBytes = options.minBytes ?? DEFAULT_PROGRESS_MIN_BYTES
    this.bytesPerSecond = (options.bandwidthLimit ?? 0) * 1024
    this.now = options.now ?? Date.now
    this.startTime = this.now()
    this.lastReportAt = this.startTime

    if (this.signal) {
      if (this.signal.aborted) {
        process.nextTick(this.onAbort)
      } else {
        this.signal.addEventListener('abort', this.onAbort, { once: true })
      }
    }
    this.once('close', () => this.signal?.removeEventListener('abort', this.onAbort))
  }

  get bytesTransferred(): number {
    return this.transferred
  }

  /** SHA-256 of everything that went through, hex */
  digest(): string {
    return this.hash.copy().digest('hex')
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    if (this.signal?.aborted) {
      callback(abortReason(this.signal))
      return
    }

    this.transferred += chunk.length
    this.hash.update(chunk)
    this.maybeReport(false)

    const delay = this.throttleDelay()
    if (delay > 0) {
      setTimeout(() => {
        this.push(chunk)
        callback()
      }, delay)
    } else {
      this.push(chunk)
      callback()
    }
  }

  _flush(callback: TransformCallback): void {
    this.maybeReport(true)
    callback()
  }

  private maybeReport(force: boolean): void {
    if (!this.onProgress || this.transferred === this.lastReportedBytes) return

    const now = this.now()
    const due =
      force ||
      now - this.lastReportAt >= this.minIntervalMs ||
      this.transferred - this.lastReportedBytes >= this.minBytes
    if (!due) return

    this.lastReportAt = now
    this.lastReportedBytes = this.transferred
    this.onProgress(this.transferred)
  }

  private throttleDelay(): number {
    if (this.bytesPerSecond <= 0) return 0
    const elapsed = (this.now() - this.startTime) / 1000
    const expectedTime = this.transferred / this.bytesPerSecond
    return Math.max(0, (expectedTime - elapsed) * 1000)
  }
}

/** The error a stream fails with once its signal fires */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason
  return reason instanceof Error ? reason : new CancelledError()
}
