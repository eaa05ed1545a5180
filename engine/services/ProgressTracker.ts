import { EventEmitter } from 'events'
import type { TransferEvent } from '../../src/types/transfer'

export interface TransferProgress {
  itemId: string
  driveId: string
  processedBytes: number
  totalBytes: number
  progress: number
  /** bytes/s over the sliding window */
  speed: number
  /** bytes/s since the attempt started */
  averageSpeed: number
  /** seconds, -1 while unknown */
  eta: number
  startedAt: number
  lastSampleAt: number
}

export interface ProgressTrackerOptions {
  /** Samples kept per transfer */
  windowSize?: number
  /** Samples older than this are dropped */
  windowMs?: number
  now?: () => number
}

interface Sample {
  at: number
  bytes: number
}

interface TrackedTransfer {
  itemId: string
  driveId: string
  totalBytes: number
  processedBytes: number
  startedAt: number
  samples: Sample[]
}

/** Anything that re-emits queue events under 'transfer' */
export interface TransferEventSource {
  on(event: 'transfer', listener: (event: TransferEvent) => void): unknown
  off(event: 'transfer', listener: (event: TransferEvent) => void): unknown
}

/**
 * ProgressTracker: Derives speed and ETA from progress samples of running
 * transfers. Tracking starts on 'started' and ends when the attempt ends.
 *
 * Emits 'update' → (TransferProgress) on each progress sample.
 */
export class ProgressTracker extends EventEmitter {
  private transfers: Map<string, TrackedTransfer> = new Map()
  private readonly windowSize: number
  private readonly windowMs: number
  private readonly now: () => number

  constructor(options: ProgressTrackerOptions = {}) {
    super()
    this.windowSize = Math.max(2, options.windowSize ?? 20)
    this.windowMs = options.windowMs ?? 10_000
    this.now = options.now ?? Date.now
  }

  /** Subscribe to a queue (or the engine); returns the unsubscribe function */
  track(source: TransferEventSource): () => void {
    const listener = (event: TransferEvent): void => this.handle(event)
    source.on('transfer', listener)
    return () => {
      source.off('transfer', listener)
    }
  }

  handle(event: TransferEvent): void {
    switch (event.type) {
      case 'started': {
        const now = this.now()
        this.transfers.set(event.itemId, {
          itemId: event.itemId,
          driveId: event.driveId,
          totalBytes: event.item.totalBytes,
          processedBytes: event.item.processedBytes,
          startedAt: now,
          samples: [{ at: now, bytes: event.item.processedBytes }]
        })
        break
      }
      case 'progressed':
        this.record(event.itemId, event.processedBytes, event.totalBytes)
        break
      case 'paused':
      case 'completed':
      case 'failed':
      case 'cancelled':
      case 'removed':
        this.transfers.delete(event.itemId)
        break
      case 'queued':
        break
    }
  }

  get(itemId: string): TransferProgress | null {
    const tracked = this.transfers.get(itemId)
    return tracked ? this.summarize(tracked) : null
  }

  getAll(): TransferProgress[] {
    return Array.from(this.transfers.values()).map((t) => this.summarize(t))
  }

  /** Time of the newest sample, null when the item is not running */
  lastSampleAt(itemId: string): number | null {
    const tracked = this.transfers.get(itemId)
    if (!tracked) return null
    return tracked.samples[tracked.samples.length - 1]?.at ?? tracked.startedAt
  }

  /** Milliseconds since the newest sample, 0 when the item is not running */
  idleFor(itemId: string): number {
    const last = this.lastSampleAt(itemId)
    return last === null ? 0 : this.now() - last
  }

  /** Sum of the windowed speeds of a drive's running transfers */
  driveSpeed(driveId: string): number {
    let total = 0
    for (const tracked of this.transfers.values()) {
      if (tracked.driveId === driveId) total += this.windowSpeed(tracked)
    }
    return total
  }

  clear(): void {
    this.transfers.clear()
  }

  private record(itemId: string, processedBytes: number, totalBytes: number): void {
    const tracked = this.transfers.get(itemId)
    if (!tracked) return

    const now = this.now()
    tracked.processedBytes = processedBytes
    tracked.totalBytes = totalBytes
    tracked.samples.push({ at: now, bytes: processedBytes })

    while (tracked.samples.length > this.windowSize) {
      tracked.samples.shift()
    }
    // Keep the newest sample even when it alone is older than the window
    while (tracked.samples.length > 1 && now - tracked.samples[0].at > this.windowMs) {
      tracked.samples.shift()
    }

    this.emit('update', this.summarize(tracked))
  }

  private windowSpeed(tracked: TrackedTransfer): number {
    const first = tracked.samples[0]
    const last = tracked.samples[tracked.samples.length - 1]
    if (!first || !last || last.at <= first.at) return 0
    return ((last.bytes - first.bytes) * 1000) / (last.at - first.at)
  }

  private summarize(tracked: TrackedTransfer): TransferProgress {
    const now = this.now()
    const speed = this.windowSpeed(tracked)
    const elapsed = now - tracked.startedAt
    const averageSpeed = elapsed > 0 ? (tracked.processedBytes * 1000) / elapsed : 0
    const remaining = Math.max(0, tracked.totalBytes - tracked.processedBytes)

    return {
      itemId: tracked.itemId,
      driveId: tracked.driveId,
      processedBytes: tracked.processedBytes,
      totalBytes: tracked.totalBytes,
      progress: tracked.totalBytes > 0 ? Math.min(1, tracked.processedBytes / tracked.totalBytes) : 0,
      speed,
      averageSpeed,
      eta: speed > 0 ? remaining / speed : -1,
      startedAt: tracked.startedAt,
      lastSampleAt: tracked.samples[tracked.samples.length - 1]?.at ?? tracked.startedAt
    }
  }
}
