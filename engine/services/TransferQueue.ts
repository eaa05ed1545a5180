import { EventEmitter } from 'events'
import { basename } from 'path'
import { v4 as uuid } from 'uuid'
import type {
  TransferEvent,
  TransferItem,
  TransferQueueStats,
  TransferRequest
} from '../../src/types/transfer'
import { PRIORITY_RANK, isAwaitingRetry, isFinished } from '../../src/types/transfer'
import { clampConcurrency } from '../../src/utils/resolveSettings'
import type { ConnectorSession, ProtocolConnector, TransferResult } from '../connectors/types'
import { localFileSize } from '../connectors/shared'
import {
  CancelledError,
  EngineError,
  IntegrityError,
  TimeoutError,
  isRetryable,
  toEngineError
} from '../errors'
import { checksumsMatch, computeSha256FromFile } from '../utils/checksum'
import { abortReason } from '../utils/progressStream'
import { remoteDirname } from '../utils/remotePath'
import { LogService } from './LogService'
import type { ProgressTracker } from './ProgressTracker'
import { RetryBackoff, type BackoffConfig } from './RetryBackoff'
import type { SessionLease } from './SessionPool'

export interface TransferQueueOptions {
  driveId: string
  connector: ProtocolConnector
  sessions: SessionLease
  log: LogService
  backoff: BackoffConfig
  concurrentLimit?: number
  maxRetries?: number
  verifyChecksums?: boolean
  /** KB/s, 0 = unlimited */
  bandwidthLimitUp?: number
  bandwidthLimitDown?: number
  progressIntervalMs?: number
  progressMinBytes?: number
  /** 0 disables the watchdog; needs a tracker */
  stallTimeoutMs?: number
  maxHistoryItems?: number
  tracker?: ProgressTracker
  now?: () => number
}

type AbortIntent = 'cancel' | 'pause' | 'stall'

interface ActiveRun {
  controller: AbortController
  intent: AbortIntent | null
  /** Size was known before the first byte moved */
  sizeKnown: boolean
  settled: Promise<void>
}

/** Dispatch order: priority desc, then createdAt asc, then enqueue order */
export function compareItems(a: TransferItem, b: TransferItem): number {
  return (
    PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority] ||
    a.createdAt - b.createdAt ||
    a.sequence - b.sequence
  )
}

/**
 * TransferQueue: One per drive. Owns its items; every mutation goes through
 * these methods and readers only ever get copies.
 *
 * Supports concurrent transfers, priorities, automatic retry with backoff,
 * pause/resume and cancellation.
 *
 * Events:
 *   'transfer'          → (TransferEvent)
 *   'connectionFailure' → (TransferItem, EngineError)  connection/timeout failures
 *   'idle'              → ()  nothing running and nothing left to dispatch
 */
export class TransferQueue extends EventEmitter {
  readonly driveId: string
  readonly backoff: RetryBackoff

  private items: Map<string, TransferItem> = new Map()
  private active: Map<string, ActiveRun> = new Map()
  private sequence = 0
  private running = false
  private disposed = false
  private dispatchScheduled = false

  private concurrentLimit: number
  private maxRetries: number
  private verifyChecksums: boolean
  private maxHistoryItems: number

  /** Bandwidth limits in KB/s (0 = unlimited) */
  bandwidthLimitUp: number
  bandwidthLimitDown: number

  private readonly connector: ProtocolConnector
  private readonly sessions: SessionLease
  private readonly log: LogService
  private readonly tracker?: ProgressTracker
  private readonly progressIntervalMs?: number
  private readonly progressMinBytes?: number
  private readonly stallTimeoutMs: number
  private readonly now: () => number

  constructor(options: TransferQueueOptions) {
    super()
    this.driveId = options.driveId
    this.connector = options.connector
    this.sessions = options.sessions
    this.log = options.log
    this.tracker = options.tracker
    this.now = options.now ?? Date.now
    this.backoff = new RetryBackoff(options.backoff, Math.random, this.now)
    this.concurrentLimit = clampConcurrency(options.concurrentLimit ?? 3)
    this.maxRetries = Math.max(0, options.maxRetries ?? 3)
    this.verifyChecksums = options.verifyChecksums ?? true
    this.bandwidthLimitUp = options.bandwidthLimitUp ?? 0
    this.bandwidthLimitDown = options.bandwidthLimitDown ?? 0
    this.progressIntervalMs = options.progressIntervalMs
    this.progressMinBytes = options.progressMinBytes
    this.stallTimeoutMs = options.stallTimeoutMs ?? 0
    this.maxHistoryItems = options.maxHistoryItems ?? 500
  }

  // ── Dispatch control ──

  /** Begin dispatching queued items */
  start(): void {
    if (this.disposed) return
    this.running = true
    this.scheduleDispatch()
  }

  /** Stop dispatching; running transfers finish on their own */
  stop(): void {
    this.running = false
    this.emitIfIdle()
  }

  get isRunning(): boolean {
    return this.running
  }

  setConcurrentLimit(limit: number): void {
    this.concurrentLimit = clampConcurrency(limit)
    this.scheduleDispatch()
  }

  getConcurrentLimit(): number {
    return this.concurrentLimit
  }

  setVerifyChecksums(enabled: boolean): void {
    this.verifyChecksums = enabled
  }

  setMaxHistoryItems(max: number): void {
    this.maxHistoryItems = Math.max(0, max)
    this.evictHistory()
  }

  // ── Item operations ──

  /** Add a transfer to the queue; dispatch happens on a later microtask */
  enqueue(request: TransferRequest): TransferItem {
    if (this.disposed) throw new Error(`Transfer queue for drive ${this.driveId} is disposed`)

    const item: TransferItem = {
      id: uuid(),
      driveId: this.driveId,
      fileName:
        request.fileName ?? basename(request.direction === 'upload' ? request.localPath : request.remotePath),
      localPath: request.localPath,
      remotePath: request.remotePath,
      direction: request.direction,
      priority: request.priority ?? 'normal',
      status: 'queued',
      totalBytes: Math.max(0, request.totalBytes ?? 0),
      processedBytes: 0,
      progress: 0,
      retryCount: 0,
      maxRetries: Math.max(0, request.maxRetries ?? this.maxRetries),
      createdAt: this.now(),
      sequence: ++this.sequence,
      checksum: request.checksum,
      metadata: request.metadata ? { ...request.metadata } : undefined
    }

    this.items.set(item.id, item)
    this.publish({ type: 'queued', itemId: item.id, driveId: this.driveId, item: snapshot(item) })
    this.scheduleDispatch()
    return snapshot(item)
  }

  /** Cancel a transfer; returns whether anything changed */
  cancel(id: string): boolean {
    const item = this.items.get(id)
    if (!item) return false

    switch (item.status) {
      case 'inProgress': {
        const run = this.active.get(id)
        if (run) {
          run.intent = 'cancel'
          run.controller.abort(new CancelledError())
        }
        break
      }
      case 'queued':
      case 'paused':
        break
      case 'failed':
        if (!isAwaitingRetry(item)) return false
        this.backoff.cancel(id)
        item.nextRetryAt = undefined
        break
      case 'completed':
      case 'cancelled':
        return false
    }

    item.status = 'cancelled'
    item.completedAt = this.now()
    this.publish({ type: 'cancelled', itemId: id, driveId: this.driveId, item: snapshot(item) })
    LogService.transferCancelled(this.log, this.driveId, item.fileName)
    this.evictHistory()
    this.emitIfIdle()
    return true
  }

  /** Cancel every transfer that is not finished; returns how many */
  cancelAll(): number {
    let count = 0
    for (const item of this.sortedItems()) {
      if (this.cancel(item.id)) count++
    }
    return count
  }

  /** Pause a running transfer; the attempt is aborted and restarts on resume */
  pause(id: string): boolean {
    const item = this.items.get(id)
    if (!item || item.status !== 'inProgress') return false

    const run = this.active.get(id)
    if (run) {
      run.intent = 'pause'
      run.controller.abort(new CancelledError('Transfer paused'))
    }
    item.status = 'paused'
    this.publish({ type: 'paused', itemId: id, driveId: this.driveId, item: snapshot(item) })
    return true
  }

  /** Pause every running transfer; returns their ids */
  pauseActive(): string[] {
    return this.sortedItems()
      .filter((item) => item.status === 'inProgress' && this.pause(item.id))
      .map((item) => item.id)
  }

  /** Resume a paused transfer */
  resume(id: string): boolean {
    const item = this.items.get(id)
    if (!item || item.status !== 'paused') return false

    item.status = 'queued'
    this.publish({ type: 'queued', itemId: id, driveId: this.driveId, item: snapshot(item) })
    this.scheduleDispatch()
    return true
  }

  /** Re-queue a failed transfer. Keeps retryCount, so the automatic budget is not refreshed */
  retry(id: string): boolean {
    const item = this.items.get(id)
    if (!item || item.status !== 'failed') return false

    this.backoff.cancel(id)
    item.status = 'queued'
    item.processedBytes = 0
    item.progress = 0
    item.errorMessage = undefined
    item.errorKind = undefined
    item.nextRetryAt = undefined
    item.completedAt = undefined
    this.publish({ type: 'queued', itemId: id, driveId: this.driveId, item: snapshot(item) })
    this.scheduleDispatch()
    return true
  }

  /** Forget a transfer, cancelling it first when it is still running */
  remove(id: string): boolean {
    const item = this.items.get(id)
    if (!item) return false

    if (!isFinished(item)) this.cancel(id)
    this.backoff.cancel(id)
    this.items.delete(id)
    this.publish({ type: 'removed', itemId: id, driveId: this.driveId })
    return true
  }

  /** Remove completed, cancelled and exhausted items; returns how many */
  clearFinished(): number {
    let count = 0
    for (const item of this.sortedItems()) {
      if (isFinished(item) && this.remove(item.id)) count++
    }
    return count
  }

  get(id: string): TransferItem | undefined {
    const item = this.items.get(id)
    return item ? snapshot(item) : undefined
  }

  /** Copies of every item in enqueue order */
  getAll(): TransferItem[] {
    return this.sortedItems().map(snapshot)
  }

  getStats(): TransferQueueStats {
    const stats: TransferQueueStats = {
      queued: 0,
      inProgress: 0,
      paused: 0,
      awaitingRetry: 0,
      completed: 0,
      failed: 0,
      cancelled: 0
    }
    for (const item of this.items.values()) {
      if (isAwaitingRetry(item)) stats.awaitingRetry++
      else stats[item.status]++
    }
    return stats
  }

  /** Number of busy worker slots, including aborted attempts still settling */
  get activeCount(): number {
    return this.active.size
  }

  /** Resolves once nothing is running and, while dispatching, nothing is left to run */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise((resolve) => {
      const check = (): void => {
        if (this.isIdle()) {
          this.off('idle', check)
          resolve()
        }
      }
      this.on('idle', check)
    })
  }

  /** Stop, cancel everything and wait for running attempts to settle */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.running = false
    this.cancelAll()
    this.backoff.cancelAll()
    this.disposed = true
    await Promise.all(Array.from(this.active.values(), (run) => run.settled))
    this.emitIfIdle()
  }

  // ── Dispatch loop ──

  private scheduleDispatch(): void {
    if (this.dispatchScheduled) return
    this.dispatchScheduled = true
    queueMicrotask(() => {
      this.dispatchScheduled = false
      this.processQueue()
    })
  }

  /** Start queued transfers up to the concurrency limit */
  private processQueue(): void {
    if (!this.running || this.disposed) return

    while (this.active.size < this.concurrentLimit) {
      const next = this.nextQueued()
      if (!next) break
      this.startItem(next)
    }
    this.emitIfIdle()
  }

  private nextQueued(): TransferItem | undefined {
    let best: TransferItem | undefined
    for (const item of this.items.values()) {
      // A resumed item waits until its aborted attempt has settled
      if (item.status !== 'queued' || this.active.has(item.id)) continue
      if (!best || compareItems(item, best) < 0) best = item
    }
    return best
  }

  private startItem(item: TransferItem): void {
    const now = this.now()
    item.status = 'inProgress'
    item.lastAttempt = now
    item.startedAt = now
    item.completedAt = undefined
    item.nextRetryAt = undefined
    item.errorMessage = undefined
    item.errorKind = undefined
    item.processedBytes = 0
    item.progress = 0

    const run: ActiveRun = {
      controller: new AbortController(),
      intent: null,
      sizeKnown: item.totalBytes > 0,
      settled: Promise.resolve()
    }
    this.active.set(item.id, run)
    this.publish({ type: 'started', itemId: item.id, driveId: this.driveId, item: snapshot(item) })
    LogService.transferStarted(this.log, this.driveId, item.fileName, item.direction, item.totalBytes)

    run.settled = this.execute(item, run)
  }

  /** Runs one attempt; never rejects, every failure lands on the item */
  private async execute(item: TransferItem, run: ActiveRun): Promise<void> {
    const { signal } = run.controller
    const stallTimer = this.watchStall(item, run)
    let session: ConnectorSession | null = null
    let discard = false

    try {
      session = await this.sessions.acquire()
      throwIfStopped(signal)

      await this.resolveSize(item, run, session)
      throwIfStopped(signal)

      const result = await this.transfer(item, run, session)
      throwIfStopped(signal)

      await this.verify(item, result)
      this.complete(item, result)
    } catch (err) {
      discard = !(err instanceof IntegrityError)
      this.fail(item, run, signal.aborted ? toAbortError(signal, err) : toEngineError(err))
    } finally {
      if (stallTimer) clearInterval(stallTimer)
      if (session) this.sessions.release(session, { discard })
      if (this.active.get(item.id) === run) this.active.delete(item.id)
      this.scheduleDispatch()
      this.emitIfIdle()
    }
  }

  private async resolveSize(item: TransferItem, run: ActiveRun, session: ConnectorSession): Promise<void> {
    if (item.direction === 'upload') {
      const size = await localFileSize(item.localPath)
      if (item.totalBytes === 0) item.totalBytes = size
      const parent = remoteDirname(item.remotePath)
      if (parent !== '/') await this.connector.ensureDirectory(session, parent)
    } else if (item.totalBytes === 0) {
      const entry = await this.connector.stat(session, item.remotePath)
      item.totalBytes = entry.size
    }
    run.sizeKnown = item.totalBytes > 0
  }

  private transfer(item: TransferItem, run: ActiveRun, session: ConnectorSession): Promise<TransferResult> {
    const options = {
      signal: run.controller.signal,
      onProgress: (bytes: number) => this.onProgress(item, run, bytes),
      progressIntervalMs: this.progressIntervalMs,
      progressMinBytes: this.progressMinBytes
    }
    return item.direction === 'upload'
      ? this.connector.upload(session, item.localPath, item.remotePath, {
          ...options,
          bandwidthLimit: this.bandwidthLimitUp
        })
      : this.connector.download(session, item.remotePath, item.localPath, {
          ...options,
          bandwidthLimit: this.bandwidthLimitDown
        })
  }

  /** Downloads hash the written file; uploads use the hash of the streamed bytes */
  private async verify(item: TransferItem, result: TransferResult): Promise<void> {
    if (!item.checksum || !this.verifyChecksums) return

    const actual =
      item.direction === 'download' ? await computeSha256FromFile(item.localPath) : result.checksum
    if (!checksumsMatch(item.checksum, actual)) {
      throw new IntegrityError(`Checksum mismatch for ${item.fileName}: expected ${item.checksum}, got ${actual}`)
    }
  }

  private onProgress(item: TransferItem, run: ActiveRun, bytes: number): void {
    if (item.status !== 'inProgress' || run.controller.signal.aborted) return

    if (run.sizeKnown) {
      item.processedBytes = Math.min(item.totalBytes, Math.max(item.processedBytes, bytes))
      item.progress = item.totalBytes > 0 ? item.processedBytes / item.totalBytes : 0
    } else {
      // Unknown size: the total follows the bytes seen and progress stays at 0 until completion
      item.processedBytes = Math.max(item.processedBytes, bytes)
      item.totalBytes = Math.max(item.totalBytes, item.processedBytes)
    }

    this.publish({
      type: 'progressed',
      itemId: item.id,
      driveId: this.driveId,
      item: snapshot(item),
      processedBytes: item.processedBytes,
      totalBytes: item.totalBytes,
      progress: item.progress
    })
  }

  private complete(item: TransferItem, result: TransferResult): void {
    if (item.status !== 'inProgress') return

    item.status = 'completed'
    item.completedAt = this.now()
    item.totalBytes = result.bytesTransferred
    item.processedBytes = result.bytesTransferred
    item.progress = 1
    item.localModifiedAt = result.localModifiedAt
    item.remoteModifiedAt = result.remoteModifiedAt
    this.publish({ type: 'completed', itemId: item.id, driveId: this.driveId, item: snapshot(item) })
    LogService.transferCompleted(this.log, this.driveId, item.fileName)
    this.evictHistory()
  }

  private fail(item: TransferItem, run: ActiveRun, error: EngineError): void {
    // cancel() and pause() already moved the item
    if (run.intent === 'cancel' || run.intent === 'pause') return
    if (item.status !== 'inProgress') return

    if (error.kind === 'cancelled') {
      item.status = 'cancelled'
      item.completedAt = this.now()
      this.publish({ type: 'cancelled', itemId: item.id, driveId: this.driveId, item: snapshot(item) })
      this.evictHistory()
      return
    }

    item.status = 'failed'
    item.errorKind = error.kind
    item.errorMessage = error.message
    item.nextRetryAt = undefined

    const willRetry = !this.disposed && isRetryable(error.kind) && item.retryCount < item.maxRetries
    if (willRetry) {
      item.retryCount = Math.min(item.retryCount + 1, item.maxRetries)
      const nextRetryAt = this.backoff.schedule(item.id, item.retryCount, () => this.requeue(item.id))
      item.nextRetryAt = nextRetryAt
      LogService.retryScheduled(
        this.log,
        this.driveId,
        item.fileName,
        Math.max(0, nextRetryAt - this.now()),
        item.retryCount,
        item.maxRetries
      )
    } else {
      item.completedAt = this.now()
      LogService.transferFailed(this.log, this.driveId, item.fileName, error.message)
    }

    this.publish({
      type: 'failed',
      itemId: item.id,
      driveId: this.driveId,
      item: snapshot(item),
      errorKind: error.kind,
      message: error.message,
      willRetry
    })

    if (error.kind === 'connection' || error.kind === 'timeout') {
      this.emit('connectionFailure', snapshot(item), error)
    }
    if (!willRetry) this.evictHistory()
  }

  /** Backoff elapsed: an awaiting item goes back to the queue */
  private requeue(id: string): void {
    const item = this.items.get(id)
    if (!item || !isAwaitingRetry(item)) return

    item.status = 'queued'
    item.nextRetryAt = undefined
    this.publish({ type: 'queued', itemId: id, driveId: this.driveId, item: snapshot(item) })
    this.scheduleDispatch()
  }

  private watchStall(item: TransferItem, run: ActiveRun): ReturnType<typeof setInterval> | null {
    const tracker = this.tracker
    const timeout = this.stallTimeoutMs
    if (!tracker || timeout <= 0) return null

    const interval = Math.max(50, Math.min(1000, Math.floor(timeout / 4)))
    return setInterval(() => {
      if (run.controller.signal.aborted) return
      const idle = tracker.idleFor(item.id)
      if (idle < timeout) return

      run.intent = 'stall'
      LogService.transferStalled(this.log, this.driveId, item.fileName, idle)
      run.controller.abort(new TimeoutError(`No progress for ${idle}ms`))
    }, interval)
  }

  // ── Helpers ──

  private sortedItems(): TransferItem[] {
    return Array.from(this.items.values()).sort((a, b) => a.sequence - b.sequence)
  }

  /** Finished items beyond the history limit go, oldest first */
  private evictHistory(): void {
    const finished = this.sortedItems().filter(isFinished)
    const excess = finished.length - this.maxHistoryItems
    if (excess <= 0) return

    finished
      .sort((a, b) => (a.completedAt ?? a.createdAt) - (b.completedAt ?? b.createdAt) || a.sequence - b.sequence)
      .slice(0, excess)
      .forEach((item) => {
        this.items.delete(item.id)
        this.publish({ type: 'removed', itemId: item.id, driveId: this.driveId })
      })
  }

  private isIdle(): boolean {
    if (this.active.size > 0) return false
    if (!this.running) return true
    for (const item of this.items.values()) {
      if (item.status === 'queued' || isAwaitingRetry(item)) return false
    }
    return true
  }

  private emitIfIdle(): void {
    if (this.isIdle()) this.emit('idle')
  }

  private publish(event: TransferEvent): void {
    this.emit('transfer', event)
  }
}

function snapshot(item: TransferItem): TransferItem {
  return { ...item, metadata: item.metadata ? { ...item.metadata } : undefined }
}

function throwIfStopped(signal: AbortSignal): void {
  if (signal.aborted) throw abortReason(signal)
}

/** Once the signal fired, the abort reason is the outcome whatever the stream reported */
function toAbortError(signal: AbortSignal, err: unknown): EngineError {
  const reason = abortReason(signal)
  if (reason instanceof EngineError) return reason
  return err instanceof EngineError && err.kind === 'cancelled' ? err : new CancelledError()
}
