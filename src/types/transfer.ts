/** Transfer status */
export type TransferStatus = 'queued' | 'inProgress' | 'paused' | 'completed' | 'failed' | 'cancelled'

/** Transfer direction */
export type TransferDirection = 'upload' | 'download'

/** Transfer priority, lowest first */
export type TransferPriority = 'low' | 'normal' | 'high' | 'critical'

export const PRIORITY_RANK: Record<TransferPriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3
}

/** Error kind tag carried by a failed transfer */
export type TransferErrorKind =
  | 'connection'
  | 'timeout'
  | 'authentication'
  | 'protocol'
  | 'io'
  | 'integrity'
  | 'cancelled'
  | 'unsupportedProtocol'

/** A single file transfer */
export interface TransferItem {
  id: string
  driveId: string
  fileName: string
  localPath: string
  remotePath: string
  direction: TransferDirection
  priority: TransferPriority
  status: TransferStatus
  totalBytes: number
  processedBytes: number
  progress: number     // 0..1
  retryCount: number
  maxRetries: number
  createdAt: number    // Unix ms
  sequence: number     // enqueue order within the queue
  lastAttempt?: number
  startedAt?: number
  completedAt?: number
  nextRetryAt?: number // set while a failed item waits for its automatic retry
  errorMessage?: string
  errorKind?: TransferErrorKind
  checksum?: string    // expected SHA-256, hex
  localModifiedAt?: number   // set on completion when the connector reports it
  remoteModifiedAt?: number
  metadata?: Record<string, string>
}

/** What a caller supplies to enqueue a transfer */
export interface TransferRequest {
  localPath: string
  remotePath: string
  direction: TransferDirection
  fileName?: string
  totalBytes?: number
  priority?: TransferPriority
  maxRetries?: number
  checksum?: string
  metadata?: Record<string, string>
}

/** Events pushed by a transfer queue, one shape per state change */
export type TransferEvent =
  | { type: 'queued'; itemId: string; driveId: string; item: TransferItem }
  | { type: 'started'; itemId: string; driveId: string; item: TransferItem }
  | {
      type: 'progressed'
      itemId: string
      driveId: string
      item: TransferItem
      processedBytes: number
      totalBytes: number
      progress: number
    }
  | { type: 'paused'; itemId: string; driveId: string; item: TransferItem }
  | { type: 'completed'; itemId: string; driveId: string; item: TransferItem }
  | {
      type: 'failed'
      itemId: string
      driveId: string
      item: TransferItem
      errorKind: TransferErrorKind
      message: string
      willRetry: boolean
    }
  | { type: 'cancelled'; itemId: string; driveId: string; item: TransferItem }
  | { type: 'removed'; itemId: string; driveId: string }

export type TransferEventType = TransferEvent['type']

/** Per-queue counters */
export interface TransferQueueStats {
  queued: number
  inProgress: number
  paused: number
  awaitingRetry: number
  completed: number
  failed: number
  cancelled: number
}

/** Transfer conflict resolution strategy used by sync */
export type ConflictResolution = 'overwrite' | 'overwrite-newer' | 'skip'

/** A failed item whose automatic retry is still pending */
export function isAwaitingRetry(item: TransferItem): boolean {
  return item.status === 'failed' && item.nextRetryAt !== undefined
}

/** A failed item the queue will not retry on its own */
export function isRetryExhausted(item: TransferItem): boolean {
  return item.status === 'failed' && item.nextRetryAt === undefined
}

/** Terminal from the queue's point of view: nothing more happens without user action */
export function isFinished(item: TransferItem): boolean {
  return item.status === 'completed' || item.status === 'cancelled' || isRetryExhausted(item)
}
