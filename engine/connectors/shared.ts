import { promises as fsp } from 'fs'
import { dirname } from 'path'
import { v4 as uuid } from 'uuid'
import { abortReason, ProgressGate } from '../utils/progressStream'
import { CancelledError, EngineError, IoError, toEngineError } from '../errors'
import type { TransferErrorKind } from '../../src/types/transfer'
import type { TransferOptions } from './types'

/** Session id such as `sftp-1b9d6bcd-…` */
export function newSessionId(prefix: string): string {
  return `${prefix}-${uuid()}`
}

export function createGate(options: TransferOptions = {}): ProgressGate {
  return new ProgressGate({
    signal: options.signal,
    onProgress: options.onProgress,
    bandwidthLimit: options.bandwidthLimit,
    minIntervalMs: options.progressIntervalMs,
    minBytes: options.progressMinBytes
  })
}

/**
 * Translate a stream failure. An aborted signal wins over whatever the
 * stream reported, since tearing the pipeline down makes every stage fail.
 */
export function toTransferError(
  err: unknown,
  signal: AbortSignal | undefined,
  fallback: TransferErrorKind = 'protocol'
): EngineError {
  if (signal?.aborted) {
    const reason = abortReason(signal)
    return reason instanceof EngineError ? reason : new CancelledError()
  }
  return toEngineError(err, fallback)
}

/** Size of a local file, as an IoError when it cannot be read */
export async function localFileSize(localPath: string): Promise<number> {
  try {
    const stats = await fsp.stat(localPath)
    if (!stats.isFile()) throw new IoError(`Not a file: ${localPath}`)
    return stats.size
  } catch (err) {
    if (err instanceof EngineError) throw err
    throw new IoError(`Cannot read ${localPath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err
    })
  }
}

/** Modification time of a local file, whole Unix ms */
export async function localModifiedAt(localPath: string): Promise<number> {
  try {
    const stats = await fsp.stat(localPath)
    return Math.floor(stats.mtimeMs)
  } catch (err) {
    throw new IoError(`Cannot read ${localPath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err
    })
  }
}

/**
 * Stamp a file with the modification time of the copy it came from. A
 * filesystem that refuses keeps its own stamp; either way the result is the
 * stamp the file ends up with.
 */
export function preserveModifiedAt(localPath: string, modifiedAt: number): Promise<number> {
  if (modifiedAt <= 0) return localModifiedAt(localPath)
  const mtime = new Date(modifiedAt)
  return fsp.utimes(localPath, new Date(), mtime).then(
    () => localModifiedAt(localPath),
    () => localModifiedAt(localPath)
  )
}

/** Make sure the directory a download writes into exists */
export async function prepareLocalTarget(localPath: string): Promise<void> {
  try {
    await fsp.mkdir(dirname(localPath), { recursive: true })
  } catch (err) {
    throw new IoError(`Cannot create ${dirname(localPath)}`, { cause: err })
  }
}

/** Reject straight away when the operation was cancelled before it started */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const reason = abortReason(signal)
    throw reason instanceof EngineError ? reason : new CancelledError()
  }
}
