import { EventEmitter } from 'events'
import { randomUUID } from 'crypto'
import type { LogEntry, LogLevel, LogSource } from '../../src/types/log'
import { formatFileSize } from '../../src/utils/fileSize'

const DEFAULT_MAX_ENTRIES = 5000

/** Scope used for entries that belong to no drive */
export const ENGINE_SCOPE = 'engine'
export const DISCOVERY_SCOPE = 'discovery'

/**
 * LogService: Central event-based log aggregator for engine activity.
 *
 * Stores log entries per scope (drive id, 'discovery', 'engine') in memory,
 * FIFO with a configurable max. Emits 'entry' events with (scope, LogEntry).
 */
export class LogService extends EventEmitter {
  private entries: Map<string, LogEntry[]> = new Map()
  private maxEntries: number
  private debugMode: boolean

  constructor(maxEntries: number = DEFAULT_MAX_ENTRIES, debugMode: boolean = false) {
    super()
    this.maxEntries = maxEntries
    this.debugMode = debugMode
  }

  /** Set the maximum number of log entries per scope */
  setMaxEntries(max: number): void {
    this.maxEntries = max
  }

  /** Enable or disable debug-level log entries */
  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled
  }

  /** Add a log entry for a scope */
  log(
    scope: string,
    level: LogLevel,
    source: LogSource,
    message: string,
    details?: string
  ): LogEntry {
    const entry: LogEntry = {
      id: randomUUID(),
      timestamp: Date.now(),
      level,
      source,
      message,
      details,
      scope
    }

    // Debug entries are returned to the caller but neither stored nor emitted
    if (level === 'debug' && !this.debugMode) return entry

    let scopeEntries = this.entries.get(scope)
    if (!scopeEntries) {
      scopeEntries = []
      this.entries.set(scope, scopeEntries)
    }

    scopeEntries.push(entry)

    while (scopeEntries.length > this.maxEntries) {
      scopeEntries.shift()
    }

    this.emit('entry', scope, entry)
    return entry
  }

  /** Get all log entries for a scope */
  getEntries(scope: string): LogEntry[] {
    return [...(this.entries.get(scope) ?? [])]
  }

  /** Scopes that currently hold entries */
  getScopes(): string[] {
    return Array.from(this.entries.keys())
  }

  /** Clear all log entries for a scope */
  clearEntries(scope: string): void {
    this.entries.delete(scope)
  }

  /** Export log entries as formatted text */
  exportLog(scope: string): string {
    return this.getEntries(scope)
      .map((e) => {
        const ts = new Date(e.timestamp).toISOString()
        const level = e.level.toUpperCase().padEnd(7)
        const src = e.source.toUpperCase().padEnd(9)
        const detail = e.details ? `\n  ${e.details}` : ''
        return `[${ts}] [${level}] [${src}] ${e.message}${detail}`
      })
      .join('\n')
  }

  // ── Static helper methods for common log messages ──

  static connecting(log: LogService, driveId: string, protocol: string, host: string, port: number): void {
    log.log(driveId, 'info', 'connector', `Connecting to ${protocol.toUpperCase()} server ${host}:${port}...`)
  }

  static connected(log: LogService, driveId: string): void {
    log.log(driveId, 'success', 'connector', 'Connection established.')
  }

  static connectFailed(log: LogService, driveId: string, reason: string): void {
    log.log(driveId, 'error', 'connector', `Connection failed: ${reason}`)
  }

  static connectionLost(log: LogService, driveId: string, reason: string): void {
    log.log(driveId, 'error', 'connector', `Connection lost: ${reason}`)
  }

  static disconnected(log: LogService, driveId: string): void {
    log.log(driveId, 'info', 'connector', 'Disconnected.')
  }

  static mounted(log: LogService, driveId: string, name: string): void {
    log.log(driveId, 'success', 'drive', `Drive mounted: ${name}`)
  }

  static mountRejected(log: LogService, reason: string): void {
    log.log(ENGINE_SCOPE, 'error', 'drive', `Mount rejected: ${reason}`)
  }

  static unmounted(log: LogService, driveId: string, name: string): void {
    log.log(driveId, 'info', 'drive', `Drive unmounted: ${name}`)
  }

  static transferStarted(log: LogService, driveId: string, fileName: string, direction: string, totalBytes: number): void {
    const size = totalBytes > 0 ? ` ${formatFileSize(totalBytes)}` : ''
    log.log(driveId, 'info', 'transfer', `File transfer started: ${fileName} (${direction}${size})`)
  }

  static transferCompleted(log: LogService, driveId: string, fileName: string): void {
    log.log(driveId, 'success', 'transfer', `File transfer completed: ${fileName}`)
  }

  static transferFailed(log: LogService, driveId: string, fileName: string, reason: string): void {
    log.log(driveId, 'error', 'transfer', `File transfer failed: ${fileName}: ${reason}`)
  }

  static retryScheduled(log: LogService, driveId: string, fileName: string, delayMs: number, attempt: number, max: number): void {
    const seconds = (delayMs / 1000).toFixed(1)
    log.log(driveId, 'info', 'transfer', `Retrying ${fileName} in ${seconds} second(s) (attempt ${attempt} of ${max}).`)
  }

  static transferCancelled(log: LogService, driveId: string, fileName: string): void {
    log.log(driveId, 'info', 'transfer', `File transfer cancelled: ${fileName}`)
  }

  static transferStalled(log: LogService, driveId: string, fileName: string, idleMs: number): void {
    const seconds = Math.round(idleMs / 1000)
    log.log(driveId, 'warning', 'transfer', `No progress on ${fileName} for ${seconds}s, aborting.`)
  }

  static syncPlanned(log: LogService, driveId: string, uploads: number, downloads: number, conflicts: number): void {
    log.log(driveId, 'info', 'sync', `Sync planned: ${uploads} upload(s), ${downloads} download(s), ${conflicts} conflict(s).`)
  }

  static syncFailed(log: LogService, driveId: string, reason: string): void {
    log.log(driveId, 'error', 'sync', `Sync failed: ${reason}`)
  }

  static scanCompleted(log: LogService, hosts: number, devices: number, ms: number): void {
    log.log(DISCOVERY_SCOPE, 'info', 'discovery', `Scan finished: ${devices} device(s) on ${hosts} host(s) in ${ms}ms.`)
  }

  static scanFailed(log: LogService, reason: string): void {
    log.log(DISCOVERY_SCOPE, 'error', 'discovery', `Scan failed: ${reason}`)
  }

  static deviceFound(log: LogService, name: string, ip: string, services: string): void {
    log.log(DISCOVERY_SCOPE, 'debug', 'discovery', `Found ${name} (${ip}): ${services}`)
  }

  static deviceUnreachable(log: LogService, name: string, cycles: number): void {
    log.log(DISCOVERY_SCOPE, 'warning', 'discovery', `${name} not seen for ${cycles} scan(s); marked unreachable.`)
  }
}
