import { EventEmitter } from 'events'
import { join } from 'path'
import { v4 as uuid } from 'uuid'
import type { DeviceService, NetworkDevice } from '../../src/types/discovery'
import type {
  ActiveConnection,
  DriveConfig,
  DriveCredentials,
  DriveEvent,
  DriveOverrides,
  DriveProtocol,
  MountError,
  MountResult,
  SyncOptions,
  SyncReport,
  VirtualDrive
} from '../../src/types/drive'
import type { EngineSettings } from '../../src/types/settings'
import type { TransferEvent, TransferItem, TransferPriority } from '../../src/types/transfer'
import { isFinished } from '../../src/types/transfer'
import { resolveDriveSettings, type ResolvedDriveSettings } from '../../src/utils/resolveSettings'
import { createConnector, type ConnectorFactory } from '../connectors'
import type { ConnectParams, ConnectorSession, ProtocolConnector, RemoteEntry } from '../connectors/types'
import { IoError, errorMessage, toEngineError, toMountErrorKind, type EngineError } from '../errors'
import { checkCredentials, checkDriveConfig, checkOverrides } from '../utils/driveConfigSchema'
import { planSync, walkLocal, walkRemote, type SyncBaseline } from '../utils/syncPlanner'
import { ConnectSerializer, DriveConnection } from './DriveConnection'
import type { DriveConfigStore } from './DriveConfigStore'
import { LogService } from './LogService'
import type { ProgressTracker } from './ProgressTracker'
import { SessionPool } from './SessionPool'
import { TransferQueue } from './TransferQueue'

export interface VirtualDriveManagerOptions {
  log: LogService
  /** Read when a drive is mounted or its overrides change */
  settings: () => Readonly<EngineSettings>
  connectorFactory?: ConnectorFactory
  /** Feeds the stall watchdog of every queue */
  tracker?: ProgressTracker
  serializer?: ConnectSerializer
  /** Mounted drives are saved here and removed drives forgotten; restore() reads it back */
  driveStore?: DriveConfigStore
  now?: () => number
}

/** Per-file options for upload/download */
export interface TransferRequestOptions {
  fileName?: string
  totalBytes?: number
  priority?: TransferPriority
  maxRetries?: number
  checksum?: string
  metadata?: Record<string, string>
}

/** What a discovered service does not say about itself */
export interface MountDiscoveredOptions {
  name?: string
  rootPath?: string
  mountPoint?: string
  localPath?: string
  credentials?: DriveCredentials
  overrides?: DriveOverrides
}

interface DriveRecord {
  drive: VirtualDrive
  config: DriveConfig
  settings: ResolvedDriveSettings
  connection: DriveConnection
  pool: SessionPool
  queue: TransferQueue
  untrack: () => void
  syncTimer: ReturnType<typeof setInterval> | null
  syncing: Promise<SyncReport> | null
  checking: boolean
  deviceUnreachable: boolean
  /** Items unmount paused; they resume on the next connect */
  pausedByUnmount: Set<string>
  /** Last completed copy of each path under the sync folder */
  syncBaseline: Map<string, SyncBaseline>
}

/**
 * VirtualDriveManager: Owns every mounted drive: its connection, session
 * pool and transfer queue. A drive is online exactly when its connection is
 * 'connected'; nothing here reconnects on its own.
 *
 * Events:
 *   'drive'    → (DriveEvent)
 *   'transfer' → (TransferEvent)  re-emitted from every drive's queue
 */
export class VirtualDriveManager extends EventEmitter {
  private records: Map<string, DriveRecord> = new Map()
  private readonly log: LogService
  private readonly settings: () => Readonly<EngineSettings>
  private readonly connectorFactory: ConnectorFactory
  private readonly tracker?: ProgressTracker
  private readonly serializer: ConnectSerializer
  private readonly driveStore?: DriveConfigStore
  private readonly now: () => number

  constructor(options: VirtualDriveManagerOptions) {
    super()
    this.log = options.log
    this.settings = options.settings
    this.connectorFactory = options.connectorFactory ?? createConnector
    this.tracker = options.tracker
    this.serializer = options.serializer ?? new ConnectSerializer()
    this.driveStore = options.driveStore
    this.now = options.now ?? Date.now
  }

  // ── Lifecycle ──

  /**
   * Validate, register and connect a drive. A failed connect leaves the
   * drive registered and offline; the result carries its id.
   */
  async mount(input: DriveConfig): Promise<MountResult> {
    const checked = checkDriveConfig(input)
    if (!checked.ok) {
      LogService.mountRejected(this.log, checked.message)
      return {
        success: false,
        error: { kind: checked.reason === 'unsupported' ? 'UnsupportedProtocol' : 'InvalidConfig', message: checked.message }
      }
    }

    let connector: ProtocolConnector
    try {
      connector = this.connectorFactory(checked.config.protocol)
    } catch (err) {
      const error = toEngineError(err)
      LogService.mountRejected(this.log, error.message)
      return { success: false, error: { kind: toMountErrorKind(error.kind), message: error.message } }
    }

    const record = this.register(checked.config, connector)
    this.persist(record)
    return this.connectDrive(record)
  }

  /**
   * Register and connect every drive the drive store holds, keeping their
   * ids. A saved config that no longer validates is logged and skipped.
   */
  async restore(): Promise<MountResult[]> {
    if (!this.driveStore) return []

    const pending: Promise<MountResult>[] = []
    for (const saved of this.driveStore.getAll()) {
      if (this.records.has(saved.id)) continue
      const checked = checkDriveConfig(saved.config)
      if (!checked.ok) {
        LogService.mountRejected(this.log, `${saved.config.name}: ${checked.message}`)
        continue
      }
      let connector: ProtocolConnector
      try {
        connector = this.connectorFactory(checked.config.protocol)
      } catch (err) {
        LogService.mountRejected(this.log, `${saved.config.name}: ${errorMessage(err)}`)
        continue
      }
      const record = this.register(checked.config, connector, { id: saved.id, createdAt: saved.createdAt })
      pending.push(this.connectDrive(record))
    }
    return Promise.all(pending)
  }

  /** Build a config from a discovered service and mount it */
  mountDiscovered(device: NetworkDevice, service: DeviceService, options: MountDiscoveredOptions = {}): Promise<MountResult> {
    if (!service.protocol) {
      const message = `${service.name} on ${device.ipAddress}:${service.port} is not a mountable service`
      LogService.mountRejected(this.log, message)
      return Promise.resolve({ success: false, error: { kind: 'UnsupportedProtocol', message } })
    }
    return this.mount({
      ...options,
      name: options.name ?? `${device.name} (${service.name})`,
      protocol: service.protocol,
      host: device.ipAddress,
      port: service.port,
      secure: service.secure,
      deviceId: device.id
    })
  }

  /** Stop dispatching, pause running transfers and close every session. Idempotent */
  async unmount(driveId: string): Promise<boolean> {
    const record = this.records.get(driveId)
    if (!record) return false

    this.clearAutoSync(record)
    const wasOpen = record.connection.status !== 'disconnected'

    record.queue.stop()
    for (const id of record.queue.pauseActive()) record.pausedByUnmount.add(id)
    await record.queue.drain()
    await record.pool.drain()

    if (wasOpen) record.drive.offlineReason = 'Unmounted'
    await record.connection.disconnect()

    if (wasOpen) {
      LogService.disconnected(this.log, driveId)
      LogService.unmounted(this.log, driveId, record.drive.name)
      this.publish({ type: 'unmounted', driveId, drive: copyDrive(record.drive) })
    }
    return true
  }

  /** Drop every session and connect again */
  async reconnect(driveId: string): Promise<MountResult> {
    const record = this.records.get(driveId)
    if (!record) {
      return { success: false, error: { kind: 'InvalidConfig', message: `Unknown drive: ${driveId}` }, driveId }
    }
    this.clearAutoSync(record)
    await record.pool.drain()
    await record.connection.disconnect()
    return this.connectDrive(record)
  }

  /** Unmount, cancel the drive's transfers and forget it */
  async remove(driveId: string): Promise<boolean> {
    const record = this.records.get(driveId)
    if (!record) return false

    await this.unmount(driveId)
    await record.queue.dispose()
    record.untrack()
    record.queue.removeAllListeners()
    record.connection.removeAllListeners()
    this.records.delete(driveId)
    this.driveStore?.delete(driveId)
    this.log.log(driveId, 'info', 'drive', `Drive removed: ${record.drive.name}`)
    this.publish({ type: 'removed', driveId })
    return true
  }

  /** New credentials apply from the next connect */
  updateCredentials(driveId: string, input: DriveCredentials): MountError | null {
    const record = this.records.get(driveId)
    if (!record) return { kind: 'InvalidConfig', message: `Unknown drive: ${driveId}` }

    const checked = checkCredentials(input)
    if (!checked.ok) return { kind: 'InvalidConfig', message: checked.message }

    record.config = { ...record.config, credentials: checked.credentials }
    this.persist(record)
    record.connection.updateParams(credentialParams(checked.credentials))
    record.drive.username = checked.credentials.username
    return null
  }

  /** Merge new overrides and apply them to the running queue */
  updateOverrides(driveId: string, input: DriveOverrides): MountError | null {
    const record = this.records.get(driveId)
    if (!record) return { kind: 'InvalidConfig', message: `Unknown drive: ${driveId}` }

    const checked = checkOverrides(input)
    if (!checked.ok) return { kind: 'InvalidConfig', message: checked.message }

    const overrides = { ...record.drive.overrides, ...checked.overrides }
    record.config = { ...record.config, overrides }
    this.persist(record)
    record.drive.overrides = overrides
    record.settings = resolveDriveSettings(this.settings(), overrides)
    this.applySettings(record)
    if (record.connection.isConnected) this.scheduleAutoSync(record)
    return null
  }

  // ── Drive operations ──

  browse(driveId: string, remotePath: string = '/'): Promise<RemoteEntry[]> {
    const record = this.require(driveId)
    return this.onControl(record, (session, connector) => connector.listEntries(session, remotePath))
  }

  upload(driveId: string, localPath: string, remotePath: string, options: TransferRequestOptions = {}): TransferItem {
    const record = this.require(driveId)
    return record.queue.enqueue({
      ...options,
      localPath,
      remotePath,
      direction: 'upload',
      maxRetries: options.maxRetries ?? record.settings.maxRetries
    })
  }

  download(driveId: string, remotePath: string, localPath: string, options: TransferRequestOptions = {}): TransferItem {
    const record = this.require(driveId)
    return record.queue.enqueue({
      ...options,
      localPath,
      remotePath,
      direction: 'download',
      maxRetries: options.maxRetries ?? record.settings.maxRetries
    })
  }

  /**
   * Compare the drive's local folder with its remote root and enqueue what
   * differs. A sync already running for the drive is joined, not repeated.
   */
  sync(driveId: string, options: SyncOptions = {}): Promise<SyncReport> {
    const record = this.require(driveId)
    if (!record.syncing) {
      record.syncing = this.runSync(record, options).finally(() => {
        record.syncing = null
      })
    }
    return record.syncing
  }

  /** Reflect a device's reachability on the drives bound to it */
  noteDeviceStatus(device: NetworkDevice): void {
    for (const record of this.records.values()) {
      if (record.drive.deviceId !== device.id) continue
      const unreachable = !device.isReachable
      if (unreachable === record.deviceUnreachable) continue

      record.deviceUnreachable = unreachable
      if (unreachable) {
        record.drive.offlineReason = `Device ${device.name} is unreachable`
      } else if (record.connection.isConnected) {
        record.drive.offlineReason = undefined
      }
      this.publish({
        type: 'status',
        driveId: record.drive.id,
        drive: copyDrive(record.drive),
        status: record.drive.status
      })
    }
  }

  // ── Queries ──

  getDrive(driveId: string): VirtualDrive | undefined {
    const record = this.records.get(driveId)
    return record ? copyDrive(record.drive) : undefined
  }

  getDrives(): VirtualDrive[] {
    return Array.from(this.records.values(), (r) => copyDrive(r.drive))
  }

  getConnection(driveId: string): ActiveConnection | undefined {
    return this.records.get(driveId)?.connection.snapshot()
  }

  /** The drive's queue, for cancel/pause/resume/retry and stats */
  getQueue(driveId: string): TransferQueue | undefined {
    return this.records.get(driveId)?.queue
  }

  /** Copies of the items of one drive, or of every drive */
  transfers(driveId?: string): TransferItem[] {
    if (driveId !== undefined) return this.records.get(driveId)?.queue.getAll() ?? []
    return Array.from(this.records.values()).flatMap((r) => r.queue.getAll())
  }

  /** Unmount every drive and stop its queue for good */
  async dispose(): Promise<void> {
    const records = Array.from(this.records.values())
    await Promise.all(
      records.map(async (record) => {
        await this.unmount(record.drive.id)
        await record.queue.dispose()
        record.untrack()
      })
    )
    this.records.clear()
  }

  // ── Internals ──

  private register(
    config: DriveConfig,
    connector: ProtocolConnector,
    saved?: { id: string; createdAt: number }
  ): DriveRecord {
    const settings = this.settings()
    const resolved = resolveDriveSettings(settings, config.overrides)
    const id = saved?.id ?? uuid()
    const port = config.port ?? defaultPort(config.protocol, config.secure ?? false, settings)

    const drive: VirtualDrive = {
      id,
      name: config.name,
      protocol: config.protocol,
      host: config.host,
      port,
      rootPath: config.rootPath ?? '/',
      secure: config.secure ?? false,
      username: config.credentials?.username,
      mountPoint: config.mountPoint,
      localPath: config.localPath,
      deviceId: config.deviceId,
      overrides: { ...config.overrides },
      status: 'disconnected',
      isOnline: false,
      createdAt: saved?.createdAt ?? this.now()
    }

    const connection = new DriveConnection({
      driveId: id,
      deviceId: config.deviceId,
      connector,
      params: {
        host: config.host,
        port,
        rootPath: drive.rootPath,
        secure: drive.secure,
        timeoutMs: settings.connectionTimeoutMs,
        mountPoint: config.mountPoint,
        proxy: config.proxy,
        ...credentialParams(config.credentials)
      },
      serializer: this.serializer,
      now: this.now
    })

    const pool = new SessionPool({
      open: () => connection.openSession(),
      close: (session) => connection.closeSession(session),
      maxIdle: resolved.concurrentTransfers
    })

    const queue = new TransferQueue({
      driveId: id,
      connector,
      sessions: pool,
      log: this.log,
      backoff: {
        initialDelayMs: settings.retryInitialDelayMs,
        maxDelayMs: settings.retryMaxDelayMs,
        multiplier: settings.retryBackoffMultiplier,
        jitter: settings.retryJitter
      },
      concurrentLimit: resolved.concurrentTransfers,
      maxRetries: resolved.maxRetries,
      verifyChecksums: resolved.verifyChecksums,
      bandwidthLimitUp: resolved.bandwidthLimitUp,
      bandwidthLimitDown: resolved.bandwidthLimitDown,
      progressIntervalMs: settings.progressIntervalMs,
      progressMinBytes: settings.progressMinBytes,
      stallTimeoutMs: settings.transferStallTimeoutMs,
      maxHistoryItems: settings.transferMaxHistoryItems,
      tracker: this.tracker,
      now: this.now
    })

    const record: DriveRecord = {
      drive,
      config,
      settings: resolved,
      connection,
      pool,
      queue,
      untrack: this.tracker ? this.tracker.track(queue) : () => {},
      syncTimer: null,
      syncing: null,
      checking: false,
      deviceUnreachable: false,
      pausedByUnmount: new Set(),
      syncBaseline: new Map()
    }

    connection.on('status', (state: ActiveConnection) => this.onConnectionStatus(record, state))
    connection.on('closeError', (sessionId: string, error: EngineError) => {
      this.log.log(id, 'warning', 'connector', `Failed to close session ${sessionId}: ${error.message}`)
    })
    pool.on('closeError', (sessionId: string, err: unknown) => {
      this.log.log(id, 'warning', 'connector', `Failed to close session ${sessionId}: ${errorMessage(err)}`)
    })
    queue.on('transfer', (event: TransferEvent) => {
      if (event.type === 'completed') this.recordBaseline(record, event.item)
      this.emit('transfer', event)
    })
    queue.on('connectionFailure', () => {
      // checkConnection never rejects
      void this.checkConnection(record)
    })

    this.records.set(id, record)
    return record
  }

  private async connectDrive(record: DriveRecord): Promise<MountResult> {
    const { drive } = record
    LogService.connecting(this.log, drive.id, drive.protocol, drive.host, drive.port)

    try {
      await record.connection.connect()
    } catch (err) {
      const error = toEngineError(err, 'connection')
      LogService.connectFailed(this.log, drive.id, error.message)
      this.publish({ type: 'error', driveId: drive.id, drive: copyDrive(drive), kind: error.kind, message: error.message })
      return {
        success: false,
        error: { kind: toMountErrorKind(error.kind), message: error.message },
        driveId: drive.id
      }
    }

    LogService.connected(this.log, drive.id)
    LogService.mounted(this.log, drive.id, drive.name)
    this.scheduleAutoSync(record)
    const snapshot = copyDrive(drive)
    this.publish({ type: 'mounted', driveId: drive.id, drive: snapshot })
    return { success: true, drive: snapshot }
  }

  private onConnectionStatus(record: DriveRecord, state: ActiveConnection): void {
    const { drive, queue } = record
    drive.status = state.status
    drive.isOnline = state.status === 'connected'

    if (state.status === 'connected') {
      drive.lastError = undefined
      drive.offlineReason = record.deviceUnreachable ? drive.offlineReason : undefined
      queue.start()
      for (const id of record.pausedByUnmount) queue.resume(id)
      record.pausedByUnmount.clear()
    } else {
      queue.stop()
      if (state.status === 'error') {
        drive.lastError = state.lastError
        drive.offlineReason = state.lastError
      }
    }

    this.publish({ type: 'status', driveId: drive.id, drive: copyDrive(drive), status: state.status })
  }

  /** A connection-level transfer failure: check the control session, go offline if it is gone */
  private async checkConnection(record: DriveRecord): Promise<void> {
    if (record.checking || !record.connection.isConnected) return
    record.checking = true
    try {
      if (await record.connection.verify()) return

      const reason = record.drive.lastError ?? 'Connection check failed'
      LogService.connectionLost(this.log, record.drive.id, reason)
      this.clearAutoSync(record)
      await record.pool.drain()
      this.publish({
        type: 'error',
        driveId: record.drive.id,
        drive: copyDrive(record.drive),
        kind: 'connection',
        message: reason
      })
    } finally {
      record.checking = false
    }
  }

  /** Run on the control session; connection-level failures trigger a health check */
  private async onControl<T>(
    record: DriveRecord,
    operation: (session: ConnectorSession, connector: ProtocolConnector) => Promise<T>
  ): Promise<T> {
    try {
      return await record.connection.withControl(operation)
    } catch (err) {
      const error = toEngineError(err, 'connection')
      if (error.kind === 'connection' || error.kind === 'timeout') await this.checkConnection(record)
      throw error
    }
  }

  private async runSync(record: DriveRecord, options: SyncOptions): Promise<SyncReport> {
    const { drive, queue } = record
    const localRoot = drive.localPath
    if (!localRoot) throw new IoError(`Drive ${drive.name} has no local folder to sync with`)

    const settings = this.settings()
    const startedAt = this.now()
    const local = await walkLocal(localRoot, settings.syncMaxDepth)
    const remote = await this.onControl(record, (session, connector) =>
      walkRemote(connector, session, '/', settings.syncMaxDepth)
    )

    const plan = planSync(local, remote, {
      direction: options.direction ?? 'both',
      conflictResolution: options.conflictResolution ?? record.settings.conflictResolution,
      toleranceMs: settings.syncMtimeToleranceMs,
      baseline: record.syncBaseline
    })

    // A file still waiting in the queue is not enqueued twice
    const pending = new Set(
      queue
        .getAll()
        .filter((item) => !isFinished(item))
        .map((item) => `${item.direction}:${item.remotePath}`)
    )

    const itemIds: string[] = []
    let uploads = 0
    let downloads = 0
    let skipped = plan.skipped.length

    for (const action of plan.actions) {
      if (pending.has(`${action.direction}:${action.path}`)) {
        skipped++
        continue
      }
      const item = queue.enqueue({
        localPath: syncLocalPath(localRoot, action.path),
        remotePath: action.path,
        direction: action.direction,
        totalBytes: action.size,
        maxRetries: record.settings.maxRetries,
        metadata: { origin: 'sync', reason: action.reason }
      })
      itemIds.push(item.id)
      if (action.direction === 'upload') uploads++
      else downloads++
    }

    const finishedAt = this.now()
    drive.lastSyncAt = finishedAt
    const report: SyncReport = {
      driveId: drive.id,
      uploads,
      downloads,
      skipped,
      conflicts: plan.conflicts,
      itemIds,
      startedAt,
      finishedAt
    }
    LogService.syncPlanned(this.log, drive.id, uploads, downloads, plan.conflicts.length)
    this.publish({ type: 'synced', driveId: drive.id, drive: copyDrive(drive), report })
    return report
  }

  private persist(record: DriveRecord): void {
    this.driveStore?.save(record.drive.id, record.config, record.drive.createdAt)
  }

  /** Remember both stamps of a copy between the sync folder and the same remote path */
  private recordBaseline(record: DriveRecord, item: TransferItem): void {
    const localRoot = record.drive.localPath
    if (!localRoot || item.localModifiedAt === undefined || item.remoteModifiedAt === undefined) return
    if (item.localPath !== syncLocalPath(localRoot, item.remotePath)) return
    record.syncBaseline.set(item.remotePath, {
      size: item.totalBytes,
      localModifiedAt: item.localModifiedAt,
      remoteModifiedAt: item.remoteModifiedAt
    })
  }

  private scheduleAutoSync(record: DriveRecord): void {
    this.clearAutoSync(record)
    const interval = record.settings.syncIntervalMs
    if (interval <= 0 || !record.drive.localPath) return

    record.syncTimer = setInterval(() => {
      if (!record.connection.isConnected) return
      this.sync(record.drive.id).catch((err: unknown) => this.reportSyncError(record, err))
    }, interval)
  }

  private clearAutoSync(record: DriveRecord): void {
    if (record.syncTimer) {
      clearInterval(record.syncTimer)
      record.syncTimer = null
    }
  }

  private reportSyncError(record: DriveRecord, err: unknown): void {
    const error = toEngineError(err, 'io')
    LogService.syncFailed(this.log, record.drive.id, error.message)
    this.publish({
      type: 'error',
      driveId: record.drive.id,
      drive: copyDrive(record.drive),
      kind: error.kind,
      message: error.message
    })
  }

  private applySettings(record: DriveRecord): void {
    const { queue, pool, settings } = record
    queue.setConcurrentLimit(settings.concurrentTransfers)
    queue.setVerifyChecksums(settings.verifyChecksums)
    queue.bandwidthLimitUp = settings.bandwidthLimitUp
    queue.bandwidthLimitDown = settings.bandwidthLimitDown
    pool.setMaxIdle(settings.concurrentTransfers)
  }

  private require(driveId: string): DriveRecord {
    const record = this.records.get(driveId)
    if (!record) throw new Error(`Unknown drive: ${driveId}`)
    return record
  }

  private publish(event: DriveEvent): void {
    this.emit('drive', event)
  }
}

/** Implicit-TLS WebDAV lives on 443 rather than the configured plain port */
/** Where a remote path lands inside the drive's sync folder */
function syncLocalPath(localRoot: string, remotePath: string): string {
  return join(localRoot, ...remotePath.split('/').filter(Boolean))
}

function defaultPort(protocol: DriveProtocol, secure: boolean, settings: Readonly<EngineSettings>): number {
  if (protocol === 'webdav' && secure) return 443
  return settings.defaultPorts[protocol]
}

function credentialParams(
  credentials: DriveCredentials = {}
): Pick<ConnectParams, 'username' | 'password' | 'privateKey' | 'passphrase' | 'token'> {
  return {
    username: credentials.username,
    password: credentials.password,
    privateKey: credentials.privateKey,
    passphrase: credentials.passphrase,
    token: credentials.token
  }
}

function copyDrive(drive: VirtualDrive): VirtualDrive {
  return { ...drive, overrides: { ...drive.overrides } }
}
