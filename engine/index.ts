import { on } from 'events'
import type { DriveEvent, MountResult } from '../src/types/drive'
import type { NetworkDevice, ScanSummary } from '../src/types/discovery'
import type { LogEntry } from '../src/types/log'
import type { EngineSettings } from '../src/types/settings'
import type { TransferEvent } from '../src/types/transfer'
import { createDiscoveryStore, type DiscoveryStore } from '../src/stores/discoveryStore'
import { createDriveStore, type DriveStore } from '../src/stores/driveStore'
import { createLogStore, type LogStore } from '../src/stores/logStore'
import { createTransferStore, type TransferStore } from '../src/stores/transferStore'
import type { ConnectorFactory } from './connectors'
import { errorMessage } from './errors'
import type { DriveConfigStore } from './services/DriveConfigStore'
import { LogService } from './services/LogService'
import { NetworkDiscoveryService } from './services/NetworkDiscoveryService'
import { ProgressTracker } from './services/ProgressTracker'
import { freezeSettings, mergeSettings, type SettingsStore } from './services/SettingsStore'
import { VirtualDriveManager } from './services/VirtualDriveManager'
import type { HostnameResolver, PortProber } from './utils/portProbe'
import type { InterfaceTable } from './utils/subnet'

export interface DriveEngineOptions {
  /** Persistent settings; read as a frozen snapshot on every use */
  settingsStore?: SettingsStore
  /** Applied over the store (or the defaults) */
  settings?: Partial<EngineSettings>
  /** Saved drive bindings; restoreDrives() mounts them again */
  driveStore?: DriveConfigStore
  connectorFactory?: ConnectorFactory
  prober?: PortProber
  resolveHostname?: HostnameResolver
  interfaces?: () => InterfaceTable
}

export interface EngineStores {
  transfers: TransferStore
  drives: DriveStore
  devices: DiscoveryStore
  logs: LogStore
}

/**
 * DriveEngine: The assembly point. Builds one LogService, ProgressTracker,
 * discovery service and drive manager, and keeps the snapshot stores in step
 * with their events.
 */
export class DriveEngine {
  readonly log: LogService
  readonly tracker: ProgressTracker
  readonly discovery: NetworkDiscoveryService
  readonly drives: VirtualDriveManager
  readonly stores: EngineStores

  private readonly readSettings: () => Readonly<EngineSettings>

  constructor(options: DriveEngineOptions = {}) {
    const { settingsStore, settings: overrides } = options
    this.readSettings = () =>
      freezeSettings(mergeSettings({ ...(settingsStore ? settingsStore.getAll() : undefined), ...overrides }))

    const initial = this.readSettings()
    this.log = new LogService(initial.logMaxEntries, initial.logDebugMode)
    this.tracker = new ProgressTracker()
    this.discovery = new NetworkDiscoveryService({
      log: this.log,
      settings: this.readSettings,
      prober: options.prober,
      resolveHostname: options.resolveHostname,
      interfaces: options.interfaces
    })
    this.drives = new VirtualDriveManager({
      log: this.log,
      settings: this.readSettings,
      connectorFactory: options.connectorFactory,
      tracker: this.tracker,
      driveStore: options.driveStore
    })
    this.stores = {
      transfers: createTransferStore(),
      drives: createDriveStore(),
      devices: createDiscoveryStore(),
      logs: createLogStore(initial.logMaxEntries)
    }

    this.wireStores()
  }

  settings(): Readonly<EngineSettings> {
    return this.readSettings()
  }

  /** Start continuous discovery; returns the interval in use */
  start(intervalMs?: number): number {
    return this.discovery.startContinuousMonitoring(intervalMs)
  }

  stop(): void {
    this.discovery.stopContinuousMonitoring()
  }

  /** Mount every drive saved in the drive store */
  restoreDrives(): Promise<MountResult[]> {
    return this.drives.restore()
  }

  /** Transfer events as an async iterable; ends when `signal` aborts */
  transferEvents(signal?: AbortSignal): AsyncGenerator<TransferEvent, void, undefined> {
    return iterate<TransferEvent>(this.drives, 'transfer', signal)
  }

  /** Drive events as an async iterable; ends when `signal` aborts */
  driveEvents(signal?: AbortSignal): AsyncGenerator<DriveEvent, void, undefined> {
    return iterate<DriveEvent>(this.drives, 'drive', signal)
  }

  async dispose(): Promise<void> {
    this.discovery.dispose()
    await this.drives.dispose()
    this.tracker.clear()
  }

  private wireStores(): void {
    const { transfers, drives, devices, logs } = this.stores

    this.drives.on('transfer', (event: TransferEvent) => transfers.getState().applyEvent(event))
    this.drives.on('drive', (event: DriveEvent) => drives.getState().applyEvent(event))
    this.log.on('entry', (scope: string, entry: LogEntry) => logs.getState().addEntry(scope, entry))

    const onDevice = (device: NetworkDevice): void => {
      devices.getState().upsertDevice(device)
      this.drives.noteDeviceStatus(device)
    }
    this.discovery.on('device', onDevice)
    this.discovery.on('stale', onDevice)
    this.discovery.on('unreachable', onDevice)
    this.discovery.on('removed', (id: string) => devices.getState().removeDevice(id))
    this.discovery.on('scanComplete', (summary: ScanSummary) => devices.getState().setScanComplete(summary))
    this.discovery.on('scanError', (err: unknown) => devices.getState().setScanError(errorMessage(err)))
  }
}

export function createDriveEngine(options: DriveEngineOptions = {}): DriveEngine {
  return new DriveEngine(options)
}

async function* iterate<T>(
  emitter: VirtualDriveManager,
  eventName: string,
  signal?: AbortSignal
): AsyncGenerator<T, void, undefined> {
  try {
    for await (const args of on(emitter, eventName, { signal })) {
      const [event]: T[] = args
      yield event
    }
  } catch (err) {
    if (signal?.aborted) return
    throw err
  }
}

export { createConnector, CloudConnector, FTPConnector, SFTPConnector, SMBConnector, WebDAVConnector } from './connectors'
export type { ConnectorFactory, ConnectParams, ConnectorSession, ProtocolConnector, RemoteEntry } from './connectors'
export * from './errors'
export { LogService } from './services/LogService'
export { NetworkDiscoveryService, classifyDevice } from './services/NetworkDiscoveryService'
export { ProgressTracker, type TransferProgress } from './services/ProgressTracker'
export { DriveConfigStore, type SavedDrive } from './services/DriveConfigStore'
export { DEFAULT_SETTINGS, SettingsStore } from './services/SettingsStore'
export { TransferQueue } from './services/TransferQueue'
export { VirtualDriveManager, type MountDiscoveredOptions, type TransferRequestOptions } from './services/VirtualDriveManager'
export { planSync, type SyncAction, type SyncEntry, type SyncPlan } from './utils/syncPlanner'
export type * from '../src/types/discovery'
export type * from '../src/types/drive'
export type * from '../src/types/log'
export type * from '../src/types/settings'
export type * from '../src/types/transfer'
