import Conf from 'conf'
import type { EngineSettings } from '../../src/types/settings'

export const DEFAULT_SETTINGS: EngineSettings = {
  transferConcurrency: 3,
  transferMaxRetries: 3,
  transferStallTimeoutMs: 60_000,
  transferVerifyChecksums: true,
  transferMaxHistoryItems: 500,
  bandwidthLimitUp: 0,
  bandwidthLimitDown: 0,

  progressIntervalMs: 250,
  progressMinBytes: 512 * 1024,

  retryInitialDelayMs: 1000,
  retryMaxDelayMs: 60_000,
  retryBackoffMultiplier: 2,
  retryJitter: true,

  connectionTimeoutMs: 15_000,
  defaultPorts: {
    ftp: 21,
    sftp: 22,
    webdav: 80,
    smb: 445,
    cloud: 443
  },

  discoveryIntervalMs: 60_000,
  discoveryMinIntervalMs: 10_000,
  discoveryProbeTimeoutMs: 400,
  discoveryConcurrency: 32,
  discoveryStaleAfterCycles: 3,
  discoveryPruneAfterMs: 24 * 60 * 60 * 1000,
  discoverySubnets: [],
  discoveryExtraHosts: [],
  discoveryResolveHostnames: true,

  syncMtimeToleranceMs: 2000,
  syncMaxDepth: 16,
  syncConflictResolution: 'overwrite-newer',

  logMaxEntries: 5000,
  logDebugMode: false
}

/** Merge saved values over the defaults (deep-merges the port map so new protocols get defaults) */
export function mergeSettings(saved: Partial<EngineSettings> | undefined): EngineSettings {
  return {
    ...DEFAULT_SETTINGS,
    ...saved,
    defaultPorts: { ...DEFAULT_SETTINGS.defaultPorts, ...saved?.defaultPorts }
  }
}

/** Read-only copy handed to the engine at mount/scan time */
export function freezeSettings(settings: EngineSettings): Readonly<EngineSettings> {
  return Object.freeze({
    ...settings,
    defaultPorts: Object.freeze({ ...settings.defaultPorts }),
    discoverySubnets: [...settings.discoverySubnets],
    discoveryExtraHosts: [...settings.discoveryExtraHosts]
  })
}

export interface SettingsStoreOptions {
  /** Directory holding the settings file; defaults to the OS config dir */
  cwd?: string
  configName?: string
}

/**
 * SettingsStore: Persists engine preferences using conf.
 * The engine only ever reads snapshots; writes come from the host application.
 */
export class SettingsStore {
  private store: Conf<{ settings: EngineSettings }>

  constructor(options: SettingsStoreOptions = {}) {
    this.store = new Conf<{ settings: EngineSettings }>({
      projectName: 'netdrive-engine',
      configName: options.configName ?? 'settings',
      cwd: options.cwd,
      defaults: {
        settings: DEFAULT_SETTINGS
      }
    })
  }

  /** Get all settings */
  getAll(): EngineSettings {
    const saved: Partial<EngineSettings> = this.store.get('settings')
    return mergeSettings(saved)
  }

  /** Get a single setting value */
  get<K extends keyof EngineSettings>(key: K): EngineSettings[K] {
    const settings = this.getAll()
    return settings[key]
  }

  /** Update one or more settings */
  update(updates: Partial<EngineSettings>): EngineSettings {
    const current = this.getAll()
    const updated = mergeSettings({ ...current, ...updates })
    this.store.set('settings', updated)
    return updated
  }

  /** Reset all settings to defaults */
  reset(): EngineSettings {
    this.store.set('settings', DEFAULT_SETTINGS)
    return mergeSettings(undefined)
  }

  /** Frozen snapshot of the current settings */
  snapshot(): Readonly<EngineSettings> {
    return freezeSettings(this.getAll())
  }
}
