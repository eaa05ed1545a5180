import Conf from 'conf'
import type { DriveConfig, DriveCredentials, ProxyConfig } from '../../src/types/drive'
import { decryptSecret, encryptSecret, generateMasterKey } from '../utils/encryption'

/** A drive binding as kept on disk */
export interface SavedDrive {
  id: string
  config: DriveConfig
  createdAt: number
  updatedAt: number
}

type DriveConfigSchema = {
  drives: SavedDrive[]
  masterKey: string
}

export interface DriveConfigStoreOptions {
  /** Directory holding the drives file; defaults to the OS config dir */
  cwd?: string
  configName?: string
  now?: () => number
}

const SECRET_FIELDS = ['password', 'privateKey', 'passphrase', 'token'] as const

/**
 * DriveConfigStore: Persists drive bindings using conf so they survive a
 * restart. Passwords, keys, passphrases, tokens and proxy passwords are
 * encrypted at rest with AES-256-GCM under a master key kept in the same file.
 */
export class DriveConfigStore {
  private store: Conf<DriveConfigSchema>
  private masterKey: string
  private readonly now: () => number

  constructor(options: DriveConfigStoreOptions = {}) {
    this.now = options.now ?? Date.now
    this.store = new Conf<DriveConfigSchema>({
      projectName: 'netdrive-engine',
      configName: options.configName ?? 'drives',
      cwd: options.cwd,
      defaults: {
        drives: [],
        masterKey: ''
      }
    })

    let key = this.store.get('masterKey')
    if (!key) {
      key = generateMasterKey()
      this.store.set('masterKey', key)
    }
    this.masterKey = key
  }

  /** Every saved drive, secrets decrypted for in-memory use */
  getAll(): SavedDrive[] {
    return this.store.get('drives').map((saved) => this.open(saved))
  }

  getById(id: string): SavedDrive | undefined {
    const saved = this.store.get('drives').find((d) => d.id === id)
    return saved ? this.open(saved) : undefined
  }

  /** Insert or replace the binding for `id` */
  save(id: string, config: DriveConfig, createdAt?: number): SavedDrive {
    const drives = this.store.get('drives')
    const idx = drives.findIndex((d) => d.id === id)
    const now = this.now()
    const saved: SavedDrive = {
      id,
      config,
      createdAt: idx === -1 ? (createdAt ?? now) : drives[idx].createdAt,
      updatedAt: now
    }

    const sealed = this.seal(saved)
    if (idx === -1) drives.push(sealed)
    else drives[idx] = sealed
    this.store.set('drives', drives)
    return saved
  }

  delete(id: string): boolean {
    const drives = this.store.get('drives')
    const filtered = drives.filter((d) => d.id !== id)
    if (filtered.length === drives.length) return false
    this.store.set('drives', filtered)
    return true
  }

  private seal(saved: SavedDrive): SavedDrive {
    const { credentials, proxy } = saved.config
    return {
      ...saved,
      config: {
        ...saved.config,
        credentials: credentials ? this.mapSecrets(credentials, (v) => encryptSecret(v, this.masterKey)) : undefined,
        proxy: proxy ? this.mapProxy(proxy, (v) => encryptSecret(v, this.masterKey)) : undefined
      }
    }
  }

  private open(saved: SavedDrive): SavedDrive {
    const { credentials, proxy } = saved.config
    const reveal = (value: string): string | undefined => this.reveal(value)
    return {
      ...saved,
      config: {
        ...saved.config,
        credentials: credentials ? this.mapSecrets(credentials, reveal) : undefined,
        proxy: proxy ? this.mapProxy(proxy, reveal) : undefined
      }
    }
  }

  private mapSecrets(credentials: DriveCredentials, fn: (value: string) => string | undefined): DriveCredentials {
    const result: DriveCredentials = { ...credentials }
    for (const field of SECRET_FIELDS) {
      const value = credentials[field]
      if (value) result[field] = fn(value)
    }
    return result
  }

  private mapProxy(proxy: ProxyConfig, fn: (value: string) => string | undefined): ProxyConfig {
    return proxy.password ? { ...proxy, password: fn(proxy.password) } : { ...proxy }
  }

  /** A secret sealed under another master key comes back empty; the drive then fails authentication */
  private reveal(sealed: string): string | undefined {
    try {
      return decryptSecret(sealed, this.masterKey)
    } catch {
      return undefined
    }
  }
}
