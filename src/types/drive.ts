import type { ConflictResolution, TransferDirection } from './transfer'

/** Protocols a virtual drive can be bound to */
export type DriveProtocol = 'ftp' | 'sftp' | 'webdav' | 'smb' | 'cloud'

export const DRIVE_PROTOCOLS: readonly DriveProtocol[] = ['ftp', 'sftp', 'webdav', 'smb', 'cloud']

/** Status of a live session against a drive's endpoint */
export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected' | 'error'

/** Proxy configuration (SFTP only) */
export interface ProxyConfig {
  type: 'socks4' | 'socks5'
  host: string
  port: number
  username?: string
  password?: string
}

/** Secrets used to authenticate against the endpoint */
export interface DriveCredentials {
  username?: string
  password?: string
  privateKey?: string   // PEM/OpenSSH key data (SFTP)
  passphrase?: string
  token?: string        // bearer token (cloud)
}

/** Per-drive setting overrides; global settings apply where absent */
export interface DriveOverrides {
  concurrentTransfers?: number   // 1-10
  maxRetries?: number
  bandwidthLimitUp?: number      // KB/s, 0 = unlimited
  bandwidthLimitDown?: number
  verifyChecksums?: boolean
  syncIntervalMs?: number        // 0 = no automatic sync
  conflictResolution?: ConflictResolution
}

/** Everything needed to mount a drive */
export interface DriveConfig {
  name: string
  protocol: DriveProtocol
  host: string
  port?: number
  rootPath?: string
  secure?: boolean
  mountPoint?: string    // local mount of an SMB share
  localPath?: string     // local root used by sync
  credentials?: DriveCredentials
  proxy?: ProxyConfig
  deviceId?: string
  overrides?: DriveOverrides
}

/** A mounted (or previously mounted) drive, as seen by readers */
export interface VirtualDrive {
  id: string
  name: string
  protocol: DriveProtocol
  host: string
  port: number
  rootPath: string
  secure: boolean
  username?: string
  mountPoint?: string
  localPath?: string
  deviceId?: string
  overrides: DriveOverrides
  status: ConnectionStatus
  isOnline: boolean
  createdAt: number
  lastSyncAt?: number
  lastError?: string
  offlineReason?: string
}

/** A live session record */
export interface ActiveConnection {
  id: string
  driveId: string
  deviceId?: string
  protocol: DriveProtocol
  status: ConnectionStatus
  connectedAt?: number
  lastError?: string
}

export type MountErrorKind =
  | 'InvalidConfig'
  | 'AuthenticationFailed'
  | 'HostUnreachable'
  | 'TimedOut'
  | 'ProtocolError'
  | 'UnsupportedProtocol'

export interface MountError {
  kind: MountErrorKind
  message: string
}

export type MountResult =
  | { success: true; drive: VirtualDrive }
  | { success: false; error: MountError; driveId?: string }

/** Which side sync is allowed to write to */
export type SyncDirection = TransferDirection | 'both'

export interface SyncOptions {
  direction?: SyncDirection
  conflictResolution?: ConflictResolution
}

export interface SyncReport {
  driveId: string
  uploads: number
  downloads: number
  skipped: number
  conflicts: string[]     // relative paths left alone
  itemIds: string[]
  startedAt: number
  finishedAt: number
}

/** Events pushed by the drive manager */
export type DriveEvent =
  | { type: 'mounted'; driveId: string; drive: VirtualDrive }
  | { type: 'unmounted'; driveId: string; drive: VirtualDrive }
  | { type: 'status'; driveId: string; drive: VirtualDrive; status: ConnectionStatus }
  | { type: 'synced'; driveId: string; drive: VirtualDrive; report: SyncReport }
  | { type: 'error'; driveId: string; drive: VirtualDrive; kind: string; message: string }
  | { type: 'removed'; driveId: string }
