import type { DriveProtocol, ProxyConfig } from '../../src/types/drive'

/** Listing shape shared by every protocol */
export interface RemoteEntry {
  name: string
  path: string           // posix path relative to the session root
  size: number
  isDirectory: boolean
  modifiedAt: number     // Unix ms, 0 when the server does not say
}

/** Read-only parameters a connector connects with */
export interface ConnectParams {
  host: string
  port: number
  rootPath: string
  secure: boolean
  timeoutMs: number
  username?: string
  password?: string
  privateKey?: string
  passphrase?: string
  token?: string
  mountPoint?: string
  proxy?: ProxyConfig
}

/** Base shape of a session; each connector narrows it */
export interface ConnectorSession {
  readonly id: string
  readonly protocol: DriveProtocol
}

export interface TransferOptions {
  /** Checked between chunks; aborting tears the stream down */
  signal?: AbortSignal
  /** Called with the running byte count, gated by interval/byte delta */
  onProgress?: (bytesTransferred: number) => void
  /** KB/s, 0 = unlimited */
  bandwidthLimit?: number
  progressIntervalMs?: number
  progressMinBytes?: number
}

export interface TransferResult {
  bytesTransferred: number
  /** SHA-256 of the bytes that were streamed, hex */
  checksum: string
  /** Unix ms each side carries once the copy is done; absent when the connector cannot tell */
  localModifiedAt?: number
  remoteModifiedAt?: number
}

/**
 * Uniform interface over one remote endpoint for one protocol.
 * Connectors hold no process-wide state: every session belongs to its caller.
 */
export interface ProtocolConnector<S extends ConnectorSession = ConnectorSession> {
  readonly protocol: DriveProtocol

  connect(params: ConnectParams): Promise<S>

  /** Must not mutate remote state */
  listEntries(session: S, remotePath: string): Promise<RemoteEntry[]>

  stat(session: S, remotePath: string): Promise<RemoteEntry>

  /** Create a directory and any missing parents */
  ensureDirectory(session: S, remotePath: string): Promise<void>

  upload(session: S, localPath: string, remotePath: string, options?: TransferOptions): Promise<TransferResult>

  download(session: S, remotePath: string, localPath: string, options?: TransferOptions): Promise<TransferResult>

  /** Idempotent; safe after a failed connect */
  disconnect(session: S): Promise<void>
}
