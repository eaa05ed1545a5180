import { createReadStream, createWriteStream, promises as fsp, type Stats } from 'fs'
import { join } from 'path'
import { pipeline } from 'stream/promises'
import { ConnectionError, EngineError, ProtocolError, errorCode, errorMessage, toEngineError } from '../errors'
import { joinRemotePath, normalizeRemotePath } from '../utils/remotePath'
import {
  createGate,
  localFileSize,
  localModifiedAt,
  newSessionId,
  preserveModifiedAt,
  prepareLocalTarget,
  throwIfAborted,
  toTransferError
} from './shared'
import type {
  ConnectParams,
  ConnectorSession,
  ProtocolConnector,
  RemoteEntry,
  TransferOptions,
  TransferResult
} from './types'

export class SMBSession implements ConnectorSession {
  readonly id = newSessionId('smb')
  readonly protocol = 'smb' as const

  constructor(
    /** Local directory the share's root path maps to */
    readonly basePath: string
  ) {}
}

/**
 * SMBConnector: Talks to a share the operating system has already mounted
 * (CIFS mount, mapped drive, gvfs). Every path is resolved under the mount
 * point, so nothing outside it is reachable.
 */
export class SMBConnector implements ProtocolConnector<SMBSession> {
  readonly protocol = 'smb' as const

  async connect(params: ConnectParams): Promise<SMBSession> {
    if (!params.mountPoint) {
      throw new ProtocolError(`SMB share //${params.host} has no local mount point`)
    }
    const basePath = join(params.mountPoint, ...normalizeRemotePath(params.rootPath).split('/').filter(Boolean))

    let stats: Stats
    try {
      stats = await fsp.stat(basePath)
    } catch (err) {
      throw new ConnectionError(`Share //${params.host} is not mounted at ${basePath}`, { cause: err })
    }
    if (!stats.isDirectory()) {
      throw new ProtocolError(`Mount point is not a directory: ${basePath}`)
    }
    return new SMBSession(basePath)
  }

  async listEntries(session: SMBSession, remotePath: string): Promise<RemoteEntry[]> {
    const dir = normalizeRemotePath(remotePath)
    try {
      const names = await fsp.readdir(this.localPath(session, dir))
      return await Promise.all(names.map((name) => this.stat(session, joinRemotePath(dir, name))))
    } catch (err) {
      throw classifyFsError(err)
    }
  }

  async stat(session: SMBSession, remotePath: string): Promise<RemoteEntry> {
    const path = normalizeRemotePath(remotePath)
    try {
      const stats = await fsp.stat(this.localPath(session, path))
      return {
        name: path === '/' ? '/' : path.slice(path.lastIndexOf('/') + 1),
        path,
        size: stats.isDirectory() ? 0 : stats.size,
        isDirectory: stats.isDirectory(),
        modifiedAt: Math.floor(stats.mtimeMs)
      }
    } catch (err) {
      throw classifyFsError(err)
    }
  }

  async ensureDirectory(session: SMBSession, remotePath: string): Promise<void> {
    try {
      await fsp.mkdir(this.localPath(session, remotePath), { recursive: true })
    } catch (err) {
      throw classifyFsError(err)
    }
  }

  async upload(
    session: SMBSession,
    localPath: string,
    remotePath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await localFileSize(localPath)

    const gate = createGate(options)
    const target = this.localPath(session, remotePath)
    try {
      await pipeline(createReadStream(localPath), gate, createWriteStream(target))
    } catch (err) {
      throw toTransferError(err, options.signal, 'io')
    }
    const modifiedAt = await localModifiedAt(localPath)
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: modifiedAt,
      remoteModifiedAt: await preserveModifiedAt(target, modifiedAt)
    }
  }

  async download(
    session: SMBSession,
    remotePath: string,
    localPath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await prepareLocalTarget(localPath)

    const source = await this.stat(session, remotePath)
    const gate = createGate(options)
    try {
      await pipeline(createReadStream(this.localPath(session, remotePath)), gate, createWriteStream(localPath))
    } catch (err) {
      throw toTransferError(err, options.signal, 'io')
    }
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: await preserveModifiedAt(localPath, source.modifiedAt),
      remoteModifiedAt: source.modifiedAt
    }
  }

  /** The OS owns the mount; a session holds no handle */
  async disconnect(_session: SMBSession): Promise<void> {}

  private localPath(session: SMBSession, remotePath: string): string {
    return join(session.basePath, normalizeRemotePath(remotePath))
  }
}

/** A stale CIFS mount fails with ENOTCONN; that is lost connectivity, not a local error */
function classifyFsError(err: unknown): EngineError {
  if (errorCode(err) === 'ENOTCONN') return new ConnectionError(errorMessage(err), { cause: err })
  return toEngineError(err, 'io')
}
