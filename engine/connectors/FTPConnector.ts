import { Client, FTPError, type FileInfo } from 'basic-ftp'
import { createReadStream, createWriteStream } from 'fs'
import { pipeline } from 'stream/promises'
import { AuthenticationError, ConnectionError, EngineError, IoError, ProtocolError, toEngineError } from '../errors'
import {
  joinRemotePath,
  normalizeRemotePath,
  remoteBasename,
  remoteDirname,
  resolveRemotePath
} from '../utils/remotePath'
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

export class FTPSession implements ConnectorSession {
  readonly id = newSessionId('ftp')
  readonly protocol = 'ftp' as const

  constructor(
    readonly client: Client,
    readonly rootPath: string
  ) {}
}

/**
 * FTPConnector: Basic-ftp client. `secure` switches on explicit TLS (FTPS).
 * One control connection runs one transfer at a time, so the queue leases a
 * session per worker.
 */
export class FTPConnector implements ProtocolConnector<FTPSession> {
  readonly protocol = 'ftp' as const

  async connect(params: ConnectParams): Promise<FTPSession> {
    const client = new Client(params.timeoutMs)
    try {
      await client.access({
        host: params.host,
        port: params.port,
        user: params.username ?? 'anonymous',
        password: params.password ?? '',
        // 990 is the implicit-TLS port; anywhere else TLS is negotiated with AUTH TLS
        secure: params.secure ? (params.port === 990 ? 'implicit' : true) : false
      })
    } catch (err) {
      client.close()
      throw classifyFtpError(err)
    }
    return new FTPSession(client, normalizeRemotePath(params.rootPath))
  }

  async listEntries(session: FTPSession, remotePath: string): Promise<RemoteEntry[]> {
    const dir = normalizeRemotePath(remotePath)
    try {
      const list = await session.client.list(resolveRemotePath(session.rootPath, dir))
      return list
        .filter((info) => info.name !== '.' && info.name !== '..')
        .map((info) => toEntry(joinRemotePath(dir, info.name), info))
    } catch (err) {
      throw classifyFtpError(err)
    }
  }

  /** FTP has no portable stat; look the name up in its parent listing */
  async stat(session: FTPSession, remotePath: string): Promise<RemoteEntry> {
    const path = normalizeRemotePath(remotePath)
    if (path === '/') {
      return { name: '/', path, size: 0, isDirectory: true, modifiedAt: 0 }
    }
    const name = remoteBasename(path)
    const siblings = await this.listEntries(session, remoteDirname(path))
    const entry = siblings.find((e) => e.name === name)
    if (!entry) throw new IoError(`No such file: ${path}`)
    return entry
  }

  async ensureDirectory(session: FTPSession, remotePath: string): Promise<void> {
    try {
      await session.client.ensureDir(resolveRemotePath(session.rootPath, remotePath))
      // ensureDir leaves the working directory inside the new path
      await session.client.cd('/')
    } catch (err) {
      throw classifyFtpError(err)
    }
  }

  async upload(
    session: FTPSession,
    localPath: string,
    remotePath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await localFileSize(localPath)

    const gate = createGate(options)
    const source = createReadStream(localPath)
    source.on('error', (err) => gate.destroy(err))
    source.pipe(gate)

    const target = resolveRemotePath(session.rootPath, remotePath)
    const detach = this.closeOnAbort(session, options.signal)
    try {
      await session.client.uploadFrom(gate, target)
    } catch (err) {
      source.destroy()
      throw toTransferError(classifyFtpError(err), options.signal)
    } finally {
      detach()
    }
    const modifiedAt = await localModifiedAt(localPath)
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: modifiedAt,
      remoteModifiedAt: await this.preserveRemoteModifiedAt(session, remotePath, target, modifiedAt)
    }
  }

  async download(
    session: FTPSession,
    remotePath: string,
    localPath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await prepareLocalTarget(localPath)

    const source = resolveRemotePath(session.rootPath, remotePath)
    const remoteModifiedAt = await this.remoteModifiedAt(session, remotePath, source)
    const gate = createGate(options)
    const written = pipeline(gate, createWriteStream(localPath))
    const detach = this.closeOnAbort(session, options.signal)
    try {
      await session.client.downloadTo(gate, source)
      if (!gate.writableEnded) gate.end()
      await written
    } catch (err) {
      gate.destroy()
      await Promise.allSettled([written])
      throw toTransferError(classifyFtpError(err), options.signal)
    } finally {
      detach()
    }
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: await preserveModifiedAt(localPath, remoteModifiedAt),
      remoteModifiedAt
    }
  }

  async disconnect(session: FTPSession): Promise<void> {
    if (!session.client.closed) session.client.close()
  }

  /** MFMT sets the stamp where the server supports it; otherwise ask what it stored */
  private async preserveRemoteModifiedAt(
    session: FTPSession,
    remotePath: string,
    absolutePath: string,
    modifiedAt: number
  ): Promise<number> {
    const seconds = Math.floor(modifiedAt / 1000)
    try {
      const response = await session.client.sendIgnoringError(`MFMT ${toFtpTimestamp(seconds)} ${absolutePath}`)
      if (response.code === 213) return seconds * 1000
    } catch (err) {
      throw classifyFtpError(err)
    }
    return this.remoteModifiedAt(session, remotePath, absolutePath)
  }

  /** MDTM, falling back to the directory listing on servers without it */
  private remoteModifiedAt(session: FTPSession, remotePath: string, absolutePath: string): Promise<number> {
    return session.client.lastMod(absolutePath).then(
      (date) => date.getTime(),
      () => this.stat(session, remotePath).then((entry) => entry.modifiedAt)
    )
  }

  /** basic-ftp has no per-task cancel; closing the client rejects the running task */
  private closeOnAbort(session: FTPSession, signal: AbortSignal | undefined): () => void {
    if (!signal) return () => {}
    const onAbort = (): void => session.client.close()
    signal.addEventListener('abort', onAbort, { once: true })
    return () => signal.removeEventListener('abort', onAbort)
  }
}

function toEntry(path: string, info: FileInfo): RemoteEntry {
  return {
    name: info.name,
    path,
    size: info.size,
    isDirectory: info.isDirectory,
    modifiedAt: info.modifiedAt ? info.modifiedAt.getTime() : 0
  }
}

/** YYYYMMDDHHMMSS in UTC, as MFMT and MDTM write it */
function toFtpTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().replace(/[-:T]/g, '').slice(0, 14)
}

/**
 * FTP reply codes: 530 = not logged in, 421 = service not available,
 * 550/553 = file unavailable or name not allowed
 */
export function classifyFtpError(err: unknown): EngineError {
  if (err instanceof EngineError) return err
  if (err instanceof FTPError) {
    if (err.code === 530) return new AuthenticationError(`Authentication failed: ${err.message}`, { cause: err })
    if (err.code === 421) return new ConnectionError(err.message, { cause: err })
    if (err.code === 550 || err.code === 553) return new IoError(err.message, { cause: err })
    return new ProtocolError(err.message, { cause: err })
  }
  return toEngineError(err, 'connection')
}
