import { AuthType, createClient, type FileStat, type WebDAVClient, type WebDAVClientOptions } from 'webdav'
import { createReadStream, createWriteStream } from 'fs'
import { pipeline } from 'stream/promises'
import { AuthenticationError, EngineError, IoError, ProtocolError, toEngineError } from '../errors'
import { joinRemotePath, normalizeRemotePath, resolveRemotePath } from '../utils/remotePath'
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

export class WebDAVSession implements ConnectorSession {
  readonly id: string

  constructor(
    readonly protocol: 'webdav' | 'cloud',
    readonly client: WebDAVClient,
    readonly rootPath: string
  ) {
    this.id = newSessionId(protocol)
  }
}

/**
 * WebDAVConnector: `webdav` client over http(s) with basic auth.
 * Connecting issues a PROPFIND on the root so bad credentials fail the mount.
 */
export class WebDAVConnector implements ProtocolConnector<WebDAVSession> {
  readonly protocol: 'webdav' | 'cloud' = 'webdav'

  async connect(params: ConnectParams): Promise<WebDAVSession> {
    const scheme = params.secure ? 'https' : 'http'
    const client = createClient(`${scheme}://${params.host}:${params.port}`, this.clientOptions(params))
    const rootPath = normalizeRemotePath(params.rootPath)

    let root: FileStat
    try {
      root = unwrapStat(await client.stat(rootPath))
    } catch (err) {
      throw classifyWebDAVError(err)
    }
    if (root.type !== 'directory') {
      throw new ProtocolError(`Root is not a collection: ${rootPath}`)
    }
    return new WebDAVSession(this.protocol, client, rootPath)
  }

  async listEntries(session: WebDAVSession, remotePath: string): Promise<RemoteEntry[]> {
    const dir = normalizeRemotePath(remotePath)
    try {
      const result = await session.client.getDirectoryContents(resolveRemotePath(session.rootPath, dir))
      const list = Array.isArray(result) ? result : result.data
      return list.map((stat) => toEntry(joinRemotePath(dir, stat.basename), stat))
    } catch (err) {
      throw classifyWebDAVError(err)
    }
  }

  async stat(session: WebDAVSession, remotePath: string): Promise<RemoteEntry> {
    const path = normalizeRemotePath(remotePath)
    try {
      return toEntry(path, unwrapStat(await session.client.stat(resolveRemotePath(session.rootPath, path))))
    } catch (err) {
      throw classifyWebDAVError(err)
    }
  }

  async ensureDirectory(session: WebDAVSession, remotePath: string): Promise<void> {
    try {
      await session.client.createDirectory(resolveRemotePath(session.rootPath, remotePath), { recursive: true })
    } catch (err) {
      throw classifyWebDAVError(err)
    }
  }

  async upload(
    session: WebDAVSession,
    localPath: string,
    remotePath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    const size = await localFileSize(localPath)

    const gate = createGate(options)
    const source = createReadStream(localPath)
    source.on('error', (err) => gate.destroy(err))
    source.pipe(gate)

    try {
      const written = await session.client.putFileContents(resolveRemotePath(session.rootPath, remotePath), gate, {
        overwrite: true,
        contentLength: size
      })
      if (!written) throw new ProtocolError(`Server refused to write ${remotePath}`)
    } catch (err) {
      source.destroy()
      throw toTransferError(classifyWebDAVError(err), options.signal)
    }
    // WebDAV has no portable way to set a modification time; report the one the server chose
    const stored = await this.stat(session, remotePath)
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: await localModifiedAt(localPath),
      remoteModifiedAt: stored.modifiedAt
    }
  }

  async download(
    session: WebDAVSession,
    remotePath: string,
    localPath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await prepareLocalTarget(localPath)

    const source = await this.stat(session, remotePath)
    const gate = createGate(options)
    try {
      await pipeline(
        session.client.createReadStream(resolveRemotePath(session.rootPath, remotePath)),
        gate,
        createWriteStream(localPath)
      )
    } catch (err) {
      throw toTransferError(classifyWebDAVError(err), options.signal)
    }
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: await preserveModifiedAt(localPath, source.modifiedAt),
      remoteModifiedAt: source.modifiedAt
    }
  }

  /** HTTP is stateless; there is nothing to close */
  async disconnect(_session: WebDAVSession): Promise<void> {}

  protected clientOptions(params: ConnectParams): WebDAVClientOptions {
    return {
      authType: AuthType.Password,
      username: params.username,
      password: params.password
    }
  }
}

function unwrapStat(result: FileStat | { data: FileStat }): FileStat {
  return 'data' in result ? result.data : result
}

function toEntry(path: string, stat: FileStat): RemoteEntry {
  const modified = Date.parse(stat.lastmod)
  return {
    name: stat.basename,
    path,
    size: stat.size,
    isDirectory: stat.type === 'directory',
    modifiedAt: Number.isNaN(modified) ? 0 : modified
  }
}

/** The webdav client attaches the HTTP status to its errors */
export function classifyWebDAVError(err: unknown): EngineError {
  if (err instanceof EngineError) return err
  const status = typeof err === 'object' && err !== null ? Reflect.get(err, 'status') : undefined
  if (typeof status === 'number') {
    const message = err instanceof Error ? err.message : `HTTP ${status}`
    if (status === 401 || status === 403) {
      return new AuthenticationError(`Authentication failed: ${message}`, { cause: err })
    }
    if (status === 404) return new IoError(message, { cause: err })
    return new ProtocolError(message, { cause: err })
  }
  return toEngineError(err, 'connection')
}
