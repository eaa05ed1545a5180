import { Client, type ConnectConfig, type SFTPWrapper, type Stats } from 'ssh2'
import { createReadStream, createWriteStream } from 'fs'
import { pipeline } from 'stream/promises'
import type { Socket } from 'net'
import { SocksClient, type SocksClientOptions } from 'socks'
import {
  AuthenticationError,
  ConnectionError,
  EngineError,
  IoError,
  ProtocolError,
  TimeoutError,
  errorMessage,
  toEngineError
} from '../errors'
import { normalizeRemotePath, resolveRemotePath, joinRemotePath, remoteBasename } from '../utils/remotePath'
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

const S_IFMT = 0o170000
const S_IFDIR = 0o040000

// SSH_FX_* status codes
const SFTP_NO_SUCH_FILE = 2
const SFTP_PERMISSION_DENIED = 3
const SFTP_NO_CONNECTION = 6
const SFTP_CONNECTION_LOST = 7

export class SFTPSession implements ConnectorSession {
  readonly id = newSessionId('sftp')
  readonly protocol = 'sftp' as const
  closed = false

  constructor(
    readonly client: Client,
    readonly sftp: SFTPWrapper,
    readonly rootPath: string,
    readonly proxySocket: Socket | null
  ) {}
}

/**
 * SFTPConnector: Ssh2 client plus its SFTP subsystem.
 * Password and private-key auth, optional SOCKS4/5 proxy.
 */
export class SFTPConnector implements ProtocolConnector<SFTPSession> {
  readonly protocol = 'sftp' as const

  async connect(params: ConnectParams): Promise<SFTPSession> {
    const proxySocket = params.proxy ? await this.createSocksProxy(params) : null
    const client = new Client()

    await new Promise<void>((resolve, reject) => {
      const connectConfig: ConnectConfig = {
        host: params.host,
        port: params.port,
        username: params.username,
        readyTimeout: params.timeoutMs
      }
      if (proxySocket) connectConfig.sock = proxySocket

      if (params.privateKey) {
        connectConfig.privateKey = params.privateKey
        connectConfig.passphrase = params.passphrase
      }
      if (params.password) connectConfig.password = params.password

      const onReady = (): void => {
        cleanup()
        resolve()
      }

      const onError = (err: Error): void => {
        cleanup()
        client.end()
        proxySocket?.destroy()
        reject(classifySshError(err))
      }

      const cleanup = (): void => {
        client.removeListener('ready', onReady)
        client.removeListener('error', onError)
      }

      client.once('ready', onReady)
      client.once('error', onError)

      try {
        client.connect(connectConfig)
      } catch (err) {
        cleanup()
        proxySocket?.destroy()
        reject(classifySshError(err))
      }
    })

    const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
      client.sftp((err, wrapper) => {
        if (err) {
          client.end()
          reject(new ProtocolError(`Failed to open SFTP: ${err.message}`, { cause: err }))
        } else {
          resolve(wrapper)
        }
      })
    })

    const session = new SFTPSession(client, sftp, normalizeRemotePath(params.rootPath), proxySocket)
    client.on('close', () => {
      session.closed = true
    })
    // A dropped socket surfaces on the next operation; keep the emitter from throwing meanwhile
    client.on('error', () => {
      session.closed = true
    })
    return session
  }

  async listEntries(session: SFTPSession, remotePath: string): Promise<RemoteEntry[]> {
    const dir = normalizeRemotePath(remotePath)
    const absolute = resolveRemotePath(session.rootPath, dir)

    return new Promise((resolve, reject) => {
      session.sftp.readdir(absolute, (err, list) => {
        if (err) {
          reject(classifySftpError(err, absolute))
          return
        }

        resolve(
          list
            .filter((item) => item.filename !== '.' && item.filename !== '..')
            .map((item) => ({
              name: item.filename,
              path: joinRemotePath(dir, item.filename),
              size: item.attrs.size ?? 0,
              isDirectory: ((item.attrs.mode ?? 0) & S_IFMT) === S_IFDIR,
              modifiedAt: (item.attrs.mtime ?? 0) * 1000
            }))
        )
      })
    })
  }

  async stat(session: SFTPSession, remotePath: string): Promise<RemoteEntry> {
    const path = normalizeRemotePath(remotePath)
    const stats = await this.rawStat(session, resolveRemotePath(session.rootPath, path))
    return statsToEntry(path, stats)
  }

  async ensureDirectory(session: SFTPSession, remotePath: string): Promise<void> {
    const parts = normalizeRemotePath(remotePath).split('/').filter(Boolean)
    let current = '/'
    for (const part of parts) {
      current = joinRemotePath(current, part)
      const absolute = resolveRemotePath(session.rootPath, current)
      try {
        await this.rawStat(session, absolute)
      } catch {
        await new Promise<void>((resolve, reject) => {
          session.sftp.mkdir(absolute, (err) => {
            if (err) reject(classifySftpError(err, absolute))
            else resolve()
          })
        })
      }
    }
  }

  async upload(
    session: SFTPSession,
    localPath: string,
    remotePath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await localFileSize(localPath)

    const gate = createGate(options)
    const target = resolveRemotePath(session.rootPath, remotePath)
    try {
      await pipeline(createReadStream(localPath), gate, session.sftp.createWriteStream(target))
    } catch (err) {
      throw toTransferError(classifySftpError(err, target), options.signal)
    }
    const modifiedAt = await localModifiedAt(localPath)
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: modifiedAt,
      remoteModifiedAt: await this.preserveRemoteModifiedAt(session, target, modifiedAt)
    }
  }

  async download(
    session: SFTPSession,
    remotePath: string,
    localPath: string,
    options: TransferOptions = {}
  ): Promise<TransferResult> {
    throwIfAborted(options.signal)
    await prepareLocalTarget(localPath)

    const source = resolveRemotePath(session.rootPath, remotePath)
    const remoteModifiedAt = (await this.rawStat(session, source)).mtime * 1000
    const gate = createGate(options)
    try {
      await pipeline(session.sftp.createReadStream(source), gate, createWriteStream(localPath))
    } catch (err) {
      throw toTransferError(classifySftpError(err, source), options.signal)
    }
    return {
      bytesTransferred: gate.bytesTransferred,
      checksum: gate.digest(),
      localModifiedAt: await preserveModifiedAt(localPath, remoteModifiedAt),
      remoteModifiedAt
    }
  }

  async disconnect(session: SFTPSession): Promise<void> {
    if (session.closed) return
    session.closed = true
    session.sftp.end()
    session.client.end()
    session.proxySocket?.destroy()
  }

  private rawStat(session: SFTPSession, absolutePath: string): Promise<Stats> {
    return new Promise((resolve, reject) => {
      session.sftp.stat(absolutePath, (err, stats) => {
        if (err) reject(classifySftpError(err, absolutePath))
        else resolve(stats)
      })
    })
  }

  /**
   * Give an uploaded file the local modification time. SFTP keeps whole
   * seconds; a server that refuses SETSTAT is asked what it stored instead.
   */
  private preserveRemoteModifiedAt(session: SFTPSession, absolutePath: string, modifiedAt: number): Promise<number> {
    const seconds = Math.floor(modifiedAt / 1000)
    return new Promise<number>((resolve) => {
      session.sftp.utimes(absolutePath, seconds, seconds, (err) => {
        if (!err) {
          resolve(seconds * 1000)
          return
        }
        resolve(this.rawStat(session, absolutePath).then((stats) => stats.mtime * 1000))
      })
    })
  }

  /** Create a SOCKS4/5 proxy connection */
  private async createSocksProxy(params: ConnectParams): Promise<Socket> {
    const proxy = params.proxy
    if (!proxy) throw new ConnectionError('No proxy configured')

    const socksOptions: SocksClientOptions = {
      proxy: {
        host: proxy.host,
        port: proxy.port,
        type: proxy.type === 'socks4' ? 4 : 5,
        ...(proxy.username ? { userId: proxy.username, password: proxy.password } : {})
      },
      command: 'connect',
      destination: {
        host: params.host,
        port: params.port
      },
      timeout: params.timeoutMs
    }

    try {
      const { socket } = await SocksClient.createConnection(socksOptions)
      return socket
    } catch (err) {
      throw new ConnectionError(`Proxy connection failed: ${errorMessage(err)}`, { cause: err })
    }
  }
}

function statsToEntry(path: string, stats: Stats): RemoteEntry {
  return {
    name: remoteBasename(path) || path,
    path,
    size: stats.size,
    isDirectory: stats.isDirectory(),
    modifiedAt: stats.mtime * 1000
  }
}

/** ssh2 tags its errors with a `level` describing where they happened */
export function classifySshError(err: unknown): EngineError {
  const level = typeof err === 'object' && err !== null ? Reflect.get(err, 'level') : undefined
  const message = errorMessage(err)
  if (level === 'client-authentication') {
    return new AuthenticationError(`Authentication failed: ${message}`, { cause: err })
  }
  if (level === 'client-timeout') {
    return new TimeoutError(message, { cause: err })
  }
  if (level === 'client-socket' || level === 'client-dns') {
    return toEngineError(err, 'connection')
  }
  return toEngineError(err, 'protocol')
}

/**
 * SFTP status replies carry a numeric `code`. A missing file or a refused
 * permission will not change on retry; anything else unexpected stays a
 * protocol error.
 */
export function classifySftpError(err: unknown, path: string): EngineError {
  if (err instanceof EngineError) return err
  const code = typeof err === 'object' && err !== null ? Reflect.get(err, 'code') : undefined
  const message = `${errorMessage(err)}: ${path}`
  switch (code) {
    case SFTP_NO_SUCH_FILE:
    case SFTP_PERMISSION_DENIED:
      return new IoError(message, { cause: err })
    case SFTP_NO_CONNECTION:
    case SFTP_CONNECTION_LOST:
      return new ConnectionError(message, { cause: err })
  }
  if (typeof code === 'string') return toEngineError(err, 'protocol')
  return new ProtocolError(message, { cause: err })
}
