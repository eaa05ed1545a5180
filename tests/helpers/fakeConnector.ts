import type { DriveProtocol } from '../../src/types/drive'
import type {
  ConnectParams,
  ConnectorSession,
  ProtocolConnector,
  RemoteEntry,
  TransferOptions,
  TransferResult
} from '../../engine/connectors/types'
import { IoError } from '../../engine/errors'
import { abortReason } from '../../engine/utils/progressStream'
import { joinRemotePath, normalizeRemotePath, remoteBasename } from '../../engine/utils/remotePath'

export interface FakeFile {
  size: number
  modifiedAt: number
}

export interface TransferCall {
  direction: 'upload' | 'download'
  session: ConnectorSession
  localPath: string
  remotePath: string
  options: TransferOptions
}

export type TransferHandler = (call: TransferCall) => Promise<TransferResult>

let sessionCounter = 0

/** Scriptable in-memory connector; nothing leaves the process */
export class FakeConnector implements ProtocolConnector {
  readonly protocol: DriveProtocol
  readonly files: Map<string, FakeFile> = new Map()
  readonly started: string[] = []
  readonly connectParams: ConnectParams[] = []
  readonly disconnected: string[] = []
  /** Thrown by the next connects, one per call, before they succeed */
  connectErrors: Error[] = []
  listError: Error | null = null
  /** Listings take this long to answer */
  listDelayMs = 0
  /** Like an FTP client: a command issued while another is running fails */
  singleTask = false
  private listing = 0
  onTransfer: TransferHandler = (call) => Promise.resolve({ bytesTransferred: this.sizeOf(call), checksum: 'fake' })
  active = 0
  maxActive = 0

  constructor(protocol: DriveProtocol = 'sftp') {
    this.protocol = protocol
  }

  get connectCount(): number {
    return this.connectParams.length
  }

  async connect(params: ConnectParams): Promise<ConnectorSession> {
    this.connectParams.push(params)
    const error = this.connectErrors.shift()
    if (error) throw error
    return { id: `fake-${++sessionCounter}`, protocol: this.protocol }
  }

  async listEntries(_session: ConnectorSession, remotePath: string): Promise<RemoteEntry[]> {
    if (this.listError) throw this.listError
    if (this.singleTask && this.listing > 0) {
      throw new Error('User launched a task while another one is still running')
    }
    this.listing++
    try {
      if (this.listDelayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.listDelayMs))
      return this.entriesUnder(remotePath)
    } finally {
      this.listing--
    }
  }

  private entriesUnder(remotePath: string): RemoteEntry[] {
    const dir = normalizeRemotePath(remotePath)
    const entries = new Map<string, RemoteEntry>()

    for (const [path, file] of this.files) {
      if (dir !== '/' && !path.startsWith(dir + '/')) continue
      const rest = path.slice(dir === '/' ? 1 : dir.length + 1)
      const [head, ...tail] = rest.split('/')
      const childPath = joinRemotePath(dir, head)
      if (tail.length > 0) {
        entries.set(childPath, { name: head, path: childPath, size: 0, isDirectory: true, modifiedAt: 0 })
      } else {
        entries.set(childPath, { name: head, path: childPath, size: file.size, isDirectory: false, modifiedAt: file.modifiedAt })
      }
    }
    return Array.from(entries.values())
  }

  async stat(_session: ConnectorSession, remotePath: string): Promise<RemoteEntry> {
    const path = normalizeRemotePath(remotePath)
    const file = this.files.get(path)
    if (!file) throw new IoError(`No such file: ${path}`)
    return { name: remoteBasename(path), path, size: file.size, isDirectory: false, modifiedAt: file.modifiedAt }
  }

  async ensureDirectory(): Promise<void> {}

  upload(session: ConnectorSession, localPath: string, remotePath: string, options: TransferOptions = {}): Promise<TransferResult> {
    return this.run({ direction: 'upload', session, localPath, remotePath, options })
  }

  download(session: ConnectorSession, remotePath: string, localPath: string, options: TransferOptions = {}): Promise<TransferResult> {
    return this.run({ direction: 'download', session, localPath, remotePath, options })
  }

  async disconnect(session: ConnectorSession): Promise<void> {
    this.disconnected.push(session.id)
  }

  private async run(call: TransferCall): Promise<TransferResult> {
    this.started.push(call.remotePath)
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    try {
      return await this.onTransfer(call)
    } finally {
      this.active--
    }
  }

  private sizeOf(call: TransferCall): number {
    return this.files.get(normalizeRemotePath(call.remotePath))?.size ?? 0
  }
}

/** A transfer that hangs until released or aborted */
export function blockingTransfer(): { handler: TransferHandler; release: () => void } {
  const waiting: Array<() => void> = []
  const handler: TransferHandler = (call) =>
    new Promise((resolve, reject) => {
      const signal = call.options.signal
      const onAbort = (): void => reject(abortReason(signal))
      if (signal?.aborted) {
        onAbort()
        return
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      waiting.push(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve({ bytesTransferred: 0, checksum: 'fake' })
      })
    })
  return {
    handler,
    release: () => {
      for (const resolve of waiting.splice(0)) resolve()
    }
  }
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

/** Poll until the condition holds */
export async function waitFor(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time')
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}
