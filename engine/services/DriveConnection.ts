import { EventEmitter } from 'events'
import { v4 as uuid } from 'uuid'
import type { ActiveConnection, ConnectionStatus, DriveProtocol } from '../../src/types/drive'
import type { ConnectParams, ConnectorSession, ProtocolConnector } from '../connectors/types'
import { ConnectionError, errorMessage, toEngineError } from '../errors'

function settle(): void {}

/**
 * ConnectSerializer: At most one connect per (host:port, protocol) is in
 * flight; later callers wait for the earlier attempt to settle.
 */
export class ConnectSerializer {
  private tails: Map<string, Promise<void>> = new Map()

  static keyOf(protocol: DriveProtocol, host: string, port: number): string {
    return `${protocol}://${host.toLowerCase()}:${port}`
  }

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const tail: Promise<void> = result
      .then(settle, settle)
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key)
      })
    this.tails.set(key, tail)
    return result
  }

  isBusy(key: string): boolean {
    return this.tails.has(key)
  }
}

export interface DriveConnectionOptions {
  driveId: string
  deviceId?: string
  connector: ProtocolConnector
  params: ConnectParams
  serializer: ConnectSerializer
  now?: () => number
}

/**
 * DriveConnection: The ActiveConnection of one drive: a control session used
 * for browsing and health checks, plus the factory transfer sessions come from.
 *
 * Events:
 *   'status'     → (ActiveConnection)
 *   'closeError' → (sessionId, EngineError)
 */
export class DriveConnection extends EventEmitter {
  private state: ActiveConnection
  private control: ConnectorSession | null = null
  private params: ConnectParams
  private readonly connector: ProtocolConnector
  private readonly serializer: ConnectSerializer
  private readonly now: () => number
  /** Clients run one command at a time, so control operations queue behind each other */
  private controlTail: Promise<void> = Promise.resolve()

  constructor(options: DriveConnectionOptions) {
    super()
    this.connector = options.connector
    this.params = options.params
    this.serializer = options.serializer
    this.now = options.now ?? Date.now
    this.state = {
      id: uuid(),
      driveId: options.driveId,
      deviceId: options.deviceId,
      protocol: options.connector.protocol,
      status: 'disconnected'
    }
  }

  get status(): ConnectionStatus {
    return this.state.status
  }

  get isConnected(): boolean {
    return this.state.status === 'connected'
  }

  get key(): string {
    return ConnectSerializer.keyOf(this.state.protocol, this.params.host, this.params.port)
  }

  snapshot(): ActiveConnection {
    return { ...this.state }
  }

  /** New credentials or endpoint apply from the next connect */
  updateParams(params: Partial<ConnectParams>): void {
    this.params = { ...this.params, ...params }
  }

  /** Open the control session; rejects with an EngineError */
  async connect(): Promise<void> {
    if (this.isConnected) return
    await this.closeControl()

    this.state = { ...this.state, id: uuid(), connectedAt: undefined, lastError: undefined }
    this.setStatus('connecting')

    try {
      this.control = await this.openSession()
    } catch (err) {
      const error = toEngineError(err, 'connection')
      this.markError(error.message)
      throw error
    }

    this.state.connectedAt = this.now()
    this.setStatus('connected')
  }

  /** A fresh session for transfer workers, serialized with other connects to the same target */
  openSession(): Promise<ConnectorSession> {
    const params = this.params
    return this.serializer.run(this.key, () => this.connector.connect(params))
  }

  closeSession(session: ConnectorSession): Promise<void> {
    return this.connector.disconnect(session)
  }

  /** Run an operation on the control session, after any operation already using it */
  withControl<T>(operation: (session: ConnectorSession, connector: ProtocolConnector) => Promise<T>): Promise<T> {
    return this.exclusive(() => {
      const session = this.control
      if (!session || !this.isConnected) {
        throw new ConnectionError(`Drive ${this.state.driveId} is not connected`)
      }
      return operation(session, this.connector)
    })
  }

  /**
   * Check the control session with a root listing. A failure closes it and
   * moves the connection to 'error'.
   */
  verify(): Promise<boolean> {
    return this.exclusive(async () => {
      const session = this.control
      if (!session || !this.isConnected) return false
      try {
        await this.connector.listEntries(session, '/')
        return true
      } catch (err) {
        this.markError(errorMessage(err))
        await this.closeControl()
        return false
      }
    })
  }

  markError(message: string): void {
    this.state.lastError = message
    this.setStatus('error')
  }

  /** Close the control session; idempotent */
  async disconnect(): Promise<void> {
    await this.closeControl()
    if (this.state.status !== 'disconnected') this.setStatus('disconnected')
  }

  private async closeControl(): Promise<void> {
    const session = this.control
    this.control = null
    if (!session) return
    try {
      await this.connector.disconnect(session)
    } catch (err) {
      // The session is dropped either way; report instead of failing the caller
      this.emit('closeError', session.id, toEngineError(err))
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.controlTail.then(task)
    this.controlTail = result.then(settle, settle)
    return result
  }

  private setStatus(status: ConnectionStatus): void {
    this.state.status = status
    this.emit('status', this.snapshot())
  }
}
