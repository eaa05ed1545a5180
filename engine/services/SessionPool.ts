import { EventEmitter } from 'events'
import type { ConnectorSession } from '../connectors/types'

/** What a transfer queue needs from a pool */
export interface SessionLease {
  acquire(): Promise<ConnectorSession>
  release(session: ConnectorSession, options?: { discard?: boolean }): void
}

export interface SessionPoolOptions {
  open: () => Promise<ConnectorSession>
  close: (session: ConnectorSession) => Promise<void>
  /** Idle sessions kept for reuse */
  maxIdle?: number
}

/**
 * SessionPool: Per-drive connector sessions leased to transfer workers.
 *
 * Sessions leased before a drain are closed when they come back instead of
 * returning to the idle list.
 *
 * Events:
 *   'opened'     → (sessionId)
 *   'closed'     → (sessionId)
 *   'closeError' → (sessionId, error)
 */
export class SessionPool extends EventEmitter implements SessionLease {
  private idle: ConnectorSession[] = []
  private leased: Map<ConnectorSession, number> = new Map()
  private generation = 0
  private maxIdle: number
  private readonly open: () => Promise<ConnectorSession>
  private readonly closeSession: (session: ConnectorSession) => Promise<void>

  constructor(options: SessionPoolOptions) {
    super()
    this.open = options.open
    this.closeSession = options.close
    this.maxIdle = options.maxIdle ?? 3
  }

  setMaxIdle(max: number): void {
    this.maxIdle = Math.max(0, max)
    while (this.idle.length > this.maxIdle) {
      const session = this.idle.shift()
      if (session) this.close(session)
    }
  }

  async acquire(): Promise<ConnectorSession> {
    const reused = this.idle.pop()
    const generation = this.generation
    const session = reused ?? (await this.open())
    if (!reused) this.emit('opened', session.id)
    this.leased.set(session, generation)
    return session
  }

  release(session: ConnectorSession, options: { discard?: boolean } = {}): void {
    const generation = this.leased.get(session)
    this.leased.delete(session)

    const stale = generation === undefined || generation !== this.generation
    if (options.discard || stale || this.idle.length >= this.maxIdle) {
      this.close(session)
      return
    }
    this.idle.push(session)
  }

  /** Close idle sessions; leased ones close on release */
  drain(): Promise<void> {
    this.generation++
    const sessions = this.idle
    this.idle = []
    return Promise.all(sessions.map((s) => this.closeQuietly(s))).then(() => undefined)
  }

  get idleCount(): number {
    return this.idle.length
  }

  get leasedCount(): number {
    return this.leased.size
  }

  private close(session: ConnectorSession): void {
    this.closeQuietly(session).catch((err: unknown) => this.emit('closeError', session.id, err))
  }

  /** Resolves after the close attempt; failures go to 'closeError' */
  private async closeQuietly(session: ConnectorSession): Promise<void> {
    try {
      await this.closeSession(session)
      this.emit('closed', session.id)
    } catch (err) {
      this.emit('closeError', session.id, err)
    }
  }
}
