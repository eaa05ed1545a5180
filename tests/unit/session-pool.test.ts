import { describe, it, expect, beforeEach } from 'vitest'
import type { ConnectorSession } from '../../engine/connectors/types'
import { SessionPool } from '../../engine/services/SessionPool'
import { tick } from '../helpers/fakeConnector'

describe('SessionPool', () => {
  let opened: number
  let closed: string[]
  let pool: SessionPool

  const create = (maxIdle?: number, failClose = false): SessionPool =>
    new SessionPool({
      open: async (): Promise<ConnectorSession> => ({ id: `s${++opened}`, protocol: 'sftp' }),
      close: async (session) => {
        if (failClose) throw new Error('already closed')
        closed.push(session.id)
      },
      maxIdle
    })

  beforeEach(() => {
    opened = 0
    closed = []
    pool = create()
  })

  it('should reuse released sessions', async () => {
    const first = await pool.acquire()
    pool.release(first)
    const second = await pool.acquire()

    expect(second).toBe(first)
    expect(opened).toBe(1)
    expect(pool.leasedCount).toBe(1)
  })

  it('should close discarded sessions', async () => {
    const session = await pool.acquire()
    pool.release(session, { discard: true })
    await tick()

    expect(closed).toEqual(['s1'])
    expect(pool.idleCount).toBe(0)
  })

  it('should keep at most maxIdle sessions', async () => {
    pool = create(1)
    const a = await pool.acquire()
    const b = await pool.acquire()
    pool.release(a)
    pool.release(b)
    await tick()

    expect(pool.idleCount).toBe(1)
    expect(closed).toEqual(['s2'])
  })

  it('should close idle sessions on drain and leased ones when they come back', async () => {
    const idle = await pool.acquire()
    const leased = await pool.acquire()
    pool.release(idle)

    await pool.drain()
    expect(closed).toEqual(['s1'])

    pool.release(leased)
    await tick()
    expect(closed).toEqual(['s1', 's2'])
    expect(pool.idleCount).toBe(0)
  })

  it('should report close failures', async () => {
    pool = create(3, true)
    const errors: string[] = []
    pool.on('closeError', (id: string) => errors.push(id))

    const session = await pool.acquire()
    pool.release(session, { discard: true })
    await tick()

    expect(errors).toEqual(['s1'])
  })
})
