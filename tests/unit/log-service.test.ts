import { describe, it, expect, afterEach, vi } from 'vitest'
import { LogService, DISCOVERY_SCOPE, ENGINE_SCOPE } from '../../engine/services/LogService'
import type { LogEntry } from '../../src/types/log'

describe('LogService', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('should store entries per scope and emit them', () => {
    const log = new LogService()
    const emitted: Array<[string, LogEntry]> = []
    log.on('entry', (scope: string, entry: LogEntry) => emitted.push([scope, entry]))

    LogService.connected(log, 'drive-1')
    LogService.mountRejected(log, 'name: Invalid length')

    expect(log.getEntries('drive-1').map((e) => e.message)).toEqual(['Connection established.'])
    expect(log.getEntries(ENGINE_SCOPE)[0]).toMatchObject({
      level: 'error',
      source: 'drive',
      message: 'Mount rejected: name: Invalid length',
      scope: ENGINE_SCOPE
    })
    expect(emitted.map(([scope]) => scope)).toEqual(['drive-1', ENGINE_SCOPE])
    expect(log.getScopes()).toEqual(['drive-1', ENGINE_SCOPE])
  })

  it('should drop debug entries unless debug mode is on', () => {
    const log = new LogService()

    LogService.deviceFound(log, 'nas', '10.0.0.5', 'SSH:22')
    expect(log.getEntries(DISCOVERY_SCOPE)).toEqual([])

    log.setDebugMode(true)
    LogService.deviceFound(log, 'nas', '10.0.0.5', 'SSH:22')
    expect(log.getEntries(DISCOVERY_SCOPE).map((e) => e.message)).toEqual(['Found nas (10.0.0.5): SSH:22'])
  })

  it('should keep the newest entries up to the cap', () => {
    const log = new LogService(2)

    log.log('d', 'info', 'system', 'one')
    log.log('d', 'info', 'system', 'two')
    log.log('d', 'info', 'system', 'three')

    expect(log.getEntries('d').map((e) => e.message)).toEqual(['two', 'three'])
  })

  it('should export entries as text lines', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-01-02T03:04:05.000Z'))
    const log = new LogService()

    LogService.transferStarted(log, 'd', 'a.txt', 'upload', 1536)
    log.log('d', 'error', 'sync', 'Sync failed', 'EACCES')

    expect(log.exportLog('d')).toBe(
      [
        '[2024-01-02T03:04:05.000Z] [INFO   ] [TRANSFER ] File transfer started: a.txt (upload 1.5 KB)',
        '[2024-01-02T03:04:05.000Z] [ERROR  ] [SYNC     ] Sync failed',
        '  EACCES'
      ].join('\n')
    )
  })

  it('should format retry and sync messages', () => {
    const log = new LogService()

    LogService.retryScheduled(log, 'd', 'a.txt', 2500, 1, 3)
    LogService.syncPlanned(log, 'd', 2, 1, 0)
    log.clearEntries('missing')

    expect(log.getEntries('d').map((e) => e.message)).toEqual([
      'Retrying a.txt in 2.5 second(s) (attempt 1 of 3).',
      'Sync planned: 2 upload(s), 1 download(s), 0 conflict(s).'
    ])
  })
})
