import { describe, it, expect } from 'vitest'
import { createDiscoveryStore } from '@/stores/discoveryStore'
import { createDriveStore } from '@/stores/driveStore'
import { createLogStore } from '@/stores/logStore'
import { createTransferStore } from '@/stores/transferStore'
import type { NetworkDevice } from '@/types/discovery'
import type { VirtualDrive } from '@/types/drive'
import type { LogEntry } from '@/types/log'
import type { TransferItem } from '@/types/transfer'

function makeItem(id: string, status: TransferItem['status']): TransferItem {
  return {
    id,
    driveId: 'd1',
    fileName: `${id}.txt`,
    localPath: `/tmp/${id}.txt`,
    remotePath: `/${id}.txt`,
    direction: 'upload',
    priority: 'normal',
    status,
    totalBytes: 10,
    processedBytes: 0,
    progress: 0,
    retryCount: 0,
    maxRetries: 3,
    createdAt: 0,
    sequence: 1
  }
}

function makeDrive(id: string, isOnline: boolean): VirtualDrive {
  return {
    id,
    name: id,
    protocol: 'sftp',
    host: 'files.lan',
    port: 22,
    rootPath: '/',
    secure: false,
    overrides: {},
    status: isOnline ? 'connected' : 'disconnected',
    isOnline,
    createdAt: 0
  }
}

function makeEntry(message: string, level: LogEntry['level'], details?: string): LogEntry {
  return { id: message, timestamp: 0, level, source: 'transfer', message, details, scope: 'd1' }
}

describe('transferStore', () => {
  it('should fold queue events into the list', () => {
    const store = createTransferStore()
    const queued = makeItem('a', 'queued')

    store.getState().applyEvent({ type: 'queued', itemId: 'a', driveId: 'd1', item: queued })
    store.getState().applyEvent({ type: 'started', itemId: 'a', driveId: 'd1', item: { ...queued, status: 'inProgress' } })
    expect(store.getState().transfers.map((t) => t.status)).toEqual(['inProgress'])

    store.getState().applyEvent({ type: 'removed', itemId: 'a', driveId: 'd1' })
    expect(store.getState().transfers).toEqual([])
  })

  it('should clear only finished items', () => {
    const store = createTransferStore()
    store.getState().setTransfers([
      makeItem('done', 'completed'),
      makeItem('waiting', 'queued'),
      { ...makeItem('retrying', 'failed'), nextRetryAt: 5 },
      makeItem('exhausted', 'failed')
    ])

    store.getState().clearCompleted()

    expect(store.getState().transfers.map((t) => t.id)).toEqual(['waiting', 'retrying'])
  })
})

describe('driveStore', () => {
  it('should track drives and their sync reports', () => {
    const store = createDriveStore()
    const drive = makeDrive('d1', true)
    const report = { driveId: 'd1', uploads: 1, downloads: 0, skipped: 0, conflicts: [], itemIds: ['x'], startedAt: 0, finishedAt: 1 }

    store.getState().applyEvent({ type: 'mounted', driveId: 'd1', drive })
    store.getState().applyEvent({ type: 'status', driveId: 'd2', drive: makeDrive('d2', false), status: 'disconnected' })
    store.getState().applyEvent({ type: 'synced', driveId: 'd1', drive, report })

    expect(store.getState().getOnlineDrives().map((d) => d.id)).toEqual(['d1'])
    expect(store.getState().syncReports.get('d1')).toEqual(report)

    store.getState().applyEvent({ type: 'removed', driveId: 'd1' })
    expect(store.getState().drives.map((d) => d.id)).toEqual(['d2'])
    expect(store.getState().syncReports.has('d1')).toBe(false)
  })
})

describe('discoveryStore', () => {
  it('should keep devices and the last scan outcome', () => {
    const store = createDiscoveryStore()
    const device: NetworkDevice = {
      id: '10.0.0.5',
      name: 'nas',
      type: 'nas',
      ipAddress: '10.0.0.5',
      services: [],
      isReachable: true,
      isStale: false,
      missedCycles: 0,
      firstSeen: 0,
      lastSeen: 0
    }

    store.getState().upsertDevice(device)
    store.getState().upsertDevice({ ...device, isReachable: false })
    expect(store.getState().devices).toHaveLength(1)
    expect(store.getState().getReachableDevices()).toEqual([])

    store.getState().setScanError('No usable network interface to scan')
    store.getState().setScanComplete({ cycle: 1, hostsProbed: 254, devicesFound: 1, startedAt: 0, finishedAt: 9 })
    expect(store.getState().lastError).toBeNull()
    expect(store.getState().lastScan?.cycle).toBe(1)
  })
})

describe('logStore', () => {
  it('should cap entries per scope', () => {
    const store = createLogStore(2)

    for (const message of ['one', 'two', 'three']) store.getState().addEntry('d1', makeEntry(message, 'info'))

    expect(store.getState().entries.get('d1')?.map((e) => e.message)).toEqual(['two', 'three'])
  })

  it('should filter by level and by text in message or details', () => {
    const store = createLogStore()
    store.getState().addEntry('d1', makeEntry('Upload started', 'info'))
    store.getState().addEntry('d1', makeEntry('Upload failed', 'error', 'EACCES on /srv'))
    store.getState().addEntry('d1', makeEntry('Download done', 'success'))

    store.getState().setSearchQuery('eacces')
    expect(store.getState().getFilteredEntries('d1').map((e) => e.message)).toEqual(['Upload failed'])

    store.getState().setSearchQuery('')
    store.getState().toggleLevel('info')
    expect(store.getState().getFilteredEntries('d1').map((e) => e.message)).toEqual(['Upload failed', 'Download done'])

    store.getState().toggleSource('transfer')
    expect(store.getState().getFilteredEntries('d1')).toEqual([])
  })
})
