import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { DEFAULT_SETTINGS, SettingsStore, freezeSettings, mergeSettings } from '../../engine/services/SettingsStore'
import { clampConcurrency, resolveDriveSettings } from '../../src/utils/resolveSettings'

describe('SettingsStore', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'netdrive-settings-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should start from the defaults', () => {
    const store = new SettingsStore({ cwd: dir })

    expect(store.getAll()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('transferConcurrency')).toBe(3)
  })

  it('should persist updates across instances', () => {
    new SettingsStore({ cwd: dir }).update({ transferMaxRetries: 7, defaultPorts: { ...DEFAULT_SETTINGS.defaultPorts, sftp: 2222 } })

    const reopened = new SettingsStore({ cwd: dir })
    expect(reopened.get('transferMaxRetries')).toBe(7)
    expect(reopened.get('defaultPorts').sftp).toBe(2222)
    expect(reopened.get('defaultPorts').ftp).toBe(21)
  })

  it('should reset to the defaults', () => {
    const store = new SettingsStore({ cwd: dir })
    store.update({ logDebugMode: true })

    expect(store.reset()).toEqual(DEFAULT_SETTINGS)
    expect(store.get('logDebugMode')).toBe(false)
  })

  it('should hand out frozen snapshots', () => {
    const snapshot = new SettingsStore({ cwd: dir }).snapshot()

    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(snapshot.defaultPorts)).toBe(true)
  })
})

describe('mergeSettings', () => {
  it('should fill missing protocol ports from the defaults', () => {
    const merged = mergeSettings({ connectionTimeoutMs: 5000 })

    expect(merged.connectionTimeoutMs).toBe(5000)
    expect(merged.defaultPorts).toEqual(DEFAULT_SETTINGS.defaultPorts)
  })

  it('should copy the lists of a frozen snapshot', () => {
    const source = mergeSettings({ discoverySubnets: ['10.0.4'] })
    const frozen = freezeSettings(source)
    source.discoverySubnets.push('10.0.5')

    expect(frozen.discoverySubnets).toEqual(['10.0.4'])
  })
})

describe('resolveDriveSettings', () => {
  it('should take the globals when there are no overrides', () => {
    expect(resolveDriveSettings(DEFAULT_SETTINGS)).toEqual({
      concurrentTransfers: 3,
      maxRetries: 3,
      bandwidthLimitUp: 0,
      bandwidthLimitDown: 0,
      verifyChecksums: true,
      syncIntervalMs: 0,
      conflictResolution: 'overwrite-newer'
    })
  })

  it('should let defined overrides win', () => {
    const resolved = resolveDriveSettings(DEFAULT_SETTINGS, {
      maxRetries: 0,
      verifyChecksums: false,
      bandwidthLimitUp: undefined,
      conflictResolution: 'skip'
    })

    expect(resolved.maxRetries).toBe(0)
    expect(resolved.verifyChecksums).toBe(false)
    expect(resolved.bandwidthLimitUp).toBe(0)
    expect(resolved.conflictResolution).toBe('skip')
  })

  it('should clamp concurrency into 1..10', () => {
    expect(resolveDriveSettings(DEFAULT_SETTINGS, { concurrentTransfers: 40 }).concurrentTransfers).toBe(10)
    expect(clampConcurrency(0)).toBe(1)
    expect(clampConcurrency(4.7)).toBe(4)
    expect(clampConcurrency(Number.NaN)).toBe(1)
  })
})
