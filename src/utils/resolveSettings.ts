import type { EngineSettings } from '@/types/settings'
import type { DriveOverrides } from '@/types/drive'
import type { ConflictResolution } from '@/types/transfer'

// ── Resolved (concrete) type, every field required ──

export interface ResolvedDriveSettings {
  concurrentTransfers: number
  maxRetries: number
  bandwidthLimitUp: number
  bandwidthLimitDown: number
  verifyChecksums: boolean
  syncIntervalMs: number
  conflictResolution: ConflictResolution
}

const DRIVE_OVERRIDE_KEYS: ReadonlyArray<keyof ResolvedDriveSettings> = [
  'concurrentTransfers',
  'maxRetries',
  'bandwidthLimitUp',
  'bandwidthLimitDown',
  'verifyChecksums',
  'syncIntervalMs',
  'conflictResolution'
]

export const MIN_CONCURRENT_TRANSFERS = 1
export const MAX_CONCURRENT_TRANSFERS = 10

/**
 * Resolve drive settings: extract globals, overlay drive overrides.
 * Drive values win where defined (not undefined).
 */
export function resolveDriveSettings(
  global: EngineSettings,
  overrides?: DriveOverrides
): ResolvedDriveSettings {
  const base: ResolvedDriveSettings = {
    concurrentTransfers: global.transferConcurrency,
    maxRetries: global.transferMaxRetries,
    bandwidthLimitUp: global.bandwidthLimitUp,
    bandwidthLimitDown: global.bandwidthLimitDown,
    verifyChecksums: global.transferVerifyChecksums,
    syncIntervalMs: 0,
    conflictResolution: global.syncConflictResolution
  }

  const resolved = overrides ? applyOverrides(base, overrides, DRIVE_OVERRIDE_KEYS) : base
  return {
    ...resolved,
    concurrentTransfers: clampConcurrency(resolved.concurrentTransfers),
    maxRetries: Math.max(0, Math.floor(resolved.maxRetries))
  }
}

export function clampConcurrency(n: number): number {
  if (!Number.isFinite(n)) return MIN_CONCURRENT_TRANSFERS
  return Math.min(MAX_CONCURRENT_TRANSFERS, Math.max(MIN_CONCURRENT_TRANSFERS, Math.floor(n)))
}

// ── Internal helpers ──

/**
 * Generic overlay: for each listed key, if the override is not undefined,
 * replace the base value.
 */
function applyOverrides<T extends object>(base: T, overrides: Partial<T>, keys: ReadonlyArray<keyof T>): T {
  const result = { ...base }
  for (const key of keys) {
    setIfDefined(result, key, overrides[key])
  }
  return result
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value
}
