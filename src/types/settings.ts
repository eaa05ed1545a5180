import type { ConflictResolution } from './transfer'
import type { DriveProtocol } from './drive'

/** Engine settings, read as a snapshot and never written by the engine itself */
export interface EngineSettings {
  // Transfers
  transferConcurrency: number          // 1-10 workers per drive
  transferMaxRetries: number
  transferStallTimeoutMs: number       // 0 = no stall watchdog
  transferVerifyChecksums: boolean
  transferMaxHistoryItems: number      // finished items kept per drive
  bandwidthLimitUp: number             // 0 = unlimited, in KB/s
  bandwidthLimitDown: number

  // Progress gating
  progressIntervalMs: number
  progressMinBytes: number

  // Retry backoff (exponential)
  retryInitialDelayMs: number
  retryMaxDelayMs: number
  retryBackoffMultiplier: number
  retryJitter: boolean

  // Connection
  connectionTimeoutMs: number
  defaultPorts: Record<DriveProtocol, number>

  // Discovery
  discoveryIntervalMs: number
  discoveryMinIntervalMs: number
  discoveryProbeTimeoutMs: number
  discoveryConcurrency: number
  discoveryStaleAfterCycles: number
  discoveryPruneAfterMs: number        // 0 = never prune
  discoverySubnets: string[]           // extra /24 prefixes, e.g. '10.0.4'
  discoveryExtraHosts: string[]
  discoveryResolveHostnames: boolean

  // Sync
  syncMtimeToleranceMs: number
  syncMaxDepth: number
  syncConflictResolution: ConflictResolution

  // Log
  logMaxEntries: number
  logDebugMode: boolean
}
