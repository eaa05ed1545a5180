import { promises as fsp, type Dirent } from 'fs'
import { join } from 'path'
import type { ConflictResolution } from '../../src/types/transfer'
import type { SyncDirection } from '../../src/types/drive'
import type { ConnectorSession, ProtocolConnector } from '../connectors/types'
import { IoError } from '../errors'
import { joinRemotePath, normalizeRemotePath } from './remotePath'

/** A file on either side, keyed by its path relative to the sync root */
export interface SyncEntry {
  path: string          // '/docs/a.txt'
  size: number
  modifiedAt: number    // Unix ms, 0 when unknown
}

export interface SyncAction {
  path: string
  direction: 'upload' | 'download'
  size: number
  reason: 'missing' | 'newer' | 'overwrite'
}

export interface SyncPlan {
  actions: SyncAction[]
  /** Identical on both sides, or not writable in this direction */
  skipped: string[]
  /** Differ, and the policy could not or would not pick a side */
  conflicts: string[]
}

/** Both sides of a path as the last completed copy left them */
export interface SyncBaseline {
  size: number
  localModifiedAt: number
  remoteModifiedAt: number
}

export interface PlanOptions {
  direction: SyncDirection
  conflictResolution: ConflictResolution
  toleranceMs: number
  /**
   * Keyed by path. A server that stamps uploads with its own clock never
   * matches the local time; neither side having moved since the copy means
   * unchanged.
   */
  baseline?: ReadonlyMap<string, SyncBaseline>
}

type Newer = 'local' | 'remote' | 'unknown'

function whichIsNewer(local: SyncEntry, remote: SyncEntry, toleranceMs: number): Newer {
  if (local.modifiedAt === 0 || remote.modifiedAt === 0) return 'unknown'
  if (local.modifiedAt > remote.modifiedAt + toleranceMs) return 'local'
  if (remote.modifiedAt > local.modifiedAt + toleranceMs) return 'remote'
  return 'unknown'
}

function isSame(local: SyncEntry, remote: SyncEntry, toleranceMs: number): boolean {
  if (local.size !== remote.size) return false
  // Same size and no usable timestamp on one side: treat as unchanged
  if (local.modifiedAt === 0 || remote.modifiedAt === 0) return true
  return Math.abs(local.modifiedAt - remote.modifiedAt) <= toleranceMs
}

function unchangedSince(local: SyncEntry, remote: SyncEntry, base: SyncBaseline, toleranceMs: number): boolean {
  if (local.size !== base.size || remote.size !== base.size) return false
  return (
    Math.abs(local.modifiedAt - base.localModifiedAt) <= toleranceMs &&
    Math.abs(remote.modifiedAt - base.remoteModifiedAt) <= toleranceMs
  )
}

/**
 * Diff two listings by name, size and modified time. Nothing is compared
 * byte for byte.
 */
export function planSync(local: readonly SyncEntry[], remote: readonly SyncEntry[], options: PlanOptions): SyncPlan {
  const canUpload = options.direction !== 'download'
  const canDownload = options.direction !== 'upload'
  const localByPath = new Map(local.map((e) => [e.path, e]))
  const remoteByPath = new Map(remote.map((e) => [e.path, e]))
  const paths = Array.from(new Set([...localByPath.keys(), ...remoteByPath.keys()])).sort()

  const plan: SyncPlan = { actions: [], skipped: [], conflicts: [] }

  for (const path of paths) {
    const l = localByPath.get(path)
    const r = remoteByPath.get(path)

    if (l && !r) {
      if (canUpload) plan.actions.push({ path, direction: 'upload', size: l.size, reason: 'missing' })
      else plan.skipped.push(path)
      continue
    }
    if (r && !l) {
      if (canDownload) plan.actions.push({ path, direction: 'download', size: r.size, reason: 'missing' })
      else plan.skipped.push(path)
      continue
    }
    if (!l || !r) continue

    const base = options.baseline?.get(path)
    if (isSame(l, r, options.toleranceMs) || (base && unchangedSince(l, r, base, options.toleranceMs))) {
      plan.skipped.push(path)
      continue
    }

    if (options.conflictResolution === 'skip') {
      plan.conflicts.push(path)
      continue
    }

    if (options.conflictResolution === 'overwrite' && options.direction !== 'both') {
      plan.actions.push(
        options.direction === 'upload'
          ? { path, direction: 'upload', size: l.size, reason: 'overwrite' }
          : { path, direction: 'download', size: r.size, reason: 'overwrite' }
      )
      continue
    }

    // overwrite-newer, or overwrite in both directions: the newer side wins
    const newer = whichIsNewer(l, r, options.toleranceMs)
    if (newer === 'local' && canUpload) {
      plan.actions.push({ path, direction: 'upload', size: l.size, reason: 'newer' })
    } else if (newer === 'remote' && canDownload) {
      plan.actions.push({ path, direction: 'download', size: r.size, reason: 'newer' })
    } else if (newer === 'unknown') {
      plan.conflicts.push(path)
    } else {
      plan.skipped.push(path)
    }
  }

  return plan
}

/** Files under a local directory, paths relative to it */
export async function walkLocal(root: string, maxDepth: number): Promise<SyncEntry[]> {
  const entries: SyncEntry[] = []

  const visit = async (dir: string, relative: string, depth: number): Promise<void> => {
    let children: Dirent[]
    try {
      children = await fsp.readdir(dir, { withFileTypes: true })
    } catch (err) {
      throw new IoError(`Cannot read ${dir}`, { cause: err })
    }

    for (const child of children) {
      const childPath = join(dir, child.name)
      const childRelative = joinRemotePath(relative, child.name)
      if (child.isDirectory()) {
        if (depth < maxDepth) await visit(childPath, childRelative, depth + 1)
      } else if (child.isFile()) {
        const stats = await fsp.stat(childPath)
        entries.push({ path: childRelative, size: stats.size, modifiedAt: Math.floor(stats.mtimeMs) })
      }
    }
  }

  await visit(root, '/', 0)
  return entries
}

/** Files under a remote directory through a connector session */
export async function walkRemote(
  connector: ProtocolConnector,
  session: ConnectorSession,
  root: string,
  maxDepth: number
): Promise<SyncEntry[]> {
  const base = normalizeRemotePath(root)
  const entries: SyncEntry[] = []

  const visit = async (dir: string, depth: number): Promise<void> => {
    const children = await connector.listEntries(session, dir)
    for (const child of children) {
      if (child.isDirectory) {
        if (depth < maxDepth) await visit(child.path, depth + 1)
      } else {
        entries.push({ path: relativeTo(base, child.path), size: child.size, modifiedAt: child.modifiedAt })
      }
    }
  }

  await visit(base, 0)
  return entries
}

function relativeTo(base: string, path: string): string {
  if (base === '/') return path
  return path.startsWith(base + '/') ? path.slice(base.length) : path
}
