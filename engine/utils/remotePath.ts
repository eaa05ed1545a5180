import { posix } from 'path'

/**
 * Normalize a drive-relative path: posix separators, leading '/', no
 * trailing '/'. Leading '..' segments collapse onto '/', so a normalized
 * path never points above the drive root.
 */
export function normalizeRemotePath(remotePath: string): string {
  const normalized = posix.normalize('/' + remotePath.replace(/\\/g, '/'))
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized
}

/** Absolute server path of a drive-relative path */
export function resolveRemotePath(rootPath: string, remotePath: string): string {
  return normalizeRemotePath(posix.join(normalizeRemotePath(rootPath), normalizeRemotePath(remotePath)))
}

/** Drive-relative path of an absolute server path under `rootPath` */
export function toDrivePath(rootPath: string, absolutePath: string): string {
  const root = normalizeRemotePath(rootPath)
  const abs = normalizeRemotePath(absolutePath)
  if (root === '/') return abs
  if (abs === root) return '/'
  return abs.startsWith(root + '/') ? abs.slice(root.length) : abs
}

export function joinRemotePath(dir: string, name: string): string {
  return normalizeRemotePath(posix.join(dir, name))
}

export function remoteDirname(remotePath: string): string {
  return posix.dirname(normalizeRemotePath(remotePath))
}

export function remoteBasename(remotePath: string): string {
  return posix.basename(normalizeRemotePath(remotePath))
}
