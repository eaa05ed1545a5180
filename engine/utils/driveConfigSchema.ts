import * as v from 'valibot'
import {
  DRIVE_PROTOCOLS,
  type DriveConfig,
  type DriveCredentials,
  type DriveOverrides,
  type DriveProtocol
} from '../../src/types/drive'

const nonEmpty = v.pipe(v.string(), v.trim(), v.minLength(1))
const portSchema = v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(65535))
const nonNegativeInt = v.pipe(v.number(), v.integer(), v.minValue(0))

export const credentialsSchema = v.object({
  username: v.optional(v.string()),
  password: v.optional(v.string()),
  privateKey: v.optional(v.string()),
  passphrase: v.optional(v.string()),
  token: v.optional(v.string())
})

export const proxySchema = v.object({
  type: v.picklist(['socks4', 'socks5']),
  host: nonEmpty,
  port: portSchema,
  username: v.optional(v.string()),
  password: v.optional(v.string())
})

export const overridesSchema = v.object({
  concurrentTransfers: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1), v.maxValue(10))),
  maxRetries: v.optional(nonNegativeInt),
  bandwidthLimitUp: v.optional(v.pipe(v.number(), v.minValue(0))),
  bandwidthLimitDown: v.optional(v.pipe(v.number(), v.minValue(0))),
  verifyChecksums: v.optional(v.boolean()),
  syncIntervalMs: v.optional(nonNegativeInt),
  conflictResolution: v.optional(v.picklist(['overwrite', 'overwrite-newer', 'skip']))
})

/** Protocol is checked separately so an unknown one is reported as unsupported, not invalid */
export const driveConfigSchema = v.object({
  name: nonEmpty,
  protocol: v.string(),
  host: nonEmpty,
  port: v.optional(portSchema),
  rootPath: v.optional(v.string()),
  secure: v.optional(v.boolean()),
  mountPoint: v.optional(nonEmpty),
  localPath: v.optional(nonEmpty),
  credentials: v.optional(credentialsSchema),
  proxy: v.optional(proxySchema),
  deviceId: v.optional(v.string()),
  overrides: v.optional(overridesSchema)
})

export function isDriveProtocol(value: string): value is DriveProtocol {
  return DRIVE_PROTOCOLS.some((p) => p === value)
}

export type ConfigCheck =
  | { ok: true; config: DriveConfig }
  | { ok: false; reason: 'invalid' | 'unsupported'; message: string }

function describeIssues(issues: readonly v.BaseIssue<unknown>[]): string {
  return issues
    .map((issue) => {
      const path = v.getDotPath(issue)
      return path ? `${path}: ${issue.message}` : issue.message
    })
    .join('; ')
}

/** Validate a mount config coming from outside the engine */
export function checkDriveConfig(input: unknown): ConfigCheck {
  const result = v.safeParse(driveConfigSchema, input)
  if (!result.success) {
    return { ok: false, reason: 'invalid', message: describeIssues(result.issues) }
  }

  const { protocol, ...rest } = result.output
  if (!isDriveProtocol(protocol)) {
    return { ok: false, reason: 'unsupported', message: `Unsupported protocol: ${protocol}` }
  }
  if (protocol === 'smb' && !rest.mountPoint) {
    return { ok: false, reason: 'invalid', message: 'mountPoint: SMB drives need the local mount point of the share' }
  }
  if (rest.proxy && protocol !== 'sftp') {
    return { ok: false, reason: 'invalid', message: 'proxy: only SFTP drives can use a proxy' }
  }
  return { ok: true, config: { ...rest, protocol } }
}

export type CredentialsCheck = { ok: true; credentials: DriveCredentials } | { ok: false; message: string }

export function checkCredentials(input: unknown): CredentialsCheck {
  const result = v.safeParse(credentialsSchema, input)
  return result.success
    ? { ok: true, credentials: result.output }
    : { ok: false, message: describeIssues(result.issues) }
}

export type OverridesCheck = { ok: true; overrides: DriveOverrides } | { ok: false; message: string }

export function checkOverrides(input: unknown): OverridesCheck {
  const result = v.safeParse(overridesSchema, input)
  return result.success
    ? { ok: true, overrides: result.output }
    : { ok: false, message: describeIssues(result.issues) }
}
