import type { TransferErrorKind } from '../src/types/transfer'
import type { MountErrorKind } from '../src/types/drive'

/**
 * Base class of every error the engine raises. The `kind` tag is what
 * transfer items and events carry; the subclass is what callers match on.
 */
export class EngineError extends Error {
  readonly kind: TransferErrorKind

  constructor(kind: TransferErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.name = new.target.name
  }
}

/** Host unreachable, refused, reset or DNS failure */
export class ConnectionError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options)
  }
}

export class TimeoutError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout', message, options)
  }
}

export class AuthenticationError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options)
  }
}

/** Malformed or unexpected server response */
export class ProtocolError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options)
  }
}

/** Filesystem failure that a retry will not fix: local I/O, or a remote file missing or refused */
export class IoError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('io', message, options)
  }
}

export class IntegrityError extends EngineError {
  constructor(message: string) {
    super('integrity', message)
  }
}

export class CancelledError extends EngineError {
  constructor(message: string = 'Transfer cancelled') {
    super('cancelled', message)
  }
}

export class UnsupportedProtocolError extends EngineError {
  constructor(protocol: string) {
    super('unsupportedProtocol', `Unsupported protocol: ${protocol}`)
  }
}

/** Raised once per scan invocation when the network cannot be scanned at all */
export class DiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DiscoveryError'
  }
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'EHOSTDOWN',
  'ENETUNREACH',
  'ENETDOWN',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_STREAM_PREMATURE_CLOSE'
])

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT'])

const IO_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR', 'ENOTDIR', 'ENOSPC', 'EROFS', 'EEXIST', 'EMFILE'])

function readProperty(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined
  return Reflect.get(err, key)
}

/** Node-style `code`, looking through one level of `cause` */
export function errorCode(err: unknown): string | undefined {
  const code = readProperty(err, 'code')
  if (typeof code === 'string') return code
  const cause = readProperty(err, 'cause')
  const causeCode = readProperty(cause, 'code')
  return typeof causeCode === 'string' ? causeCode : undefined
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return typeof err === 'string' ? err : 'Unknown error'
}

/**
 * Map any thrown value onto the engine taxonomy. Node error codes are
 * checked first; everything else falls back to `fallback`.
 */
export function toEngineError(err: unknown, fallback: TransferErrorKind = 'protocol'): EngineError {
  if (err instanceof EngineError) return err

  const message = errorMessage(err)
  const code = errorCode(err)
  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) return new TimeoutError(message, { cause: err })
    if (CONNECTION_CODES.has(code)) return new ConnectionError(message, { cause: err })
    if (IO_CODES.has(code)) return new IoError(message, { cause: err })
  }
  if (err instanceof Error && err.name === 'AbortError') return new CancelledError()
  if (/timed? ?out/i.test(message)) return new TimeoutError(message, { cause: err })

  switch (fallback) {
    case 'connection':
      return new ConnectionError(message, { cause: err })
    case 'timeout':
      return new TimeoutError(message, { cause: err })
    case 'authentication':
      return new AuthenticationError(message, { cause: err })
    case 'io':
      return new IoError(message, { cause: err })
    case 'cancelled':
      return new CancelledError(message)
    case 'integrity':
      return new IntegrityError(message)
    case 'unsupportedProtocol':
      return new UnsupportedProtocolError(message)
    case 'protocol':
      return new ProtocolError(message, { cause: err })
  }
}

const RETRYABLE: ReadonlySet<TransferErrorKind> = new Set(['connection', 'timeout', 'protocol'])

/** Transient kinds the queue retries on its own */
export function isRetryable(kind: TransferErrorKind): boolean {
  return RETRYABLE.has(kind)
}

/** Translate a connect failure into the kind a mount reports */
export function toMountErrorKind(kind: TransferErrorKind): MountErrorKind {
  switch (kind) {
    case 'authentication':
      return 'AuthenticationFailed'
    case 'timeout':
      return 'TimedOut'
    case 'unsupportedProtocol':
      return 'UnsupportedProtocol'
    case 'connection':
    case 'io':
      return 'HostUnreachable'
    default:
      return 'ProtocolError'
  }
}
