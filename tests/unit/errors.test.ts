import { describe, it, expect } from 'vitest'
import {
  AuthenticationError,
  CancelledError,
  ConnectionError,
  IntegrityError,
  IoError,
  ProtocolError,
  TimeoutError,
  errorCode,
  isRetryable,
  toEngineError,
  toMountErrorKind
} from '../../engine/errors'

function nodeError(code: string, message: string = code): Error {
  return Object.assign(new Error(message), { code })
}

describe('toEngineError', () => {
  it('should pass engine errors through untouched', () => {
    const original = new AuthenticationError('denied')
    expect(toEngineError(original)).toBe(original)
  })

  it('should classify Node error codes', () => {
    expect(toEngineError(nodeError('ECONNREFUSED'))).toBeInstanceOf(ConnectionError)
    expect(toEngineError(nodeError('ETIMEDOUT'))).toBeInstanceOf(TimeoutError)
    expect(toEngineError(nodeError('ENOENT'))).toBeInstanceOf(IoError)
  })

  it('should look through one level of cause', () => {
    const wrapped = new Error('wrapped', { cause: nodeError('EHOSTUNREACH') })
    expect(errorCode(wrapped)).toBe('EHOSTUNREACH')
    expect(toEngineError(wrapped).kind).toBe('connection')
  })

  it('should treat "timed out" messages as timeouts', () => {
    expect(toEngineError(new Error('Operation timed out')).kind).toBe('timeout')
  })

  it('should map an AbortError to a cancellation', () => {
    const abort = new Error('The operation was aborted')
    abort.name = 'AbortError'
    expect(toEngineError(abort)).toBeInstanceOf(CancelledError)
  })

  it('should fall back to the given kind', () => {
    expect(toEngineError(new Error('odd'))).toBeInstanceOf(ProtocolError)
    expect(toEngineError('plain string', 'io').message).toBe('plain string')
    expect(toEngineError(42, 'connection').message).toBe('Unknown error')
  })

  it('should keep the subclass name', () => {
    expect(new IntegrityError('mismatch').name).toBe('IntegrityError')
  })
})

describe('isRetryable', () => {
  it('should retry only transient kinds', () => {
    expect(isRetryable('connection')).toBe(true)
    expect(isRetryable('timeout')).toBe(true)
    expect(isRetryable('protocol')).toBe(true)
    expect(isRetryable('authentication')).toBe(false)
    expect(isRetryable('io')).toBe(false)
    expect(isRetryable('integrity')).toBe(false)
    expect(isRetryable('unsupportedProtocol')).toBe(false)
  })
})

describe('toMountErrorKind', () => {
  it('should translate connect failures', () => {
    expect(toMountErrorKind('authentication')).toBe('AuthenticationFailed')
    expect(toMountErrorKind('connection')).toBe('HostUnreachable')
    expect(toMountErrorKind('timeout')).toBe('TimedOut')
    expect(toMountErrorKind('unsupportedProtocol')).toBe('UnsupportedProtocol')
    expect(toMountErrorKind('protocol')).toBe('ProtocolError')
  })
})
