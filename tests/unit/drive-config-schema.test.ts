import { describe, it, expect } from 'vitest'
import { checkCredentials, checkDriveConfig, checkOverrides } from '../../engine/utils/driveConfigSchema'

describe('checkDriveConfig', () => {
  it('should accept a minimal config and trim names', () => {
    const result = checkDriveConfig({ name: ' backup ', protocol: 'sftp', host: 'files.lan' })

    expect(result).toEqual({ ok: true, config: { name: 'backup', protocol: 'sftp', host: 'files.lan' } })
  })

  it('should flag unknown protocols as unsupported', () => {
    expect(checkDriveConfig({ name: 'x', protocol: 'gopher', host: 'h' })).toEqual({
      ok: false,
      reason: 'unsupported',
      message: 'Unsupported protocol: gopher'
    })
  })

  it('should name the offending field', () => {
    const result = checkDriveConfig({ name: 'x', protocol: 'ftp', host: 'h', port: 70000 })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.reason).toBe('invalid')
    expect(result.message.startsWith('port: ')).toBe(true)
  })

  it('should reject a proxy on anything but SFTP', () => {
    const result = checkDriveConfig({
      name: 'x',
      protocol: 'ftp',
      host: 'h',
      proxy: { type: 'socks5', host: 'proxy.lan', port: 1080 }
    })

    expect(result).toEqual({ ok: false, reason: 'invalid', message: 'proxy: only SFTP drives can use a proxy' })
  })

  it('should reject values that are not objects', () => {
    expect(checkDriveConfig('sftp://files.lan').ok).toBe(false)
  })
})

describe('checkCredentials', () => {
  it('should pass strings through', () => {
    expect(checkCredentials({ username: 'alice', token: 'test-secret' })).toEqual({
      ok: true,
      credentials: { username: 'alice', token: 'test-secret' }
    })
  })

  it('should reject a non-string password', () => {
    const result = checkCredentials({ password: 1234 })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.message.startsWith('password: ')).toBe(true)
  })
})

describe('checkOverrides', () => {
  it('should bound concurrency and reject negative limits', () => {
    expect(checkOverrides({ concurrentTransfers: 10 }).ok).toBe(true)
    expect(checkOverrides({ concurrentTransfers: 0 }).ok).toBe(false)
    expect(checkOverrides({ bandwidthLimitUp: -1 }).ok).toBe(false)
    expect(checkOverrides({ conflictResolution: 'merge' }).ok).toBe(false)
  })
})
