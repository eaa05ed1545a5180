import { mkdir, mkdtemp, readFile, rm, stat, utimes, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SMBConnector, type SMBSession } from '../../engine/connectors/SMBConnector'
import { ConnectionError, IoError, ProtocolError } from '../../engine/errors'
import { computeSha256FromBytes } from '../../engine/utils/checksum'

describe('SMBConnector', () => {
  let share: string
  let local: string
  let connector: SMBConnector
  let session: SMBSession

  beforeEach(async () => {
    share = await mkdtemp(join(tmpdir(), 'netdrive-smb-'))
    local = await mkdtemp(join(tmpdir(), 'netdrive-smb-local-'))
    await mkdir(join(share, 'docs'))
    await writeFile(join(share, 'docs', 'a.txt'), 'hello')
    connector = new SMBConnector()
    session = await connector.connect({ host: 'nas', port: 445, rootPath: '/', secure: false, timeoutMs: 1000, mountPoint: share })
  })

  afterEach(async () => {
    await rm(share, { recursive: true, force: true })
    await rm(local, { recursive: true, force: true })
  })

  it('should need a mounted directory', async () => {
    const params = { host: 'nas', port: 445, rootPath: '/', secure: false, timeoutMs: 1000 }

    await expect(connector.connect(params)).rejects.toBeInstanceOf(ProtocolError)
    await expect(connector.connect({ ...params, mountPoint: join(share, 'gone') })).rejects.toBeInstanceOf(ConnectionError)
    await expect(connector.connect({ ...params, mountPoint: join(share, 'docs', 'a.txt') })).rejects.toBeInstanceOf(
      ProtocolError
    )
  })

  it('should list and stat under the share root', async () => {
    const entries = await connector.listEntries(session, '/docs')

    expect(entries).toEqual([
      { name: 'a.txt', path: '/docs/a.txt', size: 5, isDirectory: false, modifiedAt: expect.any(Number) }
    ])
    expect(await connector.stat(session, '/docs')).toMatchObject({ name: 'docs', isDirectory: true, size: 0 })
  })

  it('should keep paths inside the share', async () => {
    const entries = await connector.listEntries(session, '/../../docs')

    expect(entries.map((e) => e.path)).toEqual(['/docs/a.txt'])
  })

  it('should download and upload with a digest', async () => {
    const target = join(local, 'nested', 'a.txt')
    const down = await connector.download(session, '/docs/a.txt', target)

    expect(await readFile(target, 'utf8')).toBe('hello')
    expect(down).toMatchObject({ bytesTransferred: 5, checksum: computeSha256FromBytes('hello') })

    await connector.ensureDirectory(session, '/backup/2024')
    const up = await connector.upload(session, target, '/backup/2024/a.txt')

    expect(up.bytesTransferred).toBe(5)
    expect(await readFile(join(share, 'backup', '2024', 'a.txt'), 'utf8')).toBe('hello')
  })

  it('should carry the modification time across in both directions', async () => {
    const hourAgo = new Date(Math.floor(Date.now() / 1000) * 1000 - 3_600_000)
    await utimes(join(share, 'docs', 'a.txt'), hourAgo, hourAgo)
    const target = join(local, 'a.txt')

    const down = await connector.download(session, '/docs/a.txt', target)

    expect(down.remoteModifiedAt).toBe(hourAgo.getTime())
    expect(down.localModifiedAt).toBe(hourAgo.getTime())
    expect(Math.floor((await stat(target)).mtimeMs)).toBe(hourAgo.getTime())

    const twoHoursAgo = new Date(hourAgo.getTime() - 3_600_000)
    await utimes(target, twoHoursAgo, twoHoursAgo)
    const up = await connector.upload(session, target, '/copy.txt')

    expect(up.localModifiedAt).toBe(twoHoursAgo.getTime())
    expect(up.remoteModifiedAt).toBe(twoHoursAgo.getTime())
    expect(Math.floor((await stat(join(share, 'copy.txt'))).mtimeMs)).toBe(twoHoursAgo.getTime())
  })

  it('should report a missing remote file as an io error', async () => {
    await expect(connector.stat(session, '/nope.txt')).rejects.toBeInstanceOf(IoError)
  })
})
