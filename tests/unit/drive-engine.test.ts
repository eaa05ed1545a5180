import type { NetworkInterfaceInfo } from 'os'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { createDriveEngine, type DriveEngine } from '../../engine'
import type { PortProber } from '../../engine/utils/portProbe'
import { FakeConnector, waitFor } from '../helpers/fakeConnector'

const ETH0: NetworkInterfaceInfo = {
  address: '192.168.1.10',
  netmask: '255.255.255.0',
  family: 'IPv4',
  mac: '00:11:22:33:44:55',
  internal: false,
  cidr: '192.168.1.10/24'
}

describe('DriveEngine', () => {
  let open: Map<string, number[]>
  let connector: FakeConnector
  let engine: DriveEngine

  beforeEach(() => {
    open = new Map()
    connector = new FakeConnector()
    const prober: PortProber = {
      probe: async (host, port) => open.get(host)?.includes(port) ?? false
    }
    engine = createDriveEngine({
      settings: { discoveryResolveHostnames: false, discoveryStaleAfterCycles: 1, retryJitter: false },
      connectorFactory: () => connector,
      prober,
      interfaces: () => ({ eth0: [ETH0] })
    })
  })

  afterEach(async () => {
    await engine.dispose()
  })

  it('should apply setting overrides over the defaults', () => {
    expect(engine.settings().discoveryStaleAfterCycles).toBe(1)
    expect(engine.settings().transferConcurrency).toBe(3)
  })

  it('should mark a drive when its device drops off the network', async () => {
    open.set('192.168.1.30', [22])
    const [device] = await engine.discovery.scanAll()
    const result = await engine.drives.mountDiscovered(device, device.services[0])
    if (!result.success) throw new Error(result.error.message)

    expect(engine.stores.devices.getState().devices.map((d) => d.id)).toEqual(['192.168.1.30'])
    expect(engine.stores.drives.getState().getOnlineDrives().map((d) => d.id)).toEqual([result.drive.id])

    open.clear()
    await engine.discovery.scanAll()

    expect(engine.stores.devices.getState().getReachableDevices()).toEqual([])
    expect(engine.stores.devices.getState().lastScan?.cycle).toBe(2)
    const [drive] = engine.stores.drives.getState().drives
    expect(drive.offlineReason).toBe('Device 192.168.1.30 is unreachable')
  })

  it('should stream transfer events until aborted', async () => {
    connector.files.set('/a.txt', { size: 3, modifiedAt: 0 })
    const result = await engine.drives.mount({ name: 'backup', protocol: 'sftp', host: 'files.lan' })
    if (!result.success) throw new Error(result.error.message)

    const controller = new AbortController()
    const events = engine.transferEvents(controller.signal)
    const first = events.next()
    const item = engine.drives.download(result.drive.id, '/a.txt', '/tmp/a.txt')

    expect((await first).value).toMatchObject({ type: 'queued', itemId: item.id })
    controller.abort()
    // Events buffered before the abort still come through, then the stream ends
    for await (const event of events) expect(event.driveId).toBe(result.drive.id)
    expect(await events.next()).toEqual({ done: true, value: undefined })

    await waitFor(() => engine.stores.transfers.getState().transfers[0]?.status === 'completed')
  })

  it('should mirror log entries into the log store', async () => {
    const result = await engine.drives.mount({ name: 'backup', protocol: 'sftp', host: 'files.lan' })
    if (!result.success) throw new Error(result.error.message)

    const messages = engine.stores.logs.getState().entries.get(result.drive.id)?.map((e) => e.message)
    expect(messages).toEqual([
      'Connecting to SFTP server files.lan:22...',
      'Connection established.',
      'Drive mounted: backup'
    ])
  })
})
