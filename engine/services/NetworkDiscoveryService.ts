import { EventEmitter } from 'events'
import { networkInterfaces } from 'os'
import type { DeviceService, DeviceType, NetworkDevice, ScanSummary } from '../../src/types/discovery'
import type { EngineSettings } from '../../src/types/settings'
import { DiscoveryError, errorMessage } from '../errors'
import { probeServices, reverseLookup, TcpPortProber, type HostnameResolver, type PortProber } from '../utils/portProbe'
import { candidateHosts, type InterfaceTable } from '../utils/subnet'
import { DISCOVERY_SCOPE, LogService } from './LogService'

export interface NetworkDiscoveryOptions {
  log: LogService
  /** Read at the start of every scan */
  settings: () => Readonly<EngineSettings>
  prober?: PortProber
  resolveHostname?: HostnameResolver
  interfaces?: () => InterfaceTable
  now?: () => number
}

interface ScanState {
  next: number
  stopped: boolean
  finished: boolean
  failure: unknown
  wake: (() => void) | null
}

const HOSTNAME_HINTS: Array<[RegExp, DeviceType]> = [
  [/router|gateway|fritz/i, 'router'],
  [/nas|storage|diskstation|synology|qnap/i, 'nas'],
  [/laptop|desktop|macbook|imac|\bpc\b|-pc/i, 'computer']
]

/** Best guess at what a device is, from its hostname and open ports */
export function classifyDevice(ip: string, services: readonly DeviceService[], hostname?: string): DeviceType {
  if (hostname) {
    for (const [pattern, type] of HOSTNAME_HINTS) {
      if (pattern.test(hostname)) return type
    }
  }

  const ports = new Set(services.map((s) => s.port))
  const has = (protocol: string): boolean => services.some((s) => s.protocol === protocol)

  if (ports.has(5000) || ports.has(5001)) return 'nas'
  if (has('smb') && (has('ftp') || has('webdav'))) return 'nas'
  if (ip.endsWith('.1') && (ports.has(80) || ports.has(443))) return 'router'
  if (has('smb')) return 'computer'
  if (has('sftp') || has('ftp')) return 'server'
  return 'unknown'
}

/**
 * NetworkDiscoveryService: Probes the local /24 networks for storage
 * services and keeps the list of devices it has seen.
 *
 * Events:
 *   'device'       → (NetworkDevice, isNew)
 *   'stale'        → (NetworkDevice)   missed its first cycle
 *   'unreachable'  → (NetworkDevice)   missed discoveryStaleAfterCycles cycles
 *   'removed'      → (deviceId)
 *   'scanComplete' → (ScanSummary)
 *   'scanError'    → (Error)
 */
export class NetworkDiscoveryService extends EventEmitter {
  private devices: Map<string, NetworkDevice> = new Map()
  private cycle = 0
  private activeScans = 0
  private timer: ReturnType<typeof setInterval> | null = null
  private readonly log: LogService
  private readonly settings: () => Readonly<EngineSettings>
  private readonly prober: PortProber
  private readonly resolveHostname: HostnameResolver
  private readonly interfaces: () => InterfaceTable
  private readonly now: () => number

  constructor(options: NetworkDiscoveryOptions) {
    super()
    this.log = options.log
    this.settings = options.settings
    this.prober = options.prober ?? new TcpPortProber()
    this.resolveHostname = options.resolveHostname ?? reverseLookup
    this.interfaces = options.interfaces ?? networkInterfaces
    this.now = options.now ?? Date.now
  }

  /**
   * One pass over every candidate host, yielding devices as they answer.
   * Missed-cycle accounting runs only when the pass is consumed to the end.
   */
  async *scan(): AsyncGenerator<NetworkDevice, void, undefined> {
    const settings = this.settings()
    const { hosts } = candidateHosts({
      interfaces: this.interfaces(),
      subnets: settings.discoverySubnets,
      extraHosts: settings.discoveryExtraHosts
    })

    if (hosts.length === 0) {
      const error = new DiscoveryError('No usable network interface to scan')
      this.reportScanError(error)
      throw error
    }

    const cycle = ++this.cycle
    const startedAt = this.now()
    const seen = new Set<string>()
    const found: NetworkDevice[] = []
    const state: ScanState = { next: 0, stopped: false, finished: false, failure: null, wake: null }

    const notify = (): void => {
      const wake = state.wake
      state.wake = null
      wake?.()
    }

    const worker = async (): Promise<void> => {
      while (!state.stopped && state.next < hosts.length) {
        const host = hosts[state.next++]
        const services = await probeServices(this.prober, host, settings.discoveryProbeTimeoutMs)
        if (services.length === 0 || state.stopped) continue
        seen.add(host)
        found.push(await this.record(host, services, settings))
        notify()
      }
    }

    this.activeScans++
    const workers = Math.max(1, Math.min(settings.discoveryConcurrency, hosts.length))
    const probing = Promise.all(Array.from({ length: workers }, worker)).then(
      () => {
        state.finished = true
        notify()
      },
      (err: unknown) => {
        state.failure = err
        state.finished = true
        notify()
      }
    )

    try {
      while (true) {
        const device = found.shift()
        if (device) {
          yield device
          continue
        }
        if (state.finished) break
        await new Promise<void>((resolve) => {
          state.wake = resolve
        })
      }

      if (state.failure !== null) throw state.failure
      this.completeCycle(cycle, seen, hosts.length, startedAt)
    } finally {
      // A consumer that stops early leaves probes in flight; let them wind down
      state.stopped = true
      await probing
      this.activeScans--
    }
  }

  /** Run a full scan and collect what it found */
  async scanAll(): Promise<NetworkDevice[]> {
    const devices: NetworkDevice[] = []
    for await (const device of this.scan()) {
      devices.push(device)
    }
    return devices
  }

  /** Repeat scans on an interval, clamped to discoveryMinIntervalMs; the first runs now */
  startContinuousMonitoring(intervalMs?: number): number {
    this.stopContinuousMonitoring()
    const settings = this.settings()
    const interval = Math.max(settings.discoveryMinIntervalMs, intervalMs ?? settings.discoveryIntervalMs)

    this.timer = setInterval(() => this.tick(), interval)
    this.tick()
    return interval
  }

  stopContinuousMonitoring(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  get isMonitoring(): boolean {
    return this.timer !== null
  }

  get isScanning(): boolean {
    return this.activeScans > 0
  }

  getDevices(): NetworkDevice[] {
    return Array.from(this.devices.values(), copyDevice).sort((a, b) =>
      a.ipAddress.localeCompare(b.ipAddress, undefined, { numeric: true })
    )
  }

  getDevice(id: string): NetworkDevice | undefined {
    const device = this.devices.get(id)
    return device ? copyDevice(device) : undefined
  }

  /** Drop a device from the list */
  forget(id: string): boolean {
    if (!this.devices.delete(id)) return false
    this.emit('removed', id)
    return true
  }

  dispose(): void {
    this.stopContinuousMonitoring()
  }

  /** Overlapping ticks are skipped */
  private tick(): void {
    if (this.activeScans > 0) {
      this.log.log(DISCOVERY_SCOPE, 'debug', 'discovery', 'Previous scan still running, skipping this cycle.')
      return
    }
    this.scanAll().catch((err: unknown) => {
      // scan() reports DiscoveryError itself before throwing
      if (!(err instanceof DiscoveryError)) this.reportScanError(err)
    })
  }

  private async record(host: string, services: DeviceService[], settings: Readonly<EngineSettings>): Promise<NetworkDevice> {
    const existing = this.devices.get(host)
    const hostname =
      existing?.hostname ?? (settings.discoveryResolveHostnames ? await this.resolveHostname(host) : undefined)
    const now = this.now()

    const device: NetworkDevice = {
      id: host,
      name: hostname ?? host,
      type: classifyDevice(host, services, hostname),
      ipAddress: host,
      hostname,
      services,
      isReachable: true,
      isStale: false,
      missedCycles: 0,
      firstSeen: existing?.firstSeen ?? now,
      lastSeen: now
    }
    this.devices.set(host, device)

    LogService.deviceFound(this.log, device.name, host, services.map((s) => `${s.name}:${s.port}`).join(', '))
    this.emit('device', copyDevice(device), existing === undefined)
    return copyDevice(device)
  }

  /** Age every device the scan did not see */
  private completeCycle(cycle: number, seen: Set<string>, hostsProbed: number, startedAt: number): void {
    const settings = this.settings()
    const now = this.now()

    for (const device of Array.from(this.devices.values())) {
      if (seen.has(device.id)) continue

      device.missedCycles++
      if (!device.isStale) {
        device.isStale = true
        this.emit('stale', copyDevice(device))
      }
      if (device.isReachable && device.missedCycles >= settings.discoveryStaleAfterCycles) {
        device.isReachable = false
        LogService.deviceUnreachable(this.log, device.name, device.missedCycles)
        this.emit('unreachable', copyDevice(device))
      }
      if (settings.discoveryPruneAfterMs > 0 && now - device.lastSeen >= settings.discoveryPruneAfterMs) {
        this.forget(device.id)
      }
    }

    const summary: ScanSummary = {
      cycle,
      hostsProbed,
      devicesFound: seen.size,
      startedAt,
      finishedAt: now
    }
    LogService.scanCompleted(this.log, hostsProbed, seen.size, now - startedAt)
    this.emit('scanComplete', summary)
  }

  private reportScanError(err: unknown): void {
    LogService.scanFailed(this.log, errorMessage(err))
    this.emit('scanError', err instanceof Error ? err : new DiscoveryError(errorMessage(err)))
  }
}

function copyDevice(device: NetworkDevice): NetworkDevice {
  return { ...device, services: device.services.map((s) => ({ ...s })) }
}
