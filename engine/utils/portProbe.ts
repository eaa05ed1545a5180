import { connect } from 'net'
import { promises as dns } from 'dns'
import type { DeviceService } from '../../src/types/discovery'
import type { DriveProtocol } from '../../src/types/drive'

/** Checks whether a TCP port accepts connections */
export interface PortProber {
  probe(host: string, port: number, timeoutMs: number): Promise<boolean>
}

export type HostnameResolver = (ip: string) => Promise<string | undefined>

interface KnownPort {
  name: string
  secure: boolean
  protocol?: DriveProtocol
}

/** Ports a scan probes and what an open one means */
export const SERVICE_PORTS: ReadonlyMap<number, KnownPort> = new Map([
  [21, { name: 'FTP', secure: false, protocol: 'ftp' }],
  [22, { name: 'SSH', secure: true, protocol: 'sftp' }],
  [80, { name: 'HTTP', secure: false, protocol: 'webdav' }],
  [139, { name: 'NetBIOS', secure: false, protocol: 'smb' }],
  [443, { name: 'HTTPS', secure: true, protocol: 'webdav' }],
  [445, { name: 'SMB', secure: false, protocol: 'smb' }],
  [548, { name: 'AFP', secure: false }],
  [990, { name: 'FTPS', secure: true, protocol: 'ftp' }],
  [5000, { name: 'NAS HTTP', secure: false, protocol: 'webdav' }],
  [5001, { name: 'NAS HTTPS', secure: true, protocol: 'webdav' }],
  [8080, { name: 'HTTP Alt', secure: false, protocol: 'webdav' }],
  [8443, { name: 'HTTPS Alt', secure: true, protocol: 'webdav' }]
] satisfies Array<[number, KnownPort]>)

/** Plain TCP connect probe */
export class TcpPortProber implements PortProber {
  probe(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = connect({ host, port })
      const finish = (open: boolean): void => {
        socket.removeAllListeners()
        socket.destroy()
        resolve(open)
      }
      socket.setTimeout(timeoutMs)
      socket.once('connect', () => finish(true))
      socket.once('timeout', () => finish(false))
      // Refused, unreachable and reset all mean "closed" for a probe
      socket.once('error', () => finish(false))
    })
  }
}

/** Reverse DNS, undefined when there is no PTR record */
export const reverseLookup: HostnameResolver = async (ip) => {
  try {
    const names = await dns.reverse(ip)
    return names[0]
  } catch {
    return undefined
  }
}

/** Probe every known port of a host in parallel; returns the open ones */
export async function probeServices(
  prober: PortProber,
  host: string,
  timeoutMs: number,
  ports: ReadonlyMap<number, KnownPort> = SERVICE_PORTS
): Promise<DeviceService[]> {
  const entries = Array.from(ports.entries())
  const results = await Promise.all(entries.map(([port]) => prober.probe(host, port, timeoutMs)))

  return entries
    .filter((_, i) => results[i])
    .map(([port, known]) => ({
      name: known.name,
      port,
      secure: known.secure,
      protocol: known.protocol
    }))
}
