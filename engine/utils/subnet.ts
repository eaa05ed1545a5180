import { isIPv4 } from 'net'
import type { NetworkInterfaceInfo } from 'os'

/** Shape returned by os.networkInterfaces() */
export type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>

/** Non-internal IPv4 addresses of this machine */
export function localIpv4Addresses(interfaces: InterfaceTable): string[] {
  const ips: string[] = []

  for (const networkInterface of Object.values(interfaces)) {
    if (!networkInterface) continue
    for (const address of networkInterface) {
      if (address.family === 'IPv4' && !address.internal) {
        ips.push(address.address)
      }
    }
  }

  return ips
}

/** '192.168.1.23' → '192.168.1' (local networks are assumed to be /24) */
export function subnetPrefix(ip: string): string | null {
  if (!isIPv4(ip)) return null
  return ip.split('.').slice(0, 3).join('.')
}

/** Accepts '10.0.4' or '10.0.4.0/24' */
export function parsePrefix(value: string): string | null {
  const trimmed = value.trim().replace(/\.0\/24$/, '').replace(/\/24$/, '')
  const parts = trimmed.split('.')
  if (parts.length !== 3) return null
  return isIPv4(`${trimmed}.1`) ? trimmed : null
}

/** Host addresses .1 – .254 of a /24 prefix */
export function expandSubnet(prefix: string): string[] {
  const hosts: string[] = []
  for (let i = 1; i < 255; i++) {
    hosts.push(`${prefix}.${i}`)
  }
  return hosts
}

export interface CandidateOptions {
  interfaces: InterfaceTable
  subnets?: readonly string[]
  extraHosts?: readonly string[]
}

export interface CandidateHosts {
  hosts: string[]
  localAddresses: string[]
  prefixes: string[]
}

/**
 * Every address a scan should probe: the /24 of each local interface plus
 * configured prefixes and single hosts, without this machine's own addresses.
 */
export function candidateHosts(options: CandidateOptions): CandidateHosts {
  const localAddresses = localIpv4Addresses(options.interfaces)
  const prefixes = new Set<string>()

  for (const ip of localAddresses) {
    const prefix = subnetPrefix(ip)
    if (prefix) prefixes.add(prefix)
  }
  for (const value of options.subnets ?? []) {
    const prefix = parsePrefix(value)
    if (prefix) prefixes.add(prefix)
  }

  const own = new Set(localAddresses)
  const hosts = new Set<string>()
  for (const prefix of prefixes) {
    for (const host of expandSubnet(prefix)) {
      if (!own.has(host)) hosts.add(host)
    }
  }
  for (const host of options.extraHosts ?? []) {
    const trimmed = host.trim()
    if (trimmed && !own.has(trimmed)) hosts.add(trimmed)
  }

  return { hosts: Array.from(hosts), localAddresses, prefixes: Array.from(prefixes) }
}
