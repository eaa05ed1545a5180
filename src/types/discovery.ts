import type { DriveProtocol } from './drive'

export type DeviceType = 'nas' | 'computer' | 'router' | 'server' | 'unknown'

/** A service a device answered on */
export interface DeviceService {
  name: string
  port: number
  secure: boolean
  protocol?: DriveProtocol
}

/** A reachable endpoint found by a discovery scan */
export interface NetworkDevice {
  id: string            // IPv4 address
  name: string
  type: DeviceType
  ipAddress: string
  hostname?: string
  services: DeviceService[]
  isReachable: boolean
  isStale: boolean
  missedCycles: number
  firstSeen: number
  lastSeen: number
}

/** Summary of one finished scan */
export interface ScanSummary {
  cycle: number
  hostsProbed: number
  devicesFound: number
  startedAt: number
  finishedAt: number
}
