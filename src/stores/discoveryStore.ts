import { createStore } from 'zustand/vanilla'
import type { NetworkDevice, ScanSummary } from '@/types/discovery'

interface DiscoveryState {
  devices: NetworkDevice[]
  lastScan: ScanSummary | null
  lastError: string | null

  upsertDevice: (device: NetworkDevice) => void
  removeDevice: (id: string) => void
  setScanComplete: (summary: ScanSummary) => void
  setScanError: (message: string) => void
  getReachableDevices: () => NetworkDevice[]
}

export type DiscoveryStore = ReturnType<typeof createDiscoveryStore>

export function createDiscoveryStore() {
  return createStore<DiscoveryState>((set, get) => ({
    devices: [],
    lastScan: null,
    lastError: null,

    upsertDevice: (device) =>
      set((state) => {
        const idx = state.devices.findIndex((d) => d.id === device.id)
        if (idx === -1) return { devices: [...state.devices, device] }
        const updated = [...state.devices]
        updated[idx] = device
        return { devices: updated }
      }),

    removeDevice: (id) =>
      set((state) => ({
        devices: state.devices.filter((d) => d.id !== id)
      })),

    setScanComplete: (summary) => set({ lastScan: summary, lastError: null }),

    setScanError: (message) => set({ lastError: message }),

    getReachableDevices: () => get().devices.filter((d) => d.isReachable)
  }))
}
