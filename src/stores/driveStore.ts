import { createStore } from 'zustand/vanilla'
import type { DriveEvent, SyncReport, VirtualDrive } from '@/types/drive'

interface DriveState {
  drives: VirtualDrive[]
  /** Last sync report per drive */
  syncReports: Map<string, SyncReport>

  upsertDrive: (drive: VirtualDrive) => void
  removeDrive: (id: string) => void
  applyEvent: (event: DriveEvent) => void
  getOnlineDrives: () => VirtualDrive[]
}

export type DriveStore = ReturnType<typeof createDriveStore>

export function createDriveStore() {
  return createStore<DriveState>((set, get) => ({
    drives: [],
    syncReports: new Map(),

    upsertDrive: (drive) =>
      set((state) => {
        const idx = state.drives.findIndex((d) => d.id === drive.id)
        if (idx === -1) return { drives: [...state.drives, drive] }
        const updated = [...state.drives]
        updated[idx] = drive
        return { drives: updated }
      }),

    removeDrive: (id) =>
      set((state) => {
        const reports = new Map(state.syncReports)
        reports.delete(id)
        return { drives: state.drives.filter((d) => d.id !== id), syncReports: reports }
      }),

    applyEvent: (event) => {
      if (event.type === 'removed') {
        get().removeDrive(event.driveId)
        return
      }
      get().upsertDrive(event.drive)
      if (event.type === 'synced') {
        set((state) => {
          const reports = new Map(state.syncReports)
          reports.set(event.driveId, event.report)
          return { syncReports: reports }
        })
      }
    },

    getOnlineDrives: () => get().drives.filter((d) => d.isOnline)
  }))
}
