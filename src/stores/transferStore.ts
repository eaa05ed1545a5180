import { createStore } from 'zustand/vanilla'
import type { TransferEvent, TransferItem } from '@/types/transfer'
import { isFinished } from '@/types/transfer'

export interface TransferState {
  transfers: TransferItem[]
  setTransfers: (items: TransferItem[]) => void
  updateTransfer: (item: TransferItem) => void
  removeTransfer: (id: string) => void
  /** Fold one queue event into the list */
  applyEvent: (event: TransferEvent) => void
  /** Drop finished items from the view; the queues keep their own history */
  clearCompleted: () => void
}

export type TransferStore = ReturnType<typeof createTransferStore>

export function createTransferStore() {
  return createStore<TransferState>((set, get) => ({
    transfers: [],

    setTransfers: (items) => set({ transfers: items }),

    updateTransfer: (item) =>
      set((state) => {
        const idx = state.transfers.findIndex((t) => t.id === item.id)
        if (idx === -1) {
          return { transfers: [...state.transfers, item] }
        }
        const updated = [...state.transfers]
        updated[idx] = item
        return { transfers: updated }
      }),

    removeTransfer: (id) =>
      set((state) => ({
        transfers: state.transfers.filter((t) => t.id !== id)
      })),

    applyEvent: (event) => {
      if (event.type === 'removed') {
        get().removeTransfer(event.itemId)
      } else {
        get().updateTransfer(event.item)
      }
    },

    clearCompleted: () =>
      set((state) => ({
        transfers: state.transfers.filter((t) => !isFinished(t))
      }))
  }))
}
