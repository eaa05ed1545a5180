import { createStore } from 'zustand/vanilla'
import type { LogEntry, LogLevel, LogSource } from '@/types/log'

interface LogFilters {
  levels: Set<LogLevel>
  sources: Set<LogSource>
  searchQuery: string
}

interface LogState {
  /** Log entries keyed by scope (drive id, 'discovery', 'engine') */
  entries: Map<string, LogEntry[]>
  /** Active filters */
  filters: LogFilters

  /** Add a log entry for a scope, capping at maxEntries per scope */
  addEntry: (scope: string, entry: LogEntry) => void
  /** Clear all entries for a scope */
  clearEntries: (scope: string) => void
  /** Partially update filters */
  setFilters: (filters: Partial<LogFilters>) => void
  /** Toggle a specific log level in the filter */
  toggleLevel: (level: LogLevel) => void
  /** Toggle a specific log source in the filter */
  toggleSource: (source: LogSource) => void
  /** Set the search query filter */
  setSearchQuery: (query: string) => void
  /** Get entries for a scope filtered by current filters */
  getFilteredEntries: (scope: string) => LogEntry[]
}

const ALL_LEVELS: LogLevel[] = ['info', 'warning', 'error', 'success', 'debug']
const ALL_SOURCES: LogSource[] = ['discovery', 'drive', 'transfer', 'connector', 'sync', 'system']

export type LogStore = ReturnType<typeof createLogStore>

export function createLogStore(maxEntries: number = 5000) {
  return createStore<LogState>((set, get) => ({
    entries: new Map(),
    filters: {
      levels: new Set<LogLevel>(ALL_LEVELS),
      sources: new Set<LogSource>(ALL_SOURCES),
      searchQuery: ''
    },

    addEntry: (scope, entry) =>
      set((state) => {
        const newMap = new Map(state.entries)
        const existing = newMap.get(scope) || []
        const updated = [...existing, entry]

        // FIFO, oldest first
        if (updated.length > maxEntries) {
          updated.splice(0, updated.length - maxEntries)
        }

        newMap.set(scope, updated)
        return { entries: newMap }
      }),

    clearEntries: (scope) =>
      set((state) => {
        const newMap = new Map(state.entries)
        newMap.delete(scope)
        return { entries: newMap }
      }),

    setFilters: (partial) =>
      set((state) => ({
        filters: { ...state.filters, ...partial }
      })),

    toggleLevel: (level) =>
      set((state) => {
        const newLevels = new Set(state.filters.levels)
        if (newLevels.has(level)) {
          newLevels.delete(level)
        } else {
          newLevels.add(level)
        }
        return { filters: { ...state.filters, levels: newLevels } }
      }),

    toggleSource: (source) =>
      set((state) => {
        const newSources = new Set(state.filters.sources)
        if (newSources.has(source)) {
          newSources.delete(source)
        } else {
          newSources.add(source)
        }
        return { filters: { ...state.filters, sources: newSources } }
      }),

    setSearchQuery: (query) =>
      set((state) => ({
        filters: { ...state.filters, searchQuery: query }
      })),

    getFilteredEntries: (scope) => {
      const state = get()
      const entries = state.entries.get(scope) || []
      const { levels, sources, searchQuery } = state.filters
      const lowerQuery = searchQuery.toLowerCase()

      return entries.filter((entry) => {
        if (!levels.has(entry.level)) return false
        if (!sources.has(entry.source)) return false
        if (lowerQuery && !entry.message.toLowerCase().includes(lowerQuery)) {
          // Also search in details
          if (!entry.details || !entry.details.toLowerCase().includes(lowerQuery)) {
            return false
          }
        }
        return true
      })
    }
  }))
}
