import { create } from 'zustand';
import { persist, createJSONStorage } from 'zustand/middleware';
import { DEFAULT_DEPTH, MAX_DEPTH, clampDepth } from '@ontoscope/core';
import type { HealthStatus, OntologyStats, SearchHits, Term } from '@ontoscope/core';
import { createDebouncedStorage } from './preference-storage';

export const MAX_RECENT_TERMS = 10;

interface ExplorerState {
  // Server status
  isLoaded: boolean;
  termCount: number;
  statusError: string | null;
  stats: OntologyStats | null;

  // Navigation
  selectedTermId: string | null;
  depth: number;
  recentTermIds: string[];

  // Search
  query: string;
  suggestions: Term[];
  suggestionTotal: number;
  isSearching: boolean;
  searchError: string | null;

  setHealth: (health: HealthStatus) => void;
  setStatusError: (error: string | null) => void;
  setStats: (stats: OntologyStats) => void;
  selectTerm: (id: string) => void;
  forgetTerm: (id: string) => void;
  setDepth: (depth: number) => void;
  expandDepth: () => void;
  expandTerm: (id: string) => void;
  setQuery: (query: string) => void;
  setSearching: (isSearching: boolean) => void;
  setSuggestions: (hits: SearchHits) => void;
  setSearchError: (error: string | null) => void;
  clearSearch: () => void;
  reset: () => void;
}

const debouncedStorage = createDebouncedStorage();

function withRecent(recent: string[], id: string): string[] {
  return [id, ...recent.filter((r) => r !== id)].slice(0, MAX_RECENT_TERMS);
}

const initialSearch: Pick<ExplorerState, 'query' | 'suggestions' | 'suggestionTotal' | 'isSearching' | 'searchError'> = {
  query: '',
  suggestions: [],
  suggestionTotal: 0,
  isSearching: false,
  searchError: null,
};

export const useExplorerStore = create<ExplorerState>()(
  persist(
    (set) => ({
      isLoaded: false,
      termCount: 0,
      statusError: null,
      stats: null,
      selectedTermId: null,
      depth: DEFAULT_DEPTH,
      recentTermIds: [],
      ...initialSearch,

      setHealth: (health) => set({ isLoaded: true, termCount: health.nodesLoaded, statusError: null }),
      setStatusError: (error) => set({ statusError: error }),
      setStats: (stats) => set({ stats }),

      selectTerm: (id) =>
        set((state) => ({
          selectedTermId: id,
          recentTermIds: withRecent(state.recentTermIds, id),
        })),

      forgetTerm: (id) => set((state) => ({ recentTermIds: state.recentTermIds.filter((r) => r !== id) })),

      setDepth: (depth) => set({ depth: clampDepth(depth) }),
      expandDepth: () => set((state) => ({ depth: Math.min(state.depth + 1, MAX_DEPTH) })),

      // Double-clicking a node recentres on it one level deeper
      expandTerm: (id) =>
        set((state) => ({
          selectedTermId: id,
          recentTermIds: withRecent(state.recentTermIds, id),
          depth: Math.min(state.depth + 1, MAX_DEPTH),
        })),

      setQuery: (query) => set({ query }),
      setSearching: (isSearching) => set({ isSearching }),
      setSuggestions: (hits) =>
        set({ suggestions: hits.nodes, suggestionTotal: hits.total, isSearching: false, searchError: null }),
      setSearchError: (error) => set({ searchError: error, isSearching: false }),
      clearSearch: () => set(initialSearch),

      reset: () =>
        set({
          selectedTermId: null,
          depth: DEFAULT_DEPTH,
          recentTermIds: [],
          ...initialSearch,
        }),
    }),
    {
      name: 'ontoscope-preferences',
      storage: createJSONStorage(() => debouncedStorage),
      partialize: (state) => ({
        depth: state.depth,
        recentTermIds: state.recentTermIds,
      }),
      merge: (persisted, current) => {
        if (typeof persisted !== 'object' || persisted === null) return current;
        const depth = 'depth' in persisted && typeof persisted.depth === 'number' ? clampDepth(persisted.depth) : current.depth;
        const recentTermIds =
          'recentTermIds' in persisted && Array.isArray(persisted.recentTermIds)
            ? persisted.recentTermIds.filter((id): id is string => typeof id === 'string').slice(0, MAX_RECENT_TERMS)
            : current.recentTermIds;
        return { ...current, depth, recentTermIds };
      },
    },
  ),
);
