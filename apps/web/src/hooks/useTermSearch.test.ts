import { describe, it, expect, vi, beforeEach } from 'vitest';
import { act, renderHook, waitFor } from '@testing-library/react';
import { searchTerms } from '@ontoscope/core';
import type { Term } from '@ontoscope/core';
import { useExplorerStore } from '../store/explorer-store';
import { useTermSearch } from './useTermSearch';

vi.mock('@ontoscope/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@ontoscope/core')>();
  return { ...actual, searchTerms: vi.fn() };
});

const kidney: Term = {
  id: 'http://purl.obolibrary.org/obo/HP_0000077',
  shortId: 'HP_0000077',
  label: 'Abnormality of the kidney',
  definition: '',
  synonyms: [],
  xrefs: [],
  comments: [],
  parentIds: [],
  childIds: [],
};

describe('useTermSearch', () => {
  beforeEach(() => {
    vi.resetAllMocks();
    useExplorerStore.getState().reset();
    vi.mocked(searchTerms).mockResolvedValue({ nodes: [kidney], total: 1, page: 1, pageSize: 10 });
  });

  it('searches once for a burst of typing', async () => {
    renderHook(() => useTermSearch());

    act(() => {
      useExplorerStore.getState().setQuery('ki');
      useExplorerStore.getState().setQuery('kid');
    });

    await waitFor(() => expect(useExplorerStore.getState().suggestions).toEqual([kidney]));
    expect(searchTerms).toHaveBeenCalledTimes(1);
    expect(searchTerms).toHaveBeenCalledWith('kid', 1, 10);
    expect(useExplorerStore.getState().isSearching).toBe(false);
  });

  it('does not search a one-character query', async () => {
    renderHook(() => useTermSearch());
    act(() => {
      useExplorerStore.getState().setQuery('k');
    });

    await new Promise((resolve) => setTimeout(resolve, 300));
    expect(searchTerms).not.toHaveBeenCalled();
    expect(useExplorerStore.getState().suggestions).toEqual([]);
  });

  it('records search failures', async () => {
    vi.mocked(searchTerms).mockRejectedValue(new Error('Term search failed (500)'));
    renderHook(() => useTermSearch());
    act(() => {
      useExplorerStore.getState().setQuery('kidney');
    });

    await waitFor(() => expect(useExplorerStore.getState().searchError).toBe('Term search failed (500)'));
    expect(useExplorerStore.getState().isSearching).toBe(false);
  });
});
