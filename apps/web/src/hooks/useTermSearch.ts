import { useEffect } from 'react';
import { MIN_QUERY_LENGTH, searchTerms } from '@ontoscope/core';
import { useExplorerStore } from '../store/explorer-store';
import { errorMessage } from '../lib/error-message';

export const SUGGESTION_LIMIT = 10;
export const SEARCH_DEBOUNCE_MS = 250;

/** Debounced autocomplete for the store's current query. */
export function useTermSearch() {
  const query = useExplorerStore((s) => s.query);
  const setSearching = useExplorerStore((s) => s.setSearching);
  const setSuggestions = useExplorerStore((s) => s.setSuggestions);
  const setSearchError = useExplorerStore((s) => s.setSearchError);

  useEffect(() => {
    const q = query.trim();
    if (q.length < MIN_QUERY_LENGTH) {
      setSuggestions({ nodes: [], total: 0 });
      return;
    }

    let cancelled = false;
    setSearching(true);
    const timer = setTimeout(() => {
      searchTerms(q, 1, SUGGESTION_LIMIT)
        .then((page) => {
          if (!cancelled) setSuggestions(page);
        })
        .catch((err: unknown) => {
          if (!cancelled) setSearchError(errorMessage(err));
        });
    }, SEARCH_DEBOUNCE_MS);

    return () => {
      cancelled = true;
      clearTimeout(timer);
    };
  }, [query, setSearching, setSuggestions, setSearchError]);
}
