import { useEffect, useRef } from 'react';
import { useExplorerStore } from '../store/explorer-store';

/**
 * Opens on the last viewed term, or the ontology root. A remembered term that
 * is no longer in the ontology is dropped from the recent list and replaced
 * by the root.
 */
export function useStartingTerm(isMissing: boolean) {
  const stats = useExplorerStore((s) => s.stats);
  const selectedTermId = useExplorerStore((s) => s.selectedTermId);
  const recentTermIds = useExplorerStore((s) => s.recentTermIds);
  const selectTerm = useExplorerStore((s) => s.selectTerm);
  const forgetTerm = useExplorerStore((s) => s.forgetTerm);
  const restoredIdRef = useRef<string | null>(null);

  useEffect(() => {
    if (!stats || selectedTermId) return;
    const startId = recentTermIds[0] ?? stats.rootId;
    restoredIdRef.current = startId;
    selectTerm(startId);
  }, [stats, selectedTermId, recentTermIds, selectTerm]);

  useEffect(() => {
    if (!stats || !isMissing || !selectedTermId || selectedTermId !== restoredIdRef.current) return;
    restoredIdRef.current = null;
    forgetTerm(selectedTermId);
    if (selectedTermId !== stats.rootId) selectTerm(stats.rootId);
  }, [stats, isMissing, selectedTermId, selectTerm, forgetTerm]);
}
