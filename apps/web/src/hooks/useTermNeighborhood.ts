import { useEffect, useState } from 'react';
import { ApiError, fetchChildren, fetchParents, fetchSubgraph, fetchTerm } from '@ontoscope/core';
import type { Subgraph, Term } from '@ontoscope/core';
import { errorMessage } from '../lib/error-message';

interface TermDetail {
  term: Term;
  parents: Term[];
  children: Term[];
}

export interface TermNeighborhood {
  term: Term | null;
  parents: Term[];
  children: Term[];
  isLoadingDetail: boolean;
  detailError: string | null;
  /** The selected id is not in the ontology (the lookup answered 404). */
  isMissing: boolean;
  subgraph: Subgraph | null;
  isLoadingSubgraph: boolean;
  subgraphError: string | null;
}

/**
 * Loads the selected term's detail and its subgraph. The previous result
 * stays on screen until the next one arrives; stale responses are dropped.
 */
export function useTermNeighborhood(termId: string | null, depth: number): TermNeighborhood {
  const [detail, setDetail] = useState<TermDetail | null>(null);
  const [isLoadingDetail, setIsLoadingDetail] = useState(false);
  const [detailError, setDetailError] = useState<string | null>(null);
  const [isMissing, setIsMissing] = useState(false);
  const [subgraph, setSubgraph] = useState<Subgraph | null>(null);
  const [isLoadingSubgraph, setIsLoadingSubgraph] = useState(false);
  const [subgraphError, setSubgraphError] = useState<string | null>(null);

  useEffect(() => {
    setIsMissing(false);
    if (!termId) {
      setDetail(null);
      setDetailError(null);
      return;
    }

    let cancelled = false;
    setIsLoadingDetail(true);
    setDetailError(null);

    Promise.all([fetchTerm(termId), fetchParents(termId), fetchChildren(termId)])
      .then(([term, parents, children]) => {
        if (!cancelled) setDetail({ term, parents, children });
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setDetail(null);
        setDetailError(errorMessage(err));
        setIsMissing(err instanceof ApiError && err.status === 404);
      })
      .finally(() => {
        if (!cancelled) setIsLoadingDetail(false);
      });

    return () => {
      cancelled = true;
    };
  }, [termId]);

  useEffect(() => {
    if (!termId) {
      setSubgraph(null);
      setSubgraphError(null);
      return;
    }

    let cancelled = false;
    setIsLoadingSubgraph(true);
    setSubgraphError(null);

    fetchSubgraph(termId, depth)
      .then((data) => {
        if (!cancelled) setSubgraph(data);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setSubgraph(null);
        setSubgraphError(errorMessage(err));
      })
      .finally(() => {
        if (!cancelled) setIsLoadingSubgraph(false);
      });

    return () => {
      cancelled = true;
    };
  }, [termId, depth]);

  return {
    term: detail?.term ?? null,
    parents: detail?.parents ?? [],
    children: detail?.children ?? [],
    isLoadingDetail,
    detailError,
    isMissing,
    subgraph,
    isLoadingSubgraph,
    subgraphError,
  };
}
