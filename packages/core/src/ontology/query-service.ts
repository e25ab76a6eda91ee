import type { GraphIndex } from './graph-index';
import { MIN_QUERY_LENGTH } from './graph-index';
import type { HealthStatus, OntologyStats, SearchPage, Subgraph, Term } from './types';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
export const DEFAULT_DEPTH = 2;
export const MIN_DEPTH = 1;
export const MAX_DEPTH = 5;

export type LooseNumber = string | number | null | undefined;

export interface SearchParams {
  q: string;
  page?: LooseNumber;
  pageSize?: LooseNumber;
}

function toInteger(value: LooseNumber): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? Math.trunc(n) : null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function clampPage(value: LooseNumber): number {
  return Math.max(1, toInteger(value) ?? 1);
}

export function clampPageSize(value: LooseNumber): number {
  return clamp(toInteger(value) ?? DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE);
}

export function clampDepth(value: LooseNumber): number {
  return clamp(toInteger(value) ?? DEFAULT_DEPTH, MIN_DEPTH, MAX_DEPTH);
}

/**
 * Percent-decodes an id taken from a URL path. Ids that are not valid
 * percent-encoding are returned as given.
 */
export function decodeTermId(raw: string): string {
  if (!raw.includes('%')) return raw;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Request-facing facade over a GraphIndex: normalizes parameters, resolves
 * ids and shapes responses. Unknown ids come back as `null`.
 */
export class QueryService {
  constructor(private readonly index: GraphIndex) {}

  getStats(): OntologyStats {
    return this.index.stats();
  }

  getHealth(): HealthStatus {
    return { status: 'healthy', nodesLoaded: this.index.size, edgesLoaded: this.index.edgeCount };
  }

  search({ q, page, pageSize }: SearchParams): SearchPage {
    const query = q.trim();
    const safePage = clampPage(page);
    const safePageSize = clampPageSize(pageSize);

    if (query.length < MIN_QUERY_LENGTH) {
      return { nodes: [], total: 0, page: safePage, pageSize: safePageSize };
    }

    const hits = this.index.search(query, safePage, safePageSize);
    return { ...hits, page: safePage, pageSize: safePageSize };
  }

  getTerm(rawId: string): Term | null {
    return this.index.resolve(decodeTermId(rawId)) ?? null;
  }

  getParents(rawId: string): Term[] | null {
    const term = this.getTerm(rawId);
    return term ? this.index.parentsOf(term.id) : null;
  }

  getChildren(rawId: string): Term[] | null {
    const term = this.getTerm(rawId);
    return term ? this.index.childrenOf(term.id) : null;
  }

  getSubgraph(rawId: string, depth?: LooseNumber): Subgraph | null {
    const term = this.getTerm(rawId);
    return term ? this.index.neighborhood(term.id, clampDepth(depth)) : null;
  }
}
