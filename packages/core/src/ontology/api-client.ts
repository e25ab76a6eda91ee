import type { HealthStatus, OntologyStats, SearchPage, Subgraph, Term } from './types';

const BASE_URL = '/api';

/** Non-2xx answer from the API, with the server's `detail` as message. */
export class ApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

async function readError(res: Response, fallback: string): Promise<ApiError> {
  const err: unknown = await res.json().catch(() => null);
  const detail =
    err !== null && typeof err === 'object' && 'detail' in err && typeof err.detail === 'string'
      ? err.detail
      : null;
  return new ApiError(detail || `${fallback} (${res.status})`, res.status);
}

export async function fetchStats(): Promise<OntologyStats> {
  const res = await fetch(`${BASE_URL}/stats`);

  if (!res.ok) {
    throw await readError(res, 'Failed to fetch ontology stats');
  }

  return res.json();
}

export async function fetchHealth(): Promise<HealthStatus> {
  const res = await fetch('/health');

  if (!res.ok) {
    throw await readError(res, 'Health check failed');
  }

  return res.json();
}

export async function searchTerms(q: string, page = 1, pageSize = 20): Promise<SearchPage> {
  const params = new URLSearchParams({ q, page: String(page), pageSize: String(pageSize) });
  const res = await fetch(`${BASE_URL}/search?${params.toString()}`);

  if (!res.ok) {
    throw await readError(res, 'Term search failed');
  }

  return res.json();
}

export async function fetchTerm(id: string): Promise<Term> {
  const res = await fetch(`${BASE_URL}/node/${encodeURIComponent(id)}`);

  if (!res.ok) {
    throw await readError(res, 'Term lookup failed');
  }

  return res.json();
}

export async function fetchParents(id: string): Promise<Term[]> {
  const res = await fetch(`${BASE_URL}/node/${encodeURIComponent(id)}/parents`);

  if (!res.ok) {
    throw await readError(res, 'Parent lookup failed');
  }

  return res.json();
}

export async function fetchChildren(id: string): Promise<Term[]> {
  const res = await fetch(`${BASE_URL}/node/${encodeURIComponent(id)}/children`);

  if (!res.ok) {
    throw await readError(res, 'Child lookup failed');
  }

  return res.json();
}

export async function fetchSubgraph(id: string, depth?: number): Promise<Subgraph> {
  const qs = depth != null ? `?depth=${depth}` : '';
  const res = await fetch(`${BASE_URL}/subgraph/${encodeURIComponent(id)}${qs}`);

  if (!res.ok) {
    throw await readError(res, 'Subgraph fetch failed');
  }

  return res.json();
}
