import { describe, it, expect, vi, afterEach } from 'vitest';
import { ApiError, fetchSubgraph, fetchTerm, searchTerms, fetchStats, fetchChildren } from './api-client';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('api-client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('encodes term ids into the path', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ id: 'x' }));
    vi.stubGlobal('fetch', fetchMock);

    await fetchTerm('http://purl.obolibrary.org/obo/HP_0000118');
    expect(fetchMock).toHaveBeenCalledWith('/api/node/http%3A%2F%2Fpurl.obolibrary.org%2Fobo%2FHP_0000118');
  });

  it('passes search paging as query parameters', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ nodes: [], total: 0, page: 2, pageSize: 5 }));
    vi.stubGlobal('fetch', fetchMock);

    const page = await searchTerms('renal cyst', 2, 5);
    expect(fetchMock).toHaveBeenCalledWith('/api/search?q=renal+cyst&page=2&pageSize=5');
    expect(page.page).toBe(2);
  });

  it('adds depth only when given', async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(jsonResponse({ nodes: [], edges: [] })));
    vi.stubGlobal('fetch', fetchMock);

    await fetchSubgraph('HP_1');
    await fetchSubgraph('HP_1', 3);
    expect(fetchMock).toHaveBeenNthCalledWith(1, '/api/subgraph/HP_1');
    expect(fetchMock).toHaveBeenNthCalledWith(2, '/api/subgraph/HP_1?depth=3');
  });

  it('surfaces the server detail on errors', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ detail: 'Node not found: HP_404' }, 404)));

    await expect(fetchChildren('HP_404')).rejects.toThrow('Node not found: HP_404');
  });

  it('keeps the status on the error', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ detail: 'Node not found: HP_404' }, 404)));

    const error = await fetchTerm('HP_404').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toHaveProperty('status', 404);
  });

  it('falls back to a status message when the body is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('boom', { status: 502 })));

    await expect(fetchStats()).rejects.toThrow('Failed to fetch ontology stats (502)');
  });
});
