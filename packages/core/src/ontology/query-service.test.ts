import { describe, it, expect } from 'vitest';
import { GraphIndex } from './graph-index';
import {
  QueryService,
  clampDepth,
  clampPage,
  clampPageSize,
  decodeTermId,
  MAX_PAGE_SIZE,
} from './query-service';

const OBO = 'http://purl.obolibrary.org/obo/';
const ALL = `${OBO}HP_0000001`;
const KIDNEY = `${OBO}HP_0000077`;
const CYST = `${OBO}HP_0000107`;
const POLY = `${OBO}HP_0000113`;

const index = GraphIndex.fromDocument({
  graphs: [
    {
      nodes: [
        { id: ALL, lbl: 'All' },
        { id: KIDNEY, lbl: 'Abnormality of the kidney' },
        { id: CYST, lbl: 'Renal cyst', meta: { synonyms: [{ val: 'Kidney cyst' }] } },
        { id: POLY, lbl: 'Polycystic kidney dysplasia' },
      ],
      edges: [
        { sub: KIDNEY, pred: 'is_a', obj: ALL },
        { sub: CYST, pred: 'is_a', obj: KIDNEY },
        { sub: POLY, pred: 'is_a', obj: CYST },
      ],
    },
  ],
});

const service = new QueryService(index);

describe('parameter clamping', () => {
  it('clamps page to at least 1', () => {
    expect(clampPage(0)).toBe(1);
    expect(clampPage(-4)).toBe(1);
    expect(clampPage('3')).toBe(3);
    expect(clampPage('abc')).toBe(1);
    expect(clampPage(undefined)).toBe(1);
  });

  it('clamps page size into range', () => {
    expect(clampPageSize(undefined)).toBe(20);
    expect(clampPageSize('')).toBe(20);
    expect(clampPageSize(0)).toBe(1);
    expect(clampPageSize(500)).toBe(MAX_PAGE_SIZE);
    expect(clampPageSize('7.9')).toBe(7);
  });

  it('clamps depth to 1 through 5', () => {
    expect(clampDepth(undefined)).toBe(2);
    expect(clampDepth(0)).toBe(1);
    expect(clampDepth(9)).toBe(5);
    expect(clampDepth('3')).toBe(3);
    expect(clampDepth(null)).toBe(2);
  });
});

describe('decodeTermId', () => {
  it('decodes percent-encoded ids', () => {
    expect(decodeTermId(encodeURIComponent(KIDNEY))).toBe(KIDNEY);
  });

  it('returns ids without escapes unchanged', () => {
    expect(decodeTermId(KIDNEY)).toBe(KIDNEY);
  });

  it('keeps malformed escapes as given', () => {
    expect(decodeTermId('HP_%E0%A4%A')).toBe('HP_%E0%A4%A');
  });
});

describe('QueryService', () => {
  it('reports stats and health', () => {
    expect(service.getStats()).toEqual({ totalNodes: 4, totalEdges: 3, rootId: ALL });
    expect(service.getHealth()).toEqual({ status: 'healthy', nodesLoaded: 4, edgesLoaded: 3 });
  });

  it('returns an explicit empty page for short queries', () => {
    expect(service.search({ q: ' k ', page: '0', pageSize: '1000' })).toEqual({
      nodes: [],
      total: 0,
      page: 1,
      pageSize: MAX_PAGE_SIZE,
    });
  });

  it('searches with clamped paging', () => {
    const result = service.search({ q: 'kidney', page: 2, pageSize: 1 });
    expect(result.total).toBe(3);
    expect(result.page).toBe(2);
    expect(result.pageSize).toBe(1);
    expect(result.nodes.map((n) => n.label)).toEqual(['Abnormality of the kidney']);
  });

  it('looks up terms by encoded id or short id', () => {
    expect(service.getTerm(encodeURIComponent(CYST))?.label).toBe('Renal cyst');
    expect(service.getTerm('HP_0000107')?.id).toBe(CYST);
    expect(service.getTerm('HP_0000000')).toBeNull();
  });

  it('lists parents and children', () => {
    expect(service.getParents(CYST)?.map((t) => t.id)).toEqual([KIDNEY]);
    expect(service.getChildren(encodeURIComponent(CYST))?.map((t) => t.id)).toEqual([POLY]);
    expect(service.getParents('missing')).toBeNull();
    expect(service.getChildren('missing')).toBeNull();
  });

  it('builds a subgraph with clamped depth', () => {
    const subgraph = service.getSubgraph('HP_0000113', 99);
    expect(subgraph?.nodes.map((n) => [n.shortId, n.level, n.role])).toEqual([
      ['HP_0000113', 0, 'center'],
      ['HP_0000107', 1, 'ancestor'],
      ['HP_0000077', 2, 'plain'],
      ['HP_0000001', 3, 'plain'],
    ]);
    expect(subgraph?.edges).toEqual([
      { from: POLY, to: CYST },
      { from: CYST, to: KIDNEY },
      { from: KIDNEY, to: ALL },
    ]);
  });

  it('defaults the subgraph depth to 2', () => {
    const subgraph = service.getSubgraph(ALL);
    expect(subgraph?.nodes.map((n) => n.level)).toEqual([0, 1, 2]);
  });

  it('returns null for an unknown subgraph center', () => {
    expect(service.getSubgraph('nonexistent', 2)).toBeNull();
  });
});
