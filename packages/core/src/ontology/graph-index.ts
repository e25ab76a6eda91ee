import { parseOntologyDocument } from './loader';
import type {
  LoaderOptions,
  OntologyStats,
  OntologyTables,
  SearchHits,
  Subgraph,
  SubgraphEdge,
  SubgraphTerm,
  Term,
  TermRole,
} from './types';
import { DEFAULT_ROOT_ID } from './types';

export interface GraphIndexOptions {
  /** Default entry point for the visualizer. Need not be the only root. */
  rootId?: string;
}

interface SearchRow {
  term: Term;
  order: number;
  label: string;
  shortId: string;
  synonyms: string[];
}

interface QueueEntry {
  id: string;
  level: number;
  role: TermRole;
}

export const MIN_QUERY_LENGTH = 2;

function freezeTerm(term: Term): Term {
  Object.freeze(term.synonyms);
  Object.freeze(term.xrefs);
  Object.freeze(term.comments);
  Object.freeze(term.parentIds);
  Object.freeze(term.childIds);
  return Object.freeze(term);
}

/**
 * Immutable in-memory index over the ontology: id lookup, lexical search and
 * bounded neighborhood expansion, built once from loader output.
 */
export class GraphIndex {
  readonly rootId: string;
  readonly edgeCount: number;

  private readonly termsById = new Map<string, Term>();
  private readonly idsByShortId = new Map<string, string>();
  private readonly searchRows: SearchRow[] = [];

  static fromTables(tables: OntologyTables, options: GraphIndexOptions = {}): GraphIndex {
    return new GraphIndex(tables, options);
  }

  static fromDocument(raw: unknown, options: LoaderOptions & GraphIndexOptions = {}): GraphIndex {
    return new GraphIndex(parseOntologyDocument(raw, options), options);
  }

  constructor(tables: OntologyTables, options: GraphIndexOptions = {}) {
    this.rootId = options.rootId ?? DEFAULT_ROOT_ID;
    this.edgeCount = tables.edges.length;

    tables.terms.forEach((term, order) => {
      const frozen = freezeTerm(term);
      this.termsById.set(frozen.id, frozen);
      if (!this.idsByShortId.has(frozen.shortId)) {
        this.idsByShortId.set(frozen.shortId, frozen.id);
      }
      this.searchRows.push({
        term: frozen,
        order,
        label: frozen.label.toLowerCase(),
        shortId: frozen.shortId.toLowerCase(),
        synonyms: frozen.synonyms.map((s) => s.toLowerCase()),
      });
    });
  }

  get size(): number {
    return this.termsById.size;
  }

  lookup(id: string): Term | undefined {
    return this.termsById.get(id);
  }

  /** Like `lookup`, but also accepts the short form of an id (e.g. `HP_0000118`). */
  resolve(idOrShortId: string): Term | undefined {
    const direct = this.termsById.get(idOrShortId);
    if (direct) return direct;
    const fullId = this.idsByShortId.get(idOrShortId);
    return fullId === undefined ? undefined : this.termsById.get(fullId);
  }

  parentsOf(id: string): Term[] {
    return this.collect(this.termsById.get(id)?.parentIds ?? []);
  }

  childrenOf(id: string): Term[] {
    return this.collect(this.termsById.get(id)?.childIds ?? []);
  }

  /**
   * Case-insensitive substring match over label, shortId and synonyms.
   * Exact label/shortId matches rank first, then shorter labels, then input
   * order. `total` counts every match; the page is sliced after ranking.
   */
  search(query: string, page: number, pageSize: number): SearchHits {
    const q = query.toLowerCase();
    if (q.length < MIN_QUERY_LENGTH) return { nodes: [], total: 0 };

    const matches: { row: SearchRow; exact: boolean }[] = [];
    for (const row of this.searchRows) {
      if (row.label.includes(q) || row.shortId.includes(q) || row.synonyms.some((s) => s.includes(q))) {
        matches.push({ row, exact: row.label === q || row.shortId === q });
      }
    }

    matches.sort((a, b) => {
      if (a.exact !== b.exact) return a.exact ? -1 : 1;
      const byLength = a.row.term.label.length - b.row.term.label.length;
      return byLength !== 0 ? byLength : a.row.order - b.row.order;
    });

    const start = Math.max(0, (page - 1) * pageSize);
    const end = Math.max(start, page * pageSize);
    return {
      nodes: matches.slice(start, end).map((m) => m.row.term),
      total: matches.length,
    };
  }

  /**
   * Breadth-first expansion from `centerId` along parent and child edges, up
   * to `depth` hops. Each node is kept once, at its first discovery; parents
   * are visited before children. Only direct neighbours of the center get the
   * ancestor/descendant role; everything further out is plain.
   */
  neighborhood(centerId: string, depth: number): Subgraph {
    if (!this.termsById.has(centerId)) return { nodes: [], edges: [] };

    const visited = new Set<string>([centerId]);
    const queue: QueueEntry[] = [{ id: centerId, level: 0, role: 'center' }];
    const nodes: SubgraphTerm[] = [];
    const edges: SubgraphEdge[] = [];
    const edgeKeys = new Set<string>();

    const addEdge = (from: string, to: string) => {
      const key = `${from}\u0000${to}`;
      if (edgeKeys.has(key)) return;
      edgeKeys.add(key);
      edges.push({ from, to });
    };

    const discover = (id: string, level: number, role: TermRole) => {
      if (visited.has(id)) return;
      visited.add(id);
      queue.push({ id, level, role });
    };

    for (let head = 0; head < queue.length; head++) {
      const { id, level, role } = queue[head];
      const term = this.termsById.get(id);
      if (!term) continue;

      nodes.push({ ...term, level, role });
      if (level >= depth) continue;

      const fromCenter = id === centerId;
      for (const parentId of term.parentIds) {
        discover(parentId, level + 1, fromCenter ? 'ancestor' : 'plain');
        addEdge(id, parentId);
      }
      for (const childId of term.childIds) {
        discover(childId, level + 1, fromCenter ? 'descendant' : 'plain');
        addEdge(childId, id);
      }
    }

    return { nodes, edges };
  }

  stats(): OntologyStats {
    return { totalNodes: this.size, totalEdges: this.edgeCount, rootId: this.rootId };
  }

  private collect(ids: readonly string[]): Term[] {
    const terms: Term[] = [];
    for (const id of ids) {
      const term = this.termsById.get(id);
      if (term) terms.push(term);
    }
    return terms;
  }
}
