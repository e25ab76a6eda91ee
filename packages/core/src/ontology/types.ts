export interface Term {
  id: string;
  shortId: string;
  label: string;
  definition: string;
  synonyms: string[];
  xrefs: string[];
  comments: string[];
  parentIds: string[];
  childIds: string[];
}

/** Directed is_a edge, always oriented child -> parent. */
export interface SubgraphEdge {
  from: string;
  to: string;
}

export type TermRole = 'center' | 'ancestor' | 'descendant' | 'plain';

export interface SubgraphTerm extends Term {
  level: number;
  role: TermRole;
}

export interface Subgraph {
  nodes: SubgraphTerm[];
  edges: SubgraphEdge[];
}

export interface SearchHits {
  nodes: Term[];
  total: number;
}

export interface SearchPage extends SearchHits {
  page: number;
  pageSize: number;
}

export interface OntologyStats {
  totalNodes: number;
  totalEdges: number;
  rootId: string;
}

export interface HealthStatus {
  status: 'healthy';
  nodesLoaded: number;
  edgesLoaded: number;
}

export interface LoadReport {
  nodes: number;
  skippedNodes: number;
  duplicateNodes: number;
  isAEdges: number;
  malformedEdges: number;
  otherPredicateEdges: number;
  danglingEdges: number;
  duplicateEdges: number;
}

export interface OntologyTables {
  terms: Term[];
  edges: SubgraphEdge[];
  report: LoadReport;
}

export interface LoaderOptions {
  /** Stripped from the front of each id to form `shortId`. */
  idPrefix?: string;
}

export const DEFAULT_ID_PREFIX = 'http://purl.obolibrary.org/obo/';
export const DEFAULT_ROOT_ID = 'http://purl.obolibrary.org/obo/HP_0000001';
export const IS_A_PREDICATE = 'is_a';
