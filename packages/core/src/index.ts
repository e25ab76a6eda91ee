export * from './ontology/types';
export { OntologyLoadError, parseOntologyDocument, toShortId } from './ontology/loader';
export { GraphIndex, MIN_QUERY_LENGTH } from './ontology/graph-index';
export type { GraphIndexOptions } from './ontology/graph-index';
export {
  QueryService,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  DEFAULT_DEPTH,
  MIN_DEPTH,
  MAX_DEPTH,
  clampPage,
  clampPageSize,
  clampDepth,
  decodeTermId,
} from './ontology/query-service';
export type { LooseNumber, SearchParams } from './ontology/query-service';
export * from './ontology/api-client';
export { ROLE_COLORS, formatNodeLabel, displayLabel } from './ontology/role-colors';
