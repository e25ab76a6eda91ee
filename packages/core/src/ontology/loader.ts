import { z } from 'zod';
import type { LoadReport, LoaderOptions, OntologyTables, SubgraphEdge, Term } from './types';
import { DEFAULT_ID_PREFIX, IS_A_PREDICATE } from './types';

export class OntologyLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OntologyLoadError';
  }
}

// Node metadata is optional and frequently incomplete; each field degrades on its own.
const textValueSchema = z.object({ val: z.string() });

const nodeMetaSchema = z.object({
  definition: textValueSchema.optional().catch(undefined),
  synonyms: z.array(z.unknown()).optional().catch(undefined),
  xrefs: z.array(z.unknown()).optional().catch(undefined),
  comments: z.array(z.unknown()).optional().catch(undefined),
});

const rawNodeSchema = z.object({
  id: z.string().min(1),
  lbl: z.string().optional().catch(undefined),
  meta: nodeMetaSchema.optional().catch(undefined),
});

const rawEdgeSchema = z.object({
  sub: z.string(),
  pred: z.string(),
  obj: z.string(),
});

const graphSchema = z.object({
  nodes: z.array(z.unknown()),
  edges: z.array(z.unknown()).optional(),
});

// Only the first graph of a multi-graph document is read; the rest are not validated.
const documentSchema = z.union([
  z.object({ graphs: z.array(z.unknown()).min(1) }),
  graphSchema,
]);

type RawGraph = z.infer<typeof graphSchema>;

export function toShortId(id: string, prefix: string = DEFAULT_ID_PREFIX): string {
  return prefix && id.startsWith(prefix) ? id.slice(prefix.length) : id;
}

function collectValues(entries: unknown[] | undefined): string[] {
  if (!entries) return [];
  const values: string[] = [];
  for (const entry of entries) {
    const parsed = textValueSchema.safeParse(entry);
    if (parsed.success) values.push(parsed.data.val);
  }
  return values;
}

function collectStrings(entries: unknown[] | undefined): string[] {
  if (!entries) return [];
  return entries.filter((entry): entry is string => typeof entry === 'string');
}

function selectGraph(raw: unknown): RawGraph {
  const document = documentSchema.safeParse(raw);
  const graph = document.success
    ? graphSchema.safeParse('graphs' in document.data ? document.data.graphs[0] : document.data)
    : document;
  if (!graph.success) {
    throw new OntologyLoadError('Ontology document has no graph with a nodes array', {
      cause: graph.error,
    });
  }
  return graph.data;
}

/**
 * Builds the flat term table and the is_a edge list from an OBO Graphs JSON
 * document. Parent and child lists are filled from the same edge in a single
 * pass, so they are symmetric by construction.
 */
export function parseOntologyDocument(raw: unknown, options: LoaderOptions = {}): OntologyTables {
  const idPrefix = options.idPrefix ?? DEFAULT_ID_PREFIX;
  const graph = selectGraph(raw);

  const report: LoadReport = {
    nodes: 0,
    skippedNodes: 0,
    duplicateNodes: 0,
    isAEdges: 0,
    malformedEdges: 0,
    otherPredicateEdges: 0,
    danglingEdges: 0,
    duplicateEdges: 0,
  };

  const termsById = new Map<string, Term>();
  for (const rawNode of graph.nodes) {
    const parsed = rawNodeSchema.safeParse(rawNode);
    if (!parsed.success) {
      report.skippedNodes++;
      continue;
    }
    const node = parsed.data;
    if (termsById.has(node.id)) {
      report.duplicateNodes++;
      continue;
    }
    termsById.set(node.id, {
      id: node.id,
      shortId: toShortId(node.id, idPrefix),
      label: node.lbl ?? '',
      definition: node.meta?.definition?.val ?? '',
      synonyms: collectValues(node.meta?.synonyms),
      xrefs: collectValues(node.meta?.xrefs),
      comments: collectStrings(node.meta?.comments),
      parentIds: [],
      childIds: [],
    });
  }
  report.nodes = termsById.size;

  const edges: SubgraphEdge[] = [];
  const seenEdges = new Set<string>();
  for (const rawEdge of graph.edges ?? []) {
    const parsed = rawEdgeSchema.safeParse(rawEdge);
    if (!parsed.success) {
      report.malformedEdges++;
      continue;
    }
    const { sub: childId, pred, obj: parentId } = parsed.data;
    if (pred !== IS_A_PREDICATE) {
      report.otherPredicateEdges++;
      continue;
    }

    const child = termsById.get(childId);
    const parent = termsById.get(parentId);
    if (!child || !parent) {
      report.danglingEdges++;
      continue;
    }

    const key = `${childId}\u0000${parentId}`;
    if (seenEdges.has(key)) {
      report.duplicateEdges++;
      continue;
    }
    seenEdges.add(key);

    child.parentIds.push(parentId);
    parent.childIds.push(childId);
    edges.push({ from: childId, to: parentId });
  }
  report.isAEdges = edges.length;

  return { terms: Array.from(termsById.values()), edges, report };
}
