import { MarkerType, type Edge, type Node } from '@xyflow/react';
import type { ElkNode } from 'elkjs/lib/elk-api';
import { formatNodeLabel, type Subgraph, type SubgraphEdge } from '@ontoscope/core';
import type { TermNodeData } from './TermNode';
import { SUBSUMPTION_EDGE_COLOR, type SubsumptionEdgeData } from './SubsumptionEdge';

export type LayoutDirection = 'TB' | 'LR';

export interface Point {
  x: number;
  y: number;
}

// Estimated node dimensions for ELK (refined by React Flow once measured)
const NODE_MIN_WIDTH = 120;
const NODE_HEIGHT = 36;

export function estimateNodeWidth(label: string): number {
  return Math.max(NODE_MIN_WIDTH, Math.round(formatNodeLabel(label).length * 7.5 + 32));
}

export function edgeId(edge: SubgraphEdge): string {
  return `${edge.from}->${edge.to}`;
}

/**
 * ELK input for a subgraph. Edges run parent -> child here so the layered
 * layout puts ancestors above the centre term.
 */
export function toElkGraph(subgraph: Subgraph, direction: LayoutDirection = 'TB'): ElkNode {
  return {
    id: 'root',
    layoutOptions: {
      'elk.algorithm': 'layered',
      'elk.direction': direction === 'TB' ? 'DOWN' : 'RIGHT',
      'elk.spacing.nodeNode': '40',
      'elk.layered.spacing.nodeNodeBetweenLayers': '70',
      'elk.layered.crossingMinimization.strategy': 'LAYER_SWEEP',
      'elk.layered.nodePlacement.strategy': 'BRANDES_KOEPF',
    },
    children: subgraph.nodes.map((n) => ({
      id: n.id,
      width: estimateNodeWidth(n.label || n.shortId),
      height: NODE_HEIGHT,
    })),
    edges: subgraph.edges.map((e) => ({
      id: edgeId(e),
      sources: [e.to],
      targets: [e.from],
    })),
  };
}

export function toFlowElements(
  subgraph: Subgraph,
  positions: ReadonlyMap<string, Point>,
): { nodes: Node<TermNodeData, 'term'>[]; edges: Edge<SubsumptionEdgeData, 'subsumption'>[] } {
  const centerId = subgraph.nodes.find((n) => n.role === 'center')?.id;

  const nodes: Node<TermNodeData, 'term'>[] = subgraph.nodes.map((n) => ({
    id: n.id,
    type: 'term',
    position: positions.get(n.id) ?? { x: 0, y: 0 },
    data: {
      label: n.label,
      shortId: n.shortId,
      definition: n.definition,
      role: n.role,
      level: n.level,
    },
  }));

  const edges: Edge<SubsumptionEdgeData, 'subsumption'>[] = subgraph.edges.map((e) => ({
    id: edgeId(e),
    source: e.to,
    target: e.from,
    type: 'subsumption',
    markerStart: { type: MarkerType.ArrowClosed, color: SUBSUMPTION_EDGE_COLOR },
    data: { touchesCenter: e.from === centerId || e.to === centerId },
  }));

  return { nodes, edges };
}

export function positionsOf(layout: ElkNode): Map<string, Point> {
  return new Map((layout.children ?? []).map((child) => [child.id, { x: child.x ?? 0, y: child.y ?? 0 }]));
}
