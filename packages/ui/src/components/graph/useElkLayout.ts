import { useCallback, useRef, useState } from 'react';
import type { Node, Edge } from '@xyflow/react';
import type { Subgraph } from '@ontoscope/core';
import type { TermNodeData } from './TermNode';
import type { SubsumptionEdgeData } from './SubsumptionEdge';
import { positionsOf, toElkGraph, toFlowElements, type LayoutDirection } from './layout';

interface LayoutResult {
  nodes: Node<TermNodeData, 'term'>[];
  edges: Edge<SubsumptionEdgeData, 'subsumption'>[];
  isLayouting: boolean;
  runLayout: (subgraph: Subgraph, direction?: LayoutDirection) => Promise<void>;
}

export function useElkLayout(): LayoutResult {
  const [nodes, setNodes] = useState<Node<TermNodeData, 'term'>[]>([]);
  const [edges, setEdges] = useState<Edge<SubsumptionEdgeData, 'subsumption'>[]>([]);
  const [isLayouting, setIsLayouting] = useState(false);
  const latestRunRef = useRef(0);

  const runLayout = useCallback(async (subgraph: Subgraph, direction: LayoutDirection = 'TB') => {
    const run = ++latestRunRef.current;
    setIsLayouting(true);

    try {
      // Dynamic import to code-split elkjs
      const ELK = (await import('elkjs/lib/elk.bundled.js')).default;
      const elk = new ELK();
      const layout = await elk.layout(toElkGraph(subgraph, direction));

      // A newer subgraph was laid out meanwhile
      if (run !== latestRunRef.current) return;

      const flow = toFlowElements(subgraph, positionsOf(layout));
      setNodes(flow.nodes);
      setEdges(flow.edges);
    } finally {
      if (run === latestRunRef.current) setIsLayouting(false);
    }
  }, []);

  return { nodes, edges, isLayouting, runLayout };
}
