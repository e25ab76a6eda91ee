import { useCallback, useEffect, useState } from 'react';
import {
  ReactFlow,
  MiniMap,
  Controls,
  Background,
  BackgroundVariant,
  useNodesState,
  useEdgesState,
  type Node,
  type NodeMouseHandler,
} from '@xyflow/react';
import '@xyflow/react/dist/style.css';

import { ROLE_COLORS, type Subgraph, type TermRole } from '@ontoscope/core';
import { TermNode } from './TermNode';
import { SubsumptionEdge, SUBSUMPTION_EDGE_COLOR } from './SubsumptionEdge';
import { useElkLayout } from './useElkLayout';
import type { LayoutDirection } from './layout';

interface SubgraphCanvasProps {
  subgraph: Subgraph | null;
  isLoading: boolean;
  error: string | null;
  onSelectTerm: (id: string) => void;
  onExpandTerm: (id: string) => void;
}

const nodeTypes = { term: TermNode };
const edgeTypes = { subsumption: SubsumptionEdge };
const LEGEND_ROLES: TermRole[] = ['center', 'ancestor', 'descendant', 'plain'];

function isTermRole(value: unknown): value is TermRole {
  return value === 'center' || value === 'ancestor' || value === 'descendant' || value === 'plain';
}

function miniMapColor(node: Node): string {
  const role = node.data.role;
  return isTermRole(role) ? ROLE_COLORS[role].background : '#d1d5db';
}

export function SubgraphCanvas({ subgraph, isLoading, error, onSelectTerm, onExpandTerm }: SubgraphCanvasProps) {
  const [direction, setDirection] = useState<LayoutDirection>('TB');
  const [layoutError, setLayoutError] = useState<string | null>(null);

  const { nodes: layoutNodes, edges: layoutEdges, isLayouting, runLayout } = useElkLayout();
  const [nodes, setNodes, onNodesChange] = useNodesState(layoutNodes);
  const [edges, setEdges, onEdgesChange] = useEdgesState(layoutEdges);

  useEffect(() => {
    if (!subgraph) return;
    setLayoutError(null);
    runLayout(subgraph, direction).catch(() => {
      setLayoutError('Layout computation failed');
    });
  }, [subgraph, direction, runLayout]);

  useEffect(() => {
    setNodes(layoutNodes);
    setEdges(layoutEdges);
  }, [layoutNodes, layoutEdges, setNodes, setEdges]);

  const handleNodeClick: NodeMouseHandler = useCallback(
    (_event, node) => {
      onSelectTerm(node.id);
    },
    [onSelectTerm],
  );

  const handleNodeDoubleClick: NodeMouseHandler = useCallback(
    (_event, node) => {
      onExpandTerm(node.id);
    },
    [onExpandTerm],
  );

  const toggleDirection = useCallback(() => {
    setDirection((d) => (d === 'TB' ? 'LR' : 'TB'));
  }, []);

  const shownError = error ?? layoutError;
  if (shownError) {
    return (
      <div className="flex h-full items-center justify-center">
        <div className="text-center">
          <p className="text-sm text-red-600">Failed to load graph</p>
          <p className="mt-1 text-xs text-gray-400">{shownError}</p>
        </div>
      </div>
    );
  }

  if (!subgraph || subgraph.nodes.length === 0) {
    return (
      <div className="flex h-full items-center justify-center">
        {isLoading ? (
          <div className="flex items-center gap-2">
            <span className="inline-block h-5 w-5 animate-spin rounded-full border-2 border-gray-300 border-t-blue-600" />
            <span className="text-sm text-gray-500">Loading subgraph...</span>
          </div>
        ) : (
          <p className="text-sm text-gray-400">Search for a term to explore its neighborhood</p>
        )}
      </div>
    );
  }

  return (
    <div className="flex h-full flex-col">
      <div className="flex items-center gap-2 border-b border-gray-200 bg-gray-50 px-3 py-1.5">
        <button
          type="button"
          onClick={toggleDirection}
          className="rounded border border-gray-300 bg-white px-2 py-0.5 text-xs text-gray-600 hover:bg-gray-100"
          title={`Switch to ${direction === 'TB' ? 'left-to-right' : 'top-to-bottom'} layout`}
        >
          {direction === 'TB' ? 'Layout: Top-Down' : 'Layout: Left-Right'}
        </button>
        {(isLayouting || isLoading) && (
          <span className="flex items-center gap-1 text-xs text-gray-400">
            <span className="inline-block h-3 w-3 animate-spin rounded-full border border-gray-300 border-t-blue-600" />
            {isLoading ? 'Loading...' : 'Computing layout...'}
          </span>
        )}
        <span className="ml-auto text-xs text-gray-400">
          {subgraph.nodes.length} nodes, {subgraph.edges.length} edges
        </span>
      </div>

      <div className="flex-1">
        <ReactFlow
          nodes={nodes}
          edges={edges}
          nodeTypes={nodeTypes}
          edgeTypes={edgeTypes}
          onNodesChange={onNodesChange}
          onEdgesChange={onEdgesChange}
          onNodeClick={handleNodeClick}
          onNodeDoubleClick={handleNodeDoubleClick}
          zoomOnDoubleClick={false}
          fitView
          fitViewOptions={{ padding: 0.2, duration: 400 }}
          minZoom={0.1}
          maxZoom={2}
          proOptions={{ hideAttribution: true }}
        >
          <Background variant={BackgroundVariant.Dots} gap={16} size={1} color="#e5e7eb" />
          <Controls showInteractive={false} />
          <MiniMap nodeColor={miniMapColor} maskColor="rgba(0,0,0,0.1)" className="!bg-gray-50 !border-gray-200" />
        </ReactFlow>
      </div>

      <div className="flex items-center gap-4 border-t border-gray-200 bg-gray-50 px-3 py-1.5 text-xs text-gray-500">
        <div className="flex items-center gap-1.5">
          <svg width="20" height="10" className="shrink-0">
            <line x1="4" y1="5" x2="20" y2="5" stroke={SUBSUMPTION_EDGE_COLOR} strokeWidth="2" />
            <polygon points="6,2 0,5 6,8" fill={SUBSUMPTION_EDGE_COLOR} />
          </svg>
          <span>is_a</span>
        </div>
        {LEGEND_ROLES.map((role) => (
          <div key={role} className="flex items-center gap-1.5">
            <span
              className="inline-block h-3 w-3 rounded border-2"
              style={{ backgroundColor: ROLE_COLORS[role].background, borderColor: ROLE_COLORS[role].border }}
            />
            <span>{ROLE_COLORS[role].name}</span>
          </div>
        ))}
        <span className="ml-auto text-gray-400">Click to select, double-click to expand</span>
      </div>
    </div>
  );
}
