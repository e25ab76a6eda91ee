export { AppShell } from './components/layout/AppShell';
export { Header } from './components/layout/Header';

export { TermSearchBox } from './components/search/TermSearchBox';
export { TermDetailPanel } from './components/detail/TermDetailPanel';
export { RelationList, RELATION_LIST_CUTOFF } from './components/detail/RelationList';
export { DepthControls } from './components/controls/DepthControls';
export { OntologyLoadingOverlay } from './components/status/OntologyLoadingOverlay';

// Subgraph canvas
export { SubgraphCanvas } from './components/graph/SubgraphCanvas';
export { TermNode } from './components/graph/TermNode';
export type { TermNodeData, TermNodeType } from './components/graph/TermNode';
export { SubsumptionEdge } from './components/graph/SubsumptionEdge';
export type { SubsumptionEdgeData, SubsumptionEdgeType } from './components/graph/SubsumptionEdge';
export { toElkGraph, toFlowElements, estimateNodeWidth } from './components/graph/layout';
export type { LayoutDirection } from './components/graph/layout';
