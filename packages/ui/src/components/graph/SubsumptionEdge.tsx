import { memo } from 'react';
import { BaseEdge, getBezierPath, type EdgeProps, type Edge } from '@xyflow/react';

export interface SubsumptionEdgeData {
  /** True when either end is the centre term. */
  touchesCenter: boolean;
  [key: string]: unknown;
}

export type SubsumptionEdgeType = Edge<SubsumptionEdgeData, 'subsumption'>;

export const SUBSUMPTION_EDGE_COLOR = '#636e72';

// Drawn from the parent (source) down to the child (target); the arrow sits on
// the parent end so it reads child is_a parent.
export const SubsumptionEdge = memo(
  ({
    id,
    sourceX,
    sourceY,
    targetX,
    targetY,
    sourcePosition,
    targetPosition,
    data,
    markerStart,
  }: EdgeProps<SubsumptionEdgeType>) => {
    const [edgePath] = getBezierPath({
      sourceX,
      sourceY,
      targetX,
      targetY,
      sourcePosition,
      targetPosition,
    });

    return (
      <BaseEdge
        id={id}
        path={edgePath}
        markerStart={markerStart}
        style={{
          stroke: SUBSUMPTION_EDGE_COLOR,
          strokeWidth: data?.touchesCenter ? 2 : 1.5,
          opacity: data?.touchesCenter ? 0.8 : 0.55,
        }}
      />
    );
  },
);

SubsumptionEdge.displayName = 'SubsumptionEdge';
