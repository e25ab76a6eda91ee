import { memo } from 'react';
import { Handle, Position, type NodeProps, type Node } from '@xyflow/react';
import { ROLE_COLORS, formatNodeLabel, type TermRole } from '@ontoscope/core';

export interface TermNodeData {
  label: string;
  shortId: string;
  definition: string;
  role: TermRole;
  level: number;
  [key: string]: unknown;
}

export type TermNodeType = Node<TermNodeData, 'term'>;

export const TermNode = memo(({ data, selected }: NodeProps<TermNodeType>) => {
  const { label, shortId, definition, role } = data;
  const colors = ROLE_COLORS[role];
  const text = label || shortId;

  return (
    <>
      <Handle type="target" position={Position.Top} className="!bg-gray-400 !w-1.5 !h-1.5 !border-0" />
      <div
        className={`rounded-lg px-3 py-1.5 shadow-sm transition-shadow hover:shadow-md ${
          role === 'center' ? 'border-[3px] font-bold' : 'border-2'
        } ${selected ? 'ring-2 ring-offset-1 ring-gray-400' : ''}`}
        style={{ backgroundColor: colors.background, borderColor: colors.border, color: colors.text }}
        title={definition ? `${shortId}: ${text}\n\n${definition}` : `${shortId}: ${text}`}
        data-role={role}
      >
        <span className="whitespace-nowrap text-xs">{formatNodeLabel(text)}</span>
      </div>
      <Handle type="source" position={Position.Bottom} className="!bg-gray-400 !w-1.5 !h-1.5 !border-0" />
    </>
  );
});

TermNode.displayName = 'TermNode';
