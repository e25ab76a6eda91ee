import { MAX_DEPTH, MIN_DEPTH } from '@ontoscope/core';

interface DepthControlsProps {
  depth: number;
  visibleCount: number;
  onDepthChange: (depth: number) => void;
  onExpand: () => void;
  disabled?: boolean;
}

export function DepthControls({ depth, visibleCount, onDepthChange, onExpand, disabled }: DepthControlsProps) {
  return (
    <div className="flex items-center gap-3 text-sm text-gray-600">
      <label htmlFor="depth-slider" className="whitespace-nowrap">
        Depth: <span className="font-medium text-gray-900">{depth}</span>
      </label>
      <input
        id="depth-slider"
        type="range"
        min={MIN_DEPTH}
        max={MAX_DEPTH}
        step={1}
        value={depth}
        disabled={disabled}
        onChange={(e) => onDepthChange(Number(e.target.value))}
        className="w-28"
      />
      <button
        type="button"
        onClick={onExpand}
        disabled={disabled || depth >= MAX_DEPTH}
        className="rounded border border-gray-300 bg-white px-2 py-0.5 text-xs text-gray-600 hover:bg-gray-100 disabled:cursor-not-allowed disabled:opacity-50"
      >
        Expand
      </button>
      <span className="text-xs text-gray-400">
        {visibleCount} term{visibleCount !== 1 ? 's' : ''} shown
      </span>
    </div>
  );
}
