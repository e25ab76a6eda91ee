import type { OntologyStats } from '@ontoscope/core';

interface HeaderProps {
  stats?: OntologyStats | null;
  onGoHome?: () => void;
}

export function Header({ stats, onGoHome }: HeaderProps) {
  return (
    <header className="flex items-center justify-between border-b border-gray-200 bg-white px-6 py-4">
      <h1 className="text-xl font-semibold text-gray-900">Ontoscope</h1>
      <div className="flex items-center gap-3">
        {stats && (
          <span className="text-xs text-gray-400">
            {stats.totalNodes.toLocaleString()} terms · {stats.totalEdges.toLocaleString()} is_a relations
          </span>
        )}
        {onGoHome && (
          <button
            onClick={onGoHome}
            className="flex items-center gap-1 rounded px-2 py-1.5 text-sm text-gray-400 hover:bg-gray-100 hover:text-gray-600"
            title="Go to the root term"
            aria-label="Root term"
          >
            <svg className="h-4 w-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
              <path
                strokeLinecap="round"
                strokeLinejoin="round"
                strokeWidth={2}
                d="M3 12l9-9 9 9M5 10v10h5v-6h4v6h5V10"
              />
            </svg>
            Root
          </button>
        )}
      </div>
    </header>
  );
}
