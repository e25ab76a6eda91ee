import { displayLabel, type Term } from '@ontoscope/core';
import { RelationList } from './RelationList';

interface TermDetailPanelProps {
  term: Term | null;
  parents: Term[];
  children: Term[];
  isLoading: boolean;
  error: string | null;
  onSelectTerm: (id: string) => void;
}

export function TermDetailPanel({ term, parents, children, isLoading, error, onSelectTerm }: TermDetailPanelProps) {
  if (error) {
    return (
      <div className="p-4">
        <p className="text-sm text-red-600">{error}</p>
      </div>
    );
  }

  if (!term) {
    return (
      <div className="flex h-full items-center justify-center p-4">
        {isLoading ? (
          <span className="inline-block h-5 w-5 animate-spin rounded-full border-2 border-gray-300 border-t-blue-600" />
        ) : (
          <p className="text-sm text-gray-400">No term selected</p>
        )}
      </div>
    );
  }

  return (
    <div className={`space-y-4 overflow-y-auto p-4 ${isLoading ? 'opacity-60' : ''}`}>
      <div>
        <p className="font-mono text-xs text-gray-400">{term.shortId}</p>
        <h2 className="text-lg font-semibold text-gray-900">{displayLabel(term)}</h2>
        <a
          href={term.id}
          target="_blank"
          rel="noreferrer"
          className="break-all text-xs text-blue-600 hover:text-blue-800"
        >
          {term.id}
        </a>
      </div>

      <div>
        <h3 className="text-xs font-medium uppercase tracking-wide text-gray-500">Definition</h3>
        {term.definition ? (
          <p className="mt-1 text-sm leading-relaxed text-gray-700">{term.definition}</p>
        ) : (
          <p className="mt-1 text-xs text-gray-400">No definition</p>
        )}
      </div>

      {term.synonyms.length > 0 && (
        <div>
          <h3 className="text-xs font-medium uppercase tracking-wide text-gray-500">Synonyms</h3>
          <div className="mt-1 flex flex-wrap gap-1">
            {term.synonyms.map((synonym, i) => (
              <span key={`${i}:${synonym}`} className="rounded bg-gray-100 px-2 py-0.5 text-xs text-gray-700">
                {synonym}
              </span>
            ))}
          </div>
        </div>
      )}

      {term.xrefs.length > 0 && (
        <div>
          <h3 className="text-xs font-medium uppercase tracking-wide text-gray-500">Cross-references</h3>
          <p className="mt-1 font-mono text-xs text-gray-600">{term.xrefs.join(', ')}</p>
        </div>
      )}

      {term.comments.map((comment, i) => (
        <p key={`${i}:${comment}`} className="border-l-2 border-gray-200 pl-2 text-xs italic text-gray-500">
          {comment}
        </p>
      ))}

      <RelationList title="Parents" terms={parents} onSelect={onSelectTerm} />
      <RelationList title="Children" terms={children} onSelect={onSelectTerm} />
    </div>
  );
}
