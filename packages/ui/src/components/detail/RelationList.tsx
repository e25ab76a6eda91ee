import { displayLabel, type Term } from '@ontoscope/core';

export const RELATION_LIST_CUTOFF = 50;

interface RelationListProps {
  title: string;
  terms: Term[];
  onSelect: (id: string) => void;
  cutoff?: number;
}

export function RelationList({ title, terms, onSelect, cutoff = RELATION_LIST_CUTOFF }: RelationListProps) {
  const visible = terms.slice(0, cutoff);
  const remaining = terms.length - visible.length;

  return (
    <section aria-label={title}>
      <h3 className="text-xs font-medium uppercase tracking-wide text-gray-500">
        {title} ({terms.length})
      </h3>
      {terms.length === 0 ? (
        <p className="mt-1 text-xs text-gray-400">None</p>
      ) : (
        <ul className="mt-1 space-y-0.5">
          {visible.map((term) => (
            <li key={term.id}>
              <button
                type="button"
                onClick={() => onSelect(term.id)}
                className="w-full truncate rounded px-1 text-left text-sm text-blue-700 hover:bg-blue-50 hover:text-blue-900"
                title={term.id}
              >
                {displayLabel(term)} <span className="font-mono text-xs text-gray-400">{term.shortId}</span>
              </button>
            </li>
          ))}
        </ul>
      )}
      {remaining > 0 && <p className="mt-1 text-xs italic text-gray-400">and {remaining} more</p>}
    </section>
  );
}
