import { useState } from 'react';
import { MIN_QUERY_LENGTH, displayLabel, type Term } from '@ontoscope/core';

interface TermSearchBoxProps {
  query: string;
  suggestions: Term[];
  total: number;
  isSearching: boolean;
  onQueryChange: (query: string) => void;
  onSelect: (id: string) => void;
}

export function TermSearchBox({ query, suggestions, total, isSearching, onQueryChange, onSelect }: TermSearchBoxProps) {
  const [isOpen, setIsOpen] = useState(false);
  const [highlighted, setHighlighted] = useState(0);

  const isQueryLongEnough = query.trim().length >= MIN_QUERY_LENGTH;
  const showDropdown = isOpen && isQueryLongEnough;

  const choose = (id: string) => {
    setIsOpen(false);
    onSelect(id);
  };

  const handleKeyDown = (e: React.KeyboardEvent<HTMLInputElement>) => {
    if (e.key === 'ArrowDown') {
      e.preventDefault();
      setIsOpen(true);
      setHighlighted((h) => Math.min(h + 1, suggestions.length - 1));
    } else if (e.key === 'ArrowUp') {
      e.preventDefault();
      setHighlighted((h) => Math.max(h - 1, 0));
    } else if (e.key === 'Enter') {
      e.preventDefault();
      // The list still holds the previous query's matches
      if (isSearching) return;
      const term = suggestions[highlighted] ?? suggestions[0];
      if (term) choose(term.id);
    } else if (e.key === 'Escape') {
      setIsOpen(false);
    }
  };

  return (
    <div className="relative w-full max-w-xl">
      <input
        type="search"
        value={query}
        onChange={(e) => {
          onQueryChange(e.target.value);
          setHighlighted(0);
          setIsOpen(true);
        }}
        onFocus={() => setIsOpen(true)}
        onBlur={() => setIsOpen(false)}
        onKeyDown={handleKeyDown}
        placeholder="Search terms by name, synonym or ID (e.g. HP_0000077)"
        aria-label="Search terms"
        role="combobox"
        aria-expanded={showDropdown}
        aria-controls="term-search-results"
        className="w-full rounded border border-gray-300 px-3 py-2 text-sm focus:border-blue-500 focus:outline-none focus:ring-1 focus:ring-blue-500"
      />
      {isSearching && (
        <span className="absolute right-3 top-2.5 inline-block h-4 w-4 animate-spin rounded-full border-2 border-gray-300 border-t-blue-600" />
      )}
      {showDropdown && (
        <ul
          id="term-search-results"
          role="listbox"
          className="absolute z-40 mt-1 max-h-96 w-full overflow-y-auto rounded-lg border border-gray-200 bg-white py-1 shadow-lg"
        >
          {suggestions.map((term, i) => (
            <li
              key={term.id}
              role="option"
              aria-selected={i === highlighted}
              // mousedown fires before the input's blur closes the list
              onMouseDown={(e) => {
                e.preventDefault();
                choose(term.id);
              }}
              onMouseEnter={() => setHighlighted(i)}
              className={`flex cursor-pointer items-baseline justify-between gap-3 px-3 py-1.5 text-sm ${
                i === highlighted ? 'bg-blue-50 text-blue-900' : 'text-gray-800'
              }`}
            >
              <span className="truncate">{displayLabel(term)}</span>
              <span className="shrink-0 font-mono text-xs text-gray-400">{term.shortId}</span>
            </li>
          ))}
          {suggestions.length === 0 && !isSearching && (
            <li className="px-3 py-1.5 text-sm text-gray-400">No matching terms</li>
          )}
          {total > suggestions.length && (
            <li className="border-t border-gray-100 px-3 py-1 text-xs text-gray-400">
              Showing {suggestions.length} of {total.toLocaleString()} matches
            </li>
          )}
        </ul>
      )}
    </div>
  );
}
