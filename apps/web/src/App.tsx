import { useCallback } from 'react';
import {
  AppShell,
  DepthControls,
  OntologyLoadingOverlay,
  SubgraphCanvas,
  TermDetailPanel,
  TermSearchBox,
} from '@ontoscope/ui';
import { useExplorerStore } from './store/explorer-store';
import { useOntologyStatus } from './hooks/useOntologyStatus';
import { useTermSearch } from './hooks/useTermSearch';
import { useTermNeighborhood } from './hooks/useTermNeighborhood';
import { useStartingTerm } from './hooks/useStartingTerm';

function idTail(id: string): string {
  return id.slice(id.lastIndexOf('/') + 1) || id;
}

export function App() {
  useOntologyStatus();
  useTermSearch();

  const {
    isLoaded,
    termCount,
    statusError,
    stats,
    selectedTermId,
    depth,
    recentTermIds,
    query,
    suggestions,
    suggestionTotal,
    isSearching,
    searchError,
    selectTerm,
    setDepth,
    expandDepth,
    expandTerm,
    setQuery,
    clearSearch,
  } = useExplorerStore();

  const neighborhood = useTermNeighborhood(selectedTermId, depth);
  useStartingTerm(neighborhood.isMissing);

  const handleSearchSelect = useCallback(
    (id: string) => {
      selectTerm(id);
      clearSearch();
    },
    [selectTerm, clearSearch],
  );

  return (
    <AppShell stats={stats} onGoHome={stats ? () => selectTerm(stats.rootId) : undefined}>
      <OntologyLoadingOverlay isLoaded={isLoaded} termCount={termCount} error={isLoaded ? null : statusError} />

      <aside className="flex w-96 shrink-0 flex-col border-r border-gray-200 bg-white">
        <div className="space-y-2 border-b border-gray-200 p-4">
          <TermSearchBox
            query={query}
            suggestions={suggestions}
            total={suggestionTotal}
            isSearching={isSearching}
            onQueryChange={setQuery}
            onSelect={handleSearchSelect}
          />
          {searchError && <p className="text-xs text-red-600">{searchError}</p>}
          {recentTermIds.length > 1 && (
            <div className="flex flex-wrap gap-1">
              {recentTermIds.slice(1).map((id) => (
                <button
                  key={id}
                  type="button"
                  onClick={() => selectTerm(id)}
                  className="rounded bg-gray-100 px-2 py-0.5 font-mono text-[11px] text-gray-600 hover:bg-gray-200"
                  title={id}
                >
                  {idTail(id)}
                </button>
              ))}
            </div>
          )}
        </div>
        <div className="min-h-0 flex-1 overflow-y-auto">
          <TermDetailPanel
            term={neighborhood.term}
            parents={neighborhood.parents}
            children={neighborhood.children}
            isLoading={neighborhood.isLoadingDetail}
            error={neighborhood.detailError}
            onSelectTerm={selectTerm}
          />
        </div>
      </aside>

      <section className="flex min-w-0 flex-1 flex-col">
        <div className="flex items-center border-b border-gray-200 bg-white px-4 py-2">
          <DepthControls
            depth={depth}
            visibleCount={neighborhood.subgraph?.nodes.length ?? 0}
            onDepthChange={setDepth}
            onExpand={expandDepth}
            disabled={!selectedTermId}
          />
        </div>
        <div className="min-h-0 flex-1">
          <SubgraphCanvas
            subgraph={neighborhood.subgraph}
            isLoading={neighborhood.isLoadingSubgraph}
            error={neighborhood.subgraphError}
            onSelectTerm={selectTerm}
            onExpandTerm={expandTerm}
          />
        </div>
      </section>
    </AppShell>
  );
}
