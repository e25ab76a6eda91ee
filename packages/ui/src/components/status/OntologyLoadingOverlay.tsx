interface OntologyLoadingOverlayProps {
  isLoaded: boolean;
  termCount: number;
  error: string | null;
}

export function OntologyLoadingOverlay({ isLoaded, termCount, error }: OntologyLoadingOverlayProps) {
  if (isLoaded && !error) return null;

  const message = error ? `Error connecting to the ontology server: ${error}` : 'Loading ontology...';
  const subMessage = error
    ? 'Retrying automatically'
    : 'Large ontologies can take several seconds to index';

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-white/80">
      <div className="text-center">
        {!error && (
          <div className="mx-auto mb-4 h-8 w-8 animate-spin rounded-full border-2 border-gray-300 border-t-blue-600" />
        )}
        <p className="text-sm font-medium text-gray-900">{message}</p>
        <p className="mt-1 text-xs text-gray-500">{subMessage}</p>
        {termCount > 0 && (
          <p className="mt-1 text-xs text-gray-400">{termCount.toLocaleString()} terms loaded</p>
        )}
      </div>
    </div>
  );
}
