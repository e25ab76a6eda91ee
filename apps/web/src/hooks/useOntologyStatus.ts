import { useEffect } from 'react';
import { fetchHealth, fetchStats } from '@ontoscope/core';
import { useExplorerStore } from '../store/explorer-store';
import { errorMessage } from '../lib/error-message';

export const STATUS_POLL_MS = 2000;

/**
 * Polls /health until the server answers (it only listens once the ontology
 * is indexed), then loads the header stats once.
 */
export function useOntologyStatus() {
  const setHealth = useExplorerStore((s) => s.setHealth);
  const setStatusError = useExplorerStore((s) => s.setStatusError);
  const setStats = useExplorerStore((s) => s.setStats);

  useEffect(() => {
    let stopped = false;
    let timer: ReturnType<typeof setTimeout> | null = null;

    const poll = async () => {
      try {
        const health = await fetchHealth();
        if (stopped) return;
        setHealth(health);
        const stats = await fetchStats();
        if (!stopped) setStats(stats);
      } catch (err) {
        if (stopped) return;
        setStatusError(errorMessage(err));
        timer = setTimeout(() => void poll(), STATUS_POLL_MS);
      }
    };

    void poll();

    return () => {
      stopped = true;
      if (timer) clearTimeout(timer);
    };
  }, [setHealth, setStatusError, setStats]);
}
