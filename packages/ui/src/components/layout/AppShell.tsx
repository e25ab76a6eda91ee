import type { ReactNode } from 'react';
import type { OntologyStats } from '@ontoscope/core';
import { Header } from './Header';

interface AppShellProps {
  children: ReactNode;
  stats?: OntologyStats | null;
  onGoHome?: () => void;
}

export function AppShell({ children, stats, onGoHome }: AppShellProps) {
  return (
    <div className="flex h-screen flex-col">
      <Header stats={stats} onGoHome={onGoHome} />
      <main className="flex min-h-0 flex-1">{children}</main>
    </div>
  );
}
