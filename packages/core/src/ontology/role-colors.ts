import type { TermRole } from './types';

/** Subgraph node palette, keyed by a node's relation to the selected term. */
export const ROLE_COLORS: Record<TermRole, { name: string; background: string; border: string; text: string }> = {
  center: { name: 'Selected term', background: '#6c5ce7', border: '#5f3dc4', text: '#ffffff' },
  ancestor: { name: 'Parent', background: '#00b894', border: '#00896e', text: '#ffffff' },
  descendant: { name: 'Child', background: '#4a90e2', border: '#3a7bc8', text: '#ffffff' },
  plain: { name: 'Related', background: '#dfe6e9', border: '#b2bec3', text: '#2c3e50' },
};

const MAX_LABEL_LENGTH = 30;

export function formatNodeLabel(label: string): string {
  if (label.length > MAX_LABEL_LENGTH) {
    return `${label.substring(0, MAX_LABEL_LENGTH - 3)}...`;
  }
  return label;
}

/** Label to show for a term, falling back to its short id when unlabeled. */
export function displayLabel(term: { label: string; shortId: string }): string {
  return term.label || term.shortId;
}
