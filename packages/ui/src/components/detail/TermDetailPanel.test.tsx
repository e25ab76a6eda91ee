import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent, within } from '@testing-library/react';
import type { Term } from '@ontoscope/core';
import { TermDetailPanel } from './TermDetailPanel';

function term(n: number, overrides: Partial<Term> = {}): Term {
  const shortId = `HP_${String(n).padStart(7, '0')}`;
  return {
    id: `http://purl.obolibrary.org/obo/${shortId}`,
    shortId,
    label: `Term ${n}`,
    definition: '',
    synonyms: [],
    xrefs: [],
    comments: [],
    parentIds: [],
    childIds: [],
    ...overrides,
  };
}

const kidney = term(77, {
  label: 'Abnormality of the kidney',
  definition: 'An abnormality of the kidney.',
  synonyms: ['Renal anomaly', 'Kidney anomaly'],
  xrefs: ['UMLS:C0595922'],
});

describe('TermDetailPanel', () => {
  it('shows the term fields', () => {
    render(
      <TermDetailPanel term={kidney} parents={[]} children={[]} isLoading={false} error={null} onSelectTerm={vi.fn()} />,
    );
    expect(screen.getByRole('heading', { name: 'Abnormality of the kidney' })).toBeInTheDocument();
    expect(screen.getByText('HP_0000077')).toBeInTheDocument();
    expect(screen.getByText('An abnormality of the kidney.')).toBeInTheDocument();
    expect(screen.getByText('Renal anomaly')).toBeInTheDocument();
    expect(screen.getByText('UMLS:C0595922')).toBeInTheDocument();
  });

  it('keeps repeated synonyms and comments', () => {
    const repeated = term(9, {
      synonyms: ['Renal anomaly', 'Renal anomaly'],
      comments: ['Seen in adults.', 'Seen in adults.'],
    });
    render(
      <TermDetailPanel term={repeated} parents={[]} children={[]} isLoading={false} error={null} onSelectTerm={vi.fn()} />,
    );
    expect(screen.getAllByText('Renal anomaly')).toHaveLength(2);
    expect(screen.getAllByText('Seen in adults.')).toHaveLength(2);
  });

  it('falls back to the short id for an unlabeled term', () => {
    render(
      <TermDetailPanel
        term={term(5, { label: '' })}
        parents={[]}
        children={[]}
        isLoading={false}
        error={null}
        onSelectTerm={vi.fn()}
      />,
    );
    expect(screen.getByRole('heading', { name: 'HP_0000005' })).toBeInTheDocument();
    expect(screen.getByText('No definition')).toBeInTheDocument();
  });

  it('selects a parent when clicked', () => {
    const onSelectTerm = vi.fn();
    render(
      <TermDetailPanel
        term={kidney}
        parents={[term(118, { label: 'Phenotypic abnormality' })]}
        children={[]}
        isLoading={false}
        error={null}
        onSelectTerm={onSelectTerm}
      />,
    );
    fireEvent.click(screen.getByRole('button', { name: /Phenotypic abnormality/ }));
    expect(onSelectTerm).toHaveBeenCalledWith('http://purl.obolibrary.org/obo/HP_0000118');
  });

  it('caps the children list at 50', () => {
    const children = Array.from({ length: 53 }, (_, i) => term(1000 + i));
    render(
      <TermDetailPanel term={kidney} parents={[]} children={children} isLoading={false} error={null} onSelectTerm={vi.fn()} />,
    );
    const section = screen.getByRole('region', { name: 'Children' });
    expect(within(section).getAllByRole('button')).toHaveLength(50);
    expect(within(section).getByText('Children (53)')).toBeInTheDocument();
    expect(within(section).getByText('and 3 more')).toBeInTheDocument();
  });

  it('shows an error instead of the term', () => {
    render(
      <TermDetailPanel term={null} parents={[]} children={[]} isLoading={false} error="Node not found: HP_0000404" onSelectTerm={vi.fn()} />,
    );
    expect(screen.getByText('Node not found: HP_0000404')).toBeInTheDocument();
  });

  it('prompts for a selection when empty', () => {
    render(
      <TermDetailPanel term={null} parents={[]} children={[]} isLoading={false} error={null} onSelectTerm={vi.fn()} />,
    );
    expect(screen.getByText('No term selected')).toBeInTheDocument();
  });
});
