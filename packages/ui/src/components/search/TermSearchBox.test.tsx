import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import type { Term } from '@ontoscope/core';
import { TermSearchBox } from './TermSearchBox';

function term(id: string, label: string): Term {
  return {
    id: `http://purl.obolibrary.org/obo/${id}`,
    shortId: id,
    label,
    definition: '',
    synonyms: [],
    xrefs: [],
    comments: [],
    parentIds: [],
    childIds: [],
  };
}

const suggestions = [term('HP_0000077', 'Abnormality of the kidney'), term('HP_0012211', 'Abnormal renal physiology')];

function renderBox(overrides: Partial<React.ComponentProps<typeof TermSearchBox>> = {}) {
  const props = {
    query: 'kidney',
    suggestions,
    total: 2,
    isSearching: false,
    onQueryChange: vi.fn(),
    onSelect: vi.fn(),
    ...overrides,
  };
  render(<TermSearchBox {...props} />);
  return props;
}

describe('TermSearchBox', () => {
  it('shows suggestions with short ids once focused', () => {
    renderBox();
    fireEvent.focus(screen.getByLabelText('Search terms'));
    expect(screen.getByText('Abnormality of the kidney')).toBeInTheDocument();
    expect(screen.getByText('HP_0012211')).toBeInTheDocument();
  });

  it('hides suggestions for a one-character query', () => {
    renderBox({ query: 'k' });
    fireEvent.focus(screen.getByLabelText('Search terms'));
    expect(screen.queryByRole('listbox')).not.toBeInTheDocument();
  });

  it('reports typing', () => {
    const props = renderBox();
    fireEvent.change(screen.getByLabelText('Search terms'), { target: { value: 'renal' } });
    expect(props.onQueryChange).toHaveBeenCalledWith('renal');
  });

  it('selects the top match on Enter', () => {
    const props = renderBox();
    fireEvent.keyDown(screen.getByLabelText('Search terms'), { key: 'Enter' });
    expect(props.onSelect).toHaveBeenCalledWith('http://purl.obolibrary.org/obo/HP_0000077');
  });

  it('ignores Enter while a search is pending', () => {
    const props = renderBox({ isSearching: true });
    fireEvent.keyDown(screen.getByLabelText('Search terms'), { key: 'Enter' });
    expect(props.onSelect).not.toHaveBeenCalled();
  });

  it('moves the highlight with the arrow keys', () => {
    const props = renderBox();
    const input = screen.getByLabelText('Search terms');
    fireEvent.keyDown(input, { key: 'ArrowDown' });
    fireEvent.keyDown(input, { key: 'Enter' });
    expect(props.onSelect).toHaveBeenCalledWith('http://purl.obolibrary.org/obo/HP_0012211');
  });

  it('selects a clicked suggestion', () => {
    const props = renderBox();
    fireEvent.focus(screen.getByLabelText('Search terms'));
    fireEvent.mouseDown(screen.getByText('Abnormal renal physiology'));
    expect(props.onSelect).toHaveBeenCalledWith('http://purl.obolibrary.org/obo/HP_0012211');
  });

  it('says when nothing matches', () => {
    renderBox({ suggestions: [], total: 0 });
    fireEvent.focus(screen.getByLabelText('Search terms'));
    expect(screen.getByText('No matching terms')).toBeInTheDocument();
  });

  it('notes matches beyond the suggestion list', () => {
    renderBox({ total: 37 });
    fireEvent.focus(screen.getByLabelText('Search terms'));
    expect(screen.getByText('Showing 2 of 37 matches')).toBeInTheDocument();
  });
});
