import { renderHook, act } from '@testing-library/react';
import { ensureIndexed, useEvidenceSearch } from '../../hooks/useEvidenceSearch';
import { EvidenceIndex } from '../../services/evidenceIndex';
import { createEvidenceRegistry } from '../../utils/evidenceRegistry';
import { createPanel, INVOICE_HTML } from '../mocks/evidenceDom';

describe('ensureIndexed', () => {
  it('builds once and returns an indexed state unchanged', () => {
    const build = jest.fn(() => new EvidenceIndex([{ id: 0, text: 'One.' }]));

    const first = ensureIndexed({ status: 'unindexed' }, build);
    const second = ensureIndexed(first, build);

    expect(second).toBe(first);
    expect(build).toHaveBeenCalledTimes(1);
  });
});

describe('useEvidenceSearch', () => {
  afterEach(() => {
    document.body.innerHTML = '';
  });

  const setup = (selection: string) => {
    const registry = createEvidenceRegistry();
    const panel = createPanel(INVOICE_HTML, { id: 'ev-1' });
    registry.register(panel);
    const onMatch = jest.fn();
    const hook = renderHook(() =>
      useEvidenceSearch({
        registry,
        evidenceIds: ['ev-1'],
        isViewerOpen: false,
        getSelection: () => selection,
        onMatch,
      })
    );
    return { ...hook, panel, onMatch };
  };

  it('starts unindexed and ignores mouse-up before the first pointer-down', () => {
    const { result, onMatch } = setup('invoice number is 4521');

    act(() => result.current.onMouseUp());

    expect(result.current.getState()).toEqual({ status: 'unindexed' });
    expect(onMatch).not.toHaveBeenCalled();
  });

  it('builds the index once for repeated interactions', () => {
    const { result } = setup('invoice number is 4521');

    act(() => result.current.onPointerDown());
    const firstState = result.current.getState();
    act(() => result.current.onPointerDown());
    const secondState = result.current.getState();

    expect(secondState).toBe(firstState);
    expect(secondState.status === 'indexed' && secondState.index.segments.map((segment) => segment.id)).toEqual([0, 1]);
  });

  it('reports the outcome of a selection', () => {
    const { result, onMatch, panel } = setup('invoice number is 4521');

    act(() => result.current.onPointerDown());
    act(() => result.current.onMouseUp());

    expect(onMatch).toHaveBeenCalledWith({
      status: 'highlighted',
      segment: { id: 0, text: 'The invoice number is 4521.' },
      panelId: 'ev-1',
      revealedIn: 'page',
    });
    expect(panel.content.querySelector('mark')?.textContent).toBe('The invoice number is 4521.');
  });

  it('ignores a blank selection', () => {
    const { result, onMatch } = setup('   ');

    act(() => result.current.onPointerDown());
    act(() => result.current.onMouseUp());

    expect(onMatch).not.toHaveBeenCalled();
  });

  it('does not index panels opened after the first interaction', () => {
    const { result, panel, onMatch } = setup('invoice number is 4521');
    panel.details.open = false;

    act(() => result.current.onPointerDown());
    panel.details.open = true;
    act(() => result.current.onMouseUp());

    expect(onMatch).toHaveBeenCalledWith({ status: 'no_match' });
  });
});
