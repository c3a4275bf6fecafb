import { useCallback, useRef } from 'react';
import { buildEvidenceIndex, type EvidenceIndex } from '../services/evidenceIndex';
import { matchSelection, type MatchOutcome } from '../utils/evidenceHighlight';
import type { EvidenceRegistry } from '../utils/evidenceRegistry';

export type EvidenceSearchState =
  | { status: 'unindexed' }
  | { status: 'indexed'; index: EvidenceIndex };

/**
 * Move to `indexed` on first use; an indexed state is returned as is
 */
export const ensureIndexed = (
  state: EvidenceSearchState,
  build: () => EvidenceIndex
): Extract<EvidenceSearchState, { status: 'indexed' }> =>
  state.status === 'indexed' ? state : { status: 'indexed', index: build() };

interface UseEvidenceSearchOptions {
  registry: EvidenceRegistry;
  /** Evidence ids of this response, in render order */
  evidenceIds: readonly string[];
  isViewerOpen: boolean;
  locale?: string;
  getSelection?: () => string;
  /** Root cleared of earlier highlights on every match; defaults to the document */
  getResetRoot?: () => ParentNode;
  onMatch?: (outcome: MatchOutcome) => void;
}

const readWindowSelection = (): string => window.getSelection()?.toString() ?? '';
const currentDocument = (): ParentNode => document;

/**
 * Per-response evidence search: the index is built on the first pointer-down
 * inside the response, and every mouse-up after that matches the selection.
 */
export function useEvidenceSearch({
  registry,
  evidenceIds,
  isViewerOpen,
  locale,
  getSelection = readWindowSelection,
  getResetRoot = currentDocument,
  onMatch,
}: UseEvidenceSearchOptions) {
  const stateRef = useRef<EvidenceSearchState>({ status: 'unindexed' });

  const onPointerDown = useCallback(() => {
    stateRef.current = ensureIndexed(stateRef.current, () =>
      buildEvidenceIndex(registry.panels(evidenceIds), { locale })
    );
  }, [registry, evidenceIds, locale]);

  const onMouseUp = useCallback(() => {
    const state = stateRef.current;
    if (state.status !== 'indexed') return;

    const selection = getSelection();
    if (!selection.trim()) return;

    const outcome = matchSelection(selection, {
      index: state.index,
      panels: registry.panels(evidenceIds),
      isViewerOpen,
      resetRoot: getResetRoot(),
    });
    onMatch?.(outcome);
  }, [registry, evidenceIds, isViewerOpen, getSelection, getResetRoot, onMatch]);

  const getState = useCallback((): EvidenceSearchState => stateRef.current, []);

  return { onPointerDown, onMouseUp, getState };
}
