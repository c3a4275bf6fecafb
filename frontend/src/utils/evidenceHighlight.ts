import {
  isSearchablePanel,
  normalizeText,
  textBlocks,
  type EvidenceIndex,
  type Segment,
} from '../services/evidenceIndex';
import type { EvidencePanelHandle } from './evidenceRegistry';

export const HIGHLIGHT_ATTRIBUTE = 'data-evidence-highlight';
const HIGHLIGHT_SELECTOR = `mark[${HIGHLIGHT_ATTRIBUTE}]`;

interface TextPosition {
  node: Text;
  offset: number;
}

/**
 * Unwrap every evidence highlight under the given roots. Other marks
 * (citations from the QA service) are kept.
 */
export const clearHighlights = (roots: Iterable<ParentNode>): number => {
  let removed = 0;
  for (const root of roots) {
    for (const mark of Array.from(root.querySelectorAll(HIGHLIGHT_SELECTOR))) {
      const parent = mark.parentNode;
      mark.replaceWith(...Array.from(mark.childNodes));
      parent?.normalize();
      removed += 1;
    }
  }
  return removed;
};

// Normalized text of an element, with the raw text position of each character
const mapNormalizedText = (element: Element): { text: string; positions: TextPosition[] } => {
  const walker = element.ownerDocument.createTreeWalker(element, NodeFilter.SHOW_TEXT);
  const positions: TextPosition[] = [];
  let text = '';
  let inLineBreak = false;

  for (let node = walker.nextNode(); node; node = walker.nextNode()) {
    if (!(node instanceof Text)) continue;
    const data = node.data;
    for (let offset = 0; offset < data.length; offset += 1) {
      const char = data[offset];
      if (char === '\r' || char === '\n') {
        if (inLineBreak) continue;
        inLineBreak = true;
        text += ' ';
      } else {
        inLineBreak = false;
        text += char;
      }
      positions.push({ node, offset });
    }
  }

  return { text, positions };
};

/**
 * Wrap the first occurrence of `phrase` inside `element` in a highlight mark.
 * Inline markup inside the match is moved into the mark, not flattened.
 */
export const highlightFirstOccurrence = (element: Element, phrase: string): HTMLElement | undefined => {
  if (!phrase) return undefined;
  const { text, positions } = mapNormalizedText(element);
  const start = text.indexOf(phrase);
  if (start < 0) return undefined;

  const first = positions[start];
  const last = positions[start + phrase.length - 1];
  const document = element.ownerDocument;

  const range = document.createRange();
  range.setStart(first.node, first.offset);
  range.setEnd(last.node, last.offset + 1);

  const mark = document.createElement('mark');
  mark.setAttribute(HIGHLIGHT_ATTRIBUTE, '');
  mark.appendChild(range.extractContents());
  range.insertNode(mark);
  return mark;
};

export interface HighlightHit {
  panel: EvidencePanelHandle;
  mark: HTMLElement;
}

/**
 * Highlight `matchedText` in the first paragraph or list item that holds it,
 * scanning open, non-diagram panels in order
 */
export const highlightInPanels = (
  panels: readonly EvidencePanelHandle[],
  matchedText: string
): HighlightHit | undefined => {
  for (const panel of panels) {
    if (!isSearchablePanel(panel)) continue;
    for (const target of textBlocks(panel.content)) {
      if (!normalizeText(target.textContent ?? '').includes(matchedText)) continue;
      const mark = highlightFirstOccurrence(target, matchedText);
      if (mark) return { panel, mark };
    }
  }
  return undefined;
};

export type MatchOutcome =
  | { status: 'no_match' }
  | { status: 'stale'; segment: Segment }
  | { status: 'highlighted'; segment: Segment; panelId: string; revealedIn: 'viewer' | 'page' };

export interface MatchContext {
  index: EvidenceIndex;
  /** Every panel of the response, in render order */
  panels: readonly EvidencePanelHandle[];
  isViewerOpen: boolean;
  /**
   * Where earlier highlights are removed before the new one is placed.
   * Defaults to this response's panels; pass the document so that only one
   * highlight exists across the whole transcript.
   */
  resetRoot?: ParentNode;
}

/**
 * Find the best segment for a text selection, move the single highlight
 * onto it and reveal it, either in the open document viewer or on the page
 */
export const matchSelection = (
  selection: string,
  { index, panels, isViewerOpen, resetRoot }: MatchContext
): MatchOutcome => {
  const segment = index.findBestSegment(selection);
  if (!segment) return { status: 'no_match' };

  clearHighlights(resetRoot ? [resetRoot] : panels.map((panel) => panel.content));

  const hit = highlightInPanels(panels, segment.text);
  if (!hit) return { status: 'stale', segment };

  if (isViewerOpen && hit.panel.openInViewer) {
    hit.panel.openInViewer(segment.text);
    return { status: 'highlighted', segment, panelId: hit.panel.id, revealedIn: 'viewer' };
  }

  hit.mark.scrollIntoView({ behavior: 'smooth', block: 'center' });
  return { status: 'highlighted', segment, panelId: hit.panel.id, revealedIn: 'page' };
};
