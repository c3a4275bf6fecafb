import MiniSearch, { type SearchOptions } from 'minisearch';
import type { EvidenceKind } from '../components/chat/types';

export interface Segment {
  id: number;
  text: string;
}

/**
 * The parts of a rendered evidence panel the indexer reads
 */
export interface IndexablePanel {
  details: HTMLDetailsElement;
  content: HTMLElement;
  kind: EvidenceKind;
}

export interface BuildIndexOptions {
  locale?: string;
}

export const SEARCH_OPTIONS: SearchOptions = {
  prefix: true,
  fuzzy: 0.2,
  combineWith: 'OR',
};

const LINE_BREAKS = /[\r\n]+/g;

export const normalizeText = (text: string): string => text.replace(LINE_BREAKS, ' ');

// Exact-match key: every whitespace run becomes one space
const normalizeQuery = (query: string): string => query.replace(/\s+/g, ' ').trim();

/**
 * The paragraphs and list items of a panel that hold text directly, or the
 * content root when it has none. Adjacent blocks are never read as one string.
 */
export const textBlocks = (content: HTMLElement): Element[] => {
  const blocks = Array.from(content.querySelectorAll('p, li')).filter(
    (block) => block.querySelector('p, li') === null
  );
  return blocks.length > 0 ? blocks : [content];
};

export const isDiagramPanel = (panel: IndexablePanel): boolean =>
  panel.kind === 'diagram' || panel.content.querySelector('div.markmap') !== null;

/**
 * Panels whose text takes part in search and highlighting: open and not a diagram
 */
export const isSearchablePanel = (panel: IndexablePanel): boolean =>
  panel.details.open && !isDiagramPanel(panel);

/**
 * Split text into trimmed, non-empty sentences
 */
export const segmentSentences = (text: string, locale = 'en'): string[] => {
  const segmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
  const sentences: string[] = [];
  for (const { segment } of segmenter.segment(normalizeText(text))) {
    const sentence = segment.trim();
    if (sentence) sentences.push(sentence);
  }
  return sentences;
};

export class EvidenceIndex {
  private readonly miniSearch: MiniSearch<Segment>;

  constructor(readonly segments: readonly Segment[]) {
    this.miniSearch = new MiniSearch<Segment>({
      fields: ['text'],
      storeFields: ['text'],
      searchOptions: SEARCH_OPTIONS,
    });
    this.miniSearch.addAll(segments);
  }

  get size(): number {
    return this.segments.length;
  }

  /**
   * Ranked segments for a query. A segment equal to the query comes first.
   */
  search(query: string): Segment[] {
    const normalized = normalizeQuery(query);
    if (!normalized) return [];

    const ranked: Segment[] = [];
    for (const result of this.miniSearch.search(normalized)) {
      const segment = typeof result.id === 'number' ? this.segments[result.id] : undefined;
      if (segment) ranked.push(segment);
    }

    const exact = this.segments.find((segment) => normalizeQuery(segment.text) === normalized);
    if (!exact) return ranked;
    return [exact, ...ranked.filter((segment) => segment.id !== exact.id)];
  }

  findBestSegment(query: string): Segment | undefined {
    return this.search(query)[0];
  }
}

/**
 * Index the sentences of every open, non-diagram panel in the given order,
 * block by block.
 * Ids are assigned in discovery order, starting at 0 for each build.
 */
export const buildEvidenceIndex = (
  panels: readonly IndexablePanel[],
  options: BuildIndexOptions = {}
): EvidenceIndex => {
  const segments: Segment[] = [];
  for (const panel of panels) {
    if (!isSearchablePanel(panel)) continue;
    for (const block of textBlocks(panel.content)) {
      for (const text of segmentSentences(block.textContent ?? '', options.locale)) {
        segments.push({ id: segments.length, text });
      }
    }
  }
  return new EvidenceIndex(segments);
};
