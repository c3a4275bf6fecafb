import { buildEvidenceIndex } from '../../services/evidenceIndex';
import {
  HIGHLIGHT_ATTRIBUTE,
  clearHighlights,
  highlightFirstOccurrence,
  matchSelection,
} from '../../utils/evidenceHighlight';
import { createPanel, INVOICE_HTML } from '../mocks/evidenceDom';

const highlights = () => Array.from(document.querySelectorAll(`mark[${HIGHLIGHT_ATTRIBUTE}]`));

describe('evidenceHighlight', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(() => {
    document.body.innerHTML = '';
  });

  describe('highlightFirstOccurrence', () => {
    it('wraps the phrase and keeps inline markup inside the mark', () => {
      const paragraph = document.createElement('p');
      paragraph.innerHTML = 'The <em>invoice</em> number is 4521. It was issued.';

      const mark = highlightFirstOccurrence(paragraph, 'The invoice number is 4521.');

      expect(mark?.textContent).toBe('The invoice number is 4521.');
      expect(paragraph.innerHTML).toBe(
        '<mark data-evidence-highlight="">The <em>invoice</em> number is 4521.</mark> It was issued.'
      );
    });

    it('matches across line breaks in the source text', () => {
      const paragraph = document.createElement('p');
      paragraph.textContent = 'Realisasi anggaran\nmencapai 80 persen.';

      const mark = highlightFirstOccurrence(paragraph, 'Realisasi anggaran mencapai 80 persen.');

      expect(mark?.textContent).toBe('Realisasi anggaran\nmencapai 80 persen.');
    });

    it('returns undefined when the phrase is absent', () => {
      const paragraph = document.createElement('p');
      paragraph.textContent = 'Nothing to see.';

      expect(highlightFirstOccurrence(paragraph, 'invoice')).toBeUndefined();
      expect(paragraph.innerHTML).toBe('Nothing to see.');
    });
  });

  describe('clearHighlights', () => {
    it('restores the original markup and keeps citation marks', () => {
      const paragraph = document.createElement('p');
      paragraph.innerHTML = 'See <mark class="cite">[1]</mark> here. Other text.';
      highlightFirstOccurrence(paragraph, 'Other text.');

      const removed = clearHighlights([paragraph]);

      expect(removed).toBe(1);
      expect(paragraph.innerHTML).toBe('See <mark class="cite">[1]</mark> here. Other text.');
      expect(paragraph.childNodes).toHaveLength(3);
    });
  });

  describe('matchSelection', () => {
    it('highlights the matching sentence and scrolls it into view', () => {
      const panel = createPanel(INVOICE_HTML);
      const index = buildEvidenceIndex([panel]);

      const outcome = matchSelection('invoice number is 4521', { index, panels: [panel], isViewerOpen: false });

      expect(outcome).toEqual({
        status: 'highlighted',
        segment: { id: 0, text: 'The invoice number is 4521.' },
        panelId: panel.id,
        revealedIn: 'page',
      });
      const [mark] = highlights();
      expect(mark.textContent).toBe('The invoice number is 4521.');
      expect(mark.parentElement?.tagName).toBe('P');
      expect(Element.prototype.scrollIntoView).toHaveBeenCalledWith({ behavior: 'smooth', block: 'center' });
    });

    it('keeps a single highlight across consecutive selections', () => {
      const panel = createPanel(INVOICE_HTML);
      const context = { index: buildEvidenceIndex([panel]), panels: [panel], isViewerOpen: false };

      matchSelection('invoice number is 4521', context);
      matchSelection('issued in March', context);

      expect(highlights().map((mark) => mark.textContent)).toEqual(['It was issued in March.']);
      expect(panel.content.innerHTML).toBe(
        '<p>The invoice number is 4521. <mark data-evidence-highlight="">It was issued in March.</mark></p>'
      );
    });

    it('highlights inside the paragraph that holds the sentence', () => {
      const panel = createPanel('<p>Opening remarks.</p>\n<ul>\n<li>Dana hibah disalurkan pada April.</li>\n</ul>');
      const index = buildEvidenceIndex([panel]);

      matchSelection('hibah disalurkan', { index, panels: [panel], isViewerOpen: false });

      expect(highlights()[0].parentElement?.tagName).toBe('LI');
    });

    it('opens the viewer at the sentence when the viewer is open', () => {
      const openInViewer = jest.fn();
      const panel = createPanel(INVOICE_HTML, { openInViewer });
      const index = buildEvidenceIndex([panel]);

      const outcome = matchSelection('invoice number is 4521', { index, panels: [panel], isViewerOpen: true });

      expect(outcome).toMatchObject({ status: 'highlighted', revealedIn: 'viewer' });
      expect(openInViewer).toHaveBeenCalledWith('The invoice number is 4521.');
      expect(Element.prototype.scrollIntoView).not.toHaveBeenCalled();
    });

    it('scrolls on the page when the panel has no source document', () => {
      const panel = createPanel(INVOICE_HTML);
      const index = buildEvidenceIndex([panel]);

      const outcome = matchSelection('invoice number is 4521', { index, panels: [panel], isViewerOpen: true });

      expect(outcome).toMatchObject({ status: 'highlighted', revealedIn: 'page' });
      expect(Element.prototype.scrollIntoView).toHaveBeenCalledTimes(1);
    });

    it('reports a stale match when the panel text changed after indexing', () => {
      const panel = createPanel(INVOICE_HTML);
      const index = buildEvidenceIndex([panel]);
      panel.content.innerHTML = '<p>Completely different content.</p>';

      const outcome = matchSelection('invoice number is 4521', { index, panels: [panel], isViewerOpen: false });

      expect(outcome).toEqual({ status: 'stale', segment: { id: 0, text: 'The invoice number is 4521.' } });
      expect(highlights()).toHaveLength(0);
    });

    it('leaves the current highlight alone when nothing matches', () => {
      const panel = createPanel(INVOICE_HTML);
      const context = { index: buildEvidenceIndex([panel]), panels: [panel], isViewerOpen: false };
      matchSelection('invoice number is 4521', context);

      const outcome = matchSelection('xylophone quartz', context);

      expect(outcome).toEqual({ status: 'no_match' });
      expect(highlights()).toHaveLength(1);
    });

    it('highlights a sentence from adjacent paragraphs with no space between them', () => {
      const panel = createPanel('<p>First sentence here.</p><p>Second one follows.</p>');
      const index = buildEvidenceIndex([panel]);

      const outcome = matchSelection('Second one follows', { index, panels: [panel], isViewerOpen: false });

      expect(outcome).toMatchObject({ status: 'highlighted', segment: { id: 1, text: 'Second one follows.' } });
      expect(panel.content.innerHTML).toBe(
        '<p>First sentence here.</p><p><mark data-evidence-highlight="">Second one follows.</mark></p>'
      );
    });

    it('clears highlights of other responses under the reset root', () => {
      const first = createPanel('<p>Alpha budget grew.</p>');
      const second = createPanel('<p>Beta invoice was paid.</p>');
      matchSelection('Alpha budget', {
        index: buildEvidenceIndex([first]),
        panels: [first],
        isViewerOpen: false,
        resetRoot: document,
      });

      matchSelection('Beta invoice', {
        index: buildEvidenceIndex([second]),
        panels: [second],
        isViewerOpen: false,
        resetRoot: document,
      });

      expect(highlights().map((mark) => mark.textContent)).toEqual(['Beta invoice was paid.']);
      expect(first.content.innerHTML).toBe('<p>Alpha budget grew.</p>');
    });

    it('never highlights inside a closed panel', () => {
      const panel = createPanel(INVOICE_HTML, { open: false });
      const index = buildEvidenceIndex([panel]);

      expect(matchSelection('invoice number is 4521', { index, panels: [panel], isViewerOpen: false })).toEqual({
        status: 'no_match',
      });
      expect(highlights()).toHaveLength(0);
    });
  });
});
