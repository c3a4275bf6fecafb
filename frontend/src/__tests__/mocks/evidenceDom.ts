import type { EvidenceKind } from '../../components/chat/types';
import type { EvidencePanelHandle } from '../../utils/evidenceRegistry';

interface PanelOptions {
  id?: string;
  open?: boolean;
  kind?: EvidenceKind;
  openInViewer?: (phrase?: string) => void;
}

let panelCounter = 0;

/**
 * Attach an evidence panel (details > div) to the document
 */
export const createPanel = (html: string, { id, open = true, kind = 'text', openInViewer }: PanelOptions = {}): EvidencePanelHandle => {
  panelCounter += 1;
  const details = document.createElement('details');
  details.open = open;
  const content = document.createElement('div');
  content.className = 'evidence-content';
  content.innerHTML = html;
  details.appendChild(content);
  document.body.appendChild(details);
  return { id: id ?? `panel-${panelCounter}`, details, content, kind, openInViewer };
};

export const INVOICE_HTML = '<p>The invoice number is 4521. It was issued in March.</p>';
