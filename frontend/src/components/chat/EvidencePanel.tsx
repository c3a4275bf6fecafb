import React, { useEffect, useRef } from 'react';
import { FileText, ExternalLink, Network } from 'lucide-react';
import type { EvidenceItem } from './types';
import type { EvidenceRegistry } from '../../utils/evidenceRegistry';
import { useDocumentViewer } from '../../contexts/DocumentViewerContext';

interface EvidencePanelProps {
  item: EvidenceItem;
  registry: EvidenceRegistry;
  defaultOpen?: boolean;
}

/**
 * One retrieved evidence chunk in a disclosure panel. The panel registers its
 * elements so search and highlighting can reach it by id.
 */
export const EvidencePanel: React.FC<EvidencePanelProps> = ({ item, registry, defaultOpen = false }) => {
  const detailsRef = useRef<HTMLDetailsElement>(null);
  const contentRef = useRef<HTMLDivElement>(null);
  const viewer = useDocumentViewer();
  const { open: openViewer } = viewer;

  const { id, kind, title, source } = item;

  useEffect(() => {
    const details = detailsRef.current;
    const content = contentRef.current;
    if (!details || !content) return undefined;

    registry.register({
      id,
      details,
      content,
      kind,
      openInViewer: source
        ? (phrase?: string) =>
            openViewer({ evidenceId: id, title: title || source.name || source.url, url: source.url, page: source.page, phrase })
        : undefined,
    });
    return () => registry.unregister(id);
  }, [registry, id, kind, title, source, openViewer]);

  const label = title || source?.name || 'Bukti';

  return (
    <details ref={detailsRef} className="evidence" open={defaultOpen} data-evidence-id={id}>
      <summary className="evidence__summary">
        {kind === 'diagram' ? <Network size={14} aria-hidden /> : <FileText size={14} aria-hidden />}
        <span className="evidence__title">{label}</span>
        {source?.page !== undefined && <span className="evidence__page">hal. {source.page}</span>}
      </summary>
      {source && (
        <button
          type="button"
          className="evidence__open"
          onClick={() => openViewer({ evidenceId: id, title: label, url: source.url, page: source.page })}
        >
          <ExternalLink size={12} aria-hidden /> Buka dokumen
        </button>
      )}
      <div ref={contentRef} className="evidence-content" dangerouslySetInnerHTML={{ __html: item.html }} />
    </details>
  );
};

export default EvidencePanel;
