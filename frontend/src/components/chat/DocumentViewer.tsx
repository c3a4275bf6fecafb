import React from 'react';
import { Modal } from '../ui';
import { useDocumentViewer } from '../../contexts/DocumentViewerContext';
import { buildViewerUrl } from './utils';

/**
 * Side pane with the source document of an evidence item, opened at the page
 * and phrase of the current highlight. The transcript stays selectable while
 * it is open, so a new selection moves the pane to the new match.
 */
export const DocumentViewer: React.FC = () => {
  const { isOpen, target, close } = useDocumentViewer();

  return (
    <Modal
      open={isOpen && target !== null}
      onOpenChange={(open) => {
        if (!open) close();
      }}
      title={target?.title}
      description={target?.phrase ? <q className="viewer__phrase">{target.phrase}</q> : undefined}
      size="pane"
      modal={false}
    >
      {target && (
        <iframe
          key={`${target.evidenceId}:${target.phrase ?? ''}`}
          className="viewer__frame"
          title={`Dokumen: ${target.title}`}
          src={buildViewerUrl(target.url, target.page, target.phrase)}
        />
      )}
    </Modal>
  );
};

export default DocumentViewer;
