import React, { useMemo, useState } from 'react';
import { Bot } from 'lucide-react';
import type { ChatMessage } from './types';
import { MarkdownRenderer } from './MarkdownRenderer';
import { EvidencePanel } from './EvidencePanel';
import { formatTime } from './utils';
import { createEvidenceRegistry } from '../../utils/evidenceRegistry';
import { useEvidenceSearch } from '../../hooks/useEvidenceSearch';
import { useDocumentViewer } from '../../contexts/DocumentViewerContext';

interface BotResponseProps {
  message: ChatMessage;
  onExplainTerm?: (term: string) => void;
  /** Open the first evidence panel on render */
  openFirstEvidence?: boolean;
  getSelection?: () => string;
}

/**
 * An assistant answer with its evidence. Selecting text in the response
 * highlights the best matching sentence among the open evidence panels.
 */
export const BotResponse: React.FC<BotResponseProps> = ({
  message,
  onExplainTerm,
  openFirstEvidence = true,
  getSelection,
}) => {
  const [registry] = useState(createEvidenceRegistry);
  const viewer = useDocumentViewer();
  const evidence = useMemo(() => message.evidence ?? [], [message.evidence]);
  const evidenceIds = useMemo(() => evidence.map((item) => item.id), [evidence]);

  const { onPointerDown, onMouseUp } = useEvidenceSearch({
    registry,
    evidenceIds,
    isViewerOpen: viewer.isOpen,
    getSelection,
  });

  return (
    <div
      className={`message message--bot${message.isError ? ' message--error' : ''}`}
      data-testid="bot-response"
      onPointerDown={onPointerDown}
      onMouseUp={onMouseUp}
    >
      <div className="message__avatar" aria-hidden>
        <Bot size={18} />
      </div>
      <div className="message__body">
        <div className="message__bubble">
          {message.isError ? (
            <div role="alert">{message.content}</div>
          ) : (
            <MarkdownRenderer content={message.content} onTermClick={onExplainTerm} />
          )}
        </div>

        {evidence.length > 0 && (
          <section className="evidence-list" aria-label="Bukti pendukung">
            {evidence.map((item, index) => (
              <EvidencePanel
                key={item.id}
                item={item}
                registry={registry}
                defaultOpen={openFirstEvidence && index === 0}
              />
            ))}
          </section>
        )}

        {message.createdAt && <div className="message__time">{formatTime(message.createdAt)}</div>}
      </div>
    </div>
  );
};

export default BotResponse;
