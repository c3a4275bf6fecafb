import React from 'react';

interface MarkdownRendererProps {
  content: string;
  className?: string;
  /** Bold terms become buttons when set */
  onTermClick?: (term: string) => void;
}

/**
 * Lightweight markdown renderer that supports:
 * - Bold text: **text** or __text__
 * - Bullet points: - item or * item
 * - Preserves line breaks and spacing
 */
export const MarkdownRenderer: React.FC<MarkdownRendererProps> = ({ content, className = '', onTermClick }) => {
  const renderBoldText = (text: string) => {
    const boldRegex = /(\*\*|__)(.*?)\1/g;
    const parts: (string | JSX.Element)[] = [];
    let lastIndex = 0;
    let keyCounter = 0;

    for (let match = boldRegex.exec(text); match !== null; match = boldRegex.exec(text)) {
      if (match.index > lastIndex) {
        parts.push(text.substring(lastIndex, match.index));
      }

      const term = match[2];
      parts.push(
        onTermClick ? (
          <button key={`term-${keyCounter++}`} type="button" className="md-term" onClick={() => onTermClick(term)}>
            <strong>{term}</strong>
          </button>
        ) : (
          <strong key={`bold-${keyCounter++}`}>{term}</strong>
        )
      );

      lastIndex = match.index + match[0].length;
    }

    if (lastIndex < text.length) {
      parts.push(text.substring(lastIndex));
    }

    return parts.length > 0 ? parts : text;
  };

  const elements = content.split('\n').map((line, lineIndex) => {
    const bulletMatch = line.match(/^[\s]*[-*]\s+(.+)$/);
    if (bulletMatch) {
      return (
        <div key={lineIndex} className="md-bullet">
          <span aria-hidden>•</span>
          <span>{renderBoldText(bulletMatch[1])}</span>
        </div>
      );
    }
    if (line.trim() === '') {
      return <div key={lineIndex} className="md-gap" />;
    }
    return (
      <div key={lineIndex} className="md-line">
        {renderBoldText(line)}
      </div>
    );
  });

  return <div className={`md ${className}`.trim()}>{elements}</div>;
};

export default MarkdownRenderer;
