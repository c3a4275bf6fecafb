export const formatTime = (dateStr?: string): string => {
  if (!dateStr) return '';
  return new Date(dateStr).toLocaleTimeString([], {
    hour: '2-digit',
    minute: '2-digit',
  });
};

let messageCounter = 0;

export const createMessageId = (prefix: 'user' | 'assistant'): string => {
  messageCounter += 1;
  return `${prefix}-${Date.now()}-${messageCounter}`;
};

/**
 * Build the document viewer URL using the PDF.js fragment syntax
 */
export const buildViewerUrl = (url: string, page?: number, phrase?: string): string => {
  const params: string[] = [];
  if (page !== undefined) params.push(`page=${page}`);
  if (phrase) params.push(`search=${encodeURIComponent(phrase)}`);
  if (params.length === 0) return url;
  const base = url.split('#')[0];
  return `${base}#${params.join('&')}`;
};
