export { ChatPage } from './ChatPage';
export { BotResponse } from './BotResponse';
export { UserMessage } from './UserMessage';
export { EvidencePanel } from './EvidencePanel';
export { MarkdownRenderer } from './MarkdownRenderer';
export { ChatInput } from './ChatInput';
export { DocumentViewer } from './DocumentViewer';
export * from './types';
export * from './utils';
