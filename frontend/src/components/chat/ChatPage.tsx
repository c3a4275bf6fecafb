import React, { useCallback, useEffect, useRef, useState } from 'react';
import type { ChatMessage } from './types';
import { SUGGESTION_PROMPTS } from './types';
import { BotResponse } from './BotResponse';
import { UserMessage } from './UserMessage';
import { ChatInput } from './ChatInput';
import { DocumentViewer } from './DocumentViewer';
import { createMessageId } from './utils';
import { chatService } from '../../services/chatService';
import { getErrorMessage } from '../../hooks/useApiError';

interface ChatPageProps {
  ask?: typeof chatService.ask;
}

export const ChatPage: React.FC<ChatPageProps> = ({ ask = chatService.ask }) => {
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const [input, setInput] = useState('');
  const [isSending, setIsSending] = useState(false);
  const [conversationId] = useState(() => `conv-${Date.now()}`);

  const endRef = useRef<HTMLDivElement>(null);
  const inputRef = useRef<HTMLTextAreaElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages]);

  const send = useCallback(
    async (text: string) => {
      const question = text.trim();
      if (!question || isSending) return;

      setMessages((prev) => [
        ...prev,
        { id: createMessageId('user'), role: 'user', content: question, createdAt: new Date().toISOString() },
      ]);
      setInput('');
      setIsSending(true);

      try {
        const { answer, evidence } = await ask(question, conversationId);
        setMessages((prev) => [
          ...prev,
          {
            id: createMessageId('assistant'),
            role: 'assistant',
            content: answer,
            evidence,
            createdAt: new Date().toISOString(),
          },
        ]);
      } catch (error) {
        console.error('Chat request failed:', error);
        setMessages((prev) => [
          ...prev,
          {
            id: createMessageId('assistant'),
            role: 'assistant',
            content: getErrorMessage(error),
            isError: true,
            createdAt: new Date().toISOString(),
          },
        ]);
      } finally {
        setIsSending(false);
      }
    },
    [ask, conversationId, isSending]
  );

  // Bold terms in an answer prefill a follow-up question
  const explainTerm = useCallback((term: string) => {
    setInput(`Explain ${term}`);
    inputRef.current?.focus();
  }, []);

  return (
    <div className="chat-page">
      <div className="chat-page__messages">
        {messages.length === 0 ? (
          <div className="chat-page__welcome">
            <p>Ajukan pertanyaan tentang dokumen yang telah diunggah.</p>
            <ul>
              {SUGGESTION_PROMPTS.map((prompt) => (
                <li key={prompt}>
                  <button type="button" className="chat-page__suggestion" onClick={() => void send(prompt)}>
                    {prompt}
                  </button>
                </li>
              ))}
            </ul>
          </div>
        ) : (
          messages.map((message) =>
            message.role === 'user' ? (
              <UserMessage key={message.id} message={message} />
            ) : (
              <BotResponse key={message.id} message={message} onExplainTerm={explainTerm} />
            )
          )
        )}
        <div ref={endRef} />
      </div>

      <ChatInput
        ref={inputRef}
        value={input}
        onChange={setInput}
        onSend={() => void send(input)}
        isLoading={isSending}
      />

      <DocumentViewer />
    </div>
  );
};

export default ChatPage;
