import React, { useEffect } from 'react';
import { Send } from 'lucide-react';
import { Button } from '../ui';

interface ChatInputProps {
  value: string;
  onChange: (value: string) => void;
  onSend: () => void;
  isLoading: boolean;
  disabled?: boolean;
}

export const ChatInput = React.forwardRef<HTMLTextAreaElement, ChatInputProps>(
  ({ value, onChange, onSend, isLoading, disabled }, ref) => {
    // Auto-resize textarea
    useEffect(() => {
      if (ref && typeof ref !== 'function' && ref.current) {
        const textarea = ref.current;
        textarea.style.height = 'auto';
        textarea.style.height = `${Math.min(textarea.scrollHeight, 150)}px`;
      }
    }, [value, ref]);

    const handleKeyDown = (e: React.KeyboardEvent) => {
      if (e.key === 'Enter' && !e.shiftKey) {
        e.preventDefault();
        if (!isLoading && value.trim()) {
          onSend();
        }
      }
    };

    return (
      <div className="chat-input" id="chat-input">
        <textarea
          ref={ref}
          value={value}
          onChange={(e) => onChange(e.target.value)}
          onKeyDown={handleKeyDown}
          placeholder="Tanyakan sesuatu tentang dokumen Anda..."
          aria-label="Pesan"
          disabled={disabled || isLoading}
          rows={1}
        />
        <Button
          onClick={onSend}
          disabled={disabled || !value.trim()}
          isLoading={isLoading}
          leftIcon={<Send size={16} />}
        >
          {isLoading ? 'Memproses...' : 'Kirim'}
        </Button>
      </div>
    );
  }
);

ChatInput.displayName = 'ChatInput';

export default ChatInput;
