import React from 'react';
import { User } from 'lucide-react';
import type { ChatMessage } from './types';
import { formatTime } from './utils';

export const UserMessage: React.FC<{ message: ChatMessage }> = ({ message }) => (
  <div className="message message--user">
    <div className="message__body">
      <div className="message__bubble">{message.content}</div>
      {message.createdAt && <div className="message__time">{formatTime(message.createdAt)}</div>}
    </div>
    <div className="message__avatar" aria-hidden>
      <User size={18} />
    </div>
  </div>
);

export default UserMessage;
