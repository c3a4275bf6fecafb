import { API_ENDPOINTS, apiRequest } from '../config/api';
import type { ChatAnswer } from '../components/chat/types';
import { chatAnswerSchema } from './schemas';

export const chatService = {
  /**
   * Ask the hosting QA service through the backend
   */
  async ask(message: string, conversationId?: string): Promise<ChatAnswer> {
    return apiRequest(API_ENDPOINTS.chat, chatAnswerSchema, {
      method: 'POST',
      body: JSON.stringify({ message, conversationId }),
    });
  },
};

export default chatService;
