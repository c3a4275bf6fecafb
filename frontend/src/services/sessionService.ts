import { API_ENDPOINTS, apiRequest } from '../config/api';
import { sessionCheckSchema, type SessionCheck } from './schemas';

export const sessionService = {
  async validate(token: string | null): Promise<SessionCheck> {
    return apiRequest(API_ENDPOINTS.sessionValidate, sessionCheckSchema, {
      method: 'POST',
      body: JSON.stringify(token ? { token } : {}),
    });
  },
};

export default sessionService;
