import { z } from 'zod';

// Same-origin in production (the backend serves the overlay); Vite proxies /api in development
export const API_BASE_URL = '/api';

export const API_ENDPOINTS = {
  sessionValidate: `${API_BASE_URL}/session/validate`,
  chat: `${API_BASE_URL}/chat`,
};

export class ApiRequestError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = code;
  }
}

const errorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

const successEnvelopeSchema = z.object({
  success: z.literal(true),
  data: z.unknown(),
});

const readJson = async (response: Response): Promise<unknown> => {
  try {
    return await response.json();
  } catch {
    return undefined;
  }
};

/**
 * Request a `{ success: true, data }` endpoint and validate `data` against the schema
 */
export const apiRequest = async <T>(
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestInit = {}
): Promise<T> => {
  let response: Response;
  try {
    response = await fetch(url, {
      ...options,
      headers: {
        'Content-Type': 'application/json',
        ...options.headers,
      },
    });
  } catch (error) {
    console.error('API request failed:', error);
    throw new ApiRequestError('Network error', 0, 'NETWORK_ERROR');
  }

  const body = await readJson(response);

  if (!response.ok) {
    const envelope = errorEnvelopeSchema.safeParse(body);
    const error = envelope.success ? envelope.data.error : {};
    throw new ApiRequestError(error.message || `HTTP error! status: ${response.status}`, response.status, error.code);
  }

  const envelope = successEnvelopeSchema.safeParse(body);
  const parsed = envelope.success ? schema.safeParse(envelope.data.data) : envelope;
  if (!parsed.success) {
    console.error('Unexpected API response:', url, parsed.error.issues);
    throw new ApiRequestError('Respons server tidak valid', response.status, 'INVALID_RESPONSE');
  }
  return parsed.data;
};
