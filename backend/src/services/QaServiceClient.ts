import { logger, logUpstreamCall } from '../utils/logger';
import {
  GatewayTimeoutError,
  ServiceUnavailableError,
  UpstreamError,
  errorMessage
} from '../utils/errors';
import { qaAnswerSchema, type ChatMessageInput, type QaAnswer } from '../validation/schemas';

export interface QaServiceOptions {
  serviceUrl?: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * Relays chat questions to the hosting document-QA service. Retrieval and
 * answering happen there; this client only forwards and checks the payload.
 */
export class QaServiceClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: QaServiceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return Boolean(this.options.serviceUrl);
  }

  async ask(input: ChatMessageInput, requestId?: string): Promise<QaAnswer> {
    const serviceUrl = this.options.serviceUrl;
    if (!serviceUrl) {
      throw new ServiceUnavailableError('QA service is not configured');
    }

    const startTime = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(serviceUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...(requestId ? { 'X-Request-ID': requestId } : {})
        },
        body: JSON.stringify(input),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new GatewayTimeoutError('QA service did not answer in time');
      }
      throw new UpstreamError('qa', `QA service unreachable: ${errorMessage(error)}`);
    }

    logUpstreamCall({
      target: 'qa',
      operation: 'ask',
      status: response.status,
      durationMs: Date.now() - startTime,
      requestId
    });

    if (!response.ok) {
      throw new UpstreamError('qa', `QA service error: ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError('qa', `QA service answered with invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = qaAnswerSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn('QA service payload rejected', {
        requestId,
        issues: parsed.error.errors.map((issue) => issue.path.join('.'))
      });
      throw new UpstreamError('qa', 'QA service answered with an unexpected payload');
    }

    return parsed.data;
  }
}
