import { logger, logUpstreamCall } from '../utils/logger';
import { GatewayTimeoutError, UpstreamError, errorMessage } from '../utils/errors';
import { sipaduResponseSchema } from '../validation/schemas';

export const USER_ID_PREFIX = 'sipadu_';

export interface SessionUser {
  /** Overlay-wide id, always `sipadu_<SIPADU user_id>` */
  userId: string;
  username: string;
  fullName: string;
  email?: string;
  unit?: string;
  roleId?: string;
}

export type SessionCheckResult =
  | { status: 'DEV_MODE'; user: SessionUser }
  | { status: 'NO_TOKEN'; message: string }
  | { status: 'SUCCESS'; user: SessionUser }
  | { status: 'FAILED'; message: string };

export interface SipaduAuthOptions {
  validateEndpoint: string;
  timeoutMs: number;
  devMode: boolean;
  fetchImpl?: typeof fetch;
}

export const DEV_USER: SessionUser = {
  userId: 'dev_1',
  username: 'dev_user',
  fullName: 'Development User'
};

/**
 * Prefix a SIPADU user id, leaving already-prefixed ids untouched
 */
export const toOverlayUserId = (sipaduUserId: string): string =>
  sipaduUserId.startsWith(USER_ID_PREFIX) ? sipaduUserId : `${USER_ID_PREFIX}${sipaduUserId}`;

const isTimeout = (error: unknown): boolean =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * Validates SIPADU SSO tokens against the SIPADU `validate-token` endpoint
 */
export class SipaduAuthService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: SipaduAuthOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get devMode(): boolean {
    return this.options.devMode;
  }

  async checkToken(token: string | undefined, requestId?: string): Promise<SessionCheckResult> {
    if (this.options.devMode) {
      logger.info('Development mode: skipping SIPADU token validation', { requestId });
      return { status: 'DEV_MODE', user: DEV_USER };
    }

    if (!token) {
      logger.warn('No token found', { requestId });
      return { status: 'NO_TOKEN', message: 'Token tidak ditemukan' };
    }

    const url = new URL(this.options.validateEndpoint);
    url.searchParams.set('token', token);

    const startTime = Date.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new GatewayTimeoutError('SIPADU did not answer in time');
      }
      throw new UpstreamError('sipadu', `Connection error to SIPADU: ${errorMessage(error)}`);
    }

    logUpstreamCall(
      {
        target: 'sipadu',
        operation: 'validate-token',
        status: response.status,
        durationMs: Date.now() - startTime,
        requestId
      },
      { tokenLength: token.length }
    );

    if (response.status !== 200) {
      logger.error('SIPADU API error', { requestId, status: response.status });
      return { status: 'FAILED', message: `SIPADU API error: ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError('sipadu', `SIPADU answered with invalid JSON: ${errorMessage(error)}`);
    }

    const parsed = sipaduResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError('sipadu', 'SIPADU answered with an unexpected payload');
    }

    const data = parsed.data;
    if (!data.status) {
      const message = data.message || 'Token validation failed';
      logger.warn('Token validation failed', { requestId, message });
      return { status: 'FAILED', message };
    }

    const user: SessionUser = {
      userId: toOverlayUserId(data.user_id),
      username: data.username,
      fullName: data.nama_lengkap,
      email: data.email ?? undefined,
      unit: data.unit_kerja ?? undefined,
      roleId: data.user_id_role ?? undefined
    };

    logger.info('Token validated', { requestId, userId: user.userId });
    return { status: 'SUCCESS', user };
  }
}
