import { buildConfig, type AppConfig } from '../config';

export const SIPADU_BASE = 'http://sipadu.test';
export const QA_URL = 'http://qa.test/ask';

/**
 * Config for tests, never read from the real environment
 */
export const makeConfig = (overrides: NodeJS.ProcessEnv = {}): AppConfig =>
  buildConfig({
    NODE_ENV: 'test',
    SIPADU_API_BASE: SIPADU_BASE,
    APP_VERSION: '2.1.0',
    ...overrides
  });

export type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

export const createFetchMock = (): FetchMock => jest.fn<Promise<Response>, Parameters<typeof fetch>>();

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });

export const namedError = (name: string, message: string): Error => {
  const error = new Error(message);
  error.name = name;
  return error;
};
