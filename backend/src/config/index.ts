import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

const DEFAULT_SIPADU_API_BASE = 'http://localhost.sipadubapelitbangbogor';
const DEFAULT_HIDDEN_TABS = [
  'Sumber Daya',
  'Pengaturan',
  'Bantuan',
  'resources-tab',
  'settings-tab',
  'help-tab',
];

/**
 * Split a comma separated env value into trimmed, non-empty entries
 */
export const parseList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  CORS_ORIGINS: z.string().optional(),
  SIPADU_API_BASE: z.string().url().default(DEFAULT_SIPADU_API_BASE),
  SIPADU_HOME_URL: z.string().url().optional(),
  SIPADU_VALIDATE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  KOTAEMON_DEV_MODE: z
    .string()
    .optional()
    .transform((value) => value?.toLowerCase() === 'true'),
  APP_NAME: z.string().min(1).default('SIPADU AI TOOLS'),
  APP_VERSION: z.string().min(1).default(process.env.npm_package_version || '1.0.0'),
  HIDDEN_TABS: z.string().optional(),
  QA_SERVICE_URL: z.string().url().optional(),
  QA_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  STATIC_DIR: z.string().min(1).optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(300),
});

export type Env = z.infer<typeof envSchema>;

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

export const buildConfig = (env: NodeJS.ProcessEnv) => {
  const parsed = envSchema.parse(env);
  const apiBase = stripTrailingSlash(parsed.SIPADU_API_BASE);
  const hiddenTabs = parsed.HIDDEN_TABS === undefined ? DEFAULT_HIDDEN_TABS : parseList(parsed.HIDDEN_TABS);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    // Built overlay (frontend/build), served as-is when set
    staticDir: parsed.STATIC_DIR,

    app: {
      name: parsed.APP_NAME,
      version: parsed.APP_VERSION,
      hiddenTabs,
    },

    sipadu: {
      apiBase,
      homeUrl: parsed.SIPADU_HOME_URL ?? `${apiBase}/home`,
      validateEndpoint: `${apiBase}/api/validate-token`,
      validateTimeoutMs: parsed.SIPADU_VALIDATE_TIMEOUT_MS,
      devMode: parsed.KOTAEMON_DEV_MODE,
    },

    qa: {
      serviceUrl: parsed.QA_SERVICE_URL,
      timeoutMs: parsed.QA_TIMEOUT_MS,
    },

    cors: {
      origins: parsed.CORS_ORIGINS ? parseList(parsed.CORS_ORIGINS) : ['http://localhost:5173'],
    },

    rateLimit: {
      windowMs: parsed.RATE_LIMIT_WINDOW_MS,
      max: parsed.RATE_LIMIT_MAX_REQUESTS,
    },

    logging: {
      level: parsed.LOG_LEVEL,
    },
  };
};

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Validate environment variables, throwing a readable message for each invalid one
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): void {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }
}

/**
 * Validate then build the configuration from the process environment
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  validateConfig(env);
  return buildConfig(env);
};

export default loadConfig;
