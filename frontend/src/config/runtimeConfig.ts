import { z } from 'zod';
import { STORAGE_KEYS, getStorage } from '../utils/storage';

declare global {
  interface Window {
    SIPADU_CONFIG?: unknown;
  }
}

export const DEFAULT_HOME_URL = 'http://localhost.sipadubapelitbangbogor/home';

export const DEFAULT_HIDDEN_TABS = [
  'Sumber Daya',
  'Pengaturan',
  'Bantuan',
  'resources-tab',
  'settings-tab',
  'help-tab',
];

const optionalUrl = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim().replace(/\/+$/, '') : undefined));

const runtimeConfigSchema = z.object({
  HOME_URL: optionalUrl,
  API_BASE: optionalUrl,
  APP_NAME: z.string().min(1).default('SIPADU AI TOOLS'),
  APP_VERSION: z.string().min(1).default('1.0.0'),
  HIDDEN_TABS: z.array(z.string()).default(DEFAULT_HIDDEN_TABS),
  DEV_MODE: z.boolean().default(false),
});

export interface RuntimeConfig {
  appName: string;
  appVersion: string;
  homeUrl?: string;
  apiBase?: string;
  hiddenTabs: string[];
  devMode: boolean;
}

/**
 * Read the configuration injected by /config.js. A missing or malformed
 * object falls back to defaults.
 */
export const getRuntimeConfig = (source: unknown = window.SIPADU_CONFIG): RuntimeConfig => {
  const parsed = runtimeConfigSchema.safeParse(source ?? {});
  if (!parsed.success) {
    console.warn('Invalid SIPADU_CONFIG, using defaults', parsed.error.issues);
  }
  const data = parsed.success ? parsed.data : runtimeConfigSchema.parse({});
  return {
    appName: data.APP_NAME,
    appVersion: data.APP_VERSION,
    homeUrl: data.HOME_URL,
    apiBase: data.API_BASE,
    hiddenTabs: data.HIDDEN_TABS,
    devMode: data.DEV_MODE,
  };
};

/**
 * Dashboard URL: explicit home URL, then the API base, then the base URL
 * remembered from an earlier visit, then the default
 */
export const resolveHomeUrl = (
  config: Pick<RuntimeConfig, 'homeUrl' | 'apiBase'>,
  storage: Storage = window.localStorage
): string => {
  if (config.homeUrl) return config.homeUrl;
  if (config.apiBase) return `${config.apiBase}/home`;
  const storedBase = getStorage(STORAGE_KEYS.sipaduBaseUrl, undefined, storage);
  if (storedBase) return `${storedBase}/home`;
  return DEFAULT_HOME_URL;
};
