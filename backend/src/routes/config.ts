import express from 'express';
import type { AppConfig } from '../config';

export interface RuntimeConfigPayload {
  HOME_URL: string;
  API_BASE: string;
  APP_NAME: string;
  APP_VERSION: string;
  HIDDEN_TABS: string[];
  DEV_MODE: boolean;
}

export const toRuntimeConfig = (config: AppConfig): RuntimeConfigPayload => ({
  HOME_URL: config.sipadu.homeUrl,
  API_BASE: config.sipadu.apiBase,
  APP_NAME: config.app.name,
  APP_VERSION: config.app.version,
  HIDDEN_TABS: config.app.hiddenTabs,
  DEV_MODE: config.sipadu.devMode
});

// JSON is valid JS, but "<" must not close the surrounding script element
export const renderConfigScript = (payload: RuntimeConfigPayload): string =>
  `window.SIPADU_CONFIG = ${JSON.stringify(payload).replace(/</g, '\\u003c')};\n`;

/**
 * Runtime configuration for the overlay, as a script (`/config.js`) and as JSON
 */
export const createConfigRouter = (config: AppConfig) => {
  const router = express.Router();
  const payload = toRuntimeConfig(config);

  router.get('/config.js', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.type('application/javascript').send(renderConfigScript(payload));
  });

  router.get('/api/config', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json({ success: true, data: payload });
  });

  return router;
};
