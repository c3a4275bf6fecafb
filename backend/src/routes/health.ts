import express from 'express';

export interface HealthInfo {
  version: string;
  sipaduApiBase: string;
  qaConfigured: boolean;
  devMode: boolean;
}

export const createHealthRouter = (info: HealthInfo) => {
  const router = express.Router();

  /**
   * Basic health check with the upstreams this instance talks to
   */
  router.get('/', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      version: info.version,
      upstreams: {
        sipadu: info.sipaduApiBase,
        qa: info.qaConfigured ? 'configured' : 'not_configured'
      },
      devMode: info.devMode
    });
  });

  // Liveness probe, no upstream checks
  router.get('/live', (_req, res) => {
    res.json({
      alive: true,
      timestamp: new Date().toISOString()
    });
  });

  return router;
};
