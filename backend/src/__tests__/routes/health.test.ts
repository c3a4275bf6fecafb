import request from 'supertest';
import { createApp } from '../../app';
import { QaServiceClient } from '../../services/QaServiceClient';
import { SipaduAuthService } from '../../services/SipaduAuthService';
import { makeConfig, QA_URL, SIPADU_BASE, createFetchMock } from '../helpers';

const buildApp = (qaUrl?: string) => {
  const config = makeConfig(qaUrl ? { QA_SERVICE_URL: qaUrl } : {});
  const fetchImpl = createFetchMock();
  return createApp(config, {
    auth: new SipaduAuthService({
      validateEndpoint: config.sipadu.validateEndpoint,
      timeoutMs: 1000,
      devMode: false,
      fetchImpl
    }),
    qa: new QaServiceClient({ serviceUrl: config.qa.serviceUrl, timeoutMs: 1000, fetchImpl })
  });
};

describe('Health Routes', () => {
  describe('GET /api/health', () => {
    it('should return healthy status', async () => {
      const res = await request(buildApp()).get('/api/health');

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        status: 'healthy',
        version: '2.1.0',
        upstreams: { sipadu: SIPADU_BASE, qa: 'not_configured' },
        devMode: false
      });
      expect(typeof res.body.uptime).toBe('number');
    });

    it('should report a configured QA service', async () => {
      const res = await request(buildApp(QA_URL)).get('/api/health');

      expect(res.body.upstreams.qa).toBe('configured');
    });

    it('should return valid timestamp format', async () => {
      const res = await request(buildApp()).get('/api/health');

      const timestamp = new Date(res.body.timestamp);
      expect(isNaN(timestamp.getTime())).toBe(false);
    });
  });

  describe('GET /api/health/live', () => {
    it('should return alive status for liveness probe', async () => {
      const res = await request(buildApp()).get('/api/health/live');

      expect(res.status).toBe(200);
      expect(res.body).toHaveProperty('alive', true);
      expect(res.body).toHaveProperty('timestamp');
    });
  });

  describe('unknown routes', () => {
    it('should answer 404 NOT_FOUND', async () => {
      const res = await request(buildApp()).get('/api/nope');

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'Route GET /api/nope not found'
      });
    });
  });
});
