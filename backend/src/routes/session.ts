import express from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { validateBody } from '../middleware/validate';
import { sessionValidateSchema } from '../validation/schemas';
import type { SipaduAuthService } from '../services/SipaduAuthService';

/**
 * POST /api/session/validate
 *
 * Always answers 200 with the outcome in `data.status` (DEV_MODE, NO_TOKEN,
 * SUCCESS, FAILED); only an unreachable SIPADU API is an HTTP error.
 */
export const createSessionRouter = (auth: SipaduAuthService) => {
  const router = express.Router();

  router.post(
    '/validate',
    validateBody(sessionValidateSchema),
    asyncHandler(async (req, res) => {
      const { token } = sessionValidateSchema.parse(req.body);
      const result = await auth.checkToken(token, req.requestId);
      res.json({ success: true, data: result });
    })
  );

  return router;
};
