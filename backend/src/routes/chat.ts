import express from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { validateBody } from '../middleware/validate';
import { chatMessageSchema } from '../validation/schemas';
import { logPerformance } from '../utils/logger';
import type { QaServiceClient } from '../services/QaServiceClient';

export const createChatRouter = (qa: QaServiceClient) => {
  const router = express.Router();

  // Ask the hosting QA service and relay its answer with the evidence items
  router.post(
    '/',
    validateBody(chatMessageSchema),
    asyncHandler(async (req, res) => {
      const input = chatMessageSchema.parse(req.body);
      const startTime = Date.now();
      const answer = await qa.ask(input, req.requestId);
      logPerformance('chat.ask', Date.now() - startTime, {
        requestId: req.requestId,
        evidenceCount: answer.evidence.length
      });
      res.json({ success: true, data: answer });
    })
  );

  return router;
};
