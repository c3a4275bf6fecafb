import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger, logRequest } from '../utils/logger';

// Extend Express Request type to include requestId
declare global {
  namespace Express {
    interface Request {
      requestId: string;
      startTime: number;
    }
  }
}

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.get('x-request-id') || uuidv4();
  req.requestId = requestId;
  req.startTime = Date.now();

  // Echo the id back for tracing
  res.setHeader('X-Request-ID', requestId);

  logger.debug('Incoming request', {
    requestId,
    method: req.method,
    path: req.path,
    query: Object.keys(req.query).length > 0 ? req.query : undefined,
    ip: req.ip || req.socket.remoteAddress
  });

  res.on('finish', () => {
    logRequest({
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - req.startTime,
      userAgent: req.get('user-agent')?.substring(0, 100)
    });
  });

  next();
};

export default requestLogger;
