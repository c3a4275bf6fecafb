import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs-extra';

const isTest = process.env.NODE_ENV === 'test';
const logsDir = process.env.LOG_DIR || path.join(__dirname, '../../logs');

const REDACTED = '[redacted]';
const SECRET_KEYS = new Set(['token', 'access_token', 'authorization', 'password']);
// SIPADU tokens travel in the query string of the validate URL
const TOKEN_PARAM = /([?&](?:access_)?token=)[^&#\s"]+/gi;
const MAX_DEPTH = 5;

/**
 * Copy of a log value with session tokens masked: secret keys at any depth
 * and `token=` parameters inside strings.
 */
export const redactValue = (value: unknown, depth = 0): unknown => {
  if (typeof value === 'string') return value.replace(TOKEN_PARAM, `$1${REDACTED}`);
  if (value === null || typeof value !== 'object' || value instanceof Error || depth >= MAX_DEPTH) {
    return value;
  }
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));

  const copy: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    copy[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(inner, depth + 1);
  }
  return copy;
};

const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = SECRET_KEYS.has(key.toLowerCase()) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

const consoleFormat = winston.format.combine(
  redactSecrets(),
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}: ${message}${metaStr}`;
  })
);

const fileFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: isTest && process.env.LOG_IN_TESTS !== 'true'
  })
];

if (!isTest) {
  fs.ensureDirSync(logsDir);
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: fileFormat
    }),
    new DailyRotateFile({
      filename: path.join(logsDir, 'sipadu-ai-tools-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '14d',
      format: fileFormat
    })
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'sipadu-ai-tools' },
  transports
});

/** Level for a finished exchange: server faults are errors, client faults warnings */
export const levelForStatus = (status: number): 'error' | 'warn' | 'http' => {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'http';
};

export interface RequestLogEntry {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  userAgent?: string;
}

export const logRequest = ({ durationMs, ...entry }: RequestLogEntry) => {
  logger.log(levelForStatus(entry.statusCode), 'Request completed', {
    ...entry,
    duration: `${durationMs}ms`
  });
};

export type UpstreamTarget = 'sipadu' | 'qa';

export interface UpstreamCall {
  target: UpstreamTarget;
  operation: string;
  status: number;
  durationMs: number;
  requestId?: string;
}

export const logUpstreamCall = ({ durationMs, ...call }: UpstreamCall, meta: object = {}) => {
  const level = call.status >= 400 ? 'warn' : 'info';
  logger.log(level, `Upstream ${call.target} ${call.operation}`, {
    ...call,
    duration: `${durationMs}ms`,
    ...meta
  });
};

export const logError = (requestId: string | undefined, error: Error, context?: object) => {
  logger.error(error.message, {
    requestId,
    errorName: error.name,
    stack: error.stack,
    ...context
  });
};

// Chat answers come from a model behind the QA service; anything past this is worth a look
const SLOW_CHAT_MS = 30_000;

export const logPerformance = (name: string, durationMs: number, meta?: object, slowMs = SLOW_CHAT_MS) => {
  const level = durationMs > slowMs ? 'warn' : 'debug';
  logger.log(level, durationMs > slowMs ? `Slow ${name}` : `${name} done`, {
    duration: `${durationMs}ms`,
    ...meta
  });
};

export default logger;
