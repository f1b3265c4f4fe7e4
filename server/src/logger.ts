import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { LogLevel } from './config';

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(raw: string): raw is LogLevel {
  return raw in LEVELS;
}

let threshold: number = (() => {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
})();

export function setLogLevel(level: LogLevel): void {
  threshold = LEVELS[level];
}

export function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return { message: String(error) };
}

function normalizeMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) return undefined;
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return Object.keys(out).length ? out : undefined;
}

function write(level: LogLevel, tag: string, message: string, meta?: LogMeta): void {
  if (LEVELS[level] > threshold) return;
  const normalized = normalizeMeta(meta);
  const head = `${new Date().toISOString()} [${level.toUpperCase()}] [${tag}] ${message}`;
  const line = normalized ? `${head} ${JSON.stringify(normalized)}` : head;

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(tag: string): Logger {
  return {
    debug: (message, meta) => write('debug', tag, message, meta),
    info: (message, meta) => write('info', tag, message, meta),
    warn: (message, meta) => write('warn', tag, message, meta),
    error: (message, meta) => write('error', tag, message, meta),
  };
}

const apiLog = createLogger('API');

export function getRequestId(res: Response): string | undefined {
  const id: unknown = res.locals.requestId;
  return typeof id === 'string' ? id : undefined;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers['x-request-id'];
  const requestId = typeof incoming === 'string' && incoming ? incoming : uuidv4();
  const start = process.hrtime.bigint();
  // Routers rewrite req.url under their mount point; keep the full path.
  const path = req.originalUrl.split('?')[0];

  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);
  apiLog.debug(`${req.method} ${path}`, { requestId });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    apiLog.info(`${req.method} ${path} ${res.statusCode}`, {
      requestId,
      durationMs: Math.round(durationMs * 100) / 100,
    });
  });

  next();
}
