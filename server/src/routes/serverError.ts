import type { Response } from 'express';
import { createLogger, getRequestId } from '../logger';

const log = createLogger('API');

/** Logs an unexpected failure and answers with the generic 500 envelope. */
export function serverError(res: Response, context: string, err: unknown): void {
  log.error(`${context} error`, { error: err, requestId: getRequestId(res) });
  const message = err instanceof Error ? err.message : String(err);
  res.status(500).json({ success: false, error: `Server error: ${message}` });
}
