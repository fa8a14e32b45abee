import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../../shared/utils/logger.js';

const log = createLogger('APIServer');

function clientStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Catch-all error handler. Body-parser rejections keep their 4xx status,
 * anything else is logged and answered with a 500. Responses are always JSON.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const message = err instanceof Error ? err.message : String(err);
  const status = clientStatus(err);

  if (status !== null) {
    log.warn('Rejected request', { status, error: message });
    if (!res.headersSent) {
      res.status(status).json({ error: err instanceof SyntaxError ? 'Malformed JSON body' : message });
    }
    return;
  }

  log.error('Unhandled Express error', { error: message, stack: err instanceof Error ? err.stack : undefined });
  if (!res.headersSent) {
    res.status(500).json({ error: 'Internal server error' });
  }
}
