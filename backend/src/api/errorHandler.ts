/**
 * Express error handler - maps MonitorError codes to HTTP statuses
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { findMonitorError } from '../errors.js';
import type { Logger } from '../logger.js';

export function statusForCode(code: string): number {
  if (code.startsWith('VALIDATION_')) return 400;
  if (code === 'MACHINE_NOT_FOUND') return 404;
  if (code === 'DEVICE_NOT_RUNNING') return 409;
  if (code.startsWith('PROVIDER_')) return 502;
  return 500;
}

export function createErrorHandler(logger: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      logger.debug({ issues: err.issues }, 'Request validation failed');
      res.status(400).json({
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: err.issues,
      });
      return;
    }

    const monitorError = findMonitorError(err);
    if (monitorError) {
      const status = statusForCode(monitorError.code);
      const log = status >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
      log({ err, code: monitorError.code }, `Request error: ${monitorError.message}`);
      res.status(status).json({ error: monitorError.message, code: monitorError.code });
      return;
    }

    logger.error({ err }, 'Unhandled request error');
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  };
}
