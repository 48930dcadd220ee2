import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger/index.js';
import { HttpError } from '../../shared/errors.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    return res.status(400).json({
      message: 'Validation failed',
      issues: err.issues,
    });
  }

  // body-parser and similar middleware attach a numeric status to plain errors
  const status =
    err instanceof HttpError
      ? err.status
      : typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;
  const message = err instanceof Error ? err.message : String(err);
  const details = err instanceof HttpError ? err.details : undefined;

  if (status < 500) {
    logger.warn({ err, status, path: req.path, method: req.method }, 'Request rejected');
    return res.status(status).json({ message, requestId: req.id, details });
  }

  logger.error({ err, status, path: req.path, method: req.method }, 'Unhandled error');

  res.status(status).json({
    message: 'Internal server error',
    requestId: req.id,
  });
};
