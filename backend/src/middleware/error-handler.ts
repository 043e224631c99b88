import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('api');

export type ErrorBody = {
  status: 'error';
  message: string;
  details?: unknown;
};

export const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof ZodError) {
    const body: ErrorBody = { status: 'error', message: 'validation_failed', details: err.issues };
    return res.status(400).json(body);
  }

  if (err instanceof HttpError) {
    const body: ErrorBody = { status: 'error', message: err.message, details: err.details };
    return res.status(err.statusCode).json(body);
  }

  // ConfigurationError lands here.
  if (err instanceof Error) {
    logger.error(err.stack ?? err.message);
    const body: ErrorBody = { status: 'error', message: err.message };
    return res.status(500).json(body);
  }

  const body: ErrorBody = { status: 'error', message: 'internal_error' };
  return res.status(500).json(body);
};
