import type { ErrorRequestHandler } from 'express';
import { AppError } from '../errors.js';

/**
 * Maps thrown errors to `{ error }` JSON responses.
 * AppError subclasses carry their own status; anything else is a 500.
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof AppError) {
    console.error(`[http] ${req.method} ${req.path} -> ${err.status} ${err.name}: ${err.message}`);
    res.status(err.status).json({ error: err.message });
    return;
  }

  // express.json() parse failures arrive with a 4xx status attached.
  const status = typeof err === 'object' && err !== null && 'status' in err ? Number(err.status) : NaN;
  if (status >= 400 && status < 500) {
    res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
    return;
  }

  console.error(`[http] ${req.method} ${req.path} -> 500`, err);
  res.status(500).json({ error: 'Internal server error' });
};
