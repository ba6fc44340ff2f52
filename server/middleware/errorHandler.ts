import type { NextFunction, Request, Response } from 'express';
import { SimulationConfigError } from '../../simulation/engine/validation.js';
import { HttpError } from '../types.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, `Route not found: ${req.method} ${req.path}`));
}

// Errors raised by express middleware (body-parser's malformed JSON, oversized payloads)
// carry an http-errors style status and mark client-safe ones with expose.
function exposedStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err) || !('expose' in err)) return undefined;
  return typeof err.status === 'number' && err.expose === true ? err.status : undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SimulationConfigError) {
    res.status(400).json({ error: err.message, issues: err.issues });
    return;
  }

  const status = err instanceof HttpError ? err.status : (exposedStatus(err) ?? 500);
  const message = err instanceof Error ? err.message : 'Unexpected server error';
  if (status >= 500) console.error('[server] unhandled error:', err);
  res.status(status).json({ error: message });
}
