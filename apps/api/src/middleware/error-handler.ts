import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { UnknownScenarioError, isHarnessError } from '@anomaly-lab/domain';

/**
 * Maps failures to HTTP:
 *   ZodError             -> 400 validation_error
 *   UnknownScenarioError -> 404
 *   HarnessError         -> 502; a run only throws when the store itself failed
 *   Error with `status`  -> that status, otherwise 500
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.issues });
    return;
  }
  if (err instanceof UnknownScenarioError) {
    res.status(err.status).json({ error: err.message, scenarioId: err.scenarioId });
    return;
  }
  if (isHarnessError(err)) {
    console.error(`[api] ${req.method} ${req.originalUrl} store failure`, err);
    res.status(502).json({ error: err.message, kind: err.kind });
    return;
  }
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[api] unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  res.status(500).json({ error: 'Internal server error' });
}
