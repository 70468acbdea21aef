import type { NextFunction, Request, Response } from 'express'
import { resolveRequestId, runWithRequestContext } from '@rarity-lens/logger'

export const REQUEST_ID_HEADER = 'X-Request-Id'

/**
 * Opens the per-request logging context. Must run before anything that
 * logs so every line carries the same requestId.
 */
export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER))
  res.setHeader(REQUEST_ID_HEADER, requestId)
  runWithRequestContext({ requestId, method: req.method, path: req.path }, () => next())
}
