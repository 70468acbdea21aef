/**
 * HTTP Request Logger Middleware
 *
 * ONE log entry per request, written when the response finishes
 * (event name: http.request.end), plus the error handler that turns any
 * thrown value into the JSON error body.
 */

import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express'
import { getRequestContext, type ILogger } from '@rarity-lens/logger'
import { classifyError, formatErrorForLog, getClientMessage } from '../lib/errors'

const SKIP_PATHS = new Set(['/health', '/favicon.ico'])

function calculateLatencyMs(startTime: bigint): number {
  const latencyNs = process.hrtime.bigint() - startTime
  return Math.round((Number(latencyNs) / 1_000_000) * 100) / 100
}

/**
 * Matched route pattern (e.g. /api/:collection/:id), falling back to the
 * raw path with numeric segments collapsed.
 */
function getRoute(req: Request): string {
  const routePath: unknown = req.route?.path
  if (typeof routePath === 'string') {
    return `${req.baseUrl || ''}${routePath}`
  }
  return req.path.replace(/\/\d+(?=\/|$)/g, '/:id')
}

export function createRequestLogger(log: ILogger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (SKIP_PATHS.has(req.path)) {
      return next()
    }

    const startTime = process.hrtime.bigint()
    const requestId = getRequestContext()?.requestId

    res.on('finish', () => {
      const logEntry = {
        event_name: 'http.request.end',
        http: {
          method: req.method,
          route: getRoute(req),
          path: req.path,
          status_code: res.statusCode,
          latency_ms: calculateLatencyMs(startTime),
          cache: res.getHeader('X-Cache'),
        },
        request_id: requestId,
      }

      if (res.statusCode >= 500) {
        log.error('Request completed with error', logEntry)
      } else if (res.statusCode >= 400) {
        log.warn('Request completed with client error', logEntry)
      } else {
        log.info('Request completed', logEntry)
      }
    })

    next()
  }
}

/**
 * Final error handler. Logs the classified error, then answers with
 * `{ errorCode, message, requestId }`.
 */
export function createErrorHandler(log: ILogger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    const classified = classifyError(err)
    const requestId = getRequestContext()?.requestId ?? 'unknown'

    const meta = {
      event_name: 'http.request.error',
      http: { method: req.method, route: getRoute(req), path: req.path },
      request_id: requestId,
      ...formatErrorForLog(classified),
    }
    if (classified.statusCode >= 500) {
      log.error('Request failed', meta)
    } else {
      log.warn('Request rejected', meta)
    }

    if (res.headersSent) {
      return next(err)
    }

    const body: Record<string, unknown> = {
      errorCode: classified.code,
      message: getClientMessage(classified),
      requestId,
    }
    if (classified.code === 'VALIDATION_FAILED' && classified.details?.issues) {
      body.validationErrors = classified.details.issues
    }

    res.status(classified.statusCode).json(body)
  }
}
