/**
 * Error Classification Tests
 *
 * Each domain failure keeps a stable code and HTTP status, and only
 * operational errors expose their message to clients.
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  classifyError,
  ERROR_CODES,
  FetchFailureError,
  formatErrorForLog,
  getClientMessage,
  NodeNotFoundError,
  ParseFailureError,
  RequestAbortedError,
  StoreFailureError,
  UnbalancedTraitDataError,
} from '../errors'

describe('domain errors', () => {
  it('name themselves after their class', () => {
    expect(new ParseFailureError('empty').name).toBe('ParseFailureError')
    expect(new StoreFailureError('locked').name).toBe('StoreFailureError')
  })

  it('describe the missing node with its selector', () => {
    const error = new NodeNotFoundError('h2')
    expect(error.message).toBe('could not find the HTML node: h2')
    expect(error.selector).toBe('h2')
    expect(error.code).toBe(ERROR_CODES.NODE_NOT_FOUND)
  })

  it('report all three trait counts when unbalanced', () => {
    const error = new UnbalancedTraitDataError({ titles: 3, percentages: 2, tiers: 3 })
    expect(error.message).toBe(
      'rarity nodes found are unbalanced (titles=3, percentages=2, tiers=3)'
    )
  })

  it('map fetch timeouts to 504 and other fetch failures to 502', () => {
    const timeout = new FetchFailureError('timed out', 'timeout')
    expect(timeout.code).toBe(ERROR_CODES.FETCH_TIMEOUT)
    expect(timeout.category).toBe('timeout')
    expect(timeout.statusCode).toBe(504)

    const blocked = new FetchFailureError('captcha', 'blocked', 403)
    expect(blocked.code).toBe(ERROR_CODES.FETCH_FAILURE)
    expect(blocked.category).toBe('external')
    expect(blocked.statusCode).toBe(502)
    expect(blocked.upstreamStatusCode).toBe(403)
    expect(blocked.isRetryable).toBe(true)
  })

  it('keep the cause of store failures', () => {
    const cause = new Error('SQLITE_BUSY')
    expect(new StoreFailureError('cache write failed', { cause }).cause).toBe(cause)
  })
})

describe('classifyError', () => {
  it('classifies domain errors as operational', () => {
    const classified = classifyError(new ParseFailureError('source document is empty'))
    expect(classified).toMatchObject({
      category: 'extraction',
      code: ERROR_CODES.PARSE_FAILURE,
      message: 'source document is empty',
      statusCode: 500,
      isOperational: true,
      isRetryable: false,
    })
  })

  it('classifies aborted requests with the client-closed status', () => {
    const classified = classifyError(new RequestAbortedError('client left'))
    expect(classified.statusCode).toBe(499)
    expect(classified.category).toBe('aborted')
  })

  it('classifies ZodError as validation with per-field issues', () => {
    const result = z.object({ name: z.string() }).safeParse({ name: 123 })
    expect(result.success).toBe(false)
    if (result.success) return

    const classified = classifyError(result.error)
    expect(classified.category).toBe('validation')
    expect(classified.code).toBe(ERROR_CODES.VALIDATION_FAILED)
    expect(classified.statusCode).toBe(400)
    expect(classified.details).toEqual({
      issues: [{ path: 'name', message: 'Expected string, received number', code: 'invalid_type' }],
    })
  })

  it('classifies plain errors as internal', () => {
    const classified = classifyError(new Error('boom'))
    expect(classified).toMatchObject({
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: 'boom',
      statusCode: 500,
      isOperational: false,
    })
  })

  it('classifies thrown non-errors', () => {
    const classified = classifyError('string failure')
    expect(classified.message).toBe('string failure')
    expect(classified.originalError).toBeUndefined()
  })
})

describe('formatErrorForLog', () => {
  it('flattens the classification into log fields', () => {
    const error = new StoreFailureError('cache read failed: disk full')
    const fields = formatErrorForLog(classifyError(error))

    expect(fields).toMatchObject({
      error_category: 'storage',
      error_code: 'STORE_FAILURE',
      error_message: 'cache read failed: disk full',
      error_status_code: 500,
      error_is_operational: true,
      error_is_retryable: false,
      error_name: 'StoreFailureError',
    })
    expect(fields.error_stack).toBe(error.stack)
  })

  it('omits stack fields when nothing was thrown as an Error', () => {
    const fields = formatErrorForLog(classifyError(42))
    expect(fields).not.toHaveProperty('error_stack')
    expect(fields).not.toHaveProperty('error_name')
  })
})

describe('getClientMessage', () => {
  it('passes operational messages through', () => {
    expect(getClientMessage(classifyError(new NodeNotFoundError('h2')))).toBe(
      'could not find the HTML node: h2'
    )
  })

  it('hides internal messages', () => {
    expect(getClientMessage(classifyError(new Error('secret path /var/db')))).toBe(
      'An unexpected error occurred'
    )
  })
})
