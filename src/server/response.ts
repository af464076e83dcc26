/**
 * Response envelopes for the HTTP routes.
 *
 * The functions here are transport-free: they take the request body and
 * request metadata and return the status code and JSON body to send.
 */

import type { PanchangaResult } from '../types.js'
import type { Logger } from '../logging/index.js'
import { computePanchanga, formatTithi } from '../api/index.js'
import { parsePanchangRequest } from './request.js'

export interface ApiResponse<T> {
  status: 'success' | 'error' | 'healthy'
  statusCode: number
  message?: string
  data?: T
  /** ISO-8601 time the response was built */
  timestamp: string
  requestId: string
}

export interface HttpReply<T> {
  statusCode: number
  body: ApiResponse<T>
}

export interface ResponseMeta {
  requestId: string
  now: Date
}

/** Panchanga as sent over the wire */
export interface PanchangData {
  /** "<Name>, <Paksha> Paksha" */
  tithi: string
  paksha: string
  nakshatra: string
  yoga: string
  karana: string
  rashi: string
}

export function toPanchangData(result: PanchangaResult): PanchangData {
  return {
    tithi: formatTithi(result),
    paksha: result.paksha,
    nakshatra: result.nakshatraName,
    yoga: result.yogaName,
    karana: result.karanaName,
    rashi: result.rashiName,
  }
}

function errorReply(statusCode: number, message: string, meta: ResponseMeta): HttpReply<never> {
  return {
    statusCode,
    body: {
      status: 'error',
      statusCode,
      message,
      timestamp: meta.now.toISOString(),
      requestId: meta.requestId,
    },
  }
}

/**
 * POST /panchang
 *
 *   200  Panchanga computed
 *   400  body is not { date: DD/MM/YYYY, time: HH:MM, zone: ±HH:MM }
 *   422  the engine rejected the moment (DomainError)
 */
export function respondToPanchang(body: unknown, meta: ResponseMeta): HttpReply<PanchangData> {
  const request = parsePanchangRequest(body)
  if (!request.ok) return errorReply(400, request.error, meta)

  const result = computePanchanga(request.value)
  if (!result.ok) return errorReply(422, result.error.message, meta)

  return {
    statusCode: 200,
    body: {
      status: 'success',
      statusCode: 200,
      message: 'Panchang data fetched successfully',
      data: toPanchangData(result.value),
      timestamp: meta.now.toISOString(),
      requestId: meta.requestId,
    },
  }
}

/** GET /health */
export function respondToHealth(meta: ResponseMeta): HttpReply<never> {
  return {
    statusCode: 200,
    body: {
      status: 'healthy',
      statusCode: 200,
      message: 'Service is running',
      timestamp: meta.now.toISOString(),
      requestId: meta.requestId,
    },
  }
}

/** Any route not registered above */
export function respondToUnknownRoute(method: string, path: string, meta: ResponseMeta): HttpReply<never> {
  return errorReply(404, `Route not found: ${method} ${path}`, meta)
}

/**
 * Errors thrown while handling a request.
 *
 * Client errors raised by the body parser (status 4xx) are passed back to
 * the client; everything else is logged and answered with a bare 500.
 */
export function respondToError(err: unknown, meta: ResponseMeta, logger: Logger): HttpReply<never> {
  const status = clientErrorStatus(err)
  if (status !== null) {
    const message =
      errorType(err) === 'entity.parse.failed' ? 'Malformed JSON body'
      : err instanceof Error ? err.message
      : 'Bad request'
    return errorReply(status, message, meta)
  }

  logger.error('Unhandled error', {
    requestId: meta.requestId,
    error: err instanceof Error ? err.stack ?? err.message : String(err),
  })
  return errorReply(500, 'Internal server error', meta)
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null
  const { status } = err
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null
}

function errorType(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('type' in err)) return null
  return typeof err.type === 'string' ? err.type : null
}
