/**
 * server — Express adapter around the Panchanga engine.
 *
 * Routes:
 *   GET  /health     liveness probe
 *   POST /panchang   { date: DD/MM/YYYY, time: HH:MM, zone: ±HH:MM }
 *
 * Every response, errors included, uses the ApiResponse envelope from
 * ./response.ts. Each request gets an id, echoed in the envelope and the
 * access log line.
 */

import { randomUUID } from 'node:crypto'
import type { Server } from 'node:http'
import express from 'express'
import type { Express, NextFunction, Request, Response } from 'express'
import type { ServerConfig } from '../config/index.js'
import { createLogger } from '../logging/index.js'
import type { Logger } from '../logging/index.js'
import {
  respondToError,
  respondToHealth,
  respondToPanchang,
  respondToUnknownRoute,
} from './response.js'
import type { HttpReply, ResponseMeta } from './response.js'

export * from './request.js'
export * from './response.js'

export interface AppOptions {
  /** Access and error log. Defaults to an info-level logger scoped 'http'. */
  logger?: Logger
  /** Clock for envelope timestamps */
  now?: () => Date
  /** Request id generator; defaults to random UUIDs */
  requestId?: () => string
}

/** Body size limit for JSON requests; a Panchang request is well under 1 kB */
const JSON_BODY_LIMIT = '16kb'

export function createApp(options: AppOptions = {}): Express {
  const logger = options.logger ?? createLogger('http')
  const now = options.now ?? (() => new Date())
  const nextRequestId = options.requestId ?? randomUUID

  const meta = (res: Response): ResponseMeta => ({ requestId: requestIdOf(res), now: now() })

  const app = express()
  app.disable('x-powered-by')

  // Request id + access log
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = nextRequestId()
    res.locals.requestId = requestId
    const started = performance.now()
    res.on('finish', () => {
      logger.info(`${req.method} ${req.path} ${res.statusCode}`, {
        requestId,
        durationMs: Math.round((performance.now() - started) * 100) / 100,
      })
    })
    next()
  })

  app.use(express.json({ limit: JSON_BODY_LIMIT }))

  app.get('/health', (_req: Request, res: Response) => {
    send(res, respondToHealth(meta(res)))
  })

  app.post('/panchang', (req: Request, res: Response) => {
    const body: unknown = req.body
    send(res, respondToPanchang(body, meta(res)))
  })

  app.use((req: Request, res: Response) => {
    send(res, respondToUnknownRoute(req.method, req.path, meta(res)))
  })

  // Express recognizes error middleware by its four parameters
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    send(res, respondToError(err, meta(res), logger))
  })

  return app
}

function send<T>(res: Response, reply: HttpReply<T>): void {
  res.status(reply.statusCode).json(reply.body)
}

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId
  return typeof id === 'string' ? id : 'unknown'
}

/**
 * Start listening on config.host:config.port.
 * Resolves with the Node server once the socket is bound.
 */
export function startServer(config: ServerConfig): Promise<Server> {
  const logger = createLogger('server', config.logLevel)
  const app = createApp({ logger: createLogger('http', config.logLevel) })

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host)
    server.once('error', reject)
    server.once('listening', () => {
      server.off('error', reject)
      logger.info(`Listening on http://${config.host}:${config.port}`)
      resolve(server)
    })
  })
}
