/**
 * HTTP control surface.
 *
 * Exposes the capability registry over HTTP, next to the bus:
 *
 * - `GET /capabilities` lists capabilities
 * - `POST /capabilities/:name` runs one, with the body as payload
 * - `GET /health` reports session state and load
 *
 * @module Core/Http
 */
import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify'
import { z } from 'zod'
import type { CapabilityRegistry } from '../capabilities/registry'
import type { Dispatcher } from '../dispatch/Dispatcher'
import { HTTP_STATUS_BY_KIND } from '../dispatch/responses'
import { logDebug, logError } from '../logger'
import type { CapabilityResponse, ResponseErrorKind, SessionSnapshot } from '../types'
import { generateUUID } from '../../utils/uuid'

export const CORRELATION_HEADER = 'x-correlation-id'
export const DEADLINE_HEADER = 'x-deadline-ms'

/** What /health needs from the session. */
export interface SessionStatusSource {
  getSnapshot(): SessionSnapshot
}

export interface ApiServerOptions {
  registry: CapabilityRegistry
  dispatcher: Dispatcher
  session?: SessionStatusSource
}

const invokeHeadersSchema = z.object({
  [CORRELATION_HEADER]: z.string().min(1).max(128).optional(),
  [DEADLINE_HEADER]: z.coerce.number().int().positive().optional(),
})

const invokeParamsSchema = z.object({
  name: z.string().min(1),
})

function sendResponse(reply: FastifyReply, response: CapabilityResponse): FastifyReply {
  const status = response.status === 'ok' ? 200 : HTTP_STATUS_BY_KIND[response.error.kind]
  return reply.code(status).header(CORRELATION_HEADER, response.correlationId).send(response)
}

function failure(correlationId: string, kind: ResponseErrorKind, message: string, detail?: unknown): CapabilityResponse {
  return {
    correlationId,
    status: 'error',
    error: detail === undefined ? { kind, message } : { kind, message, detail },
  }
}

export function createApiServer({ registry, dispatcher, session }: ApiServerOptions): FastifyInstance {
  const app = Fastify({ logger: false })

  app.get('/capabilities', async () => ({ capabilities: registry.summaries() }))

  app.post('/capabilities/:name', async (req, reply) => {
    const headers = invokeHeadersSchema.safeParse(req.headers)
    const params = invokeParamsSchema.safeParse(req.params)
    if (!headers.success) {
      return sendResponse(
        reply,
        failure(generateUUID(), 'InvalidInput', 'Invalid request headers', headers.error.issues)
      )
    }
    const correlationId = headers.data[CORRELATION_HEADER] ?? generateUUID()
    if (!params.success) {
      return sendResponse(reply, failure(correlationId, 'InvalidInput', 'Missing capability name'))
    }

    logDebug(`HTTP request ${correlationId} for ${params.data.name} from ${req.ip}`)
    const response = await dispatcher.submit({
      correlationId,
      transport: 'http',
      capability: params.data.name,
      payload: req.body,
      deadlineMs: headers.data[DEADLINE_HEADER],
      from: req.ip,
    })
    return sendResponse(reply, response)
  })

  app.get('/health', async () => {
    const snapshot = session?.getSnapshot()
    return {
      session: snapshot?.state ?? 'Disconnected',
      inFlight: dispatcher.inFlightCount,
      queued: snapshot?.queued ?? 0,
    }
  })

  app.setErrorHandler((err, req, reply) => {
    const correlationId = generateUUID()
    const statusCode = err.statusCode ?? 500
    if (statusCode < 500) {
      return sendResponse(reply, failure(correlationId, 'InvalidInput', err.message))
    }
    logError(`HTTP ${req.method} ${req.url} failed: ${err.message}`)
    return sendResponse(reply, failure(correlationId, 'InternalFault', 'Internal error'))
  })

  return app
}

