import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify'
import { trace, SpanStatusCode } from '@opentelemetry/api'
import {
  isDecodeError,
  maskWireFields,
  recordCallback,
  type CallbackKind,
  type Gateway,
  type InboundReceiver,
  type WireFields,
} from '@smsbridge/core'

const tracer = trace.getTracer('smsbridge-receiver')

export interface ReceiverRoutesOptions {
  gateway: Gateway
}

/** Raw query string of the request, without the leading "?" */
function rawQuery(request: FastifyRequest): string {
  const url = request.raw.url ?? ''
  const index = url.indexOf('?')
  return index === -1 ? '' : url.slice(index + 1)
}

/**
 * Callback parameters from both the query string and a form body.
 * Body values win over query values with the same name.
 */
function callbackFields(request: FastifyRequest, receiver: InboundReceiver): WireFields {
  const fields = receiver.parseParams(rawQuery(request))
  const body = request.body
  if (body instanceof Uint8Array) {
    Object.assign(fields, receiver.parseParams(body))
  } else if (typeof body === 'string') {
    Object.assign(fields, receiver.parseParams(body))
  }
  return fields
}

/**
 * Inbound callback routes
 *
 * For every gateway provider with a receiver, registers
 * `GET|POST {prefix}{alias}/im` (message received) and
 * `GET|POST {prefix}{alias}/status` (delivery status).
 *
 * Callback parameters are decoded from the raw request, in the provider's
 * charset, not as UTF-8. A callback that fails to decode is logged and
 * answered with 200 so the gateway does not keep redelivering it; it is not
 * dispatched. Errors thrown by application listeners produce a 500.
 */
export const receiverRoutes: FastifyPluginAsync<ReceiverRoutesOptions> = async (fastify, opts) => {
  const { gateway } = opts

  // Form bodies are decoded by the provider, so keep them as raw bytes
  fastify.addContentTypeParser(
    'application/x-www-form-urlencoded',
    { parseAs: 'buffer' },
    (_request, body, done) => done(null, body),
  )

  for (const [alias, provider] of gateway.entries()) {
    const receiver = provider.receiver
    if (!receiver) continue

    const handle = (kind: CallbackKind) => async (request: FastifyRequest, reply: FastifyReply) =>
      tracer.startActiveSpan(`receiver.${kind}`, async (span) => {
        span.setAttribute('messaging.system', provider.name)
        span.setAttribute('messaging.operation', 'receive')
        span.setAttribute('smsbridge.provider.alias', alias)

        const fields = callbackFields(request, receiver)

        try {
          if (kind === 'message') {
            const message = receiver.decodeMessage(fields, alias)
            await gateway.receiveMessage(message)
          } else {
            const report = receiver.decodeStatus(fields, alias)
            await gateway.receiveStatus(report)
          }
        } catch (error: unknown) {
          const err = error instanceof Error ? error : new Error(String(error))
          span.recordException(err)

          if (!isDecodeError(error)) {
            span.setStatus({ code: SpanStatusCode.ERROR, message: err.message })
            span.end()
            throw error
          }

          recordCallback(alias, kind, 'rejected')
          span.end()
          request.log.warn(
            { err: error, provider: alias, kind, fields: maskWireFields(fields) },
            'Receiver: dropped malformed callback',
          )
          return reply.code(200).send()
        }

        recordCallback(alias, kind, 'dispatched')
        span.setStatus({ code: SpanStatusCode.OK })
        span.end()
        request.log.debug({ provider: alias, kind }, 'Receiver: callback dispatched')
        return reply.code(200).send()
      })

    fastify.route({ method: ['GET', 'POST'], url: `/${alias}/im`, handler: handle('message') })
    fastify.route({ method: ['GET', 'POST'], url: `/${alias}/status`, handler: handle('status') })
    fastify.log.debug({ provider: alias }, 'Receiver routes registered')
  }
}
