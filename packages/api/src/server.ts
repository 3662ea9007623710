import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify'
import fastifyEnv from '@fastify/env'
import { createLogger, type Gateway, type HealthCheckResult, type Logger } from '@smsbridge/core'
import { receiverRoutes } from './routes/receivers.js'

export interface ServerOptions {
  gateway: Gateway
  /** Defaults to the PORT env var or 7380 */
  port?: number
  /** Defaults to the HOST env var or 0.0.0.0 */
  host?: string
  /** Path prefix of the callback routes; defaults to RECEIVER_PREFIX or '/' */
  prefix?: string
  /** Optional shared logger; if not provided, one is created from logLevel/env */
  logger?: Logger
  /** Log level (e.g. 'info', 'debug'); defaults to process.env.LOG_LEVEL or 'info' */
  logLevel?: string
}

/**
 * Server settings read from the environment by @fastify/env
 */
export interface ServerEnv {
  PORT: number
  HOST: string
  RECEIVER_PREFIX: string
}

/** '/sms/' -> '/sms', '/' -> '' */
export function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, '')
  if (trimmed === '') return ''
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

/**
 * Create and configure Fastify server instance
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const logLevel = (options.logLevel ?? process.env.LOG_LEVEL ?? 'info').toLowerCase()
  const logger: FastifyBaseLogger =
    options.logger ??
    (await createLogger({
      serviceName: 'smsbridge-api',
      level: logLevel,
    }))
  const server = Fastify({ loggerInstance: logger })

  await server.register(fastifyEnv, {
    schema: {
      type: 'object',
      required: [],
      properties: {
        PORT: { type: 'number', default: 7380 },
        HOST: { type: 'string', default: '0.0.0.0' },
        RECEIVER_PREFIX: { type: 'string', default: '/' },
      },
    },
  })

  const { gateway } = options
  server.decorate('gateway', gateway)

  const prefix = normalizePrefix(options.prefix ?? server.config.RECEIVER_PREFIX)
  await server.register(receiverRoutes, { gateway, prefix })

  // Health check endpoint
  // Reports the configuration state of every provider
  server.get('/health', async (_request, reply) => {
    const checks: Record<string, HealthCheckResult> = {}
    let healthy = true

    for (const [alias, provider] of gateway.entries()) {
      if (!provider.healthCheck) {
        checks[alias] = { ok: true }
        continue
      }
      try {
        checks[alias] = await provider.healthCheck()
      } catch (err: unknown) {
        checks[alias] = { ok: false, error: err instanceof Error ? err.message : String(err) }
      }
      if (!checks[alias].ok) healthy = false
    }

    return reply.code(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    })
  })

  return server
}

declare module 'fastify' {
  interface FastifyInstance {
    gateway: Gateway
    config: ServerEnv
  }
}

/**
 * Start the server
 */
export async function startServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = await createServer(options)

  // Graceful shutdown handler
  const shutdown = async (signal: string) => {
    server.log.info({ signal }, 'Graceful shutdown initiated...')

    try {
      await server.close()
      server.log.info('Shutdown complete')
      process.exit(0)
    } catch (err) {
      server.log.error({ err }, 'Error during shutdown')
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))

  const address = await server.listen({
    port: options.port ?? server.config.PORT,
    host: options.host ?? server.config.HOST,
  })
  server.log.info(`Server listening on ${address}`)

  return server
}
