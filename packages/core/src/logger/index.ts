import pino from 'pino'
import { context, trace } from '@opentelemetry/api'

/**
 * Logger configuration options
 */
export interface LoggerOptions {
  /**
   * Log level (trace, debug, info, warn, error, fatal)
   * @default 'info'
   */
  level?: string

  /**
   * Service name
   * @default 'smsbridge'
   */
  serviceName?: string

  /**
   * Service version
   * @default '0.1.0'
   */
  serviceVersion?: string

  /**
   * Enable pretty printing (for development)
   * @default false in production, true in development
   */
  pretty?: boolean
}

const defaultPinoFormatters: pino.LoggerOptions['formatters'] = {
  level: (label) => ({ level: label }),
  log: (object) => {
    const span = trace.getSpan(context.active())
    if (span) {
      const spanContext = span.spanContext()
      return {
        ...object,
        traceId: spanContext.traceId,
        spanId: spanContext.spanId,
        traceFlags: spanContext.traceFlags,
      }
    }
    return object
  },
}

/**
 * Serialize error for logging without stack trace.
 * With LOG_LEVEL=debug the stack goes to a separate debug line (see errorStackHooks).
 */
function errSerializer(err: unknown): Record<string, unknown> | null {
  if (err == null) return null
  if (!(err instanceof Error)) return { type: 'Unknown', message: String(err) }
  const out: Record<string, unknown> = {
    type: err.name,
    message: err.message,
  }
  if ('code' in err && err.code != null) out.code = err.code
  if ('statusCode' in err && err.statusCode != null) out.statusCode = err.statusCode
  if (err.cause != null) {
    out.cause =
      err.cause instanceof Error
        ? { type: err.cause.name, message: err.cause.message }
        : String(err.cause)
  }
  return out
}

const defaultSerializers: pino.LoggerOptions['serializers'] = {
  err: errSerializer,
}

const ERROR_STACK_MSG = 'Error stack trace'

function errorOf(first: unknown): Error | null {
  if (typeof first !== 'object' || first === null || !('err' in first)) return null
  return first.err instanceof Error ? first.err : null
}

/**
 * When .error() is called with an object containing `err` and the logger level
 * allows debug, a separate debug line carries the stack trace.
 * Hooks are inherited by child loggers.
 */
const errorStackHooks: pino.LoggerOptions['hooks'] = {
  logMethod(inputArgs, method, level) {
    method.apply(this, inputArgs)
    if (level !== pino.levels.values.error) return
    const err = errorOf(inputArgs[0])
    if (err?.stack && this.isLevelEnabled('debug')) {
      this.debug({ stack: err.stack }, ERROR_STACK_MSG)
    }
  },
}

function isLevel(value: string): value is pino.Level {
  return Object.prototype.hasOwnProperty.call(pino.levels.values, value)
}

function resolveLevel(options: LoggerOptions): string {
  return (options.level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase()
}

/**
 * Create a Pino logger instance with OpenTelemetry trace context integration.
 * Injects traceId and spanId when a span is active. If OTEL_EXPORTER_OTLP_LOGS_ENDPOINT
 * is set, logs are also sent to that OTLP endpoint via pino-opentelemetry-transport.
 */
export async function createLogger(options: LoggerOptions = {}): Promise<pino.Logger> {
  const level = resolveLevel(options)
  const serviceName = options.serviceName ?? 'smsbridge'
  const serviceVersion = options.serviceVersion ?? '0.1.0'
  const pretty = options.pretty ?? process.env.NODE_ENV !== 'production'

  const baseOpts: pino.LoggerOptions = {
    level,
    base: { service: serviceName, version: serviceVersion },
    formatters: defaultPinoFormatters,
    serializers: defaultSerializers,
    hooks: errorStackHooks,
  }

  const logsEndpoint =
    process.env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT ||
    (process.env.OTEL_EXPORTER_OTLP_ENDPOINT
      ? `${process.env.OTEL_EXPORTER_OTLP_ENDPOINT.replace(/\/$/, '')}/v1/logs`
      : undefined)

  if (logsEndpoint) {
    const stdoutStream = pretty
      ? pino.transport({
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
        })
      : pino.destination({ dest: 1, sync: true, minLength: 1 })

    // Stream entries take a concrete level; 'silent' or custom levels fall back to info
    const streamLevel: pino.Level = isLevel(level) ? level : 'info'
    const streams: pino.StreamEntry[] = [{ stream: stdoutStream, level: streamLevel }]

    try {
      const otelStream = pino.transport({
        target: 'pino-opentelemetry-transport',
        options: {
          serviceVersion,
          resourceAttributes: { 'service.name': serviceName },
        },
      })
      streams.push({ stream: otelStream, level: streamLevel })
    } catch (err) {
      process.stderr.write(`OTLP log transport unavailable, logging to stdout only: ${String(err)}\n`)
    }

    return pino(baseOpts, pino.multistream(streams))
  }

  if (pretty) {
    return pino({
      ...baseOpts,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
      },
    })
  }

  return pino(baseOpts)
}

/**
 * Create a synchronous Pino logger (no OTLP, no async transport).
 * Use when createLogger's async API is not suitable (e.g. in constructors).
 */
export function createSyncLogger(options: LoggerOptions = {}): pino.Logger {
  return pino({
    level: resolveLevel(options),
    base: {
      service: options.serviceName ?? 'smsbridge',
      version: options.serviceVersion ?? '0.1.0',
    },
    formatters: defaultPinoFormatters,
    serializers: defaultSerializers,
    hooks: errorStackHooks,
  })
}

/**
 * Create a child logger with additional context (provider alias, callback kind, ...)
 */
export function createChildLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>,
): pino.Logger {
  return parent.child(bindings)
}

export type Logger = pino.Logger
