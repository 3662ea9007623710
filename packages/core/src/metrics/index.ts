/**
 * Business metrics for smsbridge
 *
 * OpenTelemetry instruments for outgoing sends, provider errors and
 * inbound gateway callbacks. Without a registered MeterProvider these are no-ops.
 *
 * @example
 * ```typescript
 * import { recordMessageSent, recordCallback } from '@smsbridge/core'
 *
 * recordMessageSent('pswin', 'success')
 * recordCallback('pswin', 'status', 'rejected')
 * ```
 */
import { metrics as otelMetrics, ValueType } from '@opentelemetry/api'

/**
 * Meter instance for all smsbridge metrics
 */
export const meter = otelMetrics.getMeter('smsbridge', '0.1.0')

/**
 * Counter for messages sent
 * Labels: provider, status (success, error)
 */
export const messagesSentCounter = meter.createCounter('smsbridge.messages.sent', {
  description: 'Total number of messages sent',
  unit: '{message}',
  valueType: ValueType.INT,
})

/**
 * Histogram for send duration (encode + HTTP round trip)
 * Labels: provider
 */
export const processingDurationHistogram = meter.createHistogram('smsbridge.messages.processing.duration', {
  description: 'Message send duration in milliseconds',
  unit: 'ms',
  valueType: ValueType.DOUBLE,
})

/**
 * Counter for provider errors
 * Labels: provider, error_code
 */
export const providerErrorsCounter = meter.createCounter('smsbridge.provider.errors', {
  description: 'Total number of provider errors',
  unit: '{error}',
  valueType: ValueType.INT,
})

/**
 * Counter for inbound callbacks
 * Labels: provider, kind (message, status), outcome (dispatched, rejected)
 */
export const callbacksReceivedCounter = meter.createCounter('smsbridge.callbacks.received', {
  description: 'Total number of inbound gateway callbacks',
  unit: '{callback}',
  valueType: ValueType.INT,
})

export type CallbackKind = 'message' | 'status'
export type CallbackOutcome = 'dispatched' | 'rejected'

export function recordMessageSent(
  provider: string,
  status: 'success' | 'error',
): void {
  messagesSentCounter.add(1, { provider, status })
}

export function recordProcessingDuration(provider: string, durationMs: number): void {
  processingDurationHistogram.record(durationMs, { provider })
}

export function recordProviderError(provider: string, errorCode: string): void {
  providerErrorsCounter.add(1, { provider, error_code: errorCode })
}

export function recordCallback(
  provider: string,
  kind: CallbackKind,
  outcome: CallbackOutcome,
): void {
  callbacksReceivedCounter.add(1, { provider, kind, outcome })
}
