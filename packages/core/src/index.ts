// Types
export type {
  MessageOptions,
  OutgoingMessage,
  InboundMessage,
  StatusReport,
  DeliveryStatus,
} from './types/message.js'

// Provider interfaces
export type {
  WireFields,
  PreparedMessage,
  SendResult,
  HealthCheckResult,
  InboundReceiver,
} from './providers/types.js'
export type { Provider } from './providers/base.js'

// Gateway
export {
  Gateway,
  type GatewayOptions,
  type MessageRouter,
  type SendListener,
  type ReceiveListener,
  type StatusListener,
} from './gateway/gateway.js'

// Validation
export {
  createOutgoingMessage,
  validateOutgoingMessage,
  safeValidateOutgoingMessage,
  outgoingMessageSchema,
  messageOptionsSchema,
  type OutgoingMessageInit,
} from './validation/message.js'

// Logger
export {
  createLogger,
  createSyncLogger,
  createChildLogger,
  type Logger,
  type LoggerOptions,
} from './logger/index.js'

// PII Masking
export { hashPii, maskPhone, maskText, maskWireFields } from './logger/masking.js'

// Errors
export {
  FATAL_HTTP_STATUS_CODES,
  isFatalHttpStatus,
  isDecodeError,
  SmsBridgeError,
  TransportError,
  GatewayError,
  DecodeError,
} from './errors/index.js'

// Metrics
export {
  meter,
  messagesSentCounter,
  processingDurationHistogram,
  providerErrorsCounter,
  callbacksReceivedCounter,
  recordMessageSent,
  recordProcessingDuration,
  recordProviderError,
  recordCallback,
  type CallbackKind,
  type CallbackOutcome,
} from './metrics/index.js'
