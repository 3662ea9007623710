export { PswinProvider } from './pswin.js'
export type { PswinProviderOptions } from './pswin.js'
export {
  PswinHttpApi,
  fetchTransport,
  DEFAULT_API_URL,
  type HttpTransport,
  type HttpResponse,
  type PswinHttpApiOptions,
} from './api.js'
export { SingleByteCharset, pswinCharset, isRepresentable, type CharsetDefinition } from './charset.js'
export { encodeUcs2Hex, decodeUcs2Hex } from './ucs2.js'
export { encodeForm, decodeForm } from './form.js'
export { encodeMessage, CT_PLAIN_TEXT, CT_UCS2, type ContentType, type EncodedMessage } from './wire.js'
export {
  PswinError,
  PSWIN_ERRORS,
  classifyResponse,
  isPswinError,
  type ClassifiedResponse,
  type PswinErrorCode,
} from './errors.js'
export { PSWIN_STATES, mapState, type PswinState } from './status.js'
export { decodeMessage, decodeStatus, parseDeliveryTime } from './decoder.js'
