export { NetworkingError, ConfigurationError } from './networking-error.js';
export {
  RequestError,
  UnsupportedRequest,
  TransportError,
  SSLError,
  CertificateVerifyError,
  ProxyError,
  IncompleteRead,
  HTTPError,
  NoSupportingHandlers,
  isNetworkError,
} from './request-error.js';
export type { RequestErrorOptions } from './request-error.js';
export { classifyTransportError, rootCause } from './classify.js';
