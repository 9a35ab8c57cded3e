export * from './errors/index.js';

export {
  DEFAULT_HTTP_HEADERS,
  DEFAULT_SOCKET_TIMEOUT,
  DirectorConfigSchema,
  parseDirectorConfig,
} from './config/director-config.js';
export type {
  DirectorConfig,
  DirectorConfigInput,
} from './config/director-config.js';

export { createLogger, DEFAULT_LOGGER_TAG } from './logger.js';
export type { Logger } from './logger.js';

export { HttpHeaders, titleCaseHeader } from './request/headers.js';
export type { HeaderSource, HeaderValue } from './request/headers.js';
export { Request, headRequest, putRequest } from './request/request.js';
export {
  escapeUrl,
  extractBasicAuth,
  normalizeUrl,
  parseUrl,
  sanitizeUrl,
  updateUrlQuery,
  urlScheme,
} from './request/url.js';
export type { QueryParams, QueryValue } from './request/url.js';

export { ResponseHeaders } from './response/response-headers.js';
export type { ResponseHeaderSource } from './response/response-headers.js';
export {
  REDIRECT_STATUS_CODES,
  Response,
  expectedBodyLength,
} from './response/response.js';
export type { ResponseOptions } from './response/response.js';

export {
  NO_COMPRESSION_HEADER,
  REQUEST_PROXY_HEADER,
  RequestHandler,
} from './handlers/request-handler.js';
export type {
  HandlerFeature,
  RequestHandlerOptions,
} from './handlers/request-handler.js';
export { FetchRequestHandler } from './handlers/fetch-handler.js';
export type { FetchRequestHandlerOptions } from './handlers/fetch-handler.js';
export {
  NO_PROXY_SENTINEL,
  getEnvironmentProxies,
  normalizeProxyUrl,
  proxyScheme,
  resolveProxies,
  selectProxy,
} from './handlers/proxy.js';
export type { ProxySources, SelectedProxy } from './handlers/proxy.js';
export {
  MAX_REDIRECTS,
  buildRedirectRequest,
  redirectMethod,
} from './handlers/redirect.js';
export { buildTlsOptions, requiresCustomTls } from './handlers/tls.js';
export type { TlsOptions } from './handlers/tls.js';

export { RequestDirector } from './director/request-director.js';
export type {
  RequestDirectorOptions,
  RequestHandlerClass,
  RequestInput,
} from './director/request-director.js';

export { CookieJar } from './cookies/cookie-jar.js';
export type { CookieFileOptions, CookieJarOptions } from './cookies/cookie-jar.js';
export type { Cookie } from './cookies/cookie.js';
export {
  NETSCAPE_HEADER,
  formatNetscapeCookie,
  parseNetscapeLine,
} from './cookies/netscape-format.js';
export { parseSetCookie } from './cookies/set-cookie-parser.js';

export type {
  LegacyRequestLike,
  ProxyMap,
  RequestData,
  RequestExtensions,
  RequestOptions,
} from './types/networking.js';
