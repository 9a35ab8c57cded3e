import {
  FetchRequestHandler,
  RequestDirector,
  createLogger,
  parseDirectorConfig,
  type RequestHandlerOptions,
} from '@netdirector/core';
import { UndiciRequestHandler } from './undici-request-handler.js';

export { UndiciRequestHandler } from './undici-request-handler.js';
export type { UndiciRequestHandlerOptions } from './undici-request-handler.js';
export { classifyUndiciError } from './undici-errors.js';

/**
 * A director with both built-in backends sharing one configuration, logger
 * and cookie jar. Fetch is tried first; requests it declines (proxies or
 * custom TLS) fall through to undici.
 */
export function createDirector(
  options: RequestHandlerOptions = {},
): RequestDirector {
  const config = parseDirectorConfig(options.config);
  const logger = options.logger ?? createLogger();
  const shared = { config, logger, cookieJar: options.cookieJar };

  return new RequestDirector({
    logger,
    handlers: [
      new UndiciRequestHandler(shared),
      new FetchRequestHandler(shared),
    ],
  });
}
