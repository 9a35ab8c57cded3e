import { ConfigurationError } from '../errors/networking-error.js';
import {
  NoSupportingHandlers,
  RequestError,
  UnsupportedRequest,
} from '../errors/request-error.js';
import type { RequestHandler } from '../handlers/request-handler.js';
import { createLogger, type Logger } from '../logger.js';
import { Request } from '../request/request.js';
import type { Response } from '../response/response.js';
import type { LegacyRequestLike } from '../types/networking.js';

export type RequestInput = Request | string | LegacyRequestLike;

/** A handler class, used to remove every instance of one backend. */
export type RequestHandlerClass = abstract new (
  ...args: never[]
) => RequestHandler;

export interface RequestDirectorOptions {
  logger?: Logger;
  /** Handlers to register, in registration order. */
  handlers?: Iterable<RequestHandler>;
}

function toRequest(input: RequestInput): Request {
  if (input instanceof Request) return input;
  if (typeof input === 'string') return new Request(input);
  return new Request(input.url, {
    data: input.data,
    method: input.method,
    headers: input.headers,
  });
}

/**
 * Routes requests through an ordered set of handlers. The most recently
 * added handler is tried first; a handler that cannot service a request
 * passes it on to the next one.
 *
 * The handler list is not guarded: do not add or remove handlers while a
 * `send` is in flight.
 */
export class RequestDirector {
  private readonly handlers: Array<RequestHandler> = [];
  private readonly logger: Logger;

  constructor({ logger = createLogger(), handlers = [] }: RequestDirectorOptions = {}) {
    this.logger = logger;
    for (const handler of handlers) this.addHandler(handler);
  }

  /** Register a handler. Adding an already registered instance is a no-op. */
  addHandler(handler: RequestHandler): void {
    if (!this.handlers.includes(handler)) {
      this.handlers.push(handler);
    }
  }

  /**
   * Remove one handler instance, or every instance of a handler class.
   */
  removeHandler(target: RequestHandler | RequestHandlerClass): void {
    const keep = this.handlers.filter((handler) =>
      typeof target === 'function'
        ? !(handler instanceof target)
        : handler !== target,
    );
    this.handlers.splice(0, this.handlers.length, ...keep);
  }

  /**
   * Swap `existing` for `replacement`, keeping its priority. When `existing`
   * is not registered, `replacement` is added as the highest priority.
   */
  replaceHandler(existing: RequestHandler, replacement: RequestHandler): void {
    const index = this.handlers.indexOf(existing);
    if (index === -1) {
      this.addHandler(replacement);
      return;
    }
    this.handlers.splice(index, 1, replacement);
    const duplicate = this.handlers.findIndex(
      (handler, position) => handler === replacement && position !== index,
    );
    if (duplicate !== -1) this.handlers.splice(duplicate, 1);
  }

  /** Registered handlers in registration order, optionally of one class. */
  getHandlers(kind?: RequestHandlerClass): Array<RequestHandler> {
    return kind
      ? this.handlers.filter((handler) => handler instanceof kind)
      : [...this.handlers];
  }

  /**
   * Dispatch a request. Each handler gets its own copy of the request.
   *
   * @throws ConfigurationError when no handlers are registered
   * @throws RequestError raised by the handler that accepted the request
   * @throws NoSupportingHandlers when every handler declined
   */
  async send(input: RequestInput): Promise<Response> {
    if (this.handlers.length === 0) {
      throw new ConfigurationError('No request handlers have been configured');
    }

    const request = toRequest(input);
    const unsupportedErrors: Array<UnsupportedRequest> = [];
    const unexpectedErrors: Array<unknown> = [];

    for (const handler of [...this.handlers].reverse()) {
      this.logger.debug(`Forwarding request to "${handler.name}" request handler`);

      let response: Response | undefined;
      try {
        response = await handler.handle(request.copy());
      } catch (error) {
        if (error instanceof RequestError) {
          error.handler ??= handler.name;
        }
        if (error instanceof UnsupportedRequest) {
          this.logger.debug(
            `"${handler.name}" request handler cannot handle this request (reason: ${error.message})`,
          );
          unsupportedErrors.push(error);
          continue;
        }
        if (error instanceof RequestError) throw error;

        this.logger.warn(
          `Unexpected error from "${handler.name}" request handler: ${String(error)}`,
        );
        unexpectedErrors.push(error);
        continue;
      }

      if (!response) {
        this.logger.warn(
          `"${handler.name}" request handler returned nothing for request`,
        );
        continue;
      }
      return response;
    }

    throw new NoSupportingHandlers(unsupportedErrors, unexpectedErrors);
  }

  /** Close every registered handler. */
  async close(): Promise<void> {
    await Promise.all(this.handlers.map((handler) => handler.close()));
  }
}
