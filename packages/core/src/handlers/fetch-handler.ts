import { Readable } from 'node:stream';
import { classifyTransportError } from '../errors/classify.js';
import { UnsupportedRequest } from '../errors/request-error.js';
import type { Request } from '../request/request.js';
import { ResponseHeaders } from '../response/response-headers.js';
import { Response, expectedBodyLength } from '../response/response.js';
import {
  RequestHandler,
  type HandlerFeature,
  type RequestHandlerOptions,
} from './request-handler.js';
import { requiresCustomTls } from './tls.js';

export interface FetchRequestHandlerOptions extends RequestHandlerOptions {
  /** Fetch implementation. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

/**
 * Backend on the runtime's `fetch`. It cannot route through proxies or
 * apply custom TLS settings, so such requests are left to other handlers.
 */
export class FetchRequestHandler extends RequestHandler {
  readonly name = 'Fetch';

  protected readonly supportedUrlSchemes = ['http', 'https'];
  protected readonly supportedFeatures: ReadonlyArray<HandlerFeature> = [
    'no_proxy',
  ];
  protected readonly supportedEncodings = ['gzip', 'deflate', 'br'];

  private readonly fetchImpl: typeof fetch;

  constructor({ fetch: fetchImpl, ...options }: FetchRequestHandlerOptions = {}) {
    super(options);
    this.fetchImpl = fetchImpl ?? globalThis.fetch;
  }

  override validate(request: Request): void {
    super.validate(request);
    if (request.scheme === 'https' && requiresCustomTls(this.config)) {
      throw new UnsupportedRequest('Custom TLS settings are not supported');
    }
  }

  protected async execute(request: Request): Promise<Response> {
    const idle = new IdleTimeout(Math.ceil((request.timeout ?? 0) * 1000));

    const reply = await this.fetchImpl(request.url, {
      method: request.method,
      headers: request.headers.toObject(),
      body: request.data ?? undefined,
      redirect: 'manual',
      signal: idle.signal,
    }).catch((error: unknown) => {
      idle.clear();
      throw classifyTransportError(error);
    });

    const headers = new ResponseHeaders();
    for (const [name, value] of reply.headers) {
      if (name.toLowerCase() !== 'set-cookie') headers.append(name, value);
    }
    for (const value of reply.headers.getSetCookie()) {
      headers.append('set-cookie', value);
    }

    let raw: Readable;
    if (reply.body) {
      raw = Readable.from(idle.guard(reply.body));
    } else {
      idle.clear();
      raw = Readable.from([]);
    }
    return new Response(raw, {
      url: reply.url || request.url,
      headers,
      status: reply.status,
      reason: reply.statusText,
      expectedLength: expectedBodyLength(request.method, reply.status, headers),
    });
  }
}

/**
 * Aborts a fetch once no progress was made for `ms` milliseconds: waiting
 * for the response head counts, and every body chunk re-arms the timer.
 */
class IdleTimeout {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout | undefined;

  constructor(ms: number) {
    if (ms <= 0) return;
    this.timer = setTimeout(() => {
      const reason = new Error('The operation was aborted due to timeout');
      reason.name = 'TimeoutError';
      this.controller.abort(reason);
    }, ms);
    this.timer.unref();
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  clear(): void {
    clearTimeout(this.timer);
  }

  async *guard(body: AsyncIterable<Uint8Array>): AsyncGenerator<Uint8Array> {
    try {
      for await (const chunk of body) {
        this.timer?.refresh();
        yield chunk;
      }
    } catch (error) {
      throw classifyTransportError(error);
    } finally {
      this.clear();
    }
  }
}
