import { pipeline, type Readable, type Transform } from 'node:stream';
import {
  createBrotliDecompress,
  createGunzip,
  createInflate,
} from 'node:zlib';
import {
  Response,
  RequestHandler,
  ResponseHeaders,
  UnsupportedRequest,
  expectedBodyLength,
  selectProxy,
  type HandlerFeature,
  type Request,
  type RequestHandlerOptions,
} from '@netdirector/core';
import {
  Agent,
  ProxyAgent,
  request as undiciRequest,
  type Dispatcher,
} from 'undici';
import { classifyUndiciError } from './undici-errors.js';

const HTTP_METHODS = [
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'PATCH',
] as const;

type HttpMethod = (typeof HTTP_METHODS)[number];

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((known) => known === method);
}

const DECODERS: Record<string, () => Transform> = {
  gzip: createGunzip,
  'x-gzip': createGunzip,
  deflate: createInflate,
  br: createBrotliDecompress,
};

const DIRECT = 'direct';

export interface UndiciRequestHandlerOptions extends RequestHandlerOptions {
  /**
   * Dispatcher to send every request through, e.g. a MockAgent. When given,
   * proxies are not applied and the caller owns closing it.
   */
  dispatcher?: Dispatcher;
}

/**
 * Backend on undici. Routes through HTTP(S) proxies and applies the
 * configured TLS settings; decodes gzip, deflate and brotli bodies.
 */
export class UndiciRequestHandler extends RequestHandler {
  readonly name = 'Undici';

  protected readonly supportedUrlSchemes = ['http', 'https'];
  protected readonly supportedProxySchemes = ['http', 'https'];
  protected readonly supportedFeatures: ReadonlyArray<HandlerFeature> = [
    'no_proxy',
    'all_proxy',
  ];
  protected readonly supportedEncodings = ['gzip', 'deflate', 'br'];

  private readonly injectedDispatcher: Dispatcher | undefined;
  private readonly dispatchers = new Map<string, Dispatcher>();

  constructor({ dispatcher, ...options }: UndiciRequestHandlerOptions = {}) {
    super(options);
    this.injectedDispatcher = dispatcher;
  }

  override validate(request: Request): void {
    super.validate(request);
    if (!isHttpMethod(request.method)) {
      throw new UnsupportedRequest(`Unsupported method: ${request.method}`);
    }
  }

  protected async execute(request: Request): Promise<Response> {
    const method = request.method;
    if (!isHttpMethod(method)) {
      throw new UnsupportedRequest(`Unsupported method: ${method}`);
    }

    const proxy = selectProxy(request.url, request.proxies);
    const timeoutMs = Math.ceil((request.timeout ?? 0) * 1000);

    const reply = await undiciRequest(request.url, {
      method,
      headers: request.headers.toObject(),
      body: request.data ?? undefined,
      dispatcher: this.dispatcherFor(proxy?.url),
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
    }).catch((error: unknown) => {
      throw classifyUndiciError(error, { viaProxy: proxy !== undefined });
    });

    const headers = new ResponseHeaders(reply.headers);
    const body = request.compression
      ? this.decode(reply.body, headers.get('content-encoding'))
      : reply.body;

    return new Response(body, {
      url: request.url,
      headers,
      status: reply.statusCode,
      expectedLength: expectedBodyLength(method, reply.statusCode, headers),
    });
  }

  /**
   * Pipe the body through a decoder per listed content coding, last applied
   * first. Unknown codings leave the body as received.
   */
  private decode(body: Readable, contentEncoding: string | undefined): Readable {
    if (!contentEncoding) return body;

    const codings = contentEncoding
      .split(',')
      .map((coding) => coding.trim().toLowerCase())
      .filter((coding) => coding && coding !== 'identity')
      .reverse();
    if (codings.some((coding) => !DECODERS[coding])) return body;

    let decoded: Readable = body;
    for (const coding of codings) {
      const createDecoder = DECODERS[coding];
      if (!createDecoder) continue;
      decoded = pipeline(decoded, createDecoder(), (error) => {
        if (error) {
          this.logger.debug(`Response body stream ended: ${error.message}`);
        }
      });
    }
    return decoded;
  }

  private dispatcherFor(proxyUrl: string | undefined): Dispatcher {
    if (this.injectedDispatcher) return this.injectedDispatcher;

    const key = proxyUrl ?? DIRECT;
    const cached = this.dispatchers.get(key);
    if (cached) return cached;

    const tls = this.makeTlsOptions();
    const dispatcher = proxyUrl
      ? new ProxyAgent({ uri: proxyUrl, requestTls: tls })
      : new Agent({ connect: tls });
    this.dispatchers.set(key, dispatcher);
    return dispatcher;
  }

  protected override async releaseResources(): Promise<void> {
    const owned = [...this.dispatchers.values()];
    this.dispatchers.clear();
    await Promise.all(owned.map((dispatcher) => dispatcher.destroy()));
  }
}
