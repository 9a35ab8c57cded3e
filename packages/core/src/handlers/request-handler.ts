import {
  DEFAULT_SOCKET_TIMEOUT,
  parseDirectorConfig,
  type DirectorConfig,
  type DirectorConfigInput,
} from '../config/director-config.js';
import { CookieJar } from '../cookies/cookie-jar.js';
import {
  HTTPError,
  RequestError,
  UnsupportedRequest,
} from '../errors/request-error.js';
import { createLogger, type Logger } from '../logger.js';
import { HttpHeaders } from '../request/headers.js';
import type { Request } from '../request/request.js';
import type { Response } from '../response/response.js';
import {
  getEnvironmentProxies,
  proxyScheme,
  resolveProxies,
  selectProxy,
} from './proxy.js';
import { MAX_REDIRECTS, buildRedirectRequest } from './redirect.js';
import { buildTlsOptions, type TlsOptions } from './tls.js';

/** Header that disables compression for one request; never sent. */
export const NO_COMPRESSION_HEADER = 'Youtubedl-No-Compression';
/** Header carrying a one-off proxy override; never sent. */
export const REQUEST_PROXY_HEADER = 'Ytdl-Request-Proxy';

export type HandlerFeature = 'no_proxy' | 'all_proxy';

export interface RequestHandlerOptions {
  /** Shared configuration; validated on construction. */
  config?: DirectorConfig | DirectorConfigInput;
  logger?: Logger;
  /** Jar used for requests that do not carry a `cookiejar` extension. */
  cookieJar?: CookieJar;
}

/**
 * Base class for transport backends. Subclasses declare what they support
 * and implement `execute`; scheme checks, header and proxy merging, timeout
 * resolution, cookies, redirects and error tagging are shared.
 */
/**
 * The request as sent: the jar's cookies for its URL are added unless the
 * caller set a Cookie header of its own.
 */
function withJarCookies(request: Request, jar: CookieJar | undefined): Request {
  const cookieHeader = jar?.cookieHeaderFor(request.url);
  if (!cookieHeader || request.headers.has('Cookie')) return request;

  const outgoing = request.copy();
  outgoing.headers.set('Cookie', cookieHeader);
  return outgoing;
}

export abstract class RequestHandler {
  /** Short backend name used in logs and error messages. */
  abstract readonly name: string;

  protected abstract readonly supportedUrlSchemes: ReadonlyArray<string>;
  /** Proxy URL schemes the backend can tunnel through. Empty: no proxies. */
  protected readonly supportedProxySchemes: ReadonlyArray<string> = [];
  protected readonly supportedFeatures: ReadonlyArray<HandlerFeature> = [];
  protected readonly supportedExtensions: ReadonlyArray<string> = [
    'timeout',
    'cookiejar',
  ];
  /** Content encodings the backend decodes, advertised in Accept-Encoding. */
  protected readonly supportedEncodings: ReadonlyArray<string> = [];

  protected readonly config: DirectorConfig;
  protected readonly logger: Logger;
  protected readonly cookieJar: CookieJar | undefined;

  private tlsOptions: TlsOptions | undefined;
  private isClosed = false;

  constructor({ config, logger, cookieJar }: RequestHandlerOptions = {}) {
    this.config = parseDirectorConfig(config);
    this.logger = logger ?? createLogger();
    this.cookieJar = cookieJar;
  }

  /** Registry key; handlers of the same backend share it. */
  get key(): string {
    return this.name;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  supportsScheme(scheme: string): boolean {
    return this.supportedUrlSchemes.includes(scheme.toLowerCase());
  }

  /**
   * Check the request against this backend's capabilities.
   * @throws RequestError for `file:` URLs, which no backend may handle
   * @throws UnsupportedRequest on a scheme, proxy or extension mismatch
   */
  validate(request: Request): void {
    this.checkScheme(request);
    this.checkProxies(request);
    this.checkExtensions(request);
  }

  private checkScheme(request: Request): void {
    const scheme = request.scheme;
    if (scheme === 'file') {
      throw new RequestError(
        'file:// scheme is explicitly disabled for security reasons',
      );
    }
    if (!this.supportsScheme(scheme)) {
      throw new UnsupportedRequest(`${scheme} scheme is not supported`);
    }
  }

  private checkProxies(request: Request): void {
    if (request.proxies['no'] && !this.supportedFeatures.includes('no_proxy')) {
      throw new UnsupportedRequest('"no" proxy is not supported');
    }

    const selected = selectProxy(request.url, request.proxies);
    if (!selected) return;

    if (this.supportedProxySchemes.length === 0) {
      throw new UnsupportedRequest('Proxies are not supported');
    }
    if (selected.key === 'all' && !this.supportedFeatures.includes('all_proxy')) {
      throw new UnsupportedRequest('"all" proxy is not supported');
    }
    const scheme = proxyScheme(selected.url);
    if (!this.supportedProxySchemes.includes(scheme)) {
      throw new UnsupportedRequest(`Unsupported proxy type: "${scheme}"`);
    }
  }

  private checkExtensions(request: Request): void {
    const { timeout, cookiejar } = request.extensions;
    if (timeout !== undefined && typeof timeout !== 'number') {
      throw new UnsupportedRequest('timeout extension must be a number');
    }
    if (cookiejar !== undefined && !(cookiejar instanceof CookieJar)) {
      throw new UnsupportedRequest('cookiejar extension must be a CookieJar');
    }

    const unsupported = Object.keys(request.extensions).filter(
      (key) => !this.supportedExtensions.includes(key),
    );
    if (unsupported.length > 0) {
      throw new UnsupportedRequest(
        `Unsupported extensions: ${unsupported.join(', ')}`,
      );
    }
  }

  /**
   * Shared pre-flight step: merges default headers beneath the request's
   * own, consumes the signaling headers, resolves proxies and the timeout,
   * then validates the result. Mutates and returns the given request.
   */
  prepareRequest(request: Request): Request {
    request.headers = new HttpHeaders(this.config.httpHeaders, request.headers);

    if (request.headers.get(NO_COMPRESSION_HEADER)) {
      request.compression = false;
    }
    request.headers.delete(NO_COMPRESSION_HEADER);

    const override = request.headers.get(REQUEST_PROXY_HEADER);
    request.headers.delete(REQUEST_PROXY_HEADER);
    request.proxies = resolveProxies({
      environment: this.config.useEnvironmentProxies
        ? getEnvironmentProxies()
        : {},
      config: this.config.proxies,
      request: request.proxies,
      override,
    });

    request.timeout = this.resolveTimeout(request);

    if (!request.headers.has('Accept-Encoding')) {
      const encodings =
        request.compression && this.supportedEncodings.length > 0
          ? this.supportedEncodings.join(', ')
          : 'identity';
      request.headers.set('Accept-Encoding', encodings);
    }

    this.validate(request);
    return request;
  }

  private resolveTimeout(request: Request): number {
    const { timeout: extension } = request.extensions;
    const candidates = [
      typeof extension === 'number' ? extension : undefined,
      request.timeout,
      this.config.socketTimeout,
    ];
    // Zero is not a usable timeout and falls through to the next candidate.
    const timeout = candidates.find(
      (value): value is number =>
        value !== undefined && Number.isFinite(value) && value > 0,
    );
    return timeout ?? DEFAULT_SOCKET_TIMEOUT;
  }

  /**
   * Prepare and send a request, following redirects when allowed. A
   * response with status >= 400 raises HTTPError. Every RequestError leaving
   * this method names this handler.
   */
  async handle(request: Request): Promise<Response | undefined> {
    try {
      return await this.send(this.prepareRequest(request));
    } catch (error) {
      if (error instanceof RequestError) {
        error.handler ??= this.name;
      }
      throw error;
    }
  }

  private async send(request: Request): Promise<Response | undefined> {
    let current = request;

    for (let redirects = 0; ; redirects++) {
      const jar = this.cookieJarFor(current);
      const response = await this.execute(withJarCookies(current, jar));
      if (!response) return undefined;

      jar?.extractCookies(response.url, response.headers.getAll('set-cookie'));

      const location = current.allowRedirects
        ? response.getRedirectUrl()
        : null;
      if (location === null) {
        if (response.status >= 400) throw new HTTPError(response);
        return response;
      }
      if (redirects >= MAX_REDIRECTS) {
        throw new HTTPError(response, true);
      }

      response.close();
      current = buildRedirectRequest(current, response.status, location);
      this.validate(current);
      this.logger.debug(`Following ${response.status} redirect to ${current.url}`);
    }
  }

  private cookieJarFor(request: Request): CookieJar | undefined {
    const { cookiejar } = request.extensions;
    return cookiejar instanceof CookieJar ? cookiejar : this.cookieJar;
  }

  /**
   * Perform one network round trip for a prepared request. Must not follow
   * redirects itself; the base class does that. Resolving `undefined` marks
   * the handler as non-authoritative for this request.
   */
  protected abstract execute(request: Request): Promise<Response | undefined>;

  /**
   * TLS settings built from the configuration, computed once.
   * @throws ConfigurationError when the client certificate cannot be loaded
   */
  makeTlsOptions(): TlsOptions {
    this.tlsOptions ??= buildTlsOptions(this.config);
    return this.tlsOptions;
  }

  /** Release backend resources. Safe to call more than once. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    await this.releaseResources();
  }

  protected async releaseResources(): Promise<void> {}
}
