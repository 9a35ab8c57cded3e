import type {
  ProxyMap,
  RequestData,
  RequestExtensions,
  RequestOptions,
} from '../types/networking.js';
import { HttpHeaders } from './headers.js';
import { normalizeUrl, parseUrl } from './url.js';

/**
 * An outgoing request. The URL is normalized on every assignment and any
 * embedded credentials are moved into an `Authorization` header.
 */
export class Request {
  private _url = '';
  private _data: RequestData | null;
  private _headers: HttpHeaders;
  private explicitMethod: string | undefined;

  proxies: ProxyMap;
  compression: boolean;
  allowRedirects: boolean;
  /** Per-attempt timeout in seconds; resolved to a positive value by the handler. */
  timeout: number | undefined;
  extensions: RequestExtensions;

  constructor(url: string, options: RequestOptions = {}) {
    this._headers = new HttpHeaders(options.headers);
    this._data = options.data ?? null;
    this.explicitMethod = options.method;
    this.proxies = { ...options.proxies };
    this.compression = options.compression ?? true;
    this.allowRedirects = options.allowRedirects ?? true;
    this.timeout = options.timeout;
    this.extensions = { ...options.extensions };
    this.assignUrl(url, options.query);
  }

  private assignUrl(url: string, query?: RequestOptions['query']): void {
    const normalized = normalizeUrl(url, query);
    this._url = normalized.url;
    if (normalized.authorization) {
      this._headers.set('Authorization', normalized.authorization);
    }
  }

  get url(): string {
    return this._url;
  }

  set url(url: string) {
    this.assignUrl(url);
  }

  get data(): RequestData | null {
    return this._data;
  }

  /** A new payload invalidates any explicit Content-Length. */
  set data(data: RequestData | null) {
    if (data !== this._data) {
      this._data = data;
      this._headers.delete('Content-Length');
    }
  }

  get headers(): HttpHeaders {
    return this._headers;
  }

  set headers(headers: HttpHeaders) {
    if (!(headers instanceof HttpHeaders)) {
      throw new TypeError('headers must be an HttpHeaders instance');
    }
    this._headers = headers;
  }

  get method(): string {
    return this.explicitMethod ?? (this._data !== null ? 'POST' : 'GET');
  }

  set method(method: string | undefined) {
    this.explicitMethod = method;
  }

  /** URL scheme, lowercased and without the trailing colon. */
  get scheme(): string {
    return parseUrl(this._url).protocol.slice(0, -1);
  }

  get host(): string {
    return parseUrl(this._url).host;
  }

  addHeader(name: string, value: string | number): void {
    this._headers.set(name, value);
  }

  getHeader(name: string): string | undefined;
  getHeader(name: string, defaultValue: string): string;
  getHeader(name: string, defaultValue?: string): string | undefined {
    return this._headers.get(name) ?? defaultValue;
  }

  hasHeader(name: string): boolean {
    return this._headers.has(name);
  }

  /**
   * Structurally independent clone: headers, proxies and extensions are
   * copied so a handler mutating its copy never affects the original.
   */
  copy(): Request {
    return new Request(this._url, {
      data: this._data,
      headers: this._headers.copy(),
      proxies: { ...this.proxies },
      method: this.explicitMethod,
      compression: this.compression,
      allowRedirects: this.allowRedirects,
      timeout: this.timeout,
      extensions: { ...this.extensions },
    });
  }
}

export function headRequest(
  url: string,
  options: Omit<RequestOptions, 'method'> = {},
): Request {
  return new Request(url, { ...options, method: 'HEAD' });
}

export function putRequest(
  url: string,
  options: Omit<RequestOptions, 'method'> = {},
): Request {
  return new Request(url, { ...options, method: 'PUT' });
}
