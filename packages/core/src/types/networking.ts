import type { QueryParams } from '../request/url.js';
import type { HeaderSource } from '../request/headers.js';

/** Request payload. Strings are sent UTF-8 encoded. */
export type RequestData = Uint8Array | string;

/**
 * Proxy per URL scheme (`http`, `https`, `all`). `null` disables proxying
 * for that scheme.
 */
export type ProxyMap = Record<string, string | null>;

/**
 * Per-request options for a specific backend, e.g. `timeout` or
 * `cookiejar`. Handlers reject extensions they do not understand.
 */
export type RequestExtensions = Record<string, unknown>;

export interface RequestOptions {
  data?: RequestData | null;
  headers?: HeaderSource;
  proxies?: ProxyMap;
  query?: QueryParams;
  method?: string;
  /** Advertise and decode compressed response bodies. Default: true */
  compression?: boolean;
  /** Follow 3xx redirects. Default: true */
  allowRedirects?: boolean;
  /** Per-attempt timeout in seconds. */
  timeout?: number;
  extensions?: RequestExtensions;
}

/**
 * The plain request shape older call sites pass around instead of a
 * `Request` instance.
 */
export interface LegacyRequestLike {
  url: string;
  data?: RequestData | null;
  method?: string;
  headers?: Record<string, string>;
}
