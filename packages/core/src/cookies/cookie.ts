export interface Cookie {
  /** Host for host-only cookies, `.example.com` for domain cookies. */
  domain: string;
  /** True when the cookie is also sent to subdomains of `domain`. */
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Epoch seconds, or `null` for a session cookie. */
  expires: number | null;
  /** Dropped on save unless saving with `ignoreDiscard`. */
  discard: boolean;
  name: string;
  /** `null` for a bare `Set-Cookie: name` without a value. */
  value: string | null;
  httpOnly: boolean;
}

export function cookieKey(cookie: Pick<Cookie, 'domain' | 'path' | 'name'>): string {
  return `${cookie.domain}\t${cookie.path}\t${cookie.name}`;
}

export function isCookieExpired(
  cookie: Pick<Cookie, 'expires'>,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): boolean {
  return cookie.expires !== null && cookie.expires <= nowSeconds;
}

/** RFC 6265 section 5.1.3 domain matching against a request host. */
export function domainMatches(cookie: Cookie, host: string): boolean {
  const bare = cookie.domain.startsWith('.')
    ? cookie.domain.slice(1)
    : cookie.domain;
  if (host === bare) return true;
  return cookie.includeSubdomains && host.endsWith(`.${bare}`);
}

/** RFC 6265 section 5.1.4 path matching against a request path. */
export function pathMatches(cookiePath: string, requestPath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith('/') || requestPath[cookiePath.length] === '/';
}

/** RFC 6265 section 5.1.4 default path for a cookie set by `requestPath`. */
export function defaultCookiePath(requestPath: string): string {
  if (!requestPath.startsWith('/')) return '/';
  const lastSlash = requestPath.lastIndexOf('/');
  return lastSlash === 0 ? '/' : requestPath.slice(0, lastSlash);
}
