import {
  defaultCookiePath,
  type Cookie,
} from './cookie.js';

export type ParsedSetCookie =
  | { action: 'set'; cookie: Cookie }
  | { action: 'delete'; domain: string; path: string; name: string };

/**
 * Parse one Set-Cookie header value received from `requestUrl`.
 * Returns `undefined` for values that must be ignored: an empty name, a
 * Domain attribute that does not cover the request host, or a single-label
 * Domain other than the host itself.
 */
export function parseSetCookie(
  header: string,
  requestUrl: URL,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): ParsedSetCookie | undefined {
  const [pair = '', ...attributes] = header.split(';');
  const eqIdx = pair.indexOf('=');
  const name = (eqIdx === -1 ? pair : pair.slice(0, eqIdx)).trim();
  const value = eqIdx === -1 ? null : pair.slice(eqIdx + 1).trim();
  if (!name) return undefined;

  const host = requestUrl.hostname.toLowerCase();
  let domain = host;
  let includeSubdomains = false;
  let path = defaultCookiePath(requestUrl.pathname);
  let secure = false;
  let httpOnly = false;
  let maxAge: number | undefined;
  let expiresAt: number | undefined;

  for (const attribute of attributes) {
    const idx = attribute.indexOf('=');
    const key = (idx === -1 ? attribute : attribute.slice(0, idx))
      .trim()
      .toLowerCase();
    const raw = idx === -1 ? '' : attribute.slice(idx + 1).trim();

    switch (key) {
      case 'domain': {
        const bare = raw.replace(/^\./, '').toLowerCase();
        if (!bare) break;
        if (host !== bare && !host.endsWith(`.${bare}`)) return undefined;
        // A single-label domain would match a whole top-level domain.
        if (!bare.includes('.') && host !== bare) return undefined;
        domain = `.${bare}`;
        includeSubdomains = true;
        break;
      }
      case 'path':
        if (raw.startsWith('/')) path = raw;
        break;
      case 'secure':
        secure = true;
        break;
      case 'httponly':
        httpOnly = true;
        break;
      case 'max-age': {
        const seconds = Number.parseInt(raw, 10);
        if (/^-?\d+$/.test(raw) && Number.isFinite(seconds)) maxAge = seconds;
        break;
      }
      case 'expires': {
        const ms = Date.parse(raw);
        if (Number.isFinite(ms)) expiresAt = Math.floor(ms / 1000);
        break;
      }
      // Unknown attribute.
    }
  }

  const expires =
    maxAge !== undefined ? nowSeconds + maxAge : (expiresAt ?? null);

  if (expires !== null && expires <= nowSeconds) {
    return { action: 'delete', domain, path, name };
  }

  return {
    action: 'set',
    cookie: {
      domain,
      includeSubdomains,
      path,
      secure,
      expires,
      discard: expires === null,
      name,
      value,
      httpOnly,
    },
  };
}
