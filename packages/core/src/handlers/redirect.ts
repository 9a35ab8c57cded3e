import type { Request } from '../request/request.js';
import { parseUrl } from '../request/url.js';

export const MAX_REDIRECTS = 10;

const CONTENT_HEADERS = ['Content-Length', 'Content-Type'];

/**
 * Method to use after a redirect: 303 turns everything but HEAD into GET,
 * and browsers turn POST into GET on 301/302. 307/308 keep the method.
 */
export function redirectMethod(method: string, status: number): string {
  if (status === 303 && method !== 'HEAD') return 'GET';
  if ((status === 301 || status === 302) && method === 'POST') return 'GET';
  return method;
}

/**
 * The request for the next redirect hop. Cookie and Authorization headers
 * are dropped when the redirect leaves the original host.
 * @throws RequestError when the Location cannot be parsed
 */
export function buildRedirectRequest(
  request: Request,
  status: number,
  location: string,
): Request {
  const target = parseUrl(location, request.url);
  const next = request.copy();
  const method = redirectMethod(request.method, status);

  if (target.host !== parseUrl(request.url).host) {
    next.headers.delete('Cookie');
    next.headers.delete('Authorization');
  }
  if (method !== request.method) {
    next.method = method;
    next.data = null;
    for (const header of CONTENT_HEADERS) next.headers.delete(header);
  }
  next.url = target.href;
  return next;
}
