import { Buffer } from 'node:buffer';
import { domainToASCII } from 'node:url';
import { RequestError } from '../errors/request-error.js';

export type QueryValue = string | number | boolean;

export type QueryParams = Record<
  string,
  QueryValue | ReadonlyArray<QueryValue> | undefined
>;

const COMMON_TYPOS: ReadonlyArray<[RegExp, string]> = [
  [/^httpss:\/\//, 'https://'],
  [/^rmtp([es]?):\/\//, 'rtmp$1://'],
];

/**
 * Fix URLs users commonly get wrong: protocol-relative URLs get `http:`
 * prepended and known scheme misspellings are corrected.
 */
export function sanitizeUrl(url: string): string {
  if (url.startsWith('//')) {
    return `http:${url}`;
  }
  for (const [mistake, fixup] of COMMON_TYPOS) {
    if (mistake.test(url)) {
      return url.replace(mistake, fixup);
    }
  }
  return url;
}

export function parseUrl(url: string, base?: string): URL {
  try {
    return new URL(url, base);
  } catch (error) {
    throw new RequestError(`Invalid URL: ${url}`, { cause: error });
  }
}

/**
 * Parse and escape a URL: the host is lowercased and IDNA-encoded, and
 * non-ASCII characters in the path, query and fragment are percent-escaped.
 * Escapes already present are left untouched.
 */
export function escapeUrl(url: string): URL {
  const parsed = parseUrl(url);
  const hostname = parsed.hostname.toLowerCase();
  if (hostname !== parsed.hostname) {
    parsed.hostname = hostname;
  }
  // Special schemes are IDNA-encoded by the parser; opaque hosts are not.
  if (/[^\x00-\x7f]/.test(decodeURIComponentSafe(hostname))) {
    const ascii = domainToASCII(decodeURIComponentSafe(hostname));
    if (ascii) parsed.hostname = ascii;
  }
  return parsed;
}

function isQueryList(
  value: QueryValue | ReadonlyArray<QueryValue>,
): value is ReadonlyArray<QueryValue> {
  return Array.isArray(value);
}

function decodeURIComponentSafe(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Remove userinfo from the URL and return it as a `Basic` Authorization
 * header value instead.
 */
export function extractBasicAuth(url: URL): {
  url: URL;
  authorization?: string;
} {
  if (!url.username && !url.password) {
    return { url };
  }

  const credentials = `${decodeURIComponentSafe(url.username)}:${decodeURIComponentSafe(url.password)}`;
  const stripped = new URL(url.href);
  stripped.username = '';
  stripped.password = '';

  return {
    url: stripped,
    authorization: `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`,
  };
}

/**
 * Merge query parameters into the URL. Every key given replaces all existing
 * values of that key; array values repeat the key.
 */
export function updateUrlQuery(url: string, query: QueryParams): string {
  const entries = Object.entries(query).filter(
    (entry): entry is [string, QueryValue | ReadonlyArray<QueryValue>] =>
      entry[1] !== undefined,
  );
  if (entries.length === 0) {
    return url;
  }

  const parsed = parseUrl(url);
  for (const [key, value] of entries) {
    parsed.searchParams.delete(key);
    const values = isQueryList(value) ? value : [value];
    for (const item of values) {
      parsed.searchParams.append(key, String(item));
    }
  }
  return parsed.href;
}

/**
 * Full normalization applied to every request URL.
 */
export function normalizeUrl(
  url: string,
  query?: QueryParams,
): { url: string; authorization?: string } {
  const extracted = extractBasicAuth(escapeUrl(sanitizeUrl(url)));
  const href = extracted.url.href;
  return {
    url: query ? updateUrlQuery(href, query) : href,
    authorization: extracted.authorization,
  };
}

export function urlScheme(url: string): string {
  return parseUrl(url).protocol.slice(0, -1).toLowerCase();
}
