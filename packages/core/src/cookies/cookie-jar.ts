import { readFile, writeFile } from 'node:fs/promises';
import { ConfigurationError } from '../errors/networking-error.js';
import { createLogger, type Logger } from '../logger.js';
import {
  cookieKey,
  domainMatches,
  isCookieExpired,
  pathMatches,
  type Cookie,
} from './cookie.js';
import {
  NETSCAPE_HEADER,
  formatNetscapeCookie,
  isNetscapeHeader,
  parseNetscapeLine,
} from './netscape-format.js';
import { parseSetCookie } from './set-cookie-parser.js';

export interface CookieJarOptions {
  /** Default file for `load()` and `save()`. */
  filename?: string;
  logger?: Logger;
}

export interface CookieFileOptions {
  /** Keep session (discard-on-close) cookies. */
  ignoreDiscard?: boolean;
  /** Keep cookies whose expiry has passed. */
  ignoreExpires?: boolean;
}

const SECURE_SCHEMES = new Set(['https', 'wss']);

/**
 * Process-lifetime cookie store with a Netscape-format file codec.
 *
 * The jar is shared mutable state: callers dispatching concurrently must
 * not `load` while requests are in flight.
 */
export class CookieJar {
  readonly filename: string | undefined;
  private readonly logger: Logger;
  private readonly cookies = new Map<string, Cookie>();

  constructor({ filename, logger = createLogger() }: CookieJarOptions = {}) {
    this.filename = filename;
    this.logger = logger;
  }

  get size(): number {
    return this.cookies.size;
  }

  setCookie(cookie: Cookie): void {
    this.cookies.set(cookieKey(cookie), { ...cookie });
  }

  getCookies(): Array<Cookie> {
    return [...this.cookies.values()].map((cookie) => ({ ...cookie }));
  }

  /**
   * Remove cookies. With no arguments the jar is emptied; otherwise only
   * cookies matching every given field are removed.
   */
  clear(domain?: string, path?: string, name?: string): void {
    for (const [key, cookie] of this.cookies) {
      if (domain !== undefined && cookie.domain !== domain) continue;
      if (path !== undefined && cookie.path !== path) continue;
      if (name !== undefined && cookie.name !== name) continue;
      this.cookies.delete(key);
    }
  }

  clearSessionCookies(): void {
    for (const [key, cookie] of this.cookies) {
      if (cookie.discard) this.cookies.delete(key);
    }
  }

  /**
   * The Cookie header value to send to `url`, or `undefined` when no stored
   * cookie applies. Cookies with longer paths come first.
   */
  cookieHeaderFor(url: string): string | undefined {
    const parsed = new URL(url);
    const scheme = parsed.protocol.slice(0, -1);
    const host = parsed.hostname.toLowerCase();
    const now = Math.floor(Date.now() / 1000);

    const matching = [...this.cookies.values()]
      .filter(
        (cookie) =>
          !isCookieExpired(cookie, now) &&
          (!cookie.secure || SECURE_SCHEMES.has(scheme)) &&
          domainMatches(cookie, host) &&
          pathMatches(cookie.path, parsed.pathname || '/'),
      )
      .sort((a, b) => b.path.length - a.path.length);

    if (matching.length === 0) return undefined;

    return matching
      .map((cookie) =>
        cookie.value === null ? cookie.name : `${cookie.name}=${cookie.value}`,
      )
      .join('; ');
  }

  /**
   * Store the cookies a response from `url` set. Values rejected by the
   * parser are ignored; expired ones delete the stored cookie.
   */
  extractCookies(url: string, setCookieHeaders: Iterable<string>): void {
    const parsed = new URL(url);
    for (const header of setCookieHeaders) {
      const result = parseSetCookie(header, parsed);
      if (!result) {
        this.logger.debug(`Ignoring cookie from ${parsed.host}: ${header}`);
        continue;
      }
      if (result.action === 'delete') {
        this.cookies.delete(cookieKey(result));
      } else {
        this.setCookie(result.cookie);
      }
    }
  }

  /**
   * Load cookies from a Netscape cookie file. Malformed lines are skipped
   * with a warning; the rest of the file still loads.
   */
  async load(
    filename: string | undefined = this.filename,
    { ignoreDiscard = true, ignoreExpires = true }: CookieFileOptions = {},
  ): Promise<void> {
    const path = this.requireFilename(filename);
    const content = await readFile(path, 'utf8');
    const lines = content.split(/\r?\n/);
    const now = Math.floor(Date.now() / 1000);

    if (!isNetscapeHeader(lines[0] ?? '')) {
      this.logger.warn(
        `${path} does not look like a Netscape format cookies file`,
      );
    }

    lines.forEach((line, index) => {
      const result = parseNetscapeLine(line);
      if (result.kind === 'skip') return;
      if (result.kind === 'invalid') {
        this.logger.warn(
          `skipping cookie file entry due to ${result.reason} (line ${index + 1}): ${JSON.stringify(line)}`,
        );
        return;
      }

      const { cookie } = result;
      if (!ignoreDiscard && cookie.discard) return;
      if (!ignoreExpires && isCookieExpired(cookie, now)) return;
      this.setCookie(cookie);
    });
  }

  /**
   * Save cookies to a Netscape cookie file. Session cookies and expired
   * cookies are skipped unless the matching `ignore*` flag is set.
   */
  async save(
    filename: string | undefined = this.filename,
    { ignoreDiscard = false, ignoreExpires = false }: CookieFileOptions = {},
  ): Promise<void> {
    const path = this.requireFilename(filename);
    const now = Math.floor(Date.now() / 1000);

    const lines: Array<string> = [];
    for (const cookie of this.cookies.values()) {
      if (!ignoreDiscard && cookie.discard) continue;
      if (!ignoreExpires && isCookieExpired(cookie, now)) continue;
      lines.push(`${formatNetscapeCookie(cookie)}\n`);
    }

    await writeFile(path, NETSCAPE_HEADER + lines.join(''), 'utf8');
  }

  private requireFilename(filename: string | undefined): string {
    if (!filename) {
      throw new ConfigurationError('Cookie file name is not set');
    }
    return filename;
  }
}
