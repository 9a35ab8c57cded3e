import type { Cookie } from './cookie.js';

export const HTTPONLY_PREFIX = '#HttpOnly_';

export const NETSCAPE_HEADER = [
  '# Netscape HTTP Cookie File',
  '# This file is generated by netdirector.  Do not edit.',
  '',
  '',
].join('\n');

const HEADER_PATTERN = /^#( Netscape)? HTTP Cookie File/;
const ENTRY_FIELD_COUNT = 7;

export type NetscapeLine =
  | { kind: 'cookie'; cookie: Cookie }
  | { kind: 'skip' }
  | { kind: 'invalid'; reason: string };

export function isNetscapeHeader(line: string): boolean {
  return HEADER_PATTERN.test(line);
}

function parseFlag(value: string): boolean | undefined {
  if (value === 'TRUE') return true;
  if (value === 'FALSE') return false;
  return undefined;
}

/**
 * Parse one line of a Netscape cookie file. Comments and blank lines are
 * skipped; anything that is not a well-formed 7-field entry is invalid,
 * as is a subdomain flag that disagrees with the domain's leading dot.
 *
 * An expiry of `0` is read as a session cookie rather than one that expired
 * in 1970: many sites mark session cookies with `expires=0`.
 */
export function parseNetscapeLine(rawLine: string): NetscapeLine {
  let line = rawLine.replace(/\r?\n?$/, '');
  let httpOnly = false;

  if (line.startsWith(HTTPONLY_PREFIX)) {
    httpOnly = true;
    line = line.slice(HTTPONLY_PREFIX.length);
  }
  if (line.trim() === '' || line.startsWith('#')) {
    return { kind: 'skip' };
  }

  const fields = line.split('\t');
  if (fields.length !== ENTRY_FIELD_COUNT) {
    return { kind: 'invalid', reason: 'invalid length' };
  }

  const [
    domain = '',
    subdomainFlag = '',
    path = '',
    secureFlag = '',
    expiresAt = '',
    name = '',
    value = '',
  ] = fields;

  const includeSubdomains = parseFlag(subdomainFlag);
  const secure = parseFlag(secureFlag);
  if (includeSubdomains === undefined || secure === undefined) {
    return { kind: 'invalid', reason: 'invalid flag' };
  }
  if (!domain) {
    return { kind: 'invalid', reason: 'missing domain' };
  }
  // The subdomain flag must agree with the leading dot it is written from.
  if (includeSubdomains !== domain.startsWith('.')) {
    return { kind: 'invalid', reason: 'domain flag mismatch' };
  }
  if (expiresAt && !/^\d+$/.test(expiresAt)) {
    return { kind: 'invalid', reason: 'invalid expires at' };
  }

  let expires: number | null = expiresAt
    ? Number.parseInt(expiresAt, 10)
    : null;
  if (expires === 0) expires = null;

  const cookie: Cookie = {
    domain,
    includeSubdomains,
    path,
    secure,
    expires,
    discard: expires === null,
    name,
    value,
    httpOnly,
  };
  // A no-name cookie is stored with its would-be name in the value field.
  if (name === '') {
    cookie.name = value;
    cookie.value = null;
  }

  return { kind: 'cookie', cookie };
}

export function formatNetscapeCookie(cookie: Cookie): string {
  const domain = cookie.httpOnly
    ? `${HTTPONLY_PREFIX}${cookie.domain}`
    : cookie.domain;
  const [name, value] =
    cookie.value === null ? ['', cookie.name] : [cookie.name, cookie.value];

  return [
    domain,
    cookie.domain.startsWith('.') ? 'TRUE' : 'FALSE',
    cookie.path,
    cookie.secure ? 'TRUE' : 'FALSE',
    cookie.expires === null ? '' : String(cookie.expires),
    name,
    value,
  ].join('\t');
}
