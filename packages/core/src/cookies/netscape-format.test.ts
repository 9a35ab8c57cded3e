import { describe, expect, it } from 'vitest';
import type { Cookie } from './cookie.js';
import { formatNetscapeCookie, parseNetscapeLine } from './netscape-format.js';

function cookie(overrides: Partial<Cookie> = {}): Cookie {
  return {
    domain: 'example.com',
    includeSubdomains: false,
    path: '/',
    secure: false,
    expires: 4102444800,
    discard: false,
    name: 'sid',
    value: 'abc',
    httpOnly: false,
    ...overrides,
  };
}

describe('formatNetscapeCookie', () => {
  it('writes the seven tab-separated fields', () => {
    expect(formatNetscapeCookie(cookie())).toBe(
      'example.com\tFALSE\t/\tFALSE\t4102444800\tsid\tabc',
    );
  });

  it('prefixes HttpOnly cookies and derives the subdomain flag', () => {
    expect(
      formatNetscapeCookie(
        cookie({ domain: '.example.com', httpOnly: true, secure: true }),
      ),
    ).toBe('#HttpOnly_.example.com\tTRUE\t/\tTRUE\t4102444800\tsid\tabc');
  });

  it('writes session expiry as empty and swaps a missing value', () => {
    expect(formatNetscapeCookie(cookie({ expires: null, value: null }))).toBe(
      'example.com\tFALSE\t/\tFALSE\t\t\tsid',
    );
  });
});

describe('parseNetscapeLine', () => {
  it('skips comments and blank lines', () => {
    expect(parseNetscapeLine('# Netscape HTTP Cookie File')).toEqual({
      kind: 'skip',
    });
    expect(parseNetscapeLine('   ')).toEqual({ kind: 'skip' });
  });

  it('reads an HttpOnly entry', () => {
    expect(
      parseNetscapeLine('#HttpOnly_.example.com\tTRUE\t/\tTRUE\t4102444800\tsid\tabc'),
    ).toEqual({
      kind: 'cookie',
      cookie: cookie({
        domain: '.example.com',
        includeSubdomains: true,
        secure: true,
        httpOnly: true,
      }),
    });
  });

  it('reads an expiry of 0 as a session cookie', () => {
    expect(
      parseNetscapeLine('example.com\tFALSE\t/\tFALSE\t0\tsid\tabc'),
    ).toEqual({
      kind: 'cookie',
      cookie: cookie({ expires: null, discard: true }),
    });
  });

  it('drops a trailing carriage return', () => {
    expect(
      parseNetscapeLine('example.com\tFALSE\t/\tFALSE\t0\tsid\tabc\r'),
    ).toEqual({
      kind: 'cookie',
      cookie: cookie({ expires: null, discard: true }),
    });
  });

  it('reads an empty name as a cookie without value', () => {
    expect(parseNetscapeLine('example.com\tFALSE\t/\tFALSE\t\t\tflag')).toEqual({
      kind: 'cookie',
      cookie: cookie({
        name: 'flag',
        value: null,
        expires: null,
        discard: true,
      }),
    });
  });

  it.each([
    ['too\tfew\tfields', 'invalid length'],
    ['example.com\tYES\t/\tFALSE\t0\ta\tb', 'invalid flag'],
    ['\tFALSE\t/\tFALSE\t0\ta\tb', 'missing domain'],
    ['example.com\tFALSE\t/\tFALSE\tsoon\ta\tb', 'invalid expires at'],
    ['example.com\tTRUE\t/\tFALSE\t0\ta\tb', 'domain flag mismatch'],
    ['.example.com\tFALSE\t/\tFALSE\t0\ta\tb', 'domain flag mismatch'],
  ])('rejects %j as %s', (line, reason) => {
    expect(parseNetscapeLine(line)).toEqual({ kind: 'invalid', reason });
  });
});
