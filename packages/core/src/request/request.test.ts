import { RequestError } from '../errors/request-error.js';
import { HttpHeaders } from './headers.js';
import { Request, headRequest, putRequest } from './request.js';

describe('Request', () => {
  it('derives the method from the payload unless one is given', () => {
    expect(new Request('https://example.com').method).toBe('GET');
    expect(new Request('https://example.com', { data: 'a=1' }).method).toBe(
      'POST',
    );
    expect(
      new Request('https://example.com', { data: 'a=1', method: 'PATCH' })
        .method,
    ).toBe('PATCH');
  });

  it('falls back to the derived method when the explicit one is cleared', () => {
    const request = new Request('https://example.com', { method: 'DELETE' });
    request.method = undefined;

    expect(request.method).toBe('GET');
  });

  it('treats header names case-insensitively', () => {
    const request = new Request('https://example.com', {
      headers: { 'x-test': '1' },
    });

    expect(request.getHeader('X-TEST')).toBe('1');
    expect(request.hasHeader('x-Test')).toBe(true);
    expect(request.getHeader('missing', 'fallback')).toBe('fallback');
    expect([...request.headers.keys()]).toEqual(['X-Test']);
  });

  it('drops Content-Length when the payload changes', () => {
    const request = new Request('https://example.com', {
      data: 'abc',
      headers: { 'Content-Length': '3' },
    });

    request.data = 'abc';
    expect(request.getHeader('Content-Length')).toBe('3');

    request.data = 'abcd';
    expect(request.hasHeader('Content-Length')).toBe(false);
  });

  it('accepts only HttpHeaders for the headers property', () => {
    const request = new Request('https://example.com');

    expect(() => Reflect.set(request, 'headers', { 'X-A': '1' })).toThrow(
      TypeError,
    );

    request.headers = new HttpHeaders({ 'X-A': '1' });
    expect(request.getHeader('x-a')).toBe('1');
  });

  it('renormalizes the URL on assignment and extracts credentials', () => {
    const request = new Request('https://example.com/');
    request.url = 'HTTPS://u:p@Example.org/';

    expect(request.url).toBe('https://example.org/');
    expect(request.getHeader('Authorization')).toBe('Basic dTpw');
  });

  it('merges query parameters into the URL', () => {
    const request = new Request('https://example.com/search?q=old&page=2', {
      query: { q: 'new' },
    });

    expect(request.url).toBe('https://example.com/search?page=2&q=new');
  });

  it('exposes scheme and host', () => {
    const request = new Request('HTTPS://Example.com:8443/x');

    expect(request.scheme).toBe('https');
    expect(request.host).toBe('example.com:8443');
  });

  it('rejects unparseable URLs', () => {
    expect(() => new Request('http://')).toThrow(RequestError);
  });

  it('copies into a structurally independent request', () => {
    const original = new Request('https://example.com', {
      headers: { 'X-A': '1' },
      proxies: { http: 'http://proxy.example:3128' },
      extensions: { timeout: 5 },
      timeout: 10,
      allowRedirects: false,
    });
    const copy = original.copy();

    copy.headers.set('X-B', '2');
    copy.proxies['https'] = 'http://other.example:3128';
    copy.extensions['cookiejar'] = 'replaced';

    expect(original.hasHeader('X-B')).toBe(false);
    expect(original.proxies).toEqual({ http: 'http://proxy.example:3128' });
    expect(original.extensions).toEqual({ timeout: 5 });
    expect(copy.timeout).toBe(10);
    expect(copy.allowRedirects).toBe(false);
    expect(copy.getHeader('X-A')).toBe('1');
  });

  it('defaults compression and redirects on', () => {
    const request = new Request('https://example.com');

    expect(request.compression).toBe(true);
    expect(request.allowRedirects).toBe(true);
    expect(request.timeout).toBeUndefined();
  });
});

describe('verb factories', () => {
  it('builds HEAD and PUT requests', () => {
    expect(headRequest('https://example.com').method).toBe('HEAD');

    const put = putRequest('https://example.com/upload', { data: 'body' });
    expect(put.method).toBe('PUT');
    expect(put.data).toBe('body');
  });
});
