import { Readable } from 'node:stream';
import {
  IncompleteRead,
  RequestError,
  TransportError,
} from '../errors/request-error.js';
import { ResponseHeaders } from './response-headers.js';
import { Response, expectedBodyLength } from './response.js';

const url = 'https://media.example.com/clip';

function bodyOf(...chunks: Array<string>): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

describe('Response', () => {
  it('reads in slices and tracks the position', async () => {
    const response = new Response(bodyOf('hello ', 'world'), { url });

    expect((await response.read(3)).toString()).toBe('hel');
    expect(response.tell()).toBe(3);
    expect((await response.read()).toString()).toBe('lo world');
    expect(response.tell()).toBe(11);
    expect((await response.read()).length).toBe(0);
  });

  it('returns an empty buffer for a non-positive amount', async () => {
    const response = new Response(bodyOf('data'), { url });

    expect((await response.read(0)).length).toBe(0);
    expect(response.tell()).toBe(0);
  });

  it('defaults the status and derives the reason', () => {
    expect(new Response(bodyOf(), { url }).status).toBe(200);
    expect(new Response(bodyOf(), { url, status: 404 }).reason).toBe(
      'Not Found',
    );
    expect(
      new Response(bodyOf(), { url, status: 404, reason: 'Gone Fishing' })
        .reason,
    ).toBe('Gone Fishing');
  });

  it('keeps repeated headers and looks them up case-insensitively', () => {
    const response = new Response(bodyOf(), {
      url,
      headers: [
        ['Set-Cookie', 'a=1'],
        ['set-cookie', 'b=2'],
        ['Content-Type', 'video/mp4'],
      ],
    });

    expect(response.getHeader('content-type')).toBe('video/mp4');
    expect(response.headers.getAll('SET-COOKIE')).toEqual(['a=1', 'b=2']);
  });

  it('reports the redirect target only for redirect statuses', () => {
    const headers = { location: '/next' };

    expect(
      new Response(bodyOf(), { url, status: 302, headers }).getRedirectUrl(),
    ).toBe('/next');
    expect(
      new Response(bodyOf(), { url, status: 200, headers }).getRedirectUrl(),
    ).toBeNull();
    expect(new Response(bodyOf(), { url, status: 307 }).getRedirectUrl()).toBeNull();
  });

  it('raises IncompleteRead when the body ends short of the declared length', async () => {
    const response = new Response(bodyOf('hello'), {
      url,
      expectedLength: 20,
    });

    const error = await response.read().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(IncompleteRead);
    expect(error).toMatchObject({
      partial: 5,
      expected: 15,
      message: 'IncompleteRead(5 bytes read, 15 more expected)',
    });
  });

  it('surfaces stream failures as TransportError', async () => {
    const raw = new Readable({
      read() {
        this.destroy(new Error('socket hang up'));
      },
    });
    const response = new Response(raw, { url });

    await expect(response.read()).rejects.toThrow(TransportError);
  });

  it('closes idempotently and refuses reads afterwards', async () => {
    const raw = bodyOf('data');
    const response = new Response(raw, { url });

    response.close();
    response.close();

    expect(response.closed).toBe(true);
    expect(raw.destroyed).toBe(true);
    await expect(response.read()).rejects.toThrow(RequestError);
  });
});

describe('expectedBodyLength', () => {
  const lengthOnly = new ResponseHeaders({ 'content-length': '42' });

  it('uses Content-Length for plain bodies', () => {
    expect(expectedBodyLength('GET', 200, lengthOnly)).toBe(42);
  });

  it('is unknown for bodiless responses', () => {
    expect(expectedBodyLength('HEAD', 200, lengthOnly)).toBeUndefined();
    expect(expectedBodyLength('GET', 304, lengthOnly)).toBeUndefined();
  });

  it('is unknown for encoded or malformed lengths', () => {
    const encoded = new ResponseHeaders({
      'content-length': '42',
      'content-encoding': 'gzip',
    });
    const malformed = new ResponseHeaders({ 'content-length': '4x' });

    expect(expectedBodyLength('GET', 200, encoded)).toBeUndefined();
    expect(expectedBodyLength('GET', 200, malformed)).toBeUndefined();
  });
});
