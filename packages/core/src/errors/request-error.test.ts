import { Readable } from 'node:stream';
import { Response } from '../response/response.js';
import { NetworkingError } from './networking-error.js';
import {
  CertificateVerifyError,
  HTTPError,
  IncompleteRead,
  NoSupportingHandlers,
  ProxyError,
  RequestError,
  SSLError,
  TransportError,
  UnsupportedRequest,
  isNetworkError,
} from './request-error.js';

function unsupported(message: string, handler: string): UnsupportedRequest {
  return new UnsupportedRequest(message, { handler });
}

describe('RequestError', () => {
  it('names instances after their class and keeps the prototype chain', () => {
    const error = new CertificateVerifyError('bad cert');

    expect(error.name).toBe('CertificateVerifyError');
    expect(error).toBeInstanceOf(SSLError);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toBeInstanceOf(RequestError);
    expect(error).toBeInstanceOf(NetworkingError);
    expect(error).toBeInstanceOf(Error);
  });

  it('falls back to the cause message', () => {
    const cause = new Error('connection reset by peer');
    const error = new TransportError(undefined, { cause, handler: 'Fetch' });

    expect(error.message).toBe('connection reset by peer');
    expect(error.cause).toBe(cause);
    expect(error.handler).toBe('Fetch');
  });
});

describe('SSLError', () => {
  it('points legacy renegotiation failures at legacyServerConnect', () => {
    const error = new SSLError(
      'ERR_SSL_UNSAFE_LEGACY_RENEGOTIATION_DISABLED: unsafe legacy renegotiation disabled',
    );

    expect(error.message).toBe(
      'UNSAFE_LEGACY_RENEGOTIATION_DISABLED: Try enabling legacyServerConnect',
    );
  });

  it('points handshake failures at the cipher list', () => {
    const error = new SSLError('sslv3 alert: SSLV3_ALERT_HANDSHAKE_FAILURE');

    expect(error.message).toBe(
      'SSLV3_ALERT_HANDSHAKE_FAILURE: The server may not support the current cipher list. Try enabling legacyServerConnect to use the DEFAULT cipher list',
    );
  });

  it('keeps other messages', () => {
    expect(new SSLError('wrong version number').message).toBe(
      'wrong version number',
    );
  });
});

describe('IncompleteRead', () => {
  it('omits the expected count when unknown', () => {
    expect(new IncompleteRead(10).message).toBe('IncompleteRead(10 bytes read)');
  });
});

describe('HTTPError', () => {
  it('describes the status and keeps the response open', () => {
    const response = new Response(Readable.from([]), {
      url: 'https://example.com/missing',
      status: 404,
    });
    const error = new HTTPError(response);

    expect(error.message).toBe('HTTP Error 404: Not Found');
    expect(error.status).toBe(404);
    expect(error.reason).toBe('Not Found');
    expect(error.redirectLoop).toBe(false);
    expect(error.response.closed).toBe(false);
  });

  it('flags redirect loops in the message', () => {
    const response = new Response(Readable.from([]), {
      url: 'https://example.com/loop',
      status: 302,
    });

    expect(new HTTPError(response, true).message).toBe(
      'HTTP Error 302: Found (redirect loop detected)',
    );
  });
});

describe('NoSupportingHandlers', () => {
  it('groups reasons by message and counts unexpected errors', () => {
    const error = new NoSupportingHandlers(
      [
        unsupported('ftp scheme is not supported', 'A'),
        unsupported('ftp scheme is not supported', 'B'),
        unsupported('Proxies are not supported', 'C'),
      ],
      [new Error('boom'), new Error('bang')],
    );

    expect(error.message).toBe(
      'Unable to handle request, possible reason(s): ftp scheme is not supported (A, B), Proxies are not supported (C), 2 unexpected error(s)',
    );
    expect(error.unsupportedErrors).toHaveLength(3);
    expect(error.unexpectedErrors).toHaveLength(2);
  });

  it('has a bare message with nothing to report', () => {
    expect(new NoSupportingHandlers([], []).message).toBe(
      'Unable to handle request',
    );
  });
});

describe('isNetworkError', () => {
  it('matches transport and HTTP failures only', () => {
    const response = new Response(Readable.from([]), {
      url: 'https://example.com',
      status: 500,
    });

    expect(isNetworkError(new HTTPError(response))).toBe(true);
    expect(isNetworkError(new ProxyError('refused'))).toBe(true);
    expect(isNetworkError(new UnsupportedRequest('nope'))).toBe(false);
    expect(isNetworkError(new Error('other'))).toBe(false);
  });
});
