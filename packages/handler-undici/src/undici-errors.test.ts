import { ProxyError, TransportError } from '@netdirector/core';
import { errors } from 'undici';
import { classifyUndiciError } from './undici-errors.js';

describe('classifyUndiciError', () => {
  test('should report connect timeouts', () => {
    const error = classifyUndiciError(new errors.ConnectTimeoutError());

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe('Connection timed out');
  });

  test('should report header and body timeouts as read timeouts', () => {
    expect(classifyUndiciError(new errors.HeadersTimeoutError()).message).toBe(
      'Read timed out',
    );
    expect(classifyUndiciError(new errors.BodyTimeoutError()).message).toBe(
      'Read timed out',
    );
  });

  test('should blame the proxy for a refused tunnel', () => {
    const error = classifyUndiciError(
      new errors.RequestAbortedError(
        'Proxy response (407) !== 200 when HTTP Tunneling',
      ),
      { viaProxy: true },
    );

    expect(error).toBeInstanceOf(ProxyError);
  });

  test('should fall back to a plain transport error', () => {
    const error = classifyUndiciError(new errors.SocketError('other side closed'));

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe('other side closed');
    expect(error.cause).toBeInstanceOf(errors.SocketError);
  });
});
