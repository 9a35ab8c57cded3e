import {
  CertificateVerifyError,
  ProxyError,
  RequestError,
  SSLError,
  TransportError,
} from './request-error.js';

const CERTIFICATE_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
]);

const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Walk `cause` links down to the innermost error; fetch wraps socket
 * failures as `TypeError('fetch failed', { cause })`.
 */
export function rootCause(error: unknown): unknown {
  let current = error;
  for (let depth = 0; depth < 10; depth++) {
    if (!(current instanceof Error) || current.cause === undefined) break;
    current = current.cause;
  }
  return current;
}

/**
 * Map a Node.js socket, TLS or fetch failure to the request error taxonomy.
 * Errors already classified are returned unchanged.
 */
export function classifyTransportError(
  error: unknown,
  options: { viaProxy?: boolean } = {},
): RequestError {
  if (error instanceof RequestError) return error;

  const root = rootCause(error);
  const code = errorCode(root) ?? errorCode(error);
  const message =
    root instanceof Error ? root.message : String(root ?? 'unknown error');

  if (error instanceof Error && error.name === 'TimeoutError') {
    return new TransportError('Read timed out', { cause: error });
  }
  if (code && CERTIFICATE_ERROR_CODES.has(code)) {
    return new CertificateVerifyError(`${code}: ${message}`, { cause: error });
  }
  if ((code && code.startsWith('ERR_SSL')) || /\bSSL\b|\bTLS\b/.test(message)) {
    return new SSLError(code ? `${code}: ${message}` : message, {
      cause: error,
    });
  }
  if (
    options.viaProxy &&
    ((code && CONNECT_ERROR_CODES.has(code)) || /proxy/i.test(message))
  ) {
    return new ProxyError(message, { cause: error });
  }
  return new TransportError(message, { cause: error });
}
