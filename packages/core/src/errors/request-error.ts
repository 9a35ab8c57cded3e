import type { Response } from '../response/response.js';
import { NetworkingError } from './networking-error.js';

export interface RequestErrorOptions {
  /** The underlying error, if any. Its message is used when none is given. */
  cause?: unknown;
  /** Name of the request handler that raised the error. */
  handler?: string;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined || cause === null) return '';
  return String(cause);
}

/**
 * Base class for every failure raised while handling a request.
 */
export class RequestError extends NetworkingError {
  /** Set by the dispatching handler before the error propagates. */
  public handler?: string;

  constructor(message?: string, options: RequestErrorOptions = {}) {
    super(message || describeCause(options.cause), { cause: options.cause });
    this.handler = options.handler;
  }
}

/**
 * The handler cannot service this request (scheme, proxy or feature
 * mismatch). Drives fallback to the next handler; never a transport failure.
 */
export class UnsupportedRequest extends RequestError {}

/** Network-level failure: connection reset, DNS failure, timeout. */
export class TransportError extends RequestError {}

const LEGACY_RENEGOTIATION = 'UNSAFE_LEGACY_RENEGOTIATION_DISABLED';
const HANDSHAKE_FAILURE = 'SSLV3_ALERT_HANDSHAKE_FAILURE';

/**
 * TLS handshake or verification failure. Two OpenSSL conditions get a
 * message pointing at the setting that works around them.
 */
export class SSLError extends TransportError {
  constructor(message?: string, options: RequestErrorOptions = {}) {
    super(message, options);
    if (this.message.includes(LEGACY_RENEGOTIATION)) {
      this.message = `${LEGACY_RENEGOTIATION}: Try enabling legacyServerConnect`;
    } else if (this.message.includes(HANDSHAKE_FAILURE)) {
      this.message = `${HANDSHAKE_FAILURE}: The server may not support the current cipher list. Try enabling legacyServerConnect to use the DEFAULT cipher list`;
    }
  }
}

/** The server certificate could not be verified. */
export class CertificateVerifyError extends SSLError {}

/** The proxy refused or failed the connection. */
export class ProxyError extends TransportError {}

/**
 * The response stream ended before the declared length was read.
 */
export class IncompleteRead extends TransportError {
  /** Number of bytes read before the stream ended. */
  public readonly partial: number;
  /** Number of bytes still expected, when known. */
  public readonly expected?: number;

  constructor(
    partial: number,
    options: RequestErrorOptions & { expected?: number } = {},
  ) {
    const expected =
      options.expected !== undefined ? `, ${options.expected} more expected` : '';
    super(`IncompleteRead(${partial} bytes read${expected})`, options);
    this.partial = partial;
    this.expected = options.expected;
  }
}

/**
 * The server responded with an error status. The response is kept open so
 * callers can read the error body; they own closing it.
 */
export class HTTPError extends RequestError {
  public readonly response: Response;
  public readonly status: number;
  public readonly reason: string;
  public readonly redirectLoop: boolean;

  constructor(response: Response, redirectLoop = false) {
    const reason = response.reason ?? '';
    super(
      `HTTP Error ${response.status}: ${reason}${redirectLoop ? ' (redirect loop detected)' : ''}`,
    );
    this.response = response;
    this.status = response.status;
    this.reason = reason;
    this.redirectLoop = redirectLoop;
  }
}

/**
 * No registered handler could service the request. The message groups the
 * unsupported reasons by text and lists which handlers gave each one.
 */
export class NoSupportingHandlers extends RequestError {
  public readonly unsupportedErrors: ReadonlyArray<UnsupportedRequest>;
  public readonly unexpectedErrors: ReadonlyArray<unknown>;

  constructor(
    unsupportedErrors: Array<UnsupportedRequest>,
    unexpectedErrors: Array<unknown>,
  ) {
    const handlersByReason = new Map<string, Array<string>>();
    for (const error of unsupportedErrors) {
      const handlers = handlersByReason.get(error.message) ?? [];
      handlers.push(error.handler ?? 'unknown');
      handlersByReason.set(error.message, handlers);
    }

    const reasons = [...handlersByReason].map(
      ([reason, handlers]) => `${reason} (${handlers.join(', ')})`,
    );
    if (unexpectedErrors.length > 0) {
      reasons.push(`${unexpectedErrors.length} unexpected error(s)`);
    }

    let message = 'Unable to handle request';
    if (reasons.length > 0) {
      message += `, possible reason(s): ${reasons.join(', ')}`;
    }

    super(message);
    this.unsupportedErrors = unsupportedErrors;
    this.unexpectedErrors = unexpectedErrors;
  }
}

/** True for failures where the server or network misbehaved. */
export function isNetworkError(
  error: unknown,
): error is HTTPError | TransportError {
  return error instanceof HTTPError || error instanceof TransportError;
}
