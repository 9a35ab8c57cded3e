import {
  TransportError,
  classifyTransportError,
  type RequestError,
} from '@netdirector/core';
import { errors as undiciErrors } from 'undici';

/**
 * Map an error thrown by undici to the request error taxonomy. Timeouts get
 * a phase-specific message; everything else goes through the shared
 * Node.js error classification.
 */
export function classifyUndiciError(
  error: unknown,
  options: { viaProxy?: boolean } = {},
): RequestError {
  if (error instanceof undiciErrors.ConnectTimeoutError) {
    return new TransportError('Connection timed out', { cause: error });
  }
  if (
    error instanceof undiciErrors.HeadersTimeoutError ||
    error instanceof undiciErrors.BodyTimeoutError
  ) {
    return new TransportError('Read timed out', { cause: error });
  }
  return classifyTransportError(error, options);
}
