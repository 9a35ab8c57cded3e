/**
 * Base class for every error raised by the networking core.
 * Consumers can extend this for domain-specific error handling.
 */
export class NetworkingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised for invalid configuration: a malformed config object, no handlers
 * registered, or a client certificate that cannot be loaded. Never retried.
 */
export class ConfigurationError extends NetworkingError {}
