import { Buffer } from 'node:buffer';
import { constants } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { createSecureContext } from 'node:tls';
import type { DirectorConfig } from '../config/director-config.js';
import { ConfigurationError } from '../errors/networking-error.js';

/**
 * TLS settings a backend applies to encrypted connections. Field names
 * follow `tls.connect` so backends can pass the object through.
 */
export interface TlsOptions {
  rejectUnauthorized: boolean;
  cert?: Buffer;
  key?: Buffer;
  passphrase?: string;
  secureOptions?: number;
  ciphers?: string;
}

type TlsConfig = Pick<
  DirectorConfig,
  | 'noCheckCertificate'
  | 'legacyServerConnect'
  | 'clientCertificate'
  | 'clientCertificateKey'
  | 'clientCertificatePassword'
>;

/** True when the configuration asks for anything beyond default verification. */
export function requiresCustomTls(config: TlsConfig): boolean {
  return (
    config.noCheckCertificate ||
    config.legacyServerConnect ||
    config.clientCertificate !== undefined
  );
}

/**
 * Build the TLS settings for a configuration. The legacy-connect relaxation
 * also widens the cipher list to OpenSSL's DEFAULT set. A client certificate
 * that cannot be read or does not match its key is a configuration error.
 */
export function buildTlsOptions(config: TlsConfig): TlsOptions {
  const options: TlsOptions = {
    rejectUnauthorized: !config.noCheckCertificate,
  };

  if (config.legacyServerConnect) {
    options.secureOptions = constants.SSL_OP_LEGACY_SERVER_CONNECT;
    options.ciphers = 'DEFAULT';
  }

  if (config.clientCertificate) {
    try {
      const cert = readFileSync(config.clientCertificate);
      const key = config.clientCertificateKey
        ? readFileSync(config.clientCertificateKey)
        : cert;
      const passphrase = config.clientCertificatePassword;

      createSecureContext({ cert, key, passphrase });

      options.cert = cert;
      options.key = key;
      options.passphrase = passphrase;
    } catch (error) {
      throw new ConfigurationError('Unable to load client certificate', {
        cause: error,
      });
    }
  }

  return options;
}
