import { z } from 'zod';
import { ConfigurationError } from '../errors/networking-error.js';

/**
 * Headers sent with every request unless the request overrides them.
 * Spread into `httpHeaders` to use.
 */
export const DEFAULT_HTTP_HEADERS: Readonly<Record<string, string>> =
  Object.freeze({
    'User-Agent':
      'Mozilla/5.0 (X11; Linux x86_64; rv:128.0) Gecko/20100101 Firefox/128.0',
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-us,en;q=0.5',
    'Sec-Fetch-Mode': 'navigate',
  });

export const DEFAULT_SOCKET_TIMEOUT = 20;

export const DirectorConfigSchema = z
  .object({
    /** Headers merged beneath every request's own headers. */
    httpHeaders: z.record(z.string(), z.string()).default({}),
    /** Proxy per scheme; `null` or `__noproxy__` disables proxying. */
    proxies: z.record(z.string(), z.string().nullable()).default({}),
    /** Timeout in seconds for requests that set none. */
    socketTimeout: z.number().positive().optional(),
    /** Skip TLS certificate verification. */
    noCheckCertificate: z.boolean().default(false),
    /** Allow legacy TLS renegotiation and the DEFAULT cipher list. */
    legacyServerConnect: z.boolean().default(false),
    /** Path to a PEM client certificate (may include the key). */
    clientCertificate: z.string().min(1).optional(),
    /** Path to the client certificate's private key. */
    clientCertificateKey: z.string().min(1).optional(),
    clientCertificatePassword: z.string().optional(),
    /** Fall back to `<scheme>_proxy` / `all_proxy` environment variables. */
    useEnvironmentProxies: z.boolean().default(true),
  })
  .refine(
    (config) =>
      config.clientCertificate !== undefined ||
      (config.clientCertificateKey === undefined &&
        config.clientCertificatePassword === undefined),
    {
      message:
        'clientCertificateKey and clientCertificatePassword require clientCertificate',
      path: ['clientCertificate'],
    },
  );

export type DirectorConfigInput = z.input<typeof DirectorConfigSchema>;
export type DirectorConfig = Readonly<z.output<typeof DirectorConfigSchema>>;

/**
 * Validate a configuration object once and freeze the result so the
 * director and its handlers share it read-only.
 */
export function parseDirectorConfig(
  input: DirectorConfigInput = {},
): DirectorConfig {
  const result = DirectorConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid networking configuration: ${details}`, {
      cause: result.error,
    });
  }

  return Object.freeze({
    ...result.data,
    httpHeaders: Object.freeze({ ...result.data.httpHeaders }),
    proxies: Object.freeze({ ...result.data.proxies }),
  });
}
