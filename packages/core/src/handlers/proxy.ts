import process from 'node:process';
import type { ProxyMap } from '../types/networking.js';

/** Legacy proxy value meaning "connect directly". */
export const NO_PROXY_SENTINEL = '__noproxy__';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Proxies from `<scheme>_proxy` environment variables. Lowercase variables
 * win over uppercase ones; `no_proxy` lands under the `no` key.
 */
export function getEnvironmentProxies(
  env: NodeJS.ProcessEnv = process.env,
): ProxyMap {
  const proxies: ProxyMap = {};
  const entries = Object.entries(env).sort(([a], [b]) => {
    // Uppercase first so lowercase variables overwrite them.
    return Number(a === a.toLowerCase()) - Number(b === b.toLowerCase());
  });

  for (const [name, value] of entries) {
    const lower = name.toLowerCase();
    if (!value || !lower.endsWith('_proxy')) continue;
    proxies[lower.slice(0, -'_proxy'.length)] = value;
  }
  return proxies;
}

/** A proxy URL without a scheme is an HTTP proxy. */
export function normalizeProxyUrl(proxyUrl: string): string {
  if (SCHEME_PATTERN.test(proxyUrl)) return proxyUrl;
  return `http://${proxyUrl.replace(/^\/\//, '')}`;
}

export interface ProxySources {
  environment?: ProxyMap;
  config?: ProxyMap;
  request?: ProxyMap;
  /** Value of the per-request proxy override header. */
  override?: string;
}

/**
 * Merge proxies by precedence: override header, then the request's own map,
 * then configured defaults. Environment proxies apply only when no defaults
 * are configured; a configured map replaces them as a whole. Sentinels
 * become `null`.
 */
export function resolveProxies({
  environment = {},
  config = {},
  request = {},
  override,
}: ProxySources): ProxyMap {
  const defaults = Object.keys(config).length > 0 ? config : environment;
  const merged: ProxyMap = { ...defaults, ...request };
  if (override) {
    merged['http'] = override;
    merged['https'] = override;
  }

  const resolved: ProxyMap = {};
  for (const [key, value] of Object.entries(merged)) {
    if (value === null || value === NO_PROXY_SENTINEL) {
      resolved[key] = null;
    } else if (key === 'no') {
      resolved[key] = value;
    } else {
      resolved[key] = normalizeProxyUrl(value);
    }
  }
  return resolved;
}

function bypassesProxy(hostname: string, noProxy: string): boolean {
  return noProxy
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean)
    .some((entry) => {
      if (entry === '*') return true;
      const bare = entry.replace(/^\*?\./, '').replace(/:\d+$/, '');
      return hostname === bare || hostname.endsWith(`.${bare}`);
    });
}

export interface SelectedProxy {
  /** Key the proxy was found under: a URL scheme or `all`. */
  key: string;
  url: string;
}

/**
 * The proxy a request to `url` goes through, if any. Honors `no` entries.
 */
export function selectProxy(
  url: string,
  proxies: ProxyMap,
): SelectedProxy | undefined {
  const parsed = new URL(url);
  const noProxy = proxies['no'];
  if (noProxy && bypassesProxy(parsed.hostname.toLowerCase(), noProxy)) {
    return undefined;
  }

  const scheme = parsed.protocol.slice(0, -1);
  for (const key of [scheme, 'all']) {
    if (!(key in proxies)) continue;
    const proxyUrl = proxies[key];
    return proxyUrl ? { key, url: proxyUrl } : undefined;
  }
  return undefined;
}

export function proxyScheme(proxyUrl: string): string {
  return new URL(proxyUrl).protocol.slice(0, -1).toLowerCase();
}
