import { consola, type ConsolaInstance } from 'consola';

/**
 * The logging surface the networking core writes to. Any consola instance
 * satisfies it; tests pass a silenced or spied instance.
 */
export type Logger = Pick<ConsolaInstance, 'debug' | 'info' | 'warn' | 'error'>;

export const DEFAULT_LOGGER_TAG = 'netdirector';

export function createLogger(tag: string = DEFAULT_LOGGER_TAG): ConsolaInstance {
  return consola.withTag(tag);
}
