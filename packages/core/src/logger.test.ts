import { DEFAULT_LOGGER_TAG, createLogger } from './logger.js';

describe('createLogger', () => {
  it('tags the instance with the library name by default', () => {
    expect(createLogger().options.defaults.tag).toBe(DEFAULT_LOGGER_TAG);
  });

  it('accepts a custom tag', () => {
    expect(createLogger('downloader').options.defaults.tag).toBe('downloader');
  });
});
