import { FetchRequestHandler, createLogger } from '@netdirector/core';
import { UndiciRequestHandler, createDirector } from './index.js';

describe('createDirector', () => {
  test('should register undici beneath fetch', async () => {
    const logger = createLogger('test');
    vi.spyOn(logger, 'debug').mockImplementation(() => undefined);

    const director = createDirector({
      logger,
      config: { useEnvironmentProxies: false },
    });
    const handlers = director.getHandlers();

    expect(handlers).toHaveLength(2);
    expect(handlers[0]).toBeInstanceOf(UndiciRequestHandler);
    expect(handlers[1]).toBeInstanceOf(FetchRequestHandler);
    await director.close();
  });

  test('should reject invalid configuration up front', () => {
    expect(() => createDirector({ config: { socketTimeout: 0 } })).toThrow(
      /socketTimeout/,
    );
  });
});
