import * as core from './index.js';

describe('core index exports', () => {
  it('re-exports runtime modules', () => {
    expect(core.Request).toBeTypeOf('function');
    expect(core.Response).toBeTypeOf('function');
    expect(core.RequestDirector).toBeTypeOf('function');
    expect(core.RequestHandler).toBeTypeOf('function');
    expect(core.FetchRequestHandler).toBeTypeOf('function');
    expect(core.CookieJar).toBeTypeOf('function');
    expect(core.NoSupportingHandlers).toBeTypeOf('function');
    expect(core.DirectorConfigSchema).toBeDefined();
    expect(core.DEFAULT_HTTP_HEADERS).toBeDefined();
    expect(core.createLogger).toBeTypeOf('function');
  });
});
