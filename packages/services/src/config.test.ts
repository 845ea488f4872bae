import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ port: 4000, host: '0.0.0.0', logLevel: 'info' });
  });

  it('reads the environment', () => {
    expect(loadConfig({ PORT: '8080', HOST: 'localhost', TILEGRID_LOG_LEVEL: 'debug' })).toEqual({
      port: 8080,
      host: 'localhost',
      logLevel: 'debug'
    });
  });

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
  });
});
