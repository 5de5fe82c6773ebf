import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databasePath: 'data/recipes',
      mediaRoot: 'media',
      mediaUrl: '/media/',
      maxUploadBytes: 5 * 1024 * 1024,
      jsonBodyLimit: '1mb',
      bcryptRounds: 10,
      corsOrigin: undefined,
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({ PORT: '8080', MEDIA_URL: '/static', CORS_ORIGIN: 'http://localhost:5173' });

    expect(config.port).toBe(8080);
    expect(config.mediaUrl).toBe('/static/');
    expect(config.corsOrigin).toBe('http://localhost:5173');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ BCRYPT_ROUNDS: '3' })).toThrow(/^Invalid configuration: BCRYPT_ROUNDS: /);
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
  });
});
