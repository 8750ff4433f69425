import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({ DATABASE_URL: 'postgres://localhost/test' })).toEqual({
      DATABASE_URL: 'postgres://localhost/test',
      PORT: 3000,
      AGGREGATION_INTERVAL_MS: 3_600_000,
      AGGREGATION_MAX_ATTEMPTS: 2,
      DB_POOL_MIN: 2,
      DB_POOL_MAX: 10,
    });
  });

  it('coerces numeric settings from strings', () => {
    const config = loadConfig({ DATABASE_URL: 'postgres://localhost/test', PORT: '8080', AGGREGATION_MAX_ATTEMPTS: '4' });
    expect(config.PORT).toBe(8080);
    expect(config.AGGREGATION_MAX_ATTEMPTS).toBe(4);
  });

  it('fails without a database URL', () => {
    expect(() => loadConfig({})).toThrow('Invalid configuration — DATABASE_URL: Required');
  });

  it('fails on a non-numeric port', () => {
    expect(() => loadConfig({ DATABASE_URL: 'postgres://localhost/test', PORT: 'http' })).toThrow(/PORT/);
  });
});
