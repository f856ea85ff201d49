import { afterEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_API_URL, DEFAULT_CORRELATIONS_URL, DEFAULT_PINGS_URL, getConfig } from '../../src/config/config';

describe('getConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should fall back to the public service URLs', () => {
    vi.stubEnv('CRASHSTATS_API_URL', '');
    vi.stubEnv('CRASHSTATS_CORRELATIONS_URL', '');
    vi.stubEnv('CRASHSTATS_PINGS_URL', '');
    vi.stubEnv('SOCORRO_API_TOKEN_PATH', '');

    expect(getConfig()).toEqual({
      apiBaseUrl: DEFAULT_API_URL,
      correlationsBaseUrl: DEFAULT_CORRELATIONS_URL,
      crashPingsBaseUrl: DEFAULT_PINGS_URL,
      tokenPath: undefined
    });
  });

  it('should read overrides and drop trailing slashes', () => {
    vi.stubEnv('CRASHSTATS_API_URL', 'http://localhost:8000/api/');
    vi.stubEnv('SOCORRO_API_TOKEN_PATH', '/run/secrets/socorro');

    const config = getConfig();

    expect(config.apiBaseUrl).toBe('http://localhost:8000/api');
    expect(config.tokenPath).toBe('/run/secrets/socorro');
  });
});
