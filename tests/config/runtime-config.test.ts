import { describe, it, expect } from 'vitest';
import { ConfigValidationError, parseRuntimeConfig } from '../../src/config/runtime-config.js';

describe('parseRuntimeConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(parseRuntimeConfig({})).toEqual({
      openai: { model: 'gpt-4o' },
      browser: { headless: true, navigationTimeoutMs: 30_000 },
      orchestrator: { pageSettleMs: 2_000 },
      logLevel: 'info',
    });
  });

  it('reads every variable', () => {
    const config = parseRuntimeConfig({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_MODEL: 'gpt-4o-mini',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      BROWSER_HEADLESS: 'false',
      NAVIGATION_TIMEOUT_MS: '15000',
      PAGE_SETTLE_MS: '0',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({
      openai: { apiKey: 'test-secret', model: 'gpt-4o-mini', baseUrl: 'http://localhost:8080/v1' },
      browser: { headless: false, navigationTimeoutMs: 15_000 },
      orchestrator: { pageSettleMs: 0 },
      logLevel: 'debug',
    });
  });

  it('treats blank values as unset', () => {
    const config = parseRuntimeConfig({ OPENAI_API_KEY: '  ', OPENAI_MODEL: '' });

    expect(config.openai).toEqual({ model: 'gpt-4o' });
  });

  it('lists every invalid variable', () => {
    expect(() => parseRuntimeConfig({ NAVIGATION_TIMEOUT_MS: 'soon', LOG_LEVEL: 'loud' })).toThrow(
      ConfigValidationError,
    );

    try {
      parseRuntimeConfig({ NAVIGATION_TIMEOUT_MS: 'soon', LOG_LEVEL: 'loud' });
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.section).toBe('runtime');
        expect(error.issues.map((i) => i.path.join('.'))).toEqual(['browser.navigationTimeoutMs', 'logLevel']);
      }
    }
  });
});
