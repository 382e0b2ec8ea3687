import { describe, it, expect } from 'vitest';
import { loadConfig, parseCookieString } from '../../../src/utils/validators';

describe('Config Validator', () => {
  describe('parseCookieString', () => {
    it('should split a cookie header into name/value pairs', () => {
      expect(parseCookieString('NNB=test-cookie; NACT=1;  SRT30=abc=def ')).toEqual({
        NNB: 'test-cookie',
        NACT: '1',
        SRT30: 'abc=def',
      });
    });

    it('should skip segments without a name', () => {
      expect(parseCookieString('flag; =orphan; empty=')).toEqual({ empty: '' });
    });

    it('should return no cookies for missing input', () => {
      expect(parseCookieString(undefined)).toEqual({});
      expect(parseCookieString('')).toEqual({});
    });
  });

  describe('loadConfig', () => {
    it('should use default values when env vars are not set', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        entryUrl: 'https://fin.land.naver.com/search',
        browserEngine: 'firefox',
        headless: true,
        cookies: {},
        cookieDomain: '.naver.com',
        maxLaunchAttempts: 5,
        retryBaseDelayMs: 20000,
        retryStepMs: 1000,
        navigationTimeoutMs: 60000,
        defaultTimeoutMs: 30000,
        cacheDbPath: 'data/search-cache.db',
        cacheTtlSeconds: 300,
        outputDir: 'output',
        logLevel: 'info',
      });
    });

    it('should load config from environment variables', () => {
      const config = loadConfig({
        BROWSER_ENGINE: 'chromium',
        HEADLESS: 'false',
        NAVER_COOKIES: 'NNB=test-cookie; NACT=1',
        MAX_LAUNCH_ATTEMPTS: '3',
        RETRY_BASE_DELAY_MS: '1000',
        PROXY_SERVER: 'http://proxy.local:8080',
        PROXY_USERNAME: 'user',
        CACHE_TTL_SECONDS: '60',
        LOG_LEVEL: 'debug',
      });

      expect(config.browserEngine).toBe('chromium');
      expect(config.headless).toBe(false);
      expect(config.cookies).toEqual({ NNB: 'test-cookie', NACT: '1' });
      expect(config.maxLaunchAttempts).toBe(3);
      expect(config.retryBaseDelayMs).toBe(1000);
      expect(config.proxy).toEqual({ server: 'http://proxy.local:8080', username: 'user' });
      expect(config.cacheTtlSeconds).toBe(60);
      expect(config.logLevel).toBe('debug');
    });

    it('should treat any other HEADLESS value as true', () => {
      expect(loadConfig({ HEADLESS: 'yes' }).headless).toBe(true);
      expect(loadConfig({ HEADLESS: 'OFF' }).headless).toBe(false);
    });

    it('should throw error for an unknown browser engine', () => {
      expect(() => loadConfig({ BROWSER_ENGINE: 'webkit' })).toThrow(/^Invalid configuration: browserEngine: /);
    });

    it('should throw error for a non-numeric attempt count', () => {
      expect(() => loadConfig({ MAX_LAUNCH_ATTEMPTS: 'many' })).toThrow(/maxLaunchAttempts/);
    });
  });
});
