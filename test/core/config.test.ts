import { describe, expect, it } from 'vitest';
import { getErrorMessage, isTimeoutError } from '../../src/core/errors';
import { isLogLevel } from '../../src/core/logger';
import { DEFAULT_REQUIRED_COOKIES, loadScraperConfig } from '../../src/core/types';

describe('loadScraperConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadScraperConfig({});

    expect(config).toMatchObject({
      captchaApiKey: undefined,
      captchaBaseUrl: 'https://2captcha.com',
      captchaTimeoutMs: 120_000,
      captchaPollIntervalMs: 5_000,
      sessionFile: 'youtube_session.json',
      useSession: true,
      cookieTtlHours: 720,
      requiredCookies: DEFAULT_REQUIRED_COOKIES,
      delayBetweenProfilesMs: 3_000,
      navigationTimeoutMs: 30_000,
      headless: false,
      browserEngines: ['chromium', 'firefox'],
      logLevel: 'info',
    });
  });

  it('reads seconds-based settings as fractions and lists as CSV', () => {
    const config = loadScraperConfig({
      CAPTCHA_API_KEY: 'test-key',
      CAPTCHA_TIMEOUT: '90',
      DELAY_BETWEEN_PROFILES: '1.5',
      REQUIRED_COOKIES: 'SID, SAPISID',
      HEADLESS: 'TRUE',
      USE_SESSION: 'false',
      LOG_LEVEL: 'debug',
    });

    expect(config.captchaApiKey).toBe('test-key');
    expect(config.captchaTimeoutMs).toBe(90_000);
    expect(config.delayBetweenProfilesMs).toBe(1_500);
    expect(config.requiredCookies).toEqual(['SID', 'SAPISID']);
    expect(config.headless).toBe(true);
    expect(config.useSession).toBe(false);
    expect(config.logLevel).toBe('debug');
  });

  it('falls back to defaults for empty or unknown values', () => {
    const config = loadScraperConfig({
      CAPTCHA_API_KEY: '',
      CAPTCHA_TIMEOUT: '',
      BROWSER_ENGINES: 'webkit',
      LOG_LEVEL: 'verbose',
    });

    expect(config.captchaApiKey).toBeUndefined();
    expect(config.captchaTimeoutMs).toBe(120_000);
    expect(config.browserEngines).toEqual(['chromium', 'firefox']);
    expect(config.logLevel).toBe('info');
  });
});

describe('isLogLevel', () => {
  it('accepts only the four levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('toString')).toBe(false);
  });
});

describe('error helpers', () => {
  it('reads a message from anything thrown', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });

  it('recognises timeouts by name', () => {
    const timeout = new Error('Navigation timeout');
    timeout.name = 'TimeoutError';
    expect(isTimeoutError(timeout)).toBe(true);
    expect(isTimeoutError(new Error('Navigation timeout'))).toBe(false);
  });
});
