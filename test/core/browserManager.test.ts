import { describe, expect, it } from 'vitest';
import {
  createLaunchers,
  launchFirstAvailable,
  launchOptionsFor,
  type EngineLauncher,
} from '../../src/core/browserManager';
import { ScrapeError } from '../../src/core/errors';
import { loadScraperConfig } from '../../src/core/types';

function launcher(engine: 'chromium' | 'firefox', result: string | Error): EngineLauncher<string> {
  return {
    engine,
    launch: async () => {
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

describe('launchFirstAvailable', () => {
  it('returns the first engine that starts', async () => {
    const launched = await launchFirstAvailable([
      launcher('chromium', 'chromium-instance'),
      launcher('firefox', 'firefox-instance'),
    ]);

    expect(launched).toEqual({ instance: 'chromium-instance', engine: 'chromium' });
  });

  it('falls back to the next engine when one fails', async () => {
    const launched = await launchFirstAvailable([
      launcher('chromium', new Error('chrome not found')),
      launcher('firefox', 'firefox-instance'),
    ]);

    expect(launched).toEqual({ instance: 'firefox-instance', engine: 'firefox' });
  });

  it('fails with browser-launch-failure when every engine fails', async () => {
    const attempt = launchFirstAvailable([
      launcher('chromium', new Error('chrome not found')),
      launcher('firefox', new Error('firefox not found')),
    ]);

    await expect(attempt).rejects.toBeInstanceOf(ScrapeError);
    await expect(attempt).rejects.toMatchObject({
      reason: 'browser-launch-failure',
      state: 'Init',
      message: 'No browser engine could be launched (chromium: chrome not found; firefox: firefox not found)',
    });
  });

  it('fails when no engine is configured', async () => {
    await expect(launchFirstAvailable<string>([])).rejects.toThrow('No browser engine configured');
  });
});

describe('createLaunchers', () => {
  it('follows the configured engine order', () => {
    const config = loadScraperConfig({ BROWSER_ENGINES: 'firefox,chromium' });
    expect(createLaunchers(config).map((l) => l.engine)).toEqual(['firefox', 'chromium']);
  });
});

describe('launchOptionsFor', () => {
  const SIGNALS_OFF = { handleSIGINT: false, handleSIGTERM: false, handleSIGHUP: false };

  it('leaves signal handling to the caller for chromium', () => {
    const config = loadScraperConfig({ CHROME_EXECUTABLE_PATH: '/opt/chrome/chrome' });
    const options = launchOptionsFor('chromium', config);

    expect(options).toMatchObject({ browser: 'chrome', executablePath: '/opt/chrome/chrome', ...SIGNALS_OFF });
    expect(options.channel).toBeUndefined();
  });

  it('uses the installed Chrome channel without an executable path', () => {
    expect(launchOptionsFor('chromium', loadScraperConfig({})).channel).toBe('chrome');
  });

  it('leaves signal handling to the caller for firefox', () => {
    const options = launchOptionsFor('firefox', loadScraperConfig({ HEADLESS: 'true' }));

    expect(options).toEqual({ browser: 'firefox', headless: true, ...SIGNALS_OFF });
  });
});
