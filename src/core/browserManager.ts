/**
 * browserManager.ts — Launches one browser per target and hands out a page.
 *
 * Engines are tried in the configured order (stealth Chromium first, plain
 * Firefox as the fallback); the first one that launches wins.  Every lease
 * owns its browser process: `lease.close()` shuts it down, and the fetcher
 * calls it on every exit path.  Processes are never shared between targets.
 */

import puppeteerCore from 'puppeteer-core';
import type { Browser, CookieParam, Page } from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { ACCEPT_LANGUAGE } from '../middleware/compliance';
import { PuppeteerChannelPage, type PageLease } from './channelPage';
import { ScrapeError, getErrorMessage } from './errors';
import { Logger } from './logger';
import type { BrowserEngine, ScraperConfig, Session } from './types';

const logger = new Logger('BrowserManager');

// puppeteer-extra plugins must be registered before the first launch().
const stealthChromium = addExtra(puppeteerCore);
stealthChromium.use(StealthPlugin());

const CHROMIUM_ARGS = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-blink-features=AutomationControlled',
  '--lang=en-US',
];

const VIEWPORT = { width: 1366, height: 900 };

// ─── Launchers ──────────────────────────────────────────────

export interface EngineLauncher<T> {
  engine: BrowserEngine;
  launch(): Promise<T>;
}

/**
 * Try each launcher in order and return the first instance that starts.
 *
 * @throws ScrapeError(browser-launch-failure) when every launcher fails.
 */
export async function launchFirstAvailable<T>(
  launchers: EngineLauncher<T>[],
): Promise<{ instance: T; engine: BrowserEngine }> {
  const failures: string[] = [];

  for (const launcher of launchers) {
    try {
      const instance = await launcher.launch();
      logger.debug(`Launched ${launcher.engine}`);
      return { instance, engine: launcher.engine };
    } catch (err) {
      logger.warn(`Could not launch ${launcher.engine}: ${getErrorMessage(err)}`);
      failures.push(`${launcher.engine}: ${getErrorMessage(err)}`);
    }
  }

  throw new ScrapeError(
    'browser-launch-failure',
    failures.length > 0
      ? `No browser engine could be launched (${failures.join('; ')})`
      : 'No browser engine configured',
    'Init',
  );
}

/** Launchers for the engines named in `config.browserEngines`, in that order. */
export function createLaunchers(config: ScraperConfig): EngineLauncher<Browser>[] {
  return config.browserEngines.map((engine) =>
    engine === 'chromium'
      ? { engine, launch: () => launchChromium(config) }
      : { engine, launch: () => launchFirefox(config) },
  );
}

/**
 * Launch options for one engine.  Puppeteer's own signal handlers stay off:
 * they kill the browser and exit the process on Ctrl-C, while the CLI stops
 * only between targets.
 */
export interface EngineLaunchOptions {
  browser: 'chrome' | 'firefox';
  headless: boolean;
  args?: string[];
  executablePath?: string;
  channel?: 'chrome';
  handleSIGINT: false;
  handleSIGTERM: false;
  handleSIGHUP: false;
}

export function launchOptionsFor(engine: BrowserEngine, config: ScraperConfig): EngineLaunchOptions {
  const signals = { handleSIGINT: false, handleSIGTERM: false, handleSIGHUP: false } as const;

  if (engine === 'firefox') {
    return {
      browser: 'firefox',
      headless: config.headless,
      ...(config.firefoxExecutablePath ? { executablePath: config.firefoxExecutablePath } : {}),
      ...signals,
    };
  }
  return {
    browser: 'chrome',
    headless: config.headless,
    args: CHROMIUM_ARGS,
    ...(config.chromeExecutablePath
      ? { executablePath: config.chromeExecutablePath }
      : { channel: 'chrome' as const }),
    ...signals,
  };
}

async function launchChromium(config: ScraperConfig): Promise<Browser> {
  const browser: Browser = await stealthChromium.launch(launchOptionsFor('chromium', config));
  return browser;
}

async function launchFirefox(config: ScraperConfig): Promise<Browser> {
  return puppeteerCore.launch(launchOptionsFor('firefox', config));
}

// ─── Manager ────────────────────────────────────────────────

/** Where ProfileFetcher gets its pages from. */
export interface PageProvider {
  openPage(session: Session | null): Promise<PageLease>;
}

export class BrowserManager implements PageProvider {
  private readonly launchers: EngineLauncher<Browser>[];

  constructor(
    private readonly config: ScraperConfig,
    launchers?: EngineLauncher<Browser>[],
  ) {
    this.launchers = launchers ?? createLaunchers(config);
  }

  /**
   * Launch a browser and open a prepared page: viewport, user agent,
   * language header and, when `session` is given, its cookies.
   */
  async openPage(session: Session | null): Promise<PageLease> {
    const { instance: browser, engine } = await launchFirstAvailable(this.launchers);

    try {
      const page = await browser.newPage();
      await this.preparePage(page, session);

      return {
        page: new PuppeteerChannelPage(page, this.config.settleMs),
        engine,
        close: () => closeBrowser(browser),
      };
    } catch (err) {
      await closeBrowser(browser);
      throw err;
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async preparePage(page: Page, session: Session | null): Promise<void> {
    await page.setViewport(VIEWPORT);
    await page.setUserAgent(this.config.userAgent);
    await page.setExtraHTTPHeaders({ 'accept-language': ACCEPT_LANGUAGE });

    if (session) {
      const cookies: CookieParam[] = session.cookies.map((cookie) => ({ ...cookie }));
      await page.setCookie(...cookies);
      logger.info(`Injected ${cookies.length} session cookies`);
    }
  }
}

async function closeBrowser(browser: Browser): Promise<void> {
  try {
    await browser.close();
  } catch (err) {
    logger.warn(`Browser did not close cleanly: ${getErrorMessage(err)}`);
  }
}
