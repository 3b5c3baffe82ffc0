/**
 * challenge.ts — reCAPTCHA v2 widget handling on the rendered page.
 *
 * Detection and sitekey discovery are pure functions of the page HTML and
 * the URLs of its frames, so they run under test without a browser.  Token
 * injection and submit need the live page.
 *
 * Sitekey sources, in order:
 *   1. `data-sitekey` on any element (usually `.g-recaptcha`)
 *   2. the `k=` parameter of the anchor iframe's URL
 *   3. `sitekey: "…"` / `"sitekey":"…"` in inline scripts
 */

import * as cheerio from 'cheerio';
import type { Page } from 'puppeteer-core';
import type { GhostCursor } from 'ghost-cursor';
import { Logger } from '../core/logger';
import { humanClick } from './humanBehavior';

const logger = new Logger('Challenge');

const SUBMIT_CONTROLS = [
  '#recaptcha-demo-submit',
  'button[type="submit"]',
  'input[type="submit"]',
];

// ─── Detection ──────────────────────────────────────────────

export function hasChallengeMarkup(html: string, frameUrls: string[]): boolean {
  if (frameUrls.some((url) => url.includes('recaptcha'))) return true;

  const $ = cheerio.load(html);
  if ($('.g-recaptcha').length > 0) return true;

  return $('iframe')
    .toArray()
    .some((frame) => {
      const title = $(frame).attr('title') ?? '';
      const src = $(frame).attr('src') ?? '';
      return title.includes('reCAPTCHA') || src.includes('recaptcha');
    });
}

// ─── Sitekey discovery ──────────────────────────────────────

const SCRIPT_SITEKEY_PATTERNS = [
  /sitekey["'\s:=]+([A-Za-z0-9_-]{40,})/,
  /"sitekey"\s*:\s*"([^"]+)"/,
];

export function discoverSiteKey(html: string, frameUrls: string[]): string | null {
  const $ = cheerio.load(html);

  const fromAttribute = $('[data-sitekey]').first().attr('data-sitekey');
  if (fromAttribute) return fromAttribute;

  for (const frameUrl of frameUrls) {
    if (!frameUrl.includes('recaptcha')) continue;
    const key = siteKeyFromFrameUrl(frameUrl);
    if (key) return key;
  }

  for (const pattern of SCRIPT_SITEKEY_PATTERNS) {
    const match = html.match(pattern);
    if (match) return match[1];
  }

  return null;
}

function siteKeyFromFrameUrl(frameUrl: string): string | null {
  try {
    return new URL(frameUrl).searchParams.get('k');
  } catch {
    return null;
  }
}

// ─── Token injection ────────────────────────────────────────

/**
 * Write `token` into every response field, fire the widget callback and
 * press the form's submit control.
 */
export async function injectChallengeToken(
  page: Page,
  cursor: GhostCursor,
  token: string,
): Promise<void> {
  const callbackFired = await page.evaluate((value: string) => {
    const fields = document.querySelectorAll(
      '[name="g-recaptcha-response"], #g-recaptcha-response, .g-recaptcha-response',
    );
    fields.forEach((field) => {
      if (field instanceof HTMLTextAreaElement || field instanceof HTMLInputElement) {
        field.value = value;
      }
      field.textContent = value;
    });

    // Explicit-render widgets keep their callback in ___grecaptcha_cfg.
    const findCallback = (node: unknown, depth: number): unknown => {
      if (depth > 4 || typeof node !== 'object' || node === null) return null;
      const direct: unknown = Reflect.get(node, 'callback');
      if (typeof direct === 'function') return direct;
      for (const child of Object.values(node)) {
        const found = findCallback(child, depth + 1);
        if (found) return found;
      }
      return null;
    };

    const clients: unknown = Reflect.get(Reflect.get(window, '___grecaptcha_cfg') ?? {}, 'clients');
    let callback = findCallback(clients, 0);

    if (!callback) {
      const name = document.querySelector('.g-recaptcha')?.getAttribute('data-callback');
      callback = name ? Reflect.get(window, name) : null;
    }

    if (typeof callback === 'function') {
      callback(value);
      return true;
    }
    return false;
  }, token);

  logger.info(`Injected challenge token${callbackFired ? ' and fired widget callback' : ''}`);

  for (const selector of SUBMIT_CONTROLS) {
    const control = await page.$(selector);
    if (!control) continue;
    await humanClick(cursor, control, selector);
    return;
  }
  logger.debug('No submit control next to the challenge widget');
}
