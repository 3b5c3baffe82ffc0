/**
 * consent.ts — Detect and dismiss the cookie-consent interstitial.
 *
 * Visitors from some regions are redirected to `consent.youtube.com` (or
 * shown an in-page "Before you continue" dialog) before any channel page
 * renders.  We click the first visible accept control and let the redirect
 * bring us back.
 */

import type { Page } from 'puppeteer-core';
import type { GhostCursor } from 'ghost-cursor';
import { Logger } from '../core/logger';
import { humanClick, sleep } from './humanBehavior';

const logger = new Logger('Consent');

export const CONSENT_HOST = 'consent.youtube.com';
export const CONSENT_TEXT = 'Before you continue';

/** Accept controls, tried in order. */
export const ACCEPT_CONTROLS = [
  '::-p-xpath(//button[contains(normalize-space(.), "Accept all")])',
  '::-p-xpath(//button[contains(normalize-space(.), "Reject all")])',
  '[aria-label*="Accept"]',
];

export type ConsentOutcome = 'absent' | 'accepted' | 'failed';

/** True when `url`/`text` belong to the consent interstitial. */
export function isConsentScreen(url: string, text: string): boolean {
  let host = '';
  try {
    host = new URL(url).hostname;
  } catch {
    host = '';
  }
  return host === CONSENT_HOST || text.includes(CONSENT_TEXT);
}

async function onConsentScreen(page: Page): Promise<boolean> {
  const text = await page.evaluate(() => document.body?.innerText ?? '');
  return isConsentScreen(page.url(), text);
}

/**
 * Dismiss the consent screen if one is showing.
 *
 * @returns 'absent' when there was nothing to dismiss, 'accepted' once the
 *   screen is gone, 'failed' when no control worked.
 */
export async function dismissConsent(
  page: Page,
  cursor: GhostCursor,
  settleMs: number,
): Promise<ConsentOutcome> {
  if (!(await onConsentScreen(page))) return 'absent';

  logger.info('Consent screen detected, looking for an accept control…');

  for (const selector of ACCEPT_CONTROLS) {
    const control = await page.$(selector);
    if (!control) continue;
    if (!(await control.isVisible())) {
      await control.dispose();
      continue;
    }

    await humanClick(cursor, control, selector);
    await sleep(settleMs);

    if (!(await onConsentScreen(page))) {
      logger.info('Consent accepted');
      return 'accepted';
    }
  }

  return 'failed';
}
