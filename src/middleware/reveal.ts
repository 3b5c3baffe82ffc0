/**
 * reveal.ts — The "View email address" control on a channel About page.
 *
 * The control is only rendered for signed-in viewers and only on channels
 * that published a business e-mail.  Signed-out viewers see a
 * "Sign in to see email address" prompt instead.
 */

import type { Page } from 'puppeteer-core';
import type { GhostCursor } from 'ghost-cursor';
import { Logger } from '../core/logger';
import { humanClick } from './humanBehavior';

const logger = new Logger('Reveal');

export const REVEAL_TEXT = 'View email address';
export const SIGN_IN_TEXT = 'Sign in to see email address';

const REVEAL_CONTROLS = [
  `::-p-xpath(//button[contains(normalize-space(.), "${REVEAL_TEXT}")])`,
  `::-p-xpath(//*[@role="button"][contains(normalize-space(.), "${REVEAL_TEXT}")])`,
  `[aria-label*="${REVEAL_TEXT}"]`,
];

export type RevealProbe = 'available' | 'absent' | 'needs-auth';

/** Classify the reveal control from the page's visible text. */
export function probeRevealText(text: string): RevealProbe {
  if (text.includes(SIGN_IN_TEXT)) return 'needs-auth';
  if (text.includes(REVEAL_TEXT)) return 'available';
  return 'absent';
}

/**
 * Click the reveal control.
 *
 * @returns false when no control could be found on the page.
 */
export async function clickReveal(page: Page, cursor: GhostCursor): Promise<boolean> {
  for (const selector of REVEAL_CONTROLS) {
    const control = await page.$(selector);
    if (!control) continue;

    logger.info(`Clicking "${REVEAL_TEXT}"`);
    await control.scrollIntoView();
    await humanClick(cursor, control, REVEAL_TEXT);
    return true;
  }

  logger.warn(`"${REVEAL_TEXT}" is in the text but no clickable control matched`);
  return false;
}
