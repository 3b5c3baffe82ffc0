/**
 * compliance.ts — Pacing between profile visits.
 *
 * One Bottleneck limiter per batch run runs a single fetch at a time.  The
 * pause between profiles is measured from the end of one fetch to the start
 * of the next, and applies even when a profile fails fast.
 */

import Bottleneck from 'bottleneck';
import { Logger } from '../core/logger';
import { sleep } from './humanBehavior';

const logger = new Logger('Compliance');

/** Create the page-load limiter for one run. */
export function createProfileLimiter(): Bottleneck {
  return new Bottleneck({ maxConcurrent: 1 });
}

/** Wait between the end of one fetch and the start of the next. */
export async function pauseBetweenProfiles(pauseMs: number): Promise<void> {
  if (pauseMs <= 0) return;
  logger.debug(`Waiting ${pauseMs} ms before the next profile`);
  await sleep(pauseMs);
}

/** Accept-Language sent with every page load; matches the user agent's locale. */
export const ACCEPT_LANGUAGE = 'en-US,en;q=0.9';
