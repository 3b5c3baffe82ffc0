/**
 * humanBehavior.ts — Human-like browser interactions via ghost-cursor.
 *
 * ghost-cursor moves the pointer along a Bezier path with overshoot and
 * Fitts's-law timing before clicking; the rest of the codebase calls
 * `humanClick()` without knowing about it.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import type { ElementHandle, Page } from 'puppeteer-core';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

// ─── Cursor management ─────────────────────────────────────

export function createHumanCursor(page: Page): GhostCursor {
  return createCursor(page);
}

// ─── Mouse helpers ──────────────────────────────────────────

/**
 * Move the cursor to `target` and click it, after a short hover pause
 * (50–150 ms) like a user confirming what is under the pointer.
 */
export async function humanClick(
  cursor: GhostCursor,
  target: string | ElementHandle<Element>,
  label: string = typeof target === 'string' ? target : 'element',
): Promise<void> {
  logger.debug(`Human-clicking: ${label}`);
  await sleep(randomBetween(50, 150));
  await cursor.click(target);
}

// ─── Utility functions ──────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}
