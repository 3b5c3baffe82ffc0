/**
 * targetList.ts — Reads the list of channels to scrape.
 *
 * One target per line.  Blank lines and `#` comments are skipped; anything
 * that is not already an http(s) URL is treated as a path on the platform,
 * so `@handle` becomes `https://www.youtube.com/@handle`.
 */

import { readFile } from 'fs/promises';
import { FatalInfrastructureError, getErrorMessage } from '../core/errors';
import { Logger } from '../core/logger';

const logger = new Logger('TargetList');

export const PLATFORM_ORIGIN = 'https://www.youtube.com';

export function normalizeTarget(line: string): string {
  const trimmed = line.trim();
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  return `${PLATFORM_ORIGIN}/${trimmed.replace(/^\/+/, '')}`;
}

export function parseTargets(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map(normalizeTarget);
}

/** @throws FatalInfrastructureError when `file` cannot be read. */
export async function loadTargets(file: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (err) {
    throw new FatalInfrastructureError(
      `Cannot read target list ${file}: ${getErrorMessage(err)}`,
      err,
    );
  }

  const targets = parseTargets(text);
  logger.info(`Loaded ${targets.length} target(s) from ${file}`);
  return targets;
}
