/**
 * cookieImporter.ts — Convert a browser-extension cookie export into the
 * session file read by SessionStore.
 *
 * Extensions such as "EditThisCookie" / "Cookie-Editor" export an array of
 * `{ name, value, domain, path, expirationDate, sameSite: "no_restriction" … }`.
 * The session file stores Puppeteer-style cookies with `expires` in seconds
 * and capitalised `sameSite` values.
 */

import { readFile, writeFile } from 'fs/promises';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { Logger } from '../core/logger';
import type { CookieSameSite, SessionCookie } from '../core/types';

const logger = new Logger('CookieImporter');

const exportedCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string(),
  path: z.string().default('/'),
  expirationDate: z.number().nullish(),
  httpOnly: z.boolean().default(false),
  secure: z.boolean().default(false),
  sameSite: z.string().nullish(),
});

export type ExportedCookie = z.input<typeof exportedCookieSchema>;

const exportFileSchema = z.union([
  z.array(exportedCookieSchema),
  z.object({ cookies: z.array(exportedCookieSchema) }).transform((v) => v.cookies),
]);

/** Cookies whose expiry is worth printing after an import. */
const AUTH_COOKIES = ['SID', 'HSID', 'SSID'];

export interface ImportReport {
  total: number;
  valid: number;
  expired: number;
  /** Expiry (yyyy-MM-dd HH:mm) of the main auth cookies that have one. */
  authExpiries: Record<string, string>;
}

// ─── Conversion ─────────────────────────────────────────────

export function mapSameSite(raw: string | null | undefined): CookieSameSite | undefined {
  switch (raw?.toLowerCase()) {
    case 'no_restriction':
    case 'none':
      return 'None';
    case 'lax':
      return 'Lax';
    case 'strict':
      return 'Strict';
    default:
      // "unspecified" and missing values leave the browser default.
      return undefined;
  }
}

/** Map extension-format cookies to session cookies. */
export function convertBrowserCookies(exported: ExportedCookie[]): SessionCookie[] {
  return exported.map((input) => {
    const cookie = exportedCookieSchema.parse(input);
    const converted: SessionCookie = {
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      secure: cookie.secure,
      httpOnly: cookie.httpOnly,
    };

    if (cookie.expirationDate) {
      converted.expires = Math.trunc(cookie.expirationDate);
    }

    const sameSite = mapSameSite(cookie.sameSite);
    if (sameSite) {
      converted.sameSite = sameSite;
    }

    return converted;
  });
}

/** Count live vs. expired cookies relative to `nowMs`. */
export function summarizeCookies(cookies: SessionCookie[], nowMs: number): ImportReport {
  const nowSeconds = nowMs / 1000;
  const report: ImportReport = { total: cookies.length, valid: 0, expired: 0, authExpiries: {} };

  for (const cookie of cookies) {
    if (cookie.expires === undefined) continue;

    if (cookie.expires < nowSeconds) {
      report.expired++;
    } else {
      report.valid++;
      if (AUTH_COOKIES.includes(cookie.name)) {
        report.authExpiries[cookie.name] = DateTime.fromSeconds(cookie.expires).toFormat(
          'yyyy-MM-dd HH:mm',
        );
      }
    }
  }

  return report;
}

// ─── File I/O ───────────────────────────────────────────────

/**
 * Read an extension export from `inputFile` and write the session file.
 *
 * @returns a summary of how many cookies are still live.
 */
export async function importCookies(
  inputFile: string,
  sessionFile: string,
  nowMs: number = Date.now(),
): Promise<ImportReport> {
  const raw = await readFile(inputFile, 'utf-8');
  const exported = exportFileSchema.parse(JSON.parse(raw));
  const cookies = convertBrowserCookies(exported);

  await writeFile(
    sessionFile,
    JSON.stringify({ timestamp: nowMs, cookies }, null, 2),
    'utf-8',
  );

  const report = summarizeCookies(cookies, nowMs);
  logger.info(`Saved ${report.total} cookies to ${sessionFile}`);
  for (const [name, expiry] of Object.entries(report.authExpiries)) {
    logger.info(`  ${name} expires: ${expiry}`);
  }
  logger.info(`  Valid cookies: ${report.valid}`);
  if (report.expired > 0) {
    logger.warn(`  Expired cookies: ${report.expired}`);
  }

  return report;
}
