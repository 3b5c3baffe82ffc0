/**
 * sessionStore.ts — Loads the imported authentication cookie jar.
 *
 * The store never logs in and never writes the session file; the jar is
 * produced once by `import-cookies` (see cookieImporter.ts).  A malformed,
 * incomplete or expired jar is reported as `null` ("no session"), which the
 * fetcher handles as an ordinary state rather than an error.
 *
 * Two file shapes are accepted:
 *   • `{ timestamp, cookies }`  written by `import-cookies`
 *   • `{ cookies, origins }`    a browser storage-state dump
 */

import { readFile, stat } from 'fs/promises';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { Logger } from '../core/logger';
import type { Session, SessionCookie } from '../core/types';

const logger = new Logger('SessionStore');

// ─── File schema ────────────────────────────────────────────

export const sessionCookieSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
  domain: z.string(),
  path: z.string().default('/'),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.enum(['Strict', 'Lax', 'None']).optional(),
});

const sessionFileSchema = z.object({
  /** Epoch ms of the export. */
  timestamp: z.number().optional(),
  cookies: z.array(sessionCookieSchema),
  origins: z.array(z.unknown()).optional(),
});

// ─── Store ──────────────────────────────────────────────────

export interface SessionStoreOptions {
  sessionFile: string;
  /** Cookie names that must all be present for the jar to count as logged-in. */
  requiredCookies: string[];
  /** Upper bound on a jar's age, independent of the cookies' own expiry. */
  cookieTtlHours: number;
  /** Clock (epoch ms), injectable for tests. */
  now?: () => number;
}

export class SessionStore {
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the session file and return the session if it is usable.
   *
   * @returns the Session, or `null` when the file is missing, unparseable,
   *   lacks a required cookie, or has expired.
   */
  async load(): Promise<Session | null> {
    const file = this.options.sessionFile;

    let raw: string;
    let mtimeMs: number;
    try {
      raw = await readFile(file, 'utf-8');
      mtimeMs = (await stat(file)).mtimeMs;
    } catch {
      logger.warn(`No session file at ${file}, continuing without authentication`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      logger.warn(`Session file ${file} is not valid JSON, treating as absent`);
      return null;
    }

    const parsed = sessionFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(
        `Session file ${file} is malformed (${parsed.error.issues[0]?.message ?? 'unknown issue'}), treating as absent`,
      );
      return null;
    }

    const session = this.toSession(
      parsed.data.cookies,
      parsed.data.timestamp ?? mtimeMs,
    );

    const problem = this.describeProblem(session);
    if (problem) {
      logger.warn(`Session ${problem}, continuing without authentication`);
      return null;
    }

    logger.info(
      `Loaded ${session.cookies.length} session cookies ` +
        `(valid until ${DateTime.fromMillis(session.expiresAt).toFormat('yyyy-MM-dd HH:mm')})`,
    );
    return session;
  }

  /**
   * A session is valid when it has not expired and carries every required
   * cookie with a non-empty value.
   */
  isValid(session: Session | null): session is Session {
    return session !== null && this.describeProblem(session) === null;
  }

  /**
   * Build a Session from raw cookies.  The expiry is the earliest of the
   * required cookies' own expiries and `savedAt + cookieTtlHours`.
   */
  toSession(cookies: SessionCookie[], savedAt: number): Session {
    const required = new Set(this.options.requiredCookies);
    const ttlExpiry = DateTime.fromMillis(savedAt)
      .plus({ hours: this.options.cookieTtlHours })
      .toMillis();

    const cookieExpiries = cookies
      .filter((c) => required.has(c.name))
      .map((c) => c.expires)
      .filter((expires): expires is number => expires !== undefined && expires > 0)
      .map((expires) => expires * 1000);

    return {
      cookies,
      savedAt,
      expiresAt: Math.min(ttlExpiry, ...cookieExpiries),
    };
  }

  // ── Internals ──────────────────────────────────────────

  private describeProblem(session: Session): string | null {
    if (session.expiresAt <= this.now()) {
      return `expired at ${DateTime.fromMillis(session.expiresAt).toISO() ?? session.expiresAt}`;
    }

    const present = new Set(
      session.cookies.filter((c) => c.value.length > 0).map((c) => c.name),
    );
    const missing = this.options.requiredCookies.filter((name) => !present.has(name));
    if (missing.length > 0) {
      return `is missing required cookie(s) ${missing.join(', ')}`;
    }

    return null;
  }
}
