/**
 * types.ts — Shared type definitions for the entire scraping pipeline.
 *
 * Every layer (session store, solver, extractor, fetcher, batch runner,
 * exporter) agrees on the shapes declared here.
 */

import type { LogLevel } from './logger';
import { isLogLevel } from './logger';

// ─── Fetch state machine ───────────────────────────────────

export const FETCH_STATES = [
  'Init',
  'Navigating',
  'ConsentCheck',
  'Loaded',
  'RevealRequested',
  'ChallengeCheck',
  'Extracting',
  'Done',
  'Errored',
] as const;

export type FetchState = (typeof FETCH_STATES)[number];

// ─── Failure taxonomy ──────────────────────────────────────

export const FAILURE_REASONS = [
  'navigation-timeout',
  'consent-failure',
  'reveal-unavailable',
  'challenge-failed',
  'challenge-timed-out',
  'insufficient-balance',
  'extraction-mismatch',
  'session-invalid',
  'browser-launch-failure',
  'fatal-infrastructure',
  'unexpected-error',
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

// ─── Session ───────────────────────────────────────────────

export type CookieSameSite = 'Strict' | 'Lax' | 'None';

/** One authentication cookie, shaped like Puppeteer's `CookieParam`. */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix time in seconds; `-1` or absent for a browser-session cookie. */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: CookieSameSite;
}

/**
 * The imported cookie jar of one logged-in account.
 *
 * A Session value is only ever handed out by SessionStore when it was valid
 * at load time; consumers still re-check with `SessionStore.isValid()`.
 */
export interface Session {
  cookies: SessionCookie[];
  /** Epoch ms after which the session must be treated as absent. */
  expiresAt: number;
  /** Epoch ms at which the cookie jar was exported. */
  savedAt: number;
}

// ─── Challenge solving ─────────────────────────────────────

export interface ChallengeRequest {
  kind: 'recaptcha-v2';
  /** Host of the page that shows the challenge. */
  siteId: string;
  /** The widget's `data-sitekey`. */
  siteKey: string;
  pageUrl: string;
}

export type ChallengeFailureReason =
  | 'insufficient-balance'
  | 'invalid-credential'
  | 'service-error'
  | 'unsolvable';

export type ChallengeResult =
  | { status: 'solved'; token: string; handle: string }
  | { status: 'pending' }
  | { status: 'failed'; reason: ChallengeFailureReason; detail?: string }
  | { status: 'timed-out' };

// ─── Profile record ────────────────────────────────────────

export const PROFILE_FIELDS = [
  'channelName',
  'subscribers',
  'videoCount',
  'totalViews',
  'joinedDate',
  'country',
  'description',
  'email',
] as const;

export type ProfileFieldName = (typeof PROFILE_FIELDS)[number];

/** Fields the page extractor fills; `email` is the hidden field the fetcher owns. */
export type PageFieldName = Exclude<ProfileFieldName, 'email'>;

export const NUMERIC_FIELDS: readonly ProfileFieldName[] = [
  'subscribers',
  'videoCount',
  'totalViews',
];

export type ExtractionSource = 'attribute' | 'pattern' | 'reveal';

export interface ExtractedValue {
  status: 'extracted';
  /** Raw text as shown on the page, e.g. "5.04M subscribers". */
  value: string;
  /** Best-effort numeric reading of count-like fields. */
  normalized?: number;
  source: ExtractionSource;
}

export type FieldValue =
  | ExtractedValue
  | { status: 'unavailable-public' }
  | { status: 'unavailable-auth' }
  | { status: 'extraction-failed'; reason: FailureReason };

export type FieldStatus = FieldValue['status'];

/** What the page extractor produces from one rendered page. */
export interface ExtractedProfile {
  fields: Record<PageFieldName, FieldValue>;
  socialLinks: Record<string, string>;
}

export interface ProfileRecord {
  channelUrl: string;
  channelHandle: string;
  /** Local time of the scrape, "yyyy-MM-dd HH:mm:ss". */
  scrapedAt: string;
  fields: Record<ProfileFieldName, FieldValue>;
  socialLinks: Record<string, string>;
}

// ─── Fetch / batch results ─────────────────────────────────

export type FetchOutcome =
  | { ok: true; target: string; record: ProfileRecord; trace: FetchState[] }
  | {
      ok: false;
      target: string;
      reason: FailureReason;
      /** The state the fetch was in when it failed. */
      state: FetchState;
      message: string;
      trace: FetchState[];
    };

export interface TargetFailure {
  target: string;
  reason: FailureReason;
  state?: FetchState;
  message: string;
}

export interface BatchResult {
  succeeded: ProfileRecord[];
  failed: TargetFailure[];
  /** Set when an interrupt stopped the run before the last target. */
  interrupted: boolean;
}

// ─── Configuration ─────────────────────────────────────────

export type BrowserEngine = 'chromium' | 'firefox';

/**
 * Central configuration for the pipeline, passed into constructors.
 * Read from environment variables with sensible defaults.
 */
export interface ScraperConfig {
  // Challenge service
  captchaApiKey?: string;
  captchaBaseUrl: string;
  captchaTimeoutMs: number;
  captchaPollIntervalMs: number;

  // Session
  sessionFile: string;
  useSession: boolean;
  cookieTtlHours: number;
  requiredCookies: string[];

  // Pacing
  delayBetweenProfilesMs: number;
  navigationTimeoutMs: number;
  /** Pause after navigation and clicks so late widgets can render. */
  settleMs: number;

  // Browser
  headless: boolean;
  browserEngines: BrowserEngine[];
  chromeExecutablePath?: string;
  firefoxExecutablePath?: string;
  userAgent: string;

  logLevel: LogLevel;
}

export const DEFAULT_REQUIRED_COOKIES = ['SID', 'HSID', 'SSID', 'APISID', 'SAPISID'];

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

/** Build a ScraperConfig from an environment map with defaults. */
export function loadScraperConfig(
  env: NodeJS.ProcessEnv = process.env,
): ScraperConfig {
  const logLevel = env.LOG_LEVEL || 'info';

  return {
    captchaApiKey: env.CAPTCHA_API_KEY || undefined,
    captchaBaseUrl: env.CAPTCHA_BASE_URL || 'https://2captcha.com',
    captchaTimeoutMs: Math.round(parseFloat(env.CAPTCHA_TIMEOUT || '120') * 1000),
    captchaPollIntervalMs: parseInt(env.CAPTCHA_POLL_INTERVAL_MS || '5000', 10),
    sessionFile: env.SESSION_FILE || 'youtube_session.json',
    useSession: (env.USE_SESSION || 'true').toLowerCase() !== 'false',
    cookieTtlHours: parseInt(env.COOKIE_TTL_HOURS || '720', 10),
    requiredCookies: parseList(env.REQUIRED_COOKIES) ?? DEFAULT_REQUIRED_COOKIES,
    delayBetweenProfilesMs: Math.round(parseFloat(env.DELAY_BETWEEN_PROFILES || '3') * 1000),
    navigationTimeoutMs: parseInt(env.NAVIGATION_TIMEOUT_MS || '30000', 10),
    settleMs: parseInt(env.SETTLE_MS || '2000', 10),
    headless: (env.HEADLESS || 'false').toLowerCase() === 'true',
    browserEngines: parseEngines(env.BROWSER_ENGINES),
    chromeExecutablePath: env.CHROME_EXECUTABLE_PATH || undefined,
    firefoxExecutablePath: env.FIREFOX_EXECUTABLE_PATH || undefined,
    userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}

function parseList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function isBrowserEngine(value: string): value is BrowserEngine {
  return value === 'chromium' || value === 'firefox';
}

function parseEngines(raw: string | undefined): BrowserEngine[] {
  const engines = (parseList(raw) ?? []).filter(isBrowserEngine);
  return engines.length > 0 ? engines : ['chromium', 'firefox'];
}
