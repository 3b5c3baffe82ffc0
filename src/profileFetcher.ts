/**
 * profileFetcher.ts — Per-target state machine.
 *
 *   Init → Navigating → ConsentCheck → Loaded → RevealRequested
 *        → ChallengeCheck → Extracting → Done
 *
 * Each state has one handler that does its work and returns the next state.
 * Any exception moves the fetch to `Errored`, tagged with the state it was
 * thrown from.  Field-level trouble (no reveal control, challenge failed or
 * timed out) never errors the fetch: it is recorded on the e-mail field and
 * the rest of the record is still extracted.
 *
 * The browser is released on every exit path.
 */

import { DateTime } from 'luxon';
import type { PageProvider } from './core/browserManager';
import type { ChannelPage, PageLease } from './core/channelPage';
import { ScrapeError, getErrorMessage, isTimeoutError } from './core/errors';
import { Logger } from './core/logger';
import type {
  ChallengeResult,
  ExtractionSource,
  FailureReason,
  FetchOutcome,
  FetchState,
  FieldValue,
  ProfileRecord,
  Session,
} from './core/types';
import type { ChallengeSolving } from './agents';
import type { ConsentOutcome } from './middleware';
import { ChannelScraper } from './scrapers';

const logger = new Logger('ProfileFetcher');

// ─── Types ──────────────────────────────────────────────────

/** The part of SessionStore the fetcher needs. */
export interface SessionValidator {
  isValid(session: Session | null): session is Session;
}

export interface ProfileFetcherOptions {
  pages: PageProvider;
  sessionStore: SessionValidator;
  /** The session loaded at start-up, or null to run signed out. */
  session: Session | null;
  /** Omit to skip challenge solving (the e-mail is then marked challenge-failed). */
  solver?: ChallengeSolving;
  scraper?: ChannelScraper;
  navigationTimeoutMs: number;
  challengeTimeoutMs: number;
  now?: () => number;
}

interface FetchContext {
  target: string;
  aboutUrl: string;
  state: FetchState;
  trace: FetchState[];
  session: Session | null;
  lease: PageLease | null;
  email: FieldValue;
  challengeSubmitted: boolean;
  record: ProfileRecord | null;
}

type ActiveState = Exclude<FetchState, 'Done' | 'Errored'>;
type StateHandler = (ctx: FetchContext) => Promise<FetchState>;

// ─── Fetcher ────────────────────────────────────────────────

export class ProfileFetcher {
  private readonly scraper: ChannelScraper;
  private readonly now: () => number;
  private readonly handlers: Record<ActiveState, StateHandler>;

  constructor(private readonly options: ProfileFetcherOptions) {
    this.scraper = options.scraper ?? new ChannelScraper();
    this.now = options.now ?? Date.now;
    this.handlers = {
      Init: (ctx) => this.init(ctx),
      Navigating: (ctx) => this.navigate(ctx),
      ConsentCheck: (ctx) => this.checkConsent(ctx),
      Loaded: (ctx) => this.loaded(ctx),
      RevealRequested: (ctx) => this.revealRequested(ctx),
      ChallengeCheck: (ctx) => this.checkChallenge(ctx),
      Extracting: (ctx) => this.extracting(ctx),
    };
  }

  /**
   * Run the state machine for one target.  Never throws: failures come back
   * as `{ ok: false }` with the state they happened in.
   */
  async fetch(target: string): Promise<FetchOutcome> {
    const ctx: FetchContext = {
      target,
      aboutUrl: '',
      state: 'Init',
      trace: [],
      session: null,
      lease: null,
      email: { status: 'extraction-failed', reason: 'extraction-mismatch' },
      challengeSubmitted: false,
      record: null,
    };

    try {
      for (;;) {
        const state = ctx.state;
        ctx.trace.push(state);
        if (state === 'Done' || state === 'Errored') break;

        logger.debug(`${target}: ${state}`);
        ctx.state = await this.handlers[state](ctx);
      }

      if (!ctx.record) {
        throw new ScrapeError('unexpected-error', 'State machine finished without a record');
      }
      return { ok: true, target, record: ctx.record, trace: ctx.trace };
    } catch (err) {
      const reason: FailureReason = err instanceof ScrapeError ? err.reason : 'unexpected-error';
      const state = (err instanceof ScrapeError && err.state) || ctx.state;
      ctx.trace.push('Errored');
      logger.error(`${target} failed in ${state} (${reason}): ${getErrorMessage(err)}`, err);
      return {
        ok: false,
        target,
        reason,
        state,
        message: getErrorMessage(err),
        trace: ctx.trace,
      };
    } finally {
      await this.release(ctx);
    }
  }

  // ── State handlers ─────────────────────────────────────

  private async init(ctx: FetchContext): Promise<FetchState> {
    ctx.aboutUrl = aboutUrlFor(ctx.target);

    const configured = this.options.session;
    ctx.session = this.options.sessionStore.isValid(configured) ? configured : null;
    if (configured && !ctx.session) {
      logger.warn('session-invalid: the session expired since start-up, continuing signed out');
    }

    ctx.lease = await this.options.pages.openPage(ctx.session);
    logger.info(`Opened ${ctx.aboutUrl} with ${ctx.lease.engine}`);
    return 'Navigating';
  }

  private async navigate(ctx: FetchContext): Promise<FetchState> {
    await this.goto(ctx);
    return 'ConsentCheck';
  }

  private async checkConsent(ctx: FetchContext): Promise<FetchState> {
    const page = this.page(ctx);
    let outcome: ConsentOutcome;
    try {
      outcome = await page.dismissConsent();
    } catch (err) {
      logger.warn(`consent-failure: ${getErrorMessage(err)}`);
      return 'Loaded';
    }

    if (outcome === 'failed') {
      logger.warn(`consent-failure: could not dismiss the consent screen for ${ctx.target}`);
    } else if (outcome === 'accepted' && !page.url().includes('/about')) {
      await this.goto(ctx);
    }
    return 'Loaded';
  }

  private async loaded(ctx: FetchContext): Promise<FetchState> {
    if (!ctx.session) {
      logger.info('No valid session, e-mail needs sign-in');
      ctx.email = { status: 'unavailable-auth' };
      return 'Extracting';
    }

    const page = this.page(ctx);
    const probe = await page.probeReveal();
    if (probe === 'needs-auth') {
      logger.warn('session-invalid: page still asks to sign in for the e-mail');
      ctx.email = { status: 'unavailable-auth' };
      return 'Extracting';
    }

    const visible = this.scraper.findEmail(await page.content());
    if (visible) {
      ctx.email = extracted(visible, 'pattern');
      return 'Extracting';
    }

    if (probe === 'absent') {
      logger.info('reveal-unavailable: channel offers no e-mail');
      ctx.email = { status: 'unavailable-public' };
      return 'Extracting';
    }

    if (!(await page.clickReveal())) {
      ctx.email = { status: 'extraction-failed', reason: 'reveal-unavailable' };
      return 'Extracting';
    }
    return 'RevealRequested';
  }

  private async revealRequested(ctx: FetchContext): Promise<FetchState> {
    const page = this.page(ctx);

    const email = this.scraper.findEmail(await page.content());
    if (email) {
      logger.info(`E-mail revealed: ${email}`);
      ctx.email = extracted(email, 'reveal');
      return 'Extracting';
    }

    if (await page.hasChallenge()) {
      logger.info('Challenge shown after reveal');
      return 'ChallengeCheck';
    }

    logger.warn('Reveal clicked but neither an e-mail nor a challenge appeared');
    ctx.email = { status: 'extraction-failed', reason: 'extraction-mismatch' };
    return 'Extracting';
  }

  private async checkChallenge(ctx: FetchContext): Promise<FetchState> {
    ctx.email = await this.solveChallenge(ctx);
    return 'Extracting';
  }

  private async extracting(ctx: FetchContext): Promise<FetchState> {
    const page = this.page(ctx);
    const profile = this.scraper.extract(await page.content(), page.url());

    ctx.record = freezeRecord({
      channelUrl: ctx.target,
      channelHandle: channelHandleOf(ctx.target),
      scrapedAt: DateTime.fromMillis(this.now()).toFormat('yyyy-MM-dd HH:mm:ss'),
      fields: { ...profile.fields, email: ctx.email },
      socialLinks: profile.socialLinks,
    });
    return 'Done';
  }

  // ── Helpers ────────────────────────────────────────────

  /** One solve per page load; every outcome ends as an e-mail field value. */
  private async solveChallenge(ctx: FetchContext): Promise<FieldValue> {
    const page = this.page(ctx);
    const solver = this.options.solver;

    if (ctx.challengeSubmitted) {
      logger.warn('Challenge already attempted on this page load');
      return failedField('challenge-failed');
    }

    const siteKey = await page.findSiteKey();
    if (!siteKey) {
      logger.warn('challenge-failed: no sitekey found on the page');
      return failedField('challenge-failed');
    }
    if (!solver) {
      logger.warn('challenge-failed: no challenge solver configured (set CAPTCHA_API_KEY)');
      return failedField('challenge-failed');
    }

    ctx.challengeSubmitted = true;
    const pageUrl = page.url();

    let result: ChallengeResult;
    try {
      result = await solver.solve(
        { kind: 'recaptcha-v2', siteId: new URL(pageUrl).hostname, siteKey, pageUrl },
        this.options.challengeTimeoutMs,
      );
    } catch (err) {
      logger.error(`challenge-failed: solver error: ${getErrorMessage(err)}`, err);
      return failedField('challenge-failed');
    }

    switch (result.status) {
      case 'solved': {
        await page.submitChallengeToken(result.token);
        const email = this.scraper.findEmail(await page.content());
        if (email) {
          logger.info(`E-mail revealed after challenge: ${email}`);
          return extracted(email, 'reveal');
        }
        logger.warn('Token submitted but no e-mail appeared, reporting it as bad');
        if (solver.reportBad) {
          await solver.reportBad(result.handle);
        }
        return failedField('challenge-failed');
      }
      case 'failed':
        return failedField(
          result.reason === 'insufficient-balance' ? 'insufficient-balance' : 'challenge-failed',
        );
      case 'timed-out':
      case 'pending':
        return failedField('challenge-timed-out');
    }
  }

  private async goto(ctx: FetchContext): Promise<void> {
    try {
      await this.page(ctx).goto(ctx.aboutUrl, this.options.navigationTimeoutMs);
    } catch (err) {
      if (isTimeoutError(err)) {
        throw new ScrapeError(
          'navigation-timeout',
          `${ctx.aboutUrl} did not load within ${this.options.navigationTimeoutMs} ms`,
          ctx.state,
        );
      }
      throw err;
    }
  }

  private page(ctx: FetchContext): ChannelPage {
    if (!ctx.lease) {
      throw new ScrapeError('unexpected-error', 'No page is open', ctx.state);
    }
    return ctx.lease.page;
  }

  private async release(ctx: FetchContext): Promise<void> {
    if (!ctx.lease) return;
    try {
      await ctx.lease.close();
    } catch (err) {
      logger.warn(`Could not close the browser for ${ctx.target}: ${getErrorMessage(err)}`);
    }
    ctx.lease = null;
  }
}

// ─── Pure helpers ───────────────────────────────────────────

/**
 * About-page URL for a channel URL: `/featured` becomes `/about`, anything
 * else gets `/about` appended.  Query and fragment are dropped.
 */
export function aboutUrlFor(target: string): string {
  const url = new URL(target);
  let path = url.pathname.replace(/\/+$/, '');

  if (path.endsWith('/featured')) {
    path = `${path.slice(0, -'/featured'.length)}/about`;
  } else if (!path.endsWith('/about')) {
    path = `${path}/about`;
  }

  url.pathname = path;
  url.search = '';
  url.hash = '';
  return url.toString();
}

/** `@handle`, or the id after `/channel/`, `/c/` or `/user/`. */
export function channelHandleOf(target: string): string {
  let segments: string[];
  try {
    segments = new URL(target).pathname.split('/').filter(Boolean);
  } catch {
    return '';
  }

  const handle = segments.find((s) => s.startsWith('@'));
  if (handle) return decodeSegment(handle);

  const prefixIndex = segments.findIndex((s) => ['channel', 'c', 'user'].includes(s));
  if (prefixIndex >= 0 && segments[prefixIndex + 1]) return segments[prefixIndex + 1];

  return segments[0] ?? '';
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function extracted(value: string, source: ExtractionSource): FieldValue {
  return { status: 'extracted', value, source };
}

function failedField(reason: FailureReason): FieldValue {
  return { status: 'extraction-failed', reason };
}

function freezeRecord(record: ProfileRecord): ProfileRecord {
  for (const value of Object.values(record.fields)) {
    Object.freeze(value);
  }
  Object.freeze(record.fields);
  Object.freeze(record.socialLinks);
  return Object.freeze(record);
}
