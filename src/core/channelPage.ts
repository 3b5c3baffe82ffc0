/**
 * channelPage.ts — The page operations ProfileFetcher drives, and their
 * Puppeteer implementation.
 *
 * ProfileFetcher only ever sees the `ChannelPage` interface; tests hand it
 * a scripted in-memory page instead of a browser.
 */

import type { Page } from 'puppeteer-core';
import type { GhostCursor } from 'ghost-cursor';
import {
  clickReveal,
  createHumanCursor,
  discoverSiteKey,
  dismissConsent,
  hasChallengeMarkup,
  injectChallengeToken,
  probeRevealText,
  sleep,
  type ConsentOutcome,
  type RevealProbe,
} from '../middleware';

export interface ChannelPage {
  /** Load `url`; rejects with a `TimeoutError` when it does not load in time. */
  goto(url: string, timeoutMs: number): Promise<void>;
  url(): string;
  /** Serialised DOM of the page as currently rendered. */
  content(): Promise<string>;
  dismissConsent(): Promise<ConsentOutcome>;
  probeReveal(): Promise<RevealProbe>;
  /** @returns false when the control could not be clicked. */
  clickReveal(): Promise<boolean>;
  hasChallenge(): Promise<boolean>;
  findSiteKey(): Promise<string | null>;
  submitChallengeToken(token: string): Promise<void>;
}

/** A page borrowed for one target; `close()` tears the whole browser down. */
export interface PageLease {
  page: ChannelPage;
  engine: string;
  close(): Promise<void>;
}

export class PuppeteerChannelPage implements ChannelPage {
  private cursor: GhostCursor | null = null;

  constructor(
    private readonly page: Page,
    private readonly settleMs: number,
  ) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    await sleep(this.settleMs);
  }

  url(): string {
    return this.page.url();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  dismissConsent(): Promise<ConsentOutcome> {
    return dismissConsent(this.page, this.getCursor(), this.settleMs);
  }

  async probeReveal(): Promise<RevealProbe> {
    const text = await this.page.evaluate(() => document.body?.innerText ?? '');
    return probeRevealText(text);
  }

  async clickReveal(): Promise<boolean> {
    const clicked = await clickReveal(this.page, this.getCursor());
    if (clicked) await sleep(this.settleMs);
    return clicked;
  }

  async hasChallenge(): Promise<boolean> {
    return hasChallengeMarkup(await this.page.content(), this.frameUrls());
  }

  async findSiteKey(): Promise<string | null> {
    return discoverSiteKey(await this.page.content(), this.frameUrls());
  }

  async submitChallengeToken(token: string): Promise<void> {
    await injectChallengeToken(this.page, this.getCursor(), token);
    await sleep(this.settleMs);
  }

  // ── Internals ──────────────────────────────────────────

  private frameUrls(): string[] {
    return this.page.frames().map((frame) => frame.url());
  }

  private getCursor(): GhostCursor {
    if (!this.cursor) {
      this.cursor = createHumanCursor(this.page);
    }
    return this.cursor;
  }
}
