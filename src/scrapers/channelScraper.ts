/**
 * channelScraper.ts — Page extractor for a channel "About" page.
 *
 * Field order of preference:
 *   1. Element ids / meta tags / itemprop attributes of the rendered page
 *   2. The `ytInitialData` blob embedded in a <script>
 *   3. Anchored text patterns in the about section, then the whole page
 *
 * The hidden contact e-mail is not a page field: ProfileFetcher owns it and
 * uses `findEmail()` to read it once it has been revealed.
 */

import {
  BaseScraper,
  collapseWhitespace,
  findEmails,
  normalizeCount,
  visibleText,
  type FieldStrategy,
  type ParsedPage,
} from './baseScraper';
import type {
  ExtractedProfile,
  FieldValue,
  PageFieldName,
} from '../core/types';
import { NUMERIC_FIELDS } from '../core/types';
import { Logger } from '../core/logger';

const logger = new Logger('ChannelScraper');

/** Containers of the about-section text, newest layout first. */
const ABOUT_SECTION = 'ytd-about-channel-renderer, #additional-info-container, #about-container';

export const DESCRIPTION_LIMIT = 500;

export const COUNTRIES = [
  'United States',
  'United Kingdom',
  'Canada',
  'Australia',
  'Germany',
  'France',
  'Spain',
  'Italy',
  'Netherlands',
  'Japan',
  'India',
  'Brazil',
];

const SOCIAL_HOSTS = [
  'twitter.com',
  'x.com',
  'instagram.com',
  'twitch.tv',
  'facebook.com',
  'tiktok.com',
  'linkedin.com',
];

const MAX_LABEL_LENGTH = 100;

// Counts must be followed directly by their unit word.
const SUBSCRIBERS_PATTERN = /\d[\d,.]*\s?[KMB]?\s*subscribers?\b/i;
const VIDEOS_PATTERN = /\d[\d,.]*\s?[KMB]?\s*videos?\b/i;
const VIEWS_PATTERN = /\d[\d,.]*\s*views?\b/i;
const JOINED_PATTERN =
  /Joined\s+(?:[A-Za-z]{3,9}\.?\s+\d{1,2},?|\d{1,2}\s+[A-Za-z]{3,9}\.?)\s+\d{4}/;
const COUNTRY_PATTERN = new RegExp(`\\b(?:${COUNTRIES.join('|')})\\b`);

export class ChannelScraper extends BaseScraper {
  private readonly strategies: Record<PageFieldName, FieldStrategy[]>;

  constructor() {
    super();
    this.strategies = {
      channelName: [
        this.attributeStrategy(['meta[property="og:title"]', 'meta[itemprop="name"]'], 'content'),
        this.attributeStrategy(['#channel-name #text', 'yt-dynamic-text-view-model h1', '#page-header h1']),
        titleStrategy,
      ],
      subscribers: [
        this.attributeStrategy(['#subscriber-count']),
        this.scriptDataStrategy('subscriberCountText'),
        this.patternStrategy('subscribers', SUBSCRIBERS_PATTERN, 'section'),
        this.patternStrategy('subscribers', SUBSCRIBERS_PATTERN, 'page'),
      ],
      videoCount: [
        this.attributeStrategy(['#videos-count']),
        this.scriptDataStrategy('videoCountText'),
        this.patternStrategy('videos', VIDEOS_PATTERN, 'section'),
        this.patternStrategy('videos', VIDEOS_PATTERN, 'page'),
      ],
      totalViews: [
        this.attributeStrategy(['#view-count']),
        this.scriptDataStrategy('viewCountText'),
        this.patternStrategy('views', VIEWS_PATTERN, 'section'),
        this.patternStrategy('views', VIEWS_PATTERN, 'page'),
      ],
      joinedDate: [
        this.attributeStrategy(['#joined-date']),
        this.scriptDataStrategy('joinedDateText'),
        this.patternStrategy('joined', JOINED_PATTERN, 'section'),
        this.patternStrategy('joined', JOINED_PATTERN, 'page'),
      ],
      country: [
        this.attributeStrategy(['[itemprop="addressCountry"]']),
        labelledRowStrategy(['Country', 'Location']),
        this.scriptDataStrategy('country'),
        this.patternStrategy('country', COUNTRY_PATTERN, 'section'),
        this.patternStrategy('country', COUNTRY_PATTERN, 'page'),
      ],
      description: [
        this.attributeStrategy(['#description-container', '#description']),
        this.scriptDataStrategy('description'),
        this.attributeStrategy(
          ['meta[property="og:description"]', 'meta[name="description"]'],
          'content',
        ),
      ],
    };
  }

  extract(html: string, url: string): ExtractedProfile {
    const page = this.parse(html, url, ABOUT_SECTION);

    const resolve = (field: PageFieldName): FieldValue =>
      this.withNormalized(field, this.resolveField(field, this.strategies[field], page));

    const description = resolve('description');
    const fields: ExtractedProfile['fields'] = {
      channelName: resolve('channelName'),
      subscribers: resolve('subscribers'),
      videoCount: resolve('videoCount'),
      totalViews: resolve('totalViews'),
      joinedDate: resolve('joinedDate'),
      country: resolve('country'),
      description:
        description.status === 'extracted'
          ? { ...description, value: truncateCodePoints(description.value, DESCRIPTION_LIMIT) }
          : description,
    };

    const socialLinks = extractSocialLinks(page);
    const found = Object.values(fields).filter((f) => f.status === 'extracted').length;
    logger.info(
      `Extracted ${found}/${Object.keys(fields).length} fields, ` +
        `${Object.keys(socialLinks).length} social link(s) from ${url}`,
    );

    return { fields, socialLinks };
  }

  /** First acceptable contact address in the visible text of `html`, if any. */
  findEmail(html: string): string | null {
    return findEmails(visibleText(html, 'body'))[0] ?? null;
  }

  // ── Private helpers ────────────────────────────────────

  /**
   * Look up `key` in the JSON embedded in <script> tags.  Handles both
   * `"key":"text"` and `"key":{"simpleText"|"content":"text"}`.
   */
  private scriptDataStrategy(key: string): FieldStrategy {
    const pattern = new RegExp(
      `"${key}"\\s*:\\s*(?:\\{\\s*"(?:simpleText|content)"\\s*:\\s*)?"((?:[^"\\\\]|\\\\.)*)"`,
    );
    return {
      name: `script(${key})`,
      source: 'attribute',
      run: ({ $ }) => {
        for (const el of $('script').toArray()) {
          const match = $(el).text().match(pattern);
          if (!match) continue;
          const decoded: unknown = JSON.parse(`"${match[1]}"`);
          return typeof decoded === 'string' ? decoded : null;
        }
        return null;
      },
    };
  }

  private withNormalized(field: PageFieldName, value: FieldValue): FieldValue {
    if (value.status !== 'extracted' || !NUMERIC_FIELDS.includes(field)) return value;
    const normalized = normalizeCount(value.value);
    return normalized === undefined ? value : { ...value, normalized };
  }
}

// ─── Standalone strategies ──────────────────────────────────

/** The document <title> minus the site suffix. */
const titleStrategy: FieldStrategy = {
  name: 'title',
  source: 'pattern',
  run: ({ $ }) => $('title').first().text().replace(/\s*-\s*YouTube\s*$/i, '') || null,
};

/** Value cell of a table row whose label cell is one of `labels`. */
function labelledRowStrategy(labels: string[]): FieldStrategy {
  const wanted = labels.map((l) => l.toLowerCase());
  return {
    name: `row(${labels.join('|')})`,
    source: 'attribute',
    run: ({ $ }) => {
      for (const row of $('tr').toArray()) {
        const cells = $(row)
          .find('th, td')
          .toArray()
          .map((cell) => collapseWhitespace($(cell).text()).replace(/:$/, ''));
        const labelIndex = cells.findIndex((c) => wanted.includes(c.toLowerCase()));
        if (labelIndex >= 0 && cells[labelIndex + 1]) {
          return cells[labelIndex + 1];
        }
      }
      return null;
    },
  };
}

// ─── Social links ───────────────────────────────────────────

function truncateCodePoints(text: string, limit: number): string {
  return Array.from(text).slice(0, limit).join('');
}

function extractSocialLinks(page: ParsedPage): Record<string, string> {
  const { $ } = page;
  const links = new Map<string, string>();

  for (const anchor of $('a[href]').toArray()) {
    const href = resolveHref($(anchor).attr('href') ?? '', page.url);
    if (!href || !isSocialUrl(href)) continue;

    const label =
      collapseWhitespace($(anchor).text()) ||
      ($(anchor).attr('aria-label') ?? '').trim() ||
      href;

    if (label.length < MAX_LABEL_LENGTH && !links.has(label)) {
      links.set(label, href);
    }
  }

  return Object.fromEntries(links);
}

/** Absolute URL for `raw`, unwrapping the platform's outbound redirect links. */
function resolveHref(raw: string, baseUrl: string): string | null {
  let url: URL;
  try {
    url = new URL(raw, baseUrl);
  } catch {
    return null;
  }

  if (url.hostname.endsWith('youtube.com') && url.pathname === '/redirect') {
    const target = url.searchParams.get('q');
    return target ? resolveHref(target, baseUrl) : null;
  }

  return url.href;
}

function isSocialUrl(href: string): boolean {
  const host = new URL(href).hostname.replace(/^www\./, '');
  return SOCIAL_HOSTS.some((social) => host === social || host.endsWith(`.${social}`));
}
