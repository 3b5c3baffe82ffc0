/**
 * baseScraper.ts — Abstract base class + strategy helpers for page extractors.
 *
 * Each field is resolved by an ordered list of strategies: structured
 * attribute lookups first, then text patterns as a fallback.  The first
 * non-empty hit wins; when every strategy misses, the field is marked
 * `extraction-failed` and the rest of the record is still produced.
 *
 * Text patterns run over the *visible* text (scripts, styles and attribute
 * values excluded) and must carry a trailing anchor token, e.g. a count is
 * only accepted when it is immediately followed by "subscribers".  Among
 * anchored matches the first in document order wins.
 */

import * as cheerio from 'cheerio';
import { Logger } from '../core/logger';
import type {
  ExtractedProfile,
  ExtractionSource,
  FieldValue,
  PageFieldName,
} from '../core/types';

const logger = new Logger('PageExtractor');

/** A rendered page, parsed once and shared by every strategy. */
export interface ParsedPage {
  $: cheerio.CheerioAPI;
  url: string;
  /** Visible text of the whole body, whitespace-collapsed, in document order. */
  text: string;
  /** Visible text of the profile's own info section, or '' when absent. */
  sectionText: string;
}

export interface FieldStrategy {
  /** Short label used in debug logs. */
  name: string;
  source: ExtractionSource;
  run(page: ParsedPage): string | null;
}

export abstract class BaseScraper {
  /** Parse `html` rendered from `url` into the page-visible profile fields. */
  abstract extract(html: string, url: string): ExtractedProfile;

  // ── Parsing ────────────────────────────────────────────

  protected parse(html: string, url: string, sectionSelector: string): ParsedPage {
    const $ = cheerio.load(html);
    const section = $(sectionSelector).first();
    return {
      $,
      url,
      text: visibleText(html, 'body'),
      sectionText: section.length > 0 ? visibleText(html, sectionSelector) : '',
    };
  }

  // ── Strategy runner ────────────────────────────────────

  /**
   * Apply `strategies` in order and return the first non-empty hit.
   * A strategy that throws is skipped like one that missed.
   */
  protected resolveField(
    field: PageFieldName,
    strategies: FieldStrategy[],
    page: ParsedPage,
  ): FieldValue {
    for (const strategy of strategies) {
      let hit: string | null;
      try {
        hit = strategy.run(page);
      } catch (err) {
        logger.debug(`Strategy ${strategy.name} for "${field}" threw: ${String(err)}`);
        continue;
      }

      const value = hit ? collapseWhitespace(hit) : '';
      if (value) {
        logger.debug(`"${field}" ← ${strategy.name}: ${value.slice(0, 60)}`);
        return { status: 'extracted', value, source: strategy.source };
      }
    }

    logger.warn(`No strategy matched "${field}", marking extraction-failed`);
    return { status: 'extraction-failed', reason: 'extraction-mismatch' };
  }

  // ── Strategy factories ─────────────────────────────────

  /**
   * First non-empty text (or attribute value) among `selectors`, tried in
   * order.
   */
  protected attributeStrategy(selectors: string[], attr?: string): FieldStrategy {
    return {
      name: `attr(${selectors.join(' | ')}${attr ? `@${attr}` : ''})`,
      source: 'attribute',
      run: ({ $ }) => {
        for (const selector of selectors) {
          const el = $(selector).first();
          if (el.length === 0) continue;
          const value = attr ? el.attr(attr) : el.text();
          if (value && value.trim()) return value;
        }
        return null;
      },
    };
  }

  /**
   * First anchored match of `pattern` in the profile section, or in the
   * whole page when `scope` is 'page'.  Returns the full matched text.
   */
  protected patternStrategy(
    name: string,
    pattern: RegExp,
    scope: 'section' | 'page',
  ): FieldStrategy {
    return {
      name: `pattern(${name}, ${scope})`,
      source: 'pattern',
      run: (page) => {
        const haystack = scope === 'section' ? page.sectionText : page.text;
        const match = haystack.match(pattern);
        return match ? match[0] : null;
      },
    };
  }
}

// ─── Text helpers ───────────────────────────────────────────

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Visible text of the first element matching `selector`, with element
 * boundaries turned into spaces so adjacent cells do not run together.
 */
export function visibleText(html: string, selector: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  $('br').replaceWith(' ');
  $('body *').each((_, el) => {
    $(el).before(' ').after(' ');
  });
  return collapseWhitespace($(selector).first().text());
}

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

/**
 * Best-effort numeric reading of a count shown on the page.
 *
 *   "5.04M subscribers" → 5040000
 *   "367,524,086 views" → 367524086
 *   "No videos"         → 0
 *
 * @returns `undefined` when no number can be read.
 */
export function normalizeCount(raw: string): number | undefined {
  if (/^\s*no\b/i.test(raw)) return 0;

  const match = raw.match(/(\d[\d,.]*)\s?([KMB])?(?![A-Za-z])/i);
  if (!match) return undefined;

  const digits = match[1];
  const suffix = match[2]?.toUpperCase();

  if (suffix) {
    const base = parseFloat(digits.replace(/,/g, ''));
    return Number.isFinite(base) ? Math.round(base * SUFFIX_MULTIPLIERS[suffix]) : undefined;
  }

  // Without a suffix, "1,234,567" and "1.234.567" are both grouped thousands.
  if (/^\d{1,3}([.,]\d{3})+$/.test(digits)) {
    return parseInt(digits.replace(/[.,]/g, ''), 10);
  }

  const value = parseFloat(digits.replace(/,/g, ''));
  return Number.isFinite(value) ? value : undefined;
}

const EMAIL_PATTERN =
  /\b[A-Za-z0-9][A-Za-z0-9._%+-]*@[A-Za-z0-9][A-Za-z0-9.-]*\.[A-Za-z]{2,}\b/g;

/** Addresses that belong to the platform or are placeholders, not the channel's. */
const EMAIL_EXCLUDES = [
  'noreply@',
  'example@',
  'test@',
  '@youtube',
  '@google',
  'support@',
  'privacy@',
  'copyright@',
];

/** Every plausible contact address in `text`, in document order. */
export function findEmails(text: string): string[] {
  const matches = text.match(EMAIL_PATTERN) ?? [];
  return matches.filter((email) => {
    const lower = email.toLowerCase();
    if (EMAIL_EXCLUDES.some((ex) => lower.includes(ex))) return false;
    const domain = email.split('@')[1] ?? '';
    return domain.includes('.');
  });
}
