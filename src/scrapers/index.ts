/**
 * scrapers/index.ts — Barrel export for the extraction layer.
 *
 * `BaseScraper` holds the strategy machinery; `ChannelScraper` is the
 * concrete extractor for channel About pages.
 */

export {
  BaseScraper,
  collapseWhitespace,
  findEmails,
  normalizeCount,
  visibleText,
} from './baseScraper';
export type { FieldStrategy, ParsedPage } from './baseScraper';

export { ChannelScraper, COUNTRIES, DESCRIPTION_LIMIT } from './channelScraper';
