import { describe, expect, it } from 'vitest';
import { ChannelScraper, DESCRIPTION_LIMIT } from '../../src/scrapers/channelScraper';
import { channelHtml } from '../helpers/fixtures';

const PAGE_URL = 'https://www.youtube.com/@testchannel/about';

const FALLBACK_HTML = `<html>
<head><title>Fallback Channel - YouTube</title></head>
<body>
  <div id="sidebar">Recommended: 9.9M subscribers</div>
  <div id="about-container">
    <p>More info</p>
    <p>2.5M subscribers</p>
    <p>1,234 videos</p>
    <p>98,765,432 views</p>
    <p>Joined 12 Jan 2019</p>
    <p>Germany</p>
  </div>
</body>
</html>`;

const SCRIPT_HTML = String.raw`<html><body>
<script>var ytInitialData = {"header":{"subscriberCountText":{"simpleText":"5.04M subscribers"},"videoCountText":{"content":"1.1K videos"}},"description":"Line one\nLine \"two\""};</script>
</body></html>`;

describe('ChannelScraper.extract', () => {
  const scraper = new ChannelScraper();

  it('reads every field from structured elements', () => {
    const { fields, socialLinks } = scraper.extract(channelHtml(), PAGE_URL);

    expect(fields).toEqual({
      channelName: { status: 'extracted', value: 'Test Channel', source: 'attribute' },
      subscribers: { status: 'extracted', value: '1.2K subscribers', normalized: 1_200, source: 'attribute' },
      videoCount: { status: 'extracted', value: '42 videos', normalized: 42, source: 'attribute' },
      totalViews: {
        status: 'extracted',
        value: '367,524,086 views',
        normalized: 367_524_086,
        source: 'attribute',
      },
      joinedDate: { status: 'extracted', value: 'Joined Mar 5, 2015', source: 'attribute' },
      country: { status: 'extracted', value: 'Canada', source: 'attribute' },
      description: { status: 'extracted', value: 'Videos about testing.', source: 'attribute' },
    });
    expect(socialLinks).toEqual({ Twitter: 'https://twitter.com/testchannel' });
  });

  it('is deterministic for unchanged markup', () => {
    const first = scraper.extract(channelHtml(), PAGE_URL);
    const second = scraper.extract(channelHtml(), PAGE_URL);

    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('falls back to anchored patterns, about section first', () => {
    const { fields } = scraper.extract(FALLBACK_HTML, PAGE_URL);

    expect(fields.channelName).toEqual({ status: 'extracted', value: 'Fallback Channel', source: 'pattern' });
    expect(fields.subscribers).toEqual({
      status: 'extracted',
      value: '2.5M subscribers',
      normalized: 2_500_000,
      source: 'pattern',
    });
    expect(fields.videoCount).toEqual({ status: 'extracted', value: '1,234 videos', normalized: 1_234, source: 'pattern' });
    expect(fields.totalViews).toEqual({
      status: 'extracted',
      value: '98,765,432 views',
      normalized: 98_765_432,
      source: 'pattern',
    });
    expect(fields.joinedDate).toEqual({ status: 'extracted', value: 'Joined 12 Jan 2019', source: 'pattern' });
    expect(fields.country).toEqual({ status: 'extracted', value: 'Germany', source: 'pattern' });
  });

  it('marks a field with no match extraction-failed and keeps the rest', () => {
    const { fields } = scraper.extract(FALLBACK_HTML, PAGE_URL);

    expect(fields.description).toEqual({ status: 'extraction-failed', reason: 'extraction-mismatch' });
    expect(fields.channelName.status).toBe('extracted');
  });

  it('searches the whole page when there is no about section', () => {
    const html = '<html><body><span>Recommended</span> <span>9.9M subscribers</span></body></html>';

    expect(scraper.extract(html, PAGE_URL).fields.subscribers).toEqual({
      status: 'extracted',
      value: '9.9M subscribers',
      normalized: 9_900_000,
      source: 'pattern',
    });
  });

  it('ignores counts that sit in attribute values', () => {
    const html = '<html><body><div id="about-container" data-count="5 subscribers">About</div></body></html>';

    expect(scraper.extract(html, PAGE_URL).fields.subscribers).toEqual({
      status: 'extraction-failed',
      reason: 'extraction-mismatch',
    });
  });

  it('reads the JSON embedded in a script', () => {
    const { fields } = scraper.extract(SCRIPT_HTML, PAGE_URL);

    expect(fields.subscribers).toEqual({
      status: 'extracted',
      value: '5.04M subscribers',
      normalized: 5_040_000,
      source: 'attribute',
    });
    expect(fields.videoCount).toEqual({ status: 'extracted', value: '1.1K videos', normalized: 1_100, source: 'attribute' });
    expect(fields.description).toEqual({ status: 'extracted', value: 'Line one Line "two"', source: 'attribute' });
    expect(fields.totalViews).toEqual({ status: 'extraction-failed', reason: 'extraction-mismatch' });
  });

  it('takes the country from a labelled row before the name list', () => {
    const html =
      '<html><body><table><tr><th>Location</th><td>Reykjavik</td></tr></table><p>France</p></body></html>';

    expect(scraper.extract(html, PAGE_URL).fields.country).toEqual({
      status: 'extracted',
      value: 'Reykjavik',
      source: 'attribute',
    });
  });

  it('truncates the description', () => {
    const html = `<html><body><div id="description-container">${'a'.repeat(600)}</div></body></html>`;
    const { description } = scraper.extract(html, PAGE_URL).fields;

    expect(description.status === 'extracted' ? description.value.length : 0).toBe(DESCRIPTION_LIMIT);
  });

  it('truncates the description by characters, not code units', () => {
    const html = `<html><body><div id="description-container">${'a'.repeat(499)}😀tail</div></body></html>`;
    const { description } = scraper.extract(html, PAGE_URL).fields;

    expect(description).toEqual({ status: 'extracted', value: `${'a'.repeat(499)}😀`, source: 'attribute' });
  });

  it('keeps social labels that match object property names', () => {
    const html = `<html><body>
      <a href="https://www.instagram.com/testchannel">constructor</a>
      <a href="https://twitter.com/testchannel">__proto__</a>
    </body></html>`;
    const links = scraper.extract(html, PAGE_URL).socialLinks;

    expect(Object.entries(links)).toEqual([
      ['constructor', 'https://www.instagram.com/testchannel'],
      ['__proto__', 'https://twitter.com/testchannel'],
    ]);
    expect(Object.getPrototypeOf(links)).toBe(Object.prototype);
  });

  it('collects social links by label, unwrapping redirects', () => {
    const html = `<html><body>
      <a href="https://www.instagram.com/testchannel">Instagram</a>
      <a href="https://x.com/testchannel" aria-label="X profile"></a>
      <a href="https://www.youtube.com/@other">Other channel</a>
      <a href="https://notinstagram.com/testchannel">Look-alike</a>
      <a href="https://www.twitch.tv/testchannel">Instagram</a>
      <a href="/redirect?q=https%3A%2F%2Fwww.tiktok.com%2F%40testchannel">TikTok</a>
    </body></html>`;

    expect(scraper.extract(html, PAGE_URL).socialLinks).toEqual({
      Instagram: 'https://www.instagram.com/testchannel',
      'X profile': 'https://x.com/testchannel',
      TikTok: 'https://www.tiktok.com/@testchannel',
    });
  });
});

describe('ChannelScraper.findEmail', () => {
  const scraper = new ChannelScraper();

  it('returns the first visible contact address', () => {
    const html = '<html><body><p>Business: <span>biz@testchannel.com</span></p></body></html>';
    expect(scraper.findEmail(html)).toBe('biz@testchannel.com');
  });

  it('ignores addresses that only appear in attributes', () => {
    const html = '<html><body><a href="mailto:biz@testchannel.com">Email</a></body></html>';
    expect(scraper.findEmail(html)).toBeNull();
  });
});
