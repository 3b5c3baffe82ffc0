import { describe, expect, it } from 'vitest';
import { discoverSiteKey, hasChallengeMarkup } from '../../src/middleware/challenge';

const LONG_KEY = '6Lc_test_site_key_0123456789abcdefghijklmnop';

describe('hasChallengeMarkup', () => {
  it('detects a challenge frame by URL', () => {
    expect(hasChallengeMarkup('<html></html>', ['https://www.google.com/recaptcha/api2/anchor?k=x'])).toBe(true);
  });

  it('detects the widget container', () => {
    expect(hasChallengeMarkup('<div class="g-recaptcha"></div>', [])).toBe(true);
  });

  it('detects a challenge iframe by title', () => {
    expect(hasChallengeMarkup('<iframe title="reCAPTCHA" src="about:blank"></iframe>', [])).toBe(true);
  });

  it('ignores pages that only mention the word', () => {
    expect(hasChallengeMarkup('<p>We use recaptcha to keep spam out</p>', ['https://www.youtube.com/'])).toBe(false);
  });
});

describe('discoverSiteKey', () => {
  it('prefers the data-sitekey attribute', () => {
    const html = `<div class="g-recaptcha" data-sitekey="attr-key"></div><script>sitekey: "${LONG_KEY}"</script>`;
    expect(discoverSiteKey(html, ['https://www.google.com/recaptcha/api2/anchor?k=frame-key'])).toBe('attr-key');
  });

  it('reads the k parameter of the challenge frame', () => {
    expect(
      discoverSiteKey('<html></html>', [
        'https://www.youtube.com/@beta/about',
        'https://www.google.com/recaptcha/api2/anchor?ar=1&k=frame-key&co=x',
      ]),
    ).toBe('frame-key');
  });

  it('falls back to a sitekey in inline script', () => {
    expect(discoverSiteKey(`<script>grecaptcha.render("box", { sitekey: '${LONG_KEY}' });</script>`, [])).toBe(
      LONG_KEY,
    );
  });

  it('reads a short key from JSON-style script data', () => {
    expect(discoverSiteKey('<script>{"sitekey":"short-key"}</script>', [])).toBe('short-key');
  });

  it('returns null when there is no key anywhere', () => {
    expect(discoverSiteKey('<div class="g-recaptcha"></div>', [])).toBeNull();
  });
});
