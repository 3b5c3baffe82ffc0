/**
 * fixtures.ts — Hand-written About-page markup shared by the tests.
 */

export const CHANNEL_EMAIL = 'contact@testchannel.com';

export interface ChannelHtmlOptions {
  name?: string;
  /** Extra markup appended inside <body>. */
  extra?: string;
}

/** An About page with every page field present as a structured element. */
export function channelHtml({ name = 'Test Channel', extra = '' }: ChannelHtmlOptions = {}): string {
  return `<html>
<head>
  <title>${name} - YouTube</title>
  <meta property="og:title" content="${name}">
</head>
<body>
  <div id="about-container">
    <div id="description-container">Videos about testing.</div>
    <table>
      <tr><td>Country:</td><td>Canada</td></tr>
    </table>
    <span id="subscriber-count">1.2K subscribers</span>
    <span id="videos-count">42 videos</span>
    <span id="view-count">367,524,086 views</span>
    <span id="joined-date">Joined Mar 5, 2015</span>
    <a href="https://www.youtube.com/redirect?q=https%3A%2F%2Ftwitter.com%2Ftestchannel">Twitter</a>
  </div>
  <button>View email address</button>
  ${extra}
</body>
</html>`;
}

export function revealedHtml(email: string = CHANNEL_EMAIL): string {
  return channelHtml({ extra: `<div id="email"><a href="mailto:${email}">${email}</a></div>` });
}

export function challengeHtml(siteKey: string): string {
  return channelHtml({ extra: `<div class="g-recaptcha" data-sitekey="${siteKey}"></div>` });
}
