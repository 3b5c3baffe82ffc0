/**
 * middleware/index.ts — Barrel export for the page-interaction layer.
 */

// ── Human behaviour ─────────────────────────────────────────
export { createHumanCursor, humanClick, randomBetween, sleep } from './humanBehavior';

// ── Consent interstitial ────────────────────────────────────
export { dismissConsent, isConsentScreen } from './consent';
export type { ConsentOutcome } from './consent';

// ── Reveal control ──────────────────────────────────────────
export { clickReveal, probeRevealText } from './reveal';
export type { RevealProbe } from './reveal';

// ── Challenge widget ────────────────────────────────────────
export { discoverSiteKey, hasChallengeMarkup, injectChallengeToken } from './challenge';

// ── Compliance ──────────────────────────────────────────────
export { ACCEPT_LANGUAGE, createProfileLimiter, pauseBetweenProfiles } from './compliance';
