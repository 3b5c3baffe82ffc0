/**
 * errors.ts — Error classes that carry a failure reason through the pipeline.
 */

import type { FailureReason, FetchState } from './types';

/** A per-target failure; BatchRunner records it and moves on. */
export class ScrapeError extends Error {
  readonly reason: FailureReason;
  readonly state?: FetchState;

  constructor(reason: FailureReason, message: string, state?: FetchState) {
    super(message);
    this.name = 'ScrapeError';
    this.reason = reason;
    this.state = state;
  }
}

/** Output unwritable, input unreadable: halts the batch with a non-zero exit. */
export class FatalInfrastructureError extends Error {
  readonly reason: FailureReason = 'fatal-infrastructure';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FatalInfrastructureError';
  }
}

/** A second challenge was submitted while one is still pending. */
export class ChallengeInFlightError extends Error {
  constructor(readonly pendingHandle: string) {
    super(`Challenge ${pendingHandle} is still pending, refusing a second submit`);
    this.name = 'ChallengeInFlightError';
  }
}

/** Missing or unusable configuration (e.g. no solver API key). */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Puppeteer's TimeoutError, recognised by name so any engine's flavour matches. */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}
