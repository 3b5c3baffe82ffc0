/**
 * batchRunner.ts — Sequential, paced, failure-isolated batch over targets.
 *
 * One target at a time through a Bottleneck limiter; every outcome (record
 * or failure) lands in the running BatchResult, which is flushed to the
 * sink before the next target starts.  After the flush the runner waits
 * `delayBetweenProfilesMs` unless that was the last target.  A per-target
 * failure never stops the run; a sink that cannot write does.
 *
 * Cancellation is checked between targets only: the in-flight target is
 * allowed to finish (and its browser to close) and its result is flushed.
 */

import type Bottleneck from 'bottleneck';
import { FatalInfrastructureError, getErrorMessage } from './core/errors';
import { Logger } from './core/logger';
import type { BatchResult, FetchOutcome } from './core/types';
import { createProfileLimiter, pauseBetweenProfiles } from './middleware/compliance';

const logger = new Logger('BatchRunner');

// ─── Collaborators ──────────────────────────────────────────

export interface ProfileFetching {
  fetch(target: string): Promise<FetchOutcome>;
}

/** Where results go; DataExporter in production. */
export interface ResultSink {
  /** Persist the accumulated result; called after every target. */
  flush(result: BatchResult): Promise<void>;
  /** Called once with the final result, after the last flush. */
  complete(result: BatchResult): Promise<void>;
}

export interface BatchRunnerOptions {
  fetcher: ProfileFetching;
  sink: ResultSink;
  /** Pause after each fetch except the last, before the next one starts. */
  delayBetweenProfilesMs: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

// ─── Runner ─────────────────────────────────────────────────

export class BatchRunner {
  private readonly limiter: Bottleneck;

  constructor(private readonly options: BatchRunnerOptions) {
    this.limiter = createProfileLimiter();
  }

  /**
   * Fetch every target in order.
   *
   * @throws FatalInfrastructureError when the sink cannot persist a result.
   */
  async run(targets: readonly string[], { signal }: RunOptions = {}): Promise<BatchResult> {
    const result: BatchResult = { succeeded: [], failed: [], interrupted: false };

    logger.info(`Starting batch of ${targets.length} target(s)`);

    for (const [index, target] of targets.entries()) {
      if (signal?.aborted) {
        logger.warn(`Interrupted, ${targets.length - index} target(s) not started`);
        result.interrupted = true;
        break;
      }

      logger.info(`[${index + 1}/${targets.length}] Processing ${target}`);
      const outcome = await this.limiter.schedule(() => this.fetchIsolated(target));

      if (outcome.ok) {
        result.succeeded.push(outcome.record);
      } else {
        result.failed.push({
          target: outcome.target,
          reason: outcome.reason,
          state: outcome.state,
          message: outcome.message,
        });
      }

      await this.persist('flush', result);

      if (index < targets.length - 1 && !signal?.aborted) {
        await pauseBetweenProfiles(this.options.delayBetweenProfilesMs);
      }
    }

    logger.info(
      `Batch finished: ${result.succeeded.length} succeeded, ${result.failed.length} failed` +
        (result.interrupted ? ' (interrupted)' : ''),
    );
    await this.persist('complete', result);
    return result;
  }

  // ── Internals ──────────────────────────────────────────

  /** A fetcher that throws still yields exactly one failure for the target. */
  private async fetchIsolated(target: string): Promise<FetchOutcome> {
    try {
      return await this.options.fetcher.fetch(target);
    } catch (err) {
      logger.error(`Unhandled fault while fetching ${target}: ${getErrorMessage(err)}`, err);
      return {
        ok: false,
        target,
        reason: 'unexpected-error',
        state: 'Errored',
        message: getErrorMessage(err),
        trace: ['Errored'],
      };
    }
  }

  private async persist(step: 'flush' | 'complete', result: BatchResult): Promise<void> {
    try {
      await this.options.sink[step](result);
    } catch (err) {
      if (err instanceof FatalInfrastructureError) throw err;
      throw new FatalInfrastructureError(`Could not ${step} results: ${getErrorMessage(err)}`, err);
    }
  }
}
