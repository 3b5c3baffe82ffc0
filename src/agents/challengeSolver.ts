/**
 * challengeSolver.ts — Request/poll client for a 2Captcha-compatible
 * human-verification solving service.
 *
 * PROTOCOL
 * ────────
 *   1. `in.php`  (POST)  method=userrecaptcha, googlekey, pageurl → task id
 *   2. `res.php` (GET)   action=get, id → CAPCHA_NOT_READY | token | ERROR_*
 *
 * `solve()` submits once and polls on a fixed interval until the service
 * returns a terminal answer or the deadline passes.  Credential and balance
 * errors are returned to the caller straight away and never retried.  Only
 * one challenge may be outstanding per solver instance.
 */

import axios from 'axios';
import { z } from 'zod';
import { ChallengeInFlightError, ConfigError, getErrorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import type {
  ChallengeFailureReason,
  ChallengeRequest,
  ChallengeResult,
} from '../core/types';

const logger = new Logger('ChallengeSolver');

// ─── Transport ──────────────────────────────────────────────

export type SolverParams = Record<string, string | number>;

/** The two HTTP calls the protocol needs; swapped for an in-process fake in tests. */
export interface SolverTransport {
  get(path: string, params: SolverParams): Promise<unknown>;
  post(path: string, form: SolverParams): Promise<unknown>;
}

/** Default transport backed by an axios instance. */
export function createAxiosTransport(
  baseUrl: string,
  timeoutMs: number = 30_000,
): SolverTransport {
  const client = axios.create({ baseURL: baseUrl, timeout: timeoutMs });

  return {
    async get(path, params) {
      const response = await client.get<unknown>(`/${path}`, { params });
      return response.data;
    },
    async post(path, form) {
      const body = new URLSearchParams(
        Object.entries(form).map(([key, value]) => [key, String(value)]),
      );
      const response = await client.post<unknown>(`/${path}`, body);
      return response.data;
    },
  };
}

// ─── Service responses ──────────────────────────────────────

const serviceResponseSchema = z.object({
  status: z.number(),
  request: z.union([z.string(), z.number()]).transform(String),
});

type ServiceResponse = z.infer<typeof serviceResponseSchema>;

const NOT_READY = 'CAPCHA_NOT_READY';

/** A non-success answer from the service, already classified. */
export class ChallengeServiceError extends Error {
  constructor(
    readonly reason: ChallengeFailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'ChallengeServiceError';
  }
}

export function classifyServiceError(code: string): ChallengeFailureReason {
  switch (code) {
    case 'ERROR_ZERO_BALANCE':
      return 'insufficient-balance';
    case 'ERROR_WRONG_USER_KEY':
    case 'ERROR_KEY_DOES_NOT_EXIST':
    case 'ERROR_IP_NOT_ALLOWED':
      return 'invalid-credential';
    case 'ERROR_CAPTCHA_UNSOLVABLE':
      return 'unsolvable';
    default:
      return 'service-error';
  }
}

// ─── Solver ─────────────────────────────────────────────────

/** What the profile fetcher needs from a solver. */
export interface ChallengeSolving {
  solve(request: ChallengeRequest, timeoutMs: number): Promise<ChallengeResult>;
  /** Tell the service a solved token did not work (refund). */
  reportBad?(handle: string): Promise<boolean>;
}

export interface ChallengeSolverOptions {
  apiKey: string;
  transport: SolverTransport;
  pollIntervalMs?: number;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class ChallengeSolver implements ChallengeSolving {
  private readonly apiKey: string;
  private readonly transport: SolverTransport;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  /** Handle of the challenge currently being solved, if any. */
  private pendingHandle: string | null = null;

  constructor(options: ChallengeSolverOptions) {
    if (!options.apiKey) {
      throw new ConfigError('A challenge-service API key is required (set CAPTCHA_API_KEY).');
    }
    this.apiKey = options.apiKey;
    this.transport = options.transport;
    this.pollIntervalMs = options.pollIntervalMs ?? 5_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Hand a challenge to the service.
   *
   * @returns the opaque task handle used for polling.
   * @throws ChallengeInFlightError when another challenge is still pending.
   * @throws ChallengeServiceError when the service refuses the task.
   */
  async submit(request: ChallengeRequest): Promise<string> {
    if (this.pendingHandle !== null) {
      throw new ChallengeInFlightError(this.pendingHandle);
    }

    logger.info(
      `Submitting ${request.kind} for ${request.siteId} (sitekey: ${request.siteKey.slice(0, 20)}…)`,
    );

    const response = await this.call('post', 'in.php', {
      method: 'userrecaptcha',
      googlekey: request.siteKey,
      pageurl: request.pageUrl,
    });

    if (response.status !== 1) {
      throw new ChallengeServiceError(
        classifyServiceError(response.request),
        `Challenge service refused the task: ${response.request}`,
      );
    }

    this.pendingHandle = response.request;
    logger.info(`Challenge submitted, handle ${response.request}`);
    return response.request;
  }

  /** Ask the service once for the result of `handle`. */
  async poll(handle: string): Promise<ChallengeResult> {
    const response = await this.call('get', 'res.php', { action: 'get', id: handle });

    let result: ChallengeResult;
    if (response.status === 1) {
      result = { status: 'solved', token: response.request, handle };
    } else if (response.request === NOT_READY) {
      result = { status: 'pending' };
    } else {
      result = {
        status: 'failed',
        reason: classifyServiceError(response.request),
        detail: response.request,
      };
    }

    if (result.status !== 'pending' && this.pendingHandle === handle) {
      this.pendingHandle = null;
    }
    return result;
  }

  /**
   * Submit `request` and poll until a terminal answer or until `timeoutMs`
   * has elapsed, in which case the result is `timed-out`.
   */
  async solve(request: ChallengeRequest, timeoutMs: number): Promise<ChallengeResult> {
    const startedAt = this.now();
    const deadline = startedAt + timeoutMs;

    let handle: string;
    try {
      handle = await this.submit(request);
    } catch (err) {
      if (err instanceof ChallengeInFlightError) throw err;
      const reason = err instanceof ChallengeServiceError ? err.reason : 'service-error';
      logger.warn(`Challenge submit failed (${reason}): ${getErrorMessage(err)}`);
      return { status: 'failed', reason, detail: getErrorMessage(err) };
    }

    try {
      while (this.now() < deadline) {
        await this.sleep(Math.min(this.pollIntervalMs, deadline - this.now()));

        let result: ChallengeResult;
        try {
          result = await this.poll(handle);
        } catch (err) {
          // Transport hiccup: keep polling until the deadline.
          logger.warn(`Poll for ${handle} failed: ${getErrorMessage(err)}`);
          continue;
        }

        if (result.status === 'pending') {
          const elapsed = Math.round((this.now() - startedAt) / 1000);
          logger.debug(`Still solving ${handle}… (${elapsed}s elapsed)`);
          continue;
        }

        if (result.status === 'solved') {
          logger.info(`Challenge ${handle} solved`);
        } else if (result.status === 'failed') {
          logger.warn(`Challenge ${handle} failed: ${result.detail ?? result.reason}`);
        }
        return result;
      }

      logger.warn(`Challenge ${handle} timed out after ${Math.round(timeoutMs / 1000)}s`);
      return { status: 'timed-out' };
    } finally {
      this.pendingHandle = null;
    }
  }

  /** Current account balance in USD. */
  async getBalance(): Promise<number> {
    const response = await this.call('get', 'res.php', { action: 'getbalance' });
    if (response.status !== 1) {
      throw new ChallengeServiceError(
        classifyServiceError(response.request),
        `Could not read balance: ${response.request}`,
      );
    }
    return parseFloat(response.request);
  }

  async reportBad(handle: string): Promise<boolean> {
    try {
      const response = await this.call('get', 'res.php', { action: 'reportbad', id: handle });
      return response.status === 1;
    } catch (err) {
      logger.warn(`Could not report ${handle} as bad: ${getErrorMessage(err)}`);
      return false;
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async call(
    method: 'get' | 'post',
    path: string,
    params: SolverParams,
  ): Promise<ServiceResponse> {
    const payload: SolverParams = { key: this.apiKey, json: 1, ...params };
    const raw =
      method === 'get'
        ? await this.transport.get(path, payload)
        : await this.transport.post(path, payload);

    const parsed = serviceResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ChallengeServiceError(
        'service-error',
        `Unexpected response from challenge service: ${JSON.stringify(raw)?.slice(0, 120)}`,
      );
    }
    return parsed.data;
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
