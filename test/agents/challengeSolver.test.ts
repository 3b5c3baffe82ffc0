import { describe, expect, it } from 'vitest';
import {
  ChallengeSolver,
  classifyServiceError,
  type SolverParams,
  type SolverTransport,
} from '../../src/agents/challengeSolver';
import { ChallengeInFlightError, ConfigError } from '../../src/core/errors';
import type { ChallengeRequest } from '../../src/core/types';

interface Call {
  method: 'get' | 'post';
  path: string;
  params: SolverParams;
}

/** Replies from a script, in order; an Error entry is thrown instead. */
class FakeTransport implements SolverTransport {
  readonly calls: Call[] = [];

  constructor(private readonly replies: unknown[]) {}

  async get(path: string, params: SolverParams): Promise<unknown> {
    return this.reply({ method: 'get', path, params });
  }

  async post(path: string, params: SolverParams): Promise<unknown> {
    return this.reply({ method: 'post', path, params });
  }

  private reply(call: Call): unknown {
    this.calls.push(call);
    const next = this.replies.shift();
    if (next instanceof Error) throw next;
    return next;
  }
}

const request: ChallengeRequest = {
  kind: 'recaptcha-v2',
  siteId: 'www.youtube.com',
  siteKey: 'test-site-key',
  pageUrl: 'https://www.youtube.com/@beta/about',
};

const ACCEPTED = { status: 1, request: 'task-1' };
const NOT_READY = { status: 0, request: 'CAPCHA_NOT_READY' };

function makeSolver(replies: unknown[]) {
  let clock = 0;
  const sleeps: number[] = [];
  const transport = new FakeTransport(replies);
  const solver = new ChallengeSolver({
    apiKey: 'test-key',
    transport,
    pollIntervalMs: 5_000,
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
  });
  return { solver, transport, sleeps };
}

describe('ChallengeSolver', () => {
  it('refuses to start without an API key', () => {
    expect(() => new ChallengeSolver({ apiKey: '', transport: new FakeTransport([]) })).toThrow(ConfigError);
  });

  it('submits once and polls until solved', async () => {
    const { solver, transport, sleeps } = makeSolver([
      ACCEPTED,
      NOT_READY,
      { status: 1, request: 'test-token' },
    ]);

    const result = await solver.solve(request, 60_000);

    expect(result).toEqual({ status: 'solved', token: 'test-token', handle: 'task-1' });
    expect(transport.calls).toEqual([
      {
        method: 'post',
        path: 'in.php',
        params: {
          key: 'test-key',
          json: 1,
          method: 'userrecaptcha',
          googlekey: 'test-site-key',
          pageurl: 'https://www.youtube.com/@beta/about',
        },
      },
      { method: 'get', path: 'res.php', params: { key: 'test-key', json: 1, action: 'get', id: 'task-1' } },
      { method: 'get', path: 'res.php', params: { key: 'test-key', json: 1, action: 'get', id: 'task-1' } },
    ]);
    expect(sleeps).toEqual([5_000, 5_000]);
  });

  it('times out at the deadline, shortening the last wait', async () => {
    const { solver, transport, sleeps } = makeSolver([ACCEPTED, NOT_READY, NOT_READY, NOT_READY]);

    const result = await solver.solve(request, 12_000);

    expect(result).toEqual({ status: 'timed-out' });
    expect(sleeps).toEqual([5_000, 5_000, 2_000]);
    expect(transport.calls).toHaveLength(4);
  });

  it('returns a refused submit as failed without polling', async () => {
    const { solver, transport } = makeSolver([{ status: 0, request: 'ERROR_ZERO_BALANCE' }]);

    const result = await solver.solve(request, 60_000);

    expect(result).toEqual({
      status: 'failed',
      reason: 'insufficient-balance',
      detail: 'Challenge service refused the task: ERROR_ZERO_BALANCE',
    });
    expect(transport.calls).toHaveLength(1);
  });

  it('returns a credential error from a poll straight away', async () => {
    const { solver, transport } = makeSolver([ACCEPTED, { status: 0, request: 'ERROR_WRONG_USER_KEY' }]);

    const result = await solver.solve(request, 60_000);

    expect(result).toEqual({ status: 'failed', reason: 'invalid-credential', detail: 'ERROR_WRONG_USER_KEY' });
    expect(transport.calls).toHaveLength(2);
  });

  it('keeps polling after a transport error', async () => {
    const { solver } = makeSolver([ACCEPTED, new Error('socket hang up'), { status: 1, request: 'test-token' }]);

    const result = await solver.solve(request, 60_000);

    expect(result).toEqual({ status: 'solved', token: 'test-token', handle: 'task-1' });
  });

  it('treats an unexpected response body as a service error', async () => {
    const { solver } = makeSolver(['<html>bad gateway</html>']);

    const result = await solver.solve(request, 60_000);

    expect(result.status).toBe('failed');
    if (result.status !== 'failed') return;
    expect(result.reason).toBe('service-error');
  });

  it('rejects a second challenge while one is pending', async () => {
    const { solver } = makeSolver([ACCEPTED]);

    await expect(solver.submit(request)).resolves.toBe('task-1');
    await expect(solver.solve(request, 60_000)).rejects.toBeInstanceOf(ChallengeInFlightError);
  });

  it('accepts a new challenge once the previous one finished', async () => {
    const { solver } = makeSolver([
      ACCEPTED,
      { status: 0, request: 'ERROR_CAPTCHA_UNSOLVABLE' },
      { status: 1, request: 'task-2' },
      { status: 1, request: 'test-token' },
    ]);

    const first = await solver.solve(request, 60_000);
    const second = await solver.solve(request, 60_000);

    expect(first).toEqual({ status: 'failed', reason: 'unsolvable', detail: 'ERROR_CAPTCHA_UNSOLVABLE' });
    expect(second).toEqual({ status: 'solved', token: 'test-token', handle: 'task-2' });
  });

  it('reads the account balance', async () => {
    const { solver, transport } = makeSolver([{ status: 1, request: '3.25' }]);

    await expect(solver.getBalance()).resolves.toBe(3.25);
    expect(transport.calls).toEqual([
      { method: 'get', path: 'res.php', params: { key: 'test-key', json: 1, action: 'getbalance' } },
    ]);
  });

  it('reports a bad token and swallows transport errors while doing so', async () => {
    const ok = makeSolver([{ status: 1, request: 'OK_REPORT_RECORDED' }]);
    await expect(ok.solver.reportBad('task-1')).resolves.toBe(true);
    expect(ok.transport.calls[0].params).toEqual({ key: 'test-key', json: 1, action: 'reportbad', id: 'task-1' });

    const broken = makeSolver([new Error('ECONNRESET')]);
    await expect(broken.solver.reportBad('task-1')).resolves.toBe(false);
  });
});

describe('classifyServiceError', () => {
  it.each([
    ['ERROR_ZERO_BALANCE', 'insufficient-balance'],
    ['ERROR_WRONG_USER_KEY', 'invalid-credential'],
    ['ERROR_KEY_DOES_NOT_EXIST', 'invalid-credential'],
    ['ERROR_CAPTCHA_UNSOLVABLE', 'unsolvable'],
    ['ERROR_BAD_DUPLICATES', 'service-error'],
  ])('%s → %s', (code, reason) => {
    expect(classifyServiceError(code)).toBe(reason);
  });
});
