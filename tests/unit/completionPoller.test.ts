import { describe, it, expect } from 'vitest';
import { RetrievalTimeoutError, RetrievalTransportError, TokenNotFoundError } from '../../src/core/errors.js';
import {
  CompletionPoller,
  NEVER_INDEXED_REASON,
  RUN_DEADLINE_REASON,
  nextPollStep,
  type PollContext,
} from '../../src/services/completionPoller.js';
import { EventCorrelator } from '../../src/services/eventCorrelator.js';
import type { ParsedRecord } from '../../src/core/types.js';
import { FakeClock, FakeQuery, makeProduct, testPoller } from '../utils/fakes.js';

const ctx = (over: Partial<PollContext> = {}): PollContext => ({
  attempts: 1,
  consecutiveErrors: 0,
  now: 0,
  limit: 30_000,
  limitIsRunDeadline: false,
  ...over,
});

const retryable = new RetrievalTransportError('query rejected: 503', 503, true);
const fatal = new RetrievalTransportError('query rejected: 401', 401, false);

describe('nextPollStep', () => {
  it('finishes on a match', () => {
    expect(nextPollStep({ type: 'matched', record: { a: 1 } }, ctx(), testPoller)).toEqual({
      state: 'found',
      record: { a: 1 },
    });
  });

  it('waits with backoff while nothing matched', () => {
    expect(nextPollStep({ type: 'empty' }, ctx({ attempts: 3 }), testPoller)).toEqual({
      state: 'waiting',
      delayMs: 4000,
    });
  });

  it('never sleeps past the limit', () => {
    expect(nextPollStep({ type: 'empty' }, ctx({ attempts: 4, now: 25_000 }), testPoller)).toEqual({
      state: 'waiting',
      delayMs: 5000,
    });
  });

  it('times out once the limit is reached', () => {
    expect(nextPollStep({ type: 'empty' }, ctx({ now: 30_000 }), testPoller)).toEqual({
      state: 'timed-out',
      reason: NEVER_INDEXED_REASON,
    });
    expect(
      nextPollStep({ type: 'empty' }, ctx({ now: 31_000, limitIsRunDeadline: true }), testPoller),
    ).toEqual({ state: 'timed-out', reason: RUN_DEADLINE_REASON });
  });

  it('retries retryable errors up to the consecutive limit', () => {
    const event = { type: 'error' as const, error: retryable };
    expect(nextPollStep(event, ctx({ consecutiveErrors: 3 }), testPoller).state).toBe('waiting');
    expect(nextPollStep(event, ctx({ consecutiveErrors: 4 }), testPoller)).toEqual({
      state: 'transport-error',
      error: retryable,
    });
  });

  it('stops on a non-retryable error', () => {
    expect(nextPollStep({ type: 'error', error: fatal }, ctx({ consecutiveErrors: 1 }), testPoller).state).toBe(
      'transport-error',
    );
  });

  it('treats an abort as the run deadline', () => {
    expect(nextPollStep({ type: 'aborted' }, ctx(), testPoller)).toEqual({
      state: 'timed-out',
      reason: RUN_DEADLINE_REASON,
    });
  });
});

function setup(handler: (n: number) => ParsedRecord[]) {
  const clock = new FakeClock(0);
  let calls = 0;
  const query = new FakeQuery(() => handler(++calls));
  const correlator = new EventCorrelator('feedbeef');
  const token = correlator.mint(makeProduct('okta', ['published']));
  correlator.attach(token, {
    token,
    product: 'okta',
    payload: '{}',
    submittedAt: new Date(clock.now()),
    ok: true,
    status: 200,
  });
  const poller = new CompletionPoller(query, correlator, { ...testPoller, lookbackMs: 60_000, clock });
  return { clock, query, correlator, token, poller, calls: () => calls };
}

describe('CompletionPoller', () => {
  it('gives up after the poll deadline with seven attempts', async () => {
    const { clock, poller, token, correlator } = setup(() => []);
    const result = await poller.awaitParsed(token, 30_000);
    expect(result).toMatchObject({
      token,
      found: false,
      state: 'timed-out',
      attempts: 7,
      reason: NEVER_INDEXED_REASON,
    });
    expect(result.cause).toBeInstanceOf(RetrievalTimeoutError);
    expect(clock.now()).toBe(30_000);
    expect(correlator.isLive(token)).toBe(false);
  });

  it('returns the first matching record', async () => {
    const { clock, poller, token, query } = setup((n) => (n === 3 ? [{ srcip: '10.0.0.1' }] : []));
    const result = await poller.awaitParsed(token, 30_000);
    expect(result).toMatchObject({ found: true, state: 'found', attempts: 3, record: { srcip: '10.0.0.1' } });
    expect(clock.now()).toBe(3000);
    expect(query.requests.map((r) => [r.startTime, r.endTime])).toEqual([
      [-60_000, 0],
      [-60_000, 1000],
      [-60_000, 3000],
    ]);
    expect(query.requests[0].token).toBe(token);
  });

  it('fails after too many consecutive retryable errors', async () => {
    const { poller, token } = setup(() => {
      throw retryable;
    });
    const result = await poller.awaitParsed(token, 30_000);
    expect(result).toMatchObject({
      state: 'transport-error',
      attempts: 4,
      reason: 'query rejected: 503',
    });
    expect(result.cause).toBe(retryable);
  });

  it('fails at once on a non-retryable error', async () => {
    const { poller, token } = setup(() => {
      throw fatal;
    });
    const result = await poller.awaitParsed(token, 30_000);
    expect(result).toMatchObject({ state: 'transport-error', attempts: 1, reason: 'query rejected: 401' });
  });

  it('wraps unexpected query failures as non-retryable', async () => {
    const { poller, token } = setup(() => {
      throw new Error('socket hang up');
    });
    const result = await poller.awaitParsed(token, 30_000);
    expect(result).toMatchObject({ state: 'transport-error', reason: 'query failed: socket hang up' });
  });

  it('clamps polling to an earlier run deadline', async () => {
    const { clock, poller, token } = setup(() => []);
    const result = await poller.awaitParsed(token, 30_000, { runDeadline: 5000 });
    expect(result).toMatchObject({ state: 'timed-out', attempts: 4, reason: RUN_DEADLINE_REASON });
    expect(clock.now()).toBe(5000);
  });

  it('does not query once the run is cancelled', async () => {
    const { poller, token, calls } = setup(() => []);
    const ctrl = new AbortController();
    ctrl.abort();
    const result = await poller.awaitParsed(token, 30_000, { signal: ctrl.signal });
    expect(result).toMatchObject({ state: 'timed-out', attempts: 0, reason: RUN_DEADLINE_REASON });
    expect(calls()).toBe(0);
  });

  it('answers repeated waits from the recorded result', async () => {
    const { poller, token, calls } = setup(() => [{ ok: true }]);
    const first = await poller.awaitParsed(token, 30_000);
    const second = await poller.awaitParsed(token, 30_000);
    expect(second).toBe(first);
    expect(calls()).toBe(1);
  });

  it('rejects tokens that were never submitted', async () => {
    const { poller } = setup(() => []);
    await expect(poller.awaitParsed('pv-unknown', 30_000)).rejects.toBeInstanceOf(TokenNotFoundError);
  });
});
