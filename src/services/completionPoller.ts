import { RetrievalTimeoutError, RetrievalTransportError, errorMessage } from '../core/errors.js';
import type {
  ParsedRecord,
  RetrievalResult,
  TrackingToken,
} from '../core/types.js';
import { pollAttemptsTotal, retrievalLatencySeconds, retrievalsTotal } from '../metrics/index.js';
import type { QueryTransport } from '../transport/types.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { getLogger } from '../utils/logging.js';
import { backoffDelay, type BackoffPolicy } from './backoffPolicy.js';
import type { EventCorrelator } from './eventCorrelator.js';

export const NEVER_INDEXED_REASON = 'never indexed within deadline';
export const RUN_DEADLINE_REASON = 'run deadline exceeded';

export type PollEvent =
  | { type: 'matched'; record: ParsedRecord }
  | { type: 'empty' }
  | { type: 'error'; error: RetrievalTransportError }
  | { type: 'aborted' };

export interface PollContext {
  attempts: number;
  consecutiveErrors: number;
  now: number;
  limit: number;
  /** True when `limit` is the run deadline rather than the token's own. */
  limitIsRunDeadline: boolean;
}

export type PollStep =
  | { state: 'waiting'; delayMs: number }
  | { state: 'found'; record: ParsedRecord }
  | { state: 'timed-out'; reason: string }
  | { state: 'transport-error'; error: RetrievalTransportError };

export interface PollerPolicy extends BackoffPolicy {
  maxConsecutiveErrors: number;
}

/**
 * Transition out of `waiting` after one query attempt. `consecutiveErrors`
 * already counts the attempt being evaluated.
 */
export function nextPollStep(event: PollEvent, ctx: PollContext, policy: PollerPolicy): PollStep {
  switch (event.type) {
    case 'matched':
      return { state: 'found', record: event.record };
    case 'aborted':
      return { state: 'timed-out', reason: RUN_DEADLINE_REASON };
    case 'error':
      if (!event.error.retryable || ctx.consecutiveErrors > policy.maxConsecutiveErrors) {
        return { state: 'transport-error', error: event.error };
      }
      break;
    case 'empty':
      break;
  }
  const remaining = ctx.limit - ctx.now;
  if (remaining <= 0) {
    return {
      state: 'timed-out',
      reason: ctx.limitIsRunDeadline ? RUN_DEADLINE_REASON : NEVER_INDEXED_REASON,
    };
  }
  return { state: 'waiting', delayMs: Math.min(backoffDelay(ctx.attempts, policy), remaining) };
}

export interface AwaitOptions {
  signal?: AbortSignal;
  /** Absolute epoch ms after which the whole run stops polling. */
  runDeadline?: number;
}

export interface PollerOptions extends PollerPolicy {
  lookbackMs: number;
  clock?: Clock;
}

/**
 * Waits for the parsed form of a submitted event to become queryable.
 * Each call is an independent task; concurrent calls share nothing but the
 * transport and the correlator.
 */
export class CompletionPoller {
  private readonly clock: Clock;

  constructor(
    private readonly transport: QueryTransport,
    private readonly correlator: EventCorrelator,
    private readonly opts: PollerOptions,
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async awaitParsed(
    token: TrackingToken,
    deadline: number,
    options: AwaitOptions = {},
  ): Promise<RetrievalResult> {
    const previous = this.correlator.get(token)?.retrieval;
    if (previous) return previous; // terminal results are never polled again

    const submission = this.correlator.resolve(token);
    const { signal, runDeadline } = options;
    const limitIsRunDeadline = runDeadline !== undefined && runDeadline < deadline;
    const limit = runDeadline !== undefined && runDeadline < deadline ? runDeadline : deadline;
    const startTime = submission.submittedAt.getTime() - this.opts.lookbackMs;

    let attempts = 0;
    let consecutiveErrors = 0;
    for (;;) {
      let event: PollEvent;
      if (signal?.aborted) {
        event = { type: 'aborted' };
      } else {
        attempts += 1;
        pollAttemptsTotal.inc();
        try {
          const records = await this.transport.search(
            { token, startTime, endTime: this.clock.now() },
            signal,
          );
          consecutiveErrors = 0;
          event = records.length ? { type: 'matched', record: records[0] } : { type: 'empty' };
        } catch (err) {
          consecutiveErrors += 1;
          event = signal?.aborted
            ? { type: 'aborted' }
            : { type: 'error', error: asTransportError(err) };
        }
      }

      const step = nextPollStep(
        event,
        { attempts, consecutiveErrors, now: this.clock.now(), limit, limitIsRunDeadline },
        this.opts,
      );
      if (step.state === 'waiting') {
        if (event.type === 'error') {
          getLogger().debug({ token, attempts, err: event.error.message }, 'query retry');
        }
        await this.clock.sleep(step.delayMs, signal);
        continue;
      }
      return this.finish(token, submission.submittedAt, attempts, step);
    }
  }

  private finish(
    token: TrackingToken,
    submittedAt: Date,
    attempts: number,
    step: Exclude<PollStep, { state: 'waiting' }>,
  ): RetrievalResult {
    const retrievedAt = new Date(this.clock.now());
    let result: RetrievalResult;
    switch (step.state) {
      case 'found':
        result = { token, found: true, state: 'found', record: step.record, retrievedAt, attempts };
        retrievalLatencySeconds.observe((retrievedAt.getTime() - submittedAt.getTime()) / 1000);
        break;
      case 'timed-out':
        result = {
          token,
          found: false,
          state: 'timed-out',
          retrievedAt,
          attempts,
          reason: step.reason,
          cause: new RetrievalTimeoutError(token, attempts),
        };
        break;
      default:
        result = {
          token,
          found: false,
          state: 'transport-error',
          retrievedAt,
          attempts,
          reason: step.error.message,
          cause: step.error,
        };
        break;
    }
    this.correlator.complete(token, result);
    retrievalsTotal.inc({ state: result.state });
    getLogger().info(
      { token, product: this.correlator.get(token)?.product, state: result.state, attempts },
      'retrieval finished',
    );
    return result;
  }
}

function asTransportError(err: unknown): RetrievalTransportError {
  if (err instanceof RetrievalTransportError) return err;
  return new RetrievalTransportError(`query failed: ${errorMessage(err)}`, undefined, false, { cause: err });
}
