import { SubmissionError } from '../core/errors.js';
import type { Product, SubmissionRecord, SyntheticEvent } from '../core/types.js';
import { submissionsTotal } from '../metrics/index.js';
import { TaggerFactory } from '../taggers/TaggerFactory.js';
import type { IngestionTransport } from '../transport/types.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { getLogger } from '../utils/logging.js';
import { RUN_DEADLINE_REASON } from './completionPoller.js';
import type { EventCorrelator } from './eventCorrelator.js';

export interface SubmitterOptions {
  trackingField: string;
  clock?: Clock;
}

/**
 * Sends one tagged synthetic event per call. Outcomes are returned as records,
 * never thrown: a rejected or undeliverable event is a per-product result.
 * There is no retry here; re-submitting is the orchestrator's call.
 */
export class IngestionSubmitter {
  private readonly clock: Clock;

  constructor(
    private readonly transport: IngestionTransport,
    private readonly correlator: EventCorrelator,
    private readonly opts: SubmitterOptions,
  ) {
    this.clock = opts.clock ?? systemClock;
  }

  async submit(
    product: Product,
    event: SyntheticEvent,
    signal?: AbortSignal,
  ): Promise<SubmissionRecord> {
    const token = this.correlator.mint(product);
    // TaggingError propagates: a generator/format mismatch is not a transport outcome
    const payload = TaggerFactory.getTagger(product.format).tag(event, {
      token,
      trackingField: this.opts.trackingField,
    });
    const submittedAt = new Date(this.clock.now());
    let record: SubmissionRecord;
    try {
      const res = await this.transport.send({ sourcetype: product.parser, payloads: [payload] }, signal);
      record = res.ok
        ? { token, product: product.name, payload, submittedAt, ok: true, status: res.status }
        : {
            token,
            product: product.name,
            payload,
            submittedAt,
            ok: false,
            status: res.status,
            error: `ingestion rejected: ${res.status}`,
            responseBody: res.body,
          };
      submissionsTotal.inc({ result: res.ok ? 'accepted' : 'rejected' });
    } catch (err) {
      if (signal?.aborted) {
        // cut off by the run deadline, not a boundary failure
        record = {
          token,
          product: product.name,
          payload,
          submittedAt,
          ok: false,
          cancelled: true,
          error: RUN_DEADLINE_REASON,
        };
        submissionsTotal.inc({ result: 'cancelled' });
      } else if (err instanceof SubmissionError) {
        record = { token, product: product.name, payload, submittedAt, ok: false, error: err.message };
        submissionsTotal.inc({ result: 'transport_error' });
      } else {
        throw err;
      }
    }
    this.correlator.attach(token, record);
    const log = getLogger();
    if (record.ok) {
      log.debug({ product: product.name, token, status: record.status }, 'event submitted');
    } else {
      log.warn(
        { product: product.name, token, status: record.status, body: record.responseBody },
        record.error ?? 'event submission failed',
      );
    }
    return record;
  }
}
