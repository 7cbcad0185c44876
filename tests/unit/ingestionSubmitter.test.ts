import { describe, it, expect } from 'vitest';
import { SubmissionError, TaggingError } from '../../src/core/errors.js';
import { RUN_DEADLINE_REASON } from '../../src/services/completionPoller.js';
import { EventCorrelator } from '../../src/services/eventCorrelator.js';
import { IngestionSubmitter } from '../../src/services/ingestionSubmitter.js';
import { FakeClock, FakeIngestion, makeProduct } from '../utils/fakes.js';

const okta = makeProduct('okta', ['published', 'client.ip']);

function submitterWith(ingestion: FakeIngestion) {
  const correlator = new EventCorrelator('cafe0001');
  const submitter = new IngestionSubmitter(ingestion, correlator, {
    trackingField: 'pv_tracking_id',
    clock: new FakeClock(5000),
  });
  return { correlator, submitter };
}

describe('IngestionSubmitter', () => {
  it('sends the tagged payload to the product parser', async () => {
    const ingestion = new FakeIngestion();
    const { correlator, submitter } = submitterWith(ingestion);
    const record = await submitter.submit(okta, { published: '2024-01-01T00:00:00.000Z' });
    expect(record).toMatchObject({ product: 'okta', ok: true, status: 200 });
    expect(record.submittedAt.getTime()).toBe(5000);
    expect(ingestion.batches).toEqual([
      {
        sourcetype: 'okta-latest',
        payloads: [`{"published":"2024-01-01T00:00:00.000Z","pv_tracking_id":"${record.token}"}`],
      },
    ]);
    expect(correlator.resolve(record.token)).toBe(record);
  });

  it('records a rejected submission without throwing', async () => {
    const { submitter } = submitterWith(
      new FakeIngestion(() => ({ ok: false, status: 503, body: 'unavailable' })),
    );
    const record = await submitter.submit(okta, { published: 'x' });
    expect(record).toMatchObject({
      ok: false,
      status: 503,
      error: 'ingestion rejected: 503',
      responseBody: 'unavailable',
    });
  });

  it('records a transport failure without a status', async () => {
    const { submitter } = submitterWith(
      new FakeIngestion(() => {
        throw new SubmissionError('ingestion transport failure: connect ECONNREFUSED');
      }),
    );
    const record = await submitter.submit(okta, { published: 'x' });
    expect(record.ok).toBe(false);
    expect(record.status).toBeUndefined();
    expect(record.error).toBe('ingestion transport failure: connect ECONNREFUSED');
  });

  it('records a send cut off by the run deadline as cancelled', async () => {
    const ctrl = new AbortController();
    const { correlator, submitter } = submitterWith(
      new FakeIngestion(() => {
        ctrl.abort();
        throw new SubmissionError('ingestion transport failure: This operation was aborted');
      }),
    );
    const record = await submitter.submit(okta, { published: 'x' }, ctrl.signal);
    expect(record).toMatchObject({ ok: false, cancelled: true, error: RUN_DEADLINE_REASON });
    expect(record.status).toBeUndefined();
    expect(correlator.resolve(record.token)).toBe(record);
  });

  it('treats any fault after the abort as cancellation', async () => {
    const ctrl = new AbortController();
    const { submitter } = submitterWith(
      new FakeIngestion(() => {
        ctrl.abort();
        throw new Error('This operation was aborted');
      }),
    );
    const record = await submitter.submit(okta, { published: 'x' }, ctrl.signal);
    expect(record).toMatchObject({ ok: false, cancelled: true, error: RUN_DEADLINE_REASON });
  });

  it('propagates unexpected transport faults', async () => {
    const { submitter } = submitterWith(
      new FakeIngestion(() => {
        throw new RangeError('bug');
      }),
    );
    await expect(submitter.submit(okta, { published: 'x' })).rejects.toBeInstanceOf(RangeError);
  });

  it('propagates events the format cannot express', async () => {
    const ingestion = new FakeIngestion();
    const { submitter } = submitterWith(ingestion);
    await expect(submitter.submit(okta, 'plain text')).rejects.toBeInstanceOf(TaggingError);
    expect(ingestion.batches).toHaveLength(0);
  });
});
