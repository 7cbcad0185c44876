import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const submissionsTotal = new Counter({
  name: 'submissions_total',
  help: 'Synthetic events sent to the ingestion boundary',
  labelNames: ['result'] as const, // result=accepted|rejected|transport_error|cancelled
  registers: [registry],
});

export const pollAttemptsTotal = new Counter({
  name: 'poll_attempts_total',
  help: 'Queries issued against the query boundary while awaiting parsed records',
  registers: [registry],
});

export const retrievalsTotal = new Counter({
  name: 'retrievals_total',
  help: 'Terminal retrieval results by state',
  labelNames: ['state'] as const, // found|timed-out|transport-error
  registers: [registry],
});

export const productGradesTotal = new Counter({
  name: 'product_grades_total',
  help: 'Report entries by grade',
  labelNames: ['grade'] as const,
  registers: [registry],
});

// Submission to first successful retrieval
export const retrievalLatencySeconds = new Histogram({
  name: 'retrieval_latency_seconds',
  help: 'Time from submission until the parsed record became queryable (seconds)',
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [registry],
});

export const validationRunDurationSeconds = new Histogram({
  name: 'validation_run_duration_seconds',
  help: 'Wall-clock duration of a validation run (seconds)',
  buckets: [1, 5, 15, 30, 60, 120, 300, 600],
  registers: [registry],
});
