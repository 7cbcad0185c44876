import type { GradingConfig, PollerConfig } from '../config/index.js';
import { BoundaryUnreachableError, errorMessage } from '../core/errors.js';
import type {
  EntryGrade,
  FieldScore,
  Product,
  ReportEntry,
  ReportSummary,
  RetrievalResult,
  SubmissionRecord,
  ValidationReport,
} from '../core/types.js';
import { EventBus } from '../events/eventBus.js';
import type { EventGenerator } from '../generators/eventGenerator.js';
import { productGradesTotal, validationRunDurationSeconds } from '../metrics/index.js';
import type { IngestionTransport, QueryTransport } from '../transport/types.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { buildCanonicalPayload, hmacSign, sha256 } from '../utils/digest.js';
import { getLogger } from '../utils/logging.js';
import { CompletionPoller, RUN_DEADLINE_REASON } from './completionPoller.js';
import { EventCorrelator } from './eventCorrelator.js';
import { FieldScorer, roundPct } from './fieldScorer.js';
import { IngestionSubmitter } from './ingestionSubmitter.js';
import { runBounded } from './workerPool.js';

export interface ValidationEvents {
  [k: string]: unknown;
  productStarted: { runId: string; product: string };
  productCompleted: { runId: string; entry: ReportEntry };
  runCompleted: { report: ValidationReport };
}

export interface OrchestratorSettings {
  maxConcurrency: number;
  eventsPerProduct: number;
  runDeadlineMs: number;
  trackingField: string;
  poller: PollerConfig;
  lookbackMs: number;
  grading: GradingConfig;
  signingKey?: string;
}

export interface OrchestratorDeps {
  ingestion: IngestionTransport;
  query: QueryTransport;
  generator: EventGenerator;
  clock?: Clock;
  bus?: EventBus<ValidationEvents>;
}

export interface RunOptions {
  runId?: string;
  eventsPerProduct?: number;
  /** Aborting it cancels the run the same way the run deadline does. */
  signal?: AbortSignal;
}

interface RunContext {
  runId: string;
  runDeadline: number;
  signal: AbortSignal;
  eventsPerProduct: number;
  submitter: IngestionSubmitter;
  poller: CompletionPoller;
  scorer: FieldScorer;
}

interface ProductOutcome {
  entry: ReportEntry;
  /** Failed only because a boundary could not be reached. */
  unreachable: boolean;
}

export function compareEntries(a: ReportEntry, b: ReportEntry): number {
  return (
    b.coveragePct - a.coveragePct ||
    b.compliancePct - a.compliancePct ||
    a.product.localeCompare(b.product)
  );
}

export function summarize(entries: readonly ReportEntry[]): ReportSummary {
  const byGrade: Record<EntryGrade, number> = {
    excellent: 0,
    good: 0,
    functional: 0,
    failing: 0,
    'submission failure': 0,
  };
  let coverage = 0;
  for (const e of entries) {
    byGrade[e.grade] += 1;
    coverage += e.coveragePct;
  }
  return {
    total: entries.length,
    byGrade,
    averageCoveragePct: entries.length ? roundPct(coverage / entries.length) : 0,
  };
}

// best found retrieval first, then higher coverage, then higher compliance
function better(a: { r: RetrievalResult; s: FieldScore }, b: { r: RetrievalResult; s: FieldScore }) {
  if (a.r.found !== b.r.found) return a.r.found;
  if (a.s.coveragePct !== b.s.coveragePct) return a.s.coveragePct > b.s.coveragePct;
  return a.s.compliancePct > b.s.compliancePct;
}

/**
 * Drives every product through submit → await → score with bounded
 * parallelism and folds the outcomes into one ranked report. Per-product
 * failures become report entries; only a run where no product could reach
 * either boundary throws.
 */
export class ValidationOrchestrator {
  private readonly clock: Clock;
  readonly bus: EventBus<ValidationEvents>;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.bus = deps.bus ?? new EventBus<ValidationEvents>();
  }

  async run(products: readonly Product[], options: RunOptions = {}): Promise<ValidationReport> {
    const started = this.clock.now();
    const correlator = new EventCorrelator(options.runId);
    const ctrl = new AbortController();
    const cancel = () => ctrl.abort();
    if (options.signal?.aborted) ctrl.abort();
    else options.signal?.addEventListener('abort', cancel, { once: true });
    // unblocks in-flight requests once the run deadline passes
    const deadlineTimer = setTimeout(cancel, this.settings.runDeadlineMs);
    deadlineTimer.unref();

    const ctx: RunContext = {
      runId: correlator.runId,
      runDeadline: started + this.settings.runDeadlineMs,
      signal: ctrl.signal,
      eventsPerProduct: options.eventsPerProduct ?? this.settings.eventsPerProduct,
      submitter: new IngestionSubmitter(this.deps.ingestion, correlator, {
        trackingField: this.settings.trackingField,
        clock: this.clock,
      }),
      poller: new CompletionPoller(this.deps.query, correlator, {
        ...this.settings.poller,
        lookbackMs: this.settings.lookbackMs,
        clock: this.clock,
      }),
      scorer: new FieldScorer(this.settings.grading, this.settings.trackingField),
    };

    const log = getLogger();
    log.info(
      { runId: ctx.runId, products: products.length, maxConcurrency: this.settings.maxConcurrency },
      'validation run started',
    );

    const outcomes: ProductOutcome[] = new Array(products.length);
    try {
      await runBounded(products, this.settings.maxConcurrency, async (product, i) => {
        outcomes[i] = await this.processProduct(product, ctx);
      });
    } finally {
      clearTimeout(deadlineTimer);
      options.signal?.removeEventListener('abort', cancel);
    }

    const entries = Object.freeze(outcomes.map((o) => freezeEntry(o.entry)).sort(compareEntries));
    const digest = sha256(buildCanonicalPayload(entries));
    const summary = summarize(entries);
    Object.freeze(summary.byGrade);
    const report: ValidationReport = Object.freeze({
      runId: ctx.runId,
      startedAt: new Date(started).toISOString(),
      finishedAt: new Date(this.clock.now()).toISOString(),
      entries,
      summary: Object.freeze(summary),
      digest,
      signature: this.settings.signingKey ? hmacSign(digest, this.settings.signingKey) : undefined,
    });

    validationRunDurationSeconds.observe((this.clock.now() - started) / 1000);
    log.info({ runId: ctx.runId, summary: report.summary }, 'validation run finished');
    await this.bus.emit('runCompleted', { report });

    if (outcomes.length > 0 && outcomes.every((o) => o.unreachable)) {
      throw new BoundaryUnreachableError(report);
    }
    return report;
  }

  private async processProduct(product: Product, ctx: RunContext): Promise<ProductOutcome> {
    await this.bus.emit('productStarted', { runId: ctx.runId, product: product.name });
    let outcome: ProductOutcome;
    try {
      outcome = await this.validateProduct(product, ctx);
    } catch (err) {
      // DuplicateTokenError, TaggingError, generator faults: abort this product only
      getLogger().error({ err, product: product.name }, 'product validation aborted');
      outcome = {
        entry: this.failureEntry(
          product,
          'error',
          'failing',
          errorMessage(err),
        ),
        unreachable: false,
      };
    }
    productGradesTotal.inc({ grade: outcome.entry.grade });
    getLogger().info(
      {
        product: product.name,
        token: outcome.entry.token,
        grade: outcome.entry.grade,
        coveragePct: outcome.entry.coveragePct,
        reason: outcome.entry.reason,
      },
      'product validated',
    );
    await this.bus.emit('productCompleted', { runId: ctx.runId, entry: outcome.entry });
    return outcome;
  }

  private async validateProduct(product: Product, ctx: RunContext): Promise<ProductOutcome> {
    if (ctx.signal.aborted) {
      return {
        entry: this.failureEntry(product, 'cancelled', 'failing', RUN_DEADLINE_REASON),
        unreachable: false,
      };
    }

    const submissions: SubmissionRecord[] = [];
    for (let i = 0; i < ctx.eventsPerProduct && !ctx.signal.aborted; i++) {
      const event = this.deps.generator.produceEvent(product);
      submissions.push(await ctx.submitter.submit(product, event, ctx.signal));
    }
    const accepted = submissions.filter((s) => s.ok);
    if (accepted.length === 0) {
      const last = submissions[submissions.length - 1];
      if (!last || ctx.signal.aborted) {
        const entry = this.failureEntry(product, 'cancelled', 'failing', RUN_DEADLINE_REASON);
        entry.submissions = { attempted: submissions.length, succeeded: 0 };
        entry.token = last?.token;
        return { entry, unreachable: false };
      }
      const entry = this.failureEntry(
        product,
        'submission_failure',
        'submission failure',
        last.error ?? 'ingestion failed',
      );
      entry.submissions = { attempted: submissions.length, succeeded: 0 };
      entry.token = last.token;
      return { entry, unreachable: submissions.every((s) => s.status === undefined) };
    }

    const pollDeadline = this.clock.now() + this.settings.poller.deadlineMs;
    // every poll settles before the product does, even when one of them throws
    const settled = await Promise.allSettled(
      accepted.map((s) =>
        ctx.poller.awaitParsed(s.token, pollDeadline, {
          signal: ctx.signal,
          runDeadline: ctx.runDeadline,
        }),
      ),
    );
    const retrievals: RetrievalResult[] = [];
    for (const r of settled) {
      if (r.status === 'rejected') throw r.reason;
      retrievals.push(r.value);
    }
    const scored = retrievals.map((r) => ({ r, s: ctx.scorer.score(product, r) }));
    const best = scored.reduce((acc, cur) => (better(cur, acc) ? cur : acc));

    const entry: ReportEntry = {
      product: product.name,
      parser: product.parser,
      outcome: outcomeOf(best.r),
      grade: best.s.grade,
      coveragePct: best.s.coveragePct,
      compliancePct: best.s.compliancePct,
      extractedCount: best.s.extractedCount,
      expectedCount: best.s.expectedFields.length,
      missingMandatory: best.s.missingMandatory,
      submissions: { attempted: submissions.length, succeeded: accepted.length },
      pollAttempts: retrievals.reduce((n, r) => n + r.attempts, 0),
      token: best.r.token,
      reason: best.s.reason,
    };
    return {
      entry,
      unreachable: retrievals.every((r) => r.state === 'transport-error'),
    };
  }

  private failureEntry(
    product: Product,
    outcome: ReportEntry['outcome'],
    grade: EntryGrade,
    reason: string,
  ): ReportEntry {
    return {
      product: product.name,
      parser: product.parser,
      outcome,
      grade,
      coveragePct: 0,
      compliancePct: 0,
      extractedCount: 0,
      expectedCount: product.taxonomy.fields.length,
      missingMandatory: product.taxonomy.fields.filter((f) => f.mandatory).map((f) => f.name),
      submissions: { attempted: 0, succeeded: 0 },
      pollAttempts: 0,
      reason,
    };
  }
}

function freezeEntry(entry: ReportEntry): ReportEntry {
  Object.freeze(entry.missingMandatory);
  Object.freeze(entry.submissions);
  return Object.freeze(entry);
}

function outcomeOf(r: RetrievalResult): ReportEntry['outcome'] {
  if (r.state === 'found') return 'scored';
  if (r.state === 'transport-error') return 'retrieval_error';
  return r.reason === RUN_DEADLINE_REASON ? 'cancelled' : 'retrieval_timeout';
}
