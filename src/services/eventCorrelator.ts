import crypto from 'crypto';
import { DuplicateTokenError, TokenNotFoundError } from '../core/errors.js';
import type {
  Product,
  RetrievalResult,
  SubmissionRecord,
  TrackingToken,
} from '../core/types.js';

export interface CorrelationEntry {
  token: TrackingToken;
  product: string;
  expectedFields: string[];
  mintedAt: Date;
  submission?: SubmissionRecord;
  retrieval?: RetrievalResult;
}

/**
 * In-memory registry of tracking tokens for one validation run.
 *
 * Constructed per run and passed explicitly to the submitter and poller. None
 * of the mutating methods await, so under the event loop each one runs to
 * completion before another task can observe the registry.
 */
export class EventCorrelator {
  readonly runId: string;
  private counter = 0;
  private readonly live = new Map<TrackingToken, CorrelationEntry>();
  private readonly retired = new Map<TrackingToken, CorrelationEntry>();

  constructor(runId: string = crypto.randomBytes(4).toString('hex')) {
    this.runId = runId;
  }

  mint(product: Product): TrackingToken {
    this.counter += 1;
    const seq = this.counter.toString(36).padStart(6, '0');
    const suffix = crypto.randomBytes(4).toString('hex');
    const token = `pv-${this.runId}-${seq}-${suffix}`;
    this.insert(token, product);
    return token;
  }

  attach(token: TrackingToken, submission: SubmissionRecord): void {
    const entry = this.entry(token);
    if (entry.submission) {
      throw new DuplicateTokenError(token);
    }
    entry.submission = submission;
  }

  resolve(token: TrackingToken): SubmissionRecord {
    const submission = this.live.get(token)?.submission ?? this.retired.get(token)?.submission;
    if (!submission) {
      throw new TokenNotFoundError(token);
    }
    return submission;
  }

  /** Records the terminal retrieval for a token and retires it. */
  complete(token: TrackingToken, retrieval: RetrievalResult): void {
    const entry = this.live.get(token);
    if (!entry) {
      // a retired token already holds its one retrieval
      if (this.retired.has(token)) throw new DuplicateTokenError(token);
      throw new TokenNotFoundError(token);
    }
    entry.retrieval = retrieval;
    this.live.delete(token);
    this.retired.set(token, entry);
  }

  get(token: TrackingToken): CorrelationEntry | undefined {
    return this.live.get(token) ?? this.retired.get(token);
  }

  isLive(token: TrackingToken): boolean {
    return this.live.has(token);
  }

  get size(): number {
    return this.live.size + this.retired.size;
  }

  private insert(token: TrackingToken, product: Product) {
    if (this.live.has(token) || this.retired.has(token)) {
      throw new DuplicateTokenError(token);
    }
    this.live.set(token, {
      token,
      product: product.name,
      expectedFields: product.taxonomy.fields.map((f) => f.name),
      mintedAt: new Date(),
    });
  }

  private entry(token: TrackingToken): CorrelationEntry {
    const entry = this.live.get(token);
    if (!entry) throw new TokenNotFoundError(token);
    return entry;
  }
}
