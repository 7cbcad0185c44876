// Domain model for the validation pipeline, decoupled from transports for testability

export type InputFormat = 'json' | 'keyvalue' | 'syslog' | 'csv';
export type Grade = 'excellent' | 'good' | 'functional' | 'failing';
export type EntryGrade = Grade | 'submission failure';

export interface TaxonomyField {
  readonly name: string;
  readonly mandatory: boolean;
}

export interface FieldTaxonomy {
  readonly version: string;
  readonly ocsfCategory: string;
  readonly fields: readonly TaxonomyField[];
}

export interface Product {
  readonly name: string;
  readonly format: InputFormat;
  readonly parser: string; // opaque parser artifact identifier, also the ingestion sourcetype
  readonly taxonomy: FieldTaxonomy;
}

export type TrackingToken = string;

// Generators hand back either a structured record or a pre-rendered line
export type SyntheticEvent = string | Record<string, unknown>;

export type ParsedRecord = Record<string, unknown>;

export interface SubmissionRecord {
  token: TrackingToken;
  product: string;
  payload: string;
  submittedAt: Date;
  ok: boolean;
  /** Aborted by the run deadline before the boundary answered. */
  cancelled?: boolean;
  status?: number;
  error?: string;
  responseBody?: string;
}

export type RetrievalState = 'found' | 'timed-out' | 'transport-error';

export interface RetrievalResult {
  token: TrackingToken;
  found: boolean;
  state: RetrievalState;
  record?: ParsedRecord;
  retrievedAt: Date;
  attempts: number;
  reason?: string;
  cause?: unknown;
}

export interface FieldScore {
  product: string;
  extractedFields: string[];
  extractedCount: number;
  matchedFields: string[];
  expectedFields: string[];
  coveragePct: number;
  compliancePct: number;
  missingMandatory: string[];
  grade: Grade;
  reason?: string;
}

export type EntryOutcome =
  | 'scored'
  | 'submission_failure'
  | 'retrieval_timeout'
  | 'retrieval_error'
  | 'cancelled'
  | 'error';

export interface ReportEntry {
  product: string;
  parser: string;
  outcome: EntryOutcome;
  grade: EntryGrade;
  coveragePct: number;
  compliancePct: number;
  extractedCount: number;
  expectedCount: number;
  missingMandatory: string[];
  submissions: { attempted: number; succeeded: number };
  pollAttempts: number;
  token?: TrackingToken;
  reason?: string;
}

export interface ReportSummary {
  total: number;
  byGrade: Record<EntryGrade, number>;
  averageCoveragePct: number;
}

export interface ValidationReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  entries: readonly ReportEntry[];
  summary: ReportSummary;
  digest: string;
  signature?: string;
}
