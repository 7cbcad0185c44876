import type { GradingConfig } from '../config/index.js';
import type { FieldScore, Grade, ParsedRecord, Product, RetrievalResult } from '../core/types.js';
import { NEVER_INDEXED_REASON } from './completionPoller.js';

/**
 * Flattens nested objects into dotted, lower-cased paths and drops empty
 * values. Arrays count as one present field; their elements are not expanded.
 */
export function flattenRecord(record: ParsedRecord, prefix = ''): Map<string, unknown> {
  const out = new Map<string, unknown>();
  for (const [key, value] of Object.entries(record)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (value === null || value === undefined || value === '') continue;
    if (typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date)) {
      for (const [k, v] of flattenRecord(Object.fromEntries(Object.entries(value)), path)) {
        out.set(k, v);
      }
      continue;
    }
    out.set(path.toLowerCase(), value);
  }
  return out;
}

export function roundPct(v: number): number {
  return Math.round(v * 10) / 10;
}

/**
 * Maps (coverage%, compliance%, extracted count) to a grade. First matching
 * row of the table wins; no match is `failing`.
 */
export function gradeFor(
  coveragePct: number,
  compliancePct: number,
  extractedCount: number,
  grading: GradingConfig,
): Grade {
  for (const rule of grading.table) {
    if (compliancePct < rule.minCompliance) continue;
    if (coveragePct < rule.minCoverage) continue;
    if (rule.requireAboveHighWaterMark && extractedCount <= grading.highWaterMark) continue;
    return rule.grade;
  }
  return 'failing';
}

export class FieldScorer {
  constructor(
    private readonly grading: GradingConfig,
    private readonly trackingField: string,
  ) {}

  score(product: Product, retrieval: RetrievalResult): FieldScore {
    const expectedFields = product.taxonomy.fields.map((f) => f.name);
    const mandatory = product.taxonomy.fields.filter((f) => f.mandatory).map((f) => f.name);
    if (!retrieval.found || !retrieval.record) {
      return {
        product: product.name,
        extractedFields: [],
        extractedCount: 0,
        matchedFields: [],
        expectedFields,
        coveragePct: 0,
        compliancePct: 0,
        missingMandatory: mandatory,
        grade: 'failing',
        reason: retrieval.reason ?? NEVER_INDEXED_REASON,
      };
    }

    const present = flattenRecord(retrieval.record);
    present.delete(this.trackingField.toLowerCase());
    const has = (name: string) => present.has(name.toLowerCase());

    const matchedFields = expectedFields.filter(has);
    const missingMandatory = mandatory.filter((f) => !has(f));
    const coverage = expectedFields.length
      ? (matchedFields.length / expectedFields.length) * 100
      : 0;
    // without mandatory fields compliance falls back to coverage
    const compliance = mandatory.length
      ? ((mandatory.length - missingMandatory.length) / mandatory.length) * 100
      : coverage;
    const coveragePct = roundPct(coverage);
    const compliancePct = roundPct(compliance);
    const extractedFields = Array.from(present.keys()).sort();

    return {
      product: product.name,
      extractedFields,
      extractedCount: extractedFields.length,
      matchedFields,
      expectedFields,
      coveragePct,
      compliancePct,
      missingMandatory,
      grade: gradeFor(coveragePct, compliancePct, extractedFields.length, this.grading),
    };
  }
}
