import type { ValidationReport } from '../core/types.js';

const COLUMNS = ['product', 'grade', 'coverage%', 'compliance%', 'extracted', 'reason'] as const;

/** Plain-text ranking table for terminals. */
export function formatReportTable(report: ValidationReport): string {
  const rows = report.entries.map((e) => [
    e.product,
    e.grade,
    e.coveragePct.toFixed(1),
    e.compliancePct.toFixed(1),
    String(e.extractedCount),
    e.reason ?? '',
  ]);
  const widths = COLUMNS.map((c, i) => Math.max(c.length, ...rows.map((r) => r[i].length)));
  const line = (cells: readonly string[]) =>
    cells
      .map((c, i) => c.padEnd(widths[i]))
      .join('  ')
      .trimEnd();
  const { summary } = report;
  return [
    line(COLUMNS),
    line(widths.map((w) => '-'.repeat(w))),
    ...rows.map(line),
    '',
    `run ${report.runId}: ${summary.total} products, average coverage ${summary.averageCoveragePct.toFixed(1)}%`,
  ].join('\n');
}
