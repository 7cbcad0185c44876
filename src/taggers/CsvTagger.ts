import type { SyntheticEvent } from '../core/types.js';
import type { ITagger, TagContext } from './ITagger.js';
import { stringifyValue } from './KeyValueTagger.js';

/**
 * CSV payloads get the token as a trailing column, so the columns a
 * positional parser already maps keep their indexes.
 */
export class CsvTagger implements ITagger {
  readonly format = 'csv';

  tag(event: SyntheticEvent, ctx: TagContext): string {
    const row =
      typeof event === 'string'
        ? event.trimEnd()
        : Object.values(event)
            .map((v) => (v === undefined || v === null ? '' : csvCell(stringifyValue(v))))
            .join(',');
    return `${row},${csvCell(ctx.token)}`;
  }
}

export function csvCell(v: string): string {
  return /[",\r\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v;
}
