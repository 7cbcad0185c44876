import type { SyntheticEvent } from '../core/types.js';
import type { ITagger, TagContext } from './ITagger.js';

/**
 * key=value payloads get the token as one more pair at the end of the line.
 * Values containing whitespace, '=' or quotes are double-quoted.
 */
export class KeyValueTagger implements ITagger {
  readonly format = 'keyvalue';

  tag(event: SyntheticEvent, ctx: TagContext): string {
    const line = typeof event === 'string' ? event.trimEnd() : renderKeyValue(event);
    const pair = `${ctx.trackingField}=${quoteValue(ctx.token)}`;
    return line.length ? `${line} ${pair}` : pair;
  }
}

export function renderKeyValue(record: Record<string, unknown>): string {
  return Object.entries(record)
    .filter(([, v]) => v !== undefined && v !== null)
    .map(([k, v]) => `${k}=${quoteValue(stringifyValue(v))}`)
    .join(' ');
}

export function stringifyValue(v: unknown): string {
  if (typeof v === 'string') return v;
  if (v instanceof Date) return v.toISOString();
  if (typeof v === 'object') return JSON.stringify(v);
  return String(v);
}

function quoteValue(v: string): string {
  if (v.length > 0 && !/[\s="]/.test(v)) return v;
  return `"${v.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
