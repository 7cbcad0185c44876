import type { SyntheticEvent } from '../core/types.js';
import type { ITagger, TagContext } from './ITagger.js';
import { renderKeyValue, stringifyValue } from './KeyValueTagger.js';

// 32473 is the enterprise number reserved for documentation (RFC 5612)
export const TRACKING_SD_ID = 'pvtrack@32473';

const RFC5424_HEADER = /^(<\d{1,3}>1 \S+ \S+ \S+ \S+ \S+) (-|\[.*?[^\\]\])(?: (.*))?$/s;
const HEADER_KEYS = new Set(['timestamp', 'host', 'hostname', 'app', 'appName', 'message', 'msg']);

/**
 * Syslog payloads carry the token as an RFC 5424 structured-data element:
 *   <134>1 2024-05-01T10:00:00.000Z fw01 fortigate - - [pvtrack@32473 pv_tracking_id="pv-..."] msg
 * Legacy RFC 3164 lines, which have no structured data, get a trailing key=value pair.
 */
export class SyslogTagger implements ITagger {
  readonly format = 'syslog';

  constructor(
    private readonly facility = 16, // local0
    private readonly severity = 6, // informational
  ) {}

  tag(event: SyntheticEvent, ctx: TagContext): string {
    const element = `[${TRACKING_SD_ID} ${ctx.trackingField}="${escapeParam(ctx.token)}"]`;
    if (typeof event === 'string') {
      return this.tagLine(event.trimEnd(), element, ctx);
    }
    const header = this.header(event);
    const body = this.body(event);
    return body.length ? `${header} ${element} ${body}` : `${header} ${element}`;
  }

  private tagLine(line: string, element: string, ctx: TagContext): string {
    const m = RFC5424_HEADER.exec(line);
    if (!m) {
      return `${line} ${ctx.trackingField}=${ctx.token}`;
    }
    const [, head, sd, msg] = m;
    const structured = sd === '-' ? element : `${sd}${element}`;
    return msg === undefined ? `${head} ${structured}` : `${head} ${structured} ${msg}`;
  }

  private header(event: Record<string, unknown>): string {
    const pri = this.facility * 8 + this.severity;
    const ts = event.timestamp ? stringifyValue(event.timestamp) : new Date().toISOString();
    const host = headerToken(event.hostname ?? event.host);
    const app = headerToken(event.appName ?? event.app);
    return `<${pri}>1 ${headerToken(ts)} ${host} ${app} - -`;
  }

  private body(event: Record<string, unknown>): string {
    const rest = Object.fromEntries(Object.entries(event).filter(([k]) => !HEADER_KEYS.has(k)));
    const msg = event.message ?? event.msg;
    const pairs = renderKeyValue(rest);
    if (msg === undefined || msg === null) return pairs;
    return pairs.length ? `${stringifyValue(msg)} ${pairs}` : stringifyValue(msg);
  }
}

function headerToken(v: unknown): string {
  if (v === undefined || v === null || v === '') return '-';
  return stringifyValue(v).replace(/\s+/g, '_');
}

function escapeParam(v: string): string {
  return v.replace(/[\\"\]]/g, (c) => `\\${c}`);
}
