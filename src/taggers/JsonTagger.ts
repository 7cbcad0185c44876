import { TaggingError, errorMessage } from '../core/errors.js';
import type { SyntheticEvent } from '../core/types.js';
import type { ITagger, TagContext } from './ITagger.js';

/**
 * JSON payloads carry the token as a top-level field.
 * Example: {"action":"allow","pv_tracking_id":"pv-1a2b3c4d-000001-0f1e2d3c"}
 */
export class JsonTagger implements ITagger {
  readonly format = 'json';

  tag(event: SyntheticEvent, ctx: TagContext): string {
    const record = typeof event === 'string' ? this.parseObject(event) : event;
    return JSON.stringify({ ...record, [ctx.trackingField]: ctx.token });
  }

  private parseObject(raw: string): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new TaggingError(`json event is not valid JSON: ${errorMessage(e)}`);
    }
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new TaggingError('json event must be a JSON object');
    }
    return Object.fromEntries(Object.entries(parsed));
  }
}
