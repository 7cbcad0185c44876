import { z } from 'zod';
import { RetrievalTransportError, errorMessage } from '../core/errors.js';
import type { ParsedRecord } from '../core/types.js';
import { redactSecrets } from '../utils/redact.js';
import type { QueryRequest, QueryTransport } from './types.js';
import { requestSignal } from './types.js';

export interface QueryClientConfig {
  url: string;
  token: string;
  timeoutMs?: number;
  maxCount?: number;
  fetchImpl?: typeof fetch;
}

// Gateways and rate limiters answer these while the backend is healthy
export const RETRYABLE_STATUSES = new Set([408, 429, 502, 503, 504]);

const matchSchema = z
  .object({
    attributes: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const queryResponseSchema = z.object({
  status: z.string().optional(),
  matches: z.array(matchSchema).default([]),
});

export function toParsedRecord(match: z.infer<typeof matchSchema>): ParsedRecord {
  if (match.attributes) return match.attributes;
  return Object.fromEntries(Object.entries(match));
}

/**
 * Client for the log query API. Filters on the quoted tracking token, which
 * the parser leaves in the indexed record next to the extracted fields.
 */
export class HttpQueryClient implements QueryTransport {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly cfg: QueryClientConfig) {
    this.fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async search(req: QueryRequest, signal?: AbortSignal): Promise<ParsedRecord[]> {
    const { signal: reqSignal, dispose } = requestSignal(this.cfg.timeoutMs ?? 10_000, signal);
    let res: Response;
    try {
      res = await this.fetchImpl(this.cfg.url, {
        method: 'POST',
        headers: {
          authorization: `Bearer ${this.cfg.token}`,
          'content-type': 'application/json',
        },
        body: JSON.stringify({
          queryType: 'log',
          filter: JSON.stringify(req.token),
          startTime: new Date(req.startTime).toISOString(),
          endTime: new Date(req.endTime).toISOString(),
          maxCount: this.cfg.maxCount ?? 10,
        }),
        signal: reqSignal,
      });
    } catch (err) {
      dispose();
      const message = redactSecrets(errorMessage(err), [this.cfg.token]);
      throw new RetrievalTransportError(`query transport failure: ${message}`, undefined, true, {
        cause: err,
      });
    }
    try {
      const text = redactSecrets(await res.text(), [this.cfg.token]);
      if (!res.ok) {
        throw new RetrievalTransportError(
          `query rejected: ${res.status} ${text}`.trim(),
          res.status,
          RETRYABLE_STATUSES.has(res.status),
        );
      }
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (e) {
        throw new RetrievalTransportError(
          `query response is not JSON: ${errorMessage(e)}`,
          res.status,
          false,
          { cause: e },
        );
      }
      const parsed = queryResponseSchema.safeParse(json);
      if (!parsed.success) {
        throw new RetrievalTransportError(
          `unexpected query response shape: ${parsed.error.message}`,
          res.status,
        );
      }
      return parsed.data.matches.map(toParsedRecord);
    } finally {
      dispose();
    }
  }
}
