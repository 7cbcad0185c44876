import { SubmissionError, errorMessage } from '../core/errors.js';
import { redactSecrets } from '../utils/redact.js';
import type { IngestionBatch, IngestionResponse, IngestionTransport } from './types.js';
import { requestSignal } from './types.js';

export interface IngestionClientConfig {
  url: string;
  token: string;
  authScheme?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/**
 * Accepts a bare collector host as well as a full endpoint URL.
 * `https://hec.example.test` -> `https://hec.example.test/services/collector`
 */
export function normalizeIngestionUrl(u: string): string {
  const base = u.trim().replace(/\/+$/, '');
  if (!base) return base;
  if (base.endsWith('/event') || base.endsWith('/raw')) return base;
  if (base.includes('/services/collector')) return base;
  return `${base}/services/collector`;
}

export function rawEndpoint(u: string): string {
  const normalized = normalizeIngestionUrl(u);
  if (normalized.endsWith('/raw')) return normalized;
  if (normalized.endsWith('/event')) return normalized.slice(0, -'/event'.length) + '/raw';
  return `${normalized}/raw`;
}

/**
 * HTTP event collector client. Posts newline-delimited raw payloads so every
 * input format travels unchanged to the parser selected by `sourcetype`.
 */
export class HttpIngestionClient implements IngestionTransport {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly cfg: IngestionClientConfig) {
    this.endpoint = rawEndpoint(cfg.url);
    this.fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async send(batch: IngestionBatch, signal?: AbortSignal): Promise<IngestionResponse> {
    const url = new URL(this.endpoint);
    url.searchParams.set('sourcetype', batch.sourcetype);
    const { signal: reqSignal, dispose } = requestSignal(this.cfg.timeoutMs ?? 10_000, signal);
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          authorization: `${this.cfg.authScheme ?? 'Bearer'} ${this.cfg.token}`,
          'content-type': 'text/plain; charset=utf-8',
        },
        body: batch.payloads.join('\n'),
        signal: reqSignal,
      });
      const body = redactSecrets(await res.text(), [this.cfg.token]);
      return { ok: res.ok, status: res.status, body };
    } catch (err) {
      const message = redactSecrets(errorMessage(err), [this.cfg.token]);
      throw new SubmissionError(`ingestion transport failure: ${message}`, undefined, {
        cause: err,
      });
    } finally {
      dispose();
    }
  }
}
