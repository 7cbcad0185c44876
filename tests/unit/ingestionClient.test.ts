import { describe, it, expect } from 'vitest';
import { SubmissionError } from '../../src/core/errors.js';
import {
  HttpIngestionClient,
  normalizeIngestionUrl,
  rawEndpoint,
} from '../../src/transport/ingestionClient.js';

interface Call {
  url: string;
  init?: RequestInit;
}

function recordingFetch(respond: () => Response | Promise<Response>) {
  const calls: Call[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), init });
    return respond();
  };
  return { calls, fetchImpl };
}

describe('normalizeIngestionUrl', () => {
  it('appends the collector path to a bare host', () => {
    expect(normalizeIngestionUrl('https://hec.example.test/')).toBe(
      'https://hec.example.test/services/collector',
    );
    expect(normalizeIngestionUrl(' https://hec.example.test:8088/services/collector ')).toBe(
      'https://hec.example.test:8088/services/collector',
    );
  });

  it('keeps explicit event and raw endpoints', () => {
    expect(normalizeIngestionUrl('https://h.test/services/collector/event')).toBe(
      'https://h.test/services/collector/event',
    );
    expect(normalizeIngestionUrl('https://h.test/ingest/raw')).toBe('https://h.test/ingest/raw');
    expect(normalizeIngestionUrl('')).toBe('');
  });

  it('maps every form onto the raw endpoint', () => {
    expect(rawEndpoint('https://h.test')).toBe('https://h.test/services/collector/raw');
    expect(rawEndpoint('https://h.test/services/collector/event')).toBe(
      'https://h.test/services/collector/raw',
    );
    expect(rawEndpoint('https://h.test/services/collector/raw')).toBe(
      'https://h.test/services/collector/raw',
    );
  });
});

describe('HttpIngestionClient', () => {
  it('posts newline-delimited payloads with the sourcetype', async () => {
    const { calls, fetchImpl } = recordingFetch(() => new Response('{"text":"Success"}', { status: 200 }));
    const client = new HttpIngestionClient({
      url: 'https://hec.example.test',
      token: 'test-secret',
      authScheme: 'Splunk',
      fetchImpl,
    });
    const res = await client.send({ sourcetype: 'okta-latest', payloads: ['{"a":1}', '{"a":2}'] });
    expect(res).toEqual({ ok: true, status: 200, body: '{"text":"Success"}' });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://hec.example.test/services/collector/raw?sourcetype=okta-latest');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.headers).toEqual({
      authorization: 'Splunk test-secret',
      'content-type': 'text/plain; charset=utf-8',
    });
    expect(calls[0].init?.body).toBe('{"a":1}\n{"a":2}');
  });

  it('returns rejections as responses with the secret masked', async () => {
    const { fetchImpl } = recordingFetch(() => new Response('bad token test-secret', { status: 403 }));
    const client = new HttpIngestionClient({ url: 'https://h.test', token: 'test-secret', fetchImpl });
    await expect(client.send({ sourcetype: 's', payloads: ['x'] })).resolves.toEqual({
      ok: false,
      status: 403,
      body: 'bad token ***',
    });
  });

  it('raises a SubmissionError when nothing answers', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed for test-secret');
    };
    const client = new HttpIngestionClient({ url: 'https://h.test', token: 'test-secret', fetchImpl });
    const err = await client.send({ sourcetype: 's', payloads: ['x'] }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SubmissionError);
    expect(err).toMatchObject({ message: 'ingestion transport failure: fetch failed for ***' });
  });
});
