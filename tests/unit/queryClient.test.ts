import { describe, it, expect } from 'vitest';
import { RetrievalTransportError } from '../../src/core/errors.js';
import { HttpQueryClient } from '../../src/transport/queryClient.js';

const req = { token: 'pv-abcd1234-000001-0f1e2d3c', startTime: 0, endTime: 1000 };

function clientReturning(body: string, status = 200) {
  const bodies: unknown[] = [];
  const fetchImpl: typeof fetch = async (_input, init) => {
    const sent = init?.body;
    bodies.push(typeof sent === 'string' ? JSON.parse(sent) : undefined);
    return new Response(body, { status });
  };
  const client = new HttpQueryClient({
    url: 'https://q.test/api/query',
    token: 'test-secret',
    maxCount: 5,
    fetchImpl,
  });
  return { bodies, client };
}

async function failure(client: HttpQueryClient): Promise<RetrievalTransportError> {
  const err = await client.search(req).catch((e: unknown) => e);
  if (!(err instanceof RetrievalTransportError)) throw new Error('expected a RetrievalTransportError');
  return err;
}

describe('HttpQueryClient', () => {
  it('filters on the quoted token within the time window', async () => {
    const { bodies, client } = clientReturning('{"matches":[]}');
    await expect(client.search(req)).resolves.toEqual([]);
    expect(bodies).toEqual([
      {
        queryType: 'log',
        filter: '"pv-abcd1234-000001-0f1e2d3c"',
        startTime: '1970-01-01T00:00:00.000Z',
        endTime: '1970-01-01T00:00:01.000Z',
        maxCount: 5,
      },
    ]);
  });

  it('returns match attributes, or the match itself without them', async () => {
    const { client } = clientReturning(
      '{"status":"success","matches":[{"attributes":{"srcip":"10.0.0.1"}},{"dstip":"10.0.0.2"}]}',
    );
    await expect(client.search(req)).resolves.toEqual([{ srcip: '10.0.0.1' }, { dstip: '10.0.0.2' }]);
  });

  it('treats a missing matches list as no matches', async () => {
    const { client } = clientReturning('{}');
    await expect(client.search(req)).resolves.toEqual([]);
  });

  it('marks gateway statuses as retryable', async () => {
    const err = await failure(clientReturning('busy', 503).client);
    expect(err.message).toBe('query rejected: 503 busy');
    expect(err.status).toBe(503);
    expect(err.retryable).toBe(true);
  });

  it('does not retry authorization failures and masks the secret', async () => {
    const err = await failure(clientReturning('denied for test-secret', 401).client);
    expect(err.message).toBe('query rejected: 401 denied for ***');
    expect(err.retryable).toBe(false);
  });

  it('rejects malformed responses as non-retryable', async () => {
    const notJson = await failure(clientReturning('<html>').client);
    expect(notJson.message).toMatch(/^query response is not JSON/);
    expect(notJson.retryable).toBe(false);
    const badShape = await failure(clientReturning('{"matches":"none"}').client);
    expect(badShape.message).toMatch(/^unexpected query response shape/);
    expect(badShape.retryable).toBe(false);
  });

  it('retries network failures', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const client = new HttpQueryClient({ url: 'https://q.test', token: 'test-secret', fetchImpl });
    const err = await failure(client);
    expect(err.message).toBe('query transport failure: fetch failed');
    expect(err.retryable).toBe(true);
    expect(err.status).toBeUndefined();
  });
});
