import { afterAll, assert, beforeAll, beforeEach, describe, expect, test } from 'vitest';
import { conferences, exampleConf, sampleSummit } from '../src/__fixtures__/conferences.js';
import {
  CFPTime,
  type Conference,
  ConstructURLError,
  DecodeError,
  getRetryExhaustedError,
  HTTPError,
  isAbortError,
  TransportError,
} from '../src/index.js';
import { type E2EServer, startE2EServer } from './server.js';

const pastConf: Conference = {
  ...exampleConf,
  id: 7,
  name: 'Last Year Conf',
  cfp_deadline: '2025-01-10',
  conf_start_date: '2025-04-02',
  created_at: '2024-10-01T08:00:00Z',
};

let server: E2EServer;
let client: CFPTime;

beforeAll(async () => {
  const [err, srv] = await startE2EServer({ listings: [...conferences, pastConf], today: '2026-04-01' });
  assert(err === null, 'error is not null on server-start, cannot continue');

  server = srv;
  client = new CFPTime({ baseUrl: server.url, retry: { timeout: 1, factor: 1 } });
});

beforeEach(() => {
  server.reset();
});

afterAll(async () => {
  client.dispose();
  const err = await server.close();
  expect(err).toBeNull();
});

describe('cfptime e2e', () => {
  test('GET cfps lists every listing in server order, unknown fields stripped', async () => {
    const [err, data] = await client.getCfps();

    expect(err).toBeNull();
    expect(data).toStrictEqual([...conferences, pastConf]);
    expect(server.getCounts()).toStrictEqual({ 'GET /api/cfps': 1 });
  });

  test('GET cfps/{id}/ returns one listing', async () => {
    const [err, data] = await client.getCfp(1729);

    expect(err).toBeNull();
    expect(data).toStrictEqual(exampleConf);
    expect(server.getCounts()).toStrictEqual({ 'GET /api/cfps/1729/': 1 });
  });

  test('GET conferences lists every listing', async () => {
    const [err, data] = await client.getConferences();

    expect(err).toBeNull();
    expect(data?.map((c) => c.id)).toStrictEqual([1729, 42, 7]);
  });

  test('GET conferences/{id}/ returns one listing', async () => {
    const [err, data] = await client.getConference(42);

    expect(err).toBeNull();
    expect(data).toStrictEqual(sampleSummit);
  });

  test('GET upcoming leaves out past conferences', async () => {
    const [err, data] = await client.getUpcoming();

    expect(err).toBeNull();
    expect(data?.map((c) => c.name)).toStrictEqual(['Example Conf', 'Sample Summit']);
  });

  test('unknown id is an HTTPError 404, attempted once', async () => {
    const [err, data] = await client.getConference(9999);

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(HTTPError);
    if (err instanceof HTTPError) {
      expect(err.status).toBe(404);
      expect(err.body).toBe('not found');
      expect(err.url).toBe(`${server.url}/conferences/9999/`);
    }
    expect(server.getCounts()['GET /api/conferences/9999/']).toBe(1);
  });

  test('negative id never reaches the server', async () => {
    const [err] = await client.getCfp(-5);

    expect(err).toBeInstanceOf(ConstructURLError);
    expect(server.getCounts()).toStrictEqual({});
  });

  test('503 twice then ok succeeds on the third attempt', async () => {
    server.failNext(2, 503);

    const [err, data] = await client.getUpcoming();

    expect(err).toBeNull();
    expect(data).toHaveLength(2);
    expect(server.getCounts()['GET /api/upcoming']).toBe(3);
  });

  test('persistent 500 gives up after 4 attempts with the last status', async () => {
    server.failNext(10, 500);

    const [err] = await client.getCfps();

    expect(err).toBeInstanceOf(HTTPError);
    if (err instanceof HTTPError) {
      expect(err.status).toBe(500);
      expect(err.body).toBe('injected failure');
    }
    expect(server.getCounts()['GET /api/cfps']).toBe(4);
  });

  test('statusCodes narrows what is retried', async () => {
    server.failNext(10, 500);

    const [err] = await client.getCfps({ retry: { statusCodes: [503] } });

    expect(err?.kind).toBe('status');
    expect(server.getCounts()['GET /api/cfps']).toBe(1);
  });

  test('a 200 that is not JSON is a DecodeError, not retried', async () => {
    server.garbleNext();

    const [err] = await client.getCfp(1729);

    expect(err).toBeInstanceOf(DecodeError);
    if (err instanceof DecodeError) {
      expect(err.body).toBe('<html>maintenance</html>');
    }
    expect(server.getCounts()['GET /api/cfps/1729/']).toBe(1);
  });

  test('missing default headers are rejected by the server', async () => {
    const bare = new CFPTime({ baseUrl: server.url, retry: 0, headers: { Accept: null } });

    const [err] = await bare.getCfps();

    expect(err).toBeInstanceOf(HTTPError);
    if (err instanceof HTTPError) {
      expect(err.status).toBe(406);
    }
  });

  test('nothing listening is a TransportError after retries', async () => {
    const [errClosed, closed] = await startE2EServer({ listings: [], today: '2026-04-01' });
    assert(errClosed === null, 'error is not null on server-start, cannot continue');
    const url = closed.url;
    expect(await closed.close()).toBeNull();

    const offline = new CFPTime({ baseUrl: url, retry: { limit: 1, timeout: 1 } });
    const [err] = await offline.getCfps();

    expect(err).toBeInstanceOf(TransportError);
    expect(getRetryExhaustedError(err)?.attempts).toBe(2);
  });

  test('an aborted signal fails before reaching the server', async () => {
    const [err] = await client.getCfps({ signal: AbortSignal.abort() });

    expect(err).toBeInstanceOf(TransportError);
    expect(isAbortError(err)).toBe(true);
    expect(server.getCounts()).toStrictEqual({});
  });

  test('concurrent calls on one client', async () => {
    const results = await Promise.all([client.getCfp(1729), client.getCfp(42), client.getConference(7)]);

    expect(results.map(([err, data]) => [err, data?.id])).toStrictEqual([
      [null, 1729],
      [null, 42],
      [null, 7],
    ]);
  });
});
