import { type ServerType, serve } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import type { Conference } from '../src/cfptime/schemas.js';
import { type SafeWrapAsync, safeWrapAsync } from '../src/utils/wrap.js';

export type E2EServer = {
  /** Base URL of the mock API, e.g. `http://127.0.0.1:54321/api` */
  url: string;
  close: () => Promise<Error | null>;
  reset: () => void;
  getCounts: () => Record<string, number>;
  /** Answer the next `times` requests with `status` instead of the listing. */
  failNext: (times: number, status: number) => void;
  /** Answer the next request with a 200 whose body is not JSON. */
  garbleNext: () => void;
};

export type E2EServerOptions = {
  listings: ReadonlyArray<Conference>;
  /** Date `upcoming` compares `conf_start_date` against, `YYYY-MM-DD`. */
  today: string;
};

export async function startE2EServer({ listings, today }: E2EServerOptions): SafeWrapAsync<Error, E2EServer> {
  const counts: Record<string, number> = {};
  const app = new Hono();
  let failures: { times: number; status: number } = { times: 0, status: 500 };
  let garble = false;

  function increment(key: string) {
    counts[key] = (counts[key] ?? 0) + 1;
    return counts[key];
  }

  // Listings go out with a field the client does not know about.
  const wire = (listing: Conference) => ({ ...listing, sponsor_tiers: ['gold', 'silver'] });

  app.use('/api/*', async (c, next) => {
    increment(`${c.req.method} ${c.req.path}`);

    if (c.req.header('accept') !== 'application/json') {
      return c.text('missing accept header', 406);
    }

    if (failures.times > 0) {
      failures = { ...failures, times: failures.times - 1 };
      return new Response('injected failure', { status: failures.status });
    }

    if (garble) {
      garble = false;
      return c.text('<html>maintenance</html>', 200);
    }

    await next();
  });

  function byId(c: Context) {
    const id = Number(c.req.param('id'));
    const listing = listings.find((l) => l.id === id);
    if (!listing) {
      return c.text('not found', 404);
    }

    return c.json(wire(listing));
  }

  app.get('/api/cfps', (c) => c.json(listings.map(wire)));
  app.get('/api/cfps/:id/', byId);
  app.get('/api/conferences', (c) => c.json(listings.map(wire)));
  app.get('/api/conferences/:id/', byId);
  app.get('/api/upcoming', (c) => c.json(listings.filter((l) => l.conf_start_date >= today).map(wire)));

  const [errServer, serverAndPort] = await safeWrapAsync(
    () =>
      new Promise<[ServerType, number]>((resolve) => {
        const srv = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (serverInfo) => {
          resolve([srv, serverInfo.port]);
        });
      }),
  );

  if (errServer) {
    return [new Error('error starting server', { cause: errServer }), null];
  }

  let [server, port] = serverAndPort;
  const address = server.address();
  if (address && typeof address !== 'string') {
    port = address.port;
  }

  return [
    null,
    {
      url: `http://127.0.0.1:${port}/api`,
      reset: () => {
        for (const k of Object.keys(counts)) {
          delete counts[k];
        }
        failures = { times: 0, status: 500 };
        garble = false;
      },
      getCounts: () => structuredClone(counts),
      failNext: (times, status) => {
        failures = { times, status };
      },
      garbleNext: () => {
        garble = true;
      },
      close: () =>
        new Promise<Error | null>((resolve) =>
          server.close((err) => {
            if (err) {
              resolve(new Error('error closing server', { cause: err }));
              return;
            }

            resolve(null);
          }),
        ),
    },
  ];
}
