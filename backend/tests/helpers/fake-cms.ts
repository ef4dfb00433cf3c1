import { createServer, type IncomingHttpHeaders } from 'node:http';

export const TEST_COOKIE = 'PHPSESSID=test-session';
export const TEST_TOKEN = 'test-token';

export interface RecordedCall {
  method: string;
  path: string;
  query: URLSearchParams;
  body: URLSearchParams;
  headers: IncomingHttpHeaders;
}

export interface FakeCmsOptions {
  /** Answer of unlock-element per id; default true. */
  unlock?: (id: string) => boolean;
  /** Grid-proxy response body per classId; unknown classes get { success: false }. */
  listings?: Record<string, unknown>;
  /** Responses per object id, served in order; the last one repeats. */
  details?: Record<string, unknown[]>;
  /** Delay before answering object/get, in ms. */
  detailDelayMs?: number;
}

export interface FakeCms {
  url: string;
  calls: RecordedCall[];
  close(): Promise<void>;
}

export async function startFakeCms(opts: FakeCmsOptions = {}): Promise<FakeCms> {
  const calls: RecordedCall[] = [];
  const served = new Map<string, number>();

  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (c: Buffer) => chunks.push(c));
    req.on('end', () => {
      const url = new URL(req.url || '/', 'http://localhost');
      const body = new URLSearchParams(Buffer.concat(chunks).toString('utf-8'));
      calls.push({ method: req.method || '', path: url.pathname, query: url.searchParams, body, headers: req.headers });

      const send = (status: number, payload: unknown) => {
        res.statusCode = status;
        res.setHeader('Content-Type', 'application/json');
        res.end(JSON.stringify(payload));
      };

      if (req.headers.cookie !== TEST_COOKIE) return send(403, { success: false, message: 'not logged in' });

      if (req.method === 'PUT' && url.pathname === '/admin/element/unlock-element') {
        if (req.headers['x-pimcore-csrf-token'] !== TEST_TOKEN) return send(403, { success: false });
        const ok = opts.unlock ? opts.unlock(body.get('id') || '') : true;
        return send(200, { success: ok });
      }
      if (req.method === 'POST' && url.pathname === '/admin/object/grid-proxy') {
        const listing = opts.listings?.[url.searchParams.get('classId') || ''];
        return send(200, listing ?? { success: false });
      }
      if (req.method === 'GET' && url.pathname === '/admin/object/get') {
        const id = url.searchParams.get('id') || '';
        const queue = opts.details?.[id];
        if (!queue || !queue.length) return send(404, { success: false });
        const n = served.get(id) || 0;
        served.set(id, n + 1);
        const payload = queue[Math.min(n, queue.length - 1)];
        if (opts.detailDelayMs) {
          setTimeout(() => send(200, payload), opts.detailDelayMs);
          return;
        }
        return send(200, payload);
      }
      send(404, { success: false });
    });
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('fake CMS is not listening on TCP');
  return {
    url: `http://127.0.0.1:${address.port}`,
    calls,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((err) => (err ? reject(err) : resolve()));
    })
  };
}
