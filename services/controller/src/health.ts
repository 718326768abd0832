import { createServer, type Server } from 'node:http';

/** `/healthz` reports readiness (informers synced), `/livez` only that the process answers. */
export function createHealthServer(isReady: () => boolean): Server {
  return createServer((req, res) => {
    if (req.url === '/healthz') {
      const ok = isReady();
      res.writeHead(ok ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: ok ? 'healthy' : 'syncing' }));
    } else if (req.url === '/livez') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'alive' }));
    } else {
      res.writeHead(404).end();
    }
  });
}
