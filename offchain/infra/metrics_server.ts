import http from 'http';
import client from 'prom-client';
import { registry } from './metrics';
import { log } from './logger';

let defaultsRegistered = false;

export function startMetricsServer(port: number): http.Server {
  if (!defaultsRegistered) {
    client.collectDefaultMetrics({ register: registry });
    defaultsRegistered = true;
  }

  const srv = http.createServer(async (req, res) => {
    if (req.url === '/metrics') {
      try {
        const data = await registry.metrics();
        res.writeHead(200, { 'Content-Type': registry.contentType });
        return res.end(data);
      } catch (e) {
        res.writeHead(500); return res.end(e instanceof Error ? e.message : String(e));
      }
    }
    if (req.url === '/live' || req.url === '/ready') {
      res.writeHead(200); return res.end('ok');
    }
    res.writeHead(404); res.end();
  });

  srv.on('error', (err) => {
    log.error({ err: err.message, port }, 'metrics-server-error');
  });
  srv.listen(port, () => {
    log.info({ port }, 'metrics-server-listening');
  });
  return srv;
}
