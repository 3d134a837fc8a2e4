import http from 'node:http';
import logger from '../logger.js';
import metrics, { MetricsRegistry } from '../metrics/index.js';
import { createEventsRouter } from './routes/events.js';
import type { EventsRouterOptions } from './routes/events.js';

export interface HttpServerOptions {
  port?: number;
  host?: string;
  manager: EventsRouterOptions['manager'];
  timeZone?: string;
  metrics?: MetricsRegistry;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 8888;
  const host = options.host ?? '0.0.0.0';

  const eventsRouter = createEventsRouter({
    manager: options.manager,
    timeZone: options.timeZone,
    metrics: options.metrics ?? metrics
  });

  const server = http.createServer((req, res) => {
    try {
      if (eventsRouter.handle(req, res)) {
        return;
      }

      res.statusCode = 404;
      res.setHeader('Content-Type', 'application/json');
      res.end(JSON.stringify({ error: 'Not found' }));
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      if (!res.headersSent) {
        res.statusCode = 500;
        res.setHeader('Content-Type', 'application/json');
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}
