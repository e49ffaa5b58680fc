import http, { IncomingMessage, ServerResponse } from 'node:http';
import { URL } from 'node:url';
import logger from '../logger.js';
import metricsModule, { MetricsRegistry, PROMETHEUS_CONTENT_TYPE } from '../metrics/index.js';

export interface HttpServerOptions {
  port?: number;
  /** Leave unset to accept connections on every interface, IPv4 and IPv6. */
  host?: string;
  metricsPath?: string;
  metrics?: MetricsRegistry;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export const DEFAULT_EXPORTER_PORT = 9705;

export async function startHttpServer(options: HttpServerOptions = {}): Promise<HttpServerRuntime> {
  const port = options.port ?? DEFAULT_EXPORTER_PORT;
  const host = options.host || undefined;
  const metricsPath = options.metricsPath ?? '/metrics';
  const metrics = options.metrics ?? metricsModule;

  const server = http.createServer((req, res) => {
    try {
      if (serveMetrics(req, res, metricsPath, metrics)) {
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
    server.listen({ port, host }, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;
  const boundHost = typeof address === 'object' && address ? address.address : host;

  logger.info({ port: actualPort, host: boundHost, path: metricsPath }, 'Metrics endpoint listening');

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
      })
  };
}

function serveMetrics(
  req: IncomingMessage,
  res: ServerResponse,
  metricsPath: string,
  metrics: MetricsRegistry
): boolean {
  if (!req.url) {
    return false;
  }

  const url = new URL(req.url, 'http://localhost');
  if (url.pathname !== metricsPath) {
    return false;
  }

  const body = metrics.snapshot();
  res.writeHead(200, {
    'Content-Type': PROMETHEUS_CONTENT_TYPE,
    'Content-Length': Buffer.byteLength(body)
  });

  if (req.method === 'HEAD') {
    res.end();
    return true;
  }

  res.end(body);
  return true;
}
