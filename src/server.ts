import express, { Express } from 'express';
import http from 'http';
import logger from './logger';
import {
  collectHealthMetrics,
  metricsContentType,
  renderPrometheus,
} from './observability/metrics';
import { LoopMonitor } from './state/loopMonitor';

export interface StartServerOptions {
  port: number;
  monitor: LoopMonitor;
  pingDb: () => Promise<unknown>;
  prometheus?: {
    enabled: boolean;
    path: string;
  };
}

export interface StartedServer {
  app: Express;
  server: http.Server;
  port: number;
  stop: () => Promise<void>;
}

export function createApp(options: Omit<StartServerOptions, 'port'>): Express {
  const { monitor, pingDb } = options;
  const app = express();

  app.get('/api/health', async (_req, res) => {
    let dbOk = true;
    try {
      await pingDb();
    } catch (err) {
      dbOk = false;
      logger.error({ err }, '[health] db check failed');
    }

    const loops = monitor.snapshot();
    const overallStatus = dbOk && monitor.isHealthy() ? 'ok' : 'degraded';

    res.json({
      status: overallStatus,
      db: { ok: dbOk },
      loops,
    });
  });

  if (options.prometheus?.enabled) {
    app.get(options.prometheus.path, async (_req, res) => {
      await collectHealthMetrics(pingDb, monitor);
      res.setHeader('Content-Type', metricsContentType());
      res.send(renderPrometheus());
    });
  }

  return app;
}

export async function startServer(options: StartServerOptions): Promise<StartedServer> {
  const app = createApp(options);
  const server = http.createServer(app);

  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : options.port;
      logger.info(`envoy sampler health endpoint listening on http://localhost:${port}`);
      resolve(port);
    });
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, server, port: actualPort, stop };
}
