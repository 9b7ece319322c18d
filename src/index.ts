import { describeConfig, loadConfig } from './config';
import { createPool, createSqlClient } from './db';
import { DualCadenceSamplingEngine } from './controllers/samplingEngine';
import defaultLogger, { createLogger } from './logger';
import { runMigrations } from './migrations';
import { PgTimeSeriesStore } from './repositories/pointsRepo';
import { startServer, StartedServer } from './server';
import { EnvoyClient } from './services/envoy/envoyClient';

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  logger.info('[startup] configuration loaded', describeConfig(config));

  const pool = createPool(config.db);
  const db = createSqlClient(pool, config.db.queryTimeoutMs);

  logger.info('[startup] migrations starting');
  const migrationClient = await pool.connect();
  try {
    await runMigrations({
      client: { query: async (text, params) => migrationClient.query(text, params) },
    });
  } finally {
    migrationClient.release();
  }
  logger.info('[startup] migrations done');

  const engine = new DualCadenceSamplingEngine({
    device: new EnvoyClient(config.envoy),
    store: new PgTimeSeriesStore(db),
    config: config.sampler,
    logger,
  });

  let server: StartedServer | null = null;
  if (config.httpEnabled) {
    server = await startServer({
      port: config.port,
      monitor: engine.monitor,
      pingDb: () => db.query('SELECT 1'),
      prometheus: {
        enabled: config.observability.prometheusEnabled,
        path: config.observability.prometheusPath,
      },
    });
  }

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info(`[shutdown] ${signal} received, stopping sampling`);
    controller.abort();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    await engine.run(controller.signal);
  } finally {
    await server?.stop();
    await pool.end();
    logger.info('[shutdown] stopped');
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    defaultLogger.error({ err }, '[startup] envoy sampler failed');
    process.exit(1);
  });
}
