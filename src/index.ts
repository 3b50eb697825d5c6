import express from 'express';
import { createAggregator } from './aggregator/index.js';
import { createBossListPrinter } from './cli/bossList.js';
import { registerRoutes } from './app/routes.js';
import { config } from './config/index.js';
import { SightingFeed } from './feed/sightingFeed.js';
import { logger } from './utils/logger.js';

process.on('unhandledRejection', err => {
  logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
  logger.error('uncaught_exception', { err: String(err) });
});

const feed = new SightingFeed(config.feedCapacity);
const { handle, driver } = createAggregator(feed, config.historySize, { logSightings: config.logSightings });

const driverDone = driver.run().then(
  () => logger.info('aggregator_exited'),
  (err: unknown) => logger.error('aggregator_failed', { err: String(err) })
);

const app = express();
registerRoutes(app, {
  aggregator: handle.clone(),
  feed,
  ingestToken: config.ingestToken,
  dedupeCapacity: config.dedupeCapacity,
});

const host = '0.0.0.0';
const server = app.listen({ port: config.port, host }, () => {
  logger.info('server_listening', { port: config.port, address: `${host}:${config.port}` });
});

if (!config.ingestToken) {
  logger.warn('ingest_auth_disabled', { reason: 'RAIDFEED_TOKEN not set' });
}

const printer = config.bossListEnabled
  ? createBossListPrinter(handle.clone(), { schedule: config.bossListCron })
  : undefined;
printer?.start();

function shutdown(signal: string): void {
  logger.info('shutting_down', { signal });
  printer?.stop();
  feed.end();
  handle.release();
  driver.stop();
  server.close();
  void driverDone.finally(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('sigterm'));
process.on('SIGINT', () => shutdown('sigint'));
