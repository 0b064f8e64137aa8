/**
 * Process entry point: reads configuration, wires the services, starts
 * the HTTP listener and the housekeeping worker, and shuts both down on
 * SIGINT/SIGTERM.
 *
 * @module server
 */

import { Redis } from 'ioredis';
import { createApp } from './app.js';
import { buildServices } from './bootstrap.js';
import { getChallengeConfig, getRedisConfig, getServerConfig } from './config.js';
import { createLogger } from './logging/logger.js';
import { closePool } from './utils/db.js';

const serverConfig = getServerConfig();
const redisConfig = getRedisConfig();
const logger = createLogger({ level: serverConfig.logLevel });

const redis = new Redis(redisConfig.url, {
  keyPrefix: redisConfig.keyPrefix,
  maxRetriesPerRequest: 3,
});
redis.on('error', (err: Error) => {
  logger.error('Redis connection error', err);
});

const services = buildServices({
  config: getChallengeConfig(),
  storeDriver: serverConfig.storeDriver,
  redis,
  logger,
});

const app = createApp({ challenges: services.challenges, redis, logger });

const server = app.listen(serverConfig.port, () => {
  logger.info('Server listening', {
    port: serverConfig.port,
    storeDriver: serverConfig.storeDriver,
  });
});

services.housekeeping.start();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('Shutting down', { signal });

  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await services.housekeeping.stop();
  await redis.quit();
  if (serverConfig.storeDriver === 'postgres') await closePool();

  logger.info('Shutdown complete');
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal('Shutdown failed', err);
      process.exitCode = 1;
    });
  });
}
