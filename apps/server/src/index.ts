import { createApp } from './app.js';
import { initLogger, logger } from './lib/logger.js';
import { loadProjectRegistry } from './services/registry/project-registry.js';
import { RedisQueueStore } from './services/queue/redis-queue-store.js';
import { Dispatcher } from './services/dispatch/dispatcher.js';
import { QueueConsumer } from './services/queue/queue-consumer.js';
import { ShutdownCoordinator } from './services/lifecycle/shutdown-coordinator.js';
import { HTTP_TIMEOUTS } from './config/constants.js';
import { env } from './env.js';

async function start() {
  initLogger({ level: env.LOG_LEVEL, file: env.LOG_FILE });
  logger.info('Starting relay service...');

  const registry = await loadProjectRegistry(env.CONFIG_FILE);

  const store = new RedisQueueStore({
    addr: env.REDIS_ADDR,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
  });
  await store.ping();
  logger.info(`[Redis] Connected to Redis at ${env.REDIS_ADDR}`);

  const dispatcher = new Dispatcher(registry, store, {
    defaultTargetQueue: env.TARGET_QUEUE,
  });
  const consumer = new QueueConsumer(store, dispatcher, {
    sourceQueue: env.SOURCE_LIST,
    pollTimeoutMs: env.POLL_TIMEOUT_MS,
    errorBackoffMs: env.ERROR_BACKOFF_MS,
  });

  const app = createApp({
    dispatcher,
    registry,
    consumer,
    sourceQueue: env.SOURCE_LIST,
    defaultTargetQueue: env.TARGET_QUEUE,
  });

  const server = app.listen(env.PORT, env.HOST, () => {
    logger.info(`Relay HTTP server listening on http://${env.HOST}:${env.PORT}`);
  });
  server.requestTimeout = HTTP_TIMEOUTS.REQUEST_MS;
  server.headersTimeout = HTTP_TIMEOUTS.HEADERS_MS;
  server.on('error', (err) => {
    logger.fatal('HTTP server error:', err);
    process.exit(1);
  });

  new ShutdownCoordinator({ server, consumer, store }, { graceMs: env.SHUTDOWN_GRACE_MS }).install();

  consumer.start();
}

start().catch((err) => {
  logger.fatal('Failed to start relay service:', err);
  process.exit(1);
});
