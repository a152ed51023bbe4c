// Load environment variables from .env file FIRST before any other imports
import { config as loadEnv } from 'dotenv';
loadEnv();

import { createServer } from 'http';
import { loadConfig } from './config';
import { createApp } from './app';
import { log } from './log';
import { AnalyticsCatalog } from './analytics-catalog';
import { AnalyticsCache } from './analytics-cache';
import { MemoryCacheStore, type CacheStore } from './cache-store';
import { RedisCacheStore, createRedisClient } from './redis-cache-store';
import { PgQueryExecutor } from './query-executor';
import { RefreshCoordinator } from './refresh-coordinator';
import { RealtimeCounters } from './realtime-counters';
import { ChangeNotifier } from './change-notifier';
import { DrizzleStorage, createAnalyticsDatabase } from './storage';
import { closeWebSocketServer, setupWebSocket } from './websocket';

const SHUTDOWN_TIMEOUT_MS = 10_000;

async function main(): Promise<void> {
  const config = loadConfig();

  // --------------------------------------------------------------------------
  // Resources: one pool, one cache store, both closed on shutdown
  // --------------------------------------------------------------------------
  const database = createAnalyticsDatabase(config.database);
  const store: CacheStore = config.redisUrl
    ? new RedisCacheStore(createRedisClient(config.redisUrl))
    : new MemoryCacheStore();
  if (!config.redisUrl) {
    log('REDIS_URL not set, using in-process memory cache', 'cache');
  }

  const executor = new PgQueryExecutor(database.db, {
    refreshTimeoutSeconds: config.aggregateRefreshTimeoutSeconds,
  });
  const catalog = new AnalyticsCatalog({ defaultTimeoutSeconds: config.queryTimeoutSeconds });
  const cache = new AnalyticsCache(catalog, store, executor);
  const notifier = new ChangeNotifier();
  const counters = new RealtimeCounters(store);
  const refresh = new RefreshCoordinator(executor, cache, notifier, {
    intervalSeconds: config.refreshIntervalSeconds,
  });

  const app = createApp({
    cache,
    catalog,
    counters,
    refresh,
    cacheBackend: store.name,
    database: executor,
    store,
    queryTimeoutSeconds: config.queryTimeoutSeconds,
    storage: new DrizzleStorage(database.db),
  });
  const server = createServer(app);

  const wss = config.enableRealTimeEvents ? setupWebSocket(server, notifier) : null;

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, '0.0.0.0', () => {
      server.off('error', reject);
      resolve();
    });
  });
  log(`serving on port ${config.port}`);

  refresh.start();

  // --------------------------------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------------------------------
  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down gracefully`);

    const forceExit = setTimeout(() => {
      console.error('[server] Shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await refresh.stop();
      if (wss) {
        await closeWebSocketServer(wss);
      }
      await new Promise<void>((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve()))
      );
      await store.close();
      await database.close();
      log('Server closed');
      process.exit(0);
    } catch (error) {
      console.error('[server] Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', (signal) => void shutdown(signal));
  process.on('SIGINT', (signal) => void shutdown(signal));
}

main().catch((error) => {
  console.error('[server] Failed to start:', error);
  process.exit(1);
});
