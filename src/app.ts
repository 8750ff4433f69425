// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────

import { getConfig } from './config';
import { getDb, closeDb } from './db/connection';
import { errorMessage } from './shared/errors';

// Platform
import { StoreRepo } from './platform/store';

// Commerce
import { OrderModel, AdSpendModel, OtherCostModel, CommerceReader } from './domains/commerce';

// Analytics
import { DailySalesAnalyticsRepo, AggregationJob, MetricsService } from './domains/analytics';

import { createHttpApp } from './http';
import { Runtime } from './runtime';

async function main() {
  const config = getConfig();
  const db = getDb();

  await db.migrate.latest({
    directory: __dirname + '/db/migrations',
    loadExtensions: [__filename.endsWith('.ts') ? '.ts' : '.js'],
  });

  // ── Platform ──
  const storeRepo = new StoreRepo(db);

  // ── Commerce ──
  const commerce = new CommerceReader(new OrderModel(db), new AdSpendModel(db), new OtherCostModel(db));

  // ── Analytics ──
  const analyticsRepo = new DailySalesAnalyticsRepo(db);
  const aggregationJob = new AggregationJob(commerce, analyticsRepo, storeRepo, {
    maxAttempts: config.AGGREGATION_MAX_ATTEMPTS,
  });
  const metricsService = new MetricsService(analyticsRepo, commerce);

  // ── Runtime ──
  const runtime = new Runtime(aggregationJob, config.AGGREGATION_INTERVAL_MS);

  const app = createHttpApp({ stores: storeRepo, metricsService, aggregationJob });

  runtime.start();
  const server = app.listen(config.PORT, () => {
    console.log(`[App] Daily sales analytics listening on port ${config.PORT}`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close();
    await closeDb();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      console.error('[App] Shutdown failed:', errorMessage(err));
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  console.error('[App] Fatal error:', errorMessage(err));
  process.exit(1);
});
