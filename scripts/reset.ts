// ──────────────────────────────────────────
// Script: Reset — drop all tables and re-run migrations
// ──────────────────────────────────────────

import path from 'path';
import { getDb, closeDb } from '../src/db/connection';
import { errorMessage } from '../src/shared/errors';

async function reset() {
  const db = getDb();
  console.log('[Reset] Dropping all tables...');

  // Drop in reverse FK order
  await db.raw('DROP TABLE IF EXISTS daily_sales_analytics CASCADE');
  await db.raw('DROP TABLE IF EXISTS other_costs CASCADE');
  await db.raw('DROP TABLE IF EXISTS ad_spends CASCADE');
  await db.raw('DROP TABLE IF EXISTS line_items CASCADE');
  await db.raw('DROP TABLE IF EXISTS orders CASCADE');
  await db.raw('DROP TABLE IF EXISTS product_variants CASCADE');
  await db.raw('DROP TABLE IF EXISTS stores CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations CASCADE');
  await db.raw('DROP TABLE IF EXISTS knex_migrations_lock CASCADE');

  console.log('[Reset] Running migrations...');
  await db.migrate.latest({
    directory: path.resolve(__dirname, '../src/db/migrations'),
    loadExtensions: ['.ts'],
  });

  console.log('[Reset] ✅ Done — all tables recreated');
  await closeDb();
}

reset().catch((err: unknown) => {
  console.error('[Reset] Error:', errorMessage(err));
  process.exit(1);
});
