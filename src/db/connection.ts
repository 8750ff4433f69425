// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import { types } from 'pg';
import { getConfig } from '../config';

// DATE columns stay as YYYY-MM-DD strings instead of local-midnight Dates
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | undefined;

export function getDb(): Knex {
  if (!db) {
    const config = getConfig();
    db = knex({
      client: 'pg',
      connection: config.DATABASE_URL,
      pool: { min: config.DB_POOL_MIN, max: config.DB_POOL_MAX },
    });
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = undefined;
  }
}
