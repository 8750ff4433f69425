import knex, { Knex } from 'knex';
import { vi } from 'vitest';

export interface RecordedQuery {
  sql: string;
  bindings: unknown[];
}

interface PgQueryConfig {
  text: string;
  values: unknown[];
}

interface PgResult {
  command: string;
  rows: object[];
  rowCount: number;
}

/**
 * A pg-dialect Knex whose connection records every statement instead of
 * sending it. Each statement is answered with the next entry of `responses`
 * (no rows once they run out).
 */
export function createRecordingDb(responses: object[][] = []): { db: Knex; queries: RecordedQuery[] } {
  const db = knex({ client: 'pg' });
  const queries: RecordedQuery[] = [];
  const pending = [...responses];

  const connection = {
    query(config: PgQueryConfig, callback: (err: Error | null, result: PgResult) => void): void {
      queries.push({ sql: config.text, bindings: config.values });
      const rows = pending.shift() ?? [];
      const command = config.text.trimStart().split(' ')[0].toUpperCase();
      callback(null, { command, rows, rowCount: rows.length });
    },
  };

  vi.spyOn(db.client, 'acquireConnection').mockImplementation(async () => connection);
  vi.spyOn(db.client, 'releaseConnection').mockImplementation(async () => undefined);

  return { db, queries };
}
