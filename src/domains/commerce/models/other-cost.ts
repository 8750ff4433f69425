// ──────────────────────────────────────────
// Commerce: Other (operating) cost model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import type { CostFrequency, IsoDate, OtherCost } from '../../../shared/types';

interface OtherCostRow {
  id: string;
  store_id: string;
  category: string;
  description: string | null;
  amount: string | number;
  start_date: IsoDate;
  end_date: IsoDate | null;
  frequency: CostFrequency;
}

export class OtherCostModel {
  constructor(private db: Knex) {}

  /** One-time costs dated on `date` plus recurring costs active on it. */
  async getApplicable(storeId: string, date: IsoDate): Promise<OtherCost[]> {
    const rows: OtherCostRow[] = await this.db('other_costs')
      .where('store_id', storeId)
      .where((q) => {
        q.where((oneTime) => oneTime.where('frequency', 'one_time').where('start_date', date)).orWhere(
          (recurring) =>
            recurring
              .whereNot('frequency', 'one_time')
              .where('start_date', '<=', date)
              .where((open) => open.whereNull('end_date').orWhere('end_date', '>=', date))
        );
      })
      .select('*');

    return rows.map((r) => ({ ...r, amount: Number(r.amount) }));
  }
}
