// ──────────────────────────────────────────
// Commerce: Ad spend model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import type { IsoDate } from '../../../shared/types';

export class AdSpendModel {
  constructor(private db: Knex) {}

  async getTotalForDay(storeId: string, date: IsoDate): Promise<number> {
    const rows: { spend: string | number }[] = await this.db('ad_spends')
      .where('store_id', storeId)
      .where('date', date)
      .select('spend');
    return rows.reduce((sum, r) => sum + Number(r.spend), 0);
  }
}
