// ──────────────────────────────────────────
// Analytics: Daily sales analytics repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import type { DailySalesAnalyticsStore } from '../../shared/contracts';
import type { DailySalesAnalytics, DailySalesAnalyticsRow, IsoDate } from '../../shared/types';

interface StoredRow {
  id: string;
  store_id: string;
  date: IsoDate;
  total_sales: string | number;
  total_orders: string | number;
  average_order_value: string | number;
  profit: string | number;
  computed_at: Date;
}

export class DailySalesAnalyticsRepo implements DailySalesAnalyticsStore {
  constructor(private db: Knex) {}

  async upsert(analytics: DailySalesAnalytics): Promise<void> {
    await this.db('daily_sales_analytics')
      .insert({ ...analytics, computed_at: new Date() })
      .onConflict(['store_id', 'date'])
      .merge(['total_sales', 'total_orders', 'average_order_value', 'profit', 'computed_at']);
  }

  async getByDateRange(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<DailySalesAnalyticsRow[]> {
    const rows: StoredRow[] = await this.db('daily_sales_analytics')
      .where('store_id', storeId)
      .whereBetween('date', [startDate, endDate])
      .orderBy('date', 'asc');
    return rows.map(toAnalyticsRow);
  }
}

function toAnalyticsRow(row: StoredRow): DailySalesAnalyticsRow {
  return {
    id: row.id,
    store_id: row.store_id,
    date: row.date,
    total_sales: Number(row.total_sales),
    total_orders: Number(row.total_orders),
    average_order_value: Number(row.average_order_value),
    profit: Number(row.profit),
    computed_at: row.computed_at,
  };
}
