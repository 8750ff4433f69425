// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import type { DailySalesAnalytics, DailySalesAnalyticsRow, IsoDate, OrderForAnalytics, OtherCost } from './types';

/**
 * Commerce contract — exposed to the Analytics domain.
 * Analytics reads one store's day of activity through it.
 */
export interface CommerceContract {
  getOrdersForDay(storeId: string, date: IsoDate): Promise<OrderForAnalytics[]>;
  getAdSpendForDay(storeId: string, date: IsoDate): Promise<number>;
  getOtherCostsForDay(storeId: string, date: IsoDate): Promise<OtherCost[]>;
  getOrderDates(storeId: string): Promise<IsoDate[]>;
}

/**
 * Summary storage — one row per (store, date).
 */
export interface DailySalesAnalyticsStore {
  upsert(analytics: DailySalesAnalytics): Promise<void>;
  getByDateRange(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<DailySalesAnalyticsRow[]>;
}
