// ──────────────────────────────────────────
// Analytics: Daily aggregation job
// ──────────────────────────────────────────

import { v4 as uuidv4 } from 'uuid';
import type { CommerceContract, DailySalesAnalyticsStore } from '../../shared/contracts';
import type { DailySalesAnalytics, DateFailure, IsoDate, RangeReport } from '../../shared/types';
import type { StoreLookup } from '../../platform/store';
import { ValidationError, errorMessage } from '../../shared/errors';
import { addDays, assertIsoDate, eachDay, today } from '../../shared/dates';
import { calculateNetProfit, roundCents, DEFAULT_TRANSACTION_FEE, type TransactionFeeRule } from './profit-calculator';

export interface AggregationOptions {
  /** Attempts per date before it is reported as failed. */
  maxAttempts?: number;
  transactionFee?: TransactionFeeRule;
  today?: () => IsoDate;
}

export class AggregationJob {
  private maxAttempts: number;
  private transactionFee: TransactionFeeRule;
  private today: () => IsoDate;

  constructor(
    private commerce: CommerceContract,
    private analyticsStore: DailySalesAnalyticsStore,
    private stores: StoreLookup,
    options: AggregationOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 2);
    this.transactionFee = options.transactionFee ?? DEFAULT_TRANSACTION_FEE;
    this.today = options.today ?? today;
  }

  /** Refreshes yesterday and today for every active store. */
  async run(): Promise<void> {
    const stores = await this.stores.findActive();
    const current = this.today();
    const dates = [addDays(current, -1), current];

    for (const store of stores) {
      const report = await this.computeDates(store.id, dates, uuidv4());
      if (report.failures.length > 0) {
        console.error(`[Aggregation] Store ${store.id}: ${report.failures.length} date(s) failed`);
      }
    }
  }

  /** Aggregates one store-day and upserts its summary row. */
  async compute(storeId: string, date: IsoDate): Promise<DailySalesAnalytics> {
    assertIsoDate(date);

    const [orders, adSpend, otherCosts] = await Promise.all([
      this.commerce.getOrdersForDay(storeId, date),
      this.commerce.getAdSpendForDay(storeId, date),
      this.commerce.getOtherCostsForDay(storeId, date),
    ]);

    const totalSales = orders.reduce((sum, o) => sum + o.total_price, 0);
    const totalOrders = orders.length;
    const averageOrderValue = totalOrders > 0 ? totalSales / totalOrders : 0;
    const profit = calculateNetProfit({ date, orders, adSpend, otherCosts }, this.transactionFee);

    const analytics: DailySalesAnalytics = {
      store_id: storeId,
      date,
      total_sales: roundCents(totalSales),
      total_orders: totalOrders,
      average_order_value: roundCents(averageOrderValue),
      profit: profit.net_profit,
    };

    await this.analyticsStore.upsert(analytics);
    return analytics;
  }

  /** Computes every date in `[startDate, endDate)`; one failing date never stops the rest. */
  async computeRange(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<RangeReport> {
    assertIsoDate(startDate, 'start_date');
    assertIsoDate(endDate, 'end_date');
    if (startDate > endDate) {
      throw new ValidationError(`start_date ${startDate} is after end_date ${endDate}`);
    }

    return this.computeDates(storeId, eachDay(startDate, endDate), uuidv4());
  }

  /** Rebuilds every date on which the store has orders. */
  async computeAllForStore(storeId: string): Promise<RangeReport> {
    const dates = await this.commerce.getOrderDates(storeId);
    return this.computeDates(storeId, dates, uuidv4());
  }

  private async computeDates(storeId: string, dates: IsoDate[], runId: string): Promise<RangeReport> {
    const results: DailySalesAnalytics[] = [];
    const failures: DateFailure[] = [];

    for (const date of dates) {
      let lastError: unknown;
      let done = false;

      for (let attempt = 1; attempt <= this.maxAttempts && !done; attempt++) {
        try {
          results.push(await this.compute(storeId, date));
          done = true;
        } catch (err) {
          lastError = err;
          console.error(
            `[Aggregation] run=${runId} store=${storeId} date=${date} attempt ${attempt}/${this.maxAttempts} failed:`,
            errorMessage(err)
          );
        }
      }

      if (!done) {
        failures.push({ date, error: errorMessage(lastError) });
      }
    }

    console.log(
      `[Aggregation] run=${runId} store=${storeId}: ${results.length} day(s) computed, ${failures.length} failed`
    );
    return { runId, results, failures };
  }
}
