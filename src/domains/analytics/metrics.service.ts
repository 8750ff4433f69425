// ──────────────────────────────────────────
// Analytics: Metrics service (read side)
// ──────────────────────────────────────────

import type { CommerceContract, DailySalesAnalyticsStore } from '../../shared/contracts';
import type {
  AnalyticsSummary,
  DailySalesAnalytics,
  Granularity,
  IsoDate,
  NetProfitReport,
  PnlReport,
  PnlReportItem,
  ProfitBreakdown,
  TimeSeriesPoint,
} from '../../shared/types';
import { ValidationError } from '../../shared/errors';
import { addDays, assertIsoDate, eachDay, weekStart } from '../../shared/dates';
import { calculateNetProfit, roundCents, DEFAULT_TRANSACTION_FEE, type TransactionFeeRule } from './profit-calculator';

export class MetricsService {
  private transactionFee: TransactionFeeRule;

  constructor(
    private analyticsStore: DailySalesAnalyticsStore,
    private commerce: CommerceContract,
    options: { transactionFee?: TransactionFeeRule } = {}
  ) {
    this.transactionFee = options.transactionFee ?? DEFAULT_TRANSACTION_FEE;
  }

  async getDailyAnalytics(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<DailySalesAnalytics[]> {
    assertRange(startDate, endDate);
    const rows = await this.analyticsStore.getByDateRange(storeId, startDate, endDate);
    return rows.map(toAnalytics);
  }

  async getSummary(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<AnalyticsSummary> {
    const daily = await this.getDailyAnalytics(storeId, startDate, endDate);
    const rolled = rollup(daily);

    return {
      start_date: startDate,
      end_date: endDate,
      total_sales: rolled.total_sales,
      total_orders: rolled.total_orders,
      average_order_value: rolled.average_order_value,
      total_profit: rolled.profit,
      daily_analytics: daily,
    };
  }

  async getTimeSeries(
    storeId: string,
    startDate: IsoDate,
    endDate: IsoDate,
    granularity: Granularity
  ): Promise<TimeSeriesPoint[]> {
    const daily = await this.getDailyAnalytics(storeId, startDate, endDate);

    const buckets = new Map<string, DailySalesAnalytics[]>();
    for (const row of daily) {
      const key = bucketKey(row.date, granularity);
      const bucket = buckets.get(key) ?? [];
      bucket.push(row);
      buckets.set(key, bucket);
    }

    return Array.from(buckets.entries())
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([period, rows]) => ({ period, ...rollup(rows) }));
  }

  /**
   * Full profit breakdown over `[startDate, endDate]`, calculated from the
   * order data rather than the stored rows.
   */
  async getNetProfit(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<NetProfitReport> {
    assertRange(startDate, endDate);

    let totals = emptyBreakdown();
    for (const date of eachDay(startDate, addDays(endDate, 1))) {
      const [orders, adSpend, otherCosts] = await Promise.all([
        this.commerce.getOrdersForDay(storeId, date),
        this.commerce.getAdSpendForDay(storeId, date),
        this.commerce.getOtherCostsForDay(storeId, date),
      ]);
      totals = addBreakdowns(totals, calculateNetProfit({ date, orders, adSpend, otherCosts }, this.transactionFee));
    }

    return { start_date: startDate, end_date: endDate, ...totals };
  }

  /** Profit and loss statement; percentages are relative to net revenue. */
  async getProfitAndLoss(storeId: string, startDate: IsoDate, endDate: IsoDate): Promise<PnlReport> {
    const p = await this.getNetProfit(storeId, startDate, endDate);
    const base = p.net_revenue > 0 ? p.net_revenue : 1;
    const item = (category: string, amount: number): PnlReportItem => ({
      category,
      amount,
      percentage: roundCents((amount / base) * 100),
    });

    return {
      start_date: startDate,
      end_date: endDate,
      revenue: { category: 'Revenue', amount: p.net_revenue, percentage: 100 },
      cogs: item('Cost of Goods Sold', p.total_cogs),
      gross_profit: item('Gross Profit', p.gross_profit),
      expenses: [
        item('Shipping Costs', p.total_shipping_cost),
        item('Transaction Fees', p.total_transaction_fees),
        item('Advertising', p.total_ad_spend),
        item('Other Costs', p.total_other_costs),
      ],
      net_profit: item('Net Profit', p.net_profit),
    };
  }
}

// ── Helpers ──

function assertRange(startDate: IsoDate, endDate: IsoDate): void {
  assertIsoDate(startDate, 'start');
  assertIsoDate(endDate, 'end');
  if (startDate > endDate) {
    throw new ValidationError(`start ${startDate} is after end ${endDate}`);
  }
}

function toAnalytics(row: DailySalesAnalytics): DailySalesAnalytics {
  return {
    store_id: row.store_id,
    date: row.date,
    total_sales: row.total_sales,
    total_orders: row.total_orders,
    average_order_value: row.average_order_value,
    profit: row.profit,
  };
}

function rollup(rows: DailySalesAnalytics[]): Omit<TimeSeriesPoint, 'period'> {
  const totalSales = rows.reduce((s, r) => s + r.total_sales, 0);
  const totalOrders = rows.reduce((s, r) => s + r.total_orders, 0);
  const profit = rows.reduce((s, r) => s + r.profit, 0);

  // Derived from totals — never averaged from daily values
  const averageOrderValue = totalOrders > 0 ? totalSales / totalOrders : 0;

  return {
    total_sales: roundCents(totalSales),
    total_orders: totalOrders,
    average_order_value: roundCents(averageOrderValue),
    profit: roundCents(profit),
  };
}

function emptyBreakdown(): ProfitBreakdown {
  return {
    gross_revenue: 0,
    net_revenue: 0,
    gross_profit: 0,
    net_profit: 0,
    total_cogs: 0,
    total_shipping_cost: 0,
    total_transaction_fees: 0,
    total_ad_spend: 0,
    total_other_costs: 0,
    total_refunds: 0,
    total_discounts: 0,
  };
}

function addBreakdowns(a: ProfitBreakdown, b: ProfitBreakdown): ProfitBreakdown {
  return {
    gross_revenue: roundCents(a.gross_revenue + b.gross_revenue),
    net_revenue: roundCents(a.net_revenue + b.net_revenue),
    gross_profit: roundCents(a.gross_profit + b.gross_profit),
    net_profit: roundCents(a.net_profit + b.net_profit),
    total_cogs: roundCents(a.total_cogs + b.total_cogs),
    total_shipping_cost: roundCents(a.total_shipping_cost + b.total_shipping_cost),
    total_transaction_fees: roundCents(a.total_transaction_fees + b.total_transaction_fees),
    total_ad_spend: roundCents(a.total_ad_spend + b.total_ad_spend),
    total_other_costs: roundCents(a.total_other_costs + b.total_other_costs),
    total_refunds: roundCents(a.total_refunds + b.total_refunds),
    total_discounts: roundCents(a.total_discounts + b.total_discounts),
  };
}

function bucketKey(date: IsoDate, granularity: Granularity): string {
  switch (granularity) {
    case 'daily':
      return date;
    case 'weekly':
      return weekStart(date);
    case 'monthly':
      return date.slice(0, 7);
  }
}
