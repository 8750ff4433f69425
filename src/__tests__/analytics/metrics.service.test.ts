import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsService } from '../../domains/analytics/metrics.service';
import { ValidationError } from '../../shared/errors';
import type { OtherCost } from '../../shared/types';
import { InMemoryAnalyticsStore, InMemoryCommerce, OTHER_STORE_ID, STORE_ID, makeOrder } from '../fixtures';

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(() => {
    const analyticsStore = new InMemoryAnalyticsStore().seed([
      { store_id: STORE_ID, date: '2024-01-01', total_sales: 100, total_orders: 4, average_order_value: 25, profit: 30 },
      { store_id: STORE_ID, date: '2024-01-02', total_sales: 50, total_orders: 1, average_order_value: 50, profit: 10 },
      { store_id: STORE_ID, date: '2024-01-08', total_sales: 30, total_orders: 3, average_order_value: 10, profit: -5 },
      { store_id: OTHER_STORE_ID, date: '2024-01-01', total_sales: 999, total_orders: 9, average_order_value: 111, profit: 1 },
    ]);
    service = new MetricsService(analyticsStore, new InMemoryCommerce());
  });

  it('returns stored rows for an inclusive range without storage fields', async () => {
    const rows = await service.getDailyAnalytics(STORE_ID, '2024-01-02', '2024-01-08');

    expect(rows).toEqual([
      { store_id: STORE_ID, date: '2024-01-02', total_sales: 50, total_orders: 1, average_order_value: 50, profit: 10 },
      { store_id: STORE_ID, date: '2024-01-08', total_sales: 30, total_orders: 3, average_order_value: 10, profit: -5 },
    ]);
  });

  it('summarises a range from totals', async () => {
    const summary = await service.getSummary(STORE_ID, '2024-01-01', '2024-01-31');

    expect(summary.start_date).toBe('2024-01-01');
    expect(summary.end_date).toBe('2024-01-31');
    expect(summary.total_sales).toBe(180);
    expect(summary.total_orders).toBe(8);
    expect(summary.average_order_value).toBe(22.5);
    expect(summary.total_profit).toBe(35);
    expect(summary.daily_analytics.map((d) => d.date)).toEqual(['2024-01-01', '2024-01-02', '2024-01-08']);
  });

  it('summarises an empty range as zeros', async () => {
    const summary = await service.getSummary(STORE_ID, '2024-01-03', '2024-01-07');

    expect(summary).toEqual({
      start_date: '2024-01-03',
      end_date: '2024-01-07',
      total_sales: 0,
      total_orders: 0,
      average_order_value: 0,
      total_profit: 0,
      daily_analytics: [],
    });
  });

  it('buckets the time series by ISO week', async () => {
    const series = await service.getTimeSeries(STORE_ID, '2024-01-01', '2024-01-31', 'weekly');

    expect(series).toEqual([
      { period: '2024-01-01', total_sales: 150, total_orders: 5, average_order_value: 30, profit: 40 },
      { period: '2024-01-08', total_sales: 30, total_orders: 3, average_order_value: 10, profit: -5 },
    ]);
  });

  it('buckets the time series by month', async () => {
    const series = await service.getTimeSeries(STORE_ID, '2024-01-01', '2024-01-31', 'monthly');

    expect(series).toEqual([
      { period: '2024-01', total_sales: 180, total_orders: 8, average_order_value: 22.5, profit: 35 },
    ]);
  });

  it('keeps one point per day for daily granularity', async () => {
    const series = await service.getTimeSeries(STORE_ID, '2024-01-01', '2024-01-31', 'daily');

    expect(series.map((p) => p.period)).toEqual(['2024-01-01', '2024-01-02', '2024-01-08']);
  });

  it('rejects a range whose start is after its end', async () => {
    await expect(service.getSummary(STORE_ID, '2024-02-01', '2024-01-01')).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('MetricsService profit reports', () => {
  const monthlyRent: OtherCost = {
    id: 'cost-rent',
    store_id: STORE_ID,
    category: 'rent',
    description: null,
    amount: 310,
    start_date: '2024-01-01',
    end_date: null,
    frequency: 'monthly',
  };
  const packaging: OtherCost = { ...monthlyRent, id: 'cost-pack', category: 'packaging', amount: 7, frequency: 'one_time' };

  let service: MetricsService;

  beforeEach(() => {
    const commerce = new InMemoryCommerce()
      .addOrders(STORE_ID, '2024-03-10', [
        makeOrder(100, { total_discounts: 10, actual_shipping_cost: 5, lines: [{ quantity: 2, cost_of_goods_sold: 15 }] }),
        makeOrder(50, { lines: [{ quantity: 1, cost_of_goods_sold: 20 }] }),
      ])
      .setAdSpend(STORE_ID, '2024-03-10', 12.5)
      .addOtherCost(STORE_ID, '2024-03-10', monthlyRent)
      .addOtherCost(STORE_ID, '2024-03-10', packaging)
      .addOrders(STORE_ID, '2024-03-11', [makeOrder(40)])
      .addOrders(STORE_ID, '2024-03-13', [makeOrder(999)])
      .setAdSpend(STORE_ID, '2024-04-01', 20);
    service = new MetricsService(new InMemoryAnalyticsStore(), commerce);
  });

  it('sums the daily breakdowns over an inclusive range', async () => {
    const report = await service.getNetProfit(STORE_ID, '2024-03-10', '2024-03-12');

    expect(report).toEqual({
      start_date: '2024-03-10',
      end_date: '2024-03-12',
      gross_revenue: 190,
      net_revenue: 180,
      gross_profit: 130,
      // 50.55 + (40 - 1.16 - 0.30)
      net_profit: 89.09,
      total_cogs: 50,
      total_shipping_cost: 5,
      total_transaction_fees: 6.41,
      total_ad_spend: 12.5,
      total_other_costs: 17,
      total_refunds: 0,
      total_discounts: 10,
    });
  });

  it('builds a profit and loss statement relative to net revenue', async () => {
    const pnl = await service.getProfitAndLoss(STORE_ID, '2024-03-10', '2024-03-12');

    expect(pnl).toEqual({
      start_date: '2024-03-10',
      end_date: '2024-03-12',
      revenue: { category: 'Revenue', amount: 180, percentage: 100 },
      cogs: { category: 'Cost of Goods Sold', amount: 50, percentage: 27.78 },
      gross_profit: { category: 'Gross Profit', amount: 130, percentage: 72.22 },
      expenses: [
        { category: 'Shipping Costs', amount: 5, percentage: 2.78 },
        { category: 'Transaction Fees', amount: 6.41, percentage: 3.56 },
        { category: 'Advertising', amount: 12.5, percentage: 6.94 },
        { category: 'Other Costs', amount: 17, percentage: 9.44 },
      ],
      net_profit: { category: 'Net Profit', amount: 89.09, percentage: 49.49 },
    });
  });

  it('reports costs against a unit base when there is no revenue', async () => {
    const pnl = await service.getProfitAndLoss(STORE_ID, '2024-04-01', '2024-04-01');

    expect(pnl.expenses[2]).toEqual({ category: 'Advertising', amount: 20, percentage: 2000 });
    expect(pnl.net_profit).toEqual({ category: 'Net Profit', amount: -20, percentage: -2000 });
  });

  it('rejects an inverted range', async () => {
    await expect(service.getNetProfit(STORE_ID, '2024-03-12', '2024-03-10')).rejects.toThrow(
      'start 2024-03-12 is after end 2024-03-10'
    );
  });
});
