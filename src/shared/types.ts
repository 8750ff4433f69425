// ──────────────────────────────────────────
// Shared type definitions
// ──────────────────────────────────────────

/** Calendar date as `YYYY-MM-DD`. */
export type IsoDate = string;

export type Platform = 'shopify';
export type CostFrequency = 'one_time' | 'daily' | 'weekly' | 'monthly' | 'yearly';
export type Granularity = 'daily' | 'weekly' | 'monthly';

export interface Store {
  id: string;
  platform: Platform;
  shop_domain: string;
  is_active: boolean;
  created_at: Date;
}

export interface OrderLine {
  quantity: number;
  cost_of_goods_sold: number;
}

/** A non-cancelled order with the fields the daily aggregation reads. */
export interface OrderForAnalytics {
  id: string;
  total_price: number;
  total_discounts: number;
  actual_shipping_cost: number | null;
  lines: OrderLine[];
}

export interface OtherCost {
  id: string;
  store_id: string;
  category: string;
  description: string | null;
  amount: number;
  start_date: IsoDate;
  end_date: IsoDate | null;
  frequency: CostFrequency;
}

export interface ProfitBreakdown {
  gross_revenue: number;
  net_revenue: number;
  gross_profit: number;
  net_profit: number;
  total_cogs: number;
  total_shipping_cost: number;
  total_transaction_fees: number;
  total_ad_spend: number;
  total_other_costs: number;
  total_refunds: number;
  total_discounts: number;
}

/** Profit breakdown summed over an inclusive date range. */
export interface NetProfitReport extends ProfitBreakdown {
  start_date: IsoDate;
  end_date: IsoDate;
}

export interface PnlReportItem {
  category: string;
  amount: number;
  /** Share of net revenue, in percent. */
  percentage: number;
}

export interface PnlReport {
  start_date: IsoDate;
  end_date: IsoDate;
  revenue: PnlReportItem;
  cogs: PnlReportItem;
  gross_profit: PnlReportItem;
  expenses: PnlReportItem[];
  net_profit: PnlReportItem;
}

/** One precomputed metrics record per store and day. */
export interface DailySalesAnalytics {
  store_id: string;
  date: IsoDate;
  total_sales: number;
  total_orders: number;
  average_order_value: number;
  profit: number;
}

export interface DailySalesAnalyticsRow extends DailySalesAnalytics {
  id: string;
  computed_at: Date;
}

export interface DateFailure {
  date: IsoDate;
  error: string;
}

export interface RangeReport {
  runId: string;
  results: DailySalesAnalytics[];
  failures: DateFailure[];
}

export interface AnalyticsSummary {
  start_date: IsoDate;
  end_date: IsoDate;
  total_sales: number;
  total_orders: number;
  average_order_value: number;
  total_profit: number;
  daily_analytics: DailySalesAnalytics[];
}

export interface TimeSeriesPoint {
  period: string;
  total_sales: number;
  total_orders: number;
  average_order_value: number;
  profit: number;
}
