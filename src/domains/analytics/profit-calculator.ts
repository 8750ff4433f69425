// ──────────────────────────────────────────
// Analytics: Net profit for one store-day
// ──────────────────────────────────────────

import type { IsoDate, OrderForAnalytics, OtherCost, ProfitBreakdown } from '../../shared/types';
import { daysInMonth, daysInYear } from '../../shared/dates';

export interface TransactionFeeRule {
  rate: number;
  fixedPerOrder: number;
}

export const DEFAULT_TRANSACTION_FEE: TransactionFeeRule = { rate: 0.029, fixedPerOrder: 0.3 };

export interface DayActivity {
  date: IsoDate;
  orders: OrderForAnalytics[];
  adSpend: number;
  otherCosts: OtherCost[];
}

export function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Share of a cost that falls on a single day. */
export function dailyShareOfCost(cost: OtherCost, date: IsoDate): number {
  switch (cost.frequency) {
    case 'one_time':
    case 'daily':
      return cost.amount;
    case 'weekly':
      return cost.amount / 7;
    case 'monthly':
      return cost.amount / daysInMonth(date);
    case 'yearly':
      return cost.amount / daysInYear(date);
  }
}

export function calculateNetProfit(
  day: DayActivity,
  fee: TransactionFeeRule = DEFAULT_TRANSACTION_FEE
): ProfitBreakdown {
  const { orders } = day;

  const grossRevenue = orders.reduce((sum, o) => sum + o.total_price, 0);
  const totalDiscounts = orders.reduce((sum, o) => sum + o.total_discounts, 0);
  // Refunds are not synced yet
  const totalRefunds = 0;
  const netRevenue = grossRevenue - totalRefunds - totalDiscounts;

  const totalCogs = orders.reduce(
    (sum, o) => sum + o.lines.reduce((s, l) => s + l.quantity * l.cost_of_goods_sold, 0),
    0
  );
  const grossProfit = netRevenue - totalCogs;

  const totalShipping = orders.reduce((sum, o) => sum + (o.actual_shipping_cost ?? 0), 0);
  const totalFees = grossRevenue * fee.rate + fee.fixedPerOrder * orders.length;
  const totalOtherCosts = day.otherCosts.reduce((sum, c) => sum + dailyShareOfCost(c, day.date), 0);

  const netProfit = grossProfit - totalShipping - totalFees - day.adSpend - totalOtherCosts;

  return {
    gross_revenue: roundCents(grossRevenue),
    net_revenue: roundCents(netRevenue),
    gross_profit: roundCents(grossProfit),
    net_profit: roundCents(netProfit),
    total_cogs: roundCents(totalCogs),
    total_shipping_cost: roundCents(totalShipping),
    total_transaction_fees: roundCents(totalFees),
    total_ad_spend: roundCents(day.adSpend),
    total_other_costs: roundCents(totalOtherCosts),
    total_refunds: totalRefunds,
    total_discounts: roundCents(totalDiscounts),
  };
}
