// ──────────────────────────────────────────
// Commerce: Order model repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import type { IsoDate, OrderForAnalytics, OrderLine } from '../../../shared/types';
import { dayBounds } from '../../../shared/dates';

interface OrderRow {
  id: string;
  total_price: string | number;
  total_discounts: string | number;
  actual_shipping_cost: string | number | null;
}

interface LineRow {
  order_id: string;
  quantity: number;
  cost_of_goods_sold: string | number | null;
}

export class OrderModel {
  constructor(private db: Knex) {}

  /**
   * Non-cancelled orders created within the UTC day, each with its line items
   * priced at the variant's cost of goods (0 when unknown).
   */
  async getForDay(storeId: string, date: IsoDate): Promise<OrderForAnalytics[]> {
    const { start, end } = dayBounds(date);

    const orders: OrderRow[] = await this.db('orders')
      .select('id', 'total_price', 'total_discounts', 'actual_shipping_cost')
      .where('store_id', storeId)
      .whereNull('cancelled_at')
      .where('platform_created_at', '>=', start)
      .where('platform_created_at', '<', end)
      .orderBy('platform_created_at', 'asc');

    if (orders.length === 0) return [];

    const lines: LineRow[] = await this.db('line_items as li')
      .leftJoin('product_variants as pv', function () {
        this.on('pv.platform_variant_id', '=', 'li.platform_variant_id').andOnVal('pv.store_id', '=', storeId);
      })
      .whereIn(
        'li.order_id',
        orders.map((o) => o.id)
      )
      .select('li.order_id', 'li.quantity', 'pv.cost_of_goods_sold');

    const linesByOrder = new Map<string, OrderLine[]>();
    for (const line of lines) {
      const bucket = linesByOrder.get(line.order_id) ?? [];
      bucket.push({
        quantity: Number(line.quantity),
        cost_of_goods_sold: Number(line.cost_of_goods_sold ?? 0),
      });
      linesByOrder.set(line.order_id, bucket);
    }

    return orders.map((o) => ({
      id: o.id,
      total_price: Number(o.total_price),
      total_discounts: Number(o.total_discounts),
      actual_shipping_cost: o.actual_shipping_cost === null ? null : Number(o.actual_shipping_cost),
      lines: linesByOrder.get(o.id) ?? [],
    }));
  }

  /** Distinct UTC calendar dates that have at least one non-cancelled order. */
  async getOrderDates(storeId: string): Promise<IsoDate[]> {
    const rows: { day: string }[] = await this.db('orders')
      .where('store_id', storeId)
      .whereNull('cancelled_at')
      .distinct(this.db.raw(`to_char(platform_created_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day`))
      .orderBy('day', 'asc');
    return rows.map((r) => r.day);
  }
}
