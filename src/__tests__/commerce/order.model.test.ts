import { describe, it, expect, afterEach, vi } from 'vitest';
import { OrderModel } from '../../domains/commerce/models/order';
import { createRecordingDb } from '../fixtures/knex';
import { STORE_ID } from '../fixtures';

describe('OrderModel', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getForDay', () => {
    it('selects non-cancelled orders inside the half-open UTC day', async () => {
      const { db, queries } = createRecordingDb();

      const orders = await new OrderModel(db).getForDay(STORE_ID, '2024-01-01');

      expect(orders).toEqual([]);
      expect(queries).toEqual([
        {
          sql:
            'select "id", "total_price", "total_discounts", "actual_shipping_cost" from "orders" ' +
            'where "store_id" = $1 and "cancelled_at" is null ' +
            'and "platform_created_at" >= $2 and "platform_created_at" < $3 ' +
            'order by "platform_created_at" asc',
          bindings: [STORE_ID, new Date('2024-01-01T00:00:00.000Z'), new Date('2024-01-02T00:00:00.000Z')],
        },
      ]);
    });

    it('joins line items to the store\'s variant costs and converts numerics', async () => {
      const { db, queries } = createRecordingDb([
        [
          { id: 'o-1', total_price: '100.00', total_discounts: '10.00', actual_shipping_cost: '4.50' },
          { id: 'o-2', total_price: '25.00', total_discounts: '0.00', actual_shipping_cost: null },
        ],
        [
          { order_id: 'o-1', quantity: 2, cost_of_goods_sold: '15.00' },
          { order_id: 'o-1', quantity: 1, cost_of_goods_sold: null },
        ],
      ]);

      const orders = await new OrderModel(db).getForDay(STORE_ID, '2024-01-01');

      expect(queries[1]).toEqual({
        sql:
          'select "li"."order_id", "li"."quantity", "pv"."cost_of_goods_sold" from "line_items" as "li" ' +
          'left join "product_variants" as "pv" on "pv"."platform_variant_id" = "li"."platform_variant_id" ' +
          'and "pv"."store_id" = $1 where "li"."order_id" in ($2, $3)',
        bindings: [STORE_ID, 'o-1', 'o-2'],
      });
      expect(orders).toEqual([
        {
          id: 'o-1',
          total_price: 100,
          total_discounts: 10,
          actual_shipping_cost: 4.5,
          lines: [
            { quantity: 2, cost_of_goods_sold: 15 },
            { quantity: 1, cost_of_goods_sold: 0 },
          ],
        },
        { id: 'o-2', total_price: 25, total_discounts: 0, actual_shipping_cost: null, lines: [] },
      ]);
    });
  });

  describe('getOrderDates', () => {
    it('lists distinct UTC days of non-cancelled orders in ascending order', async () => {
      const { db, queries } = createRecordingDb([[{ day: '2024-01-01' }, { day: '2024-01-03' }]]);

      const dates = await new OrderModel(db).getOrderDates(STORE_ID);

      expect(dates).toEqual(['2024-01-01', '2024-01-03']);
      expect(queries).toEqual([
        {
          sql:
            "select distinct to_char(platform_created_at AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day from \"orders\" " +
            'where "store_id" = $1 and "cancelled_at" is null order by "day" asc',
          bindings: [STORE_ID],
        },
      ]);
    });
  });
});
