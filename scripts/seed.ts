// ──────────────────────────────────────────
// Script: Seed — create a demo store with 60 days of orders,
// product costs, ad spend and operating costs, then backfill analytics
// ──────────────────────────────────────────

import path from 'path';
import { faker } from '@faker-js/faker';
import { getDb, closeDb } from '../src/db/connection';
import { StoreRepo } from '../src/platform/store';
import { CommerceReader, OrderModel, AdSpendModel, OtherCostModel } from '../src/domains/commerce';
import { AggregationJob, DailySalesAnalyticsRepo } from '../src/domains/analytics';
import { addDays, startOfDay, today } from '../src/shared/dates';
import { errorMessage } from '../src/shared/errors';

const DAYS = 60;

const catalog = [
  { variant: 'v-tee', sku: 'TEE-001', title: 'Classic Tee', price: 29.99, cogs: 9.5 },
  { variant: 'v-hoodie', sku: 'HOD-001', title: 'Pullover Hoodie', price: 59.99, cogs: 21 },
  { variant: 'v-cap', sku: 'CAP-001', title: 'Snapback Cap', price: 24.99, cogs: 6.25 },
  { variant: 'v-jacket', sku: 'JKT-001', title: 'Bomber Jacket', price: 89.99, cogs: 38 },
  { variant: 'v-tote', sku: 'BAG-001', title: 'Tote Bag', price: 34.99, cogs: 8 },
];

async function seed() {
  const db = getDb();
  console.log('[Seed] Starting...');

  console.log('[Seed] Running migrations...');
  await db.migrate.latest({
    directory: path.resolve(__dirname, '../src/db/migrations'),
    loadExtensions: ['.ts'],
  });

  console.log('[Seed] Clearing existing data...');
  await db.raw(
    'TRUNCATE TABLE daily_sales_analytics, other_costs, ad_spends, line_items, orders, product_variants, stores CASCADE'
  );

  // ── 1. Store ──
  const storeRepo = new StoreRepo(db);
  const store = await storeRepo.create({
    platform: 'shopify',
    shop_domain: 'demo-brand.myshopify.com',
    is_active: true,
  });
  console.log(`[Seed] Created store: ${store.id}`);

  // ── 2. Product variants with cost of goods ──
  await db('product_variants').insert(
    catalog.map((p) => ({
      store_id: store.id,
      platform_variant_id: p.variant,
      sku: p.sku,
      title: p.title,
      cost_of_goods_sold: p.cogs,
    }))
  );

  // ── 3. Orders + line items ──
  const firstDay = addDays(today(), -DAYS);
  let orderCount = 0;

  for (let d = 0; d < DAYS; d++) {
    const date = addDays(firstDay, d);
    const ordersToday = faker.number.int({ min: 0, max: 12 });

    for (let i = 0; i < ordersToday; i++) {
      const createdAt = startOfDay(date);
      createdAt.setUTCMinutes(faker.number.int({ min: 0, max: 24 * 60 - 1 }));

      const lines = faker.helpers.arrayElements(catalog, { min: 1, max: 3 }).map((p) => ({
        product: p,
        quantity: faker.number.int({ min: 1, max: 3 }),
      }));
      const subtotal = lines.reduce((s, l) => s + l.product.price * l.quantity, 0);
      const discount = faker.datatype.boolean({ probability: 0.3 }) ? Math.round(subtotal * 10) / 100 : 0;
      const total = Math.round((subtotal - discount) * 100) / 100;

      orderCount++;
      const [order]: { id: string }[] = await db('orders')
        .insert({
          store_id: store.id,
          platform_order_id: String(1000 + orderCount),
          order_number: `#${1000 + orderCount}`,
          total_price: total,
          total_discounts: discount,
          actual_shipping_cost: faker.number.float({ min: 4, max: 12, fractionDigits: 2 }),
          currency: 'USD',
          financial_status: 'paid',
          platform_created_at: createdAt,
          cancelled_at: faker.datatype.boolean({ probability: 0.05 }) ? createdAt : null,
        })
        .returning('id');

      await db('line_items').insert(
        lines.map((l) => ({
          order_id: order.id,
          platform_variant_id: l.product.variant,
          title: l.product.title,
          sku: l.product.sku,
          quantity: l.quantity,
          price: l.product.price,
        }))
      );
    }

    await db('ad_spends').insert({
      store_id: store.id,
      platform: faker.helpers.arrayElement(['facebook', 'google']),
      date,
      spend: faker.number.float({ min: 20, max: 150, fractionDigits: 2 }),
      campaign_name: faker.commerce.productAdjective() + ' launch',
    });
  }
  console.log(`[Seed] Created ${orderCount} orders over ${DAYS} days`);

  // ── 4. Operating costs ──
  await db('other_costs').insert([
    { store_id: store.id, category: 'subscription', description: 'Store plan', amount: 79, start_date: firstDay, frequency: 'monthly' },
    { store_id: store.id, category: 'photography', description: 'Lookbook shoot', amount: 450, start_date: addDays(firstDay, 10), frequency: 'one_time' },
  ]);

  // ── 5. Backfill analytics ──
  const commerce = new CommerceReader(new OrderModel(db), new AdSpendModel(db), new OtherCostModel(db));
  const job = new AggregationJob(commerce, new DailySalesAnalyticsRepo(db), storeRepo);
  const report = await job.computeAllForStore(store.id);
  console.log(`[Seed] Backfilled ${report.results.length} days (${report.failures.length} failed)`);

  await closeDb();
  console.log('[Seed] ✅ Done');
}

seed().catch((err: unknown) => {
  console.error('[Seed] Error:', errorMessage(err));
  process.exit(1);
});
