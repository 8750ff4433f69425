// ──────────────────────────────────────────
// Migration: create all tables
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Platform tables ──

  await knex.schema.createTable('stores', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.string('platform', 50).notNullable().defaultTo('shopify');
    t.string('shop_domain', 255).notNullable();
    t.boolean('is_active').notNullable().defaultTo(true);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['platform', 'shop_domain']);
  });

  // ── Commerce tables ──

  await knex.schema.createTable('product_variants', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('store_id').notNullable().references('id').inTable('stores').onDelete('CASCADE');
    t.string('platform_variant_id', 100).notNullable();
    t.string('sku', 100);
    t.string('title', 255);
    t.decimal('cost_of_goods_sold', 12, 2);
    t.unique(['store_id', 'platform_variant_id']);
  });

  await knex.schema.createTable('orders', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('store_id').notNullable().references('id').inTable('stores').onDelete('CASCADE');
    t.string('platform_order_id', 100).notNullable();
    t.string('order_number', 100).notNullable();
    t.decimal('total_price', 12, 2).notNullable();
    t.decimal('total_discounts', 12, 2).notNullable().defaultTo(0);
    t.decimal('actual_shipping_cost', 12, 2);
    t.string('currency', 10).notNullable().defaultTo('USD');
    t.string('financial_status', 50);
    t.timestamp('platform_created_at', { useTz: true }).notNullable();
    t.timestamp('cancelled_at', { useTz: true });
    t.timestamp('synced_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['store_id', 'platform_order_id']);
  });

  await knex.schema.raw(`
    CREATE INDEX idx_orders_store_created ON orders (store_id, platform_created_at) WHERE cancelled_at IS NULL;
  `);

  await knex.schema.createTable('line_items', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('order_id').notNullable().references('id').inTable('orders').onDelete('CASCADE');
    t.string('platform_variant_id', 100);
    t.text('title').notNullable();
    t.string('sku', 100);
    t.integer('quantity').notNullable();
    t.decimal('price', 12, 2).notNullable();
  });

  await knex.schema.createTable('ad_spends', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('store_id').notNullable().references('id').inTable('stores').onDelete('CASCADE');
    t.string('platform', 100).notNullable();
    t.date('date').notNullable();
    t.decimal('spend', 12, 2).notNullable();
    t.string('campaign_name', 255);
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  await knex.schema.createTable('other_costs', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('store_id').notNullable().references('id').inTable('stores').onDelete('CASCADE');
    t.string('category', 100).notNullable();
    t.text('description');
    t.decimal('amount', 12, 2).notNullable();
    t.date('start_date').notNullable();
    t.date('end_date');
    t.string('frequency', 50).notNullable();
    t.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
  });

  // ── Analytics tables ──

  await knex.schema.createTable('daily_sales_analytics', (t) => {
    t.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    t.uuid('store_id').notNullable().references('id').inTable('stores').onDelete('CASCADE');
    t.date('date').notNullable();
    t.decimal('total_sales', 12, 2).notNullable().defaultTo(0);
    t.integer('total_orders').notNullable().defaultTo(0);
    t.decimal('average_order_value', 12, 2).notNullable().defaultTo(0);
    t.decimal('profit', 12, 2).notNullable().defaultTo(0);
    t.timestamp('computed_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());
    t.unique(['store_id', 'date']);
  });

  await knex.schema.raw(`
    CREATE INDEX idx_daily_sales_analytics_store_date ON daily_sales_analytics (store_id, date DESC);
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('daily_sales_analytics');
  await knex.schema.dropTableIfExists('other_costs');
  await knex.schema.dropTableIfExists('ad_spends');
  await knex.schema.dropTableIfExists('line_items');
  await knex.schema.dropTableIfExists('orders');
  await knex.schema.dropTableIfExists('product_variants');
  await knex.schema.dropTableIfExists('stores');
}
