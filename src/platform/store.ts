// ──────────────────────────────────────────
// Platform: Store repository
// ──────────────────────────────────────────

import { Knex } from 'knex';
import type { Store } from '../shared/types';

export interface StoreLookup {
  findById(id: string): Promise<Store | null>;
  findActive(): Promise<Store[]>;
}

export class StoreRepo implements StoreLookup {
  constructor(private db: Knex) {}

  async findById(id: string): Promise<Store | null> {
    const row: Store | undefined = await this.db('stores').where('id', id).first();
    return row ?? null;
  }

  async findActive(): Promise<Store[]> {
    return this.db('stores').where('is_active', true).select('*');
  }

  async create(store: Omit<Store, 'id' | 'created_at'>): Promise<Store> {
    const [row]: Store[] = await this.db('stores').insert(store).returning('*');
    return row;
  }
}
