import * as fs from 'fs/promises';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { StorageError, ErrorCode } from '../../utils/errors';
import { OrderRecord, OrderStore, orderRecordSchema, normalizePhone } from './types';

export interface MemoryStoreConfig {
  seedFile?: string;
  orders?: OrderRecord[];
}

/**
 * In-process order store, optionally seeded from a JSON file of OrderRecords.
 */
export class InMemoryOrderStore implements OrderStore {
  readonly name = 'memory';
  private orders: Map<string, OrderRecord> = new Map();

  constructor(private readonly config: MemoryStoreConfig = {}) {
    for (const order of config.orders ?? []) {
      this.add(order);
    }
  }

  async init(): Promise<void> {
    if (!this.config.seedFile) {
      return;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.config.seedFile, 'utf8');
    } catch (error) {
      throw new StorageError(
        `Cannot read order seed file ${this.config.seedFile}`,
        error,
        ErrorCode.STORAGE_UNAVAILABLE
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Order seed file ${this.config.seedFile} is not valid JSON`, error);
    }

    const parsed = z.array(orderRecordSchema).safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`Invalid order seed file ${this.config.seedFile}: ${parsed.error.message}`);
    }

    for (const order of parsed.data) {
      this.add(order);
    }

    logger.info('Order store seeded', {
      operation: 'order_store_init'
    }, { seedFile: this.config.seedFile, orders: this.orders.size });
  }

  add(order: OrderRecord): void {
    this.orders.set(order.orderNumber.toUpperCase(), order);
  }

  async findOrderByNumber(orderNumber: string): Promise<OrderRecord | undefined> {
    return this.orders.get(orderNumber.toUpperCase());
  }

  async findOrdersByEmail(email: string): Promise<OrderRecord[]> {
    const wanted = email.toLowerCase();
    return this.sorted(Array.from(this.orders.values()).filter((order) => order.email.toLowerCase() === wanted));
  }

  async findOrdersByPhone(phone: string): Promise<OrderRecord[]> {
    const wanted = normalizePhone(phone);
    return this.sorted(
      Array.from(this.orders.values()).filter(
        (order) => order.phone !== null && normalizePhone(order.phone) === wanted
      )
    );
  }

  async close(): Promise<void> {
    this.orders.clear();
  }

  // Newest first, matching the SQL store's ORDER BY
  private sorted(orders: OrderRecord[]): OrderRecord[] {
    return orders.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }
}
