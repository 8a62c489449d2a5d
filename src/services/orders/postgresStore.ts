import { Pool, QueryResultRow } from 'pg';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { StorageError, ErrorCode, toError } from '../../utils/errors';
import { OrderRecord, OrderStore, normalizePhone } from './types';

export interface PostgresStoreConfig {
  connectionString: string;
  tableName?: string;
  poolSize?: number;
}

const ORDER_COLUMNS = `order_number, user_name, user_email, user_phone, status, total_paid,
  total_paid_currency, created, updated_at, shipping_address, customer_note`;

const optionalText = z
  .union([z.string(), z.record(z.unknown()), z.null(), z.undefined()])
  .transform((value) => {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : JSON.stringify(value);
  });

const timestamp = z.union([z.date(), z.string()]).transform((value) =>
  value instanceof Date ? value.toISOString() : new Date(value).toISOString()
);

const orderRowSchema = z.object({
  order_number: z.string(),
  user_name: z.string().nullable().transform((value) => value ?? ''),
  user_email: z.string().nullable().transform((value) => value ?? ''),
  user_phone: z.string().nullable().optional().transform((value) => value ?? null),
  status: z.string(),
  // pg returns NUMERIC columns as strings
  total_paid: z.union([z.number(), z.string()]).transform((value) => Number(value)),
  total_paid_currency: z.string().nullable().transform((value) => value ?? 'USD'),
  created: timestamp,
  updated_at: timestamp.nullable().optional().transform((value) => value ?? null),
  shipping_address: optionalText,
  customer_note: optionalText
});

/**
 * Convert one `order_order` row into an OrderRecord.
 */
export function mapOrderRow(row: QueryResultRow): OrderRecord {
  const parsed = orderRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError(`Unexpected order row shape: ${parsed.error.message}`);
  }
  const value = parsed.data;
  return {
    orderNumber: value.order_number,
    customerName: value.user_name,
    email: value.user_email,
    phone: value.user_phone,
    status: value.status,
    totalPaid: value.total_paid,
    currency: value.total_paid_currency,
    createdAt: value.created,
    updatedAt: value.updated_at,
    shippingAddress: value.shipping_address,
    customerNote: value.customer_note
  };
}

/**
 * PostgreSQL-backed order store reading the `order_order` table.
 */
export class PostgresOrderStore implements OrderStore {
  readonly name = 'postgres';
  private pool: Pool;
  private tableName: string;

  constructor(config: PostgresStoreConfig, pool?: Pool) {
    this.tableName = config.tableName || 'order_order';
    this.pool = pool ?? new Pool({
      connectionString: config.connectionString,
      max: config.poolSize ?? 5
    });
  }

  async init(): Promise<void> {
    await this.query('SELECT 1', []);
    logger.info('PostgreSQL order store connected', {
      operation: 'order_store_init'
    }, { table: this.tableName });
  }

  async findOrderByNumber(orderNumber: string): Promise<OrderRecord | undefined> {
    const rows = await this.query(
      `SELECT ${ORDER_COLUMNS} FROM ${this.tableName} WHERE UPPER(order_number) = UPPER($1) LIMIT 1`,
      [orderNumber]
    );
    return rows.length > 0 ? mapOrderRow(rows[0]) : undefined;
  }

  async findOrdersByEmail(email: string): Promise<OrderRecord[]> {
    const rows = await this.query(
      `SELECT ${ORDER_COLUMNS} FROM ${this.tableName} WHERE LOWER(user_email) = LOWER($1) ORDER BY created DESC`,
      [email]
    );
    return rows.map(mapOrderRow);
  }

  async findOrdersByPhone(phone: string): Promise<OrderRecord[]> {
    const rows = await this.query(
      `SELECT ${ORDER_COLUMNS} FROM ${this.tableName}
       WHERE RIGHT(REGEXP_REPLACE(user_phone, '\\D', '', 'g'), 10) = $1 ORDER BY created DESC`,
      [normalizePhone(phone)]
    );
    return rows.map(mapOrderRow);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async query(text: string, values: unknown[]): Promise<QueryResultRow[]> {
    const startTime = Date.now();
    try {
      const result = await this.pool.query(text, values);
      logger.debug('Order query executed', {
        operation: 'order_query'
      }, { durationMs: Date.now() - startTime, rows: result.rowCount });
      return result.rows;
    } catch (error) {
      throw new StorageError(
        `Order query failed: ${toError(error).message}`,
        error,
        ErrorCode.STORAGE_UNAVAILABLE
      );
    }
  }
}
