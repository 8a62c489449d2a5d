import { z } from 'zod';

export const orderRecordSchema = z.object({
  orderNumber: z.string().min(1),
  customerName: z.string(),
  email: z.string(),
  phone: z.string().nullable().default(null),
  status: z.string(),
  totalPaid: z.number(),
  currency: z.string().default('USD'),
  createdAt: z.string(),
  updatedAt: z.string().nullable().default(null),
  shippingAddress: z.string().nullable().default(null),
  customerNote: z.string().nullable().default(null)
});

export type OrderRecord = z.infer<typeof orderRecordSchema>;

/**
 * Order storage collaborator. A missing order is an empty result, not an
 * error; implementations throw StorageError only when the store itself fails.
 */
export interface OrderStore {
  readonly name: string;
  init(): Promise<void>;
  findOrderByNumber(orderNumber: string): Promise<OrderRecord | undefined>;
  findOrdersByEmail(email: string): Promise<OrderRecord[]>;
  findOrdersByPhone(phone: string): Promise<OrderRecord[]>;
  close(): Promise<void>;
}

/**
 * Reduce a phone number to its last ten digits so formatting differences
 * ("(555) 010-2000" vs "555.010.2000") compare equal.
 */
export function normalizePhone(phone: string): string {
  return phone.replace(/\D/g, '').slice(-10);
}
