import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CONTACT_PROMPT,
  OrderLookupHandler,
  describeOrder,
  extractContactInfo,
  extractOrderNumber,
  isLookupIntent
} from '../../src/handlers/orders';
import { InMemoryOrderStore } from '../../src/services/orders/memoryStore';
import { mapOrderRow } from '../../src/services/orders/postgresStore';
import { normalizePhone, OrderStore } from '../../src/services/orders/types';
import { StorageError } from '../../src/utils/errors';
import { TEST_ORDERS } from '../helpers/fakes';

describe('Order extraction', () => {
  it('should find emails before phone numbers', () => {
    expect(extractContactInfo('reach me at Jamie@Example.com or 555-010-2000')).toEqual({
      kind: 'email',
      value: 'jamie@example.com'
    });
    expect(extractContactInfo('call (555) 010-2000')).toEqual({ kind: 'phone', value: '(555) 010-2000' });
    expect(extractContactInfo('no details here')).toBeNull();
  });

  it('should find order numbers', () => {
    expect(extractOrderNumber('status of ord-1001 please')).toBe('ORD-1001');
    expect(extractOrderNumber('order number #58213')).toBe('58213');
    expect(extractOrderNumber('order 58213 has not arrived')).toBe('58213');
    expect(extractOrderNumber('where is my order?')).toBeNull();
    expect(extractOrderNumber('I placed the order 3 days ago')).toBeNull();
  });

  it('should recognise lookup intent', () => {
    expect(isLookupIntent('Can you check my orders?')).toBe(true);
    expect(isLookupIntent("Where's my order")).toBe(true);
    expect(isLookupIntent('I need a new password')).toBe(false);
  });

  it('should describe an order on one line', () => {
    expect(describeOrder(TEST_ORDERS[2])).toBe('Order ORD-1003 (placed 2026-08-02): delivered, total 149.00 EUR');
  });

  it('should compare phone numbers by their last ten digits', () => {
    expect(normalizePhone('+1 (555) 010-2000')).toBe('5550102000');
    expect(normalizePhone('555.010.2000')).toBe('5550102000');
  });
});

describe('InMemoryOrderStore', () => {
  it('should find orders by number, email and phone', async () => {
    const store = new InMemoryOrderStore({ orders: TEST_ORDERS });

    expect((await store.findOrderByNumber('ord-1003'))?.customerName).toBe('Sam Okafor');
    expect(await store.findOrderByNumber('ORD-9999')).toBeUndefined();
    expect((await store.findOrdersByEmail('JAMIE@example.com')).map((order) => order.orderNumber)).toEqual([
      'ORD-1002',
      'ORD-1001'
    ]);
    expect((await store.findOrdersByPhone('(555) 010-2000')).map((order) => order.orderNumber)).toEqual([
      'ORD-1002',
      'ORD-1001'
    ]);
  });

  describe('seed file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'orders-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should load orders and fill defaults', async () => {
      const file = path.join(dir, 'orders.json');
      await fs.writeFile(
        file,
        JSON.stringify([
          {
            orderNumber: 'WEB-501',
            customerName: 'Test Customer',
            email: 'test@example.com',
            status: 'pending',
            totalPaid: 10,
            createdAt: '2026-10-01T00:00:00.000Z'
          }
        ])
      );
      const store = new InMemoryOrderStore({ seedFile: file });

      await store.init();

      expect(await store.findOrderByNumber('WEB-501')).toEqual({
        orderNumber: 'WEB-501',
        customerName: 'Test Customer',
        email: 'test@example.com',
        phone: null,
        status: 'pending',
        totalPaid: 10,
        currency: 'USD',
        createdAt: '2026-10-01T00:00:00.000Z',
        updatedAt: null,
        shippingAddress: null,
        customerNote: null
      });
    });

    it('should reject malformed seed files', async () => {
      const invalidJson = path.join(dir, 'broken.json');
      const wrongShape = path.join(dir, 'wrong.json');
      await fs.writeFile(invalidJson, '{ not json');
      await fs.writeFile(wrongShape, JSON.stringify([{ orderNumber: 'X-1' }]));

      await expect(new InMemoryOrderStore({ seedFile: invalidJson }).init()).rejects.toBeInstanceOf(StorageError);
      await expect(new InMemoryOrderStore({ seedFile: wrongShape }).init()).rejects.toBeInstanceOf(StorageError);
      await expect(
        new InMemoryOrderStore({ seedFile: path.join(dir, 'missing.json') }).init()
      ).rejects.toThrow('Cannot read order seed file');
    });

    it('should load the bundled sample orders', async () => {
      const store = new InMemoryOrderStore({ seedFile: path.join(__dirname, '../../data/sample-orders.json') });

      await store.init();

      expect((await store.findOrdersByEmail('jamie@example.com')).length).toBe(2);
    });
  });
});

describe('mapOrderRow', () => {
  it('should convert database rows into order records', () => {
    const record = mapOrderRow({
      order_number: 'ORD-2001',
      user_name: 'Test Customer',
      user_email: 'test@example.com',
      user_phone: null,
      status: 'shipped',
      total_paid: '42.10',
      total_paid_currency: null,
      created: new Date('2026-10-02T10:00:00.000Z'),
      updated_at: null,
      shipping_address: { city: 'Springfield' },
      customer_note: 'Ring twice'
    });

    expect(record).toEqual({
      orderNumber: 'ORD-2001',
      customerName: 'Test Customer',
      email: 'test@example.com',
      phone: null,
      status: 'shipped',
      totalPaid: 42.1,
      currency: 'USD',
      createdAt: '2026-10-02T10:00:00.000Z',
      updatedAt: null,
      shippingAddress: '{"city":"Springfield"}',
      customerNote: 'Ring twice'
    });
  });

  it('should reject rows without an order number', () => {
    expect(() => mapOrderRow({ status: 'shipped' })).toThrow(StorageError);
  });
});

describe('OrderLookupHandler', () => {
  const store = new InMemoryOrderStore({ orders: TEST_ORDERS });

  it('should score order vocabulary', () => {
    const handler = new OrderLookupHandler(store);
    expect(handler.confidence('my package was shipped but not delivered')).toBe(0.95);
    expect(handler.confidence('hello')).toBe(0.15);
  });

  it('should look up an order by number', async () => {
    const reply = await new OrderLookupHandler(store).process('What about ORD-1001?', 'user-1');

    expect(reply.confidence).toBe(1);
    expect(reply.text).toBe('Order ORD-1001 (placed 2026-09-28): shipped, total 89.99 USD.');
    expect(reply.metadata.resolved).toBe(true);
  });

  it('should say when an order number is unknown', async () => {
    const reply = await new OrderLookupHandler(store).process('What about ORD-4040?', 'user-1');

    expect(reply.confidence).toBe(0.8);
    expect(reply.text).toBe(
      "I couldn't find an order with the number ORD-4040. Please check the number, or share the email address you ordered with."
    );
    expect(reply.metadata.found).toBe(false);
  });

  it('should list orders for a phone number', async () => {
    const reply = await new OrderLookupHandler(store).process('my number is 555 010 2000', 'user-1');

    expect(reply.text).toBe(
      'I found 2 orders for 555 010 2000:\n' +
        '- Order ORD-1002 (placed 2026-10-12): processing, total 24.50 USD\n' +
        '- Order ORD-1001 (placed 2026-09-28): shipped, total 89.99 USD'
    );
  });

  it('should say when no orders match the contact details', async () => {
    const reply = await new OrderLookupHandler(store).process('nobody@example.com', 'user-1');

    expect(reply.confidence).toBe(0.8);
    expect(reply.text).toBe(
      "I couldn't find any orders for nobody@example.com. If you used a different email address or phone number, please share it."
    );
  });

  it('should ask for contact details when it has nothing to look up', async () => {
    const reply = await new OrderLookupHandler(store).process('tell me about shipping', 'user-1');

    expect(reply.text).toBe(CONTACT_PROMPT);
    expect(reply.metadata.awaitingContactInfo).toBe(true);
  });

  it('should apologise when the store is unavailable', async () => {
    const failing: OrderStore = {
      name: 'failing',
      init: async () => undefined,
      findOrderByNumber: async () => {
        throw new StorageError('connection refused');
      },
      findOrdersByEmail: async () => [],
      findOrdersByPhone: async () => [],
      close: async () => undefined
    };

    const reply = await new OrderLookupHandler(failing).process('ORD-1001', 'user-1');

    expect(reply.confidence).toBe(0);
    expect(reply.metadata).toEqual({ errorKind: 'storage', error: 'connection refused' });
    expect(reply.text).toMatch(/^I can't reach our order system right now\./);
  });
});
