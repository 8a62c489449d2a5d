import { UserLock } from '../../src/services/userLock';
import { ConversationStore } from '../../src/services/conversationStore';
import { HandlerRegistry } from '../../src/registry/handler-registry';
import { ErrorCode, HandlerRegistryError } from '../../src/utils/errors';
import { StubHandler } from '../helpers/fakes';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('UserLock', () => {
  it('should run work for the same key one at a time in arrival order', async () => {
    const lock = new UserLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('user-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = lock.runExclusive('user-1', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(lock.isLocked('user-1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.size).toBe(0);
  });

  it('should not block other keys', async () => {
    const lock = new UserLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.runExclusive('user-1', async () => {
      await gate.promise;
      order.push('user-1');
    });
    await lock.runExclusive('user-2', async () => {
      order.push('user-2');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['user-2', 'user-1']);
  });

  it('should release the lock when the work throws', async () => {
    const lock = new UserLock();

    await expect(
      lock.runExclusive('user-1', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.runExclusive('user-1', async () => 'next')).resolves.toBe('next');
    expect(lock.isLocked('user-1')).toBe(false);
  });
});

describe('ConversationStore', () => {
  it('should create one state per user on first use', () => {
    const store = new ConversationStore();

    const first = store.getOrCreate('user-1');
    const again = store.getOrCreate('user-1');

    expect(first.created).toBe(true);
    expect(again.created).toBe(false);
    expect(again.state).toBe(first.state);
    expect(first.state.currentHandler).toBe('general');
    expect(first.state.pendingSubDialog).toBe('none');
    expect(store.size).toBe(1);
  });

  it('should describe a state with ISO timestamps', () => {
    const store = new ConversationStore();
    const { state } = store.getOrCreate('user-1');
    state.history.push({ handler: 'billing', timestamp: new Date('2026-10-01T09:00:00.000Z'), query: 'refund' });
    state.turnCount = 1;

    expect(store.describe('user-1')?.history).toEqual([
      { handler: 'billing', timestamp: '2026-10-01T09:00:00.000Z', query: 'refund' }
    ]);
    expect(store.describe('user-2')).toBeUndefined();
  });

  it('should delete states', () => {
    const store = new ConversationStore();
    store.getOrCreate('user-1');

    expect(store.delete('user-1')).toBe(true);
    expect(store.has('user-1')).toBe(false);
    expect(store.delete('user-1')).toBe(false);
  });
});

describe('HandlerRegistry', () => {
  const allKinds = () => [
    new StubHandler('general', 0.5),
    new StubHandler('technical', 0.2),
    new StubHandler('billing', 0.2),
    new StubHandler('escalation', 0.2),
    new StubHandler('order_lookup', 0.2)
  ];

  it('should list handlers in routing order', () => {
    const registry = HandlerRegistry.create(allKinds().reverse());

    expect(registry.list().map((handler) => handler.kind)).toEqual([
      'general',
      'technical',
      'billing',
      'escalation',
      'order_lookup'
    ]);
    expect(registry.size).toBe(5);
  });

  it('should refuse a missing handler', () => {
    const incomplete = allKinds().filter((handler) => handler.kind !== 'billing');

    expect(() => HandlerRegistry.create(incomplete)).toThrow(HandlerRegistryError);
    expect(() => HandlerRegistry.create(incomplete)).toThrow('No handler registered for: billing');
  });

  it('should refuse duplicate handlers', () => {
    try {
      HandlerRegistry.create([...allKinds(), new StubHandler('general', 0.1)]);
      throw new Error('expected create to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(HandlerRegistryError);
      expect(error).toMatchObject({ code: ErrorCode.REGISTRY_DUPLICATE_HANDLER });
    }
  });
});
