import { OrderLifecycleService } from './order-lifecycle.service';
import { OrderLoadBridge, loadAdjustmentFor } from './order-load-bridge.service';
import type { OrderStatus } from './order-status';

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('loadAdjustmentFor', () => {
  it.each<[OrderStatus | null, OrderStatus | null, string]>([
    [null, 'received', 'increment'],
    [null, 'preparing', 'increment'],
    [null, 'completed', 'none'],
    ['received', 'preparing', 'none'],
    ['preparing', 'ready', 'none'],
    ['ready', 'completed', 'decrement'],
    ['received', 'completed', 'decrement'],
    ['completed', 'completed', 'none'],
    ['completed', 'received', 'increment'],
    ['ready', null, 'decrement'],
    ['completed', null, 'none'],
  ])('%s -> %s is %s', (previous, next, expected) => {
    expect(loadAdjustmentFor(previous, next)).toBe(expected);
  });
});

describe('OrderLoadBridge', () => {
  const makeBridge = () => {
    const lifecycle = new OrderLifecycleService();
    const loadCounter = {
      increment: jest.fn().mockResolvedValue(1),
      decrement: jest.fn().mockResolvedValue(0),
    } as any;
    const bridge = new OrderLoadBridge(lifecycle, loadCounter);
    bridge.onModuleInit();
    return { bridge, lifecycle, loadCounter };
  };

  it('increments once when an order is created', async () => {
    const { bridge, lifecycle, loadCounter } = makeBridge();

    lifecycle.emit({
      orderId: 1,
      locationId: 3,
      kind: 'created',
      previousStatus: null,
      nextStatus: 'received',
    });
    await flush();

    expect(loadCounter.increment).toHaveBeenCalledTimes(1);
    expect(loadCounter.increment).toHaveBeenCalledWith(3);
    expect(loadCounter.decrement).not.toHaveBeenCalled();
    bridge.onModuleDestroy();
  });

  it('follows an order through its whole lifecycle with one increment and one decrement', async () => {
    const { bridge, lifecycle, loadCounter } = makeBridge();
    const steps: Array<[OrderStatus | null, OrderStatus]> = [
      [null, 'received'],
      ['received', 'preparing'],
      ['preparing', 'ready'],
      ['ready', 'completed'],
      ['completed', 'completed'],
    ];

    steps.forEach(([previousStatus, nextStatus], index) =>
      lifecycle.emit({
        orderId: 8,
        locationId: 2,
        kind: index === 0 ? 'created' : 'status-updated',
        previousStatus,
        nextStatus,
      }),
    );
    await flush();

    expect(loadCounter.increment).toHaveBeenCalledTimes(1);
    expect(loadCounter.decrement).toHaveBeenCalledTimes(1);
    expect(loadCounter.decrement).toHaveBeenCalledWith(2);
    bridge.onModuleDestroy();
  });

  it('decrements when an active order is deleted and increments when it is restored', async () => {
    const { bridge, loadCounter } = makeBridge();

    await expect(
      bridge.apply({
        orderId: 4,
        locationId: 1,
        kind: 'deleted',
        previousStatus: 'preparing',
        nextStatus: null,
        at: '2026-03-02T12:00:00.000Z',
      }),
    ).resolves.toBe('decrement');
    await expect(
      bridge.apply({
        orderId: 4,
        locationId: 1,
        kind: 'restored',
        previousStatus: null,
        nextStatus: 'preparing',
        at: '2026-03-02T12:05:00.000Z',
      }),
    ).resolves.toBe('increment');

    expect(loadCounter.decrement).toHaveBeenCalledTimes(1);
    expect(loadCounter.increment).toHaveBeenCalledTimes(1);
    bridge.onModuleDestroy();
  });

  it('keeps handling events after an adjustment fails', async () => {
    const { bridge, lifecycle, loadCounter } = makeBridge();
    loadCounter.increment.mockRejectedValueOnce(new Error('boom')).mockResolvedValueOnce(1);

    lifecycle.emit({ orderId: 1, locationId: 1, kind: 'created', previousStatus: null, nextStatus: 'received' });
    lifecycle.emit({ orderId: 2, locationId: 1, kind: 'created', previousStatus: null, nextStatus: 'received' });
    await flush();

    expect(loadCounter.increment).toHaveBeenCalledTimes(2);
    bridge.onModuleDestroy();
  });

  it('stops listening on shutdown', async () => {
    const { bridge, lifecycle, loadCounter } = makeBridge();
    bridge.onModuleDestroy();

    lifecycle.emit({ orderId: 1, locationId: 1, kind: 'created', previousStatus: null, nextStatus: 'received' });
    await flush();

    expect(loadCounter.increment).not.toHaveBeenCalled();
  });
});
