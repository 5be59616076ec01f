import {
  ConflictException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { OrderLifecycleService } from './order-lifecycle.service';
import { OrdersService } from './orders.service';
import type { OrderDto, OrderTransitionEvent } from './orders.types';

const order: OrderDto = {
  id: 11,
  locationId: 1,
  source: 'online',
  status: 'received',
  estimatedReadyAt: '2026-03-02T12:18:00.000Z',
  createdAt: '2026-03-02T12:00:00.000Z',
  updatedAt: '2026-03-02T12:00:00.000Z',
  items: [
    { offeringId: 5, menuItemId: 50, name: 'Burger', quantity: 2, basePrepTimeSeconds: 450 },
  ],
};

describe('OrdersService', () => {
  const makeService = () => {
    const repository = {
      createOrder: jest.fn().mockResolvedValue(11),
      getOrderById: jest.fn().mockResolvedValue(order),
      orderExists: jest.fn().mockResolvedValue(false),
      updateStatus: jest.fn(),
      softDelete: jest.fn(),
      restore: jest.fn(),
    } as any;
    const locations = {
      findById: jest.fn().mockResolvedValue({ id: 1, companyId: 1, name: 'Main St', address: null }),
    } as any;
    const prepTime = {
      validateOfferings: jest.fn().mockResolvedValue(true),
      estimate: jest.fn().mockResolvedValue({
        readyAt: new Date('2026-03-02T12:18:00.000Z'),
        basePrepSeconds: 900,
        prepSeconds: 1080,
        loadInfo: { activeCount: 6, multiplier: 1.2, isHighLoad: false },
      }),
      loadInfo: jest.fn().mockResolvedValue({ activeCount: 7, multiplier: 1.2, isHighLoad: false }),
    } as any;
    const lifecycle = new OrderLifecycleService();
    const events: OrderTransitionEvent[] = [];
    lifecycle.events().subscribe((event) => events.push(event));
    return {
      service: new OrdersService(repository, locations, prepTime, lifecycle),
      repository,
      locations,
      prepTime,
      events,
    };
  };

  describe('createOrder', () => {
    it('stores the estimated ready time and announces the new active order', async () => {
      const { service, repository, prepTime, events } = makeService();

      const result = await service.createOrder({
        locationId: 1,
        source: 'online',
        items: [{ offeringId: 5, quantity: 2 }],
      });

      expect(repository.createOrder).toHaveBeenCalledWith({
        locationId: 1,
        source: 'online',
        estimatedReadyAt: new Date('2026-03-02T12:18:00.000Z'),
        items: [{ offeringId: 5, quantity: 2 }],
      });
      expect(result).toEqual({
        order,
        loadInfo: { activeCount: 7, multiplier: 1.2, isHighLoad: false },
      });
      expect(prepTime.loadInfo).toHaveBeenCalledWith(1);
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        orderId: 11,
        locationId: 1,
        kind: 'created',
        previousStatus: null,
        nextStatus: 'received',
      });
    });

    it('reports the load after the new order has been announced', async () => {
      const { service, prepTime, events } = makeService();
      let announcedBeforeLoad = 0;
      prepTime.loadInfo.mockImplementation(async () => {
        announcedBeforeLoad = events.length;
        return { activeCount: 7, multiplier: 1.2, isHighLoad: false };
      });

      await service.createOrder({ locationId: 1, source: 'pos', items: [{ offeringId: 5, quantity: 1 }] });

      expect(announcedBeforeLoad).toBe(1);
    });

    it('refuses unavailable offerings before estimating', async () => {
      const { service, prepTime, repository, events } = makeService();
      prepTime.validateOfferings.mockResolvedValue(false);

      await expect(
        service.createOrder({ locationId: 1, source: 'pos', items: [{ offeringId: 9, quantity: 1 }] }),
      ).rejects.toBeInstanceOf(UnprocessableEntityException);
      expect(prepTime.estimate).not.toHaveBeenCalled();
      expect(repository.createOrder).not.toHaveBeenCalled();
      expect(events).toHaveLength(0);
    });

    it('reports unknown locations', async () => {
      const { service, locations } = makeService();
      locations.findById.mockResolvedValue(null);

      await expect(
        service.createOrder({ locationId: 7, source: 'pos', items: [{ offeringId: 5, quantity: 1 }] }),
      ).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('updateStatus', () => {
    it('announces the previous and the new status', async () => {
      const { service, repository, events } = makeService();
      repository.updateStatus.mockResolvedValue({
        orderId: 11,
        locationId: 1,
        previousStatus: 'ready',
        status: 'completed',
      });

      await service.updateStatus(11, 'completed');

      expect(repository.updateStatus).toHaveBeenCalledWith(11, 'completed');
      expect(events[0]).toMatchObject({
        kind: 'status-updated',
        previousStatus: 'ready',
        nextStatus: 'completed',
      });
    });

    it('reports unknown orders without announcing anything', async () => {
      const { service, repository, events } = makeService();
      repository.updateStatus.mockResolvedValue(null);

      await expect(service.updateStatus(99, 'ready')).rejects.toBeInstanceOf(NotFoundException);
      expect(events).toHaveLength(0);
    });
  });

  describe('deleteOrder and restoreOrder', () => {
    it('announces a deleted order as leaving with its last status', async () => {
      const { service, repository, events } = makeService();
      repository.softDelete.mockResolvedValue({ orderId: 11, locationId: 1, status: 'preparing' });

      await service.deleteOrder(11);

      expect(events[0]).toMatchObject({
        kind: 'deleted',
        previousStatus: 'preparing',
        nextStatus: null,
      });
    });

    it('announces a restored order as arriving with its status', async () => {
      const { service, repository, events } = makeService();
      repository.restore.mockResolvedValue({ orderId: 11, locationId: 1, status: 'received' });

      await expect(service.restoreOrder(11)).resolves.toEqual(order);
      expect(events[0]).toMatchObject({
        kind: 'restored',
        previousStatus: null,
        nextStatus: 'received',
      });
    });

    it('distinguishes orders that are not deleted from missing ones', async () => {
      const { service, repository } = makeService();
      repository.restore.mockResolvedValue(null);
      repository.orderExists.mockResolvedValueOnce(true).mockResolvedValueOnce(false);

      await expect(service.restoreOrder(11)).rejects.toBeInstanceOf(ConflictException);
      await expect(service.restoreOrder(12)).rejects.toBeInstanceOf(NotFoundException);
    });

    it('reports deleting an unknown order', async () => {
      const { service, repository } = makeService();
      repository.softDelete.mockResolvedValue(null);

      await expect(service.deleteOrder(5)).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
