import { BadRequestException, NotFoundException } from '@nestjs/common';
import { LocationsService } from './locations.service';

describe('LocationsService', () => {
  const estimate = {
    readyAt: new Date('2026-03-02T12:21:00.000Z'),
    basePrepSeconds: 900,
    prepSeconds: 1260,
    loadInfo: { activeCount: 10, multiplier: 1.4, isHighLoad: false },
  };

  const makeService = () => {
    const repository = {
      findById: jest.fn().mockResolvedValue({ id: 1, companyId: 1, name: 'Main St', address: null }),
    } as any;
    const offerings = { listAvailable: jest.fn().mockResolvedValue([]) } as any;
    const prepTime = {
      estimate: jest.fn().mockResolvedValue(estimate),
      estimateForMenuItems: jest.fn().mockResolvedValue(estimate),
      loadInfo: jest.fn().mockResolvedValue({ activeCount: 3, multiplier: 1, isHighLoad: false }),
    } as any;
    const loadCounter = { resync: jest.fn().mockResolvedValue(3) } as any;
    return {
      service: new LocationsService(repository, offerings, prepTime, loadCounter),
      repository,
      prepTime,
      loadCounter,
    };
  };

  it('estimates by menu item and rounds the wait up to whole minutes', async () => {
    const { service, prepTime } = makeService();

    const result = await service.estimateReadyAt(1, { items: [{ menuItemId: 10, quantity: 2 }] });

    expect(prepTime.estimateForMenuItems).toHaveBeenCalledWith(1, [{ menuItemId: 10, quantity: 2 }]);
    expect(result).toEqual({
      estimatedReadyAt: '2026-03-02T12:21:00.000Z',
      readyInMinutes: 21,
      basePrepSeconds: 900,
      prepSeconds: 1260,
      loadInfo: { activeCount: 10, multiplier: 1.4, isHighLoad: false },
    });
  });

  it('estimates by offering', async () => {
    const { service, prepTime } = makeService();

    await service.estimateReadyAt(1, { offerings: [{ offeringId: 5, quantity: 1 }] });

    expect(prepTime.estimate).toHaveBeenCalledWith(1, [{ offeringId: 5, quantity: 1 }]);
  });

  it('requires exactly one of items and offerings', async () => {
    const { service } = makeService();

    await expect(service.estimateReadyAt(1, {})).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      service.estimateReadyAt(1, {
        items: [{ menuItemId: 10, quantity: 1 }],
        offerings: [{ offeringId: 5, quantity: 1 }],
      }),
    ).rejects.toBeInstanceOf(BadRequestException);
  });

  it('resyncs the counter before reporting the load', async () => {
    const { service, loadCounter, prepTime } = makeService();

    await expect(service.resyncLoad(1)).resolves.toEqual({
      activeCount: 3,
      multiplier: 1,
      isHighLoad: false,
    });
    expect(loadCounter.resync).toHaveBeenCalledWith(1);
    expect(prepTime.loadInfo).toHaveBeenCalledWith(1);
  });

  it('reports unknown locations', async () => {
    const { service, repository } = makeService();
    repository.findById.mockResolvedValue(null);

    await expect(service.getLoad(4)).rejects.toBeInstanceOf(NotFoundException);
  });
});
