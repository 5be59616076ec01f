import { RedisCounterStore } from './redis-counter-store';

describe('RedisCounterStore', () => {
  const makeStore = () => {
    const client = {
      getex: jest.fn(),
      set: jest.fn(),
      eval: jest.fn(),
      del: jest.fn().mockResolvedValue(1),
      scan: jest.fn(),
      mget: jest.fn(),
      quit: jest.fn().mockResolvedValue('OK'),
      disconnect: jest.fn(),
    };
    return { store: new RedisCounterStore(client as any), client };
  };

  it('reads with GETEX so the ttl is refreshed', async () => {
    const { store, client } = makeStore();
    client.getex.mockResolvedValueOnce('12').mockResolvedValueOnce(null);

    await expect(store.read('location_load:1', 3600)).resolves.toBe(12);
    await expect(store.read('location_load:2', 3600)).resolves.toBeNull();
    expect(client.getex).toHaveBeenCalledWith('location_load:1', 'EX', 3600);
  });

  it('writes the value with an expiry', async () => {
    const { store, client } = makeStore();
    client.set.mockResolvedValue('OK');

    await store.write('location_load:1', 4, 3600);

    expect(client.set).toHaveBeenCalledWith('location_load:1', '4', 'EX', 3600);
  });

  it('increments through a single script call', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValue(3);

    await expect(store.increment('location_load:1', 3600)).resolves.toBe(3);
    expect(client.eval).toHaveBeenCalledTimes(1);
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining("redis.call('INCR', KEYS[1])"),
      1,
      'location_load:1',
      3600,
    );
  });

  it('refreshes the expiry inside both update scripts', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValueOnce(1).mockResolvedValueOnce([0, 1]);

    await store.increment('location_load:1', 3600);
    await store.decrement('location_load:1', 3600);

    const [incrementScript] = client.eval.mock.calls[0];
    const [decrementScript] = client.eval.mock.calls[1];
    expect(incrementScript).toContain("redis.call('EXPIRE', KEYS[1], ARGV[1])");
    expect(decrementScript).toContain("redis.call('EXPIRE', KEYS[1], ARGV[1])");
  });

  it('reports a missing key instead of creating it', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValue(null);

    await expect(store.increment('location_load:1', 3600)).resolves.toBeNull();
    await expect(store.decrement('location_load:1', 3600)).resolves.toBeNull();
    const [incrementScript] = client.eval.mock.calls[0];
    expect(incrementScript).toContain("if redis.call('EXISTS', KEYS[1]) == 0 then");
  });

  it('parses the clamp flag of the decrement script', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValueOnce([2, 0]).mockResolvedValueOnce([0, 1]);

    await expect(store.decrement('location_load:1', 3600)).resolves.toEqual({
      count: 2,
      clamped: false,
    });
    await expect(store.decrement('location_load:1', 3600)).resolves.toEqual({
      count: 0,
      clamped: true,
    });
  });

  it('rejects unexpected script replies', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValue('not-a-count');

    await expect(store.increment('location_load:1', 3600)).rejects.toThrow(
      'Unexpected increment reply for location_load:1',
    );
    await expect(store.decrement('location_load:1', 3600)).rejects.toThrow(
      'Unexpected decrement reply for location_load:1',
    );
  });

  it('takes the lock with SET NX and an owner token', async () => {
    const { store, client } = makeStore();
    client.set.mockResolvedValueOnce('OK').mockResolvedValueOnce(null);

    const token = await store.tryLock('location_load:1:lock', 10);
    await expect(store.tryLock('location_load:1:lock', 10)).resolves.toBeNull();
    expect(typeof token).toBe('string');
    expect(client.set).toHaveBeenNthCalledWith(1, 'location_load:1:lock', token, 'EX', 10, 'NX');
  });

  it('releases the lock only through a token comparison', async () => {
    const { store, client } = makeStore();
    client.eval.mockResolvedValue(0);

    await store.unlock('location_load:1:lock', 'owner-token');

    expect(client.del).not.toHaveBeenCalled();
    expect(client.eval).toHaveBeenCalledWith(
      expect.stringContaining("if redis.call('GET', KEYS[1]) == ARGV[1] then"),
      1,
      'location_load:1:lock',
      'owner-token',
    );
  });

  it('collects entries across scan pages', async () => {
    const { store, client } = makeStore();
    client.scan
      .mockResolvedValueOnce(['17', ['location_load:1', 'location_load:2']])
      .mockResolvedValueOnce(['0', ['location_load:3']]);
    client.mget.mockResolvedValueOnce(['4', null]).mockResolvedValueOnce(['1']);

    await expect(store.entries('location_load:')).resolves.toEqual(
      new Map([
        ['location_load:1', 4],
        ['location_load:3', 1],
      ]),
    );
    expect(client.scan).toHaveBeenNthCalledWith(
      1,
      '0',
      'MATCH',
      'location_load:*',
      'COUNT',
      200,
    );
    expect(client.scan).toHaveBeenNthCalledWith(
      2,
      '17',
      'MATCH',
      'location_load:*',
      'COUNT',
      200,
    );
  });

  it('disconnects when quit fails on shutdown', async () => {
    const { store, client } = makeStore();
    client.quit.mockRejectedValue(new Error('Connection is closed.'));

    await store.onModuleDestroy();

    expect(client.disconnect).toHaveBeenCalled();
  });
});
