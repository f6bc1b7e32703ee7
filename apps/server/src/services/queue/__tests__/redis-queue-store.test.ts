import { describe, it, expect, vi, beforeEach } from 'vitest';

const { instances, FakeRedis } = vi.hoisted(() => {
  const instances: FakeRedis[] = [];
  class FakeRedis {
    readonly options: unknown;
    on = vi.fn();
    blpop = vi.fn();
    rpush = vi.fn();
    ping = vi.fn().mockResolvedValue('PONG');
    quit = vi.fn().mockResolvedValue('OK');
    disconnect = vi.fn();

    constructor(options?: unknown) {
      this.options = options;
      instances.push(this);
    }

    duplicate(): FakeRedis {
      return new FakeRedis(this.options);
    }
  }
  return { instances, FakeRedis };
});

vi.mock('ioredis', () => ({ Redis: FakeRedis }));

vi.mock('../../../lib/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  initLogger: vi.fn(),
}));

import { RedisQueueStore, parseRedisAddress } from '../redis-queue-store.js';

describe('parseRedisAddress', () => {
  it('splits host and port', () => {
    expect(parseRedisAddress('localhost:6379')).toEqual({ host: 'localhost', port: 6379 });
    expect(parseRedisAddress('redis.internal:6380')).toEqual({
      host: 'redis.internal',
      port: 6380,
    });
  });

  it.each(['localhost', ':6379', 'localhost:0', 'localhost:abc', 'localhost:70000'])(
    'rejects %s',
    (addr) => {
      expect(() => parseRedisAddress(addr)).toThrow(`Invalid Redis address: ${addr}`);
    },
  );
});

describe('RedisQueueStore', () => {
  beforeEach(() => {
    instances.length = 0;
  });

  function createStore() {
    const store = new RedisQueueStore({ addr: 'localhost:6379', password: 'test-secret', db: 2 });
    const [client, blocking] = instances;
    if (!client || !blocking) throw new Error('expected two connections');
    return { store, client, blocking };
  }

  it('opens a command connection and a dedicated blocking connection', () => {
    const { client } = createStore();
    expect(instances).toHaveLength(2);
    expect(client.options).toEqual({
      host: 'localhost',
      port: 6379,
      password: 'test-secret',
      db: 2,
    });
  });

  it('subscribes to error events on both connections', () => {
    const { client, blocking } = createStore();
    expect(client.on).toHaveBeenCalledWith('error', expect.any(Function));
    expect(blocking.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('pops from the head on the blocking connection with the timeout in seconds', async () => {
    const { store, client, blocking } = createStore();
    blocking.blpop.mockResolvedValue(['service:commands', '{"up":"org/app"}']);

    await expect(store.popHead('service:commands', 5000)).resolves.toBe('{"up":"org/app"}');
    expect(blocking.blpop).toHaveBeenCalledWith('service:commands', 5);
    expect(client.blpop).not.toHaveBeenCalled();
  });

  it('resolves null when the blocking pop times out', async () => {
    const { store, blocking } = createStore();
    blocking.blpop.mockResolvedValue(null);

    await expect(store.popHead('service:commands', 250)).resolves.toBeNull();
    expect(blocking.blpop).toHaveBeenCalledWith('service:commands', 1);
  });

  it('never sends a zero timeout', async () => {
    const { store, blocking } = createStore();
    blocking.blpop.mockResolvedValue(null);

    await store.popHead('service:commands', 0);
    expect(blocking.blpop).toHaveBeenCalledWith('service:commands', 1);
  });

  it('rounds fractional timeouts up to whole seconds', async () => {
    const { store, blocking } = createStore();
    blocking.blpop.mockResolvedValue(null);

    await store.popHead('service:commands', 1500);
    expect(blocking.blpop).toHaveBeenCalledWith('service:commands', 2);
  });

  it('appends to the tail on the command connection', async () => {
    const { store, client, blocking } = createStore();
    client.rpush.mockResolvedValue(3);

    await expect(store.pushTail('poppit:notifications', '{"repo":"org/app"}')).resolves.toBe(3);
    expect(client.rpush).toHaveBeenCalledWith('poppit:notifications', '{"repo":"org/app"}');
    expect(blocking.rpush).not.toHaveBeenCalled();
  });

  it('propagates append failures', async () => {
    const { store, client } = createStore();
    client.rpush.mockRejectedValue(new Error('Connection is closed.'));

    await expect(store.pushTail('q', 'x')).rejects.toThrow('Connection is closed.');
  });

  it('pings through the command connection', async () => {
    const { store, client } = createStore();
    await store.ping();
    expect(client.ping).toHaveBeenCalledTimes(1);
  });

  it('drops the blocking connection and quits the command connection on close', async () => {
    const { store, client, blocking } = createStore();
    await store.close();
    expect(blocking.disconnect).toHaveBeenCalledTimes(1);
    expect(client.quit).toHaveBeenCalledTimes(1);
  });
});
