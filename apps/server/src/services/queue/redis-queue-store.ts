import { Redis } from 'ioredis';
import type { QueueStore } from './queue-store.js';
import { logger } from '../../lib/logger.js';

/** Connection settings for {@link RedisQueueStore}. */
export interface RedisQueueStoreOptions {
  /** `host:port` address of the Redis server. */
  addr: string;
  password?: string;
  db?: number;
}

/** Split a `host:port` address. Throws on anything else. */
export function parseRedisAddress(addr: string): { host: string; port: number } {
  const separator = addr.lastIndexOf(':');
  const host = addr.slice(0, separator);
  const port = Number(addr.slice(separator + 1));
  if (separator <= 0 || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid Redis address: ${addr}`);
  }
  return { host, port };
}

/**
 * Redis list-backed queue store.
 *
 * Blocking pops run on a dedicated duplicate connection. Redis serializes
 * commands per connection, so sharing one would stall every RPUSH behind a
 * pending BLPOP.
 */
export class RedisQueueStore implements QueueStore {
  private readonly client: Redis;
  private readonly blocking: Redis;

  constructor(options: RedisQueueStoreOptions) {
    const { host, port } = parseRedisAddress(options.addr);
    this.client = new Redis({ host, port, password: options.password, db: options.db ?? 0 });
    this.blocking = this.client.duplicate();

    this.client.on('error', (err: Error) => {
      logger.warn(`[Redis] Connection error: ${err.message}`);
    });
    this.blocking.on('error', (err: Error) => {
      logger.warn(`[Redis] Blocking connection error: ${err.message}`);
    });
  }

  async popHead(queue: string, timeoutMs: number): Promise<string | null> {
    // Whole seconds for servers before Redis 6; 0 would block forever
    const timeoutSeconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const result = await this.blocking.blpop(queue, timeoutSeconds);
    if (result === null) return null;
    // Reply is [key, element]
    return result[1];
  }

  async pushTail(queue: string, payload: string): Promise<number> {
    return this.client.rpush(queue, payload);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {
    this.blocking.disconnect();
    await this.client.quit();
  }
}
