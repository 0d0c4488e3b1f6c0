/**
 * =============================================================================
 * REDIS SERVICE - Shared Redis connections for the dispatch core
 * =============================================================================
 *
 * WHAT THIS DOES:
 * - Opens the command connection used for distributed trip locks
 * - Hands out the pub/sub client pair for @socket.io/redis-adapter
 * - Closes everything on shutdown
 *
 * Only used when REDIS_ENABLED=true. Without Redis the core runs on the
 * in-process registry and lock.
 *
 * USAGE:
 * ```typescript
 * await redisService.initialize(config.redis.url);
 * const acquired = await redisService.acquireLock('trip:123', holderId, 5000);
 * await redisService.releaseLock('trip:123', holderId);
 * ```
 * =============================================================================
 */

import Redis from 'ioredis';
import { logger } from './logger.service';

export interface LockBackend {
  acquireLock(lockKey: string, holderId: string, ttlMs: number): Promise<boolean>;
  releaseLock(lockKey: string, holderId: string): Promise<boolean>;
}

const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
else
  return 0
end
`;

const MAX_RETRIES = 10;
const RETRY_DELAY_MS = 500;
const CONNECT_TIMEOUT_MS = 10000;

function createClient(url: string): Redis {
  const useTls = url.startsWith('rediss://');
  return new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    connectTimeout: CONNECT_TIMEOUT_MS,
    retryStrategy: (times: number) => {
      if (times > MAX_RETRIES) {
        logger.error(`[Redis] Max retries (${MAX_RETRIES}) exceeded`);
        return null;
      }
      const delay = Math.min(times * RETRY_DELAY_MS, 10000);
      logger.warn(`[Redis] Retry ${times}/${MAX_RETRIES} in ${delay}ms`);
      return delay;
    },
    tls: useTls ? { rejectUnauthorized: false } : undefined
  });
}

class RedisService implements LockBackend {
  private client: Redis | null = null;
  private url: string | null = null;
  private readonly adapterClients: Redis[] = [];

  async initialize(url: string): Promise<void> {
    if (this.client) return;

    const client = createClient(url);
    client.on('error', (err: Error) => {
      logger.error(`[Redis] Error: ${err.message}`);
    });
    client.on('close', () => {
      logger.warn('[Redis] Connection closed');
    });

    await client.connect();
    this.client = client;
    this.url = url;
    logger.info('🔴 [Redis] Connected');
  }

  isConnected(): boolean {
    return this.client?.status === 'ready';
  }

  /**
   * Publisher and subscriber connections for the socket.io Redis adapter
   */
  async createAdapterClients(): Promise<{ pubClient: Redis; subClient: Redis }> {
    if (!this.url) {
      throw new Error('RedisService not initialized');
    }

    const pubClient = createClient(this.url);
    const subClient = pubClient.duplicate();
    for (const c of [pubClient, subClient]) {
      c.on('error', (err: Error) => logger.error(`[Redis] Adapter client error: ${err.message}`));
    }

    await Promise.all([pubClient.connect(), subClient.connect()]);
    this.adapterClients.push(pubClient, subClient);
    return { pubClient, subClient };
  }

  async acquireLock(lockKey: string, holderId: string, ttlMs: number): Promise<boolean> {
    const result = await this.requireClient().set(`lock:${lockKey}`, holderId, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  /**
   * Only the holder can release (atomic check-and-delete)
   */
  async releaseLock(lockKey: string, holderId: string): Promise<boolean> {
    const result = await this.requireClient().eval(RELEASE_SCRIPT, 1, `lock:${lockKey}`, holderId);
    return result === 1;
  }

  async disconnect(): Promise<void> {
    const clients = [...this.adapterClients, ...(this.client ? [this.client] : [])];
    this.adapterClients.length = 0;
    this.client = null;
    await Promise.all(clients.map(c => c.quit()));
    logger.info('[Redis] Disconnected');
  }

  private requireClient(): Redis {
    if (!this.client) {
      throw new Error('RedisService not initialized');
    }
    return this.client;
  }
}

export const redisService = new RedisService();
