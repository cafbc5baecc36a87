import { Redis } from 'ioredis';

export type RedisClient = Redis;

export interface RedisClientOptions {
  url: string;
  maxRetriesPerRequest?: number;
  lazyConnect?: boolean;
  log?: (level: 'error' | 'warn' | 'info', data: Record<string, unknown>) => void;
}

/**
 * Create an ioredis client for the snapshot store.
 *
 * redis:// and rediss:// (TLS) URLs; AUTH comes from the URL userinfo.
 * Requests fail fast after `maxRetriesPerRequest` so a dead Redis degrades
 * resolution to direct computation instead of stalling it.
 */
export function createRedisClient(opts: RedisClientOptions): RedisClient {
  const client = new Redis(opts.url, {
    maxRetriesPerRequest: opts.maxRetriesPerRequest ?? 1,
    lazyConnect: opts.lazyConnect ?? false,
    retryStrategy(times: number) {
      // 100ms, 200ms, 300ms, ... capped at 5s
      return Math.min(times * 100, 5_000);
    },
    reconnectOnError(err: Error) {
      // READONLY: replica promoted during failover
      return err.message.includes('READONLY');
    },
  });

  client.on('error', (err: Error) => {
    opts.log?.('error', { event: 'redis_error', message: err.message });
  });

  client.on('connect', () => {
    opts.log?.('info', { event: 'redis_connect' });
  });

  client.on('reconnecting', () => {
    opts.log?.('warn', { event: 'redis_reconnecting' });
  });

  return client;
}

/**
 * PING round trip in ms.
 * @throws Error when Redis answers anything but PONG
 */
export async function checkRedisHealth(client: RedisClient): Promise<number> {
  const start = Date.now();
  const result = await client.ping();
  if (result !== 'PONG') {
    throw new Error(`Redis PING returned unexpected: ${result}`);
  }
  return Date.now() - start;
}

export async function closeRedisClient(client: RedisClient): Promise<void> {
  await client.quit();
}
