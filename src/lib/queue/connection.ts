/**
 * Redis settings shared by the receipt queue and its worker, plus the
 * PING check the worker runs before it starts consuming.
 */

import { getConfig } from '@/lib/config';

export function getRedisConnection(): { url: string } {
  return { url: getConfig().REDIS_URL };
}

/** True when Redis answers PING within the 3 s connect timeout */
export async function checkRedisHealth(): Promise<boolean> {
  const { default: Redis } = await import('ioredis');
  const client = new Redis(getRedisConnection().url, {
    connectTimeout: 3000,
    maxRetriesPerRequest: 0,
    lazyConnect: true,
  });

  try {
    await client.connect();
    const pong = await client.ping();
    return pong === 'PONG';
  } catch (error) {
    console.warn('[Queue] Redis unreachable:', error instanceof Error ? error.message : error);
    return false;
  } finally {
    client.disconnect();
  }
}
