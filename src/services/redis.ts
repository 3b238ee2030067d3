import Redis from 'ioredis';
import { logger } from '../utils/logger';

export class RedisService {
  private client: Redis;

  constructor(redisUrl: string) {
    this.client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: false,
    });

    this.client.on('connect', () => {
      logger.info('Redis client connected');
    });

    this.client.on('error', (error) => {
      logger.error({ error }, 'Redis client error');
    });
  }

  async mget(keys: string[]): Promise<Array<string | null>> {
    if (keys.length === 0) return [];
    return this.client.mget(keys);
  }

  /** Write several keys with one round trip, each expiring after `ttl` seconds. */
  async msetWithTtl(entries: Array<[string, string]>, ttl: number): Promise<void> {
    if (entries.length === 0) return;
    const pipeline = this.client.pipeline();
    for (const [key, value] of entries) {
      pipeline.set(key, value, 'EX', ttl);
    }
    const results = await pipeline.exec();
    const failed = results?.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw failed[0];
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    logger.info('Redis connection closed');
  }
}
