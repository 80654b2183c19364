import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

/**
 * RedisStoreService — thin wrapper around the ioredis connection for
 * expiring markers.
 *
 * Key naming convention: {domain}:{id}:{type}, e.g. `token:<jti>:revoked`.
 */
@Injectable()
export class RedisStoreService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisStoreService.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  /**
   * Stores `value` under `key`, expiring after `ttlSeconds`.
   * A non-positive TTL is a no-op: the marker would already be expired.
   */
  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    const ttl = Math.ceil(ttlSeconds);
    if (ttl <= 0) {
      this.logger.debug(`Skipping "${key}": TTL ${ttlSeconds}s already elapsed`);
      return;
    }

    await this.client.set(key, value, 'EX', ttl);
    this.logger.debug(`Stored "${key}" for ${ttl}s`);
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.client.exists(key);
    return count > 0;
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
