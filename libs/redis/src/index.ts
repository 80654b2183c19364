/**
 * @user-service/redis
 *
 * Shared Redis key/value infrastructure.
 *
 * Exports:
 *   - RedisModule.forRootAsync() — import into any NestJS module
 *   - RedisStoreService          — expiring keys and existence checks
 *   - REDIS_CLIENT               — ioredis injection token
 */
export { RedisModule } from './redis.module';
export type {
  RedisModuleOptions,
  RedisModuleAsyncOptions,
} from './redis.module';
export { RedisStoreService } from './redis-store.service';
export { REDIS_CLIENT } from './redis.constants';
