import {
  DynamicModule,
  FactoryProvider,
  Module,
  ModuleMetadata,
} from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';
import { RedisStoreService } from './redis-store.service';

export interface RedisModuleOptions {
  host: string;
  port: number;
}

export interface RedisModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider<RedisModuleOptions>['inject'];
  useFactory: FactoryProvider<RedisModuleOptions>['useFactory'];
}

const REDIS_MODULE_OPTIONS = 'REDIS_MODULE_OPTIONS';

/**
 * RedisModule — async dynamic module providing one ioredis connection and
 * the RedisStoreService on top of it.
 *
 * Usage:
 *   RedisModule.forRootAsync({
 *     inject: [appConfig.KEY],
 *     useFactory: (config: AppConfig) => config.redis,
 *   })
 */
@Module({})
export class RedisModule {
  static forRootAsync(options: RedisModuleAsyncOptions): DynamicModule {
    const optionsProvider: FactoryProvider<RedisModuleOptions> = {
      provide: REDIS_MODULE_OPTIONS,
      inject: options.inject ?? [],
      useFactory: options.useFactory,
    };

    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [REDIS_MODULE_OPTIONS],
      useFactory: ({ host, port }: RedisModuleOptions): Redis => {
        return new Redis({
          host,
          port,
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: false,
        });
      },
    };

    return {
      module: RedisModule,
      imports: options.imports ?? [],
      providers: [optionsProvider, clientProvider, RedisStoreService],
      exports: [RedisStoreService],
      global: false,
    };
  }
}
