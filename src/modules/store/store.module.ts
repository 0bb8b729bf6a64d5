import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import { describeError } from '../sync/sync.errors';
import { CachedStore } from './cached.store';
import {
  IndexedKeyValueStore,
  KEY_VALUE_STORE,
  KeyValueStore,
  REDIS_CLIENT,
} from './key-value-store.interface';
import { RedisStore } from './redis.store';

const CONNECTION_OPTIONS: RedisOptions = {
  lazyConnect: true,
  maxRetriesPerRequest: 2,
  connectTimeout: 10000,
};

function createRedisClient(config: ConfigService): Redis {
  const url = config.get<string>('redis.url');
  if (url) {
    return new Redis(url, CONNECTION_OPTIONS);
  }
  return new Redis({
    ...CONNECTION_OPTIONS,
    host: config.get<string>('redis.host'),
    port: config.get<number>('redis.port'),
    password: config.get<string>('redis.password'),
  });
}

/**
 * Wraps the store in the local cache when enabled and preloads it, so callers
 * never know whether a read is served from memory.
 */
export async function createKeyValueStore(
  store: IndexedKeyValueStore,
  config: ConfigService,
): Promise<KeyValueStore> {
  if (!config.get<boolean>('sync.localCache')) return store;

  const cached = new CachedStore(store);
  if (config.get<boolean>('sync.warmCache')) {
    const logger = new Logger('StoreModule');
    try {
      const loaded = await cached.warm();
      logger.log(`[STORE] warmed local cache entries=${loaded}`);
    } catch (error) {
      logger.warn(`[STORE] cache warm-up skipped reason=${describeError(error)}`);
    }
  }
  return cached;
}

@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: createRedisClient,
    },
    RedisStore,
    {
      provide: KEY_VALUE_STORE,
      inject: [RedisStore, ConfigService],
      useFactory: createKeyValueStore,
    },
  ],
  exports: [REDIS_CLIENT, KEY_VALUE_STORE],
})
export class StoreModule {}
