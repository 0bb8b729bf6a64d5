import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { StoreReadError, StoreWriteError, describeError } from '../sync/sync.errors';
import { DEFAULT_KEY_PREFIX, KeyDeriver } from '../sync/keys';
import { IndexedKeyValueStore, REDIS_CLIENT } from './key-value-store.interface';

@Injectable()
export class RedisStore implements IndexedKeyValueStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisStore.name);
  private readonly indexKey: string;

  constructor(
    @Inject(REDIS_CLIENT) private readonly client: Redis,
    private readonly configService: ConfigService,
  ) {
    const prefix = this.configService.get<string>('redis.keyPrefix') ?? DEFAULT_KEY_PREFIX;
    this.indexKey = new KeyDeriver(prefix).indexKey();
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.client.get(key);
    } catch (error) {
      throw new StoreReadError(key, error);
    }
  }

  async set(key: string, value: string): Promise<void> {
    let results: [Error | null, unknown][] | null;
    try {
      results = await this.client.multi().set(key, value).sadd(this.indexKey, key).exec();
    } catch (error) {
      throw new StoreWriteError(key, error);
    }

    if (!results) {
      throw new StoreWriteError(key, new Error('transaction discarded'));
    }
    const failed = results.find(([err]) => err !== null);
    if (failed) {
      throw new StoreWriteError(key, failed[0]);
    }
  }

  async indexedKeys(): Promise<string[]> {
    try {
      return await this.client.smembers(this.indexKey);
    } catch (error) {
      throw new StoreReadError(this.indexKey, error);
    }
  }

  async onModuleDestroy() {
    if (this.client.status === 'end') return;
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn(`[STORE] quit failed: ${describeError(error)}`);
      this.client.disconnect();
    }
  }
}
