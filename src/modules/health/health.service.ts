import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { DEFAULT_KEY_PREFIX } from '../sync/keys';
import { describeError } from '../sync/sync.errors';
import { REDIS_CLIENT } from '../store/key-value-store.interface';

const SENTINEL_TTL_SECONDS = 60;

export interface HealthReport {
  status: 'ok' | 'down';
  store: 'ok' | 'down';
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @Inject(REDIS_CLIENT) private readonly client: Redis,
    private readonly configService: ConfigService,
  ) {}

  /** Round-trips a short-lived sentinel key through the store. */
  async check(): Promise<HealthReport> {
    const prefix = this.configService.get<string>('redis.keyPrefix') ?? DEFAULT_KEY_PREFIX;
    const key = `${prefix}health_sentinel`;
    const expected = JSON.stringify({ sentinel: 'value' });

    let storeStatus: HealthReport['store'] = 'ok';
    try {
      await this.client.set(key, expected, 'EX', SENTINEL_TTL_SECONDS);
      const value = await this.client.get(key);
      if (value !== expected) {
        this.logger.error(`[STORE] sentinel mismatch key=${key}`);
        storeStatus = 'down';
      }
    } catch (error) {
      this.logger.error(`[STORE] connection failed: ${describeError(error)}`);
      storeStatus = 'down';
    }

    if (storeStatus === 'ok') {
      this.logger.log('[STORE] connection test successful');
    }
    return { status: storeStatus, store: storeStatus };
  }
}
