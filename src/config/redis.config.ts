import { registerAs } from '@nestjs/config';
import { toInt } from './env.utils';

export default registerAs('redis', () => ({
  url: process.env.REDIS_URL || undefined,
  host: process.env.REDIS_HOST || '127.0.0.1',
  port: toInt(process.env.REDIS_PORT, 6379),
  password: process.env.REDIS_PASSWORD || undefined,
  keyPrefix: process.env.REDIS_KEY_PREFIX || 'movieapp:',
}));
