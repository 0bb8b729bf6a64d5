import { registerAs } from '@nestjs/config';
import { toBool, toInt } from './env.utils';

export default registerAs('sync', () => ({
  detailDelayMs: toInt(process.env.SYNC_DETAIL_DELAY_MS, 2000),
  pageDelayMs: toInt(process.env.SYNC_PAGE_DELAY_MS, 1000),
  maxPages: toInt(process.env.SYNC_MAX_PAGES, 0),
  stopOnUnchanged: toBool(process.env.SYNC_STOP_ON_UNCHANGED, true),
  localCache: toBool(process.env.SYNC_LOCAL_CACHE, true),
  warmCache: toBool(process.env.SYNC_WARM_CACHE, true),
}));
