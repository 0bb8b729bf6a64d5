import { registerAs } from '@nestjs/config';
import { toInt } from './env.utils';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 Chrome/114.0.0.0 Safari/537.36';

export default registerAs('catalog', () => ({
  baseUrl: process.env.CATALOG_BASE_URL || 'https://phimapi.com',
  listPath: process.env.CATALOG_LIST_PATH || '/danh-sach/phim-moi-cap-nhat?page={page}&limit={limit}',
  detailPath: process.env.CATALOG_DETAIL_PATH || '/phim/{slug}',
  pageSize: toInt(process.env.CATALOG_PAGE_SIZE, 3),
  timeoutMs: toInt(process.env.CATALOG_TIMEOUT_MS, 10000),
  userAgent: process.env.CATALOG_USER_AGENT || DEFAULT_USER_AGENT,
}));
