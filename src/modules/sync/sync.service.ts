import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import {
  CATALOG_CLIENT,
  CatalogClient,
  CatalogItem,
  CatalogListing,
} from '../catalog/adapters/catalog-client.interface';
import { KEY_VALUE_STORE, KeyValueStore } from '../store/key-value-store.interface';
import { compareRecords, decodeDocument } from './diff';
import {
  CanonicalRecord,
  DetailRecord,
  ItemOutcome,
  StopReason,
  SyncRunSummary,
} from './dto/canonical.dto';
import { DEFAULT_KEY_PREFIX, KeyDeriver } from './keys';
import { StoreWriteError, ValidationError, describeError } from './sync.errors';
import { buildCanonical } from './utils/normalize';

export interface SyncOptions {
  pageSize: number;
  detailDelayMs: number;
  pageDelayMs: number;
  maxPages: number;
  stopOnUnchanged: boolean;
}

export interface ItemResult {
  outcome: ItemOutcome;
  streamsWritten: number;
}

interface WalkResult {
  outcome: SyncRunSummary['outcome'];
  stopReason: StopReason;
  pages: number;
}

type RunCounters = Record<ItemOutcome, number> & { streamsWritten: number };

@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  private readonly keys: KeyDeriver;
  private readonly options: SyncOptions;

  constructor(
    @Inject(CATALOG_CLIENT) private readonly catalog: CatalogClient,
    @Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore,
    private readonly configService: ConfigService,
  ) {
    this.keys = new KeyDeriver(this.configService.get<string>('redis.keyPrefix') ?? DEFAULT_KEY_PREFIX);
    this.options = {
      pageSize: this.configService.get<number>('catalog.pageSize') ?? 3,
      // Pacing is never disabled outright.
      detailDelayMs: Math.max(1, this.configService.get<number>('sync.detailDelayMs') ?? 2000),
      pageDelayMs: Math.max(1, this.configService.get<number>('sync.pageDelayMs') ?? 1000),
      maxPages: this.configService.get<number>('sync.maxPages') ?? 0,
      stopOnUnchanged: this.configService.get<boolean>('sync.stopOnUnchanged') ?? true,
    };
  }

  async run(): Promise<SyncRunSummary> {
    const startedAt = new Date().toISOString();
    const counters: RunCounters = { cached: 0, skipped: 0, failed: 0, streamsWritten: 0 };
    this.logger.log(`[SYNC] start at ${startedAt}`);

    const walk = await this.walkPages(counters);

    const summary: SyncRunSummary = {
      ...walk,
      cached: counters.cached,
      skipped: counters.skipped,
      failed: counters.failed,
      streamsWritten: counters.streamsWritten,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    const line =
      `[SYNC] done at ${summary.finishedAt} outcome=${summary.outcome} stop=${summary.stopReason} ` +
      `pages=${summary.pages} cached=${summary.cached} skipped=${summary.skipped} ` +
      `failed=${summary.failed} streams=${summary.streamsWritten}`;
    if (summary.outcome === 'aborted') {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }
    return summary;
  }

  /**
   * Fetches one detail payload and reconciles it. Every failure is contained
   * here; the caller only ever sees the item's outcome.
   */
  async syncItem(item: CatalogItem): Promise<ItemResult> {
    let detail: DetailRecord;
    try {
      detail = await this.catalog.fetchDetail(item.slug);
    } catch (error) {
      this.logger.warn(`[SYNC] detail failed slug=${item.slug} reason=${describeError(error)}`);
      return { outcome: 'failed', streamsWritten: 0 };
    } finally {
      await sleep(this.options.detailDelayMs);
    }

    if (detail?.status !== true) {
      this.logger.warn(`[SYNC] detail rejected upstream slug=${item.slug} msg=${detail?.msg ?? ''}`);
      return { outcome: 'failed', streamsWritten: 0 };
    }

    try {
      return await this.reconcile(detail);
    } catch (error) {
      this.logger.error(
        `[SYNC] reconcile crashed slug=${item.slug} reason=${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { outcome: 'failed', streamsWritten: 0 };
    }
  }

  async reconcile(detail: DetailRecord): Promise<ItemResult> {
    let record: CanonicalRecord;
    try {
      record = buildCanonical(detail);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.warn(`[SYNC] invalid record ${error.message}`);
        return { outcome: 'failed', streamsWritten: 0 };
      }
      throw error;
    }

    const { _id: id, slug } = record.movie;
    const primaryKey = this.keys.primaryKey(slug);
    const diff = compareRecords(record, await this.readDocument(primaryKey));

    if (diff === 'unchanged') {
      this.logger.log(`[SYNC] skipped unchanged slug=${slug}`);
      return { outcome: 'skipped', streamsWritten: 0 };
    }

    try {
      await this.store.set(primaryKey, JSON.stringify(record));
      await this.store.set(this.keys.aliasKey(id), slug);
    } catch (error) {
      if (error instanceof StoreWriteError) {
        this.logger.warn(`[SYNC] write failed slug=${slug} reason=${error.message}`);
        return { outcome: 'failed', streamsWritten: 0 };
      }
      throw error;
    }
    this.logger.log(`[SYNC] cached ${diff} slug=${slug}`);

    let streamsWritten = 0;
    let streamFailures = 0;
    for (const entry of this.keys.streamKeys(id, record.episodes)) {
      const existing = await this.readDocument(entry.key);
      if (compareRecords(entry.descriptor, existing) === 'unchanged') continue;

      try {
        await this.store.set(entry.key, JSON.stringify(entry.descriptor));
        streamsWritten++;
      } catch (error) {
        if (!(error instanceof StoreWriteError)) throw error;
        streamFailures++;
        this.logger.warn(`[SYNC] stream write failed stream=${entry.streamId} reason=${error.message}`);
      }
    }

    this.logger.log(`[SYNC] updated episodes slug=${slug} streams=${streamsWritten}`);
    return { outcome: streamFailures > 0 ? 'failed' : 'cached', streamsWritten };
  }

  private async walkPages(counters: RunCounters): Promise<WalkResult> {
    let page = 1;

    while (true) {
      if (page > 1) {
        await sleep(this.options.pageDelayMs);
      }

      const listing = await this.fetchListing(page);
      if (!listing) {
        return page === 1
          ? { outcome: 'aborted', stopReason: 'listing-failed', pages: 0 }
          : { outcome: 'completed', stopReason: 'listing-failed', pages: page - 1 };
      }
      if (!listing.items.length) {
        return { outcome: 'completed', stopReason: 'empty-page', pages: page };
      }

      for (const item of listing.items) {
        const result = await this.syncItem(item);
        counters[result.outcome]++;
        counters.streamsWritten += result.streamsWritten;

        // Listings are freshness-ordered: the first unchanged item means the rest were synced before.
        if (result.outcome === 'skipped' && this.options.stopOnUnchanged) {
          return { outcome: 'completed', stopReason: 'unchanged-item', pages: page };
        }
      }

      if (page >= listing.pagination.totalPages) {
        return { outcome: 'completed', stopReason: 'last-page', pages: page };
      }
      if (this.options.maxPages > 0 && page >= this.options.maxPages) {
        return { outcome: 'completed', stopReason: 'max-pages', pages: page };
      }
      page++;
    }
  }

  private async fetchListing(page: number): Promise<CatalogListing | null> {
    let listing: CatalogListing;
    try {
      listing = await this.catalog.listUpdated(page, this.options.pageSize);
    } catch (error) {
      this.reportListingFailure(page, describeError(error));
      return null;
    }

    if (!listing.status) {
      this.reportListingFailure(page, 'upstream status false');
      return null;
    }
    this.logger.log(
      `[SYNC] page=${page}/${listing.pagination.totalPages} items=${listing.items.length}`,
    );
    return listing;
  }

  private reportListingFailure(page: number, reason: string) {
    if (page === 1) {
      this.logger.error(`[SYNC] first listing page failed, aborting run reason=${reason}`);
    } else {
      this.logger.warn(`[SYNC] listing page=${page} failed, treating as end of data reason=${reason}`);
    }
  }

  // A read or decode failure is never fatal: the key is treated as absent and rewritten.
  private async readDocument(key: string): Promise<unknown> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error) {
      this.logger.warn(`[SYNC] read failed key=${key}, treating as absent reason=${describeError(error)}`);
      return null;
    }
    if (raw === null) return null;

    try {
      return decodeDocument(raw);
    } catch (error) {
      this.logger.warn(`[SYNC] corrupt cache key=${key}, treating as absent reason=${describeError(error)}`);
      return null;
    }
  }
}
