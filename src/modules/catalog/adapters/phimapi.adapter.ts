import axios from 'axios';
import { DetailRecord } from '../../sync/dto/canonical.dto';
import { FetchError, describeError } from '../../sync/sync.errors';
import { CatalogClient, CatalogItem, CatalogListing } from './catalog-client.interface';

interface RawListingItem {
  _id?: string;
  id?: string;
  slug?: string;
  name?: string;
}

interface RawListingResponse {
  status?: boolean;
  items?: RawListingItem[];
  data?: { items?: RawListingItem[] };
  pagination?: {
    currentPage?: number;
    totalPages?: number;
  };
}

export interface PhimapiClientOptions {
  timeoutMs: number;
  userAgent: string;
}

export class PhimapiCatalogClient implements CatalogClient {
  constructor(
    private readonly baseUrl: string,
    private readonly listPath: string,
    private readonly detailPath: string,
    private readonly options: PhimapiClientOptions,
  ) {}

  async listUpdated(page: number, pageSize: number): Promise<CatalogListing> {
    const url = this.buildUrl(this.listPath, { page, limit: pageSize });
    const data = await this.getJson<RawListingResponse>(url);
    const rawItems = data.items || data.data?.items || [];

    const items: CatalogItem[] = [];
    for (const item of rawItems) {
      const id = item?._id || item?.id;
      if (!id || !item.slug) continue;
      items.push({ id: String(id), slug: item.slug, name: item.name ?? null });
    }

    return {
      status: data.status === true,
      items,
      pagination: {
        currentPage: data.pagination?.currentPage ?? page,
        totalPages: data.pagination?.totalPages ?? page,
      },
    };
  }

  async fetchDetail(slug: string): Promise<DetailRecord> {
    const url = this.buildUrl(this.detailPath, { slug });
    return this.getJson<DetailRecord>(url);
  }

  private async getJson<T extends object>(url: string): Promise<T> {
    let data: T;
    try {
      const res = await axios.get<T>(url, {
        timeout: this.options.timeoutMs,
        headers: { 'User-Agent': this.options.userAgent },
      });
      data = res.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? (error.response?.status ?? null) : null;
      throw new FetchError(`GET ${url} failed: ${describeError(error)}`, url, status, error);
    }

    if (typeof data !== 'object' || data === null) {
      throw new FetchError(`GET ${url} returned a non-JSON body`, url);
    }
    return data;
  }

  private buildUrl(path: string, params: Record<string, string | number>) {
    const replaced = path.replace(/\{(\w+)\}/g, (_, key: string) => encodeURIComponent(String(params[key] ?? '')));
    const url = new URL(replaced, this.baseUrl);
    return url.toString();
  }
}
