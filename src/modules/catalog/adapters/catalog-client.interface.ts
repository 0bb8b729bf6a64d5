import { DetailRecord } from '../../sync/dto/canonical.dto';

export const CATALOG_CLIENT = Symbol('CATALOG_CLIENT');

export interface CatalogItem {
  id: string;
  slug: string;
  name?: string | null;
}

export interface CatalogListing {
  status: boolean;
  items: CatalogItem[];
  pagination: {
    currentPage: number;
    totalPages: number;
  };
}

/** Both calls reject with FetchError on transport failure or a non-2xx response. */
export interface CatalogClient {
  listUpdated(page: number, pageSize: number): Promise<CatalogListing>;
  fetchDetail(slug: string): Promise<DetailRecord>;
}
