import { CatalogListing } from '../modules/catalog/adapters/catalog-client.interface';
import { DetailRecord, RawMovie, RawServer } from '../modules/sync/dto/canonical.dto';

export function makeMovie(slug: string, overrides: Partial<RawMovie> = {}): RawMovie {
  return {
    _id: `id-${slug}`,
    name: `Movie ${slug}`,
    origin_name: `Original ${slug}`,
    slug,
    content: `Synopsis of ${slug}`,
    type: 'series',
    year: 2024,
    poster_url: `https://img.test/${slug}-poster.jpg`,
    thumb_url: `https://img.test/${slug}-thumb.jpg`,
    trailer_url: '',
    category: [{ id: 'cat-1', name: 'Action', slug: 'action' }],
    country: [{ id: 'cty-1', name: 'Japan', slug: 'japan' }],
    ...overrides,
  };
}

export function makeServer(serverName: string, slug: string, episodes: number): RawServer {
  return {
    server_name: serverName,
    server_data: Array.from({ length: episodes }, (_, i) => ({
      name: `Tap ${i + 1}`,
      slug: `tap-${i + 1}`,
      filename: `${slug}-tap-${i + 1}`,
      link_embed: `https://player.test/${slug}/${i + 1}`,
      link_m3u8: `https://cdn.test/${slug}/${i + 1}/index.m3u8`,
    })),
  };
}

export function makeDetail(
  slug: string,
  options: { movie?: Partial<RawMovie>; episodes?: RawServer[] } = {},
): DetailRecord {
  return {
    status: true,
    msg: '',
    movie: makeMovie(slug, options.movie),
    episodes: options.episodes ?? [makeServer('Vietsub #1', slug, 2)],
  };
}

export function makeListing(
  slugs: string[],
  options: { page?: number; totalPages?: number; status?: boolean } = {},
): CatalogListing {
  const page = options.page ?? 1;
  return {
    status: options.status ?? true,
    items: slugs.map((slug) => ({ id: `id-${slug}`, slug, name: `Movie ${slug}` })),
    pagination: { currentPage: page, totalPages: options.totalPages ?? 1 },
  };
}
