export interface RawEpisode {
  name?: string | null;
  slug?: string;
  filename?: string | null;
  link_embed?: string | null;
  link_m3u8?: string | null;
  [key: string]: unknown;
}

export interface RawServer {
  server_name?: string;
  server_data?: RawEpisode[];
  [key: string]: unknown;
}

export interface RawMovie {
  _id?: string;
  name?: string;
  slug?: string;
  origin_name?: string;
  content?: string;
  trailer_url?: string;
  poster_url?: string;
  thumb_url?: string;
  category?: unknown;
  country?: unknown;
  [key: string]: unknown;
}

/** Detail payload as returned by the upstream `/phim/{slug}` endpoint. */
export interface DetailRecord {
  status?: boolean;
  msg?: string;
  message?: string;
  movie?: RawMovie | null;
  episodes?: RawServer[] | null;
}

export interface ValidMovie extends RawMovie {
  _id: string;
  name: string;
  slug: string;
  content: string;
}

export interface CanonicalRecord {
  status: boolean;
  msg: string;
  movie: ValidMovie;
  episodes: RawServer[];
}

export interface StreamLink {
  id: string;
  name: string;
  type: 'hls';
  default: false;
  url: string;
}

export interface StreamDescriptor {
  stream_links: StreamLink[];
}

export interface StreamEntry {
  streamId: string;
  key: string;
  descriptor: StreamDescriptor;
}

export type ItemOutcome = 'cached' | 'skipped' | 'failed';

export type StopReason =
  | 'unchanged-item'
  | 'last-page'
  | 'empty-page'
  | 'listing-failed'
  | 'max-pages';

export interface SyncRunSummary {
  outcome: 'completed' | 'aborted';
  stopReason: StopReason;
  pages: number;
  cached: number;
  skipped: number;
  failed: number;
  streamsWritten: number;
  startedAt: string;
  finishedAt: string;
}
