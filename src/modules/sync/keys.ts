import { RawServer, StreamEntry } from './dto/canonical.dto';

export const DEFAULT_KEY_PREFIX = 'movieapp:';
export const STREAM_SERVER_WINDOW = 20;

/**
 * Every store key the job writes is built here. The read-facing service looks
 * documents up under the same names, so these formats are a contract.
 */
export class KeyDeriver {
  constructor(private readonly prefix: string = DEFAULT_KEY_PREFIX) {}

  primaryKey(slug: string): string {
    return `${this.prefix}movie_${slug}`;
  }

  aliasKey(id: string): string {
    return `${this.prefix}id_to_slug_${id}`;
  }

  streamKey(streamId: string): string {
    return `${this.prefix}stream_detail_${streamId}`;
  }

  indexKey(): string {
    return `${this.prefix}precached_keys`;
  }

  // Only the trailing window of servers is indexed; server indices restart at 0 inside it.
  streamKeys(id: string, episodes: RawServer[]): StreamEntry[] {
    const entries: StreamEntry[] = [];
    const window = episodes.slice(-STREAM_SERVER_WINDOW);

    window.forEach((server, serverIndex) => {
      const items = Array.isArray(server.server_data) ? server.server_data : [];
      items.forEach((episode, episodeIndex) => {
        const streamId = `${id}_${serverIndex}_${episodeIndex}`;
        entries.push({
          streamId,
          key: this.streamKey(streamId),
          descriptor: {
            stream_links: [
              {
                id: `default_${streamId}`,
                name: episode.name ?? `Episode ${episodeIndex + 1}`,
                type: 'hls',
                default: false,
                url: episode.link_m3u8 ?? '',
              },
            ],
          },
        });
      });
    });

    return entries;
  }
}
