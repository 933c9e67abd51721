import { PlaylistMeta, PlaylistProvider, PlaylistItemCandidate } from './types';
import { PlaylistContext } from '../../types/playlist';
import { analyzeUrl, isPlaylistUrl, resolvePlaylistReference } from '../../utils/providers';
import { logEvent, logWarning, logError } from '../../utils/logger';
import { Playlist } from '../playlist/Playlist';
import { PaginationDriver } from '../playlist/PaginationDriver';
import { VideoAccumulator } from '../playlist/VideoAccumulator';

export class YouTubePlaylistProvider implements PlaylistProvider {
  constructor(private readonly context: PlaylistContext) {}

  supports(url: string): boolean {
    return isPlaylistUrl(url);
  }

  async getMeta(url: string): Promise<PlaylistMeta | null> {
    const listId = analyzeUrl(url).listId;
    if (!listId) {
      logWarning('yt_playlist_get_meta_missing_list', { url });
      return null;
    }
    logEvent('yt_playlist_get_meta_started', { listId });
    try {
      const result = await Playlist.build(listId, this.context);
      const { playlist } = result;
      if (result.status === 'interrupted') {
        logWarning('yt_playlist_get_meta_partial', { listId, entries: playlist.length });
      }
      const meta: PlaylistMeta = { id: playlist.id, total: playlist.length };
      if (playlist.title !== null) meta.title = playlist.title;
      if (playlist.lastUpdated !== null) meta.lastUpdated = playlist.lastUpdated;
      return meta;
    } catch (error) {
      logError('yt_playlist_get_meta_failed', error instanceof Error ? error : undefined, { listId });
      return null;
    }
  }

  /**
   * Streams the playlist's videos as pages arrive, skipping `offset` unique
   * entries and stopping pagination once `limit` have been yielded.
   */
  async *fetchItems(
    url: string,
    _opts?: { limit?: number; offset?: number; signal?: AbortSignal }
  ): AsyncGenerator<PlaylistItemCandidate> {
    const opts = _opts || {};
    const limit = typeof opts.limit === 'number' && opts.limit >= 0 ? opts.limit : Infinity;
    const offset = Math.max(0, opts.offset || 0);
    if (limit === 0) return;

    const reference = resolvePlaylistReference(url, this.context.host);
    const html = await this.context.fetcher.fetchText(
      reference.url,
      opts.signal ? { signal: opts.signal } : {}
    );
    const driver = new PaginationDriver(html, this.context, opts.signal ? { signal: opts.signal } : {});
    const seen = new VideoAccumulator();

    let position = 0;
    let yielded = 0;
    for await (const page of driver.pages()) {
      for (const entry of page.entries) {
        if (seen.add([entry]) === 0) continue;
        position += 1;
        if (position <= offset) continue;
        yield {
          title: entry.title,
          provider: 'youtube',
          providerUrl: reference.url,
          videoUrl: entry.url,
          position,
        };
        yielded += 1;
        if (yielded >= limit) {
          logEvent('yt_playlist_limit_reached', { listId: reference.id, limit, pages: driver.pageCount });
          return;
        }
      }
    }
    logEvent('yt_playlist_items_completed', { listId: reference.id, yielded, pages: driver.pageCount });
  }
}

export default YouTubePlaylistProvider;
