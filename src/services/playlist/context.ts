import { AppConfig, PageFetcher, PlaylistContext } from '../../types/playlist';
import { AxiosPageFetcher } from '../http/PageFetcher';

export function createPlaylistContext(config: AppConfig, fetcher?: PageFetcher): PlaylistContext {
  return Object.freeze({
    fetcher: fetcher ?? new AxiosPageFetcher(config.http),
    host: config.site.host,
    watchParam: config.site.watchParam,
    clientName: config.site.clientName,
    clientVersion: config.site.clientVersion,
    maxPages: config.pagination.maxPages,
  });
}
