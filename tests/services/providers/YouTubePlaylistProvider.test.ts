/**
 * YouTube playlist provider tests
 */

import { YouTubePlaylistProvider } from '../../../src/services/providers/YouTubePlaylistProvider';
import { PlaylistItemCandidate } from '../../../src/services/providers/types';
import {
  ScriptedFetcher,
  continuationResponse,
  continuationUrl,
  createTestContext,
  initialData,
  listingHtml,
  playlistPageUrl,
  videoItem,
  videoList,
  watchUrl,
} from '../../helpers';

const LIST_ID = 'PLprovider01';
const PLAYLIST_URL = `https://www.youtube.com/playlist?list=${LIST_ID}`;

function fetcherWithTwoPages(): ScriptedFetcher {
  const first = videoList([videoItem('vid00000001', 'One'), videoItem('vid00000002', 'Two')], 'T1');
  const second = videoList([videoItem('vid00000002', 'Two'), videoItem('vid00000003', 'Three')]);
  return new ScriptedFetcher()
    .respond(playlistPageUrl(LIST_ID), listingHtml(initialData(first), { title: 'Provider Mix' }))
    .respond(continuationUrl('T1'), JSON.stringify(continuationResponse(second)));
}

async function drain(iterable: AsyncIterable<PlaylistItemCandidate>): Promise<PlaylistItemCandidate[]> {
  const items: PlaylistItemCandidate[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('YouTubePlaylistProvider', () => {
  describe('supports', () => {
    it('accepts playlist and watch-with-list URLs', () => {
      const provider = new YouTubePlaylistProvider(createTestContext(new ScriptedFetcher()));

      expect(provider.supports(PLAYLIST_URL)).toBe(true);
      expect(provider.supports(`https://music.youtube.com/watch?v=vid00000001&list=${LIST_ID}`)).toBe(true);
    });

    it('rejects single videos and other sites', () => {
      const provider = new YouTubePlaylistProvider(createTestContext(new ScriptedFetcher()));

      expect(provider.supports('https://www.youtube.com/watch?v=vid00000001')).toBe(false);
      expect(provider.supports(`https://example.test/playlist?list=${LIST_ID}`)).toBe(false);
    });
  });

  describe('fetchItems', () => {
    it('yields unique items across pages with their positions', async () => {
      const provider = new YouTubePlaylistProvider(createTestContext(fetcherWithTwoPages()));

      const items = await drain(provider.fetchItems(PLAYLIST_URL));

      expect(items).toEqual([
        { title: 'One', provider: 'youtube', providerUrl: playlistPageUrl(LIST_ID), videoUrl: watchUrl('vid00000001'), position: 1 },
        { title: 'Two', provider: 'youtube', providerUrl: playlistPageUrl(LIST_ID), videoUrl: watchUrl('vid00000002'), position: 2 },
        { title: 'Three', provider: 'youtube', providerUrl: playlistPageUrl(LIST_ID), videoUrl: watchUrl('vid00000003'), position: 3 },
      ]);
    });

    it('stops paginating once the limit is reached', async () => {
      const fetcher = fetcherWithTwoPages();
      const provider = new YouTubePlaylistProvider(createTestContext(fetcher));

      const items = await drain(provider.fetchItems(PLAYLIST_URL, { limit: 2 }));

      expect(items.map((i) => i.title)).toEqual(['One', 'Two']);
      expect(fetcher.requests.map((r) => r.url)).toEqual([playlistPageUrl(LIST_ID)]);
    });

    it('skips the first offset unique items', async () => {
      const provider = new YouTubePlaylistProvider(createTestContext(fetcherWithTwoPages()));

      const items = await drain(provider.fetchItems(PLAYLIST_URL, { offset: 2 }));

      expect(items.map((i) => [i.title, i.position])).toEqual([['Three', 3]]);
    });

    it('yields nothing for a zero limit', async () => {
      const fetcher = fetcherWithTwoPages();
      const provider = new YouTubePlaylistProvider(createTestContext(fetcher));

      expect(await drain(provider.fetchItems(PLAYLIST_URL, { limit: 0 }))).toEqual([]);
      expect(fetcher.requests).toHaveLength(0);
    });
  });

  describe('getMeta', () => {
    it('returns id, title and total', async () => {
      const provider = new YouTubePlaylistProvider(createTestContext(fetcherWithTwoPages()));

      await expect(provider.getMeta(PLAYLIST_URL)).resolves.toEqual({ id: LIST_ID, title: 'Provider Mix', total: 3 });
    });

    it('returns null without a list id', async () => {
      const provider = new YouTubePlaylistProvider(createTestContext(new ScriptedFetcher()));

      await expect(provider.getMeta('https://www.youtube.com/watch?v=vid00000001')).resolves.toBeNull();
    });

    it('returns null when the listing cannot be read', async () => {
      const provider = new YouTubePlaylistProvider(createTestContext(new ScriptedFetcher()));

      await expect(provider.getMeta(PLAYLIST_URL)).resolves.toBeNull();
    });
  });
});
