import { PaginationFetchError } from '../../errors';
import {
  BuildOptions,
  PlaylistContext,
  PlaylistMetadata,
  PlaylistReference,
  StopReason,
  VideoEntry,
} from '../../types/playlist';
import { logDebug, logError, logEvent } from '../../utils/logger';
import { resolvePlaylistReference } from '../../utils/providers';
import { padIndex } from '../../utils/text';
import { extractPlaylistMetadata } from './InitialDataExtractor';
import { PaginationDriver } from './PaginationDriver';
import { VideoAccumulator } from './VideoAccumulator';

export type PlaylistBuildResult =
  | { status: 'complete'; playlist: Playlist; stopReason: StopReason }
  | { status: 'interrupted'; playlist: Playlist; error: PaginationFetchError };

/**
 * Ordered, duplicate-free list of a playlist's videos plus the metadata read
 * from its listing page. Instances are only produced by `build` or `create`,
 * after pagination has been drained.
 */
export class Playlist implements Iterable<VideoEntry> {
  private readonly entries: readonly VideoEntry[];

  private constructor(
    public readonly reference: PlaylistReference,
    public readonly metadata: PlaylistMetadata,
    entries: VideoEntry[]
  ) {
    this.entries = Object.freeze(entries);
  }

  /**
   * Fetches the listing page and every continuation page. A failure while
   * fetching a continuation page resolves as `interrupted`, keeping the
   * entries from the pages read before it; every other failure rejects.
   */
  static async build(
    input: string,
    context: PlaylistContext,
    options: BuildOptions = {}
  ): Promise<PlaylistBuildResult> {
    const reference = resolvePlaylistReference(input, context.host);
    logEvent('playlist_build_started', { id: reference.id, url: reference.url });

    let html: string;
    try {
      html = await context.fetcher.fetchText(
        reference.url,
        options.signal ? { signal: options.signal } : {}
      );
    } catch (error) {
      logError('playlist_listing_fetch_failed', error instanceof Error ? error : undefined, {
        id: reference.id,
      });
      throw error;
    }

    const metadata = extractPlaylistMetadata(html);
    const driver = new PaginationDriver(html, context, options);
    const accumulator = new VideoAccumulator();

    try {
      for await (const page of driver.pages()) {
        const added = accumulator.add(page.entries);
        logDebug('playlist_page_merged', {
          id: reference.id,
          page: driver.pageCount,
          received: page.entries.length,
          added,
          total: accumulator.size,
        });
      }
    } catch (error) {
      if (error instanceof PaginationFetchError) {
        const playlist = new Playlist(reference, metadata, accumulator.toArray());
        logError('playlist_pagination_interrupted', error, {
          id: reference.id,
          entries: playlist.length,
        });
        return { status: 'interrupted', playlist, error };
      }
      logError('playlist_build_failed', error instanceof Error ? error : undefined, { id: reference.id });
      throw error;
    }

    const playlist = new Playlist(reference, metadata, accumulator.toArray());
    const stopReason = driver.stopReason ?? 'exhausted';
    logEvent('playlist_build_completed', {
      id: reference.id,
      entries: playlist.length,
      pages: driver.pageCount,
      stopReason,
    });
    return { status: 'complete', playlist, stopReason };
  }

  // Like build, but an interrupted pagination rejects with its error
  static async create(
    input: string,
    context: PlaylistContext,
    options: BuildOptions = {}
  ): Promise<Playlist> {
    const result = await Playlist.build(input, context, options);
    if (result.status === 'interrupted') throw result.error;
    return result.playlist;
  }

  get id(): string {
    return this.reference.id;
  }

  get url(): string {
    return this.reference.url;
  }

  get title(): string | null {
    return this.metadata.title;
  }

  get lastUpdated(): Date | null {
    return this.metadata.lastUpdated;
  }

  get length(): number {
    return this.entries.length;
  }

  get videoUrls(): readonly VideoEntry[] {
    return this.entries;
  }

  at(index: number): VideoEntry | undefined {
    return this.entries.at(index);
  }

  slice(start?: number, end?: number): VideoEntry[] {
    return this.entries.slice(start, end);
  }

  [Symbol.iterator](): Iterator<VideoEntry> {
    return this.entries[Symbol.iterator]();
  }

  /**
   * Zero-padded position labels ("001", "002", ...) sized to the playlist
   * length, for naming downloaded files in order.
   */
  numberPrefixes(reverse = false): string[] {
    const total = this.entries.length;
    const width = String(total).length;
    const prefixes: string[] = [];
    for (let i = 1; i <= total; i += 1) {
      prefixes.push(padIndex(reverse ? total - i + 1 : i, width));
    }
    return prefixes;
  }

  toJSON(): {
    id: string;
    url: string;
    title: string | null;
    lastUpdated: string | null;
    videos: VideoEntry[];
  } {
    return {
      id: this.id,
      url: this.url,
      title: this.title,
      lastUpdated: this.lastUpdated ? this.lastUpdated.toISOString().slice(0, 10) : null,
      videos: [...this.entries],
    };
  }

  toString(): string {
    return `Playlist(${this.id}, ${this.entries.length} videos)`;
  }
}
