import { ContinuationToken, Page, PlaylistContext, ResponseShape, VideoEntry } from '../../types/playlist';
import { logDebug } from '../../utils/logger';
import { decodeEntities } from '../../utils/text';

type PathSegment = string | number;

// Where the video list container sits in each known envelope
const CONTAINER_PATHS: Record<ResponseShape, readonly PathSegment[]> = {
  initial: [
    'contents', 'twoColumnBrowseResultsRenderer', 'tabs', 0, 'tabRenderer', 'content',
    'sectionListRenderer', 'contents', 0, 'itemSectionRenderer', 'contents', 0,
    'playlistVideoListRenderer',
  ],
  continuation: [1, 'response', 'continuationContents', 'playlistVideoListContinuation'],
};

// An initial-shape hint still falls back to the continuation envelope
const SHAPE_ORDER: Record<ResponseShape, readonly ResponseShape[]> = {
  initial: ['initial', 'continuation'],
  continuation: ['continuation'],
};

interface VideoListContainer {
  contents: unknown[];
  continuations?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lookup(value: unknown, path: readonly PathSegment[]): unknown {
  let current: unknown = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current) || segment >= current.length) return undefined;
      current = current[segment];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[segment];
    }
  }
  return current;
}

function findContainer(data: unknown, shape: ResponseShape): VideoListContainer | null {
  for (const candidate of SHAPE_ORDER[shape]) {
    const container = lookup(data, CONTAINER_PATHS[candidate]);
    if (isRecord(container) && Array.isArray(container.contents)) {
      if (candidate !== shape) logDebug('continuation_parser_shape_fallback', { from: shape, to: candidate });
      return { contents: container.contents, continuations: container.continuations };
    }
  }
  return null;
}

function readTitle(title: unknown): string | null {
  if (!isRecord(title)) return null;
  if (typeof title.simpleText === 'string') return title.simpleText;
  if (Array.isArray(title.runs)) {
    const parts = title.runs
      .map((run) => (isRecord(run) && typeof run.text === 'string' ? run.text : null))
      .filter((text): text is string => text !== null);
    if (parts.length > 0) return parts.join('');
  }
  return null;
}

export function buildWatchUrl(context: Pick<PlaylistContext, 'host' | 'watchParam'>, videoId: string): string {
  return `https://${context.host}/watch?${context.watchParam}=${videoId}`;
}

function toEntry(item: unknown, context: PlaylistContext): VideoEntry | null {
  const renderer = isRecord(item) ? item.playlistVideoRenderer : undefined;
  if (!isRecord(renderer)) return null;
  const videoId = renderer.videoId;
  if (typeof videoId !== 'string' || !videoId) return null;
  const title = readTitle(renderer.title);
  if (title === null) return null;
  return Object.freeze({ url: buildWatchUrl(context, videoId), title: decodeEntities(title) });
}

function readContinuation(continuations: unknown): ContinuationToken | null {
  const token = lookup(continuations, [0, 'nextContinuationData', 'continuation']);
  return typeof token === 'string' && token ? token : null;
}

/**
 * Reads one page of playlist entries and the token for the next page.
 * An unrecognised envelope yields an empty page without a token.
 */
export function parseContinuationPage(data: unknown, shape: ResponseShape, context: PlaylistContext): Page {
  const container = findContainer(data, shape);
  if (!container) {
    logDebug('continuation_parser_no_container', { shape });
    return { entries: [], continuation: null };
  }

  const seen = new Set<string>();
  const entries: VideoEntry[] = [];
  let skipped = 0;
  for (const item of container.contents) {
    const entry = toEntry(item, context);
    if (!entry) {
      skipped += 1;
      continue;
    }
    if (seen.has(entry.url)) continue;
    seen.add(entry.url);
    entries.push(entry);
  }
  if (skipped > 0) logDebug('continuation_parser_items_skipped', { shape, skipped });

  return { entries, continuation: readContinuation(container.continuations) };
}
