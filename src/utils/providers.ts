import { InvalidPlaylistReferenceError } from '../errors';
import { PlaylistReference } from '../types/playlist';

export type Provider = 'youtube' | 'unknown';
export type ContentKind = 'playlist' | 'unknown';

export interface DetectedUrlInfo {
  provider: Provider;
  kind: ContentKind;
  listId?: string;
}

const YT_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
]);

function safeParseUrl(input: string): URL | null {
  try {
    // If input is missing protocol, try to prepend https://
    if (!/^https?:\/\//i.test(input)) {
      return new URL(`https://${input}`);
    }
    return new URL(input);
  } catch {
    return null;
  }
}

function looksLikeUrl(input: string): boolean {
  return /^https?:\/\//i.test(input) || input.includes('/') || input.includes('?');
}

export function analyzeUrl(input: string): DetectedUrlInfo {
  const u = safeParseUrl(input);
  if (!u || !YT_HOSTS.has(u.hostname.toLowerCase())) return { provider: 'unknown', kind: 'unknown' };

  const list = u.searchParams.get('list');
  if (list && (u.pathname === '/playlist' || u.pathname === '/watch')) {
    return { provider: 'youtube', kind: 'playlist', listId: list };
  }
  return { provider: 'youtube', kind: 'unknown' };
}

export function isPlaylistUrl(input: string): boolean {
  return analyzeUrl(input).kind === 'playlist';
}

export function playlistUrl(host: string, id: string): string {
  return `https://${host}/playlist?list=${encodeURIComponent(id)}`;
}

/**
 * Resolves a playlist URL (anything carrying a `list` query parameter) or a
 * bare playlist id into a reference whose listing URL points at `host`.
 */
export function resolvePlaylistReference(input: string, host: string): PlaylistReference {
  const trimmed = input.trim();
  if (!trimmed) throw new InvalidPlaylistReferenceError(input);

  let id = trimmed;
  if (looksLikeUrl(trimmed)) {
    const list = safeParseUrl(trimmed)?.searchParams.get('list');
    if (!list) throw new InvalidPlaylistReferenceError(input);
    id = list;
  }

  return Object.freeze({ id, url: playlistUrl(host, id) });
}
