/**
 * Shared fixtures for playlist engine tests
 */

import { HttpRequestError } from '../src/errors';
import { FetchOptions, PageFetcher, PlaylistContext } from '../src/types/playlist';

export const HOST = 'www.youtube.com';

export interface RecordedRequest {
  url: string;
  headers: Record<string, string> | undefined;
}

/**
 * In-process fetcher answering from a URL → body table. Errors in the table
 * are thrown; unknown URLs fail as a 404.
 */
export class ScriptedFetcher implements PageFetcher {
  public readonly requests: RecordedRequest[] = [];
  private readonly responses = new Map<string, string | Error>();

  respond(url: string, body: string | Error): this {
    this.responses.set(url, body);
    return this;
  }

  async fetchText(url: string, options: FetchOptions = {}): Promise<string> {
    this.requests.push({ url, headers: options.headers });
    const body = this.responses.get(url);
    if (body === undefined) throw new HttpRequestError(url, 404);
    if (body instanceof Error) throw body;
    return body;
  }
}

export function createTestContext(
  fetcher: PageFetcher,
  overrides: Partial<Omit<PlaylistContext, 'fetcher'>> = {}
): PlaylistContext {
  return {
    fetcher,
    host: HOST,
    watchParam: 'id',
    clientName: '1',
    clientVersion: '2.20200720.00.02',
    maxPages: 50,
    ...overrides,
  };
}

export function videoItem(videoId: string, title: string): Record<string, unknown> {
  return { playlistVideoRenderer: { videoId, title: { simpleText: title } } };
}

export function videoList(items: unknown[], token?: string): Record<string, unknown> {
  return {
    contents: items,
    ...(token ? { continuations: [{ nextContinuationData: { continuation: token } }] } : {}),
  };
}

export function initialData(list: Record<string, unknown>): Record<string, unknown> {
  return {
    contents: {
      twoColumnBrowseResultsRenderer: {
        tabs: [
          {
            tabRenderer: {
              content: {
                sectionListRenderer: {
                  contents: [{ itemSectionRenderer: { contents: [{ playlistVideoListRenderer: list }] } }],
                },
              },
            },
          },
        ],
      },
    },
  };
}

export function continuationResponse(list: Record<string, unknown>): unknown[] {
  return [{ page: 'browse' }, { response: { continuationContents: { playlistVideoListContinuation: list } } }];
}

export function listingHtml(
  data: unknown,
  opts: { title?: string; lastUpdated?: string } = {}
): string {
  return [
    '<html><head>',
    `<title>${opts.title ?? 'Test Playlist'} - YouTube</title>`,
    '</head><body>',
    opts.lastUpdated ? `<ul><li>${opts.lastUpdated}</li></ul>` : '',
    `<script>window["ytInitialData"] = ${JSON.stringify(data)};`,
    '</script></body></html>',
  ].join('\n');
}

export function playlistPageUrl(id: string): string {
  return `https://${HOST}/playlist?list=${id}`;
}

export function continuationUrl(token: string): string {
  return `https://${HOST}/browse_ajax?ctoken=${token}&continuation=${token}`;
}

export function watchUrl(videoId: string): string {
  return `https://${HOST}/watch?id=${videoId}`;
}
