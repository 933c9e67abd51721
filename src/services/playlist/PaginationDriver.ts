import { PaginationFetchError } from '../../errors';
import {
  BuildOptions,
  ContinuationToken,
  DriverState,
  Page,
  PlaylistContext,
  StopReason,
} from '../../types/playlist';
import { logDebug, logEvent, logWarning } from '../../utils/logger';
import { parseContinuationPage } from './ContinuationParser';
import { buildContinuationRequest } from './continuationRequest';
import { extractInitialData, parseJson } from './InitialDataExtractor';

/**
 * Walks a playlist listing page by page: the first page comes from the
 * listing document's initial data, every further page from a continuation
 * request built from the previous page's token.
 *
 * The page sequence is lazy and single-pass. Pagination ends when a page
 * carries no token, when the configured page cap is reached, or when the
 * remote side hands back a token it already issued.
 */
export class PaginationDriver {
  private currentState: DriverState = 'initial';
  private pendingToken: ContinuationToken | null = null;
  private reason: StopReason | null = null;
  private readonly seenTokens = new Set<ContinuationToken>();
  private pagesRead = 0;
  private entriesRead = 0;
  private fetchCount = 0;
  private consumed = false;

  constructor(
    private readonly firstDocument: string,
    private readonly context: PlaylistContext,
    private readonly options: BuildOptions = {}
  ) {}

  get state(): DriverState {
    return this.currentState;
  }

  get stopReason(): StopReason | null {
    return this.reason;
  }

  get pageCount(): number {
    return this.pagesRead;
  }

  get fetches(): number {
    return this.fetchCount;
  }

  async *pages(): AsyncGenerator<Page, void, undefined> {
    if (this.consumed) {
      throw new Error('PaginationDriver pages can only be iterated once');
    }
    this.consumed = true;

    const first = parseContinuationPage(extractInitialData(this.firstDocument), 'initial', this.context);
    this.pagesRead = 1;
    this.entriesRead = first.entries.length;
    this.advance(first);
    yield first;

    while (this.currentState === 'continuing' && this.pendingToken !== null) {
      if (this.pagesRead >= this.context.maxPages) {
        logWarning('pagination_page_limit_reached', { maxPages: this.context.maxPages });
        this.finish('page-limit');
        break;
      }
      const page = await this.fetchPage(this.pendingToken);
      this.pagesRead += 1;
      this.entriesRead += page.entries.length;
      this.advance(page);
      yield page;
    }
  }

  private advance(page: Page): void {
    const token = page.continuation;
    if (token === null) {
      this.finish('exhausted');
      return;
    }
    if (this.seenTokens.has(token)) {
      logWarning('pagination_token_repeated', { page: this.pagesRead });
      this.finish('stalled-token');
      return;
    }
    if (page.entries.length === 0) {
      logDebug('pagination_empty_page', { page: this.pagesRead });
    }
    this.seenTokens.add(token);
    this.pendingToken = token;
    this.currentState = 'continuing';
  }

  private finish(reason: StopReason): void {
    this.currentState = 'done';
    this.pendingToken = null;
    this.reason = reason;
    logEvent('pagination_finished', { reason, pages: this.pagesRead, fetches: this.fetchCount });
  }

  private async fetchPage(token: ContinuationToken): Promise<Page> {
    const request = buildContinuationRequest(token, this.context);
    const pageNumber = this.pagesRead + 1;
    const { signal } = this.options;

    const fail = (cause: unknown): PaginationFetchError => {
      this.currentState = 'done';
      this.pendingToken = null;
      return new PaginationFetchError(pageNumber, request.url, this.entriesRead, cause);
    };

    if (signal?.aborted) throw fail(signal.reason);

    logDebug('pagination_fetch_started', { page: pageNumber, url: request.url });
    this.fetchCount += 1;
    let body: string;
    try {
      body = await this.context.fetcher.fetchText(request.url, {
        headers: request.headers,
        ...(signal ? { signal } : {}),
      });
    } catch (error) {
      throw fail(error);
    }

    let data: unknown;
    try {
      data = parseJson(body, `continuation page ${pageNumber}`);
    } catch (error) {
      throw fail(error);
    }
    return parseContinuationPage(data, 'continuation', this.context);
  }
}
