export interface VideoEntry {
  readonly url: string;   // absolute watch URL, unique key
  readonly title: string;
}

export type ContinuationToken = string;

export interface Page {
  entries: VideoEntry[];
  continuation: ContinuationToken | null;
}

// Which envelope a decoded JSON value is expected to be in
export type ResponseShape = 'initial' | 'continuation';

export type DriverState = 'initial' | 'continuing' | 'done';

export type StopReason = 'exhausted' | 'page-limit' | 'stalled-token';

export interface PlaylistReference {
  readonly id: string;
  readonly url: string;   // canonical listing URL
}

export interface PlaylistMetadata {
  title: string | null;
  lastUpdated: Date | null;
}

export type WatchQueryParam = 'id' | 'v';

export interface FetchOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface PageFetcher {
  fetchText(url: string, options?: FetchOptions): Promise<string>;
}

export interface ContinuationRequest {
  url: string;
  headers: Record<string, string>;
}

/**
 * Read-mostly settings and collaborators shared by every component of one
 * playlist build. Built once and passed by reference.
 */
export interface PlaylistContext {
  readonly fetcher: PageFetcher;
  readonly host: string;
  readonly watchParam: WatchQueryParam;
  readonly clientName: string;
  readonly clientVersion: string;
  readonly maxPages: number;
}

export interface BuildOptions {
  signal?: AbortSignal;
}

export interface AppConfig {
  site: {
    host: string;
    watchParam: WatchQueryParam;
    clientName: string;     // continuation header constants, not derived
    clientVersion: string;
  };
  http: {
    timeoutMs: number;
    userAgent: string;
  };
  pagination: {
    maxPages: number;
  };
  logging: {
    level: string;
    dir?: string;           // file transports only when set
    maxSizeBytes?: number;
    maxFiles?: number;
  };
}
