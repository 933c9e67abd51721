export type ProviderId = 'youtube';

export interface PlaylistItemCandidate {
  title: string;
  provider: ProviderId;
  providerUrl: string; // canonical playlist URL at the provider
  videoUrl: string;    // absolute watch URL
  position: number;    // 1-based position after dedupe
}

export interface PlaylistMeta {
  id: string;
  title?: string;
  total?: number;
  lastUpdated?: Date;
}

export interface PlaylistProvider {
  supports(url: string): boolean;
  getMeta(url: string): Promise<PlaylistMeta | null>;
  fetchItems(
    url: string,
    opts?: { limit?: number; offset?: number; signal?: AbortSignal }
  ): AsyncGenerator<PlaylistItemCandidate>;
}
