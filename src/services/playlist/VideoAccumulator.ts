import { VideoEntry } from '../../types/playlist';

// Ordered insert-if-absent collection keyed by watch URL
export class VideoAccumulator {
  private readonly entries = new Map<string, VideoEntry>();

  add(entries: Iterable<VideoEntry>): number {
    let inserted = 0;
    for (const entry of entries) {
      if (this.entries.has(entry.url)) continue;
      this.entries.set(entry.url, entry);
      inserted += 1;
    }
    return inserted;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get size(): number {
    return this.entries.size;
  }

  toArray(): VideoEntry[] {
    return [...this.entries.values()];
  }
}
