/**
 * RenderCache — bounded storage for rendered text.
 *
 * Entries are keyed by a caller-defined source key plus the width the text
 * was rendered at, so a resize renders again while scrolling and page
 * switches reuse earlier output. When the cache is full the oldest 10% of
 * entries are evicted (FIFO via insertion order).
 */

export class RenderCache {
  private cache = new Map<string, string>();

  constructor(private readonly maxSize = 256) {}

  private static keyOf(source: string, width: number): string {
    return `${width}:${source}`;
  }

  get(source: string, width: number): string | undefined {
    return this.cache.get(RenderCache.keyOf(source, width));
  }

  set(source: string, width: number, value: string): void {
    if (this.cache.size >= this.maxSize) {
      const evictCount = Math.max(1, Math.floor(this.maxSize * 0.1));
      const iter = this.cache.keys();
      for (let i = 0; i < evictCount; i++) {
        const { value: key, done } = iter.next();
        if (done) break;
        this.cache.delete(key);
      }
    }
    this.cache.set(RenderCache.keyOf(source, width), value);
  }

  /** Return the cached text, rendering and storing it on a miss. */
  getOrRender(source: string, width: number, render: () => string): string {
    const hit = this.get(source, width);
    if (hit !== undefined) return hit;
    const value = render();
    this.set(source, width, value);
    return value;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
