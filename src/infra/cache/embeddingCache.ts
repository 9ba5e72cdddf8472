import registerDebug from "debug";
import { sha256 } from "../../utils/hash.js";

const debugCache = registerDebug("kbqa:cache:embedding");

export interface EmbeddingCacheOptions {
  enabled: boolean;
  capacity: number;
}

/**
 * Text -> vector LRU. Entries never expire: the same text always embeds to the same
 * vector under a fixed model. Every read-modify-write runs synchronously, so concurrent
 * requests on the event loop never observe a half-updated recency order.
 */
export class EmbeddingCache {
  private readonly entries = new Map<string, number[]>();

  constructor(private readonly options: EmbeddingCacheOptions) {}

  get enabled(): boolean {
    return this.options.enabled;
  }

  get size(): number {
    return this.entries.size;
  }

  get(text: string): number[] | null {
    if (!this.options.enabled) {
      return null;
    }
    const key = sha256(text);
    const hit = this.entries.get(key);
    if (!hit) {
      return null;
    }
    this.entries.delete(key);
    this.entries.set(key, hit);
    return hit;
  }

  set(text: string, embedding: number[]): void {
    if (!this.options.enabled) {
      return;
    }
    const key = sha256(text);
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else {
      while (this.entries.size >= this.options.capacity) {
        const oldest = this.entries.keys().next();
        if (oldest.done) {
          break;
        }
        this.entries.delete(oldest.value);
        debugCache("evicted least recently used embedding");
      }
    }
    this.entries.set(key, embedding);
  }

  async getOrCompute(
    text: string,
    compute: (text: string) => Promise<number[]>,
  ): Promise<number[]> {
    const cached = this.get(text);
    if (cached) {
      return cached;
    }
    const embedding = await compute(text);
    this.set(text, embedding);
    return embedding;
  }

  clear(): void {
    this.entries.clear();
  }
}
