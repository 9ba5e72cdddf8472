import registerDebug from "debug";
import { sha256 } from "../../utils/hash.js";

const debugCache = registerDebug("kbqa:cache:result");

export interface ResultCacheOptions {
  enabled: boolean;
  capacity: number;
  ttlSeconds: number;
  now?: () => number;
}

export interface ResultCacheKeyInput {
  question: string;
  dataSourceId: string | null;
  topK: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * Final-answer cache. Keys embed the data source's version counter at the time the key is
 * built, so bumping the version makes every older key unreachable; stale entries are left
 * to age out through TTL and capacity.
 */
export class ResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  private readonly versions = new Map<string, number>();

  private readonly now: () => number;

  constructor(private readonly options: ResultCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  get size(): number {
    return this.entries.size;
  }

  getVersion(dataSourceId: string | null): number {
    if (dataSourceId === null) {
      return 0;
    }
    return this.versions.get(dataSourceId) ?? 0;
  }

  bumpVersion(dataSourceId: string): number {
    const next = this.getVersion(dataSourceId) + 1;
    this.versions.set(dataSourceId, next);
    debugCache(`data source ${dataSourceId} version bumped to ${next}`);
    return next;
  }

  buildKey(input: ResultCacheKeyInput): string {
    const version = this.getVersion(input.dataSourceId);
    return sha256(`${input.question}|${input.dataSourceId ?? "none"}|${input.topK}|v${version}`);
  }

  /** Keys are built once per request, so a bump during the request orphans what it stores. */
  get(key: string): T | null {
    if (!this.options.enabled) {
      return null;
    }
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (!this.options.enabled) {
      return;
    }
    this.entries.delete(key);
    this.purgeExpired();
    while (this.entries.size >= this.options.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + this.options.ttlSeconds * 1000,
    });
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }
}
