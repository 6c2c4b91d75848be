import { LRUCache } from "lru-cache";
import { CacheKeyConflictError } from "../errors.js";
import { logEvent } from "../telemetry.js";
import type { CacheEntry } from "../types.js";
import type { ExplanationStore } from "./store.js";

export type PutOutcome = "stored" | "unchanged";

export type ExplanationCacheStats = {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
  conflicts: number;
};

export type ExplanationCacheOptions = {
  memoryEntries?: number;
};

function sameContent(left: CacheEntry, right: CacheEntry): boolean {
  return (
    left.text === right.text &&
    left.templateId === right.templateId &&
    left.generator.provider === right.generator.provider &&
    left.generator.model === right.generator.model &&
    left.generator.version === right.generator.version
  );
}

/**
 * Content-addressed explanation cache. Entries are never overwritten: a put
 * with identical content is a no-op and a put with different content under
 * an existing key is rejected, keeping the original.
 */
export class ExplanationCache {
  private readonly hot: LRUCache<string, CacheEntry>;
  private hits = 0;
  private misses = 0;
  private conflicts = 0;

  constructor(
    private readonly store: ExplanationStore,
    options: ExplanationCacheOptions = {},
  ) {
    this.hot = new LRUCache<string, CacheEntry>({ max: Math.max(1, options.memoryEntries ?? 2_000) });
  }

  async get(key: string): Promise<CacheEntry | null> {
    const cached = this.hot.get(key) ?? (await this.store.read(key));
    if (!cached) {
      this.misses += 1;
      return null;
    }
    this.hot.set(key, cached);
    this.hits += 1;
    return cached;
  }

  /** Lookup that leaves the hit and miss counters untouched. */
  async peek(key: string): Promise<CacheEntry | null> {
    return this.hot.get(key) ?? (await this.store.read(key));
  }

  async put(entry: CacheEntry): Promise<PutOutcome> {
    const { entry: held, stored } = await this.store.append(entry);
    this.hot.set(held.key, held);
    if (stored) return "stored";
    if (sameContent(held, entry)) return "unchanged";
    this.conflicts += 1;
    logEvent("error", "cache.key_conflict", {
      key: entry.key,
      existingGenerator: held.generator,
      rejectedGenerator: entry.generator,
    });
    throw new CacheKeyConflictError(entry.key);
  }

  stats(): ExplanationCacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.store.size(),
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : Number((this.hits / lookups).toFixed(4)),
      conflicts: this.conflicts,
    };
  }

  close(): Promise<void> {
    return this.store.close();
  }
}
