import { Redis } from "ioredis";
import { z } from "zod";
import { createChildLogger, errorMessage } from "@notes-to-blog/core";
import { SearchHitSchema } from "./types.js";

const logger = createChildLogger({ module: "services:research-cache" });

export const ResearchPayloadSchema = z.object({
  query: z.string(),
  hits: z.array(SearchHitSchema),
});

export type ResearchPayload = z.infer<typeof ResearchPayloadSchema>;

export const CacheEntrySchema = z.object({
  queryKey: z.string(),
  payload: ResearchPayloadSchema,
  fetchedAt: z.string(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheLookup {
  entry: CacheEntry | undefined;
  /** "cache": stored entry; "loaded": this caller ran the loader; "shared": joined another caller's load. */
  source: "cache" | "loaded" | "shared";
}

/**
 * Research queries are keyed by their normalized text only, so the same
 * subheading in two different notes hits the same entry.
 */
export function normalizeQueryKey(query: string): string {
  return query.toLowerCase().replace(/\s+/g, " ").trim();
}

export abstract class ResearchCache {
  private readonly pending = new Map<string, Promise<CacheEntry | undefined>>();

  abstract get(queryKey: string): Promise<CacheEntry | undefined>;
  abstract put(queryKey: string, payload: ResearchPayload): Promise<CacheEntry>;
  abstract clear(): Promise<void>;

  /**
   * Cache-aside lookup with one loader per key at a time. A loader result of
   * `undefined` is a failed fetch and is not stored.
   */
  async getOrLoad(
    queryKey: string,
    loader: () => Promise<ResearchPayload | undefined>
  ): Promise<CacheLookup> {
    const pending = this.pending.get(queryKey);
    if (pending) {
      return { entry: await pending, source: "shared" };
    }

    let fromCache = false;
    const task = (async () => {
      const cached = await this.get(queryKey);
      if (cached) {
        fromCache = true;
        return cached;
      }
      const payload = await loader();
      return payload ? this.put(queryKey, payload) : undefined;
    })();

    this.pending.set(queryKey, task);
    try {
      const entry = await task;
      return { entry, source: fromCache ? "cache" : "loaded" };
    } finally {
      this.pending.delete(queryKey);
    }
  }
}

// ─── In-memory ──────────────────────────────────────────────────────────────

export interface MemoryResearchCacheOptions {
  /** Entries older than this are treated as misses. No expiry when omitted. */
  ttlMs?: number;
  now?: () => Date;
}

export class MemoryResearchCache extends ResearchCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs?: number;
  private readonly now: () => Date;

  constructor(options: MemoryResearchCacheOptions = {}) {
    super();
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.entries.size;
  }

  async get(queryKey: string): Promise<CacheEntry | undefined> {
    const entry = this.entries.get(queryKey);
    if (!entry) return undefined;

    if (this.ttlMs !== undefined) {
      const age = this.now().getTime() - Date.parse(entry.fetchedAt);
      if (age > this.ttlMs) {
        this.entries.delete(queryKey);
        logger.debug({ queryKey, age }, "Cache entry expired");
        return undefined;
      }
    }
    return entry;
  }

  async put(queryKey: string, payload: ResearchPayload): Promise<CacheEntry> {
    const entry: CacheEntry = {
      queryKey,
      payload,
      fetchedAt: this.now().toISOString(),
    };
    this.entries.set(queryKey, entry);
    return entry;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}

// ─── Redis ──────────────────────────────────────────────────────────────────

export interface RedisResearchCacheOptions {
  url: string;
  ttlSeconds?: number;
  keyPrefix?: string;
}

/**
 * Shared cache for long-running use. Redis failures degrade to cache misses.
 */
export class RedisResearchCache extends ResearchCache {
  private readonly redis: Redis;
  private readonly keyPrefix: string;

  constructor(private readonly options: RedisResearchCacheOptions) {
    super();
    this.keyPrefix = options.keyPrefix ?? "notes-to-blog:research:";
    this.redis = new Redis(options.url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    this.redis.on("error", (err: Error) => {
      logger.warn({ error: err.message }, "Redis connection error (research cache degraded)");
    });
  }

  async get(queryKey: string): Promise<CacheEntry | undefined> {
    try {
      const data = await this.redis.get(this.keyPrefix + queryKey);
      if (!data) {
        logger.debug({ queryKey }, "Cache miss");
        return undefined;
      }
      const parsed = CacheEntrySchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logger.warn({ queryKey }, "Discarding malformed cache entry");
        return undefined;
      }
      logger.debug({ queryKey }, "Cache hit");
      return parsed.data;
    } catch (err) {
      logger.warn({ queryKey, error: errorMessage(err) }, "Cache read failed, treating as miss");
      return undefined;
    }
  }

  async put(queryKey: string, payload: ResearchPayload): Promise<CacheEntry> {
    const entry: CacheEntry = { queryKey, payload, fetchedAt: new Date().toISOString() };
    try {
      const key = this.keyPrefix + queryKey;
      if (this.options.ttlSeconds) {
        await this.redis.set(key, JSON.stringify(entry), "EX", this.options.ttlSeconds);
      } else {
        await this.redis.set(key, JSON.stringify(entry));
      }
    } catch (err) {
      logger.warn({ queryKey, error: errorMessage(err) }, "Cache write failed");
    }
    return entry;
  }

  async clear(): Promise<void> {
    let cursor = "0";
    do {
      const [next, keys] = await this.redis.scan(cursor, "MATCH", `${this.keyPrefix}*`, "COUNT", 100);
      if (keys.length > 0) await this.redis.del(...keys);
      cursor = next;
    } while (cursor !== "0");
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
