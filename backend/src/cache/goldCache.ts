import { z } from "zod";
import { BLOB_PATHS, CONTAINERS, type FeatureRow } from "../models/tables";
import type { ObjectStore } from "../storage/objectStore";
import { decodeFeatureTable } from "../storage/tableCodec";
import { logger } from "../utils/logger";
import type { RedisManager } from "./redisClient";

export interface CacheEntry<T> {
  data: T;
  fetchedAt: number;
}

export const GOLD_CACHE_KEY = "gold-features";

const cachedEntrySchema = z.object({
  fetchedAt: z.number(),
  data: z.array(
    z.object({
      station_complex: z.string(),
      borough: z.string(),
      latitude: z.number(),
      longitude: z.number(),
      hour: z.number().int(),
      day_of_week: z.number().int(),
      avg_ridership: z.number(),
    }),
  ),
});

/**
 * Keeps the gold feature table in memory for `ttlMs`, mirrored to Redis when
 * one is connected so restarts do not hit the object store.
 */
export class GoldFeatureCache {
  private entry?: CacheEntry<FeatureRow[]>;
  private readonly redis: RedisManager | undefined;

  constructor(
    private readonly store: ObjectStore,
    private readonly ttlMs: number,
    redis?: RedisManager,
    private readonly now: () => number = Date.now,
  ) {
    this.redis = redis && redis.status !== "disabled" ? redis : undefined;
  }

  private isFresh(entry: CacheEntry<unknown>) {
    return this.now() - entry.fetchedAt <= this.ttlMs;
  }

  private async readFromRedis(): Promise<CacheEntry<FeatureRow[]> | undefined> {
    if (!this.redis) return undefined;
    const payload = await this.redis.getJson(GOLD_CACHE_KEY);
    if (payload === null) return undefined;
    const parsed = cachedEntrySchema.safeParse(payload);
    if (!parsed.success) {
      logger.warn("Ignoring malformed gold cache entry in Redis");
      return undefined;
    }
    return this.isFresh(parsed.data) ? parsed.data : undefined;
  }

  async getFeatures(): Promise<FeatureRow[]> {
    if (this.entry && this.isFresh(this.entry)) {
      return this.entry.data;
    }

    const hydrated = await this.readFromRedis();
    if (hydrated) {
      logger.info("Hydrated gold features from Redis", { rows: hydrated.data.length });
      this.entry = hydrated;
      return hydrated.data;
    }

    logger.info("Loading gold features from storage", { store: this.store.name });
    const data = await decodeFeatureTable(await this.store.get(CONTAINERS.gold, BLOB_PATHS.features));
    const entry = { data, fetchedAt: this.now() };
    this.entry = entry;
    if (this.redis) {
      await this.redis.setJson(GOLD_CACHE_KEY, entry, this.ttlMs);
    }
    return data;
  }

  /** Drops the in-memory entry and the Redis mirror so the next read goes to storage. */
  async invalidate() {
    this.entry = undefined;
    if (this.redis) {
      await this.redis.deleteKey(GOLD_CACHE_KEY);
    }
  }

  getFetchedAt() {
    return this.entry?.fetchedAt ?? null;
  }
}
