import { z } from "zod";
import type { LedgerDatabase } from "../db/repositories";
import type { AssetType } from "../types";
import { logger } from "../utils/logger";
import { ValidationError } from "./errors";
import { ASSET_CODE_PATTERN } from "./accounts";

/** The subset of a Redis client the registry needs. ioredis satisfies it. */
export interface AssetCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
}

const CachedAsset = z.object({
  code: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  active: z.boolean(),
  created_at: z.coerce.date(),
});

export class AssetRegistry {
  constructor(
    private readonly db: LedgerDatabase,
    private readonly cache?: AssetCache,
    private readonly ttlSeconds: number = 3600,
  ) {}

  // Fetch asset details by code
  async find(code: string): Promise<AssetType | null> {
    const cacheKey = `asset:${code}`;
    const cached = await this.readCache(cacheKey);
    if (cached) return cached;

    const asset = await this.db.read(({ assets }) => assets.findByCode(code));
    if (asset) {
      await this.writeCache(cacheKey, asset);
    }
    return asset;
  }

  /**
   * Resolves an asset that transactions may be posted against. Reads the
   * database, never the cache: `active` can change while an entry lives.
   */
  async require(code: string): Promise<AssetType> {
    if (!ASSET_CODE_PATTERN.test(code)) {
      throw new ValidationError(`Invalid asset code: ${code}`);
    }
    const asset = await this.db.read(({ assets }) => assets.findByCode(code));
    if (!asset) {
      throw new ValidationError(`Unknown asset type: ${code}`);
    }
    if (!asset.active) {
      throw new ValidationError(`Asset type ${code} is not active`);
    }
    return asset;
  }

  async list(): Promise<AssetType[]> {
    return this.db.read(({ assets }) => assets.list());
  }

  // The cache is an optimisation; a Redis failure falls through to the database.
  private async readCache(key: string): Promise<AssetType | null> {
    if (!this.cache) return null;
    try {
      const raw = await this.cache.get(key);
      if (!raw) return null;
      const parsed = CachedAsset.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      logger.warn({ err, key }, "Asset cache read failed");
      return null;
    }
  }

  private async writeCache(key: string, asset: AssetType): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(key, JSON.stringify(asset), "EX", this.ttlSeconds);
    } catch (err) {
      logger.warn({ err, key }, "Asset cache write failed");
    }
  }
}
