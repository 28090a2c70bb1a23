import sqlite3 from "sqlite3";
import { open, Database } from "sqlite";
import { z } from "zod";
import { logger } from "../utils/logger";
import { CacheErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { VisionResponse } from "../types/vision.types";

const CachedResponseSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("structured"), items: z.array(z.record(z.unknown())) }),
  z.object({ kind: z.literal("text"), text: z.string() })
]);

export class VisionCacheService {
  private db?: Database;
  private ttlDays?: number;

  private getDb(): Database {
    if (!this.db) {
      throw new CacheErrors.NotInitializedError();
    }
    return this.db;
  }

  isReady(): boolean {
    return this.db !== undefined;
  }

  async init(filename: string = "./vision-cache.db", ttlDays?: number): Promise<void> {
    try {
      this.db = await open({
        filename: filename,
        driver: sqlite3.Database
      });

      await this.db.exec(`
        CREATE TABLE IF NOT EXISTS vision_cache (
          key TEXT PRIMARY KEY,
          data TEXT NOT NULL,
          created_at TEXT DEFAULT (datetime('now'))
        );
      `);

      await this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_vision_cache_created ON vision_cache(created_at);
      `);
    } catch (error) {
      if (error instanceof Error) {
        throw new CacheErrors.InitFailedError({ reason: error.message });
      }
      throw new CacheErrors.InitFailedError();
    }

    this.ttlDays = ttlDays;

    // Expired entries are removed on startup and skipped on read after that
    if (ttlDays !== undefined) {
      await this.purgeOlderThan(ttlDays);
    }

    logger.system(LOG_MESSAGES.CACHE_INITIALIZED, { db: filename });
  }

  /**
   * Returns the stored response for a key, or null on a miss. An entry older
   * than the TTL given to init() counts as a miss.
   * A row that no longer parses as a vision response is deleted and treated as a miss.
   */
  async get(key: string): Promise<VisionResponse | null> {
    try {
      const db = this.getDb();
      const row =
        this.ttlDays === undefined
          ? await db.get<{ data: string }>(`SELECT data FROM vision_cache WHERE key = ?`, [key])
          : await db.get<{ data: string }>(
              `SELECT data FROM vision_cache WHERE key = ? AND created_at >= datetime('now', ?)`,
              [key, `-${this.ttlDays} days`]
            );

      if (!row) {
        logger.debug(LOG_SOURCES.CACHE, LOG_MESSAGES.CACHE_MISS, { key });
        return null;
      }

      const parsed = this.parseRow(row.data);
      if (!parsed) {
        logger.warn(LOG_SOURCES.CACHE, LOG_MESSAGES.CACHE_CORRUPTED_ENTRY, { key });
        await db.run(`DELETE FROM vision_cache WHERE key = ?`, [key]);
        return null;
      }

      logger.debug(LOG_SOURCES.CACHE, LOG_MESSAGES.CACHE_HIT, { key });
      return parsed;
    } catch (error) {
      if (error instanceof CacheErrors.NotInitializedError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new CacheErrors.ReadFailedError({ reason: error.message, key });
      }
      throw new CacheErrors.ReadFailedError({ key });
    }
  }

  async save(key: string, response: VisionResponse): Promise<void> {
    try {
      const db = this.getDb();
      await db.run(
        `INSERT OR REPLACE INTO vision_cache (key, data, created_at) VALUES (?, ?, datetime('now'))`,
        [key, JSON.stringify(response)]
      );

      logger.debug(LOG_SOURCES.CACHE, LOG_MESSAGES.SAVED_TO_CACHE, { key });
    } catch (error) {
      if (error instanceof CacheErrors.NotInitializedError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new CacheErrors.WriteFailedError({ reason: error.message, key });
      }
      throw new CacheErrors.WriteFailedError({ key });
    }
  }

  async purgeOlderThan(ttlDays: number): Promise<number> {
    try {
      const db = this.getDb();
      const result = await db.run(`DELETE FROM vision_cache WHERE created_at < datetime('now', ?)`, [
        `-${ttlDays} days`
      ]);
      const count = result.changes ?? 0;

      logger.info(LOG_SOURCES.CACHE, LOG_MESSAGES.PURGED_OLD_RECORDS, { count, ttlDays });
      return count;
    } catch (error) {
      if (error instanceof Error) {
        throw new CacheErrors.PurgeFailedError({ reason: error.message });
      }
      throw new CacheErrors.PurgeFailedError();
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      try {
        await this.db.close();
        this.db = undefined;
        this.ttlDays = undefined;
        logger.system(LOG_MESSAGES.CACHE_DATABASE_CLOSED);
      } catch (error) {
        if (error instanceof Error) {
          throw new CacheErrors.CloseFailedError({ reason: error.message });
        }
        throw new CacheErrors.CloseFailedError();
      }
    }
  }

  private parseRow(data: string): VisionResponse | null {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      return null;
    }
    const result = CachedResponseSchema.safeParse(json);
    return result.success ? result.data : null;
  }
}

export const visionCacheService = new VisionCacheService();
