import type { ReadlogDB, Row } from "../db/database.js";
import type { Logger } from "../logging/logger.js";
import { cachedStatsSchema } from "./schema.js";
import type { CachedStats, StatsEntry } from "./types.js";

/** One row per user; every write replaces the whole row. */
export class StatsCacheStore {
  private readonly db;

  constructor(
    readlogDb: ReadlogDB,
    private readonly logger: Logger,
  ) {
    this.db = readlogDb.raw();
  }

  get(userId: number): StatsEntry | null {
    const row = this.db
      .prepare("SELECT user_id, data, computed_at FROM stats_cache WHERE user_id = ?")
      .get(userId) as Row | undefined;
    if (!row) return null;

    // Unreadable rows are misses; the next refresh overwrites them.
    let json: unknown;
    try {
      json = JSON.parse(row["data"] as string);
    } catch (err) {
      this.logger.warn({ err, userId }, "Unreadable stats cache row");
      return null;
    }
    const parsed = cachedStatsSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ userId, issue: parsed.error.issues[0]?.message }, "Malformed stats cache row");
      return null;
    }
    return { userId, data: parsed.data, computedAt: row["computed_at"] as number };
  }

  upsert(userId: number, data: CachedStats): StatsEntry {
    this.db
      .prepare(
        `INSERT INTO stats_cache (user_id, data, computed_at) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET data = excluded.data, computed_at = excluded.computed_at`,
      )
      .run(userId, JSON.stringify(data), data.computedAt);
    return { userId, data, computedAt: data.computedAt };
  }

  invalidate(userId: number): boolean {
    return this.db.prepare("DELETE FROM stats_cache WHERE user_id = ?").run(userId).changes > 0;
  }

  invalidateAll(): number {
    return this.db.prepare("DELETE FROM stats_cache").run().changes;
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS n FROM stats_cache").get() as { n: number };
    return row.n;
  }
}
