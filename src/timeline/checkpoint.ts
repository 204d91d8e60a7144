import { z } from "zod";
import type { ReadlogDB, Row } from "../db/database.js";
import { isEntityType } from "./store.js";
import type { EntityKey } from "./types.js";

export interface RebuildCounters {
  scanned: number;
  updated: number;
  /** Entities that no longer exist, not events. */
  orphaned: number;
  pruned: number;
  errors: number;
  batches: number;
}

export interface RebuildCheckpoint {
  readonly last: EntityKey;
  readonly counters: RebuildCounters;
  readonly updatedAt: number;
}

const countersSchema = z.object({
  scanned: z.number().int().min(0),
  updated: z.number().int().min(0),
  orphaned: z.number().int().min(0),
  pruned: z.number().int().min(0),
  errors: z.number().int().min(0),
  batches: z.number().int().min(0),
});

export function emptyCounters(): RebuildCounters {
  return { scanned: 0, updated: 0, orphaned: 0, pruned: 0, errors: 0, batches: 0 };
}

function parseCounters(raw: string): RebuildCounters | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = countersSchema.safeParse(json);
  return result.success ? result.data : null;
}

/** Single-row progress marker of the last interrupted full rebuild. */
export class RebuildCheckpointStore {
  private readonly db;

  constructor(readlogDb: ReadlogDB) {
    this.db = readlogDb.raw();
  }

  load(): RebuildCheckpoint | null {
    const row = this.db
      .prepare("SELECT * FROM timeline_rebuild_state WHERE id = 1")
      .get() as Row | undefined;
    if (!row) return null;

    const entityType = row["last_entity_type"];
    const counters = parseCounters(row["counters"] as string);
    // An unreadable checkpoint only costs a restart from the beginning.
    if (!isEntityType(entityType) || !counters) return null;

    return {
      last: { entityType, entityId: row["last_entity_id"] as number },
      counters,
      updatedAt: row["updated_at"] as number,
    };
  }

  save(last: EntityKey, counters: RebuildCounters, now: number): void {
    this.db
      .prepare(
        `INSERT INTO timeline_rebuild_state (id, last_entity_type, last_entity_id, counters, updated_at)
         VALUES (1, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           last_entity_type = excluded.last_entity_type,
           last_entity_id = excluded.last_entity_id,
           counters = excluded.counters,
           updated_at = excluded.updated_at`,
      )
      .run(last.entityType, last.entityId, JSON.stringify(counters), now);
  }

  clear(): void {
    this.db.prepare("DELETE FROM timeline_rebuild_state WHERE id = 1").run();
  }
}
