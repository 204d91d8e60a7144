import type { ReadlogDB, Row } from "../db/database.js";
import { StorageError } from "../errors.js";
import { decodePayload, encodePayload } from "./codec.js";
import {
  ENTITY_TYPES,
  type EncodedPayload,
  type EntityKey,
  type EntityType,
  type NewTimelineEvent,
  type TimelineCursor,
  type TimelineEvent,
  type TimelinePage,
} from "./types.js";

const EVENT_COLUMNS = `id, entity_type, entity_id, action, occurred_at, title,
  details_json, genres_json, reading_data_json, user_id`;

export interface StoredPayload {
  readonly id: number;
  readonly encoded: EncodedPayload;
}

export function isEntityType(value: unknown): value is EntityType {
  return typeof value === "string" && (ENTITY_TYPES as readonly string[]).includes(value);
}

/**
 * Durable log of timeline events. Identity columns are written once by
 * `append`; only `rewritePayload` touches an existing row.
 */
export class TimelineStore {
  private readonly db;

  constructor(readlogDb: ReadlogDB) {
    this.db = readlogDb.raw();
  }

  append(event: NewTimelineEvent): number {
    const encoded = encodePayload(event.payload);
    const result = this.db
      .prepare(
        `INSERT INTO timeline_events (entity_type, entity_id, action, occurred_at, title,
           details_json, genres_json, reading_data_json, user_id)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.entityType,
        event.entityId,
        event.action,
        event.occurredAt,
        encoded.title,
        encoded.detailsJson,
        encoded.genresJson,
        encoded.readingDataJson,
        event.userId,
      );
    return Number(result.lastInsertRowid);
  }

  get(id: number): TimelineEvent | null {
    const row = this.db
      .prepare(`SELECT ${EVENT_COLUMNS} FROM timeline_events WHERE id = ?`)
      .get(id) as Row | undefined;
    return row ? this.toEvent(row) : null;
  }

  listByUser(userId: number, cursor: TimelineCursor | null, limit: number): TimelinePage {
    return this.page(["user_id = ?"], [userId], cursor, limit);
  }

  listGlobal(cursor: TimelineCursor | null, limit: number): TimelinePage {
    return this.page([], [], cursor, limit);
  }

  /** Every event of one entity, oldest first. */
  listByEntity(key: EntityKey): TimelineEvent[] {
    const rows = this.db
      .prepare(
        `SELECT ${EVENT_COLUMNS} FROM timeline_events
         WHERE entity_type = ? AND entity_id = ?
         ORDER BY occurred_at ASC, id ASC`,
      )
      .all(key.entityType, key.entityId) as Row[];
    return rows.map((r) => this.toEvent(r));
  }

  latestForEntity(key: EntityKey): TimelineEvent | null {
    const row = this.db
      .prepare(
        `SELECT ${EVENT_COLUMNS} FROM timeline_events
         WHERE entity_type = ? AND entity_id = ?
         ORDER BY occurred_at DESC, id DESC LIMIT 1`,
      )
      .get(key.entityType, key.entityId) as Row | undefined;
    return row ? this.toEvent(row) : null;
  }

  /** Distinct entity keys after `after`, in `(entity_type, entity_id)` order. */
  listEntityKeys(after: EntityKey | null, limit: number): EntityKey[] {
    const rows = (
      after
        ? this.db
            .prepare(
              `SELECT DISTINCT entity_type, entity_id FROM timeline_events
               WHERE entity_type > ? OR (entity_type = ? AND entity_id > ?)
               ORDER BY entity_type ASC, entity_id ASC LIMIT ?`,
            )
            .all(after.entityType, after.entityType, after.entityId, limit)
        : this.db
            .prepare(
              `SELECT DISTINCT entity_type, entity_id FROM timeline_events
               ORDER BY entity_type ASC, entity_id ASC LIMIT ?`,
            )
            .all(limit)
    ) as Row[];
    return rows.map((r) => ({
      entityType: this.entityTypeOf(r),
      entityId: r["entity_id"] as number,
    }));
  }

  /** Raw payload columns of an entity's events, for change detection. */
  listStoredPayloads(key: EntityKey): StoredPayload[] {
    const rows = this.db
      .prepare(
        `SELECT id, title, details_json, genres_json, reading_data_json FROM timeline_events
         WHERE entity_type = ? AND entity_id = ?
         ORDER BY occurred_at ASC, id ASC`,
      )
      .all(key.entityType, key.entityId) as Row[];
    return rows.map((r) => ({ id: r["id"] as number, encoded: this.toEncoded(r) }));
  }

  rewritePayload(id: number, encoded: EncodedPayload): boolean {
    const result = this.db
      .prepare(
        `UPDATE timeline_events
         SET title = ?, details_json = ?, genres_json = ?, reading_data_json = ?
         WHERE id = ?`,
      )
      .run(encoded.title, encoded.detailsJson, encoded.genresJson, encoded.readingDataJson, id);
    return result.changes > 0;
  }

  deleteByEntity(key: EntityKey): number {
    const result = this.db
      .prepare("DELETE FROM timeline_events WHERE entity_type = ? AND entity_id = ?")
      .run(key.entityType, key.entityId);
    return result.changes;
  }

  count(filter?: { userId?: number }): number {
    const row = (
      filter?.userId !== undefined
        ? this.db
            .prepare("SELECT COUNT(*) AS n FROM timeline_events WHERE user_id = ?")
            .get(filter.userId)
        : this.db.prepare("SELECT COUNT(*) AS n FROM timeline_events").get()
    ) as { n: number };
    return row.n;
  }

  private page(
    conditions: string[],
    values: unknown[],
    cursor: TimelineCursor | null,
    limit: number,
  ): TimelinePage {
    const where = [...conditions];
    const params = [...values];
    if (cursor) {
      where.push("(occurred_at < ? OR (occurred_at = ? AND id < ?))");
      params.push(cursor.occurredAt, cursor.occurredAt, cursor.id);
    }
    const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";

    // One extra row tells whether another page exists.
    const rows = this.db
      .prepare(
        `SELECT ${EVENT_COLUMNS} FROM timeline_events ${clause}
         ORDER BY occurred_at DESC, id DESC LIMIT ?`,
      )
      .all(...params, limit + 1) as Row[];

    const events = rows.slice(0, limit).map((r) => this.toEvent(r));
    const last = events[events.length - 1];
    const nextCursor =
      rows.length > limit && last ? { occurredAt: last.occurredAt, id: last.id } : null;
    return { events, nextCursor };
  }

  // ── Row mappers ──

  private entityTypeOf(row: Row): EntityType {
    const value = row["entity_type"];
    if (!isEntityType(value)) {
      throw new StorageError(`Unknown entity_type in timeline_events: ${String(value)}`);
    }
    return value;
  }

  private toEncoded(row: Row): EncodedPayload {
    return {
      title: row["title"] as string,
      detailsJson: (row["details_json"] as string | null) ?? "[]",
      genresJson: (row["genres_json"] as string | null) ?? null,
      readingDataJson: (row["reading_data_json"] as string | null) ?? null,
    };
  }

  private toEvent(row: Row): TimelineEvent {
    const entityType = this.entityTypeOf(row);
    return {
      id: row["id"] as number,
      entityType,
      entityId: row["entity_id"] as number,
      action: row["action"] as string,
      occurredAt: row["occurred_at"] as number,
      userId: (row["user_id"] as number | null) ?? null,
      payload: decodePayload(entityType, this.toEncoded(row)),
    };
  }
}
