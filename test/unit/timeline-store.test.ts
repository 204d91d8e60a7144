import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ReadlogDB } from "../../src/db/database.js";
import { decodeCursor, encodeCursor } from "../../src/timeline/cursor.js";
import { TimelineStore } from "../../src/timeline/store.js";
import type { NewTimelineEvent } from "../../src/timeline/types.js";
import { StorageError, ValidationError } from "../../src/errors.js";

function authorEvent(entityId: number, occurredAt: number, userId: number | null = null): NewTimelineEvent {
  return {
    entityType: "author",
    entityId,
    action: "created",
    occurredAt,
    userId,
    payload: { entityType: "author", title: `Author ${entityId}`, details: [] },
  };
}

describe("cursor", () => {
  it("round-trips occurredAt and id", () => {
    const raw = encodeCursor({ occurredAt: 1_700_000_000_000, id: 42 });
    expect(raw).toBe(Buffer.from("1700000000000:42").toString("base64url"));
    expect(decodeCursor(raw)).toEqual({ occurredAt: 1_700_000_000_000, id: 42 });
  });

  it("rejects anything else with ValidationError", () => {
    expect(() => decodeCursor("not-a-cursor")).toThrow(ValidationError);
    expect(() => decodeCursor(Buffer.from("12:abc").toString("base64url"))).toThrow(
      "Invalid timeline cursor",
    );
  });
});

describe("TimelineStore", () => {
  let dir: string;
  let db: ReadlogDB;
  let store: TimelineStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "readlog-store-"));
    db = new ReadlogDB(join(dir, "readlog.db"));
    store = new TimelineStore(db);
    db.raw().prepare("INSERT INTO users (id, username, created_at) VALUES (1, 'ana', 0), (2, 'ben', 0)").run();
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it("appends and reads back an event", () => {
    const id = store.append(authorEvent(5, 1000, 1));
    expect(store.get(id)).toEqual({ id, ...authorEvent(5, 1000, 1) });
    expect(store.get(id + 100)).toBeNull();
  });

  it("lists one entity's events oldest first", () => {
    store.append(authorEvent(5, 3000));
    store.append(authorEvent(6, 2000));
    store.append(authorEvent(5, 1000));
    const events = store.listByEntity({ entityType: "author", entityId: 5 });
    expect(events.map((e) => e.occurredAt)).toEqual([1000, 3000]);
    expect(store.latestForEntity({ entityType: "author", entityId: 5 })?.occurredAt).toBe(3000);
    expect(store.latestForEntity({ entityType: "book", entityId: 5 })).toBeNull();
  });

  it("orders by occurredAt then id, newest first", () => {
    const a = store.append(authorEvent(1, 1000));
    const b = store.append(authorEvent(2, 2000));
    const c = store.append(authorEvent(3, 2000));
    const page = store.listGlobal(null, 10);
    expect(page.events.map((e) => e.id)).toEqual([c, b, a]);
    expect(page.nextCursor).toBeNull();
  });

  it("pages through equal timestamps without gaps or duplicates", () => {
    const ids = [1, 2, 3, 4, 5].map((n) => store.append(authorEvent(n, 5000, 1)));
    store.append(authorEvent(9, 5000, 2));

    const first = store.listByUser(1, null, 2);
    expect(first.events.map((e) => e.id)).toEqual([ids[4], ids[3]]);
    expect(first.nextCursor).toEqual({ occurredAt: 5000, id: ids[3] });

    const second = store.listByUser(1, first.nextCursor, 2);
    expect(second.events.map((e) => e.id)).toEqual([ids[2], ids[1]]);

    const third = store.listByUser(1, second.nextCursor, 2);
    expect(third.events.map((e) => e.id)).toEqual([ids[0]]);
    expect(third.nextCursor).toBeNull();
  });

  it("does not shift pages when newer events arrive", () => {
    for (let n = 1; n <= 4; n++) store.append(authorEvent(n, n * 1000));
    const first = store.listGlobal(null, 2);
    store.append(authorEvent(99, 10_000));
    const second = store.listGlobal(first.nextCursor, 2);
    expect(second.events.map((e) => e.occurredAt)).toEqual([2000, 1000]);
  });

  it("enumerates distinct entity keys in keyset order", () => {
    store.append(authorEvent(2, 1));
    store.append(authorEvent(2, 2));
    store.append(authorEvent(1, 3));
    store.append({
      entityType: "book",
      entityId: 1,
      action: "created",
      occurredAt: 4,
      userId: null,
      payload: { entityType: "book", title: "Dune", details: [], genres: [] },
    });

    expect(store.listEntityKeys(null, 2)).toEqual([
      { entityType: "author", entityId: 1 },
      { entityType: "author", entityId: 2 },
    ]);
    expect(store.listEntityKeys({ entityType: "author", entityId: 2 }, 2)).toEqual([
      { entityType: "book", entityId: 1 },
    ]);
  });

  it("rewrites payload columns only", () => {
    const id = store.append(authorEvent(5, 1000, 1));
    store.rewritePayload(id, { title: "Renamed", detailsJson: "[]", genresJson: null, readingDataJson: null });
    const event = store.get(id);
    expect(event?.payload.title).toBe("Renamed");
    expect(event?.occurredAt).toBe(1000);
    expect(event?.action).toBe("created");
    expect(event?.userId).toBe(1);
  });

  it("deletes and counts by entity and user", () => {
    store.append(authorEvent(5, 1, 1));
    store.append(authorEvent(5, 2, 2));
    store.append(authorEvent(6, 3, 1));
    expect(store.count()).toBe(3);
    expect(store.count({ userId: 1 })).toBe(2);
    expect(store.deleteByEntity({ entityType: "author", entityId: 5 })).toBe(2);
    expect(store.count()).toBe(1);
  });

  it("clears attribution when the user is deleted", () => {
    const id = store.append(authorEvent(5, 1, 2));
    db.raw().prepare("DELETE FROM users WHERE id = 2").run();
    expect(store.get(id)?.userId).toBeNull();
  });

  it("raises StorageError for a malformed stored row", () => {
    const id = store.append(authorEvent(5, 1));
    db.raw().prepare("UPDATE timeline_events SET details_json = 'oops' WHERE id = ?").run(id);
    expect(() => store.get(id)).toThrow(StorageError);
  });
});
