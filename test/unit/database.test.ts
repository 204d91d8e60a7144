import { describe, it, expect, beforeEach, afterEach } from "vitest";
import Database from "better-sqlite3";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ReadlogDB } from "../../src/db/database.js";

describe("ReadlogDB", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "readlog-db-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the schema and nested directories", () => {
    const db = new ReadlogDB(join(dir, "nested", "readlog.db"));
    const tables = db
      .raw()
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all() as Array<{ name: string }>;
    expect(tables.map((t) => t.name)).toEqual(
      expect.arrayContaining([
        "authors",
        "book_authors",
        "books",
        "genres",
        "readings",
        "stats_cache",
        "timeline_events",
        "timeline_rebuild_state",
        "user_books",
        "users",
      ]),
    );
    expect(db.isOpen()).toBe(true);
    db.close();
    expect(db.isOpen()).toBe(false);
  });

  it("is safe to open twice", () => {
    const path = join(dir, "readlog.db");
    new ReadlogDB(path).close();
    const db = new ReadlogDB(path);
    expect(db.isOpen()).toBe(true);
    db.close();
  });

  it("adds quick_reviews to an older readings table", () => {
    const path = join(dir, "old.db");
    const old = new Database(path);
    old.exec(`CREATE TABLE readings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      book_id INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'reading',
      started_at TEXT,
      finished_at TEXT,
      rating REAL,
      format TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )`);
    old.close();

    const db = new ReadlogDB(path);
    const columns = db.raw().prepare("PRAGMA table_info(readings)").all() as Array<{ name: string }>;
    expect(columns.map((c) => c.name)).toContain("quick_reviews");
    db.close();
  });

  it("keeps at most one stats row per user and drops it with the user", () => {
    const db = new ReadlogDB(":memory:");
    const raw = db.raw();
    raw.prepare("INSERT INTO users (id, username, created_at) VALUES (1, 'ana', 0)").run();
    raw.prepare("INSERT INTO stats_cache (user_id, data, computed_at) VALUES (1, '{}', 1)").run();
    expect(() =>
      raw.prepare("INSERT INTO stats_cache (user_id, data, computed_at) VALUES (1, '{}', 2)").run(),
    ).toThrow();
    raw.prepare("DELETE FROM users WHERE id = 1").run();
    expect(raw.prepare("SELECT COUNT(*) AS n FROM stats_cache").get()).toEqual({ n: 0 });
    db.close();
  });

  it("rolls back a failed transaction", () => {
    const db = new ReadlogDB(":memory:");
    expect(() =>
      db.transaction(() => {
        db.raw().prepare("INSERT INTO users (username, created_at) VALUES ('ana', 0)").run();
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(db.raw().prepare("SELECT COUNT(*) AS n FROM users").get()).toEqual({ n: 0 });
    db.close();
  });

  it("holds the write lock for the whole of a write transaction", () => {
    const path = join(dir, "readlog.db");
    const db = new ReadlogDB(path);
    const other = new ReadlogDB(path);
    other.raw().pragma("busy_timeout = 0");
    const insert = (target: ReadlogDB, name: string) =>
      target.raw().prepare("INSERT INTO users (username, created_at) VALUES (?, 0)").run(name);

    try {
      db.writeTransaction(() => {
        db.raw().prepare("SELECT COUNT(*) AS n FROM users").get();
        expect(() => insert(other, "ben")).toThrow(/database is locked/);
        insert(db, "ana");
      });
      insert(other, "ben");

      expect(db.raw().prepare("SELECT username FROM users ORDER BY id").all()).toEqual([
        { username: "ana" },
        { username: "ben" },
      ]);
    } finally {
      other.close();
      db.close();
    }
  });
});
