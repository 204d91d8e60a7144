import Database from "better-sqlite3";
import { dirname } from "node:path";
import { ensureDir } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS users (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  username    TEXT NOT NULL UNIQUE,
  created_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS genres (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  name        TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_genres_name ON genres(LOWER(TRIM(name)));

CREATE TABLE IF NOT EXISTS authors (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  name        TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_authors_name ON authors(LOWER(TRIM(name)));

CREATE TABLE IF NOT EXISTS books (
  id                  INTEGER PRIMARY KEY AUTOINCREMENT,
  title               TEXT NOT NULL,
  isbn                TEXT,
  page_count          INTEGER,
  year_published      INTEGER,
  primary_genre_id    INTEGER REFERENCES genres(id) ON DELETE SET NULL,
  secondary_genre_id  INTEGER REFERENCES genres(id) ON DELETE SET NULL,
  created_at          INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_books_primary_genre ON books(primary_genre_id);
CREATE INDEX IF NOT EXISTS idx_books_secondary_genre ON books(secondary_genre_id);

CREATE TABLE IF NOT EXISTS book_authors (
  book_id     INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
  author_id   INTEGER NOT NULL REFERENCES authors(id) ON DELETE CASCADE,
  role        TEXT NOT NULL DEFAULT 'author' CHECK(role IN ('author','editor','translator')),
  PRIMARY KEY (book_id, author_id, role)
);
CREATE INDEX IF NOT EXISTS idx_book_authors_author ON book_authors(author_id);

CREATE TABLE IF NOT EXISTS user_books (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id     INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  book_id     INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
  shelf       TEXT NOT NULL DEFAULT 'library' CHECK(shelf IN ('library','wishlist')),
  created_at  INTEGER NOT NULL,
  UNIQUE(user_id, book_id)
);
CREATE INDEX IF NOT EXISTS idx_user_books_shelf ON user_books(user_id, shelf);

CREATE TABLE IF NOT EXISTS readings (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id       INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  book_id       INTEGER NOT NULL REFERENCES books(id) ON DELETE CASCADE,
  status        TEXT NOT NULL DEFAULT 'reading' CHECK(status IN ('reading','read','abandoned')),
  started_at    TEXT,
  finished_at   TEXT,
  rating        REAL CHECK(rating IS NULL OR (rating >= 0.5 AND rating <= 5.0 AND (rating * 2) = CAST(rating * 2 AS INTEGER))),
  format        TEXT CHECK(format IS NULL OR format IN ('physical','ereader','audiobook')),
  quick_reviews TEXT NOT NULL DEFAULT '[]',
  created_at    INTEGER NOT NULL,
  updated_at    INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_readings_book_id ON readings(book_id);
CREATE INDEX IF NOT EXISTS idx_readings_user_status_finished ON readings(user_id, status, finished_at);

CREATE TABLE IF NOT EXISTS timeline_events (
  id                INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_type       TEXT NOT NULL CHECK(entity_type IN ('author','book','reading','genre')),
  entity_id         INTEGER NOT NULL,
  action            TEXT NOT NULL,
  occurred_at       INTEGER NOT NULL,
  title             TEXT NOT NULL,
  details_json      TEXT NOT NULL DEFAULT '[]',
  genres_json       TEXT,
  reading_data_json TEXT,
  user_id           INTEGER REFERENCES users(id) ON DELETE SET NULL
);
CREATE INDEX IF NOT EXISTS idx_timeline_entity ON timeline_events(entity_type, entity_id, occurred_at, id);
CREATE INDEX IF NOT EXISTS idx_timeline_occurred ON timeline_events(occurred_at DESC, id DESC);
CREATE INDEX IF NOT EXISTS idx_timeline_user_occurred ON timeline_events(user_id, occurred_at DESC, id DESC);

CREATE TABLE IF NOT EXISTS stats_cache (
  user_id     INTEGER PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
  data        TEXT NOT NULL,
  computed_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS timeline_rebuild_state (
  id               INTEGER PRIMARY KEY CHECK(id = 1),
  last_entity_type TEXT NOT NULL,
  last_entity_id   INTEGER NOT NULL,
  counters         TEXT NOT NULL,
  updated_at       INTEGER NOT NULL
);
`;

export type Row = Record<string, unknown>;

export class ReadlogDB {
  private readonly db: Database.Database;

  /** Opens (or creates) the database file; ":memory:" is accepted for tests. */
  constructor(filePath: string) {
    if (filePath !== ":memory:") ensureDir(dirname(filePath));
    this.db = new Database(filePath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
    this.migrate();
  }

  /**
   * Forward-only migrations for existing databases.
   * Each migration is idempotent (checks before altering).
   */
  private migrate(): void {
    const columns = this.db
      .prepare("PRAGMA table_info(readings)")
      .all() as Array<{ name: string }>;
    if (columns.length > 0 && !columns.some((c) => c.name === "quick_reviews")) {
      this.db.exec("ALTER TABLE readings ADD COLUMN quick_reviews TEXT NOT NULL DEFAULT '[]'");
    }
  }

  /**
   * Runs `fn` in a transaction. Nested calls become savepoints, so an inner
   * failure that is caught rolls back only the inner work.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /**
   * Like `transaction`, but takes the write lock at BEGIN. Use it for
   * read-then-write work: a deferred transaction fails with SQLITE_BUSY when
   * another connection commits between its first read and its first write.
   * Nested calls are plain savepoints.
   */
  writeTransaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
