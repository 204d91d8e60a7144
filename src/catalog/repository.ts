import type { ReadlogDB, Row } from "../db/database.js";
import { ConflictError, isUniqueViolation } from "../errors.js";
import type { Clock } from "../timeline/recorder.js";
import type { ReadingFormat, ReadingStatus } from "../timeline/types.js";
import type {
  Author,
  AuthorRole,
  Book,
  BookAuthor,
  Genre,
  NewBook,
  NewReading,
  Reading,
  Shelf,
  UpdateBook,
  UpdateReading,
  User,
  UserBook,
} from "./types.js";

/**
 * Row-level access to users, books, authors, genres, shelves and readings.
 * Nothing here records timeline events; see CatalogService.
 */
export class CatalogRepository {
  private readonly db;

  constructor(
    readlogDb: ReadlogDB,
    private readonly clock: Clock = Date.now,
  ) {
    this.db = readlogDb.raw();
  }

  // ── Users ──

  insertUser(username: string): User {
    const now = this.clock();
    const result = this.unique(`User ${username} already exists`, () =>
      this.db.prepare("INSERT INTO users (username, created_at) VALUES (?, ?)").run(username, now),
    );
    return { id: Number(result.lastInsertRowid), username, createdAt: now };
  }

  getUser(id: number): User | null {
    const row = this.db.prepare("SELECT * FROM users WHERE id = ?").get(id) as Row | undefined;
    return row ? this.rowToUser(row) : null;
  }

  listUsers(): User[] {
    const rows = this.db.prepare("SELECT * FROM users ORDER BY id").all() as Row[];
    return rows.map((r) => this.rowToUser(r));
  }

  deleteUser(id: number): boolean {
    return this.db.prepare("DELETE FROM users WHERE id = ?").run(id).changes > 0;
  }

  // ── Authors ──

  insertAuthor(name: string): Author {
    const now = this.clock();
    const result = this.unique(`Author ${name} already exists`, () =>
      this.db.prepare("INSERT INTO authors (name, created_at) VALUES (?, ?)").run(name, now),
    );
    return { id: Number(result.lastInsertRowid), name, createdAt: now };
  }

  getAuthor(id: number): Author | null {
    const row = this.db.prepare("SELECT * FROM authors WHERE id = ?").get(id) as Row | undefined;
    return row ? this.rowToNamed(row) : null;
  }

  listAuthors(): Author[] {
    const rows = this.db.prepare("SELECT * FROM authors ORDER BY name COLLATE NOCASE").all() as Row[];
    return rows.map((r) => this.rowToNamed(r));
  }

  renameAuthor(id: number, name: string): boolean {
    const result = this.unique(`Author ${name} already exists`, () =>
      this.db.prepare("UPDATE authors SET name = ? WHERE id = ?").run(name, id),
    );
    return result.changes > 0;
  }

  deleteAuthor(id: number): boolean {
    return this.db.prepare("DELETE FROM authors WHERE id = ?").run(id).changes > 0;
  }

  // ── Genres ──

  insertGenre(name: string): Genre {
    const now = this.clock();
    const result = this.unique(`Genre ${name} already exists`, () =>
      this.db.prepare("INSERT INTO genres (name, created_at) VALUES (?, ?)").run(name, now),
    );
    return { id: Number(result.lastInsertRowid), name, createdAt: now };
  }

  getGenre(id: number): Genre | null {
    const row = this.db.prepare("SELECT * FROM genres WHERE id = ?").get(id) as Row | undefined;
    return row ? this.rowToNamed(row) : null;
  }

  listGenres(): Genre[] {
    const rows = this.db.prepare("SELECT * FROM genres ORDER BY name COLLATE NOCASE").all() as Row[];
    return rows.map((r) => this.rowToNamed(r));
  }

  renameGenre(id: number, name: string): boolean {
    const result = this.unique(`Genre ${name} already exists`, () =>
      this.db.prepare("UPDATE genres SET name = ? WHERE id = ?").run(name, id),
    );
    return result.changes > 0;
  }

  deleteGenre(id: number): boolean {
    return this.db.prepare("DELETE FROM genres WHERE id = ?").run(id).changes > 0;
  }

  // ── Books ──

  insertBook(input: NewBook): Book {
    const now = this.clock();
    const result = this.db
      .prepare(
        `INSERT INTO books (title, isbn, page_count, year_published, primary_genre_id, secondary_genre_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.title,
        input.isbn ?? null,
        input.pageCount ?? null,
        input.yearPublished ?? null,
        input.primaryGenreId ?? null,
        input.secondaryGenreId ?? null,
        now,
      );
    const id = Number(result.lastInsertRowid);
    if (input.authors) this.setBookAuthors(id, input.authors);
    return {
      id,
      title: input.title,
      isbn: input.isbn ?? null,
      pageCount: input.pageCount ?? null,
      yearPublished: input.yearPublished ?? null,
      primaryGenreId: input.primaryGenreId ?? null,
      secondaryGenreId: input.secondaryGenreId ?? null,
      createdAt: now,
    };
  }

  getBook(id: number): Book | null {
    const row = this.db.prepare("SELECT * FROM books WHERE id = ?").get(id) as Row | undefined;
    return row ? this.rowToBook(row) : null;
  }

  updateBook(id: number, patch: UpdateBook): Book | null {
    const current = this.getBook(id);
    if (!current) return null;
    const next: Book = {
      ...current,
      title: patch.title ?? current.title,
      isbn: patch.isbn !== undefined ? patch.isbn : current.isbn,
      pageCount: patch.pageCount !== undefined ? patch.pageCount : current.pageCount,
      yearPublished: patch.yearPublished !== undefined ? patch.yearPublished : current.yearPublished,
      primaryGenreId: patch.primaryGenreId !== undefined ? patch.primaryGenreId : current.primaryGenreId,
      secondaryGenreId:
        patch.secondaryGenreId !== undefined ? patch.secondaryGenreId : current.secondaryGenreId,
    };
    this.db
      .prepare(
        `UPDATE books SET title = ?, isbn = ?, page_count = ?, year_published = ?,
           primary_genre_id = ?, secondary_genre_id = ?
         WHERE id = ?`,
      )
      .run(
        next.title,
        next.isbn,
        next.pageCount,
        next.yearPublished,
        next.primaryGenreId,
        next.secondaryGenreId,
        id,
      );
    if (patch.authors) this.setBookAuthors(id, patch.authors);
    return next;
  }

  deleteBook(id: number): boolean {
    return this.db.prepare("DELETE FROM books WHERE id = ?").run(id).changes > 0;
  }

  bookAuthors(bookId: number): Array<BookAuthor & { name: string }> {
    const rows = this.db
      .prepare(
        `SELECT ba.author_id, ba.role, a.name FROM book_authors ba
         JOIN authors a ON a.id = ba.author_id
         WHERE ba.book_id = ?
         ORDER BY ba.rowid`,
      )
      .all(bookId) as Row[];
    return rows.map((r) => ({
      authorId: r["author_id"] as number,
      role: r["role"] as AuthorRole,
      name: r["name"] as string,
    }));
  }

  /** Book ids credited to an author, in any role. */
  bookIdsByAuthor(authorId: number): number[] {
    const rows = this.db
      .prepare("SELECT DISTINCT book_id FROM book_authors WHERE author_id = ? ORDER BY book_id")
      .all(authorId) as Row[];
    return rows.map((r) => r["book_id"] as number);
  }

  bookIdsByGenre(genreId: number): number[] {
    const rows = this.db
      .prepare(
        "SELECT id FROM books WHERE primary_genre_id = ? OR secondary_genre_id = ? ORDER BY id",
      )
      .all(genreId, genreId) as Row[];
    return rows.map((r) => r["id"] as number);
  }

  private setBookAuthors(bookId: number, authors: readonly BookAuthor[]): void {
    this.db.prepare("DELETE FROM book_authors WHERE book_id = ?").run(bookId);
    const insert = this.db.prepare(
      "INSERT OR IGNORE INTO book_authors (book_id, author_id, role) VALUES (?, ?, ?)",
    );
    for (const a of authors) {
      insert.run(bookId, a.authorId, a.role);
    }
  }

  // ── Shelves ──

  getShelfEntry(userId: number, bookId: number): UserBook | null {
    const row = this.db
      .prepare("SELECT * FROM user_books WHERE user_id = ? AND book_id = ?")
      .get(userId, bookId) as Row | undefined;
    return row ? this.rowToUserBook(row) : null;
  }

  /** Adds the book to a shelf, or moves it there. */
  shelve(userId: number, bookId: number, shelf: Shelf): UserBook {
    this.db
      .prepare(
        `INSERT INTO user_books (user_id, book_id, shelf, created_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id, book_id) DO UPDATE SET shelf = excluded.shelf`,
      )
      .run(userId, bookId, shelf, this.clock());
    const entry = this.getShelfEntry(userId, bookId);
    if (!entry) throw new Error(`Shelf entry for user ${userId} book ${bookId} missing after write`);
    return entry;
  }

  unshelve(userId: number, bookId: number): boolean {
    return (
      this.db.prepare("DELETE FROM user_books WHERE user_id = ? AND book_id = ?").run(userId, bookId)
        .changes > 0
    );
  }

  // ── Readings ──

  insertReading(input: NewReading): Reading {
    const now = this.clock();
    const result = this.db
      .prepare(
        `INSERT INTO readings (user_id, book_id, status, started_at, finished_at, rating, format,
           quick_reviews, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.userId,
        input.bookId,
        input.status ?? "reading",
        input.startedAt ?? null,
        input.finishedAt ?? null,
        input.rating ?? null,
        input.format ?? null,
        JSON.stringify(input.quickReviews ?? []),
        now,
        now,
      );
    return {
      id: Number(result.lastInsertRowid),
      userId: input.userId,
      bookId: input.bookId,
      status: input.status ?? "reading",
      startedAt: input.startedAt ?? null,
      finishedAt: input.finishedAt ?? null,
      rating: input.rating ?? null,
      format: input.format ?? null,
      quickReviews: [...(input.quickReviews ?? [])],
      createdAt: now,
      updatedAt: now,
    };
  }

  getReading(id: number): Reading | null {
    const row = this.db.prepare("SELECT * FROM readings WHERE id = ?").get(id) as Row | undefined;
    return row ? this.rowToReading(row) : null;
  }

  updateReading(id: number, patch: UpdateReading): Reading | null {
    const current = this.getReading(id);
    if (!current) return null;
    const next: Reading = {
      ...current,
      status: patch.status ?? current.status,
      startedAt: patch.startedAt !== undefined ? patch.startedAt : current.startedAt,
      finishedAt: patch.finishedAt !== undefined ? patch.finishedAt : current.finishedAt,
      rating: patch.rating !== undefined ? patch.rating : current.rating,
      format: patch.format !== undefined ? patch.format : current.format,
      quickReviews: patch.quickReviews ? [...patch.quickReviews] : current.quickReviews,
      updatedAt: this.clock(),
    };
    this.db
      .prepare(
        `UPDATE readings SET status = ?, started_at = ?, finished_at = ?, rating = ?, format = ?,
           quick_reviews = ?, updated_at = ?
         WHERE id = ?`,
      )
      .run(
        next.status,
        next.startedAt,
        next.finishedAt,
        next.rating,
        next.format,
        JSON.stringify(next.quickReviews),
        next.updatedAt,
        id,
      );
    return next;
  }

  deleteReading(id: number): boolean {
    return this.db.prepare("DELETE FROM readings WHERE id = ?").run(id).changes > 0;
  }

  readingIdsByBook(bookId: number): number[] {
    const rows = this.db
      .prepare("SELECT id FROM readings WHERE book_id = ? ORDER BY id")
      .all(bookId) as Row[];
    return rows.map((r) => r["id"] as number);
  }

  /** Users with a reading or shelf entry for the book. */
  userIdsForBook(bookId: number): number[] {
    const rows = this.db
      .prepare(
        `SELECT user_id FROM readings WHERE book_id = ?
         UNION
         SELECT user_id FROM user_books WHERE book_id = ?
         ORDER BY user_id`,
      )
      .all(bookId, bookId) as Row[];
    return rows.map((r) => r["user_id"] as number);
  }

  private unique<T>(message: string, write: () => T): T {
    try {
      return write();
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(message, { cause: err });
      throw err;
    }
  }

  // ── Row mappers ──

  private rowToUser(row: Row): User {
    return {
      id: row["id"] as number,
      username: row["username"] as string,
      createdAt: row["created_at"] as number,
    };
  }

  private rowToNamed(row: Row): Author & Genre {
    return {
      id: row["id"] as number,
      name: row["name"] as string,
      createdAt: row["created_at"] as number,
    };
  }

  private rowToBook(row: Row): Book {
    return {
      id: row["id"] as number,
      title: row["title"] as string,
      isbn: (row["isbn"] as string | null) ?? null,
      pageCount: (row["page_count"] as number | null) ?? null,
      yearPublished: (row["year_published"] as number | null) ?? null,
      primaryGenreId: (row["primary_genre_id"] as number | null) ?? null,
      secondaryGenreId: (row["secondary_genre_id"] as number | null) ?? null,
      createdAt: row["created_at"] as number,
    };
  }

  private rowToUserBook(row: Row): UserBook {
    return {
      id: row["id"] as number,
      userId: row["user_id"] as number,
      bookId: row["book_id"] as number,
      shelf: row["shelf"] as Shelf,
      createdAt: row["created_at"] as number,
    };
  }

  private rowToReading(row: Row): Reading {
    return {
      id: row["id"] as number,
      userId: row["user_id"] as number,
      bookId: row["book_id"] as number,
      status: row["status"] as ReadingStatus,
      startedAt: (row["started_at"] as string | null) ?? null,
      finishedAt: (row["finished_at"] as string | null) ?? null,
      rating: (row["rating"] as number | null) ?? null,
      format: (row["format"] as ReadingFormat | null) ?? null,
      quickReviews: parseStringArray(row["quick_reviews"] as string | null),
      createdAt: row["created_at"] as number,
      updatedAt: row["updated_at"] as number,
    };
  }
}

function parseStringArray(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === "string") : [];
  } catch {
    return [];
  }
}
