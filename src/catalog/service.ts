import { NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { Clock, MutationRecorder } from "../timeline/recorder.js";
import type { EntityKey, EntityType, MutationNotice } from "../timeline/types.js";
import type { AffectedUsers, MutationBus } from "./bus.js";
import type { CatalogReader } from "./reader.js";
import type { CatalogRepository } from "./repository.js";
import {
  bookInputSchema,
  bookPatchSchema,
  nameSchema,
  newReadingSchema,
  parseInput,
  readingFieldsSchema,
} from "./schemas.js";
import type {
  Author,
  Book,
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

interface Change<T> {
  readonly result: T;
  readonly notice: MutationNotice;
  readonly related?: readonly EntityKey[];
  readonly affectedUsers: AffectedUsers;
}

export interface FinishReading {
  readonly finishedAt?: string;
  readonly rating?: number | null;
  readonly quickReviews?: string[];
}

/**
 * Entity mutations. Each write and its timeline event commit together;
 * the bus hears about it only after the commit.
 */
export class CatalogService {
  private readonly logger: Logger;

  constructor(
    private readonly repo: CatalogRepository,
    private readonly reader: CatalogReader,
    private readonly recorder: MutationRecorder,
    private readonly bus: MutationBus,
    logger: Logger,
    private readonly clock: Clock = Date.now,
  ) {
    this.logger = logger.child({ component: "catalog" });
  }

  // ── Users (not timeline entities) ──

  createUser(username: string): User {
    return this.repo.insertUser(parseInput(nameSchema, username, "username"));
  }

  /** Removes the user; their events stay, unattributed. */
  deleteUser(userId: number): void {
    if (!this.repo.deleteUser(userId)) throw new NotFoundError("user", userId);
    this.logger.info({ userId }, "Deleted user");
    this.bus.emit({ type: "user.deleted", userId });
  }

  // ── Authors ──

  createAuthor(name: string, actingUserId: number | null = null): Author {
    const clean = parseInput(nameSchema, name, "author name");
    return this.mutate(() => {
      const author = this.repo.insertAuthor(clean);
      return {
        result: author,
        notice: this.notice("author", author.id, "created", actingUserId),
        affectedUsers: [],
      };
    });
  }

  renameAuthor(authorId: number, name: string, actingUserId: number | null = null): Author {
    const clean = parseInput(nameSchema, name, "author name");
    return this.mutate(() => {
      if (!this.repo.renameAuthor(authorId, clean)) throw new NotFoundError("author", authorId);
      return {
        result: this.require(this.repo.getAuthor(authorId), "author", authorId),
        notice: this.notice("author", authorId, "renamed", actingUserId),
        affectedUsers: "all",
      };
    });
  }

  deleteAuthor(authorId: number, actingUserId: number | null = null): void {
    this.mutate(() => {
      const key = { entityType: "author" as const, entityId: authorId };
      const related = this.reader.dependents(key);
      if (!this.repo.deleteAuthor(authorId)) throw new NotFoundError("author", authorId);
      return {
        result: undefined,
        notice: { ...key, action: "deleted", actingUserId, state: null },
        related,
        affectedUsers: "all",
      };
    });
  }

  // ── Genres ──

  createGenre(name: string, actingUserId: number | null = null): Genre {
    const clean = parseInput(nameSchema, name, "genre name");
    return this.mutate(() => {
      const genre = this.repo.insertGenre(clean);
      return {
        result: genre,
        notice: this.notice("genre", genre.id, "created", actingUserId),
        affectedUsers: [],
      };
    });
  }

  renameGenre(genreId: number, name: string, actingUserId: number | null = null): Genre {
    const clean = parseInput(nameSchema, name, "genre name");
    return this.mutate(() => {
      if (!this.repo.renameGenre(genreId, clean)) throw new NotFoundError("genre", genreId);
      return {
        result: this.require(this.repo.getGenre(genreId), "genre", genreId),
        notice: this.notice("genre", genreId, "renamed", actingUserId),
        affectedUsers: "all",
      };
    });
  }

  deleteGenre(genreId: number, actingUserId: number | null = null): void {
    this.mutate(() => {
      const key = { entityType: "genre" as const, entityId: genreId };
      const related = this.reader.dependents(key);
      if (!this.repo.deleteGenre(genreId)) throw new NotFoundError("genre", genreId);
      return {
        result: undefined,
        notice: { ...key, action: "deleted", actingUserId, state: null },
        related,
        affectedUsers: "all",
      };
    });
  }

  // ── Books ──

  createBook(input: NewBook, actingUserId: number | null = null): Book {
    const book = parseInput(bookInputSchema, input, "book");
    return this.mutate(() => {
      this.checkBookReferences(book);
      const created = this.repo.insertBook(book);
      return {
        result: created,
        notice: this.notice("book", created.id, "created", actingUserId),
        affectedUsers: [],
      };
    });
  }

  updateBook(bookId: number, patch: UpdateBook, actingUserId: number | null = null): Book {
    const changes = parseInput(bookPatchSchema, patch, "book update");
    return this.mutate(() => {
      this.checkBookReferences(changes);
      const updated = this.require(this.repo.updateBook(bookId, changes), "book", bookId);
      return {
        result: updated,
        notice: this.notice("book", bookId, "updated", actingUserId),
        affectedUsers: this.repo.userIdsForBook(bookId),
      };
    });
  }

  deleteBook(bookId: number, actingUserId: number | null = null): void {
    this.mutate(() => {
      const key = { entityType: "book" as const, entityId: bookId };
      const related = this.reader.dependents(key);
      const affectedUsers = this.repo.userIdsForBook(bookId);
      if (!this.repo.deleteBook(bookId)) throw new NotFoundError("book", bookId);
      return {
        result: undefined,
        notice: { ...key, action: "deleted", actingUserId, state: null },
        related,
        affectedUsers,
      };
    });
  }

  shelveBook(userId: number, bookId: number, shelf: Shelf = "library"): UserBook {
    return this.mutate(() => {
      this.require(this.repo.getUser(userId), "user", userId);
      this.require(this.repo.getBook(bookId), "book", bookId);
      const entry = this.repo.shelve(userId, bookId, shelf);
      return {
        result: entry,
        notice: this.notice("book", bookId, shelf === "wishlist" ? "wishlisted" : "shelved", userId),
        affectedUsers: [userId],
      };
    });
  }

  unshelveBook(userId: number, bookId: number): void {
    this.mutate(() => {
      if (!this.repo.unshelve(userId, bookId)) {
        throw new NotFoundError(`shelf entry of user ${userId} for book`, bookId);
      }
      return {
        result: undefined,
        notice: this.notice("book", bookId, "unshelved", userId),
        affectedUsers: [userId],
      };
    });
  }

  // ── Readings ──

  /** Starts a reading; a wishlisted or unshelved book moves to the library. */
  startReading(input: NewReading): Reading {
    const fields = parseInput(newReadingSchema, input, "reading");
    return this.mutate(() => {
      this.require(this.repo.getUser(fields.userId), "user", fields.userId);
      this.require(this.repo.getBook(fields.bookId), "book", fields.bookId);
      const reading = this.repo.insertReading({
        ...fields,
        startedAt: fields.startedAt !== undefined ? fields.startedAt : this.today(),
      });
      if (this.repo.getShelfEntry(fields.userId, fields.bookId)?.shelf !== "library") {
        this.repo.shelve(fields.userId, fields.bookId, "library");
      }
      return {
        result: reading,
        notice: this.notice("reading", reading.id, "started", fields.userId),
        affectedUsers: [fields.userId],
      };
    });
  }

  updateReading(readingId: number, patch: UpdateReading, actingUserId?: number | null): Reading {
    const changes = parseInput(readingFieldsSchema, patch, "reading update");
    return this.changeReading(readingId, "updated", changes, actingUserId);
  }

  finishReading(readingId: number, input: FinishReading = {}, actingUserId?: number | null): Reading {
    const changes = parseInput(
      readingFieldsSchema,
      { ...input, status: "read", finishedAt: input.finishedAt ?? this.today() },
      "finished reading",
    );
    return this.changeReading(readingId, "finished", changes, actingUserId);
  }

  abandonReading(readingId: number, actingUserId?: number | null): Reading {
    return this.changeReading(readingId, "abandoned", { status: "abandoned" }, actingUserId);
  }

  deleteReading(readingId: number, actingUserId?: number | null): void {
    this.mutate(() => {
      const reading = this.require(this.repo.getReading(readingId), "reading", readingId);
      this.repo.deleteReading(readingId);
      return {
        result: undefined,
        notice: {
          entityType: "reading",
          entityId: readingId,
          action: "deleted",
          actingUserId: actingUserId ?? reading.userId,
          state: null,
        },
        affectedUsers: [reading.userId],
      };
    });
  }

  private changeReading(
    readingId: number,
    action: string,
    changes: UpdateReading,
    actingUserId: number | null | undefined,
  ): Reading {
    return this.mutate(() => {
      const current = this.require(this.repo.getReading(readingId), "reading", readingId);
      const updated = this.require(this.repo.updateReading(readingId, changes), "reading", readingId);
      if (updated.finishedAt !== null && updated.startedAt !== null && updated.finishedAt < updated.startedAt) {
        throw new ValidationError("A reading cannot finish before it starts");
      }
      return {
        result: updated,
        notice: this.notice("reading", readingId, action, actingUserId ?? current.userId),
        affectedUsers: [current.userId],
      };
    });
  }

  // ── Internals ──

  private mutate<T>(write: () => Change<T>): T {
    const { result, event } = this.recorder.commit(() => {
      const change = write();
      return { result: change, notice: change.notice };
    });
    this.bus.emit({
      type: "mutation.committed",
      notice: result.notice,
      event,
      related: result.related ?? [],
      affectedUsers: result.affectedUsers,
    });
    return result.result;
  }

  /** Notice carrying the entity's post-write snapshot. Runs inside the transaction. */
  private notice(
    entityType: EntityType,
    entityId: number,
    action: string,
    actingUserId: number | null | undefined,
  ): MutationNotice {
    const state = this.reader.read({ entityType, entityId });
    if (!state) throw new NotFoundError(entityType, entityId);
    return { entityType, entityId, action, actingUserId: actingUserId ?? null, state };
  }

  private checkBookReferences(book: UpdateBook): void {
    for (const genreId of [book.primaryGenreId, book.secondaryGenreId]) {
      if (genreId != null) this.require(this.repo.getGenre(genreId), "genre", genreId);
    }
    for (const { authorId } of book.authors ?? []) {
      this.require(this.repo.getAuthor(authorId), "author", authorId);
    }
  }

  private require<T>(value: T | null, entity: string, id: number): T {
    if (value === null) throw new NotFoundError(entity, id);
    return value;
  }

  private today(): string {
    return new Date(this.clock()).toISOString().slice(0, 10);
  }
}
