import type { EntityKey, EntityReader, EntitySnapshot } from "../timeline/types.js";
import { quickReviewLabel } from "./quick-reviews.js";
import type { CatalogRepository } from "./repository.js";

/** Current display state of catalog entities, for the recorder and rebuilder. */
export class CatalogReader implements EntityReader {
  constructor(private readonly repo: CatalogRepository) {}

  read(key: EntityKey): EntitySnapshot | null {
    switch (key.entityType) {
      case "author": {
        const author = this.repo.getAuthor(key.entityId);
        return author ? { entityType: "author", id: author.id, name: author.name } : null;
      }
      case "genre": {
        const genre = this.repo.getGenre(key.entityId);
        return genre ? { entityType: "genre", id: genre.id, name: genre.name } : null;
      }
      case "book":
        return this.readBook(key.entityId);
      case "reading":
        return this.readReading(key.entityId);
    }
  }

  dependents(key: EntityKey): EntityKey[] {
    switch (key.entityType) {
      case "author":
        return this.repo
          .bookIdsByAuthor(key.entityId)
          .map((entityId) => ({ entityType: "book" as const, entityId }));
      case "genre":
        return this.repo
          .bookIdsByGenre(key.entityId)
          .map((entityId) => ({ entityType: "book" as const, entityId }));
      case "book":
        return this.repo
          .readingIdsByBook(key.entityId)
          .map((entityId) => ({ entityType: "reading" as const, entityId }));
      case "reading":
        return [];
    }
  }

  private authorNames(bookId: number): string[] {
    return this.repo
      .bookAuthors(bookId)
      .filter((a) => a.role === "author")
      .map((a) => a.name);
  }

  private readBook(id: number): EntitySnapshot | null {
    const book = this.repo.getBook(id);
    if (!book) return null;

    const genres: string[] = [];
    for (const genreId of [book.primaryGenreId, book.secondaryGenreId]) {
      if (genreId === null) continue;
      const genre = this.repo.getGenre(genreId);
      if (genre && !genres.includes(genre.name)) genres.push(genre.name);
    }

    return {
      entityType: "book",
      id: book.id,
      title: book.title,
      authors: this.authorNames(book.id),
      genres,
      pageCount: book.pageCount,
    };
  }

  private readReading(id: number): EntitySnapshot | null {
    const reading = this.repo.getReading(id);
    if (!reading) return null;
    const book = this.repo.getBook(reading.bookId);
    if (!book) return null;

    return {
      entityType: "reading",
      id: reading.id,
      bookId: book.id,
      bookTitle: book.title,
      authors: this.authorNames(book.id),
      status: reading.status,
      rating: reading.rating,
      format: reading.format,
      quickReviews: reading.quickReviews.map(quickReviewLabel),
    };
  }
}
