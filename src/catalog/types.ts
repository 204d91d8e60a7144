import type { ReadingFormat, ReadingStatus } from "../timeline/types.js";

export type Shelf = "library" | "wishlist";
export type AuthorRole = "author" | "editor" | "translator";

export interface User {
  readonly id: number;
  readonly username: string;
  readonly createdAt: number;
}

export interface Author {
  readonly id: number;
  readonly name: string;
  readonly createdAt: number;
}

export interface Genre {
  readonly id: number;
  readonly name: string;
  readonly createdAt: number;
}

export interface Book {
  readonly id: number;
  readonly title: string;
  readonly isbn: string | null;
  readonly pageCount: number | null;
  readonly yearPublished: number | null;
  readonly primaryGenreId: number | null;
  readonly secondaryGenreId: number | null;
  readonly createdAt: number;
}

export interface BookAuthor {
  readonly authorId: number;
  readonly role: AuthorRole;
}

export interface UserBook {
  readonly id: number;
  readonly userId: number;
  readonly bookId: number;
  readonly shelf: Shelf;
  readonly createdAt: number;
}

export interface Reading {
  readonly id: number;
  readonly userId: number;
  readonly bookId: number;
  readonly status: ReadingStatus;
  /** Calendar dates, `YYYY-MM-DD`. */
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
  readonly rating: number | null;
  readonly format: ReadingFormat | null;
  readonly quickReviews: string[];
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface NewBook {
  readonly title: string;
  readonly isbn?: string | null;
  readonly pageCount?: number | null;
  readonly yearPublished?: number | null;
  readonly primaryGenreId?: number | null;
  readonly secondaryGenreId?: number | null;
  readonly authors?: BookAuthor[];
}

export type UpdateBook = Partial<NewBook>;

export interface NewReading {
  readonly userId: number;
  readonly bookId: number;
  readonly status?: ReadingStatus;
  readonly startedAt?: string | null;
  readonly finishedAt?: string | null;
  readonly rating?: number | null;
  readonly format?: ReadingFormat | null;
  readonly quickReviews?: string[];
}

export type UpdateReading = Partial<Omit<NewReading, "userId" | "bookId">>;
