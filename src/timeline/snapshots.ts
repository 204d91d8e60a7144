import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { EntitySnapshot, EventDetail, EventPayload, ReadingFormat } from "./types.js";

const id = z.number().int().positive();
const name = z.string().trim().min(1);

const authorSnapshotSchema = z.object({
  entityType: z.literal("author"),
  id,
  name,
});

const genreSnapshotSchema = z.object({
  entityType: z.literal("genre"),
  id,
  name,
});

const bookSnapshotSchema = z.object({
  entityType: z.literal("book"),
  id,
  title: name,
  authors: z.array(name),
  genres: z.array(name).max(2),
  pageCount: z.number().int().positive().nullable(),
});

const readingSnapshotSchema = z.object({
  entityType: z.literal("reading"),
  id,
  bookId: id,
  bookTitle: name,
  authors: z.array(name),
  status: z.enum(["reading", "read", "abandoned"]),
  rating: z.number().min(0.5).max(5).multipleOf(0.5).nullable(),
  format: z.enum(["physical", "ereader", "audiobook"]).nullable(),
  quickReviews: z.array(name),
});

export const entitySnapshotSchema = z.discriminatedUnion("entityType", [
  authorSnapshotSchema,
  genreSnapshotSchema,
  bookSnapshotSchema,
  readingSnapshotSchema,
]);

/** Checks a snapshot handed in by the storage layer; throws ValidationError. */
export function validateSnapshot(input: unknown): EntitySnapshot {
  const result = entitySnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      "Invalid entity snapshot",
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}

const FORMAT_LABELS: Record<ReadingFormat, string> = {
  physical: "Physical",
  ereader: "eReader",
  audiobook: "Audiobook",
};

export function formatRating(rating: number): string {
  return `${rating}/5`;
}

function authorDetail(authors: readonly string[]): EventDetail {
  return { label: "Author", value: authors.length > 0 ? authors.join(", ") : "Unknown" };
}

/**
 * Derives the denormalized display payload for a snapshot. Pure: equal
 * snapshots always yield equal payloads, which keeps rebuilds idempotent.
 */
export function buildPayload(snapshot: EntitySnapshot): EventPayload {
  switch (snapshot.entityType) {
    case "author":
      return { entityType: "author", title: snapshot.name.trim(), details: [] };
    case "genre":
      return { entityType: "genre", title: snapshot.name.trim(), details: [] };
    case "book": {
      const genres = [...snapshot.genres];
      const details: EventDetail[] = [authorDetail(snapshot.authors)];
      if (genres.length > 0) {
        details.push({ label: "Genres", value: genres.join(", ") });
      }
      if (snapshot.pageCount !== null) {
        details.push({ label: "Pages", value: String(snapshot.pageCount) });
      }
      return { entityType: "book", title: snapshot.title.trim(), details, genres };
    }
    case "reading": {
      const details: EventDetail[] = [authorDetail(snapshot.authors)];
      if (snapshot.format !== null) {
        details.push({ label: "Format", value: FORMAT_LABELS[snapshot.format] });
      }
      if (snapshot.rating !== null) {
        details.push({ label: "Rating", value: formatRating(snapshot.rating) });
      }
      if (snapshot.quickReviews.length > 0) {
        details.push({ label: "Notes", value: snapshot.quickReviews.join(", ") });
      }
      return {
        entityType: "reading",
        title: snapshot.bookTitle.trim(),
        details,
        reading: { bookId: snapshot.bookId, status: snapshot.status, rating: snapshot.rating },
      };
    }
  }
}
