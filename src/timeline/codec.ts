import { z } from "zod";
import { StorageError } from "../errors.js";
import type { EncodedPayload, EntityType, EventDetail, EventPayload, ReadingData } from "./types.js";

const detailsSchema = z.array(z.object({ label: z.string(), value: z.string() }));
const genresSchema = z.array(z.string());
const readingDataSchema = z.object({
  bookId: z.number().int(),
  status: z.enum(["reading", "read", "abandoned"]),
  rating: z.number().nullable(),
});

// Key order is part of the stored format: build fresh objects so that
// JSON.stringify output never depends on how the input was constructed.
function encodeDetails(details: readonly EventDetail[]): string {
  return JSON.stringify(details.map((d) => ({ label: d.label, value: d.value })));
}

function encodeReading(reading: ReadingData): string {
  return JSON.stringify({ bookId: reading.bookId, status: reading.status, rating: reading.rating });
}

export function encodePayload(payload: EventPayload): EncodedPayload {
  const base = { title: payload.title, detailsJson: encodeDetails(payload.details) };
  switch (payload.entityType) {
    case "book":
      return { ...base, genresJson: JSON.stringify([...payload.genres]), readingDataJson: null };
    case "reading":
      return { ...base, genresJson: null, readingDataJson: encodeReading(payload.reading) };
    case "author":
    case "genre":
      return { ...base, genresJson: null, readingDataJson: null };
  }
}

function parseColumn<T>(raw: string, schema: z.ZodType<T>, column: string): T {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(`Malformed ${column}: not JSON`, { cause: err });
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new StorageError(`Malformed ${column}: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}

export function decodePayload(entityType: EntityType, encoded: EncodedPayload): EventPayload {
  const details = parseColumn(encoded.detailsJson, detailsSchema, "details_json");
  switch (entityType) {
    case "book":
      return {
        entityType,
        title: encoded.title,
        details,
        genres: encoded.genresJson ? parseColumn(encoded.genresJson, genresSchema, "genres_json") : [],
      };
    case "reading":
      if (!encoded.readingDataJson) {
        throw new StorageError("Malformed reading event: reading_data_json is missing");
      }
      return {
        entityType,
        title: encoded.title,
        details,
        reading: parseColumn(encoded.readingDataJson, readingDataSchema, "reading_data_json"),
      };
    case "author":
    case "genre":
      return { entityType, title: encoded.title, details };
  }
}

export function samePayload(a: EncodedPayload, b: EncodedPayload): boolean {
  return (
    a.title === b.title &&
    a.detailsJson === b.detailsJson &&
    a.genresJson === b.genresJson &&
    a.readingDataJson === b.readingDataJson
  );
}
