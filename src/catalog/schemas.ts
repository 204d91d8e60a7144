import { z } from "zod";
import { ValidationError } from "../errors.js";
import { isQuickReview } from "./quick-reviews.js";

const id = z.number().int().positive();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const nameSchema = z.string().trim().min(1).max(200);

export const bookInputSchema = z.object({
  title: z.string().trim().min(1).max(500),
  isbn: z.string().trim().min(1).nullable().optional(),
  pageCount: z.number().int().positive().nullable().optional(),
  yearPublished: z.number().int().nullable().optional(),
  primaryGenreId: id.nullable().optional(),
  secondaryGenreId: id.nullable().optional(),
  authors: z
    .array(z.object({ authorId: id, role: z.enum(["author", "editor", "translator"]) }))
    .optional(),
});

export const bookPatchSchema = bookInputSchema.partial();

export const readingFieldsSchema = z.object({
  status: z.enum(["reading", "read", "abandoned"]).optional(),
  startedAt: isoDate.nullable().optional(),
  finishedAt: isoDate.nullable().optional(),
  rating: z.number().min(0.5).max(5).multipleOf(0.5).nullable().optional(),
  format: z.enum(["physical", "ereader", "audiobook"]).nullable().optional(),
  quickReviews: z
    .array(z.string().refine(isQuickReview, { message: "unknown quick review" }))
    .optional(),
});

export const newReadingSchema = readingFieldsSchema.extend({ userId: id, bookId: id });

/** Parses service input, turning zod issues into a ValidationError. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return result.data;
}
