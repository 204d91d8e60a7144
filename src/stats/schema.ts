import { z } from "zod";
import type { CachedStats } from "./types.js";

const nameCount = z.object({ name: z.string(), count: z.number() });
const namePages = z.object({ name: z.string(), pages: z.number() });
const titlePages = z.object({ title: z.string(), pageCount: z.number() }).nullable();

const bookSummarySchema = z.object({
  totalBooks: z.number(),
  totalAuthors: z.number(),
  uniqueGenres: z.number(),
  topGenre: z.string().nullable(),
  topAuthor: z.string().nullable(),
  mostRatedAuthor: z.string().nullable(),
  mostRatedGenre: z.string().nullable(),
  genreCounts: z.array(nameCount),
  maxGenreCount: z.number(),
  pageCountDistribution: z.array(nameCount),
  yearPublishedDistribution: z.array(nameCount),
  maxYearPublishedCount: z.number(),
  topAuthors: z.array(nameCount),
  maxTopAuthorCount: z.number(),
  longestBook: titlePages,
  shortestBook: titlePages,
});

const readingSchema = z.object({
  booksLast30Days: z.number(),
  booksAllTime: z.number(),
  pagesLast30Days: z.number(),
  pagesAllTime: z.number(),
  booksInProgress: z.number(),
  booksOnShelf: z.number(),
  booksOnWishlist: z.number(),
  booksAbandoned: z.number(),
  averageRating: z.number().nullable(),
  averageDaysToFinish: z.number().nullable(),
  ratingDistribution: z.array(z.object({ rating: z.number(), count: z.number() })),
  maxRatingCount: z.number(),
  monthlyBooks: z.array(nameCount),
  monthlyPages: z.array(namePages),
  maxMonthlyBooks: z.number(),
  maxMonthlyPages: z.number(),
  yearlyBooks: z.array(nameCount),
  yearlyPages: z.array(namePages),
  maxYearlyBooks: z.number(),
  maxYearlyPages: z.number(),
  paceDistribution: z.array(nameCount),
  formatCounts: z.array(nameCount),
});

/** Shape of `stats_cache.data`. */
export const cachedStatsSchema: z.ZodType<CachedStats> = z.object({
  bookSummary: bookSummarySchema,
  reading: readingSchema,
  computedAt: z.number(),
});
