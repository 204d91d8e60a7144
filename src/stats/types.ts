export interface NameCount {
  readonly name: string;
  readonly count: number;
}

export interface NamePages {
  readonly name: string;
  readonly pages: number;
}

export interface RatingCount {
  readonly rating: number;
  readonly count: number;
}

export interface TitlePages {
  readonly title: string;
  readonly pageCount: number;
}

/** Genres, authors, page counts and publication years of the books in scope. */
export interface BookSummaryStats {
  readonly totalBooks: number;
  readonly totalAuthors: number;
  readonly uniqueGenres: number;
  readonly topGenre: string | null;
  readonly topAuthor: string | null;
  /** Author with the highest sum of ratings. */
  readonly mostRatedAuthor: string | null;
  readonly mostRatedGenre: string | null;
  readonly genreCounts: NameCount[];
  readonly maxGenreCount: number;
  /** Buckets `< 200`, `200 – 350`, `350 – 500`, `500+`. */
  readonly pageCountDistribution: NameCount[];
  /** By decade, e.g. `1990s`. */
  readonly yearPublishedDistribution: NameCount[];
  readonly maxYearPublishedCount: number;
  /** Ranked by finished readings. */
  readonly topAuthors: NameCount[];
  readonly maxTopAuthorCount: number;
  readonly longestBook: TitlePages | null;
  readonly shortestBook: TitlePages | null;
}

export interface ReadingStats {
  readonly booksLast30Days: number;
  readonly booksAllTime: number;
  readonly pagesLast30Days: number;
  readonly pagesAllTime: number;
  readonly booksInProgress: number;
  /** Library books without any reading. */
  readonly booksOnShelf: number;
  readonly booksOnWishlist: number;
  readonly booksAbandoned: number;
  readonly averageRating: number | null;
  readonly averageDaysToFinish: number | null;
  readonly ratingDistribution: RatingCount[];
  readonly maxRatingCount: number;
  /** Jan..Dec of the current (or requested) year. */
  readonly monthlyBooks: NameCount[];
  readonly monthlyPages: NamePages[];
  readonly maxMonthlyBooks: number;
  readonly maxMonthlyPages: number;
  readonly yearlyBooks: NameCount[];
  readonly yearlyPages: NamePages[];
  readonly maxYearlyBooks: number;
  readonly maxYearlyPages: number;
  /** Slow / Medium / Fast by pages per day. */
  readonly paceDistribution: NameCount[];
  readonly formatCounts: NameCount[];
}

export interface CachedStats {
  readonly bookSummary: BookSummaryStats;
  readonly reading: ReadingStats;
  readonly computedAt: number;
}

export interface StatsEntry {
  readonly userId: number;
  readonly data: CachedStats;
  readonly computedAt: number;
}

export interface YearStats {
  readonly year: number;
  readonly bookSummary: BookSummaryStats;
  readonly reading: ReadingStats;
}
