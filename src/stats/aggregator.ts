import type { ReadlogDB, Row } from "../db/database.js";
import { NotFoundError, toStorageError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { Clock } from "../timeline/recorder.js";
import type { StatsCacheStore } from "./cache.js";
import type {
  BookSummaryStats,
  CachedStats,
  NameCount,
  NamePages,
  RatingCount,
  ReadingStats,
  StatsEntry,
  TitlePages,
  YearStats,
} from "./types.js";

/** Books a summary is computed over, exposed to every query as `scope_books(book_id)`. */
interface BookScope {
  readonly cte: string;
  readonly params: readonly unknown[];
}

interface YearFilter {
  readonly sql: string;
  readonly params: readonly unknown[];
}

const MONTHS_CTE = `WITH months(m) AS (
  VALUES (1),(2),(3),(4),(5),(6),(7),(8),(9),(10),(11),(12)
)`;

const MONTH_NAME = `CASE m
  WHEN 1 THEN 'Jan' WHEN 2 THEN 'Feb' WHEN 3 THEN 'Mar'
  WHEN 4 THEN 'Apr' WHEN 5 THEN 'May' WHEN 6 THEN 'Jun'
  WHEN 7 THEN 'Jul' WHEN 8 THEN 'Aug' WHEN 9 THEN 'Sep'
  WHEN 10 THEN 'Oct' WHEN 11 THEN 'Nov' WHEN 12 THEN 'Dec'
END`;

const PAGE_BUCKET = `CASE
  WHEN b.page_count < 200 THEN '< 200'
  WHEN b.page_count <= 350 THEN '200 – 350'
  WHEN b.page_count <= 500 THEN '350 – 500'
  ELSE '500+'
END`;

const PAGES_PER_DAY =
  "b.page_count * 1.0 / MAX(1, julianday(r.finished_at) - julianday(r.started_at))";

function libraryScope(userId: number): BookScope {
  return {
    cte: `WITH scope_books AS (
      SELECT ub.book_id FROM user_books ub WHERE ub.user_id = ? AND ub.shelf = 'library'
    )`,
    params: [userId],
  };
}

function yearScope(userId: number, year: number): BookScope {
  return {
    cte: `WITH scope_books AS (
      SELECT DISTINCT r.book_id FROM readings r
      WHERE r.user_id = ? AND r.status = 'read'
        AND CAST(strftime('%Y', r.finished_at) AS INTEGER) = ?
    )`,
    params: [userId, year],
  };
}

function yearFilter(year: number | null, column: string): YearFilter {
  return year === null
    ? { sql: "", params: [] }
    : { sql: ` AND CAST(strftime('%Y', ${column}) AS INTEGER) = ?`, params: [year] };
}

function maxOf(values: number[]): number {
  return values.reduce((max, v) => Math.max(max, v), 0);
}

/**
 * Computes per-user statistics from the entity tables. `refresh` writes the
 * result to the cache; per-year figures are computed on demand.
 */
export class StatsAggregator {
  private readonly db;
  private readonly logger: Logger;

  constructor(
    private readonly readlogDb: ReadlogDB,
    private readonly cache: StatsCacheStore,
    logger: Logger,
    private readonly clock: Clock = Date.now,
  ) {
    this.db = readlogDb.raw();
    this.logger = logger.child({ component: "stats" });
  }

  /** Recomputes from scratch and replaces the user's cache row. */
  refresh(userId: number): StatsEntry {
    try {
      const entry = this.readlogDb.writeTransaction(() => {
        this.requireUser(userId);
        return this.cache.upsert(userId, this.compute(userId));
      });
      this.logger.debug({ userId, computedAt: entry.computedAt }, "Refreshed stats");
      return entry;
    } catch (err) {
      throw toStorageError(err, `Stats refresh for user ${userId} failed`);
    }
  }

  compute(userId: number): CachedStats {
    const now = this.clock();
    return {
      bookSummary: this.bookSummary(userId, libraryScope(userId), null),
      reading: this.readingStats(userId, null, now),
      computedAt: now,
    };
  }

  /** Same figures restricted to books finished in `year`; never cached. */
  computeForYear(userId: number, year: number): YearStats {
    return this.readlogDb.transaction(() => {
      this.requireUser(userId);
      return {
        year,
        bookSummary: this.bookSummary(userId, yearScope(userId, year), year),
        reading: this.readingStats(userId, year, this.clock()),
      };
    });
  }

  /** Years with at least one finished reading, newest first. */
  availableYears(userId: number): number[] {
    const rows = this.db
      .prepare(
        `SELECT DISTINCT CAST(strftime('%Y', finished_at) AS INTEGER) AS year
         FROM readings
         WHERE user_id = ? AND status = 'read' AND finished_at IS NOT NULL
         ORDER BY year DESC`,
      )
      .all(userId) as Row[];
    return rows.map((r) => r["year"] as number);
  }

  // ── Book summary ──

  private bookSummary(userId: number, scope: BookScope, year: number | null): BookSummaryStats {
    const { cte, params } = scope;

    const totalBooks = this.scalar(`${cte} SELECT COUNT(*) AS n FROM scope_books`, params);
    const totalAuthors = this.scalar(
      `${cte} SELECT COUNT(DISTINCT ba.author_id) AS n
       FROM scope_books sb JOIN book_authors ba ON ba.book_id = sb.book_id`,
      params,
    );
    const genreCounts = this.nameCounts(
      `${cte} SELECT g.name AS name, COUNT(*) AS count
       FROM scope_books sb
       JOIN books b ON b.id = sb.book_id
       JOIN genres g ON g.id IN (b.primary_genre_id, b.secondary_genre_id)
       GROUP BY g.id
       ORDER BY count DESC, g.name ASC`,
      params,
    );
    const topAuthor = this.nameCounts(
      `${cte} SELECT a.name AS name, COUNT(*) AS count
       FROM scope_books sb
       JOIN book_authors ba ON ba.book_id = sb.book_id
       JOIN authors a ON a.id = ba.author_id
       GROUP BY a.id
       ORDER BY count DESC, a.name ASC LIMIT 1`,
      params,
    )[0];
    const pageCountDistribution = this.nameCounts(
      `${cte} SELECT ${PAGE_BUCKET} AS name, COUNT(*) AS count
       FROM scope_books sb JOIN books b ON b.id = sb.book_id
       WHERE b.page_count IS NOT NULL
       GROUP BY name
       ORDER BY MIN(b.page_count)`,
      params,
    );
    const yearPublishedDistribution = this.nameCounts(
      `${cte} SELECT (b.year_published / 10 * 10) || 's' AS name, COUNT(*) AS count
       FROM scope_books sb JOIN books b ON b.id = sb.book_id
       WHERE b.year_published IS NOT NULL
       GROUP BY b.year_published / 10
       ORDER BY count DESC, name ASC`,
      params,
    );

    const finished = yearFilter(year, "r.finished_at");
    const topAuthors = this.nameCounts(
      `SELECT a.name AS name, COUNT(*) AS count
       FROM readings r
       JOIN book_authors ba ON ba.book_id = r.book_id AND ba.role = 'author'
       JOIN authors a ON a.id = ba.author_id
       WHERE r.user_id = ? AND r.status = 'read'${finished.sql}
       GROUP BY a.id
       ORDER BY count DESC, a.name ASC
       LIMIT 13`,
      [userId, ...finished.params],
    );

    return {
      totalBooks,
      totalAuthors,
      uniqueGenres: genreCounts.length,
      topGenre: genreCounts[0]?.name ?? null,
      topAuthor: topAuthor?.name ?? null,
      mostRatedAuthor: this.mostRatedAuthor(userId, year),
      mostRatedGenre: this.mostRatedGenre(userId, year),
      genreCounts,
      maxGenreCount: maxOf(genreCounts.map((g) => g.count)),
      pageCountDistribution,
      yearPublishedDistribution,
      maxYearPublishedCount: maxOf(yearPublishedDistribution.map((y) => y.count)),
      topAuthors,
      maxTopAuthorCount: maxOf(topAuthors.map((a) => a.count)),
      longestBook: this.extreme(scope, "DESC"),
      shortestBook: this.extreme(scope, "ASC"),
    };
  }

  private extreme(scope: BookScope, direction: "ASC" | "DESC"): TitlePages | null {
    const row = this.db
      .prepare(
        `${scope.cte} SELECT b.title, b.page_count
         FROM scope_books sb JOIN books b ON b.id = sb.book_id
         WHERE b.page_count IS NOT NULL
         ORDER BY b.page_count ${direction}, b.title ASC LIMIT 1`,
      )
      .get(...scope.params) as Row | undefined;
    return row ? { title: row["title"] as string, pageCount: row["page_count"] as number } : null;
  }

  private mostRatedAuthor(userId: number, year: number | null): string | null {
    const finished = yearFilter(year, "r.finished_at");
    const row = this.nameCounts(
      `SELECT a.name AS name, CAST(SUM(r.rating) AS INTEGER) AS count
       FROM readings r
       JOIN book_authors ba ON ba.book_id = r.book_id AND ba.role = 'author'
       JOIN authors a ON a.id = ba.author_id
       WHERE r.user_id = ? AND r.status = 'read' AND r.rating IS NOT NULL${finished.sql}
       GROUP BY a.id
       ORDER BY SUM(r.rating) DESC, a.name ASC LIMIT 1`,
      [userId, ...finished.params],
    )[0];
    return row?.name ?? null;
  }

  private mostRatedGenre(userId: number, year: number | null): string | null {
    const finished = yearFilter(year, "r.finished_at");
    const row = this.nameCounts(
      `SELECT g.name AS name, CAST(SUM(r.rating) AS INTEGER) AS count
       FROM readings r
       JOIN books b ON b.id = r.book_id
       JOIN genres g ON g.id IN (b.primary_genre_id, b.secondary_genre_id)
       WHERE r.user_id = ? AND r.status = 'read' AND r.rating IS NOT NULL${finished.sql}
       GROUP BY g.id
       ORDER BY SUM(r.rating) DESC, g.name ASC LIMIT 1`,
      [userId, ...finished.params],
    )[0];
    return row?.name ?? null;
  }

  // ── Reading stats ──

  private readingStats(userId: number, year: number | null, now: number): ReadingStats {
    const finished = yearFilter(year, "r.finished_at");
    const started = yearFilter(year, "r.started_at");
    const readParams = [userId, ...finished.params];
    const today = new Date(now).toISOString().slice(0, 10);
    const monthsOf = String(year ?? new Date(now).getUTCFullYear());

    const booksAllTime = this.scalar(
      `SELECT COUNT(*) AS n FROM readings r WHERE r.user_id = ? AND r.status = 'read'${finished.sql}`,
      readParams,
    );
    const pagesAllTime = this.scalar(
      `SELECT COALESCE(SUM(b.page_count), 0) AS n
       FROM readings r JOIN books b ON b.id = r.book_id
       WHERE r.user_id = ? AND r.status = 'read' AND b.page_count IS NOT NULL${finished.sql}`,
      readParams,
    );
    const averageRating = this.nullableScalar(
      `SELECT AVG(r.rating) AS n FROM readings r
       WHERE r.user_id = ? AND r.status = 'read' AND r.rating IS NOT NULL${finished.sql}`,
      readParams,
    );
    const averageDaysToFinish = this.nullableScalar(
      `SELECT AVG(julianday(r.finished_at) - julianday(r.started_at)) AS n FROM readings r
       WHERE r.user_id = ? AND r.status = 'read'
         AND r.started_at IS NOT NULL AND r.finished_at IS NOT NULL${finished.sql}`,
      readParams,
    );
    const ratingDistribution = (
      this.db
        .prepare(
          `SELECT r.rating AS rating, COUNT(*) AS count FROM readings r
           WHERE r.user_id = ? AND r.status = 'read' AND r.rating IS NOT NULL${finished.sql}
           GROUP BY r.rating ORDER BY r.rating`,
        )
        .all(...readParams) as Row[]
    ).map((r): RatingCount => ({ rating: r["rating"] as number, count: r["count"] as number }));

    const monthlyBooks = this.nameCounts(
      `${MONTHS_CTE}
       SELECT ${MONTH_NAME} AS name, COUNT(r.id) AS count
       FROM months
       LEFT JOIN readings r
         ON CAST(strftime('%m', r.finished_at) AS INTEGER) = m
         AND strftime('%Y', r.finished_at) = ?
         AND r.status = 'read' AND r.user_id = ?
       GROUP BY m ORDER BY m`,
      [monthsOf, userId],
    );
    const monthlyPages = this.namePages(
      `${MONTHS_CTE}
       SELECT ${MONTH_NAME} AS name, COALESCE(SUM(b.page_count), 0) AS pages
       FROM months
       LEFT JOIN readings r
         ON CAST(strftime('%m', r.finished_at) AS INTEGER) = m
         AND strftime('%Y', r.finished_at) = ?
         AND r.status = 'read' AND r.user_id = ?
       LEFT JOIN books b ON b.id = r.book_id AND b.page_count IS NOT NULL
       GROUP BY m ORDER BY m`,
      [monthsOf, userId],
    );

    const paceDistribution = this.nameCounts(
      `SELECT pace AS name, COUNT(*) AS count FROM (
         SELECT CASE
           WHEN ${PAGES_PER_DAY} < 15 THEN 'Slow'
           WHEN ${PAGES_PER_DAY} <= 40 THEN 'Medium'
           ELSE 'Fast'
         END AS pace
         FROM readings r JOIN books b ON b.id = r.book_id
         WHERE r.user_id = ? AND r.status = 'read'
           AND r.started_at IS NOT NULL AND r.finished_at IS NOT NULL
           AND b.page_count IS NOT NULL
           AND julianday(r.finished_at) >= julianday(r.started_at)${finished.sql}
       )
       GROUP BY pace
       ORDER BY CASE pace WHEN 'Slow' THEN 1 WHEN 'Medium' THEN 2 ELSE 3 END`,
      readParams,
    );
    const formatCounts = this.nameCounts(
      `SELECT CASE r.format
         WHEN 'physical' THEN 'Physical'
         WHEN 'ereader' THEN 'eReader'
         WHEN 'audiobook' THEN 'Audiobook'
       END AS name, COUNT(*) AS count
       FROM readings r
       WHERE r.user_id = ? AND r.status = 'read' AND r.format IS NOT NULL${finished.sql}
       GROUP BY r.format
       ORDER BY count DESC, name ASC`,
      readParams,
    );
    const booksAbandoned = this.scalar(
      `SELECT COUNT(*) AS n FROM readings r WHERE r.user_id = ? AND r.status = 'abandoned'${started.sql}`,
      [userId, ...started.params],
    );

    // Per-year views carry neither the all-time series nor current-state counters.
    const allTime = year === null;
    const yearlyBooks = allTime
      ? this.nameCounts(
          `SELECT strftime('%Y', r.finished_at) AS name, COUNT(*) AS count
           FROM readings r
           WHERE r.user_id = ? AND r.status = 'read' AND r.finished_at IS NOT NULL
           GROUP BY name ORDER BY name`,
          [userId],
        )
      : [];
    const yearlyPages = allTime
      ? this.namePages(
          `SELECT strftime('%Y', r.finished_at) AS name, COALESCE(SUM(b.page_count), 0) AS pages
           FROM readings r JOIN books b ON b.id = r.book_id
           WHERE r.user_id = ? AND r.status = 'read' AND r.finished_at IS NOT NULL
             AND b.page_count IS NOT NULL
           GROUP BY name ORDER BY name`,
          [userId],
        )
      : [];

    return {
      booksLast30Days: allTime
        ? this.scalar(
            `SELECT COUNT(*) AS n FROM readings r
             WHERE r.user_id = ? AND r.status = 'read' AND r.finished_at >= date(?, '-30 days')`,
            [userId, today],
          )
        : 0,
      booksAllTime,
      pagesLast30Days: allTime
        ? this.scalar(
            `SELECT COALESCE(SUM(b.page_count), 0) AS n
             FROM readings r JOIN books b ON b.id = r.book_id
             WHERE r.user_id = ? AND r.status = 'read' AND r.finished_at >= date(?, '-30 days')
               AND b.page_count IS NOT NULL`,
            [userId, today],
          )
        : 0,
      pagesAllTime,
      booksInProgress: allTime
        ? this.scalar(
            "SELECT COUNT(*) AS n FROM readings WHERE user_id = ? AND status = 'reading'",
            [userId],
          )
        : 0,
      booksOnShelf: allTime
        ? this.scalar(
            `SELECT COUNT(*) AS n FROM user_books ub
             WHERE ub.user_id = ? AND ub.shelf = 'library'
               AND NOT EXISTS (
                 SELECT 1 FROM readings r WHERE r.book_id = ub.book_id AND r.user_id = ub.user_id
               )`,
            [userId],
          )
        : 0,
      booksOnWishlist: allTime
        ? this.scalar(
            "SELECT COUNT(*) AS n FROM user_books WHERE user_id = ? AND shelf = 'wishlist'",
            [userId],
          )
        : 0,
      booksAbandoned,
      averageRating,
      averageDaysToFinish,
      ratingDistribution,
      maxRatingCount: maxOf(ratingDistribution.map((r) => r.count)),
      monthlyBooks,
      monthlyPages,
      maxMonthlyBooks: maxOf(monthlyBooks.map((m) => m.count)),
      maxMonthlyPages: maxOf(monthlyPages.map((m) => m.pages)),
      yearlyBooks,
      yearlyPages,
      maxYearlyBooks: maxOf(yearlyBooks.map((y) => y.count)),
      maxYearlyPages: maxOf(yearlyPages.map((y) => y.pages)),
      paceDistribution,
      formatCounts,
    };
  }

  // ── Query helpers ──

  private requireUser(userId: number): void {
    if (!this.db.prepare("SELECT 1 FROM users WHERE id = ?").get(userId)) {
      throw new NotFoundError("user", userId);
    }
  }

  private scalar(sql: string, params: readonly unknown[]): number {
    return this.nullableScalar(sql, params) ?? 0;
  }

  private nullableScalar(sql: string, params: readonly unknown[]): number | null {
    const row = this.db.prepare(sql).get(...params) as { n: number | null } | undefined;
    return row?.n ?? null;
  }

  private nameCounts(sql: string, params: readonly unknown[]): NameCount[] {
    const rows = this.db.prepare(sql).all(...params) as Row[];
    return rows.map((r) => ({ name: r["name"] as string, count: r["count"] as number }));
  }

  private namePages(sql: string, params: readonly unknown[]): NamePages[] {
    const rows = this.db.prepare(sql).all(...params) as Row[];
    return rows.map((r) => ({ name: r["name"] as string, pages: r["pages"] as number }));
  }
}
