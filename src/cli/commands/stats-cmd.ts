import { Command, Option } from "clipanion";
import { errorMessage } from "../../errors.js";
import type { BookSummaryStats, ReadingStats } from "../../stats/types.js";
import { parseOptionalInt, parsePositiveInt, withReadlog } from "../open.js";

function summaryLines(book: BookSummaryStats, reading: ReadingStats): string[] {
  const lines = [
    `Books:          ${book.totalBooks}`,
    `Authors:        ${book.totalAuthors}`,
    `Genres:         ${book.uniqueGenres}`,
    `Top genre:      ${book.topGenre ?? "-"}`,
    `Top author:     ${book.topAuthor ?? "-"}`,
    `Books read:     ${reading.booksAllTime}`,
    `Pages read:     ${reading.pagesAllTime}`,
    `In progress:    ${reading.booksInProgress}`,
    `Abandoned:      ${reading.booksAbandoned}`,
    `Average rating: ${reading.averageRating === null ? "-" : reading.averageRating.toFixed(2)}`,
  ];
  if (book.longestBook) {
    lines.push(`Longest:        ${book.longestBook.title} (${book.longestBook.pageCount} pages)`);
  }
  return lines;
}

export class StatsShowCommand extends Command {
  static override paths = [["stats", "show"]];

  static override usage = Command.Usage({
    description: "Show a user's reading statistics",
    examples: [
      ["Cached statistics", "readlog stats show --user 3"],
      ["One year", "readlog stats show --user 3 --year 2024"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  user = Option.String("--user", { description: "User id", required: true });
  year = Option.String("--year", { description: "Restrict to books finished that year", required: false });
  json = Option.Boolean("--json", false, { description: "Print the full statistics as JSON" });

  async execute(): Promise<void> {
    try {
      const userId = parsePositiveInt(this.user, "--user");
      const year = parseOptionalInt(this.year, "--year");
      const out = this.context.stdout;

      if (year !== undefined) {
        const stats = await withReadlog(this.config, (ctx) => ctx.facade.statsForYear(userId, year));
        if (this.json) {
          out.write(JSON.stringify(stats, null, 2) + "\n");
          return;
        }
        out.write(`Statistics for user ${userId}, ${year}\n`);
        for (const line of summaryLines(stats.bookSummary, stats.reading)) out.write(line + "\n");
        return;
      }

      const entry = await withReadlog(this.config, (ctx) => ctx.facade.stats(userId));
      if (this.json) {
        out.write(JSON.stringify(entry.data, null, 2) + "\n");
        return;
      }
      out.write(`Statistics for user ${userId} (computed ${new Date(entry.computedAt).toISOString()})\n`);
      for (const line of summaryLines(entry.data.bookSummary, entry.data.reading)) out.write(line + "\n");
    } catch (err) {
      this.context.stdout.write(`Failed to load statistics: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}

export class StatsRefreshCommand extends Command {
  static override paths = [["stats", "refresh"]];

  static override usage = Command.Usage({
    description: "Recompute cached statistics",
    examples: [
      ["One user", "readlog stats refresh --user 3"],
      ["Every user", "readlog stats refresh"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });
  user = Option.String("--user", { description: "User id (default: every user)", required: false });

  async execute(): Promise<void> {
    try {
      const userId = parseOptionalInt(this.user, "--user");
      const refreshed = await withReadlog(this.config, (ctx) => {
        const ids = userId !== undefined ? [userId] : ctx.repository.listUsers().map((u) => u.id);
        for (const id of ids) ctx.aggregator.refresh(id);
        return ids.length;
      });
      this.context.stdout.write(`Refreshed statistics for ${refreshed} user(s).\n`);
    } catch (err) {
      this.context.stdout.write(`Stats refresh failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
