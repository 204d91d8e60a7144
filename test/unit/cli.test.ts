import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Cli } from "clipanion";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { openReadlog } from "../../src/app/context.js";
import { createCli } from "../../src/cli/program.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { encodeCursor } from "../../src/timeline/cursor.js";
import { makeClock, makeConfig, START } from "../helpers/fixtures.js";

async function run(args: string[]): Promise<string> {
  const chunks: string[] = [];
  const stdout = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  await createCli().run(args, { ...Cli.defaultContext, stdout });
  return chunks.join("");
}

describe("readlog CLI", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "readlog-cli-"));
    vi.stubEnv("READLOG_STATE_DIR", dir);
    vi.stubEnv("READLOG_CONFIG_PATH", join(dir, "readlog.config.json"));

    const ctx = openReadlog(makeConfig(), createSilentLogger(), {
      databasePath: join(dir, "readlog.db"),
      clock: makeClock().now,
    });
    try {
      ctx.catalog.createUser("ana");
      ctx.catalog.createGenre("Fantasy", 1);
      ctx.catalog.createBook({ title: "Dune" });
    } finally {
      ctx.close();
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
  });

  describe("timeline list", () => {
    it("prints one line per event, newest first", async () => {
      const output = await run(["timeline", "list"]);
      expect(output).toBe(
        "2025-06-15T12:00:00.000Z  book#1  created  Dune  (Author: Unknown)\n" +
          "2025-06-15T12:00:00.000Z  genre#1  created  Fantasy\n",
      );
    });

    it("prints the cursor of the next page", async () => {
      const output = await run(["timeline", "list", "--limit", "1"]);
      expect(output.split("\n")[1]).toBe(`Next cursor: ${encodeCursor({ occurredAt: START, id: 2 })}`);
    });

    it("filters by user", async () => {
      const output = await run(["timeline", "list", "--user", "1", "--json"]);
      const page = JSON.parse(output) as { items: Array<{ title: string }>; nextCursor: string | null };
      expect(page.items.map((i) => i.title)).toEqual(["Fantasy"]);
      expect(page.nextCursor).toBeNull();
    });

    it("reports a bad flag value", async () => {
      const output = await run(["timeline", "list", "--user", "0"]);
      expect(output).toBe('Failed to list timeline: --user must be a positive integer, got "0"\n');
      expect(process.exitCode).toBe(1);
    });
  });

  describe("timeline rebuild", () => {
    it("prints the report", async () => {
      const output = await run(["timeline", "rebuild"]);
      expect(output).toBe(
        [
          "Scanned:  2",
          "Updated:  0",
          "Orphaned: 0",
          "Pruned:   0",
          "Errors:   0",
          "Batches:  1",
          "",
        ].join("\n"),
      );
      expect(process.exitCode).toBeUndefined();
    });

    it("rejects an unknown orphan policy", async () => {
      const output = await run(["timeline", "rebuild", "--orphans", "shred"]);
      expect(output).toBe("Unknown orphan policy: shred (expected freeze or prune)\n");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("stats", () => {
    it("refreshes every user", async () => {
      expect(await run(["stats", "refresh"])).toBe("Refreshed statistics for 1 user(s).\n");
    });

    it("shows statistics as JSON", async () => {
      const output = await run(["stats", "show", "--user", "1", "--json"]);
      const data = JSON.parse(output) as { reading: { booksAllTime: number }; bookSummary: { totalBooks: number } };
      expect(data.reading.booksAllTime).toBe(0);
      expect(data.bookSummary.totalBooks).toBe(0);
    });

    it("shows one year", async () => {
      const output = await run(["stats", "show", "--user", "1", "--year", "2024"]);
      expect(output.split("\n").slice(0, 2)).toEqual([
        "Statistics for user 1, 2024",
        "Books:          0",
      ]);
    });

    it("fails for an unknown user", async () => {
      const output = await run(["stats", "show", "--user", "9"]);
      expect(output).toBe("Failed to load statistics: user 9 not found\n");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("config", () => {
    it("shows the effective configuration", async () => {
      const output = await run(["config", "show"]);
      const shown = JSON.parse(output) as { stateDir: string; databasePath: string; server: { port: number } };
      expect(shown.stateDir).toBe(dir);
      expect(shown.databasePath).toBe(join(dir, "readlog.db"));
      expect(shown.server.port).toBe(19880);
    });

    it("validates a config file", async () => {
      const good = join(dir, "good.json");
      const bad = join(dir, "bad.json");
      writeFileSync(good, JSON.stringify({ stats: { policy: "write-through" } }));
      writeFileSync(bad, JSON.stringify({ rebuild: { orphanPolicy: "shred" } }));

      expect(await run(["config", "validate", good])).toBe(`Config is valid: ${good}\n`);
      expect((await run(["config", "validate", bad])).split("\n")[0]).toBe(`Config is INVALID: ${bad}`);
      expect(process.exitCode).toBe(1);
    });

    it("reports a missing config file", async () => {
      const missing = join(dir, "missing.json");
      expect(await run(["config", "validate", missing])).toBe(`Config file not found: ${missing}\n`);
    });
  });
});
