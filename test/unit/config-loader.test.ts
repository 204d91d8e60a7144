import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, substituteEnv } from "../../src/config/loader.js";
import { getConfigPath, getStateDir, resolveDatabasePath } from "../../src/config/paths.js";
import { parseConfig } from "../../src/config/schema.js";

describe("substituteEnv", () => {
  beforeEach(() => {
    process.env["TEST_DB_FILE"] = "books.db";
    process.env["TEST_PORT"] = "9999";
  });

  afterEach(() => {
    delete process.env["TEST_DB_FILE"];
    delete process.env["TEST_PORT"];
  });

  it("substitutes env vars in text", () => {
    expect(substituteEnv("file: ${env:TEST_DB_FILE}")).toBe("file: books.db");
  });

  it("substitutes multiple env vars", () => {
    expect(substituteEnv("${env:TEST_DB_FILE}:${env:TEST_PORT}")).toBe("books.db:9999");
  });

  it("throws for missing env var", () => {
    expect(() => substituteEnv("${env:MISSING_VAR}")).toThrow(
      "Missing environment variable: MISSING_VAR",
    );
  });

  it("only matches uppercase var names", () => {
    const text = "${env:lowercase}";
    expect(substituteEnv(text)).toBe(text);
  });
});

describe("parseConfig", () => {
  it("parses minimal config with defaults", () => {
    const config = parseConfig({});
    expect(config.server.port).toBe(19880);
    expect(config.server.hostname).toBe("127.0.0.1");
    expect(config.database.file).toBe("readlog.db");
    expect(config.timeline).toEqual({ defaultLimit: 20, maxLimit: 100 });
    expect(config.rebuild.batchSize).toBe(200);
    expect(config.rebuild.orphanPolicy).toBe("freeze");
    expect(config.rebuild.debounceMs).toBe(2000);
    expect(config.rebuild.schedule).toBeUndefined();
    expect(config.stats.policy).toBe("lazy");
    expect(config.stats.staleAfterMs).toBeUndefined();
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      server: { port: 8080 },
      rebuild: { orphanPolicy: "prune", schedule: "0 3 * * *" },
      stats: { policy: "write-through", staleAfterMs: 60_000 },
    });
    expect(config.server.port).toBe(8080);
    expect(config.rebuild.orphanPolicy).toBe("prune");
    expect(config.rebuild.schedule).toBe("0 3 * * *");
    expect(config.stats.policy).toBe("write-through");
    expect(config.stats.staleAfterMs).toBe(60_000);
  });

  it("rejects an unknown orphan policy", () => {
    expect(() => parseConfig({ rebuild: { orphanPolicy: "delete" } })).toThrow();
  });

  it("rejects a default limit above the maximum", () => {
    expect(() => parseConfig({ timeline: { defaultLimit: 50, maxLimit: 10 } })).toThrow(
      "timeline.defaultLimit must not exceed timeline.maxLimit",
    );
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "readlog-config-"));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    const config = loadConfig(join(dir, "missing.json"));
    expect(config.server.port).toBe(19880);
  });

  it("reads and validates a file with env substitution", () => {
    vi.stubEnv("READLOG_TEST_PORT", "7000");
    const path = join(dir, "readlog.config.json");
    writeFileSync(path, '{ "server": { "port": ${env:READLOG_TEST_PORT} } }');
    expect(loadConfig(path).server.port).toBe(7000);
  });

  it("throws on invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path)).toThrow();
  });
});

describe("paths", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the state dir and config path from the environment", () => {
    vi.stubEnv("READLOG_STATE_DIR", "/tmp/readlog-state");
    vi.stubEnv("READLOG_CONFIG_PATH", "/tmp/readlog.json");
    expect(getStateDir()).toBe("/tmp/readlog-state");
    expect(getConfigPath()).toBe("/tmp/readlog.json");
  });

  it("resolves relative database files inside the state dir", () => {
    expect(resolveDatabasePath("/state", { file: "readlog.db" })).toBe(join("/state", "readlog.db"));
    expect(resolveDatabasePath("/state", { file: "/data/other.db" })).toBe("/data/other.db");
  });
});
