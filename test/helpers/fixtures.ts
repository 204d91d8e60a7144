import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openReadlog, type ReadlogContext } from "../../src/app/context.js";
import { parseConfig } from "../../src/config/schema.js";
import type { ReadlogConfig } from "../../src/config/types.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import type { Clock } from "../../src/timeline/recorder.js";

/** 2025-06-15T12:00:00.000Z */
export const START = Date.UTC(2025, 5, 15, 12, 0, 0);

export interface TestClock {
  readonly now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

export function makeClock(start = START): TestClock {
  let current = start;
  return {
    now: () => current,
    advance(ms) {
      current += ms;
    },
    set(ms) {
      current = ms;
    },
  };
}

export function makeConfig(overrides: Record<string, unknown> = {}): ReadlogConfig {
  return parseConfig({ logging: { level: "error" }, ...overrides });
}

export interface TestContext extends ReadlogContext {
  readonly dir: string;
  readonly time: TestClock;
  dispose(): void;
}

/** Full component graph over a fresh database in a temp directory. */
export function createTestContext(
  options: { config?: ReadlogConfig; clock?: TestClock } = {},
): TestContext {
  const dir = mkdtempSync(join(tmpdir(), "readlog-test-"));
  const time = options.clock ?? makeClock();
  const ctx = openReadlog(options.config ?? makeConfig(), createSilentLogger(), {
    databasePath: join(dir, "readlog.db"),
    clock: time.now,
  });
  return {
    ...ctx,
    dir,
    time,
    dispose() {
      ctx.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
