import { openReadlog, type ReadlogContext } from "../app/context.js";
import { loadConfig } from "../config/loader.js";
import { createSilentLogger } from "../logging/logger.js";

/**
 * Opens the configured database for a one-shot command and closes it
 * afterwards. Logging stays quiet so command output is all that reaches stdout.
 */
export async function withReadlog<T>(
  configPath: string | undefined,
  fn: (ctx: ReadlogContext) => T | Promise<T>,
): Promise<T> {
  const config = loadConfig(configPath);
  const ctx = openReadlog(config, createSilentLogger());
  try {
    return await fn(ctx);
  } finally {
    await ctx.runs.close();
    ctx.close();
  }
}

export function parsePositiveInt(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseOptionalInt(value: string | undefined, flag: string): number | undefined {
  return value === undefined ? undefined : parsePositiveInt(value, flag);
}
