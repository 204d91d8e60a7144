import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";
import type { DatabaseConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["READLOG_STATE_DIR"] ?? join(homedir(), ".readlog");
}

export function getConfigPath(): string {
  return process.env["READLOG_CONFIG_PATH"] ?? "readlog.config.json";
}

export function resolveDatabasePath(stateDir: string, config: DatabaseConfig): string {
  return isAbsolute(config.file) ? config.file : join(stateDir, config.file);
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
