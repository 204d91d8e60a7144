export type OrphanPolicy = "freeze" | "prune";
export type StatsPolicy = "lazy" | "write-through";

export interface ReadlogConfig {
  readonly server: ServerConfig;
  readonly database: DatabaseConfig;
  readonly logging?: LoggingConfig;
  readonly timeline: TimelineConfig;
  readonly rebuild: RebuildConfig;
  readonly stats: StatsConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface DatabaseConfig {
  /** File name inside the state directory, or an absolute path. */
  readonly file: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface TimelineConfig {
  readonly defaultLimit: number;
  readonly maxLimit: number;
}

export interface RebuildConfig {
  readonly batchSize: number;
  readonly orphanPolicy: OrphanPolicy;
  /** Cron expression for a periodic full rebuild. */
  readonly schedule?: string;
  readonly debounceMs: number;
}

export interface StatsConfig {
  readonly policy: StatsPolicy;
  readonly staleAfterMs?: number;
}
