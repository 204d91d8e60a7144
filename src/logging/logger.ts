import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname" },
      };

  const options: pino.LoggerOptions = {
    name: "readlog",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ name: "readlog", level }, pino.destination(config.file));
  }

  return pino(options);
}

/** Logger for tests and library use: drops everything. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
