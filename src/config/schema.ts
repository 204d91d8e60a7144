import { z } from "zod";
import type { ReadlogConfig } from "./types.js";

const serverSchema = z.object({
  port: z.number().int().positive().default(19880),
  hostname: z.string().default("127.0.0.1"),
});

const databaseSchema = z.object({
  file: z.string().min(1).default("readlog.db"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const timelineSchema = z
  .object({
    defaultLimit: z.number().int().positive().default(20),
    maxLimit: z.number().int().positive().default(100),
  })
  .refine((t) => t.defaultLimit <= t.maxLimit, {
    message: "timeline.defaultLimit must not exceed timeline.maxLimit",
  });

const rebuildSchema = z.object({
  batchSize: z.number().int().positive().default(200),
  orphanPolicy: z.enum(["freeze", "prune"]).default("freeze"),
  schedule: z.string().min(1).optional(),
  debounceMs: z.number().int().min(0).default(2_000),
});

const statsSchema = z.object({
  policy: z.enum(["lazy", "write-through"]).default("lazy"),
  staleAfterMs: z.number().int().positive().optional(),
});

export const readlogConfigSchema = z.object({
  server: serverSchema.default({}),
  database: databaseSchema.default({}),
  logging: loggingSchema.default({}),
  timeline: timelineSchema.default({}),
  rebuild: rebuildSchema.default({}),
  stats: statsSchema.default({}),
});

export function parseConfig(raw: unknown): ReadlogConfig {
  return readlogConfigSchema.parse(raw);
}
