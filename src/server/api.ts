import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { ReadlogDB } from "../db/database.js";
import { ReadlogError, ValidationError, type ErrorCode } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { QueryFacade } from "../query/facade.js";
import type { RebuildRunner } from "../timeline/runner.js";

export const VERSION = "0.1.0";

const USER_HEADER = "x-user-id";

const timelineQuerySchema = z.object({
  scope: z.enum(["mine", "global"]).default("global"),
  cursor: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().optional(),
});

const rebuildBodySchema = z.object({
  orphanPolicy: z.enum(["freeze", "prune"]).optional(),
  batchSize: z.number().int().positive().optional(),
  resume: z.boolean().optional(),
});

const userIdSchema = z.coerce.number().int().positive();
const yearSchema = z.coerce.number().int().min(1).max(9999);

const STATUS_BY_CODE: Record<ErrorCode, 400 | 404 | 409 | 500> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  ORPHANED_REFERENCE: 500,
  STORAGE: 500,
};

function issues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

export interface ApiDeps {
  readonly db: ReadlogDB;
  readonly facade: QueryFacade;
  readonly runs: RebuildRunner;
  readonly logger: Logger;
}

/** JSON API over the query façade and the rebuild runner. */
export class ApiServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly startedAt = Date.now();
  private readonly logger: Logger;

  constructor(
    private readonly deps: ApiDeps,
    private readonly port: number,
    private readonly hostname: string,
  ) {
    this.logger = deps.logger.child({ component: "api" });
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    const { facade, runs, db } = this.deps;

    this.app.onError((err, c) => {
      if (err instanceof ReadlogError) {
        const status = STATUS_BY_CODE[err.code];
        if (status === 500) this.logger.error({ err, path: c.req.path }, "Request failed");
        const details = err instanceof ValidationError && err.issues.length > 0 ? err.issues : undefined;
        return c.json({ error: err.message, code: err.code, ...(details ? { details } : {}) }, status);
      }
      this.logger.error({ err, path: c.req.path }, "Unhandled request error");
      return c.json({ error: "Internal error", code: "INTERNAL" }, 500);
    });

    this.app.get("/health", (c) => {
      return c.json({
        status: db.isOpen() ? "ok" : "degraded",
        version: VERSION,
        rebuilding: runs.active,
        uptime: Date.now() - this.startedAt,
      });
    });

    this.app.get("/timeline", (c) => {
      const parsed = timelineQuerySchema.safeParse(c.req.query());
      if (!parsed.success) throw new ValidationError("Invalid timeline query", issues(parsed.error));
      const { scope, cursor, limit } = parsed.data;
      return c.json(facade.timeline({ scope, cursor, limit, userId: this.actingUser(c) }));
    });

    this.app.get("/stats", (c) => {
      const entry = facade.stats(this.requireUser(c));
      const computedAt = new Date(entry.computedAt).toISOString();
      return c.json({ data: { ...entry.data, computedAt }, computedAt });
    });

    this.app.get("/stats/years", (c) => {
      return c.json({ years: facade.availableYears(this.requireUser(c)) });
    });

    this.app.get("/stats/years/:year", (c) => {
      const year = yearSchema.safeParse(c.req.param("year"));
      if (!year.success) throw new ValidationError("Invalid year", issues(year.error));
      return c.json(facade.statsForYear(this.requireUser(c), year.data));
    });

    this.app.post("/timeline/rebuild", async (c) => {
      const text = await c.req.text();
      let body: unknown = {};
      if (text.trim().length > 0) {
        try {
          body = JSON.parse(text);
        } catch (err) {
          throw new ValidationError(`Invalid JSON body: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
      const parsed = rebuildBodySchema.safeParse(body);
      if (!parsed.success) throw new ValidationError("Invalid rebuild request", issues(parsed.error));

      const report = await runs.start(parsed.data);
      return c.json(report);
    });
  }

  private actingUser(c: Context): number | null {
    const raw = c.req.header(USER_HEADER);
    if (raw === undefined || raw === "") return null;
    const parsed = userIdSchema.safeParse(raw);
    if (!parsed.success) throw new ValidationError(`Invalid ${USER_HEADER} header`);
    return parsed.data;
  }

  private requireUser(c: Context): number {
    const userId = this.actingUser(c);
    if (userId === null) throw new ValidationError(`Missing ${USER_HEADER} header`);
    return userId;
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      port: this.port,
      hostname: this.hostname,
    });
    this.logger.info({ port: this.port, hostname: this.hostname }, "API server listening");
  }

  async stop(): Promise<void> {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}
