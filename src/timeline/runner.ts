import { ConflictError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RebuildOptions, RebuildReport, SnapshotRebuilder } from "./rebuilder.js";

export type RunRequest = Omit<RebuildOptions, "signal">;

/**
 * Owns the one full rebuild that may run at a time. Shutdown interrupts it
 * here before the database closes.
 */
export class RebuildRunner {
  private running: Promise<RebuildReport> | null = null;
  private abort: AbortController | null = null;
  private closed = false;
  private readonly logger: Logger;

  constructor(
    private readonly rebuilder: SnapshotRebuilder,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "rebuild-runner" });
  }

  get active(): boolean {
    return this.running !== null;
  }

  /** Starts a run; throws `ConflictError` while another one is in progress. */
  start(request: RunRequest = {}): Promise<RebuildReport> {
    if (this.closed) {
      return Promise.reject(new ConflictError("Timeline rebuilds are shut down"));
    }
    if (this.running) {
      return Promise.reject(new ConflictError("A timeline rebuild is already running"));
    }
    const abort = new AbortController();
    this.abort = abort;
    this.running = this.rebuilder.run({ ...request, signal: abort.signal }).finally(() => {
      this.running = null;
      this.abort = null;
    });
    return this.running;
  }

  /** Starts a run, or joins the one already in progress. */
  join(request: RunRequest = {}): Promise<RebuildReport> {
    if (this.running) {
      this.logger.debug("Timeline rebuild already running; joining it");
      return this.running;
    }
    return this.start(request);
  }

  /** Aborts the running rebuild at its next batch boundary and waits for it. */
  async interrupt(): Promise<void> {
    this.abort?.abort();
    const running = this.running;
    if (!running) return;
    await running.then(
      (report) => this.logger.info({ completed: report.completed }, "Timeline rebuild interrupted"),
      (err: unknown) => this.logger.error({ err }, "Interrupted timeline rebuild failed"),
    );
  }

  /** Refuses new runs and interrupts the current one. */
  async close(): Promise<void> {
    this.closed = true;
    await this.interrupt();
  }
}
