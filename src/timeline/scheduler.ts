import { Cron } from "croner";
import type { OrphanPolicy } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { RebuildReport } from "./rebuilder.js";
import type { RebuildRunner } from "./runner.js";

export interface RebuildScheduleOptions {
  readonly schedule: string;
  readonly batchSize: number;
  readonly orphanPolicy: OrphanPolicy;
}

/** Periodic full rebuild. A run still in progress makes the next tick a no-op. */
export class RebuildScheduler {
  private cron: Cron | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly runner: RebuildRunner,
    private readonly options: RebuildScheduleOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "rebuild-scheduler" });
  }

  start(): void {
    this.cron = new Cron(this.options.schedule, () => {
      this.runNow().catch((err) => {
        this.logger.error({ err }, "Scheduled timeline rebuild failed");
      });
    });
    this.logger.info(
      { schedule: this.options.schedule, next: this.cron.nextRun()?.toISOString() ?? null },
      "Timeline rebuild scheduled",
    );
  }

  /** Starts a run, or returns the one already in progress. */
  runNow(): Promise<RebuildReport> {
    return this.runner.join({
      batchSize: this.options.batchSize,
      orphanPolicy: this.options.orphanPolicy,
      resume: true,
    });
  }

  /** Stops the schedule and interrupts a running rebuild at its next batch boundary. */
  async stop(): Promise<void> {
    this.cron?.stop();
    this.cron = null;
    await this.runner.interrupt();
    this.logger.info("Timeline rebuild schedule stopped");
  }
}
