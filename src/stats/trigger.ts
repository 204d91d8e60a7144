import type { AffectedUsers, CatalogEvent, MutationBus } from "../catalog/bus.js";
import type { StatsPolicy } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { StatsAggregator } from "./aggregator.js";
import type { StatsCacheStore } from "./cache.js";

type Committed = Extract<CatalogEvent, { type: "mutation.committed" }>;
type UserDeleted = Extract<CatalogEvent, { type: "user.deleted" }>;

/**
 * Keeps the stats cache in line with committed mutations. `lazy` drops the
 * affected rows so the next read recomputes; `write-through` recomputes
 * them right away.
 */
export class StatsTrigger {
  private readonly logger: Logger;
  private readonly onCommitted = (event: Committed): void => this.apply(event.affectedUsers);
  private readonly onUserDeleted = (event: UserDeleted): void => {
    this.cache.invalidate(event.userId);
  };

  constructor(
    private readonly bus: MutationBus,
    private readonly cache: StatsCacheStore,
    private readonly aggregator: StatsAggregator,
    private readonly listUserIds: () => number[],
    private readonly policy: StatsPolicy,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "stats-trigger" });
  }

  start(): void {
    this.bus.on("mutation.committed", this.onCommitted);
    this.bus.on("user.deleted", this.onUserDeleted);
    this.logger.debug({ policy: this.policy }, "Stats trigger attached");
  }

  stop(): void {
    this.bus.off("mutation.committed", this.onCommitted);
    this.bus.off("user.deleted", this.onUserDeleted);
  }

  apply(affected: AffectedUsers): void {
    if (this.policy === "lazy") {
      if (affected === "all") {
        this.cache.invalidateAll();
      } else {
        for (const userId of affected) this.cache.invalidate(userId);
      }
      return;
    }

    const userIds = affected === "all" ? this.listUserIds() : affected;
    for (const userId of userIds) {
      try {
        this.aggregator.refresh(userId);
      } catch (err) {
        // The mutation is already committed; a dropped row recomputes on read.
        this.cache.invalidate(userId);
        this.logger.error({ err, userId }, "Write-through stats refresh failed");
      }
    }
  }
}
