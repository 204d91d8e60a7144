import type { CatalogEvent, MutationBus } from "../catalog/bus.js";
import type { Logger } from "../logging/logger.js";
import type { SnapshotRebuilder } from "./rebuilder.js";
import type { EntityKey } from "./types.js";

type Committed = Extract<CatalogEvent, { type: "mutation.committed" }>;

/**
 * Collects entities touched by committed mutations and refreshes them (and
 * their dependents) once the bus has been quiet for `debounceMs`.
 */
export class TimelineInvalidator {
  private readonly pending = new Map<string, EntityKey>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly logger: Logger;
  private readonly onCommitted = (event: Committed): void => {
    // A fresh event already carries current state.
    if (event.notice.action === "created") return;
    this.enqueue({ entityType: event.notice.entityType, entityId: event.notice.entityId });
    for (const key of event.related) this.enqueue(key);
  };

  constructor(
    private readonly bus: MutationBus,
    private readonly rebuilder: SnapshotRebuilder,
    private readonly debounceMs: number,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "invalidator" });
  }

  start(): void {
    this.bus.on("mutation.committed", this.onCommitted);
  }

  /** Detaches from the bus and drops anything not yet flushed. */
  stop(): void {
    this.bus.off("mutation.committed", this.onCommitted);
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.pending.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  enqueue(key: EntityKey): void {
    this.pending.set(`${key.entityType}:${key.entityId}`, key);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.flush(), this.debounceMs);
    this.timer.unref();
  }

  /** Refreshes everything queued so far. Returns the number of events rewritten. */
  flush(): number {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    const keys = [...this.pending.values()];
    this.pending.clear();

    let updated = 0;
    for (const key of keys) {
      try {
        updated += this.rebuilder.refreshEntity(key).updated;
      } catch (err) {
        // The next full rebuild picks it up.
        this.logger.error({ err, entity: `${key.entityType}:${key.entityId}` }, "Targeted refresh failed");
      }
    }
    if (keys.length > 0) {
      this.logger.debug({ entities: keys.length, updated }, "Flushed timeline refresh queue");
    }
    return updated;
  }
}
