import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { OrphanPolicy } from "../config/types.js";
import type { ReadlogDB } from "../db/database.js";
import { errorMessage, OrphanedReferenceError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { encodePayload, samePayload } from "./codec.js";
import { emptyCounters, type RebuildCheckpointStore, type RebuildCounters } from "./checkpoint.js";
import type { Clock } from "./recorder.js";
import { buildPayload, validateSnapshot } from "./snapshots.js";
import type { TimelineStore } from "./store.js";
import type { EntityKey, EntityReader } from "./types.js";

export interface RebuildOptions {
  readonly batchSize?: number;
  readonly orphanPolicy?: OrphanPolicy;
  /** Continue after the checkpoint of an interrupted run instead of starting over. */
  readonly resume?: boolean;
  readonly signal?: AbortSignal;
}

export interface RebuildReport extends RebuildCounters {
  readonly resumedFrom: EntityKey | null;
  readonly completed: boolean;
}

export interface RebuilderDefaults {
  readonly batchSize: number;
  readonly orphanPolicy: OrphanPolicy;
}

type EntityOutcome = Pick<RebuildCounters, "scanned" | "updated" | "orphaned" | "pruned">;

function keyLabel(key: EntityKey): string {
  return `${key.entityType}:${key.entityId}`;
}

/**
 * Rewrites denormalized event payloads from current entity state. Full runs
 * walk entity keys in committed batches and can resume from the checkpoint.
 */
export class SnapshotRebuilder {
  private readonly logger: Logger;

  constructor(
    private readonly db: ReadlogDB,
    private readonly store: TimelineStore,
    private readonly reader: EntityReader,
    private readonly checkpoints: RebuildCheckpointStore,
    logger: Logger,
    private readonly defaults: RebuilderDefaults = { batchSize: 200, orphanPolicy: "freeze" },
    private readonly clock: Clock = Date.now,
  ) {
    this.logger = logger.child({ component: "rebuilder" });
  }

  async run(options: RebuildOptions = {}): Promise<RebuildReport> {
    const batchSize = options.batchSize ?? this.defaults.batchSize;
    const orphanPolicy = options.orphanPolicy ?? this.defaults.orphanPolicy;
    const checkpoint = options.resume ? this.checkpoints.load() : null;
    if (!options.resume) this.checkpoints.clear();

    const counters = checkpoint ? { ...checkpoint.counters } : emptyCounters();
    const resumedFrom = checkpoint?.last ?? null;
    let after = resumedFrom;

    this.logger.info(
      { batchSize, orphanPolicy, resumedFrom: resumedFrom ? keyLabel(resumedFrom) : null },
      "Starting timeline rebuild",
    );

    for (;;) {
      if (options.signal?.aborted) {
        this.logger.warn({ ...counters }, "Timeline rebuild interrupted; checkpoint kept");
        return { ...counters, resumedFrom, completed: false };
      }

      const keys = this.store.listEntityKeys(after, batchSize);
      const last = keys[keys.length - 1];
      if (!last) break;

      try {
        const batch = this.db.writeTransaction(() => {
          const totals = emptyCounters();
          for (const key of keys) {
            this.rebuildInSavepoint(key, orphanPolicy, totals);
          }
          totals.batches = 1;
          this.checkpoints.save(last, addCounters(counters, totals), this.clock());
          return totals;
        });
        Object.assign(counters, addCounters(counters, batch));
      } catch (err) {
        counters.errors += 1;
        this.logger.error(
          { err, from: keyLabel(keys[0] ?? last), to: keyLabel(last) },
          "Timeline rebuild batch failed",
        );
      }

      after = last;
      await yieldToEventLoop();
    }

    this.checkpoints.clear();
    this.logger.info({ ...counters }, "Timeline rebuild complete");
    return { ...counters, resumedFrom, completed: true };
  }

  /**
   * Refreshes one entity and everything whose snapshot embeds it
   * (author → books → readings, genre → books, book → readings).
   * Orphans are left frozen.
   */
  refreshEntity(key: EntityKey): RebuildCounters {
    const keys = this.withDependents(key);
    const counters = emptyCounters();
    this.db.writeTransaction(() => {
      for (const k of keys) {
        this.rebuildInSavepoint(k, "freeze", counters);
      }
    });
    this.logger.debug({ entity: keyLabel(key), entities: keys.length, ...counters }, "Refreshed entity");
    return counters;
  }

  private withDependents(root: EntityKey): EntityKey[] {
    const seen = new Set<string>();
    const ordered: EntityKey[] = [];
    const queue: EntityKey[] = [root];
    for (let next = queue.shift(); next; next = queue.shift()) {
      const label = keyLabel(next);
      if (seen.has(label)) continue;
      seen.add(label);
      ordered.push(next);
      queue.push(...this.reader.dependents(next));
    }
    return ordered;
  }

  private rebuildInSavepoint(key: EntityKey, orphanPolicy: OrphanPolicy, into: RebuildCounters): void {
    try {
      const outcome = this.db.transaction(() => this.rebuildEntity(key, orphanPolicy));
      into.scanned += outcome.scanned;
      into.updated += outcome.updated;
      into.orphaned += outcome.orphaned;
      into.pruned += outcome.pruned;
    } catch (err) {
      into.errors += 1;
      this.logger.warn({ entity: keyLabel(key), error: errorMessage(err) }, "Failed to rebuild entity events");
    }
  }

  private rebuildEntity(key: EntityKey, orphanPolicy: OrphanPolicy): EntityOutcome {
    const stored = this.store.listStoredPayloads(key);
    const outcome: EntityOutcome = { scanned: stored.length, updated: 0, orphaned: 0, pruned: 0 };
    if (stored.length === 0) return outcome;

    // Read as late as possible to keep the staleness window short.
    const state = this.reader.read(key);
    if (!state) {
      const orphan = new OrphanedReferenceError(key.entityType, key.entityId, stored.length);
      outcome.orphaned = 1;
      if (orphanPolicy === "prune") {
        outcome.pruned = this.store.deleteByEntity(key);
      }
      this.logger.info({ entity: keyLabel(key), policy: orphanPolicy }, orphan.message);
      return outcome;
    }

    const encoded = encodePayload(buildPayload(validateSnapshot(state)));
    for (const row of stored) {
      if (!samePayload(row.encoded, encoded) && this.store.rewritePayload(row.id, encoded)) {
        outcome.updated += 1;
      }
    }
    return outcome;
  }
}

function addCounters(a: RebuildCounters, b: RebuildCounters): RebuildCounters {
  return {
    scanned: a.scanned + b.scanned,
    updated: a.updated + b.updated,
    orphaned: a.orphaned + b.orphaned,
    pruned: a.pruned + b.pruned,
    errors: a.errors + b.errors,
    batches: a.batches + b.batches,
  };
}
