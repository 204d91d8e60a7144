import { CatalogReader } from "../catalog/reader.js";
import { CatalogRepository } from "../catalog/repository.js";
import { CatalogService } from "../catalog/service.js";
import { MutationBus } from "../catalog/bus.js";
import { getStateDir, resolveDatabasePath } from "../config/paths.js";
import type { ReadlogConfig } from "../config/types.js";
import { ReadlogDB } from "../db/database.js";
import type { Logger } from "../logging/logger.js";
import { QueryFacade } from "../query/facade.js";
import { StatsAggregator } from "../stats/aggregator.js";
import { StatsCacheStore } from "../stats/cache.js";
import { StatsTrigger } from "../stats/trigger.js";
import { RebuildCheckpointStore } from "../timeline/checkpoint.js";
import { TimelineInvalidator } from "../timeline/invalidator.js";
import { SnapshotRebuilder } from "../timeline/rebuilder.js";
import { MutationRecorder, type Clock } from "../timeline/recorder.js";
import { RebuildRunner } from "../timeline/runner.js";
import { TimelineStore } from "../timeline/store.js";

export interface ReadlogContext {
  readonly config: ReadlogConfig;
  readonly logger: Logger;
  readonly db: ReadlogDB;
  readonly bus: MutationBus;
  readonly repository: CatalogRepository;
  readonly reader: CatalogReader;
  readonly catalog: CatalogService;
  readonly timelineStore: TimelineStore;
  readonly recorder: MutationRecorder;
  readonly rebuilder: SnapshotRebuilder;
  /** Guard for full rebuilds; await `runs.close()` before `close()`. */
  readonly runs: RebuildRunner;
  readonly invalidator: TimelineInvalidator;
  readonly statsCache: StatsCacheStore;
  readonly aggregator: StatsAggregator;
  readonly statsTrigger: StatsTrigger;
  readonly facade: QueryFacade;
  /** Detaches listeners and closes the database. */
  close(): void;
}

export interface OpenOptions {
  /** Database file; defaults to the configured file in the state directory. */
  readonly databasePath?: string;
  readonly clock?: Clock;
}

/** Builds every component over one database and wires the mutation bus. */
export function openReadlog(
  config: ReadlogConfig,
  logger: Logger,
  options: OpenOptions = {},
): ReadlogContext {
  const clock = options.clock ?? Date.now;
  const db = new ReadlogDB(options.databasePath ?? resolveDatabasePath(getStateDir(), config.database));

  const bus = new MutationBus(logger);
  const repository = new CatalogRepository(db, clock);
  const reader = new CatalogReader(repository);

  const timelineStore = new TimelineStore(db);
  const recorder = new MutationRecorder(db, timelineStore, logger, clock);
  const rebuilder = new SnapshotRebuilder(
    db,
    timelineStore,
    reader,
    new RebuildCheckpointStore(db),
    logger,
    { batchSize: config.rebuild.batchSize, orphanPolicy: config.rebuild.orphanPolicy },
    clock,
  );
  const runs = new RebuildRunner(rebuilder, logger);
  const invalidator = new TimelineInvalidator(bus, rebuilder, config.rebuild.debounceMs, logger);

  const statsCache = new StatsCacheStore(db, logger);
  const aggregator = new StatsAggregator(db, statsCache, logger, clock);
  const statsTrigger = new StatsTrigger(
    bus,
    statsCache,
    aggregator,
    () => repository.listUsers().map((u) => u.id),
    config.stats.policy,
    logger,
  );

  const catalog = new CatalogService(repository, reader, recorder, bus, logger, clock);
  const facade = new QueryFacade(timelineStore, statsCache, aggregator, config.timeline, config.stats, clock);

  invalidator.start();
  statsTrigger.start();

  return {
    config,
    logger,
    db,
    bus,
    repository,
    reader,
    catalog,
    timelineStore,
    recorder,
    rebuilder,
    runs,
    invalidator,
    statsCache,
    aggregator,
    statsTrigger,
    facade,
    close() {
      invalidator.stop();
      statsTrigger.stop();
      bus.dispose();
      db.close();
    },
  };
}
