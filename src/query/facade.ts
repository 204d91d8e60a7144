import type { StatsConfig, TimelineConfig } from "../config/types.js";
import { ValidationError } from "../errors.js";
import type { StatsAggregator } from "../stats/aggregator.js";
import type { StatsCacheStore } from "../stats/cache.js";
import type { StatsEntry, YearStats } from "../stats/types.js";
import { decodeCursor, encodeCursor } from "../timeline/cursor.js";
import type { Clock } from "../timeline/recorder.js";
import type { TimelineStore } from "../timeline/store.js";
import type { EntityType, EventDetail, ReadingData, TimelineEvent } from "../timeline/types.js";

export type TimelineScope = "mine" | "global";

export interface TimelineQuery {
  readonly scope: TimelineScope;
  readonly userId?: number | null;
  readonly cursor?: string | null;
  readonly limit?: number | null;
}

export interface TimelineItem {
  readonly id: number;
  readonly entityType: EntityType;
  readonly entityId: number;
  readonly action: string;
  /** ISO-8601 */
  readonly occurredAt: string;
  readonly userId: number | null;
  readonly title: string;
  readonly details: EventDetail[];
  readonly genres?: string[];
  readonly readingData?: ReadingData;
}

export interface TimelineResult {
  readonly items: TimelineItem[];
  readonly nextCursor: string | null;
}

export function toTimelineItem(event: TimelineEvent): TimelineItem {
  const { payload } = event;
  return {
    id: event.id,
    entityType: event.entityType,
    entityId: event.entityId,
    action: event.action,
    occurredAt: new Date(event.occurredAt).toISOString(),
    userId: event.userId,
    title: payload.title,
    details: payload.details,
    ...(payload.entityType === "book" ? { genres: payload.genres } : {}),
    ...(payload.entityType === "reading" ? { readingData: payload.reading } : {}),
  };
}

/** Read side: paginated timelines and cached statistics. */
export class QueryFacade {
  constructor(
    private readonly timelineStore: TimelineStore,
    private readonly statsCache: StatsCacheStore,
    private readonly aggregator: StatsAggregator,
    private readonly timelineConfig: TimelineConfig,
    private readonly statsConfig: StatsConfig,
    private readonly clock: Clock = Date.now,
  ) {}

  timeline(query: TimelineQuery): TimelineResult {
    const limit = this.clampLimit(query.limit);
    const cursor = query.cursor ? decodeCursor(query.cursor) : null;

    if (query.scope === "mine" && query.userId == null) {
      throw new ValidationError("Timeline scope 'mine' needs a user");
    }
    const page =
      query.scope === "mine" && query.userId != null
        ? this.timelineStore.listByUser(query.userId, cursor, limit)
        : this.timelineStore.listGlobal(cursor, limit);

    return {
      items: page.events.map(toTimelineItem),
      nextCursor: page.nextCursor ? encodeCursor(page.nextCursor) : null,
    };
  }

  /** Cached statistics, recomputed when absent or older than `staleAfterMs`. */
  stats(userId: number): StatsEntry {
    const cached = this.statsCache.get(userId);
    if (cached && !this.isStale(cached)) return cached;
    return this.aggregator.refresh(userId);
  }

  statsForYear(userId: number, year: number): YearStats {
    if (!Number.isInteger(year) || year < 1 || year > 9999) {
      throw new ValidationError(`Invalid year: ${year}`);
    }
    return this.aggregator.computeForYear(userId, year);
  }

  availableYears(userId: number): number[] {
    return this.aggregator.availableYears(userId);
  }

  private isStale(entry: StatsEntry): boolean {
    const maxAge = this.statsConfig.staleAfterMs;
    return maxAge !== undefined && this.clock() - entry.computedAt > maxAge;
  }

  private clampLimit(limit: number | null | undefined): number {
    if (limit == null) return this.timelineConfig.defaultLimit;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Invalid timeline limit: ${limit}`);
    }
    return Math.min(limit, this.timelineConfig.maxLimit);
  }
}
