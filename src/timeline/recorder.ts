import type { ReadlogDB } from "../db/database.js";
import { toStorageError, ValidationError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { buildPayload, validateSnapshot } from "./snapshots.js";
import type { TimelineStore } from "./store.js";
import type { EventPayload, MutationNotice, TimelineEvent } from "./types.js";

export type Clock = () => number;

/**
 * Appends exactly one timeline event per accepted entity mutation. Callers
 * run the entity write and `record` in one transaction via `commit`.
 */
export class MutationRecorder {
  constructor(
    private readonly db: ReadlogDB,
    private readonly store: TimelineStore,
    private readonly logger: Logger,
    private readonly clock: Clock = Date.now,
  ) {}

  /**
   * Runs `write`, then records the notice it returns, in one transaction.
   * Any failure rolls back both.
   */
  commit<T>(write: () => { result: T; notice: MutationNotice }): { result: T; event: TimelineEvent } {
    try {
      return this.db.writeTransaction(() => {
        const { result, notice } = write();
        return { result, event: this.record(notice) };
      });
    } catch (err) {
      throw toStorageError(err, "Mutation rolled back");
    }
  }

  /** Must run inside the transaction of the mutation it describes. */
  record(notice: MutationNotice): TimelineEvent {
    const action = notice.action.trim();
    if (action.length === 0) {
      throw new ValidationError("Timeline action must not be empty");
    }

    const payload = this.payloadFor(notice);
    const event = {
      entityType: notice.entityType,
      entityId: notice.entityId,
      action,
      occurredAt: this.clock(),
      userId: notice.actingUserId ?? null,
      payload,
    };
    const id = this.store.append(event);
    this.logger.debug(
      { id, entityType: event.entityType, entityId: event.entityId, action },
      "Recorded timeline event",
    );
    return { id, ...event };
  }

  private payloadFor(notice: MutationNotice): EventPayload {
    const key = { entityType: notice.entityType, entityId: notice.entityId };

    if (notice.state === null) {
      // Deleted: carry the last display snapshot forward.
      const previous = this.store.latestForEntity(key);
      if (!previous) {
        throw new ValidationError(
          `No snapshot for ${key.entityType} ${key.entityId} and no earlier event to copy from`,
        );
      }
      return previous.payload;
    }

    const snapshot = validateSnapshot(notice.state);
    if (snapshot.entityType !== notice.entityType || snapshot.id !== notice.entityId) {
      throw new ValidationError(
        `Snapshot ${snapshot.entityType} ${snapshot.id} does not match mutation of ${key.entityType} ${key.entityId}`,
      );
    }
    return buildPayload(snapshot);
  }
}
