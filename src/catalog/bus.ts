import { EventEmitter } from "node:events";
import type { Logger } from "../logging/logger.js";
import type { EntityKey, MutationNotice, TimelineEvent } from "../timeline/types.js";

/** Users whose statistics a mutation can change. */
export type AffectedUsers = readonly number[] | "all";

export type CatalogEvent =
  | {
      readonly type: "mutation.committed";
      readonly notice: MutationNotice;
      readonly event: TimelineEvent;
      /** Keys whose snapshots embedded the entity, captured before the write. */
      readonly related: readonly EntityKey[];
      readonly affectedUsers: AffectedUsers;
    }
  | { readonly type: "user.deleted"; readonly userId: number };

type EventType = CatalogEvent["type"];
type EventOfType<T extends EventType> = Extract<CatalogEvent, { type: T }>;
type Handler<T extends EventType> = (event: EventOfType<T>) => void;
type Listener = (...args: unknown[]) => void;

/**
 * Announces committed catalog mutations to in-process subscribers within
 * the same tick. The write is durable by the time a subscriber runs, so a
 * subscriber that throws is logged and the rest still receive the event.
 */
export class MutationBus {
  private readonly emitter = new EventEmitter();
  private readonly listeners = new Map<EventType, Map<object, Listener>>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "bus" });
  }

  emit<T extends EventType>(event: EventOfType<T>): void {
    this.emitter.emit(event.type, event);
  }

  on<T extends EventType>(type: T, handler: Handler<T>): void {
    const isolated = (event: EventOfType<T>): void => {
      try {
        handler(event);
      } catch (err) {
        this.logger.error({ err, type }, "Mutation subscriber failed");
      }
    };
    const listener = isolated as Listener;
    let byHandler = this.listeners.get(type);
    if (!byHandler) {
      byHandler = new Map();
      this.listeners.set(type, byHandler);
    }
    byHandler.set(handler, listener);
    this.emitter.on(type, listener);
  }

  off<T extends EventType>(type: T, handler: Handler<T>): void {
    const listener = this.listeners.get(type)?.get(handler);
    if (!listener) return;
    this.listeners.get(type)?.delete(handler);
    this.emitter.off(type, listener);
  }

  dispose(): void {
    this.emitter.removeAllListeners();
    this.listeners.clear();
  }
}
