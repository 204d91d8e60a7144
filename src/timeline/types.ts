export const ENTITY_TYPES = ["author", "book", "genre", "reading"] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export type ReadingStatus = "reading" | "read" | "abandoned";
export type ReadingFormat = "physical" | "ereader" | "audiobook";

export interface EntityKey {
  readonly entityType: EntityType;
  readonly entityId: number;
}

// ── Entity snapshots: current state handed to the recorder and rebuilder ──

export interface AuthorSnapshot {
  readonly entityType: "author";
  readonly id: number;
  readonly name: string;
}

export interface GenreSnapshot {
  readonly entityType: "genre";
  readonly id: number;
  readonly name: string;
}

export interface BookSnapshot {
  readonly entityType: "book";
  readonly id: number;
  readonly title: string;
  readonly authors: readonly string[];
  /** Primary genre first, then secondary. */
  readonly genres: readonly string[];
  readonly pageCount: number | null;
}

export interface ReadingSnapshot {
  readonly entityType: "reading";
  readonly id: number;
  readonly bookId: number;
  readonly bookTitle: string;
  readonly authors: readonly string[];
  readonly status: ReadingStatus;
  readonly rating: number | null;
  readonly format: ReadingFormat | null;
  readonly quickReviews: readonly string[];
}

export type EntitySnapshot = AuthorSnapshot | GenreSnapshot | BookSnapshot | ReadingSnapshot;

// ── Denormalized event payloads ──

export interface EventDetail {
  readonly label: string;
  readonly value: string;
}

export interface ReadingData {
  readonly bookId: number;
  readonly status: ReadingStatus;
  readonly rating: number | null;
}

export type EventPayload =
  | { readonly entityType: "author"; readonly title: string; readonly details: EventDetail[] }
  | { readonly entityType: "genre"; readonly title: string; readonly details: EventDetail[] }
  | {
      readonly entityType: "book";
      readonly title: string;
      readonly details: EventDetail[];
      readonly genres: string[];
    }
  | {
      readonly entityType: "reading";
      readonly title: string;
      readonly details: EventDetail[];
      readonly reading: ReadingData;
    };

/** Column values of a payload as stored. */
export interface EncodedPayload {
  readonly title: string;
  readonly detailsJson: string;
  readonly genresJson: string | null;
  readonly readingDataJson: string | null;
}

export interface TimelineEvent {
  readonly id: number;
  readonly entityType: EntityType;
  readonly entityId: number;
  readonly action: string;
  readonly occurredAt: number;
  readonly userId: number | null;
  readonly payload: EventPayload;
}

export interface NewTimelineEvent {
  readonly entityType: EntityType;
  readonly entityId: number;
  readonly action: string;
  readonly occurredAt: number;
  readonly userId: number | null;
  readonly payload: EventPayload;
}

/** Position in the `(occurred_at desc, id desc)` ordering. */
export interface TimelineCursor {
  readonly occurredAt: number;
  readonly id: number;
}

export interface TimelinePage {
  readonly events: TimelineEvent[];
  readonly nextCursor: TimelineCursor | null;
}

/** Delivered by the entity-storage layer after a committed mutation. */
export interface MutationNotice {
  readonly entityType: EntityType;
  readonly entityId: number;
  readonly action: string;
  readonly actingUserId?: number | null;
  /** New state, or null when the entity was deleted. */
  readonly state: EntitySnapshot | null;
}

/** Read side of the entity-storage layer. */
export interface EntityReader {
  read(key: EntityKey): EntitySnapshot | null;
  /** Entities whose snapshots embed data from `key`. */
  dependents(key: EntityKey): EntityKey[];
}
