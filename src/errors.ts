export type ErrorCode = "VALIDATION" | "NOT_FOUND" | "CONFLICT" | "ORPHANED_REFERENCE" | "STORAGE";

export abstract class ReadlogError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input that cannot be recorded or queried: incomplete snapshots, bad cursors. */
export class ValidationError extends ReadlogError {
  override readonly code = "VALIDATION";

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export class NotFoundError extends ReadlogError {
  override readonly code = "NOT_FOUND";

  constructor(
    readonly entity: string,
    readonly id: number,
  ) {
    super(`${entity} ${id} not found`);
  }
}

/** Write rejected by a uniqueness rule, e.g. a duplicate author name. */
export class ConflictError extends ReadlogError {
  override readonly code = "CONFLICT";
}

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/** A timeline event whose source entity no longer exists. */
export class OrphanedReferenceError extends ReadlogError {
  override readonly code = "ORPHANED_REFERENCE";

  constructor(
    readonly entityType: string,
    readonly entityId: number,
    readonly eventCount: number,
  ) {
    super(`${entityType} ${entityId} no longer exists (${eventCount} events)`);
  }
}

export class StorageError extends ReadlogError {
  override readonly code = "STORAGE";
}

export function toStorageError(err: unknown, context: string): ReadlogError {
  if (err instanceof ReadlogError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(`${context}: ${message}`, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
