import { ValidationError } from "../errors.js";
import type { TimelineCursor } from "./types.js";

const CURSOR_PATTERN = /^(\d+):(\d+)$/;

/** Opaque form handed to clients: base64url of "<occurredAt>:<id>". */
export function encodeCursor(cursor: TimelineCursor): string {
  return Buffer.from(`${cursor.occurredAt}:${cursor.id}`, "utf-8").toString("base64url");
}

export function decodeCursor(raw: string): TimelineCursor {
  const decoded = Buffer.from(raw, "base64url").toString("utf-8");
  const match = CURSOR_PATTERN.exec(decoded);
  if (!match) {
    throw new ValidationError(`Invalid timeline cursor: ${raw}`);
  }
  return { occurredAt: Number(match[1]), id: Number(match[2]) };
}
