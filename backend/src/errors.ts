/**
 * Study Loop Errors
 *
 * Domain errors raised by the note store, scheduler, performance tracker
 * and session history log. Each carries an ErrorCode so the REST layer can
 * map it to a status without inspecting messages.
 */

import type { ErrorCode } from "@study-loop/shared";

/**
 * Base error for all Study Loop domain failures.
 */
export class StudyLoopError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StudyLoopError";
    this.code = code;
  }
}

/**
 * Thrown when a note file does not exist.
 */
export class NoteNotFoundError extends StudyLoopError {
  readonly filename: string;

  constructor(filename: string) {
    super(`Note '${filename}' not found`, "NOTE_NOT_FOUND");
    this.name = "NoteNotFoundError";
    this.filename = filename;
  }
}

/**
 * Thrown when a review rating is not one of 1, 2, 3, 4.
 */
export class InvalidRatingError extends StudyLoopError {
  readonly rating: unknown;

  constructor(rating: unknown) {
    super(`Rating must be an integer between 1 and 4, got ${String(rating)}`, "INVALID_RATING");
    this.name = "InvalidRatingError";
    this.rating = rating;
  }
}

/**
 * Thrown when a note's frontmatter cannot be parsed or fails validation.
 * The note is left untouched on disk.
 */
export class MalformedHeaderError extends StudyLoopError {
  readonly filename: string;
  readonly field: string | undefined;

  constructor(filename: string, detail: string, field?: string) {
    const where = field ? ` (field '${field}')` : "";
    super(`Malformed header in ${filename}${where}: ${detail}`, "MALFORMED_HEADER");
    this.name = "MalformedHeaderError";
    this.filename = filename;
    this.field = field;
  }
}

/**
 * Thrown when reading or writing a note or session file fails.
 */
export class PersistenceError extends StudyLoopError {
  readonly path: string;

  constructor(action: string, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${action} ${path}: ${reason}`, "IO_ERROR", { cause });
    this.name = "PersistenceError";
    this.path = path;
  }
}

/**
 * Thrown for invalid caller input (unsafe filenames, bad scores, bad payloads).
 */
export class ValidationError extends StudyLoopError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/**
 * Thrown when a session has already been merged into its note and logged.
 */
export class SessionAlreadyRecordedError extends StudyLoopError {
  readonly sessionId: string;

  constructor(filename: string, sessionId: string) {
    super(
      `Session '${sessionId}' has already been recorded for ${filename}`,
      "SESSION_ALREADY_RECORDED"
    );
    this.name = "SessionAlreadyRecordedError";
    this.sessionId = sessionId;
  }
}

const KNOWN_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  "NOTE_NOT_FOUND",
  "INVALID_RATING",
  "IO_ERROR",
  "MALFORMED_HEADER",
  "VALIDATION_ERROR",
  "SESSION_ALREADY_RECORDED",
  "INTERNAL_ERROR",
]);

/**
 * Determines if an error is a StudyLoopError.
 *
 * Checks for a `code` property as well, since instanceof checks can fail
 * across module boundaries.
 */
export function isStudyLoopError(error: unknown): error is StudyLoopError {
  if (error instanceof StudyLoopError) {
    return true;
  }
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    KNOWN_CODES.has(error.code)
  );
}

/**
 * Returns the errno code of a Node.js filesystem error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
