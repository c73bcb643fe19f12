/**
 * Study Loop Shared Types
 *
 * Core type definitions shared by the backend and the external review agent.
 */

/**
 * How a note is scheduled.
 *
 * - `spaced`: adaptive SM-2 style intervals driven by the review rating
 * - `scheduled`: fixed cadence taken from the note's schedule pattern
 */
export type ReviewMode = "spaced" | "scheduled";

/**
 * Recall rating submitted after a review.
 *
 * 1 = poor, 2 = fair, 3 = good, 4 = excellent
 */
export type Rating = 1 | 2 | 3 | 4;

/**
 * Error codes returned by the REST API and carried by backend errors.
 *
 * These codes provide structured error information for callers
 * to handle specific error conditions appropriately.
 */
export type ErrorCode =
  | "NOTE_NOT_FOUND"
  | "INVALID_RATING"
  | "IO_ERROR"
  | "MALFORMED_HEADER"
  | "VALIDATION_ERROR"
  | "SESSION_ALREADY_RECORDED"
  | "INTERNAL_ERROR";
