/**
 * Note Schema
 *
 * Zod schemas and TypeScript types for learning notes.
 * Notes are stored as markdown files with YAML frontmatter.
 *
 * The header is validated strictly: a missing or mistyped field makes the
 * whole note malformed instead of being filled with a default.
 */

import { z } from "zod";
import { ReviewModeSchema, RatingSchema, ScoreSchema, TimestampSchema } from "@study-loop/shared";
import type { ReviewMode } from "@study-loop/shared";

// =============================================================================
// Constants
// =============================================================================

/** Default ease factor for new notes */
export const DEFAULT_EASE_FACTOR = 2.5;

/** Interval assigned to new notes, in days */
export const INITIAL_INTERVAL_DAYS = 1;

/** Number of sessions that must cover a priority topic before it retires */
export const PRIORITY_ADDRESSED_THRESHOLD = 2;

/** File extension for note files */
export const NOTE_EXTENSION = ".md";

/** Index file that lives beside the notes and is never treated as one */
export const README_FILENAME = "README.md";

/** Maximum length of the slug part of a generated filename */
const MAX_SLUG_LENGTH = 50;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// =============================================================================
// Header Schemas
// =============================================================================

/**
 * A user-declared topic to emphasise in upcoming sessions.
 *
 * Entries are never removed: once addressed in two sessions they are
 * marked inactive and kept for history.
 */
export const PriorityRequestSchema = z.object({
  topic: z.string().min(1),
  reason: z.string(),
  requested_at: TimestampSchema,
  session_id: z.string().nullable(),
  times_addressed: z.number().int().min(0).max(PRIORITY_ADDRESSED_THRESHOLD),
  active: z.boolean(),
});

/**
 * Summary of the last session merged into the note.
 */
export const SessionSummarySchema = z.object({
  session_id: z.string().min(1),
  end_time: TimestampSchema,
  average_score: ScoreSchema,
  question_count: z.number().int().min(0),
  overall_rating: RatingSchema.nullable(),
});

/**
 * Schema for the note header stored in YAML frontmatter.
 *
 * `ease_factor` is only required to be positive here; the scheduler clamps
 * it to [1.3, 3.0] whenever it computes a new value.
 */
export const NoteHeaderSchema = z.object({
  title: z.string().min(1),
  created: TimestampSchema,
  review_mode: ReviewModeSchema,
  schedule_pattern: z.string().min(1).nullable(),
  next_review: TimestampSchema,
  last_reviewed: TimestampSchema.nullable(),
  interval_days: z.number().int().min(0),
  ease_factor: z.number().positive(),
  review_count: z.number().int().min(0),
  question_performance: z.record(ScoreSchema),
  priority_questions: z.array(z.string()),
  last_session_summary: SessionSummarySchema.nullable(),
  // Older notes predate this counter
  learned_content_count: z.number().int().min(0).default(0),
  priority_requests: z.array(PriorityRequestSchema),
});

/**
 * Header fields in the order they are written to disk.
 */
export const HEADER_FIELDS = [
  "title",
  "created",
  "review_mode",
  "schedule_pattern",
  "next_review",
  "last_reviewed",
  "interval_days",
  "ease_factor",
  "review_count",
  "question_performance",
  "priority_questions",
  "last_session_summary",
  "learned_content_count",
  "priority_requests",
] as const satisfies ReadonlyArray<keyof z.infer<typeof NoteHeaderSchema>>;

// =============================================================================
// TypeScript Types
// =============================================================================

export type PriorityRequest = z.infer<typeof PriorityRequestSchema>;
export type SessionSummary = z.infer<typeof SessionSummarySchema>;
export type NoteHeader = z.infer<typeof NoteHeaderSchema>;
export type HeaderField = (typeof HEADER_FIELDS)[number];

/**
 * A note as held in memory: its immutable filename, header and body.
 */
export interface Note {
  filename: string;
  header: NoteHeader;
  body: string;
}

// =============================================================================
// Filenames
// =============================================================================

/**
 * Create a filename slug from a title.
 *
 * Keeps alphanumerics and spaces, lower-cases, joins words with hyphens
 * and caps the slug at 50 characters.
 *
 * @example createFilename("Python GIL: How it works") // "python-gil-how-it-works.md"
 */
export function createFilename(title: string): string {
  const safe = Array.from(title)
    .filter((c) => /[\p{L}\p{N}\s]/u.test(c))
    .join("");
  let slug = safe.toLowerCase().split(/\s+/).filter(Boolean).join("-");
  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.slice(0, MAX_SLUG_LENGTH).replace(/-+$/, "");
  }
  return `${slug || "note"}${NOTE_EXTENSION}`;
}

/**
 * Check whether a filename is safe to resolve inside the notes directory.
 *
 * @returns An error message, or null if the filename is valid
 */
export function checkFilename(filename: string): string | null {
  if (!filename) {
    return "Filename cannot be empty";
  }
  if (filename.includes("/") || filename.includes("\\")) {
    return `Filename must not contain directory separators: '${filename}'`;
  }
  if (filename.startsWith(".")) {
    return `Filename must not start with dot: '${filename}'`;
  }
  if (!filename.endsWith(NOTE_EXTENSION)) {
    return `Filename must have ${NOTE_EXTENSION} extension: '${filename}'`;
  }
  const stem = filename.slice(0, -NOTE_EXTENSION.length);
  if (!/^[\p{L}\p{N}_-]+$/u.test(stem)) {
    return `Filename contains invalid characters: '${filename}'. Only alphanumeric, hyphens, and underscores allowed.`;
  }
  return null;
}

/**
 * Filename without its .md extension.
 */
export function noteStem(filename: string): string {
  return filename.endsWith(NOTE_EXTENSION) ? filename.slice(0, -NOTE_EXTENSION.length) : filename;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create the header of a brand-new note. New notes are due immediately.
 */
export function createNewNoteHeader(
  title: string,
  reviewMode: ReviewMode,
  schedulePattern: string | null,
  now: Date
): NoteHeader {
  const timestamp = toTimestamp(now);
  return {
    title,
    created: timestamp,
    review_mode: reviewMode,
    schedule_pattern: reviewMode === "scheduled" ? schedulePattern : null,
    next_review: timestamp,
    last_reviewed: null,
    interval_days: INITIAL_INTERVAL_DAYS,
    ease_factor: DEFAULT_EASE_FACTOR,
    review_count: 0,
    question_performance: {},
    priority_questions: [],
    last_session_summary: null,
    learned_content_count: 0,
    priority_requests: [],
  };
}

// =============================================================================
// Date Utilities
// =============================================================================

/**
 * Format a Date as the ISO 8601 timestamp stored in headers.
 */
export function toTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Parse a stored timestamp. Headers are validated on load, so this only
 * sees well-formed values.
 */
export function parseTimestamp(value: string): Date {
  return new Date(value);
}

/**
 * Add whole days to a date.
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Whole days elapsed from `from` to `to`, rounded down.
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}
