/**
 * Study Loop Review Protocol
 *
 * Zod schemas for validating the payloads exchanged between the external
 * review agent and the backend.
 */

import { z } from "zod";

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Schema for ReviewMode values
 */
export const ReviewModeSchema = z.enum(["spaced", "scheduled"]);

/**
 * Schema for a recall rating (1 = poor ... 4 = excellent)
 */
export const RatingSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

/**
 * ISO 8601 timestamp, with or without a UTC offset
 */
export const TimestampSchema = z
  .string()
  .datetime({ offset: true, message: "Must be an ISO 8601 timestamp" });

/**
 * A score between 0.0 and 1.0
 */
export const ScoreSchema = z
  .number()
  .min(0, "Score must be between 0.0 and 1.0")
  .max(1, "Score must be between 0.0 and 1.0");

// =============================================================================
// Error Code Schema
// =============================================================================

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "NOTE_NOT_FOUND",
  "INVALID_RATING",
  "IO_ERROR",
  "MALFORMED_HEADER",
  "VALIDATION_ERROR",
  "SESSION_ALREADY_RECORDED",
  "INTERNAL_ERROR",
]);

/**
 * Error body returned by every REST endpoint on failure
 */
export const ErrorResponseSchema = z.object({
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string().min(1, "Error message is required"),
  }),
});

// =============================================================================
// Session Record Schemas
// =============================================================================

/**
 * One answered question inside a review session.
 *
 * `question_hash` may be left out; the backend derives it from the
 * normalized question text.
 */
export const SessionQuestionSchema = z.object({
  question_hash: z.string().min(1).optional(),
  question_text: z.string().min(1, "Question text is required"),
  user_answer: z.string().default(""),
  evaluation_kind: z.string().default(""),
  score: ScoreSchema,
  follow_up_count: z.number().int().min(0).default(0),
  user_had_questions: z.boolean().default(false),
});

/**
 * A topic the user asked to emphasise in upcoming sessions
 */
const PriorityRequestInputSchema = z.object({
  topic: z.string().trim().min(1, "Topic is required"),
  reason: z.string().optional(),
});

/**
 * A review session as submitted by the agent at the end of a session.
 *
 * A missing `overall_rating` marks the session as interrupted.
 */
export const SessionRecordSchema = z.object({
  session_id: z.string().min(1, "Session ID is required"),
  start_time: TimestampSchema,
  end_time: TimestampSchema.optional(),
  questions: z.array(SessionQuestionSchema).default([]),
  overall_rating: RatingSchema.optional(),
  average_score: ScoreSchema.optional(),
  priorities_requested: z.array(PriorityRequestInputSchema).default([]),
  priorities_addressed: z.array(z.string()).default([]),
  learned_content: z.array(z.string()).default([]),
});

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * POST /api/notes
 */
export const AddNoteRequestSchema = z
  .object({
    title: z
      .string()
      .trim()
      .min(1, "Title cannot be empty")
      .max(200, "Title cannot exceed 200 characters"),
    body: z.string().refine((s) => s.trim().length > 0, "Body cannot be empty"),
    review_mode: ReviewModeSchema.default("spaced"),
    schedule_pattern: z.string().min(1).optional(),
  })
  .refine((req) => req.review_mode !== "scheduled" || req.schedule_pattern !== undefined, {
    message: "Schedule pattern required for scheduled mode",
    path: ["schedule_pattern"],
  });

/**
 * POST /api/notes/:filename/append
 */
export const AppendNoteRequestSchema = z.object({
  text: z.string().refine((s) => s.trim().length > 0, "Text cannot be empty"),
});

/**
 * POST /api/notes/:filename/review
 *
 * The rating is checked by the scheduler so out-of-range values surface
 * as INVALID_RATING rather than a generic validation error.
 */
export const RecordReviewRequestSchema = z.object({
  rating: z.number(),
});

/**
 * POST /api/schedule/preview
 */
export const CalculateNextReviewRequestSchema = z.object({
  rating: z.number(),
  interval_days: z.number().int().min(0),
  ease_factor: z.number().positive(),
  review_mode: ReviewModeSchema.default("spaced"),
  review_count: z.number().int().min(0).default(0),
  schedule_pattern: z.string().min(1).optional(),
});

/**
 * GET /api/notes query string
 */
export const NotesQuerySchema = z.object({
  due_only: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * GET /api/notes/due query string
 */
export const DueNotesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().optional(),
  review_mode: ReviewModeSchema.optional(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type SessionQuestion = z.infer<typeof SessionQuestionSchema>;
export type PriorityRequestInput = z.infer<typeof PriorityRequestInputSchema>;
export type SessionRecord = z.infer<typeof SessionRecordSchema>;
export type AddNoteRequest = z.infer<typeof AddNoteRequestSchema>;
export type CalculateNextReviewRequest = z.infer<typeof CalculateNextReviewRequestSchema>;
export type DueNotesQuery = z.infer<typeof DueNotesQuerySchema>;
export type NotesQuery = z.infer<typeof NotesQuerySchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Format a Zod validation error into a single human-readable line per issue.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
