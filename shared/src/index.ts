/**
 * Study Loop Shared Types and Protocols
 *
 * This package contains:
 * - Zod schemas for the review protocol (session records, requests)
 * - TypeScript types for review modes, ratings and error codes
 */

// Core types
export type { ReviewMode, Rating, ErrorCode } from "./types.js";

// Protocol schemas
export {
  // Primitives
  ReviewModeSchema,
  RatingSchema,
  TimestampSchema,
  ScoreSchema,
  // Errors
  ErrorCodeSchema,
  ErrorResponseSchema,
  // Session records
  SessionQuestionSchema,
  SessionRecordSchema,
  // Requests
  AddNoteRequestSchema,
  AppendNoteRequestSchema,
  RecordReviewRequestSchema,
  CalculateNextReviewRequestSchema,
  DueNotesQuerySchema,
  NotesQuerySchema,
  // Utilities
  formatZodError,
} from "./protocol.js";

// Protocol types
export type {
  SessionQuestion,
  PriorityRequestInput,
  SessionRecord,
  AddNoteRequest,
  CalculateNextReviewRequest,
  DueNotesQuery,
  NotesQuery,
  ErrorResponse,
} from "./protocol.js";
