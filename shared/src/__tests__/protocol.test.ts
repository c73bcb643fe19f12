/**
 * Protocol Schema Tests
 *
 * Tests for review payload validation using Zod schemas.
 */

import { describe, test, expect } from "vitest";
import { ZodError } from "zod";
import {
  ReviewModeSchema,
  RatingSchema,
  ErrorCodeSchema,
  SessionRecordSchema,
  AddNoteRequestSchema,
  CalculateNextReviewRequestSchema,
  DueNotesQuerySchema,
  NotesQuerySchema,
  formatZodError,
} from "../protocol.js";
import type { ErrorCode } from "../types.js";

// =============================================================================
// Primitive Schema Tests
// =============================================================================

describe("ReviewModeSchema", () => {
  test("accepts spaced and scheduled", () => {
    expect(ReviewModeSchema.parse("spaced")).toBe("spaced");
    expect(ReviewModeSchema.parse("scheduled")).toBe("scheduled");
  });

  test("rejects unknown modes", () => {
    expect(() => ReviewModeSchema.parse("random")).toThrow(ZodError);
  });
});

describe("RatingSchema", () => {
  test("accepts 1 through 4", () => {
    for (const rating of [1, 2, 3, 4]) {
      expect(RatingSchema.parse(rating)).toBe(rating);
    }
  });

  test("rejects 0, 5 and fractional ratings", () => {
    expect(RatingSchema.safeParse(0).success).toBe(false);
    expect(RatingSchema.safeParse(5).success).toBe(false);
    expect(RatingSchema.safeParse(2.5).success).toBe(false);
  });
});

describe("ErrorCodeSchema", () => {
  test("accepts every error code", () => {
    const codes: ErrorCode[] = [
      "NOTE_NOT_FOUND",
      "INVALID_RATING",
      "IO_ERROR",
      "MALFORMED_HEADER",
      "VALIDATION_ERROR",
      "SESSION_ALREADY_RECORDED",
      "INTERNAL_ERROR",
    ];
    for (const code of codes) {
      expect(ErrorCodeSchema.parse(code)).toBe(code);
    }
  });
});

// =============================================================================
// Session Record Tests
// =============================================================================

describe("SessionRecordSchema", () => {
  const minimal = {
    session_id: "20260123-100000",
    start_time: "2026-01-23T10:00:00.000Z",
  };

  test("applies defaults to a minimal record", () => {
    const record = SessionRecordSchema.parse(minimal);

    expect(record.questions).toEqual([]);
    expect(record.priorities_requested).toEqual([]);
    expect(record.priorities_addressed).toEqual([]);
    expect(record.learned_content).toEqual([]);
    expect(record.overall_rating).toBeUndefined();
    expect(record.end_time).toBeUndefined();
  });

  test("fills question defaults", () => {
    const record = SessionRecordSchema.parse({
      ...minimal,
      questions: [{ question_text: "What is a decorator?", score: 0.5 }],
    });

    expect(record.questions[0]).toEqual({
      question_text: "What is a decorator?",
      user_answer: "",
      evaluation_kind: "",
      score: 0.5,
      follow_up_count: 0,
      user_had_questions: false,
    });
  });

  test("accepts timestamps with an offset", () => {
    const result = SessionRecordSchema.safeParse({
      ...minimal,
      start_time: "2026-01-23T10:00:00+02:00",
    });
    expect(result.success).toBe(true);
  });

  test("rejects scores outside 0..1", () => {
    const result = SessionRecordSchema.safeParse({
      ...minimal,
      questions: [{ question_text: "Q", score: 1.2 }],
    });
    expect(result.success).toBe(false);
  });

  test("rejects an overall rating of 5", () => {
    const result = SessionRecordSchema.safeParse({ ...minimal, overall_rating: 5 });
    expect(result.success).toBe(false);
  });

  test("rejects a blank priority topic", () => {
    const result = SessionRecordSchema.safeParse({
      ...minimal,
      priorities_requested: [{ topic: "   " }],
    });
    expect(result.success).toBe(false);
  });

  test("rejects a date-only start time", () => {
    const result = SessionRecordSchema.safeParse({ ...minimal, start_time: "2026-01-23" });
    expect(result.success).toBe(false);
  });
});

// =============================================================================
// Request Schema Tests
// =============================================================================

describe("AddNoteRequestSchema", () => {
  test("defaults review_mode to spaced", () => {
    const req = AddNoteRequestSchema.parse({ title: "Python GIL", body: "Notes" });
    expect(req.review_mode).toBe("spaced");
  });

  test("requires a schedule pattern in scheduled mode", () => {
    const result = AddNoteRequestSchema.safeParse({
      title: "Tax deadlines",
      body: "Notes",
      review_mode: "scheduled",
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(["schedule_pattern"]);
    }
  });

  test("rejects an empty body", () => {
    expect(AddNoteRequestSchema.safeParse({ title: "T", body: "  " }).success).toBe(false);
  });

  test("rejects titles longer than 200 characters", () => {
    const result = AddNoteRequestSchema.safeParse({ title: "x".repeat(201), body: "b" });
    expect(result.success).toBe(false);
  });
});

describe("CalculateNextReviewRequestSchema", () => {
  test("keeps out-of-range ratings for the scheduler to reject", () => {
    const req = CalculateNextReviewRequestSchema.parse({
      rating: 7,
      interval_days: 6,
      ease_factor: 2.5,
    });
    expect(req.rating).toBe(7);
    expect(req.review_mode).toBe("spaced");
    expect(req.review_count).toBe(0);
  });
});

describe("DueNotesQuerySchema", () => {
  test("coerces limit from a query string", () => {
    expect(DueNotesQuerySchema.parse({ limit: "3" })).toEqual({ limit: 3 });
  });

  test("rejects a zero limit", () => {
    expect(DueNotesQuerySchema.safeParse({ limit: "0" }).success).toBe(false);
  });
});

describe("NotesQuerySchema", () => {
  test("reads due_only as a boolean", () => {
    expect(NotesQuerySchema.parse({ due_only: "true", limit: "2" })).toEqual({
      due_only: true,
      limit: 2,
    });
    expect(NotesQuerySchema.parse({ due_only: "false" })).toEqual({ due_only: false });
  });

  test("rejects other due_only values", () => {
    expect(NotesQuerySchema.safeParse({ due_only: "yes" }).success).toBe(false);
  });
});

// =============================================================================
// Utility Tests
// =============================================================================

describe("formatZodError", () => {
  test("joins issue paths and messages", () => {
    const result = SessionRecordSchema.safeParse({ start_time: "2026-01-23T10:00:00Z" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe("session_id: Required");
    }
  });
});
