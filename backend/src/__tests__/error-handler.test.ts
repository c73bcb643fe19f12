/**
 * Error Handler Middleware Tests
 *
 * Covers:
 * - StudyLoopError subclasses map to the right HTTP status codes
 * - Zod errors become VALIDATION_ERROR
 * - Unknown errors return 500 with a safe message
 * - Errors are logged server-side with context
 */

import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import { Hono } from "hono";
import { z } from "zod";
import { ErrorResponseSchema } from "@study-loop/shared";
import {
  InvalidRatingError,
  MalformedHeaderError,
  NoteNotFoundError,
  PersistenceError,
  SessionAlreadyRecordedError,
  StudyLoopError,
  ValidationError,
  isStudyLoopError,
} from "../errors.js";
import { mapErrorCodeToStatus, restErrorHandler } from "../middleware/error-handler.js";

describe("restErrorHandler", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /**
   * Creates a test Hono app with error handler and a route that throws.
   */
  function createTestApp(errorToThrow: () => unknown): Hono {
    const app = new Hono();
    app.onError(restErrorHandler);

    app.get("/test", () => {
      throw errorToThrow();
    });

    return app;
  }

  async function fetchError(errorToThrow: () => unknown) {
    const res = await createTestApp(errorToThrow).request("/test");
    return { status: res.status, body: ErrorResponseSchema.parse(await res.json()) };
  }

  describe("StudyLoopError mapping", () => {
    it.each([
      [() => new NoteNotFoundError("gil.md"), 404, "NOTE_NOT_FOUND", "Note 'gil.md' not found"],
      [
        () => new InvalidRatingError(7),
        400,
        "INVALID_RATING",
        "Rating must be an integer between 1 and 4, got 7",
      ],
      [() => new ValidationError("Title cannot be empty"), 400, "VALIDATION_ERROR", "Title cannot be empty"],
      [
        () => new MalformedHeaderError("gil.md", "Required", "title"),
        422,
        "MALFORMED_HEADER",
        "Malformed header in gil.md (field 'title'): Required",
      ],
      [
        () => new SessionAlreadyRecordedError("gil.md", "s1"),
        409,
        "SESSION_ALREADY_RECORDED",
        "Session 's1' has already been recorded for gil.md",
      ],
      [
        () => new PersistenceError("write", "/notes/gil.md", new Error("EACCES")),
        500,
        "IO_ERROR",
        "Failed to write /notes/gil.md: EACCES",
      ],
    ])("maps error %# to its status", async (makeError, status, code, message) => {
      const res = await fetchError(makeError);

      expect(res.status).toBe(status);
      expect(res.body.error).toEqual({ code, message });
    });

    it("logs known errors at warn level with the request", async () => {
      await fetchError(() => new NoteNotFoundError("gil.md"));

      const warn = vi.mocked(console.warn);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0][0])).toContain(
        "[ErrorHandler] GET /test - NOTE_NOT_FOUND: Note 'gil.md' not found"
      );
    });
  });

  it("maps zod errors to VALIDATION_ERROR", async () => {
    const res = await fetchError(() => z.object({ title: z.string() }).parse({}));

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "VALIDATION_ERROR", message: "title: Required" });
  });

  it("hides unknown errors behind a generic 500", async () => {
    const res = await fetchError(() => new Error("secret database path /var/lib/x"));

    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({
      code: "INTERNAL_ERROR",
      message: "An unexpected error occurred. Please try again later.",
    });
    expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
  });
});

describe("mapErrorCodeToStatus", () => {
  it("maps internal errors to 500", () => {
    expect(mapErrorCodeToStatus("INTERNAL_ERROR")).toBe(500);
  });
});

describe("isStudyLoopError", () => {
  it("recognises errors carrying a known code", () => {
    const foreign = Object.assign(new Error("not found"), { code: "NOTE_NOT_FOUND" });

    expect(isStudyLoopError(new StudyLoopError("boom", "IO_ERROR"))).toBe(true);
    expect(isStudyLoopError(foreign)).toBe(true);
  });

  it("rejects errno errors and plain errors", () => {
    const errno = Object.assign(new Error("missing"), { code: "ENOENT" });

    expect(isStudyLoopError(errno)).toBe(false);
    expect(isStudyLoopError(new Error("plain"))).toBe(false);
  });
});
