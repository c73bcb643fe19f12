/**
 * Note Routes
 *
 * REST endpoints the review agent calls for notes:
 * - GET /notes - All notes with their schedules
 * - GET /notes/due - Notes due for review
 * - POST /notes - Create a note
 * - GET /notes/:filename - Full note for review
 * - POST /notes/:filename/append - Append text to the body
 * - POST /notes/:filename/review - Record a rating
 * - GET /notes/:filename/sessions - Recorded sessions
 * - POST /notes/:filename/sessions - Save a finished or interrupted session
 *
 * Errors are thrown and mapped by restErrorHandler.
 */

import { Hono } from "hono";
import {
  AddNoteRequestSchema,
  AppendNoteRequestSchema,
  DueNotesQuerySchema,
  NotesQuerySchema,
  RecordReviewRequestSchema,
  formatZodError,
} from "@study-loop/shared";
import { ValidationError } from "../errors.js";
import { createLogger } from "../logger.js";
import { type AppEnv, getServiceFromContext, readJsonBody } from "../middleware/service-context.js";

const log = createLogger("NoteRoutes");

const noteRoutes = new Hono<AppEnv>();

/**
 * GET /notes?due_only=&limit=
 */
noteRoutes.get("/", async (c) => {
  const query = NotesQuerySchema.safeParse(c.req.query());
  if (!query.success) {
    throw new ValidationError(formatZodError(query.error));
  }

  const notes = await getServiceFromContext(c).listNotes(query.data);
  return c.json({ notes, count: notes.length });
});

/**
 * GET /notes/due?limit=&review_mode=
 */
noteRoutes.get("/due", async (c) => {
  const query = DueNotesQuerySchema.safeParse(c.req.query());
  if (!query.success) {
    throw new ValidationError(formatZodError(query.error));
  }

  const notes = await getServiceFromContext(c).getDueNotes(query.data);
  log.info(`Found ${notes.length} due note(s)`);
  return c.json({ notes, count: notes.length });
});

/**
 * POST /notes
 * Request body: { title, body, review_mode?, schedule_pattern? }
 */
noteRoutes.post("/", async (c) => {
  const request = await readJsonBody(c, AddNoteRequestSchema);
  const note = await getServiceFromContext(c).addNote(request);
  return c.json(note, 201);
});

noteRoutes.get("/:filename", async (c) => {
  const note = await getServiceFromContext(c).reviewNote(c.req.param("filename"));
  return c.json(note);
});

/**
 * POST /notes/:filename/append
 * Request body: { text }
 */
noteRoutes.post("/:filename/append", async (c) => {
  const { text } = await readJsonBody(c, AppendNoteRequestSchema);
  const note = await getServiceFromContext(c).appendToNote(c.req.param("filename"), text);
  return c.json(note);
});

/**
 * POST /notes/:filename/review
 * Request body: { rating: 1 | 2 | 3 | 4 }
 */
noteRoutes.post("/:filename/review", async (c) => {
  const { rating } = await readJsonBody(c, RecordReviewRequestSchema);
  const result = await getServiceFromContext(c).recordReview(c.req.param("filename"), rating);
  return c.json(result);
});

noteRoutes.get("/:filename/sessions", async (c) => {
  const sessions = await getServiceFromContext(c).getSessionHistory(c.req.param("filename"));
  return c.json({ sessions, count: sessions.length });
});

/**
 * POST /notes/:filename/sessions
 * Request body: a session record; validated by the service.
 */
noteRoutes.post("/:filename/sessions", async (c) => {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON in request body");
  }

  const result = await getServiceFromContext(c).saveSessionHistory(c.req.param("filename"), body);
  return c.json(result, 201);
});

export { noteRoutes };
