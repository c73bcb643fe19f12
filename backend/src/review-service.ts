/**
 * Review Service
 *
 * The operations the external review agent calls: finding due notes,
 * fetching a note, recording a rating, saving a session and previewing a
 * schedule. Composes the note store, scheduler, performance tracker,
 * priority registry and session history log.
 */

import {
  SessionRecordSchema,
  formatZodError,
  type AddNoteRequest,
  type CalculateNextReviewRequest,
  type DueNotesQuery,
  type NotesQuery,
  type ReviewMode,
  type SessionRecord,
} from "@study-loop/shared";
import { ValidationError, SessionAlreadyRecordedError } from "./errors.js";
import { reviewLog as log } from "./logger.js";
import {
  addDays,
  createFilename,
  createNewNoteHeader,
  daysBetween,
  parseTimestamp,
  toTimestamp,
  type Note,
  type NoteHeader,
  type SessionSummary,
} from "./notes/note-schema.js";
import type { NoteStore } from "./notes/note-storage.js";
import { computeNextReview } from "./spaced-repetition/sm2-algorithm.js";
import { isValidSchedulePattern } from "./spaced-repetition/schedule-pattern.js";
import { compareByNextReview, selectDue } from "./spaced-repetition/due-selector.js";
import {
  averageScore,
  hashQuestion,
  mergePerformance,
  rankWeakQuestions,
} from "./performance/performance-tracker.js";
import {
  markAddressed,
  registerRequest,
  resolveAddressedTopics,
} from "./performance/priority-registry.js";
import type { SessionHistoryLog, StoredSession } from "./history/session-history.js";

// =============================================================================
// Types
// =============================================================================

export interface ReviewServiceOptions {
  /** Cadence for scheduled notes created without one */
  defaultSchedulePattern: string;
  /** Size of each note's priority_questions list */
  weakQuestionLimit: number;
  /** Clock used when a call does not pass `now` */
  clock?: () => Date;
}

export interface DueNoteSummary {
  filename: string;
  title: string;
  review_mode: ReviewMode;
  /** Whole calendar days since the last review, null if never reviewed */
  days_since_last_review: number | null;
  interval_days: number;
  ease_factor: number;
  review_count: number;
}

export interface NoteSummary {
  filename: string;
  title: string;
  review_mode: ReviewMode;
  next_review: string;
  /** Calendar days until the next review; negative when overdue */
  days_until_review: number;
  interval_days: number;
  ease_factor: number;
  review_count: number;
}

export interface NoteView {
  filename: string;
  title: string;
  body: string;
  header: NoteHeader;
}

export interface ReviewResult {
  next_review: string;
  new_interval_days: number;
  new_ease_factor: number;
}

export interface SaveSessionResult {
  session_id: string;
  /** False when an earlier attempt already merged this session */
  merged: boolean;
  average_score: number;
  addressed_topics: string[];
  priority_questions: string[];
  history_path: string;
}

export interface StudyStats {
  total_notes: number;
  due_today: number;
  due_this_week: number;
  reviewed_today: number;
  average_ease: number;
  spaced_notes: number;
  scheduled_notes: number;
  quarantined_notes: number;
}

// =============================================================================
// Helpers
// =============================================================================

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function calendarDaysBetween(from: Date, to: Date): number {
  return daysBetween(startOfUtcDay(from), startOfUtcDay(to));
}

function toNoteView(note: Note): NoteView {
  return { filename: note.filename, title: note.header.title, body: note.body, header: note.header };
}

/**
 * Validate a session payload and resolve what the caller may leave out:
 * question hashes and the average score.
 */
function prepareSession(filename: string, input: unknown, now: Date): StoredSession {
  const parsed = SessionRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid session record: ${formatZodError(parsed.error)}`);
  }
  const record: SessionRecord = parsed.data;

  const questions = record.questions.map((question) => ({
    ...question,
    question_hash: question.question_hash ?? hashQuestion(question.question_text),
  }));

  return {
    ...record,
    questions,
    note_filename: filename,
    average_score: record.average_score ?? averageScore(questions),
    recorded_at: toTimestamp(now),
  };
}

// =============================================================================
// Service
// =============================================================================

export class ReviewService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: NoteStore,
    private readonly history: SessionHistoryLog,
    private readonly options: ReviewServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Notes due for review, most overdue first.
   */
  async getDueNotes(query: DueNotesQuery = {}, now: Date = this.clock()): Promise<DueNoteSummary[]> {
    const { notes } = await this.store.loadAll();
    const due = selectDue(notes, now, { limit: query.limit, reviewMode: query.review_mode });

    return Array.from(due, (note) => ({
      filename: note.filename,
      title: note.header.title,
      review_mode: note.header.review_mode,
      days_since_last_review:
        note.header.last_reviewed === null
          ? null
          : calendarDaysBetween(parseTimestamp(note.header.last_reviewed), now),
      interval_days: note.header.interval_days,
      ease_factor: note.header.ease_factor,
      review_count: note.header.review_count,
    }));
  }

  /**
   * Every note with its schedule, soonest review first.
   * With `due_only`, the same selection as getDueNotes.
   */
  async listNotes(query: NotesQuery = {}, now: Date = this.clock()): Promise<NoteSummary[]> {
    const { notes } = await this.store.loadAll();
    const selected = query.due_only
      ? Array.from(selectDue(notes, now, { limit: query.limit }))
      : [...notes].sort(compareByNextReview).slice(0, query.limit);

    return selected.map((note) => ({
      filename: note.filename,
      title: note.header.title,
      review_mode: note.header.review_mode,
      next_review: note.header.next_review,
      days_until_review: calendarDaysBetween(now, parseTimestamp(note.header.next_review)),
      interval_days: note.header.interval_days,
      ease_factor: note.header.ease_factor,
      review_count: note.header.review_count,
    }));
  }

  /**
   * Fetch a note for review. Read-only.
   */
  async reviewNote(filename: string): Promise<NoteView> {
    return toNoteView(await this.store.load(filename));
  }

  /**
   * Apply a rating to a note and persist its new schedule.
   *
   * @throws InvalidRatingError for ratings other than 1-4
   * @throws NoteNotFoundError for an unknown note
   */
  async recordReview(filename: string, rating: unknown, now: Date = this.clock()): Promise<ReviewResult> {
    const note = await this.store.load(filename);
    const result = computeNextReview(note.header, rating, now, this.options.defaultSchedulePattern);

    await this.store.save({
      ...note,
      header: {
        ...note.header,
        next_review: result.next_review,
        interval_days: result.interval_days,
        ease_factor: result.ease_factor,
        review_count: note.header.review_count + 1,
        last_reviewed: toTimestamp(now),
      },
    });

    log.info(
      `Reviewed ${filename}: rating ${String(rating)}, next in ${result.interval_days} day(s)`
    );

    return {
      next_review: result.next_review,
      new_interval_days: result.interval_days,
      new_ease_factor: result.ease_factor,
    };
  }

  /**
   * Merge a finished or interrupted session into its note and log it.
   *
   * The note is saved first, then the record is appended. A retry after
   * the append failed completes only the append. Scheduling fields are
   * never touched; ratings go through recordReview.
   *
   * @throws ValidationError if the payload is invalid
   * @throws SessionAlreadyRecordedError if the session is already logged
   */
  async saveSessionHistory(
    filename: string,
    input: unknown,
    now: Date = this.clock()
  ): Promise<SaveSessionResult> {
    const session = prepareSession(filename, input, now);
    const note = await this.store.load(filename);

    // A record file at the session's path, even an unreadable one, also counts
    if (
      (await this.history.hasSession(filename, session.session_id)) ||
      (await this.history.isRecorded(session))
    ) {
      throw new SessionAlreadyRecordedError(filename, session.session_id);
    }

    const alreadyMerged = note.header.last_session_summary?.session_id === session.session_id;
    let header = note.header;
    let addressedTopics: string[] = [];

    if (alreadyMerged) {
      log.warn(`Session ${session.session_id} already merged into ${filename}; logging only`);
    } else {
      const merged = this.mergeSession(note.header, session, now);
      header = merged.header;
      addressedTopics = merged.addressedTopics;
      await this.store.save({ ...note, header });
    }

    const historyPath = await this.history.appendSession(session);

    log.info(
      `Saved session ${session.session_id} for ${filename}: ${session.questions.length} question(s)` +
        (session.overall_rating === undefined ? " (interrupted)" : "")
    );

    return {
      session_id: session.session_id,
      merged: !alreadyMerged,
      average_score: session.average_score,
      addressed_topics: addressedTopics,
      priority_questions: header.priority_questions,
      history_path: historyPath,
    };
  }

  /**
   * Preview a schedule without touching any note.
   */
  calculateNextReview(request: CalculateNextReviewRequest, now: Date = this.clock()): ReviewResult {
    const result = computeNextReview(
      {
        review_mode: request.review_mode,
        interval_days: request.interval_days,
        ease_factor: request.ease_factor,
        review_count: request.review_count,
        schedule_pattern: request.schedule_pattern ?? null,
      },
      request.rating,
      now,
      this.options.defaultSchedulePattern
    );

    return {
      next_review: result.next_review,
      new_interval_days: result.interval_days,
      new_ease_factor: result.ease_factor,
    };
  }

  /**
   * Create a note, due immediately.
   *
   * @throws ValidationError for an unusable schedule pattern
   */
  async addNote(input: AddNoteRequest, now: Date = this.clock()): Promise<NoteView> {
    const title = input.title.trim();
    let schedulePattern: string | null = null;

    if (input.review_mode === "scheduled") {
      schedulePattern = (input.schedule_pattern ?? this.options.defaultSchedulePattern).trim();
      if (!isValidSchedulePattern(schedulePattern)) {
        throw new ValidationError(`Invalid schedule pattern: '${schedulePattern}'`);
      }
    }

    const header = createNewNoteHeader(title, input.review_mode, schedulePattern, now);
    const note = await this.store.create(createFilename(title), header, input.body);
    return toNoteView(note);
  }

  /**
   * Append text to a note's body, separated by a blank line.
   */
  async appendToNote(filename: string, text: string): Promise<NoteView> {
    const note = await this.store.load(filename);
    const trimmedBody = note.body.replace(/\s+$/, "");
    const addition = text.trim();
    if (!addition) {
      throw new ValidationError("Text cannot be empty");
    }

    const body = trimmedBody ? `${trimmedBody}\n\n${addition}\n` : `${addition}\n`;
    const updated: Note = { ...note, body };
    await this.store.save(updated);
    return toNoteView(updated);
  }

  /**
   * Recorded sessions of a note, oldest first.
   */
  async getSessionHistory(filename: string): Promise<StoredSession[]> {
    await this.store.load(filename);
    return this.history.listSessions(filename);
  }

  async getStats(now: Date = this.clock()): Promise<StudyStats> {
    const { notes, quarantined } = await this.store.loadAll();
    const todayEnd = addDays(startOfUtcDay(now), 1);
    const weekEnd = addDays(now, 7);

    const dueToday = notes.filter((note) => Date.parse(note.header.next_review) < todayEnd.getTime());
    const dueThisWeek = notes.filter((note) => {
      const next = Date.parse(note.header.next_review);
      return next >= todayEnd.getTime() && next <= weekEnd.getTime();
    });
    const reviewedToday = notes.filter(
      (note) =>
        note.header.last_reviewed !== null &&
        calendarDaysBetween(parseTimestamp(note.header.last_reviewed), now) === 0
    );
    const reviewed = notes.filter((note) => note.header.review_count > 0);
    const averageEase =
      reviewed.length > 0
        ? reviewed.reduce((sum, note) => sum + note.header.ease_factor, 0) / reviewed.length
        : 2.5;

    return {
      total_notes: notes.length,
      due_today: dueToday.length,
      due_this_week: dueThisWeek.length,
      reviewed_today: reviewedToday.length,
      average_ease: averageEase,
      spaced_notes: notes.filter((note) => note.header.review_mode === "spaced").length,
      scheduled_notes: notes.filter((note) => note.header.review_mode === "scheduled").length,
      quarantined_notes: quarantined.length,
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * New performance and priority fields for a note after a session.
   * Requested topics are registered before coverage is credited.
   */
  private mergeSession(
    header: NoteHeader,
    session: StoredSession,
    now: Date
  ): { header: NoteHeader; addressedTopics: string[] } {
    const questionPerformance = mergePerformance(header.question_performance, session.questions);

    let requests = header.priority_requests;
    for (const requested of session.priorities_requested) {
      requests = registerRequest(requests, requested, { now, sessionId: session.session_id });
    }
    const addressedTopics = resolveAddressedTopics(
      requests,
      session.priorities_addressed,
      session.questions
    );
    requests = markAddressed(requests, addressedTopics);

    const summary: SessionSummary = {
      session_id: session.session_id,
      end_time: session.end_time ?? session.start_time,
      average_score: session.average_score,
      question_count: session.questions.length,
      overall_rating: session.overall_rating ?? null,
    };

    return {
      header: {
        ...header,
        question_performance: questionPerformance,
        priority_questions: rankWeakQuestions(questionPerformance, this.options.weakQuestionLimit),
        priority_requests: requests,
        last_session_summary: summary,
        learned_content_count: header.learned_content_count + session.learned_content.length,
      },
      addressedTopics,
    };
  }
}
