/**
 * Session History Log
 *
 * Append-only audit trail of review sessions. Each session is written once
 * as its own JSON document under `<historyDir>/<note-stem>/`, named from
 * the session's start time and id. Records are never edited or deleted.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { SessionQuestionSchema, SessionRecordSchema, ScoreSchema, TimestampSchema } from "@study-loop/shared";
import { writeExclusive } from "../atomic-file.js";
import { PersistenceError, SessionAlreadyRecordedError, errnoCode } from "../errors.js";
import { historyLog as log } from "../logger.js";
import { noteStem } from "../notes/note-schema.js";

const RECORD_EXTENSION = ".json";

// =============================================================================
// Schema
// =============================================================================

/**
 * A session record as stored on disk: every question carries its hash,
 * the average score is resolved, and the owning note is named.
 */
export const StoredSessionSchema = SessionRecordSchema.extend({
  note_filename: z.string().min(1),
  questions: z.array(SessionQuestionSchema.extend({ question_hash: z.string().min(1) })),
  average_score: ScoreSchema,
  recorded_at: TimestampSchema,
});

export type StoredSession = z.infer<typeof StoredSessionSchema>;

// =============================================================================
// Filenames
// =============================================================================

/**
 * Compact, sortable form of a timestamp for filenames.
 *
 * @example compactTimestamp("2026-03-01T09:30:00.000Z") // "20260301T093000Z"
 */
export function compactTimestamp(timestamp: string): string {
  return new Date(timestamp).toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

/**
 * Filename-safe form of a session id. Letters, digits and hyphens are
 * kept; every other code point becomes `_<hex>_`, so distinct ids never
 * share an encoding.
 *
 * @example encodeSessionId("a.b") // "a_2e_b"
 */
export function encodeSessionId(sessionId: string): string {
  return Array.from(sessionId, (char) =>
    /^[A-Za-z0-9-]$/.test(char) ? char : `_${(char.codePointAt(0) ?? 0).toString(16)}_`
  ).join("");
}

/**
 * Deterministic filename for a session record.
 */
export function sessionFilename(record: Pick<StoredSession, "start_time" | "session_id">): string {
  return `${compactTimestamp(record.start_time)}-${encodeSessionId(record.session_id)}${RECORD_EXTENSION}`;
}

// =============================================================================
// Log
// =============================================================================

export class SessionHistoryLog {
  constructor(readonly historyDir: string) {}

  /**
   * Directory holding the sessions of one note.
   */
  getNoteDir(noteFilename: string): string {
    return join(this.historyDir, noteStem(noteFilename));
  }

  /**
   * Path a session record is stored at.
   */
  getRecordPath(record: Pick<StoredSession, "note_filename" | "start_time" | "session_id">): string {
    return join(this.getNoteDir(record.note_filename), sessionFilename(record));
  }

  /**
   * Whether a file already occupies the record's path, readable or not.
   */
  async isRecorded(
    record: Pick<StoredSession, "note_filename" | "start_time" | "session_id">
  ): Promise<boolean> {
    const path = this.getRecordPath(record);
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return false;
      }
      throw new PersistenceError("check session record", path, error);
    }
  }

  /**
   * Persist a session record. The record appears complete or not at all.
   *
   * @returns Path of the new record
   * @throws SessionAlreadyRecordedError if the record's file already exists
   * @throws PersistenceError on I/O failure
   */
  async appendSession(record: StoredSession): Promise<string> {
    const path = this.getRecordPath(record);

    let written: boolean;
    try {
      written = await writeExclusive(path, `${JSON.stringify(record, null, 2)}\n`);
    } catch (error) {
      throw new PersistenceError("write session record", path, error);
    }
    if (!written) {
      throw new SessionAlreadyRecordedError(record.note_filename, record.session_id);
    }

    log.info(`Recorded session ${record.session_id} for ${record.note_filename}`);
    return path;
  }

  /**
   * All sessions recorded for a note, oldest first.
   *
   * Files that cannot be parsed are skipped with a warning.
   */
  async listSessions(noteFilename: string): Promise<StoredSession[]> {
    const dir = this.getNoteDir(noteFilename);

    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (errnoCode(error) === "ENOENT") {
        return [];
      }
      throw new PersistenceError("list sessions in", dir, error);
    }

    const sessions: StoredSession[] = [];
    for (const entry of entries.filter((name) => name.endsWith(RECORD_EXTENSION)).sort()) {
      const path = join(dir, entry);
      let content: string;
      try {
        content = await readFile(path, "utf-8");
      } catch (error) {
        throw new PersistenceError("read session record", path, error);
      }

      const parsed = parseStoredSession(content);
      if (parsed) {
        sessions.push(parsed);
      } else {
        log.warn(`Skipping unreadable session record: ${path}`);
      }
    }

    return sessions.sort(
      (a, b) =>
        Date.parse(a.start_time) - Date.parse(b.start_time) || a.session_id.localeCompare(b.session_id)
    );
  }

  async hasSession(noteFilename: string, sessionId: string): Promise<boolean> {
    const sessions = await this.listSessions(noteFilename);
    return sessions.some((session) => session.session_id === sessionId);
  }
}

function parseStoredSession(content: string): StoredSession | null {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }
  const result = StoredSessionSchema.safeParse(data);
  return result.success ? result.data : null;
}
