/**
 * Due-Set Selector
 *
 * Picks the notes whose next review has passed, most overdue first.
 */

import type { ReviewMode } from "@study-loop/shared";
import type { Note } from "../notes/note-schema.js";

export interface DueSelectionOptions {
  /** Only include notes in this review mode */
  reviewMode?: ReviewMode;
  /** Stop after this many notes */
  limit?: number;
}

/**
 * Check if a note is due at `now`.
 */
export function isDue(note: Note, now: Date): boolean {
  return Date.parse(note.header.next_review) <= now.getTime();
}

/**
 * Order notes by ascending next_review, ties by filename.
 */
export function compareByNextReview(a: Note, b: Note): number {
  const diff = Date.parse(a.header.next_review) - Date.parse(b.header.next_review);
  return diff !== 0 ? diff : a.filename.localeCompare(b.filename);
}

/**
 * Select due notes ordered by ascending next_review (ties by filename).
 *
 * The result is lazy and restartable: every iteration re-evaluates the
 * given notes against `now`, and iterating has no side effects.
 */
export function selectDue(
  notes: readonly Note[],
  now: Date,
  options: DueSelectionOptions = {}
): Iterable<Note> {
  const { reviewMode, limit } = options;

  return {
    *[Symbol.iterator]() {
      const due = notes
        .filter((note) => isDue(note, now))
        .filter((note) => reviewMode === undefined || note.header.review_mode === reviewMode)
        .sort(compareByNextReview);

      let yielded = 0;
      for (const note of due) {
        if (limit !== undefined && yielded >= limit) {
          return;
        }
        yielded++;
        yield note;
      }
    },
  };
}
