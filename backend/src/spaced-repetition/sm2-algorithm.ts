/**
 * SM-2 Spaced Repetition Algorithm
 *
 * Pure functions for calculating the next review of a note. Notes in
 * "spaced" mode follow a simplified SM-2 (Piotr Wozniak, 1987) driven by a
 * 1-4 rating; notes in "scheduled" mode step through a fixed cadence and
 * ignore the rating.
 *
 * Nothing here reads the clock: callers pass `now`.
 */

import type { Rating, ReviewMode } from "@study-loop/shared";
import { InvalidRatingError } from "../errors.js";
import { addDays, toTimestamp } from "../notes/note-schema.js";
import { PRESET_SCHEDULES, parseSchedulePattern } from "./schedule-pattern.js";

// =============================================================================
// Constants
// =============================================================================

/** Minimum ease factor to prevent notes from becoming too difficult */
export const MIN_EASE_FACTOR = 1.3;

/** Maximum ease factor to prevent intervals from growing too fast */
export const MAX_EASE_FACTOR = 3.0;

/** Shortest interval ever scheduled, in days */
export const MIN_INTERVAL_DAYS = 1;

/**
 * Ease factor adjustments per rating.
 */
const EASE_ADJUSTMENTS: Record<Rating, number> = {
  /** poor: EF decreases by 0.20 */
  1: -0.2,
  /** fair: EF decreases by 0.15 */
  2: -0.15,
  /** good: EF unchanged */
  3: 0,
  /** excellent: EF increases by 0.15 */
  4: 0.15,
};

/** Fair rating halves the interval */
const FAIR_INTERVAL_MULTIPLIER = 0.5;

/**
 * Excellent rating multiplies the interval by a flat 2.5, independent of
 * the ease factor.
 */
const EXCELLENT_INTERVAL_MULTIPLIER = 2.5;

// =============================================================================
// Types
// =============================================================================

/** Scheduling fields of a note needed to compute its next review */
export interface ScheduleState {
  review_mode: ReviewMode;
  interval_days: number;
  ease_factor: number;
  review_count: number;
  schedule_pattern: string | null;
}

/** Result of a scheduling calculation */
export interface ScheduleResult {
  /** Next review timestamp (ISO 8601) */
  next_review: string;
  /** New interval in days */
  interval_days: number;
  /** Updated ease factor (unchanged for scheduled notes) */
  ease_factor: number;
}

// =============================================================================
// Rating Validation
// =============================================================================

/**
 * Check if a value is a valid rating.
 */
export function isValidRating(rating: unknown): rating is Rating {
  return rating === 1 || rating === 2 || rating === 3 || rating === 4;
}

/**
 * Narrow a value to a Rating.
 *
 * @throws InvalidRatingError if the value is not 1, 2, 3 or 4
 */
export function assertRating(rating: unknown): asserts rating is Rating {
  if (!isValidRating(rating)) {
    throw new InvalidRatingError(rating);
  }
}

// =============================================================================
// Core Algorithm
// =============================================================================

/**
 * Calculate the next review for a note.
 *
 * @param state - Current scheduling fields of the note
 * @param rating - Rating for the review just completed
 * @param now - Time of the review
 * @param defaultPattern - Cadence for scheduled notes that have none
 * @throws InvalidRatingError if the rating is not 1-4 (in either mode)
 */
export function computeNextReview(
  state: ScheduleState,
  rating: unknown,
  now: Date,
  defaultPattern: string = PRESET_SCHEDULES.moderate
): ScheduleResult {
  assertRating(rating);

  const { interval_days, ease_factor } =
    state.review_mode === "spaced"
      ? calculateSpaced(state, rating)
      : calculateScheduled(state, defaultPattern);

  return {
    next_review: toTimestamp(addDays(now, interval_days)),
    interval_days,
    ease_factor,
  };
}

/**
 * Adaptive interval and ease for "spaced" notes.
 *
 * | rating | interval                | ease       |
 * |--------|-------------------------|------------|
 * | 1      | 1                       | EF - 0.20  |
 * | 2      | max(1, round(I / 2))    | EF - 0.15  |
 * | 3      | round(I * EF)           | EF         |
 * | 4      | round(I * 2.5)          | EF + 0.15  |
 *
 * The ease factor is clamped to [1.3, 3.0] and the interval to at least a day.
 */
export function calculateSpaced(
  state: Pick<ScheduleState, "interval_days" | "ease_factor">,
  rating: Rating
): { interval_days: number; ease_factor: number } {
  const newEaseFactor = clampEaseFactor(state.ease_factor + EASE_ADJUSTMENTS[rating]);

  const interval = calculateSpacedInterval(state, rating, newEaseFactor);

  return {
    interval_days: Math.max(MIN_INTERVAL_DAYS, interval),
    ease_factor: newEaseFactor,
  };
}

/**
 * Raw interval for a spaced rating, before the one-day minimum.
 */
function calculateSpacedInterval(
  state: Pick<ScheduleState, "interval_days">,
  rating: Rating,
  newEaseFactor: number
): number {
  switch (rating) {
    case 1:
      return MIN_INTERVAL_DAYS;
    case 2:
      return Math.round(state.interval_days * FAIR_INTERVAL_MULTIPLIER);
    case 3:
      return Math.round(state.interval_days * newEaseFactor);
    case 4:
      return Math.round(state.interval_days * EXCELLENT_INTERVAL_MULTIPLIER);
  }
}

/**
 * Fixed-cadence interval for "scheduled" notes.
 *
 * The n-th review (0-based review_count) moves to the n-th step of the
 * pattern, staying on the last step once the pattern is exhausted.
 * The ease factor is carried through untouched.
 */
export function calculateScheduled(
  state: Pick<ScheduleState, "review_count" | "ease_factor" | "schedule_pattern">,
  defaultPattern: string = PRESET_SCHEDULES.moderate
): { interval_days: number; ease_factor: number } {
  const steps = parseSchedulePattern(state.schedule_pattern ?? defaultPattern);
  const index = Math.min(state.review_count, steps.length - 1);

  return {
    interval_days: steps[index],
    ease_factor: state.ease_factor,
  };
}

/**
 * Clamp ease factor to valid range [MIN_EASE_FACTOR, MAX_EASE_FACTOR].
 */
export function clampEaseFactor(ef: number): number {
  return Math.max(MIN_EASE_FACTOR, Math.min(MAX_EASE_FACTOR, ef));
}
