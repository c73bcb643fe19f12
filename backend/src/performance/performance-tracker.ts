/**
 * Performance Tracker
 *
 * Keeps a per-question score inside each note as an exponential moving
 * average, so that questions asked verbatim across sessions build a rolling
 * history instead of resetting.
 *
 * Merging is not idempotent: merging the same session twice counts it
 * twice. The review service guards against resubmission.
 */

import { createHash } from "node:crypto";
import { ValidationError } from "../errors.js";

// =============================================================================
// Constants
// =============================================================================

/** Weight given to the newest score */
export const EMA_NEW_WEIGHT = 0.7;

/** Weight given to the accumulated score */
export const EMA_OLD_WEIGHT = 0.3;

// =============================================================================
// Types
// =============================================================================

/** Question hash -> score in [0, 1] */
export type QuestionPerformance = Record<string, number>;

/** The parts of an answered question the merge needs */
export interface ScoredQuestion {
  question_hash: string;
  score: number;
}

// =============================================================================
// Question Identity
// =============================================================================

/**
 * Normalize question text before hashing: trimmed and lower-cased.
 */
export function normalizeQuestion(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Stable identifier for a question: md5 hex digest of its normalized text.
 */
export function hashQuestion(text: string): string {
  return createHash("md5").update(normalizeQuestion(text), "utf8").digest("hex");
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Fold one score into an existing average.
 *
 * @returns `0.7 * score + 0.3 * existing`, or `score` when there is no
 *          existing value
 */
export function blendScore(existing: number | undefined, score: number): number {
  if (existing === undefined) {
    return score;
  }
  return EMA_NEW_WEIGHT * score + EMA_OLD_WEIGHT * existing;
}

/**
 * Merge a session's question scores into a note's performance map.
 *
 * Returns a new map; `existing` is not modified. A hash that appears more
 * than once in the session is folded in order.
 *
 * @throws ValidationError if a score is outside [0, 1] or a hash is empty
 */
export function mergePerformance(
  existing: Readonly<QuestionPerformance>,
  questions: readonly ScoredQuestion[]
): QuestionPerformance {
  const merged: QuestionPerformance = { ...existing };

  questions.forEach((question, index) => {
    if (!question.question_hash) {
      throw new ValidationError(`Question hash at index ${index} must be a non-empty string`);
    }
    if (!Number.isFinite(question.score) || question.score < 0 || question.score > 1) {
      throw new ValidationError(
        `Score at index ${index} must be between 0.0 and 1.0, got ${question.score}`
      );
    }

    const previous = Object.prototype.hasOwnProperty.call(merged, question.question_hash)
      ? merged[question.question_hash]
      : undefined;
    merged[question.question_hash] = blendScore(previous, question.score);
  });

  return merged;
}

/**
 * Question hashes ordered weakest first (ties broken by hash), truncated
 * to `limit`.
 */
export function rankWeakQuestions(
  performance: Readonly<QuestionPerformance>,
  limit: number
): string[] {
  return Object.entries(performance)
    .sort(([hashA, a], [hashB, b]) => a - b || hashA.localeCompare(hashB))
    .slice(0, Math.max(0, limit))
    .map(([hash]) => hash);
}

/**
 * Mean of a session's scores, or 0 for a session with no answers.
 */
export function averageScore(questions: readonly ScoredQuestion[]): number {
  if (questions.length === 0) {
    return 0;
  }
  const total = questions.reduce((sum, q) => sum + q.score, 0);
  return total / questions.length;
}
