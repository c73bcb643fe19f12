/**
 * Performance Tracker Tests
 *
 * Scores blend as 0.7 * new + 0.3 * existing; an unseen question takes
 * its session score as is.
 */

import { describe, expect, test } from "vitest";
import { ValidationError } from "../../errors.js";
import {
  averageScore,
  hashQuestion,
  mergePerformance,
  rankWeakQuestions,
} from "../performance-tracker.js";

describe("hashQuestion", () => {
  test("is the md5 of the normalized text", () => {
    expect(hashQuestion("what is the gil?")).toBe("4ccc10a5440cfd4e9c74c28c276b50d4");
  });

  test("ignores case and surrounding whitespace", () => {
    expect(hashQuestion("  What is the GIL?\n")).toBe(hashQuestion("what is the gil?"));
  });

  test("distinguishes different questions", () => {
    expect(hashQuestion("What is the GIL?")).not.toBe(hashQuestion("Why does the GIL exist?"));
  });
});

describe("mergePerformance", () => {
  test("blends a repeated question 70/30 with its history", () => {
    const merged = mergePerformance({ q1: 0.9 }, [{ question_hash: "q1", score: 0.5 }]);

    expect(merged.q1).toBeCloseTo(0.62, 10);
  });

  test("takes the session score for a new question", () => {
    const merged = mergePerformance({ q1: 0.9 }, [{ question_hash: "q2", score: 0.45 }]);

    expect(merged).toEqual({ q1: 0.9, q2: 0.45 });
  });

  test("is linear in the new and existing scores", () => {
    for (const s of [0, 0.25, 0.5, 1]) {
      for (const e of [0, 0.4, 0.9, 1]) {
        const merged = mergePerformance({ q: e }, [{ question_hash: "q", score: s }]);
        expect(merged.q).toBeCloseTo(0.7 * s + 0.3 * e, 10);
      }
    }
  });

  test("folds a hash repeated within a session in order", () => {
    const merged = mergePerformance({}, [
      { question_hash: "q1", score: 0.5 },
      { question_hash: "q1", score: 1.0 },
    ]);

    expect(merged.q1).toBeCloseTo(0.85, 10);
  });

  test("does not modify the existing map", () => {
    const existing = { q1: 0.9 };
    mergePerformance(existing, [{ question_hash: "q1", score: 0.1 }]);

    expect(existing).toEqual({ q1: 0.9 });
  });

  test("rejects scores outside [0, 1]", () => {
    expect(() => mergePerformance({}, [{ question_hash: "q1", score: 1.2 }])).toThrow(
      ValidationError
    );
    expect(() => mergePerformance({}, [{ question_hash: "q1", score: -0.1 }])).toThrow(
      ValidationError
    );
    expect(() => mergePerformance({}, [{ question_hash: "q1", score: Number.NaN }])).toThrow(
      ValidationError
    );
  });

  test("rejects empty hashes", () => {
    expect(() => mergePerformance({}, [{ question_hash: "", score: 0.5 }])).toThrow(
      "Question hash at index 0 must be a non-empty string"
    );
  });
});

describe("rankWeakQuestions", () => {
  const performance = { a: 0.9, b: 0.2, c: 0.5, d: 0.2 };

  test("orders weakest first with ties by hash", () => {
    expect(rankWeakQuestions(performance, 3)).toEqual(["b", "d", "c"]);
  });

  test("returns everything when the limit exceeds the map", () => {
    expect(rankWeakQuestions(performance, 10)).toEqual(["b", "d", "c", "a"]);
  });

  test("returns nothing for a zero limit", () => {
    expect(rankWeakQuestions(performance, 0)).toEqual([]);
  });
});

describe("averageScore", () => {
  test("averages the session's scores", () => {
    expect(
      averageScore([
        { question_hash: "a", score: 0.5 },
        { question_hash: "b", score: 1.0 },
      ])
    ).toBe(0.75);
  });

  test("is zero for an empty session", () => {
    expect(averageScore([])).toBe(0);
  });
});
