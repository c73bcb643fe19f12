/**
 * Priority Registry Tests
 *
 * A requested topic stays active until two sessions have covered it.
 */

import { describe, expect, test } from "vitest";
import type { PriorityRequest } from "../../notes/note-schema.js";
import {
  activePriorities,
  markAddressed,
  registerRequest,
  resolveAddressedTopics,
} from "../priority-registry.js";

const DAY_ONE = new Date("2026-03-01T09:00:00.000Z");
const DAY_TWO = new Date("2026-03-02T09:00:00.000Z");

function question(text: string) {
  return { question_text: text };
}

/** Run one session's priority updates the way the review service does */
function runSession(
  requests: PriorityRequest[],
  questions: Array<{ question_text: string }>,
  prioritiesAddressed: string[] = []
): PriorityRequest[] {
  const topics = resolveAddressedTopics(requests, prioritiesAddressed, questions);
  return markAddressed(requests, topics);
}

describe("registerRequest", () => {
  test("appends an active entry", () => {
    const requests = registerRequest(
      [],
      { topic: " decorators ", reason: "keep mixing them up" },
      { now: DAY_ONE, sessionId: "s1" }
    );

    expect(requests).toEqual([
      {
        topic: "decorators",
        reason: "keep mixing them up",
        requested_at: "2026-03-01T09:00:00.000Z",
        session_id: "s1",
        times_addressed: 0,
        active: true,
      },
    ]);
  });

  test("refreshes an active entry instead of duplicating it", () => {
    const first = registerRequest([], { topic: "Decorators" }, { now: DAY_ONE, sessionId: "s1" });
    const covered = markAddressed(first, ["decorators"]);
    const second = registerRequest(
      covered,
      { topic: "decorators", reason: "still unsure" },
      { now: DAY_TWO, sessionId: "s2" }
    );

    expect(second).toHaveLength(1);
    expect(second[0]).toEqual({
      topic: "Decorators",
      reason: "still unsure",
      requested_at: "2026-03-02T09:00:00.000Z",
      session_id: "s2",
      times_addressed: 1,
      active: true,
    });
  });

  test("starts a new entry once the previous one retired", () => {
    let requests = registerRequest([], { topic: "closures" }, { now: DAY_ONE, sessionId: "s1" });
    requests = markAddressed(requests, ["closures"]);
    requests = markAddressed(requests, ["closures"]);
    requests = registerRequest(requests, { topic: "closures" }, { now: DAY_TWO, sessionId: "s3" });

    expect(requests.map((r) => [r.times_addressed, r.active])).toEqual([
      [2, false],
      [0, true],
    ]);
  });
});

describe("resolveAddressedTopics", () => {
  const requests = registerRequest(
    registerRequest([], { topic: "decorators" }, { now: DAY_ONE, sessionId: "s1" }),
    { topic: "Generators" },
    { now: DAY_ONE, sessionId: "s1" }
  );

  test("matches topics contained in question text, ignoring case", () => {
    expect(
      resolveAddressedTopics(requests, [], [question("How do DECORATORS wrap a function?")])
    ).toEqual(["decorators"]);
  });

  test("matches explicitly addressed topics", () => {
    expect(resolveAddressedTopics(requests, [" generators "], [])).toEqual(["Generators"]);
  });

  test("credits a topic once even when several questions match", () => {
    expect(
      resolveAddressedTopics(
        requests,
        ["decorators"],
        [question("What is a decorator factory? decorators"), question("Stacking decorators?")]
      )
    ).toEqual(["decorators"]);
  });

  test("ignores inactive entries", () => {
    const retired = markAddressed(markAddressed(requests, ["decorators"]), ["decorators"]);

    expect(resolveAddressedTopics(retired, ["decorators"], [])).toEqual([]);
  });
});

describe("markAddressed", () => {
  test("retires a topic after two sessions", () => {
    let requests = registerRequest([], { topic: "decorators" }, { now: DAY_ONE, sessionId: "s1" });

    requests = runSession(requests, [question("Explain Python decorators")]);
    expect(requests[0]).toMatchObject({ times_addressed: 1, active: true });

    requests = runSession(requests, [question("When would you write a decorator? decorators")]);
    expect(requests[0]).toMatchObject({ times_addressed: 2, active: false });
    expect(requests).toHaveLength(1);
  });

  test("increments each entry at most once per call", () => {
    const requests = registerRequest([], { topic: "decorators" }, { now: DAY_ONE, sessionId: null });

    expect(markAddressed(requests, ["decorators", "Decorators"])[0].times_addressed).toBe(1);
  });

  test("never counts past the threshold", () => {
    let requests = registerRequest([], { topic: "gil" }, { now: DAY_ONE, sessionId: null });
    for (let i = 0; i < 5; i++) {
      requests = markAddressed(requests, ["gil"]);
    }

    expect(requests[0].times_addressed).toBe(2);
  });

  test("leaves unrelated topics alone", () => {
    const requests = registerRequest([], { topic: "gil" }, { now: DAY_ONE, sessionId: null });

    expect(markAddressed(requests, ["asyncio"])).toEqual(requests);
  });
});

describe("activePriorities", () => {
  test("lists only active entries", () => {
    let requests = registerRequest([], { topic: "gil" }, { now: DAY_ONE, sessionId: null });
    requests = registerRequest(requests, { topic: "asyncio" }, { now: DAY_ONE, sessionId: null });
    requests = markAddressed(markAddressed(requests, ["gil"]), ["gil"]);

    expect(activePriorities(requests).map((r) => r.topic)).toEqual(["asyncio"]);
  });
});
