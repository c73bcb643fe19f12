/**
 * Priority Registry
 *
 * Topics the user asked to emphasise in upcoming sessions. Each request
 * stays active until two sessions have covered it, after which it is
 * deactivated and kept for history. Re-requesting a retired topic starts
 * a new active entry.
 *
 * All functions are pure and return a new list.
 */

import type { PriorityRequestInput, SessionQuestion } from "@study-loop/shared";
import { PRIORITY_ADDRESSED_THRESHOLD, toTimestamp } from "../notes/note-schema.js";
import type { PriorityRequest } from "../notes/note-schema.js";

export interface RegistrationContext {
  now: Date;
  sessionId: string | null;
}

/**
 * Normalize a topic for comparison: trimmed and lower-cased.
 */
export function normalizeTopic(topic: string): string {
  return topic.trim().toLowerCase();
}

export function activePriorities(requests: readonly PriorityRequest[]): PriorityRequest[] {
  return requests.filter((request) => request.active);
}

/**
 * Register a requested topic.
 *
 * An active entry with the same normalized topic is refreshed (reason,
 * requested_at and session_id) instead of duplicated.
 */
export function registerRequest(
  requests: readonly PriorityRequest[],
  input: PriorityRequestInput,
  context: RegistrationContext
): PriorityRequest[] {
  const topic = input.topic.trim();
  const key = normalizeTopic(topic);
  const requestedAt = toTimestamp(context.now);

  const existing = requests.findIndex(
    (request) => request.active && normalizeTopic(request.topic) === key
  );

  if (existing >= 0) {
    return requests.map((request, index) =>
      index === existing
        ? {
            ...request,
            reason: input.reason ?? request.reason,
            requested_at: requestedAt,
            session_id: context.sessionId,
          }
        : request
    );
  }

  return [
    ...requests,
    {
      topic,
      reason: input.reason ?? "",
      requested_at: requestedAt,
      session_id: context.sessionId,
      times_addressed: 0,
      active: true,
    },
  ];
}

/**
 * Find which active topics a session covered.
 *
 * A topic counts when it matches one of the explicitly addressed topics,
 * or when it appears (case-insensitively) inside a question's text. Only
 * the first matching question is credited.
 *
 * @returns Active topics as stored, each at most once, in registry order
 */
export function resolveAddressedTopics(
  requests: readonly PriorityRequest[],
  prioritiesAddressed: readonly string[],
  questions: readonly Pick<SessionQuestion, "question_text">[]
): string[] {
  const explicit = new Set(prioritiesAddressed.map(normalizeTopic));
  const seen = new Set<string>();
  const addressed: string[] = [];

  for (const request of activePriorities(requests)) {
    const key = normalizeTopic(request.topic);
    if (seen.has(key)) continue;

    const covered =
      explicit.has(key) ||
      questions.find((q) => q.question_text.toLowerCase().includes(key)) !== undefined;

    if (covered) {
      seen.add(key);
      addressed.push(request.topic);
    }
  }

  return addressed;
}

/**
 * Credit one session to each addressed topic.
 *
 * The first active entry per topic has its counter incremented, at most
 * once per call. An entry that reaches the threshold becomes inactive in
 * the same call.
 */
export function markAddressed(
  requests: readonly PriorityRequest[],
  topics: readonly string[]
): PriorityRequest[] {
  const pending = new Set(topics.map(normalizeTopic));

  return requests.map((request) => {
    const key = normalizeTopic(request.topic);
    if (!request.active || !pending.has(key)) {
      return request;
    }
    pending.delete(key);

    const timesAddressed = Math.min(request.times_addressed + 1, PRIORITY_ADDRESSED_THRESHOLD);
    return {
      ...request,
      times_addressed: timesAddressed,
      active: timesAddressed < PRIORITY_ADDRESSED_THRESHOLD,
    };
  });
}
