import type { ConversationState } from "./types.js";

export const DEFAULT_HISTORY_CAP = 6;

export function createEmptyState(): ConversationState {
  return {
    donor: {},
    question: "",
    history: [],
    slots: {},
    topics: [],
    precheck: null,
    retrieved: null,
    blocked: false,
    decision: null,
    used_model: null,
    turn_count: 0,
    updated_at: null,
  };
}

/**
 * Append a question to history, dropping the oldest entries past the cap.
 * Blank questions are not recorded.
 */
export function pushHistory(history: readonly string[], question: string, cap: number = DEFAULT_HISTORY_CAP): string[] {
  const trimmed = question.trim();
  const next = trimmed ? [...history, trimmed] : [...history];
  return next.length > cap ? next.slice(next.length - cap) : next;
}

/** Deep copy so a turn never mutates the state it loaded. */
export function cloneState(state: ConversationState): ConversationState {
  return structuredClone(state);
}
