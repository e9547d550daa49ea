import { describe, it, expect } from "vitest";
import { pushHistory, createEmptyState, cloneState, DEFAULT_HISTORY_CAP } from "../../src/orchestrator/state.js";

describe("pushHistory", () => {
  it("never grows past the cap, dropping the oldest", () => {
    let history: string[] = [];
    for (let turn = 1; turn <= 20; turn++) {
      history = pushHistory(history, `question ${turn}`);
      expect(history.length).toBeLessThanOrEqual(DEFAULT_HISTORY_CAP);
    }
    expect(history).toEqual(["question 15", "question 16", "question 17", "question 18", "question 19", "question 20"]);
  });

  it("does not record blank questions", () => {
    expect(pushHistory(["a"], "   ")).toEqual(["a"]);
  });

  it("honours a custom cap", () => {
    expect(pushHistory(["a", "b"], "c", 2)).toEqual(["b", "c"]);
  });
});

describe("cloneState", () => {
  it("returns a deep copy", () => {
    const state = createEmptyState();
    state.slots = { tattoo: { date: "2024-05-20" } };
    const copy = cloneState(state);
    copy.slots.tattoo = { date: "2024-01-01" };
    copy.history.push("changed");
    expect(state.slots).toEqual({ tattoo: { date: "2024-05-20" } });
    expect(state.history).toEqual([]);
  });
});
