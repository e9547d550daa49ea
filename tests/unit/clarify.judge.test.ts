import { describe, it, expect } from "vitest";
import { ClarifierJudge, parseJudgeOutput } from "../../src/orchestrator/clarify/judge.js";
import { UpstreamTimeoutError } from "../../src/adapters/llm/errors.js";
import type { JudgePayload } from "../../src/orchestrator/prompts.js";
import { ScriptedChatModel, TEST_STAGE_OPTIONS } from "../helpers/fakes.js";

const PAYLOAD: JudgePayload = {
  question: "I got a tattoo, can I donate?",
  history: ["I got a tattoo, can I donate?"],
  slots: {},
  topics: ["tattoo"],
  donorSelected: false,
  precheckAvailable: false,
};

const CTX = { requestId: "req-1", sessionId: "s1" };

describe("parseJudgeOutput", () => {
  it("keeps trimmed string asks up to the cap", () => {
    expect(
      parseJudgeOutput(
        {
          decision: " Clarify ",
          missing_slots: [" When was the tattoo done? ", 7, "", "Was the studio licensed?", "Where?", "Extra?"],
          reason: "tattoo date unknown",
          confidence: 1.4,
        },
        3,
      ),
    ).toEqual({
      decision: "clarify",
      asks: ["When was the tattoo done?", "Was the studio licensed?", "Where?"],
      reason: "tattoo date unknown",
      confidence: 1,
    });
  });

  it("turns a clarify verdict with nothing to ask into an answer", () => {
    expect(parseJudgeOutput({ decision: "clarify", missing_slots: [] }, 3)).toEqual({
      decision: "answer",
      asks: [],
      reason: "",
      confidence: 0,
    });
  });

  it("drops asks from an answer verdict", () => {
    expect(parseJudgeOutput({ decision: "answer", missing_slots: ["Anything else?"] }, 3).asks).toEqual([]);
  });

  it("caps the reason at 200 characters", () => {
    expect(parseJudgeOutput({ reason: "x".repeat(250) }, 3).reason).toHaveLength(200);
  });
});

describe("ClarifierJudge", () => {
  it("asks the model at temperature 0 and parses its verdict", async () => {
    const model = new ScriptedChatModel({
      clarifier: JSON.stringify({ decision: "clarify", missing_slots: ["When was the tattoo done?"], reason: "date", confidence: 0.7 }),
    });
    const judge = new ClarifierJudge(model, TEST_STAGE_OPTIONS);

    await expect(judge.judge(PAYLOAD, CTX)).resolves.toEqual({
      decision: "clarify",
      asks: ["When was the tattoo done?"],
      reason: "date",
      confidence: 0.7,
      model: "test-model",
    });
    const [prompt] = model.promptsFor("clarifier");
    expect(prompt?.temperature).toBe(0);
    expect(prompt?.system).toContain("At most 3 questions.");
  });

  it("fails open to an answer when the model is unavailable", async () => {
    const model = new ScriptedChatModel({ clarifier: new UpstreamTimeoutError("timed out", "fixtures", "chat", 1_000) });
    const judge = new ClarifierJudge(model, TEST_STAGE_OPTIONS);

    await expect(judge.judge(PAYLOAD, CTX)).resolves.toEqual({
      decision: "answer",
      asks: [],
      reason: "",
      confidence: 0,
      model: "test-model",
      degraded: "UpstreamTimeoutError",
    });
  });

  it("never passes on more than three asks", async () => {
    const model = new ScriptedChatModel({
      clarifier: JSON.stringify({ decision: "clarify", missing_slots: ["A?", "B?", "C?", "D?", "E?"] }),
    });
    const judge = new ClarifierJudge(model, TEST_STAGE_OPTIONS, 10);

    expect((await judge.judge(PAYLOAD, CTX)).asks).toEqual(["A?", "B?", "C?"]);
  });
});
