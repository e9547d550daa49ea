import { describe, it, expect } from "vitest";
import { filterCandidates, type FilterContext } from "../../src/orchestrator/clarify/filter.js";
import { hasCalendarDate, topicsMentioned, topicsNegated, topicsNegatedAcross } from "../../src/orchestrator/clarify/patterns.js";

function ctx(rawText: string, extra: Partial<FilterContext> = {}): FilterContext {
  return { rawText, slots: {}, donor: {}, ...extra };
}

describe("clarify patterns", () => {
  it("finds the topics a text mentions", () => {
    expect(topicsMentioned("I got a tattoo and a flu shot")).toEqual(new Set(["vaccine", "tattoo", "symptoms"]));
  });

  it("finds whole-topic negations but not partial ones", () => {
    expect(topicsNegated("I haven't had any vaccines")).toEqual(new Set(["vaccine"]));
    expect(topicsNegated("no other vaccines")).toEqual(new Set());
  });

  it("lets a later mention of a topic clear an earlier negation", () => {
    expect(topicsNegatedAcross(["No tattoos here", "Actually I did get a tattoo last month"])).toEqual(new Set());
    expect(topicsNegatedAcross(["I got a tattoo", "Sorry, no tattoos after all"])).toEqual(new Set(["tattoo"]));
  });

  it.each([
    ["I had it on 2024-05-20", true],
    ["on May 3rd", true],
    ["it was 12/05/2024", true],
    ["about 3 weeks ago", false],
    ["Can I donate today?", false],
    ["I may donate soon", false],
    ["I got a tattoo", false],
  ])("detects a calendar date in %j: %s", (text, expected) => {
    expect(hasCalendarDate(text)).toBe(expected);
  });
});

describe("filterCandidates", () => {
  it("drops policy questions the system can answer", () => {
    const result = filterCandidates(["What is the waiting period for tattoos?"], ctx("Can I donate after a tattoo?"));
    expect(result).toEqual({
      kept: [],
      dropped: [{ question: "What is the waiting period for tattoos?", reason: "policy_question" }],
    });
  });

  it("drops an ask about other vaccinations the user already denied", () => {
    const result = filterCandidates(
      ["Have you had any other vaccinations recently?", "Was the tattoo done at a licensed studio?"],
      ctx("I got a tattoo last week, no other vaccines"),
    );
    expect(result.kept).toEqual(["Was the tattoo done at a licensed studio?"]);
    expect(result.dropped).toEqual([
      { question: "Have you had any other vaccinations recently?", reason: "other_vaccinations_denied" },
    ]);
  });

  it("drops any ask touching a topic the user negated", () => {
    const result = filterCandidates(["Which vaccine did you receive?"], ctx("I haven't had any vaccines, I have a new tattoo"));
    expect(result.dropped).toEqual([{ question: "Which vaccine did you receive?", reason: "negated_topic" }]);
  });

  it("drops date asks when the text already gives a calendar date", () => {
    const result = filterCandidates(["When did you get the tattoo?"], ctx("I got a tattoo on 2024-05-20"));
    expect(result.dropped).toEqual([{ question: "When did you get the tattoo?", reason: "date_known" }]);
  });

  it("keeps date asks when the text only gives a relative time", () => {
    const ask = "When did you get the tattoo?";
    expect(filterCandidates([ask], ctx("Can I donate today? I got a tattoo recently."))).toEqual({ kept: [ask], dropped: [] });
    expect(filterCandidates([ask], ctx("I got a tattoo last week")).kept).toEqual([ask]);
  });

  it("ignores a date given for a different topic", () => {
    const ask = "When did you get the tattoo?";
    const result = filterCandidates([ask], ctx("I had a flu jab on 2024-05-02\nI also got a tattoo"));
    expect(result).toEqual({ kept: [ask], dropped: [] });
  });

  it("drops date asks when a slot for the topic holds a date", () => {
    const result = filterCandidates(
      ["What date was your booster?"],
      ctx("I had a booster", { slots: { vaccine: { date: "2024-05-02" } } }),
    );
    expect(result.dropped).toEqual([{ question: "What date was your booster?", reason: "date_known" }]);
  });

  it("drops a type confirmation when the vaccine name is known", () => {
    const result = filterCandidates(
      ["Can you confirm the vaccine name?"],
      ctx("I had a flu jab", { slots: { vaccine: { name: "influenza" } } }),
    );
    expect(result.dropped).toEqual([{ question: "Can you confirm the vaccine name?", reason: "type_known" }]);
  });

  it("drops travel asks unless the user raised travel", () => {
    const ask = "Have you travelled abroad recently?";
    expect(filterCandidates([ask], ctx("I got a flu shot on 2024-05-20")).dropped).toEqual([
      { question: ask, reason: "travel_not_raised" },
    ]);
    expect(filterCandidates(["Which countries did you travel to?"], ctx("I came back from a trip in the spring")).kept).toEqual([
      "Which countries did you travel to?",
    ]);
  });

  it("drops last-donation asks unless a prior donation was raised and its date is unknown", () => {
    const ask = "When was your last donation?";
    expect(filterCandidates([ask], ctx("Can I donate after a tattoo?")).dropped).toEqual([
      { question: ask, reason: "last_donation_not_needed" },
    ]);
    expect(filterCandidates([ask], ctx("I donated blood in the spring")).kept).toEqual([ask]);
    expect(
      filterCandidates([ask], ctx("I donated blood in the spring", { donor: { last_donation_date: "2024-03-01" } })).dropped,
    ).toEqual([{ question: ask, reason: "last_donation_not_needed" }]);
  });

  it("drops generic medical asks when no symptoms were mentioned", () => {
    const ask = "Do you have any other medical conditions?";
    expect(filterCandidates([ask], ctx("I got a tattoo last week")).dropped).toEqual([
      { question: ask, reason: "generic_medical_without_symptoms" },
    ]);
    expect(filterCandidates([ask], ctx("no symptoms, feeling fine")).dropped).toEqual([
      { question: ask, reason: "generic_medical_without_symptoms" },
    ]);
    expect(filterCandidates([ask], ctx("I have had a fever for two days")).kept).toEqual([ask]);
  });

  it("dedupes, skips blanks and keeps at most three", () => {
    const result = filterCandidates(
      [
        "Was it done at a licensed studio?",
        "WAS IT DONE AT A LICENSED STUDIO?",
        "   ",
        "Where on your body is the tattoo?",
        "Which city was the studio in?",
        "Did the studio use new needles?",
      ],
      ctx("I have a new tattoo"),
    );
    expect(result.kept).toEqual([
      "Was it done at a licensed studio?",
      "Where on your body is the tattoo?",
      "Which city was the studio in?",
    ]);
    expect(result.dropped).toEqual([{ question: "WAS IT DONE AT A LICENSED STUDIO?", reason: "duplicate" }]);
  });

  it("honours a smaller maxAsks", () => {
    const result = filterCandidates(
      ["Was it done at a licensed studio?", "Where on your body is the tattoo?"],
      ctx("I have a new tattoo", { maxAsks: 1 }),
    );
    expect(result.kept).toEqual(["Was it done at a licensed studio?"]);
  });

  it("keeps asks about a topic the user negated and later affirmed", () => {
    const ask = "Was the tattoo done at a licensed studio?";
    expect(filterCandidates([ask], ctx("No tattoos here\nActually I did get a tattoo last month")).kept).toEqual([ask]);
    expect(
      filterCandidates([ask], ctx("No tattoos here", { slots: { tattoo: { date: "2024-05-20" } } })).kept,
    ).toEqual([ask]);
    expect(filterCandidates([ask], ctx("No tattoos here", { slots: { tattoo: { location: "none" } } })).dropped).toEqual([
      { question: ask, reason: "negated_topic" },
    ]);
  });

  it("never keeps an ask about a topic the text negates", () => {
    const rawText = "No tattoos, no recent travel, not taking any medication, no symptoms";
    const asks = [
      "Where was the tattoo done?",
      "Which countries did you visit on your trip?",
      "What medication are you on?",
      "Are your symptoms getting better?",
    ];
    const result = filterCandidates(asks, ctx(rawText));
    expect(result.kept).toEqual([]);
    expect(result.dropped.map((d) => d.reason)).toEqual(["negated_topic", "negated_topic", "negated_topic", "negated_topic"]);
  });
});
