import { describe, it, expect } from "vitest";
import { normalize, canonicalLabel, coerceConfidence } from "../../src/orchestrator/decision/normalizer.js";
import { DECISION_LABELS, DecisionSchema } from "../../src/schemas/decision.js";

describe("canonicalLabel", () => {
  it.each([
    ["eligible", "Eligible"],
    ["OK", "Eligible"],
    ["yes", "Eligible"],
    ["ineligible", "Ineligible"],
    ["no", "Ineligible"],
    ["Deferred", "Defer"],
    ["temporary deferral", "Defer"],
    ["need_more_info", "NeedMoreInfo"],
    ["Need More Info", "NeedMoreInfo"],
    ["clarify", "NeedMoreInfo"],
  ])("maps alias %s to %s", (raw, expected) => {
    expect(canonicalLabel(raw)).toBe(expected);
  });

  it.each([
    ["need additional info", "NeedMoreInfo"],
    ["please clarify first", "NeedMoreInfo"],
    ["deferral for 4 weeks", "Defer"],
    ["likely ineligible", "Ineligible"],
    ["not eligible today", "Ineligible"],
    ["donor cannot give blood", "Ineligible"],
    ["not allowed", "Ineligible"],
    ["probably eligible", "Eligible"],
    ["you can donate", "Eligible"],
    ["banana", "NeedMoreInfo"],
    ["", "NeedMoreInfo"],
  ])("applies substring heuristics to %j", (raw, expected) => {
    expect(canonicalLabel(raw)).toBe(expected);
  });

  it("pulls the label out of a nested mapping", () => {
    expect(canonicalLabel({ label: "Defer" })).toBe("Defer");
    expect(canonicalLabel({ status: "eligible" })).toBe("Eligible");
    expect(canonicalLabel({ other: "eligible" })).toBe("NeedMoreInfo");
  });
});

describe("coerceConfidence", () => {
  it("parses numeric strings and clamps to [0,1]", () => {
    expect(coerceConfidence("0.7")).toBe(0.7);
    expect(coerceConfidence(1.4)).toBe(1);
    expect(coerceConfidence(-2)).toBe(0);
  });

  it("defaults to 0.5 when the value is not a number", () => {
    expect(coerceConfidence("high")).toBe(0.5);
    expect(coerceConfidence(undefined)).toBe(0.5);
    expect(coerceConfidence(Number.NaN)).toBe(0.5);
    expect(coerceConfidence({})).toBe(0.5);
  });
});

describe("normalize", () => {
  it("fills every field of a partial decision", () => {
    expect(normalize({ decision: "Defer" })).toEqual({
      decision: "Defer",
      confidence: 0.5,
      rationale: "",
      missing_fields: [],
      safety_flags: [],
    });
  });

  it("reads label then status when decision is absent", () => {
    expect(normalize({ label: "ineligible" }).decision).toBe("Ineligible");
    expect(normalize({ status: "deferred" }).decision).toBe("Defer");
    expect(normalize({ decision: { label: "eligible" } }).decision).toBe("Eligible");
  });

  it("truncates missing_fields to three and keeps every safety flag", () => {
    const result = normalize({
      decision: "clarify",
      missing_fields: ["a", "b", "c", "d"],
      safety_flags: ["x", "y", "z", "w"],
    });
    expect(result.missing_fields).toEqual(["a", "b", "c"]);
    expect(result.safety_flags).toEqual(["x", "y", "z", "w"]);
  });

  it("coerces scalar lists and non-string rationale", () => {
    const result = normalize({ missing_fields: "vaccine date", safety_flags: [1, null, "ok"], rationale: 42 });
    expect(result.missing_fields).toEqual(["vaccine date"]);
    expect(result.safety_flags).toEqual(["1", "ok"]);
    expect(result.rationale).toBe("42");
  });

  const inputs: unknown[] = [
    null,
    "Eligible",
    [],
    {},
    { decision: "ok", confidence: "0.9" },
    { decision: "ELIGIBLE", confidence: 3 },
    { decision: { status: "need more info" }, missing_fields: ["a", "b", "c", "d", "e"] },
    { label: "defer", rationale: { why: "recent tattoo" } },
    { decision: "not eligible", confidence: -1, safety_flags: "red_flag_detected" },
    { decision: 7, confidence: "NaN", missing_fields: [" ", "", "date"] },
  ];

  it.each(inputs.map((input) => [input]))("produces a schema-valid decision for %j", (input) => {
    const result = normalize(input);
    expect(DECISION_LABELS).toContain(result.decision);
    expect(result.confidence).toBeGreaterThanOrEqual(0);
    expect(result.confidence).toBeLessThanOrEqual(1);
    expect(result.missing_fields.length).toBeLessThanOrEqual(3);
    expect(DecisionSchema.safeParse(result).success).toBe(true);
  });

  it.each(inputs.map((input) => [input]))("is idempotent for %j", (input) => {
    const once = normalize(input);
    expect(normalize(once)).toEqual(once);
  });
});
