import { describe, it, expect } from "vitest";
import { deepMerge, mergeSlots, coerceSlotsDelta, isEmptyValue } from "../../src/orchestrator/slots/merge.js";
import type { Slots } from "../../src/schemas/slots.js";

describe("deepMerge", () => {
  it("recurses into mappings, unions lists and overwrites concrete scalars", () => {
    const base = { tattoo: { date: "2024-05-01", location: "arm" }, tags: ["a", "b"] };
    const delta = { tattoo: { licensed_studio: true, location: "leg" }, tags: ["b", "c"] };
    expect(deepMerge(base, delta)).toEqual({
      tattoo: { date: "2024-05-01", location: "leg", licensed_studio: true },
      tags: ["a", "b", "c"],
    });
  });

  it("never replaces a concrete value with an empty one", () => {
    const base = { vaccine: { name: "influenza", other_recent: false }, list: ["x"] };
    const delta = { vaccine: { name: "", other_recent: null }, list: [] };
    expect(deepMerge(base, delta)).toEqual(base);
  });

  it("keeps false as a concrete value", () => {
    expect(deepMerge({ travel: { traveled: true } }, { travel: { traveled: false } })).toEqual({
      travel: { traveled: false },
    });
  });

  it("does not create empty mappings", () => {
    expect(deepMerge({}, { symptoms: {} })).toEqual({});
    expect(deepMerge({}, { symptoms: { present: null } })).toEqual({});
  });

  it("dedupes list items structurally", () => {
    const base = { destinations: [{ country: "Kenya", region: "Coast" }] };
    const delta = { destinations: [{ region: "Coast", country: "Kenya" }, { country: "Peru" }] };
    expect(deepMerge(base, delta)).toEqual({
      destinations: [{ country: "Kenya", region: "Coast" }, { country: "Peru" }],
    });
  });

  const cases: Array<[Record<string, unknown>, Record<string, unknown>]> = [
    [{}, { vaccine: { name: "hepatitis B" } }],
    [{ vaccine: { name: "hepatitis B" } }, { vaccine: { date: "2024-04-02", name: null } }],
    [{ travel: { destinations: [{ country: "Brazil" }] } }, { travel: { destinations: [{ country: "Peru" }] } }],
    [{ medication: { taking: true } }, { medication: { taking: false, name: " " } }],
    [{ donation: { last_date: "2024-01-10" } }, { donation: {} }],
  ];

  it.each(cases)("is idempotent: merge(merge(%j, d), d)", (base, delta) => {
    const once = deepMerge(base, delta);
    expect(deepMerge(once, delta)).toEqual(once);
  });

  it.each(cases)("does not empty a concrete field of %j", (base, delta) => {
    const merged = deepMerge(base, delta);
    for (const [topic, fields] of Object.entries(base)) {
      if (typeof fields !== "object" || fields === null || Array.isArray(fields)) continue;
      const mergedTopic = merged[topic];
      expect(typeof mergedTopic).toBe("object");
      for (const [field, value] of Object.entries(fields)) {
        if (!isEmptyValue(value) && mergedTopic !== null && typeof mergedTopic === "object") {
          expect(isEmptyValue(Reflect.get(mergedTopic, field))).toBe(false);
        }
      }
    }
  });
});

describe("coerceSlotsDelta", () => {
  it("coerces field kinds and drops unknown topics", () => {
    const delta = coerceSlotsDelta({
      vaccine: { other_recent: "no", name: "  influenza ", date: "last week" },
      travel: { traveled: "yes", destinations: ["Kenya", { country: "Peru", return_date: "2024-02-30" }] },
      weather: { sunny: true },
    });
    expect(delta).toEqual({
      vaccine: { other_recent: false, name: "influenza" },
      travel: { traveled: true, destinations: [{ country: "Kenya" }, { country: "Peru" }] },
    });
  });

  it("keeps unknown fields on known topics as pass-through scalars", () => {
    expect(coerceSlotsDelta({ tattoo: { artist_notes: " small ", count: 2, nested: { a: 1 } } })).toEqual({
      tattoo: { artist_notes: "small", count: 2 },
    });
  });

  it("returns an empty delta for non-mapping input", () => {
    expect(coerceSlotsDelta("tattoo")).toEqual({});
    expect(coerceSlotsDelta(null)).toEqual({});
  });
});

describe("mergeSlots", () => {
  it("merges typed slots across turns", () => {
    const first: Slots = { tattoo: { date: "2024-05-20" } };
    const second = coerceSlotsDelta({ vaccine: { other_recent: false }, tattoo: { date: null } });
    expect(mergeSlots(first, second)).toEqual({
      tattoo: { date: "2024-05-20" },
      vaccine: { other_recent: false },
    });
  });
});
