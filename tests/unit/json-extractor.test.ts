import { describe, it, expect } from "vitest";
import { recoverJson, recoverJsonObject, isRecord } from "../../src/utils/json-extractor.js";

describe("recoverJson", () => {
  it("reads a fenced json block", () => {
    expect(recoverJson('```json\n{"a":1}\n```')).toEqual({ value: { a: 1 }, method: "code_block" });
  });

  it("parses a bare object directly", () => {
    expect(recoverJson('{"decision":"Defer"}')).toEqual({ value: { decision: "Defer" }, method: "direct" });
  });

  it("falls back to the outermost braces", () => {
    expect(recoverJson('prefix {"a":1} suffix')).toEqual({ value: { a: 1 }, method: "boundary" });
  });

  it("returns an empty object for text without JSON", () => {
    expect(recoverJson("not json at all")).toEqual({ value: {}, method: "none" });
  });

  it("moves past a broken fenced block", () => {
    const text = 'Here:\n```json\n{"a": }\n```\nActually {"b": 2}';
    // The boundary slice spans from the first "{" to the last "}" and is not valid JSON either
    expect(recoverJson(text).method).toBe("none");
    expect(recoverJsonObject('```json\nnope\n``` then {"b": 2}')).toEqual({ b: 2 });
  });

  it("rejects arrays and scalars as the top-level value", () => {
    expect(recoverJson("[1,2,3]")).toEqual({ value: {}, method: "none" });
    expect(recoverJson("42")).toEqual({ value: {}, method: "none" });
  });

  it("never throws on non-string input", () => {
    expect(recoverJson(undefined).value).toEqual({});
    expect(recoverJson(null).value).toEqual({});
    expect(recoverJson("   ").value).toEqual({});
  });
});

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});
