import { describe, expect, it } from "vitest";

import { extractJsonValue } from "./json";

describe("extractJsonValue", () => {
  it("parses a bare object or array", () => {
    expect(extractJsonValue('{"a":1}')).toEqual({ a: 1 });
    expect(extractJsonValue(' [{"a":1}] ')).toEqual([{ a: 1 }]);
  });

  it("takes the last fenced JSON block", () => {
    const text = 'Draft:\n```json\n{"v":1}\n```\nFinal:\n```json\n{"v":2}\n```';
    expect(extractJsonValue(text)).toEqual({ v: 2 });
  });

  it("finds JSON surrounded by prose", () => {
    expect(extractJsonValue('Here you go: [1, 2, 3] hope that helps')).toEqual([1, 2, 3]);
    expect(extractJsonValue('Result -> {"name": "widget"} done')).toEqual({ name: "widget" });
  });

  it("returns null for plain text and scalars", () => {
    expect(extractJsonValue("no structured data here")).toBeNull();
    expect(extractJsonValue("42")).toBeNull();
  });
});
