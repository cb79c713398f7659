import { describe, expect, it } from "vitest";

import { extractFirstBalanced, parsePayload, stripCodeFence } from "../../server/parsing/jsonCandidates.js";

describe("json candidate parsing", () => {
  it("parses fenced output as structured", () => {
    const parsed = parsePayload('```json\n[{"id":"a"}]\n```', "array");

    expect(parsed).toEqual({ kind: "structured", value: [{ id: "a" }] });
  });

  it("recovers a node list surrounded by prose as a fragment", () => {
    const parsed = parsePayload('Sure! Here is the graph:\n[{"id":"a"}]\nLet me know.', "array");

    expect(parsed).toEqual({ kind: "fragment", value: [{ id: "a" }] });
  });

  it("repairs trailing commas and line comments", () => {
    expect(parsePayload('{"a": [1, 2,],}', "object")).toEqual({ kind: "structured", value: { a: [1, 2] } });
    expect(parsePayload('{\n  // note\n  "a": 1\n}', "object")).toEqual({ kind: "structured", value: { a: 1 } });
  });

  it("normalizes smart quotes before parsing", () => {
    const parsed = parsePayload("{\u201Cname\u201D: \u201Cx\u201D}", "object");

    expect(parsed).toEqual({ kind: "structured", value: { name: "x" } });
  });

  it("keeps curly quotes that sit inside valid string values", () => {
    const raw = JSON.stringify({ summary: "The \u201Cquick book\u201D flow", features: ["It\u2019s fast"] });

    expect(parsePayload(raw, "object")).toEqual({
      kind: "structured",
      value: { summary: "The \u201Cquick book\u201D flow", features: ["It\u2019s fast"] }
    });
  });

  it("recovers the outer node list from prose when labels carry curly quotes", () => {
    const parsed = parsePayload(
      'Here you go: [{"id":"a","label":"Click \u201CBuy now\u201D","connections":["b"]}] Enjoy.',
      "array"
    );

    expect(parsed).toEqual({
      kind: "fragment",
      value: [{ id: "a", label: "Click \u201CBuy now\u201D", connections: ["b"] }]
    });
  });

  it("falls back to the other shape when the preferred one is absent", () => {
    const parsed = parsePayload('prefix {"text": "a ] b [", "n": 1} suffix', "array");

    expect(parsed).toEqual({ kind: "fragment", value: { text: "a ] b [", n: 1 } });
  });

  it("reports opaque output with the original text", () => {
    expect(parsePayload("no json here", "object")).toEqual({ kind: "opaque", text: "no json here" });
  });

  it("extracts the first balanced span and skips spans that never close", () => {
    expect(extractFirstBalanced("[1, [2, 3]] tail", "array")).toBe("[1, [2, 3]]");
    expect(extractFirstBalanced("[ unclosed then [1]", "array")).toBe("[1]");
    expect(extractFirstBalanced("nothing", "object")).toBeNull();
  });

  it("strips a leading fence with a language tag", () => {
    expect(stripCodeFence("```json\n{}\n```")).toBe("{}");
    expect(stripCodeFence("  plain  ")).toBe("plain");
  });
});
