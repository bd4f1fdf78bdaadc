import { describe, expect, it } from "vitest";

import { tokenizeInline } from "@/lib/math/inline-tokenizer";

function describeTokens(line: string): [string, string][] {
  return tokenizeInline(line).map((token) => [
    token.kind,
    line.slice(token.start, token.end),
  ]);
}

describe("tokenizeInline", () => {
  it("returns no tokens for an empty line", () => {
    expect(tokenizeInline("")).toEqual([]);
  });

  it("classifies bracket delimiters between text runs", () => {
    expect(describeTokens("a \\(x\\) b")).toEqual([
      ["text", "a "],
      ["bracket-math-open", "\\("],
      ["text", "x"],
      ["bracket-math-close", "\\)"],
      ["text", " b"],
    ]);
  });

  it("does not classify bracket delimiters inside a code span", () => {
    expect(describeTokens("`\\(x\\)`")).toEqual([
      ["code-span-open", "`"],
      ["text", "\\(x\\)"],
      ["code-span-close", "`"],
    ]);
  });

  it("reports a backtick run without a partner", () => {
    expect(describeTokens("a ` b")).toEqual([
      ["text", "a "],
      ["backtick-run", "`"],
      ["text", " b"],
    ]);
  });

  it("lets a double-backtick span contain a single backtick", () => {
    expect(describeTokens("`` ` ``")).toEqual([
      ["code-span-open", "``"],
      ["text", " ` "],
      ["code-span-close", "``"],
    ]);
  });

  it("records offsets against the original line", () => {
    expect(tokenizeInline("x\\(y")).toEqual([
      { kind: "text", start: 0, end: 1 },
      { kind: "bracket-math-open", start: 1, end: 3 },
      { kind: "text", start: 3, end: 4 },
    ]);
  });
});
