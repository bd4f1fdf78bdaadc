import { describe, expect, it } from "vitest";

import {
  escapeMathBackslashes,
  unescapeMathBackslashes,
} from "./escape-backslashes";

describe("escapeMathBackslashes", () => {
  it("doubles backslashes before escapable punctuation", () => {
    expect(escapeMathBackslashes("\\{a\\}")).toBe("\\\\{a\\\\}");
    expect(escapeMathBackslashes("\\#\\_\\!\\`")).toBe("\\\\#\\\\_\\\\!\\\\`");
    expect(escapeMathBackslashes("\\(\\)\\[\\]\\*\\+\\-")).toBe(
      "\\\\(\\\\)\\\\[\\\\]\\\\*\\\\+\\\\-",
    );
  });

  it("leaves TeX commands and bare punctuation alone", () => {
    expect(escapeMathBackslashes("\\frac{a}{b}")).toBe("\\frac{a}{b}");
    expect(escapeMathBackslashes("a_1 * b_2")).toBe("a_1 * b_2");
  });

  it("does not treat a backslash as escapable punctuation", () => {
    expect(escapeMathBackslashes("a \\\\ b")).toBe("a \\\\ b");
  });
});

describe("unescapeMathBackslashes", () => {
  it("restores the text escapeMathBackslashes produced", () => {
    const source = "\\{x\\} \\frac{1}{2} \\_";
    expect(escapeMathBackslashes(source)).toBe("\\\\{x\\\\} \\frac{1}{2} \\\\_");
    expect(unescapeMathBackslashes(escapeMathBackslashes(source))).toBe(source);
  });
});
