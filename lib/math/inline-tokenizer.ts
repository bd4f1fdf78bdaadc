import { closingFor } from "./delimiter-table";

export type InlineTokenKind =
  | "text"
  | "code-span-open"
  | "code-span-close"
  | "backtick-run"
  | "bracket-math-open"
  | "bracket-math-close";

export type InlineToken = {
  kind: InlineTokenKind;
  /** Offset of the first character of the token in the line. */
  start: number;
  /** Offset just after the token. */
  end: number;
};

export const BRACKET_MATH_OPENING = "\\(";
export const BRACKET_MATH_CLOSING = closingFor(BRACKET_MATH_OPENING);

function codeSpanDelimiterAt(line: string, index: number): string {
  return line.startsWith("``", index) ? "``" : "`";
}

/**
 * Split one line into classified tokens.
 *
 * A run of one or two backticks opens a code span when the identical run
 * appears again later on the line; the span's content is emitted as a single
 * `text` token, so bracket delimiters inside code are never classified.
 * A run with no partner becomes a `backtick-run`.
 */
export function tokenizeInline(line: string): InlineToken[] {
  const tokens: InlineToken[] = [];
  let textStart = 0;

  const push = (kind: InlineTokenKind, start: number, end: number) => {
    if (start > textStart) {
      tokens.push({ kind: "text", start: textStart, end: start });
    }
    tokens.push({ kind, start, end });
    textStart = end;
  };

  let i = 0;
  while (i < line.length) {
    if (line[i] === "`") {
      const delimiter = codeSpanDelimiterAt(line, i);
      const openEnd = i + delimiter.length;
      const closeAt = line.indexOf(delimiter, openEnd);
      if (closeAt === -1) {
        push("backtick-run", i, openEnd);
        i = openEnd;
        continue;
      }
      push("code-span-open", i, openEnd);
      push("code-span-close", closeAt, closeAt + delimiter.length);
      i = closeAt + delimiter.length;
      continue;
    }

    if (line.startsWith(BRACKET_MATH_OPENING, i)) {
      push("bracket-math-open", i, i + BRACKET_MATH_OPENING.length);
      i += BRACKET_MATH_OPENING.length;
      continue;
    }

    if (line.startsWith(BRACKET_MATH_CLOSING, i)) {
      push("bracket-math-close", i, i + BRACKET_MATH_CLOSING.length);
      i += BRACKET_MATH_CLOSING.length;
      continue;
    }

    i += 1;
  }

  if (line.length > textStart) {
    tokens.push({ kind: "text", start: textStart, end: line.length });
  }

  return tokens;
}
