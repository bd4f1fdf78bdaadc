import { closingFor } from "./delimiter-table";
import { tokenizeInline, type InlineToken } from "./inline-tokenizer";

export type InlineMathStyle = "bracket" | "gitlab";

export type InlineMathSpan = {
  /** Offset of the opening delimiter (the leading `$` for GitLab style). */
  start: number;
  /** Offset just after the closing delimiter. */
  end: number;
  /** Formula text without delimiters. */
  text: string;
  style: InlineMathStyle;
};

const GITLAB_BOUNDARY = "$";

function findBracketClose(tokens: InlineToken[], from: number): number {
  for (let j = from; j < tokens.length; j += 1) {
    const kind = tokens[j].kind;
    if (kind === "bracket-math-close") return j;
    // Bracket math never reaches into or across a code span.
    if (kind === "code-span-open" || kind === "backtick-run") return -1;
  }
  return -1;
}

function findCodeSpanClose(tokens: InlineToken[], from: number): number {
  for (let j = from; j < tokens.length; j += 1) {
    if (tokens[j].kind === "code-span-close") return j;
  }
  return -1;
}

/**
 * Locate inline math on one line: `\(…\)` outside code spans, and code spans
 * wrapped in `$` (`` $`…`$ `` / ``` $``…``$ ```). Returned spans are sorted
 * by `start` and never overlap.
 */
export function scanInline(line: string): InlineMathSpan[] {
  const tokens = tokenizeInline(line);
  const spans: InlineMathSpan[] = [];
  // Characters before this offset already belong to a reported span.
  let consumed = 0;

  let k = 0;
  while (k < tokens.length) {
    const token = tokens[k];

    if (token.kind === "bracket-math-open") {
      const closeIndex = findBracketClose(tokens, k + 1);
      if (closeIndex === -1) {
        k += 1;
        continue;
      }
      const close = tokens[closeIndex];
      spans.push({
        start: token.start,
        end: close.end,
        text: line.slice(token.end, close.start),
        style: "bracket",
      });
      consumed = close.end;
      k = closeIndex + 1;
      continue;
    }

    if (token.kind === "code-span-open") {
      const closeIndex = findCodeSpanClose(tokens, k + 1);
      if (closeIndex === -1) {
        k += 1;
        continue;
      }
      const close = tokens[closeIndex];
      const delimiter = line.slice(token.start, token.end);
      const opening = GITLAB_BOUNDARY + delimiter;
      const start = token.start - GITLAB_BOUNDARY.length;
      if (
        start >= consumed &&
        line.startsWith(opening, start) &&
        line.startsWith(closingFor(opening), close.start)
      ) {
        const end = close.end + GITLAB_BOUNDARY.length;
        spans.push({
          start,
          end,
          text: line.slice(token.end, close.start),
          style: "gitlab",
        });
        consumed = end;
      }
      k = closeIndex + 1;
      continue;
    }

    k += 1;
  }

  return spans;
}

/**
 * Replace each span with `wrap(span)`. Spans are applied from the end of the
 * line backwards so earlier offsets stay valid.
 */
export function replaceInlineMath(
  line: string,
  spans: readonly InlineMathSpan[],
  wrap: (span: InlineMathSpan) => string,
): string {
  let out = line;
  const ordered = [...spans].sort((a, b) => b.start - a.start);
  for (const span of ordered) {
    out = out.slice(0, span.start) + wrap(span) + out.slice(span.end);
  }
  return out;
}
