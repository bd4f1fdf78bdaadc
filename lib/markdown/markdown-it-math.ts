import type MarkdownIt from "markdown-it";

import { unescapeMathBackslashes } from "../math/escape-backslashes";
import { blockMathMarkers, inlineMathMarkers } from "../math/markup";
import {
  resolveMathSpansOptions,
  type MathSpansOptionsInput,
} from "../math/options-contract";
import { transformMathMarkdown } from "../math/transform";

type CoreRule = Parameters<MarkdownIt["core"]["ruler"]["before"]>[2];
type BlockRule = Parameters<MarkdownIt["block"]["ruler"]["before"]>[2];
type InlineRule = Parameters<MarkdownIt["inline"]["ruler"]["before"]>[2];
type BlockState = Parameters<BlockRule>[0];

function lineText(state: BlockState, line: number): string {
  return state.src.slice(state.bMarks[line] + state.tShift[line], state.eMarks[line]);
}

/**
 * markdown-it plugin: rewrites math in the raw source before block parsing,
 * then turns the wrapper markup back into `math_inline` / `math_block`
 * tokens so the bracket delimiters survive the backslash-escape rule.
 */
export function markdownItMathSpans(md: MarkdownIt, options?: MathSpansOptionsInput): void {
  const resolved = resolveMathSpansOptions(options, "markdownItMathSpans");
  const inline = inlineMathMarkers(resolved);
  const block = blockMathMarkers(resolved);

  const rewriteSource: CoreRule = (state) => {
    state.src = transformMathMarkdown(state.src, { ...resolved, indentBlockMarkup: true });
  };

  const mathInline: InlineRule = (state, silent) => {
    if (!state.src.startsWith(inline.open, state.pos)) return false;

    const bodyStart = state.pos + inline.open.length;
    const closeAt = state.src.indexOf(inline.close, bodyStart);
    if (closeAt === -1 || closeAt + inline.close.length > state.posMax) return false;

    if (!silent) {
      const token = state.push("math_inline", "span", 0);
      token.content = unescapeMathBackslashes(state.src.slice(bodyStart, closeAt));
      token.markup = "\\( \\)";
    }
    state.pos = closeAt + inline.close.length;
    return true;
  };

  const mathBlock: BlockRule = (state, startLine, endLine, silent) => {
    if (state.sCount[startLine] - state.blkIndent >= 4) return false;
    if (lineText(state, startLine) !== block.open) return false;

    let closeLine = startLine + 1;
    while (closeLine < endLine && lineText(state, closeLine) !== block.close) {
      closeLine += 1;
    }
    if (closeLine >= endLine) return false;
    if (silent) return true;

    // The wrapper carries its fence's indent on every line; drop it again.
    const body = state.getLines(startLine + 1, closeLine, state.sCount[startLine], false);
    const token = state.push("math_block", "div", 0);
    token.block = true;
    token.content = resolved.escapeBlockBodies ? unescapeMathBackslashes(body) : body;
    token.markup = "\\[ \\]";
    token.map = [startLine, closeLine + 1];
    state.line = closeLine + 1;
    return true;
  };

  md.core.ruler.before("normalize", "math_spans", rewriteSource);
  md.inline.ruler.before("escape", "math_inline", mathInline);
  md.block.ruler.before("fence", "math_block", mathBlock, {
    alt: ["paragraph", "reference", "blockquote", "list"],
  });

  md.renderer.rules["math_inline"] = (tokens, idx) =>
    `${inline.open}${md.utils.escapeHtml(tokens[idx].content)}${inline.close}`;
  md.renderer.rules["math_block"] = (tokens, idx) =>
    `${block.open}\n${md.utils.escapeHtml(tokens[idx].content)}\n${block.close}\n`;
}
