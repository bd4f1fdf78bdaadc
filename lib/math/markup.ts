import { closingFor } from "./delimiter-table";
import { escapeMathBackslashes } from "./escape-backslashes";
import type { MathSpansOptions } from "./options-contract";

export type MathMarkers = {
  open: string;
  close: string;
};

const INLINE_OPENING = "\\(";
const BLOCK_OPENING = "\\[";

// The bracket delimiters stay inside the wrapper so a client-side renderer
// scanning for `\(` / `\[` still finds the formula.
export function inlineMathMarkers(
  options: Pick<MathSpansOptions, "inlineClassName">,
): MathMarkers {
  return {
    open: `<span class="${options.inlineClassName}">${INLINE_OPENING}`,
    close: `${closingFor(INLINE_OPENING)}</span>`,
  };
}

export function blockMathMarkers(
  options: Pick<MathSpansOptions, "blockClassName">,
): MathMarkers {
  return {
    open: `<div class="${options.blockClassName}">${BLOCK_OPENING}`,
    close: `${closingFor(BLOCK_OPENING)}</div>`,
  };
}

export function wrapInlineMath(body: string, options: MathSpansOptions): string {
  const { open, close } = inlineMathMarkers(options);
  return open + escapeMathBackslashes(body) + close;
}

/**
 * With `indentBlockMarkup`, every line of the wrapper gets `indent` so the
 * block stays inside the list item its fence was nested in.
 */
export function wrapBlockMath(
  body: string,
  options: MathSpansOptions,
  indent = "",
): string {
  const { open, close } = blockMathMarkers(options);
  const text = options.escapeBlockBodies ? escapeMathBackslashes(body) : body;
  const markup = `${open}\n${text}\n${close}`;
  if (!options.indentBlockMarkup || !indent) return markup;
  return markup
    .split("\n")
    .map((line) => indent + line)
    .join("\n");
}
