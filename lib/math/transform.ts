import {
  advanceScan,
  flushScan,
  initialScanState,
} from "./block-scanner";
import {
  resolveMathSpansOptions,
  type MathSpansOptionsInput,
} from "./options-contract";

/**
 * Rewrite math in a Markdown document, given as lines, into wrapper markup.
 *
 * Plain fenced code and code spans are left alone. A closed math block
 * collapses into one output element holding the multi-line markup, so the
 * output can be shorter than the input.
 */
export function transformMathLines(
  lines: readonly string[],
  options?: MathSpansOptionsInput,
): string[] {
  const resolved = resolveMathSpansOptions(options, "transformMathLines");
  const out: string[] = [];

  let state = initialScanState();
  lines.forEach((line, index) => {
    const step = advanceScan(state, line, index, resolved);
    state = step.state;
    out.push(...step.emitted);
  });
  out.push(...flushScan(state));

  return out;
}

export function transformMathMarkdown(
  source: string,
  options?: MathSpansOptionsInput,
): string {
  return transformMathLines(source.split(/\r?\n/), options).join("\n");
}
