export {
  closingFor,
  DELIMITER_PAIRS,
  UnknownDelimiterError,
  type DelimiterPair,
} from "./math/delimiter-table";
export {
  escapeMathBackslashes,
  unescapeMathBackslashes,
} from "./math/escape-backslashes";
export {
  tokenizeInline,
  type InlineToken,
  type InlineTokenKind,
} from "./math/inline-tokenizer";
export {
  replaceInlineMath,
  scanInline,
  type InlineMathSpan,
  type InlineMathStyle,
} from "./math/inline-scanner";
export {
  blockMathMarkers,
  inlineMathMarkers,
  wrapBlockMath,
  wrapInlineMath,
  type MathMarkers,
} from "./math/markup";
export {
  advanceScan,
  flushScan,
  initialScanState,
  isFenceClosing,
  matchFenceOpening,
  type Fence,
  type ScanState,
  type ScanStep,
} from "./math/block-scanner";
export { transformMathLines, transformMathMarkdown } from "./math/transform";
export {
  coerceMathSpansOptions,
  DEFAULT_MATH_SPANS_OPTIONS,
  MathSpansOptionsSchema,
  type MathSpansOptions,
  type MathSpansOptionsInput,
} from "./math/options-contract";
export { markdownItMathSpans } from "./markdown/markdown-it-math";
export {
  createMarkdownRenderer,
  renderMarkdownWithMath,
} from "./markdown/render-markdown";
