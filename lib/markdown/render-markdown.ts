import MarkdownIt from "markdown-it";

import { markdownItMathSpans } from "./markdown-it-math";
import type { MathSpansOptionsInput } from "../math/options-contract";

export function createMarkdownRenderer(options?: MathSpansOptionsInput): MarkdownIt {
  const md = new MarkdownIt({
    html: false,
    linkify: true,
    typographer: true,
    breaks: true,
  });
  return md.use(markdownItMathSpans, options);
}

/**
 * Render a Markdown document body with math left as wrapper elements for a
 * client-side renderer. Page assembly is up to the caller.
 */
export function renderMarkdownWithMath(
  source: string,
  options?: MathSpansOptionsInput,
): string {
  return createMarkdownRenderer(options).render(source);
}
