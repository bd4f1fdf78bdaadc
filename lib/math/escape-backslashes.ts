// Characters a Markdown inline pass treats as backslash-escapable and that
// also show up after a backslash in TeX (`\{`, `\#`, `\_`, ...).
const ESCAPED_PUNCTUATION = "(){}[\\]*!`+\\-_#";

const SINGLE_ESCAPE_PATTERN = new RegExp(`\\\\([${ESCAPED_PUNCTUATION}])`, "g");
const DOUBLE_ESCAPE_PATTERN = new RegExp(`\\\\\\\\([${ESCAPED_PUNCTUATION}])`, "g");

/**
 * Double every backslash that precedes escapable punctuation so a later
 * Markdown escape pass leaves the original TeX backslash in place.
 * Not idempotent: apply once per body.
 */
export function escapeMathBackslashes(text: string): string {
  return text.replace(SINGLE_ESCAPE_PATTERN, "\\\\$1");
}

export function unescapeMathBackslashes(text: string): string {
  return text.replace(DOUBLE_ESCAPE_PATTERN, "\\$1");
}
