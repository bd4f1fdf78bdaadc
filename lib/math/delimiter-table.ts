export type DelimiterPair = {
  opening: string;
  closing: string;
};

/**
 * Opening → closing delimiters the scanner recognizes. The GitLab pairs are
 * never searched for directly: they are derived from a code span bounded by
 * `$` on both sides and looked up here to check the boundary.
 */
export const DELIMITER_PAIRS: readonly DelimiterPair[] = [
  { opening: "\\(", closing: "\\)" },
  { opening: "\\[", closing: "\\]" },
  { opening: "$`", closing: "`$" },
  { opening: "$``", closing: "``$" },
];

const CLOSING_BY_OPENING = new Map(
  DELIMITER_PAIRS.map((pair) => [pair.opening, pair.closing] as const),
);

export class UnknownDelimiterError extends Error {
  readonly delimiter: string;

  constructor(delimiter: string) {
    super(`No closing delimiter registered for ${JSON.stringify(delimiter)}`);
    this.name = "UnknownDelimiterError";
    this.delimiter = delimiter;
  }
}

export function closingFor(opening: string): string {
  const closing = CLOSING_BY_OPENING.get(opening);
  if (closing === undefined) {
    throw new UnknownDelimiterError(opening);
  }
  return closing;
}
