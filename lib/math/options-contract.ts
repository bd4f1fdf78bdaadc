import { z } from "zod";

const ClassNameSchema = z.string().regex(/^[A-Za-z_-][A-Za-z0-9_-]*$/);

export const MathSpansOptionsSchema = z
  .object({
    inlineClassName: ClassNameSchema.default("math-inline"),
    blockClassName: ClassNameSchema.default("math-block"),
    // Info string that turns a fenced code block into display math.
    fenceInfo: z.string().regex(/^[^\s`~]+$/).default("math"),
    escapeBlockBodies: z.boolean().default(false),
    // Re-apply the opening line's indent to each line of block markup.
    indentBlockMarkup: z.boolean().default(false),
  })
  .strict();

export type MathSpansOptions = z.infer<typeof MathSpansOptionsSchema>;
export type MathSpansOptionsInput = z.input<typeof MathSpansOptionsSchema>;

export const DEFAULT_MATH_SPANS_OPTIONS: MathSpansOptions =
  MathSpansOptionsSchema.parse({});

export function coerceMathSpansOptions(value: unknown): {
  options: MathSpansOptions;
  usedFallback: boolean;
  diagnostics?: Record<string, unknown>;
} {
  const parsed = MathSpansOptionsSchema.safeParse(value ?? {});
  if (parsed.success) {
    return { options: parsed.data, usedFallback: false };
  }

  return {
    options: DEFAULT_MATH_SPANS_OPTIONS,
    usedFallback: true,
    diagnostics: {
      received: value,
      issueCount: parsed.error.issues.length,
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    },
  };
}

export function resolveMathSpansOptions(
  value: unknown,
  caller: string,
): MathSpansOptions {
  const coerced = coerceMathSpansOptions(value);
  if (coerced.usedFallback) {
    console.warn(`${caller}: invalid options; using defaults`, {
      ...coerced.diagnostics,
    });
  }
  return coerced.options;
}
