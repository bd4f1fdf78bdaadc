import { closingFor } from "./delimiter-table";
import { replaceInlineMath, scanInline } from "./inline-scanner";
import { wrapBlockMath, wrapInlineMath } from "./markup";
import type { MathSpansOptions } from "./options-contract";

export type Fence = {
  indent: string;
  /** The run of 3+ backticks or tildes. */
  marker: string;
  info: string;
};

export type ScanState =
  | { kind: "normal" }
  | { kind: "in-fence"; fence: Fence }
  | {
      kind: "in-fence-math";
      fence: Fence;
      buffer: string[];
      startIndex: number;
    }
  | {
      kind: "in-bracket-block";
      indent: string;
      closing: string;
      buffer: string[];
      startIndex: number;
    };

export type ScanStep = {
  state: ScanState;
  emitted: string[];
};

// `[^]` so an info string holding `\r` or a line separator still matches.
const FENCE_OPENING_PATTERN = /^(\s*)(`{3,}|~{3,})([^]*)$/;
const BLOCK_MATH_OPENING = "\\[";

export function initialScanState(): ScanState {
  return { kind: "normal" };
}

export function matchFenceOpening(line: string): Fence | null {
  const match = FENCE_OPENING_PATTERN.exec(line);
  if (!match) return null;
  return { indent: match[1], marker: match[2], info: match[3] };
}

/** The opening indent and marker exactly, ignoring trailing whitespace. */
export function isFenceClosing(line: string, fence: Fence): boolean {
  return line.trimEnd() === fence.indent + fence.marker;
}

function stripIndent(line: string, width: number): string {
  let i = 0;
  while (i < width && i < line.length && /\s/.test(line[i])) i += 1;
  return line.slice(i);
}

function interiorLines(buffer: string[]): string[] {
  return buffer.slice(1, -1);
}

function closeFencedMath(buffer: string[], fence: Fence, options: MathSpansOptions): string {
  const body = interiorLines(buffer)
    .map((line) => stripIndent(line, fence.indent.length))
    .join("\n")
    .trimEnd();
  return wrapBlockMath(body, options, fence.indent);
}

function closeBracketBlock(
  buffer: string[],
  indent: string,
  options: MathSpansOptions,
): string {
  const body = interiorLines(buffer).join("\n").trimEnd();
  return wrapBlockMath(body, options, indent);
}

function transformInlineLine(line: string, options: MathSpansOptions): string {
  return replaceInlineMath(line, scanInline(line), (span) =>
    wrapInlineMath(span.text, options),
  );
}

function advanceNormal(
  line: string,
  index: number,
  options: MathSpansOptions,
): ScanStep {
  const fence = matchFenceOpening(line);
  if (fence && fence.info.trimEnd() === options.fenceInfo) {
    return {
      state: { kind: "in-fence-math", fence, buffer: [line], startIndex: index },
      emitted: [],
    };
  }
  if (fence) {
    return { state: { kind: "in-fence", fence }, emitted: [line] };
  }

  const content = line.trimStart();
  if (content.startsWith(BLOCK_MATH_OPENING)) {
    return {
      state: {
        kind: "in-bracket-block",
        indent: line.slice(0, line.length - content.length),
        closing: closingFor(BLOCK_MATH_OPENING),
        buffer: [line],
        startIndex: index,
      },
      emitted: [],
    };
  }

  return {
    state: { kind: "normal" },
    emitted: [transformInlineLine(line, options)],
  };
}

/**
 * Feed one line to the block state machine. The buffers inside `state`
 * belong to a single document scan and are extended in place.
 */
export function advanceScan(
  state: ScanState,
  line: string,
  index: number,
  options: MathSpansOptions,
): ScanStep {
  switch (state.kind) {
    case "normal":
      return advanceNormal(line, index, options);

    case "in-fence":
      if (isFenceClosing(line, state.fence)) {
        return { state: { kind: "normal" }, emitted: [line] };
      }
      return { state, emitted: [line] };

    case "in-fence-math":
      state.buffer.push(line);
      if (isFenceClosing(line, state.fence)) {
        return {
          state: { kind: "normal" },
          emitted: [closeFencedMath(state.buffer, state.fence, options)],
        };
      }
      return { state, emitted: [] };

    case "in-bracket-block":
      state.buffer.push(line);
      if (line.includes(state.closing)) {
        return {
          state: { kind: "normal" },
          emitted: [closeBracketBlock(state.buffer, state.indent, options)],
        };
      }
      return { state, emitted: [] };
  }
}

/** End of document: an unterminated math block is passed through as-is. */
export function flushScan(state: ScanState): string[] {
  if (state.kind !== "in-fence-math" && state.kind !== "in-bracket-block") {
    return [];
  }

  console.warn("flushScan: unterminated math block; passing lines through", {
    state: state.kind,
    startLine: state.startIndex + 1,
    lineCount: state.buffer.length,
  });
  return [...state.buffer];
}
