import type { DiffSummary } from "../shared/types.js";

function splitLines(content: string): string[] {
  if (content === "") return [];
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Number of lines in `content`. A trailing newline does not start another line. */
export function countLines(content: string): number {
  return splitLines(content).length;
}

/** Length of the longest common subsequence of two line lists, in O(n·m) time and O(m) space. */
function commonLineCount(a: readonly string[], b: readonly string[]): number {
  let previous = new Uint32Array(b.length + 1);
  let current = new Uint32Array(b.length + 1);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
    current.fill(0);
  }
  return previous[b.length];
}

/**
 * Summarize how the fixed content differs from the original, line by line.
 * Lines kept in order count as unchanged; the rest are removals and additions.
 */
export function summarizeDiff(original: string, fixed: string): DiffSummary {
  const before = splitLines(original);
  const after = splitLines(fixed);
  const unchanged = commonLineCount(before, after);

  return {
    linesAdded: after.length - unchanged,
    linesRemoved: before.length - unchanged,
    linesUnchanged: unchanged,
    originalLines: before.length,
    fixedLines: after.length,
  };
}
