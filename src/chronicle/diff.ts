import { diffChars, structuredPatch } from 'diff';

export interface CharDiffCounts {
  insertions: number;
  deletions: number;
  matches: number;
}

/**
 * Count inserted, deleted and matched characters between two renderings
 */
export function countCharChanges(before: string, after: string): CharDiffCounts {
  const counts: CharDiffCounts = { insertions: 0, deletions: 0, matches: 0 };
  for (const change of diffChars(before, after)) {
    const size = change.value.length;
    if (change.added) counts.insertions += size;
    else if (change.removed) counts.deletions += size;
    else counts.matches += size;
  }
  return counts;
}

export function summarizeDiff(before: string, after: string): string {
  const { insertions, deletions, matches } = countCharChanges(before, after);
  return `Found differences: ${insertions} insertions, ${deletions} deletions, ${matches} matches (char units)`;
}

function formatRange(start: number, length: number): string {
  if (length === 1) return `${start}`;
  return `${start},${length}`;
}

/**
 * Unified diff between two renderings, one array entry per line.
 * Identical inputs produce an empty array.
 */
export function unifiedDiff(
  before: string,
  after: string,
  fromFile: string = 'input',
  toFile: string = 'output',
  context: number = 3,
): string[] {
  // Terminate both sides so single-line renderings need no
  // "No newline at end of file" markers
  const patch = structuredPatch(fromFile, toFile, `${before}\n`, `${after}\n`, undefined, undefined, { context });
  if (patch.hunks.length === 0) return [];

  const lines = [`--- ${fromFile}`, `+++ ${toFile}`];
  for (const hunk of patch.hunks) {
    lines.push(
      `@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`,
    );
    lines.push(...hunk.lines);
  }
  return lines;
}
