import type { DiffLine, FileChange, Finding, Hunk } from '../src/types.js';

/** A hunk of a new file: every line added, numbered from `start` */
export function addedHunk(lines: readonly string[], start = 1): Hunk {
  const diffLines: DiffLine[] = lines.map((content, i) => ({
    kind: 'added',
    content,
    newLine: start + i,
  }));
  return {
    header: `@@ -0,0 +${start},${lines.length} @@`,
    oldStart: 0,
    oldLines: 0,
    newStart: start,
    newLines: lines.length,
    lines: diffLines,
  };
}

/** A new file made of one added hunk */
export function addedFile(path: string, lines: readonly string[]): FileChange {
  const hunk = addedHunk(lines);
  return {
    path,
    kind: 'added',
    isBinary: false,
    additions: lines.length,
    deletions: 0,
    hunks: lines.length > 0 ? [hunk] : [],
  };
}

/** A finding with placeholder values for everything not given */
export function makeFinding(overrides: Partial<Finding> & Pick<Finding, 'file' | 'line'>): Finding {
  return {
    ruleId: 'custom/example',
    tier: 'low',
    category: 'maintainability',
    message: 'example finding',
    evidence: 'example();',
    ...overrides,
  };
}
