import { EmptyChangeSetError } from '../errors.js';
import { parseDiff } from '../parse/diffParser.js';
import type { ChangeSet, InputMode } from '../types.js';
import { readInput } from './diffReader.js';
import { fileContentToFileChange, scanFiles } from './fileScanner.js';

/**
 * Diff Collector: turn an input mode into a ChangeSet.
 *
 * Throws BaselineNotFoundError when a ref does not resolve and
 * EmptyChangeSetError when the scope holds no changed files.
 */
export function collectChangeSet(mode: InputMode, cwd: string): ChangeSet {
  if (mode.type === 'all') {
    const files = scanFiles({ cwd, glob: mode.glob }).map(fileContentToFileChange);
    const baseline = mode.glob ? `all tracked files matching ${mode.glob}` : 'all tracked files';
    if (files.length === 0) {
      throw new EmptyChangeSetError(baseline, widenSuggestions(mode));
    }
    return { baseline, files };
  }

  const input = readInput(mode, cwd);
  const files = parseDiff(input.content);

  if (files.length === 0) {
    throw new EmptyChangeSetError(input.baseline, widenSuggestions(mode));
  }

  return { baseline: input.baseline, files };
}

/** Ways to widen the scope when nothing changed */
export function widenSuggestions(mode: InputMode): readonly string[] {
  switch (mode.type) {
    case 'staged':
      return [
        'Include unstaged changes: hunkcheck --working-tree',
        'Review every tracked file: hunkcheck --all',
      ];
    case 'working-tree':
    case 'auto':
      return [
        'Compare against an older commit: hunkcheck HEAD~3',
        'Review every tracked file: hunkcheck --all',
      ];
    case 'ref':
      return [
        `Compare against an older commit: hunkcheck ${mode.ref}~1`,
        'Review every tracked file: hunkcheck --all',
      ];
    case 'range':
      return [
        `Widen the range: hunkcheck ${mode.from}~1${mode.symmetric ? '...' : '..'}${mode.to}`,
        'Review every tracked file: hunkcheck --all',
      ];
    case 'all':
      return mode.glob
        ? ['Drop or loosen the --glob pattern']
        : ['Track files with git add before using --all'];
    case 'diff-file':
    case 'stdin':
      return ['Provide a unified diff produced by git diff'];
  }
}
