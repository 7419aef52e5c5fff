import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as childProcess from 'node:child_process';
import { fileURLToPath } from 'node:url';
import { BaselineNotFoundError, EmptyChangeSetError, InputError } from '../src/errors.js';
import { collectChangeSet, widenSuggestions } from '../src/input/collector.js';
import { parseRange, readInput } from '../src/input/diffReader.js';

vi.mock('node:child_process');

const fixtures = fileURLToPath(new URL('fixtures', import.meta.url));

const SMALL_DIFF = `diff --git a/a.ts b/a.ts
--- a/a.ts
+++ b/a.ts
@@ -1 +1 @@
-old
+new
`;

/** Fake git: each entry maps the joined arguments to stdout, or to a failure */
function fakeGit(responses: Record<string, string | Error>): void {
  vi.mocked(childProcess.execFileSync).mockImplementation((_file, args) => {
    const key = (args ?? []).join(' ');
    const response = responses[key];
    if (response instanceof Error) throw response;
    if (response == null) throw new Error(`unexpected git ${key}`);
    return response;
  });
}

// options passed ahead of every diff and listing command
const Q = '-c core.quotePath=false';

const inRepo = { 'rev-parse --is-inside-work-tree': 'true\n' };

describe('readInput', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('reads staged changes', () => {
    fakeGit({ ...inRepo, [`${Q} diff --cached`]: SMALL_DIFF });
    expect(readInput({ type: 'staged' }, '/repo')).toEqual({ content: SMALL_DIFF, baseline: 'staged' });
  });

  it('diffs a ref from its merge base with HEAD', () => {
    fakeGit({
      ...inRepo,
      'rev-parse --verify --quiet main^{commit}': 'abc\n',
      [`${Q} merge-base main HEAD`]: 'abc123\n',
      [`${Q} diff abc123`]: SMALL_DIFF,
    });
    expect(readInput({ type: 'ref', ref: 'main' }, '/repo')).toEqual({
      content: SMALL_DIFF,
      baseline: 'working tree vs main',
    });
  });

  it('diffs a symmetric range', () => {
    fakeGit({
      ...inRepo,
      'rev-parse --verify --quiet main^{commit}': 'abc\n',
      'rev-parse --verify --quiet HEAD^{commit}': 'def\n',
      [`${Q} diff main...HEAD`]: SMALL_DIFF,
    });
    expect(readInput({ type: 'range', from: 'main', to: 'HEAD', symmetric: true }, '/repo')).toEqual({
      content: SMALL_DIFF,
      baseline: 'main...HEAD',
    });
  });

  it('raises BaselineNotFoundError for a ref that does not resolve', () => {
    fakeGit({ ...inRepo, 'rev-parse --verify --quiet nope^{commit}': new Error('exit 1') });
    expect(() => readInput({ type: 'ref', ref: 'nope' }, '/repo')).toThrow(
      new BaselineNotFoundError('nope'),
    );
  });

  it('raises BaselineNotFoundError outside a work tree', () => {
    fakeGit({ 'rev-parse --is-inside-work-tree': new Error('fatal') });
    expect(() => readInput({ type: 'staged' }, '/tmp')).toThrow(
      'Baseline not found: /tmp (not a git work tree)',
    );
  });

  it('falls back from staged to unstaged to the last commit in auto mode', () => {
    fakeGit({
      ...inRepo,
      [`${Q} diff --cached`]: '',
      [`${Q} diff`]: '',
      [`${Q} diff HEAD~1 HEAD`]: SMALL_DIFF,
    });
    expect(readInput({ type: 'auto' }, '/repo')).toEqual({
      content: SMALL_DIFF,
      baseline: 'last commit (auto)',
    });
  });

  it('prefers staged changes in auto mode', () => {
    fakeGit({ ...inRepo, [`${Q} diff --cached`]: SMALL_DIFF });
    expect(readInput({ type: 'auto' }, '/repo').baseline).toBe('staged (auto)');
  });

  it('raises InputError for a missing diff file', () => {
    expect(() => readInput({ type: 'diff-file', filePath: 'missing.diff' }, fixtures)).toThrow(
      InputError,
    );
  });
});

describe('collectChangeSet', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('parses a diff file relative to cwd', () => {
    const changeSet = collectChangeSet({ type: 'diff-file', filePath: 'multi-file.diff' }, fixtures);
    expect(changeSet.baseline).toBe('file: multi-file.diff');
    expect(changeSet.files).toHaveLength(6);
  });

  it('keeps a file whose path git quoted', () => {
    const changeSet = collectChangeSet({ type: 'diff-file', filePath: 'quoted-path.diff' }, fixtures);
    expect(changeSet.files.map((f) => [f.path, f.kind, f.additions])).toEqual([
      ['src/donn\u00e9es.ts', 'added', 2],
    ]);
  });

  it('raises InputError for a diff header it cannot read', () => {
    expect(() =>
      collectChangeSet({ type: 'diff-file', filePath: 'bad-header.diff' }, fixtures),
    ).toThrow(InputError);
  });

  it('raises EmptyChangeSetError with suggestions for an empty diff', () => {
    let caught: unknown;
    try {
      collectChangeSet({ type: 'diff-file', filePath: 'empty.diff' }, fixtures);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EmptyChangeSetError);
    expect(caught).toMatchObject({
      message: 'No changes found (file: empty.diff)',
      suggestions: ['Provide a unified diff produced by git diff'],
    });
  });

  it('raises EmptyChangeSetError for a clean working tree', () => {
    fakeGit({
      ...inRepo,
      'rev-parse --verify --quiet HEAD^{commit}': 'abc\n',
      [`${Q} diff HEAD`]: '',
    });

    let caught: unknown;
    try {
      collectChangeSet({ type: 'working-tree' }, '/repo');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(EmptyChangeSetError);
    expect(caught).toMatchObject({ fatal: false, baseline: 'working tree vs HEAD' });
  });

  it('reports an empty --all scope', () => {
    fakeGit({ [`${Q} ls-files`]: '' });
    expect(() => collectChangeSet({ type: 'all', glob: 'src/**' }, '/repo')).toThrow(
      'No changes found (all tracked files matching src/**)',
    );
  });
});

describe('widenSuggestions', () => {
  it('suggests the next wider scope', () => {
    expect(widenSuggestions({ type: 'staged' })).toEqual([
      'Include unstaged changes: hunkcheck --working-tree',
      'Review every tracked file: hunkcheck --all',
    ]);
    expect(widenSuggestions({ type: 'ref', ref: 'main' })[0]).toBe(
      'Compare against an older commit: hunkcheck main~1',
    );
    expect(widenSuggestions({ type: 'range', from: 'a', to: 'b', symmetric: false })[0]).toBe(
      'Widen the range: hunkcheck a~1..b',
    );
  });
});

describe('parseRange', () => {
  it('returns null for a single ref', () => {
    expect(parseRange('HEAD~3')).toBeNull();
  });

  it('defaults the end of an open range to HEAD', () => {
    expect(parseRange('main..')).toEqual({ from: 'main', to: 'HEAD', symmetric: false });
  });
});
