import { execFileSync } from 'node:child_process';
import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { BaselineNotFoundError, InputError } from '../errors.js';
import type { InputMode } from '../types.js';

/** Raw diff text with a description of what it compares */
export interface ResolvedInput {
  readonly content: string;
  readonly baseline: string;
}

/** Diff-producing modes; `all` goes through the file scanner instead */
export type DiffInputMode = Exclude<InputMode, { readonly type: 'all' }>;

const MAX_BUFFER = 64 * 1024 * 1024;

/** Report non-ASCII paths verbatim; the parser still decodes paths git quotes anyway */
export const UNQUOTED_PATHS: readonly string[] = ['-c', 'core.quotePath=false'];

/**
 * Read diff text for the input mode. Refs are verified before any diff is
 * read; an unresolvable ref raises BaselineNotFoundError. Empty diffs are
 * returned as-is, the collector decides what an empty change set means.
 */
export function readInput(mode: DiffInputMode, cwd: string): ResolvedInput {
  switch (mode.type) {
    case 'auto':
      ensureWorkTree(cwd);
      return readAuto(cwd);
    case 'working-tree':
      ensureWorkTree(cwd);
      verifyRef('HEAD', cwd);
      return { content: git(['diff', 'HEAD'], cwd), baseline: 'working tree vs HEAD' };
    case 'staged':
      ensureWorkTree(cwd);
      return { content: git(['diff', '--cached'], cwd), baseline: 'staged' };
    case 'ref': {
      ensureWorkTree(cwd);
      verifyRef(mode.ref, cwd);
      const mergeBase = git(['merge-base', mode.ref, 'HEAD'], cwd).trim();
      return {
        content: git(['diff', mergeBase], cwd),
        baseline: `working tree vs ${mode.ref}`,
      };
    }
    case 'range': {
      ensureWorkTree(cwd);
      verifyRef(mode.from, cwd);
      verifyRef(mode.to, cwd);
      const range = `${mode.from}${mode.symmetric ? '...' : '..'}${mode.to}`;
      return { content: git(['diff', range], cwd), baseline: range };
    }
    case 'diff-file':
      return { content: readDiffFile(resolve(cwd, mode.filePath)), baseline: `file: ${mode.filePath}` };
    case 'stdin':
      return { content: readStdin(), baseline: 'stdin' };
  }
}

/**
 * Auto-detect: staged → unstaged → last commit.
 * Picks the first non-empty diff.
 */
function readAuto(cwd: string): ResolvedInput {
  const staged = gitOrEmpty(['diff', '--cached'], cwd);
  if (staged.trim()) {
    return { content: staged, baseline: 'staged (auto)' };
  }

  const unstaged = gitOrEmpty(['diff'], cwd);
  if (unstaged.trim()) {
    return { content: unstaged, baseline: 'unstaged (auto)' };
  }

  const lastCommit = gitOrEmpty(['diff', 'HEAD~1', 'HEAD'], cwd);
  return { content: lastCommit, baseline: 'last commit (auto)' };
}

/**
 * Split a `a..b` or `a...b` baseline argument.
 * Returns null when the argument is a single ref.
 */
export function parseRange(
  value: string,
): { from: string; to: string; symmetric: boolean } | null {
  const match = value.match(/^(.+?)(\.{2,3})(.*)$/);
  if (!match?.[1] || !match[2]) return null;
  return {
    from: match[1],
    to: match[3] || 'HEAD',
    symmetric: match[2] === '...',
  };
}

function ensureWorkTree(cwd: string): void {
  try {
    execFileSync('git', ['rev-parse', '--is-inside-work-tree'], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch {
    throw new BaselineNotFoundError(cwd, 'not a git work tree');
  }
}

function verifyRef(ref: string, cwd: string): void {
  try {
    execFileSync('git', ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`], {
      cwd,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch {
    throw new BaselineNotFoundError(ref);
  }
}

function readDiffFile(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new InputError(`Diff file not found: ${filePath}`);
  }
  return readFileSync(filePath, 'utf-8');
}

function readStdin(): string {
  try {
    return readFileSync(0, 'utf-8');
  } catch (err) {
    throw new InputError('Failed to read from stdin. Pipe a diff or use another input mode.', {
      cause: err,
    });
  }
}

export function git(args: readonly string[], cwd: string): string {
  try {
    return execFileSync('git', [...UNQUOTED_PATHS, ...args], {
      cwd,
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InputError(`Command failed: git ${args.join(' ')}\n${msg}`, { cause: err });
  }
}

function gitOrEmpty(args: readonly string[], cwd: string): string {
  try {
    return execFileSync('git', [...UNQUOTED_PATHS, ...args], {
      cwd,
      encoding: 'utf-8',
      maxBuffer: MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch {
    // HEAD~1 does not exist in a repository with a single commit
    return '';
  }
}
