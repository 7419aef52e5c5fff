import { execFileSync } from 'node:child_process';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { minimatch } from 'minimatch';
import { InputError } from '../errors.js';
import { UNQUOTED_PATHS } from './diffReader.js';
import type { DiffLine, FileChange, FileContent } from '../types.js';

/** Options for scanning files */
export interface ScanOptions {
  readonly glob?: string;
  readonly cwd?: string;
}

/**
 * Scan tracked files from the git repository.
 * Returns FileContent[] with path, content, and binary detection.
 */
export function scanFiles(options: ScanOptions = {}): readonly FileContent[] {
  const cwd = options.cwd ?? process.cwd();

  let output: string;
  try {
    output = execFileSync('git', [...UNQUOTED_PATHS, 'ls-files'], {
      encoding: 'utf-8',
      cwd,
      maxBuffer: 64 * 1024 * 1024,
    });
  } catch (err) {
    throw new InputError(`Failed to list tracked files in ${cwd}`, { cause: err });
  }

  let files = output
    .split('\n')
    .map((f) => f.trim())
    .filter(Boolean);

  const glob = options.glob;
  if (glob) {
    files = files.filter((f) => minimatch(f, glob, { dot: true }));
  }

  return files.map((path) => {
    try {
      const buffer = readFileSync(join(cwd, path));
      const isBinary = detectBinary(buffer);
      return {
        path,
        content: isBinary ? '' : buffer.toString('utf-8'),
        isBinary,
      };
    } catch {
      // Tracked but deleted from the working tree
      return { path, content: '', isBinary: false };
    }
  });
}

/**
 * Convert FileContent to a FileChange where every line is an addition,
 * so the whole file goes through the same rules as a diff.
 */
export function fileContentToFileChange(file: FileContent): FileChange {
  if (file.isBinary) {
    return {
      path: file.path,
      kind: 'added',
      isBinary: true,
      additions: 0,
      deletions: 0,
      hunks: [],
    };
  }

  const lines = file.content === '' ? [] : file.content.split('\n');
  if (file.content.endsWith('\n')) lines.pop();

  if (lines.length === 0) {
    return { path: file.path, kind: 'added', isBinary: false, additions: 0, deletions: 0, hunks: [] };
  }

  const diffLines: DiffLine[] = lines.map((content, i) => ({
    kind: 'added',
    content,
    newLine: i + 1,
  }));

  return {
    path: file.path,
    kind: 'added',
    isBinary: false,
    additions: lines.length,
    deletions: 0,
    hunks: [
      {
        header: `@@ -0,0 +1,${lines.length} @@`,
        oldStart: 0,
        oldLines: 0,
        newStart: 1,
        newLines: lines.length,
        lines: diffLines,
      },
    ],
  };
}

/**
 * Detect if a buffer contains binary content.
 * Uses null byte detection (common heuristic).
 */
function detectBinary(buffer: Buffer): boolean {
  const checkLength = Math.min(buffer.length, 8192);
  for (let i = 0; i < checkLength; i++) {
    if (buffer[i] === 0) {
      return true;
    }
  }
  return false;
}
