import { InputError } from '../errors.js';
import type { ChangeKind, DiffLine, FileChange, Hunk } from '../types.js';

const HUNK_HEADER_PATTERN = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse a unified diff into per-file FileChange objects.
 * Splits on `diff --git` headers and extracts metadata and numbered hunks.
 */
export function parseDiff(rawDiff: string): FileChange[] {
  const files: FileChange[] = [];

  // Split by "diff --git" headers
  const segments = rawDiff.split(/^(?=diff --git )/m);

  for (const segment of segments) {
    if (!segment.startsWith('diff --git ')) continue;

    files.push(parseFileSegment(segment));
  }

  return files;
}

function parseFileSegment(segment: string): FileChange {
  const lines = segment.replace(/\r\n/g, '\n').split('\n');
  const header = parseGitHeader(lines[0] ?? '');

  let oldPath = header.oldPath;
  let newPath = header.newPath;
  let kind: ChangeKind = 'modified';
  let isBinary = false;
  let index = 1;

  // Extended header lines up to the first hunk
  for (; index < lines.length; index++) {
    const line = lines[index] ?? '';
    if (line.startsWith('@@')) break;

    if (line.startsWith('new file mode')) kind = 'added';
    else if (line.startsWith('deleted file mode')) kind = 'deleted';
    else if (line.startsWith('rename from ')) {
      oldPath = unquotePath(line.slice('rename from '.length));
      kind = 'renamed';
    } else if (line.startsWith('rename to ')) {
      newPath = unquotePath(line.slice('rename to '.length));
      kind = 'renamed';
    } else if (line.startsWith('--- ')) {
      oldPath = stripPrefix(unquotePath(line.slice('--- '.length)), 'a/') ?? oldPath;
    } else if (line.startsWith('+++ ')) {
      newPath = stripPrefix(unquotePath(line.slice('+++ '.length)), 'b/') ?? newPath;
    } else if (/^Binary files .+ differ$/.test(line) || line === 'GIT binary patch') {
      isBinary = true;
    }
  }

  const path = kind === 'deleted' ? oldPath : newPath;

  if (isBinary) {
    return {
      path,
      ...(kind === 'renamed' ? { previousPath: oldPath } : {}),
      kind,
      isBinary: true,
      additions: 0,
      deletions: 0,
      hunks: [],
    };
  }

  const hunks: Hunk[] = [];
  while (index < lines.length) {
    const parsed = parseHunk(lines, index);
    if (!parsed) {
      index++;
      continue;
    }
    hunks.push(parsed.hunk);
    index = parsed.next;
  }

  let additions = 0;
  let deletions = 0;
  for (const hunk of hunks) {
    for (const line of hunk.lines) {
      if (line.kind === 'added') additions++;
      else if (line.kind === 'removed') deletions++;
    }
  }

  return {
    path,
    ...(kind === 'renamed' ? { previousPath: oldPath } : {}),
    kind,
    isBinary: false,
    additions,
    deletions,
    hunks,
  };
}

/**
 * Read both paths from a `diff --git` line. Either side may be quoted.
 * A header that yields no paths raises InputError rather than dropping the file.
 */
function parseGitHeader(line: string): { oldPath: string; newPath: string } {
  const rest = line.slice('diff --git '.length);
  let oldToken: string | undefined;
  let newToken: string | undefined;

  if (rest.startsWith('"')) {
    const end = closingQuote(rest, 1);
    if (end !== -1) {
      oldToken = rest.slice(0, end + 1);
      newToken = rest.slice(end + 1).trimStart();
    }
  } else if (rest.endsWith('"')) {
    // an unquoted path never contains a quote, so the first one opens the new path
    const start = rest.indexOf(' "');
    if (start !== -1) {
      oldToken = rest.slice(0, start);
      newToken = rest.slice(start + 1);
    }
  } else {
    const match = rest.match(/^(a\/.+?) (b\/.+)$/);
    oldToken = match?.[1];
    newToken = match?.[2];
  }

  const oldPath = oldToken == null ? undefined : stripPrefix(unquotePath(oldToken), 'a/');
  const newPath = newToken == null ? undefined : stripPrefix(unquotePath(newToken), 'b/');
  if (!oldPath || !newPath) {
    throw new InputError(`Unrecognized diff header: ${line}`);
  }
  return { oldPath, newPath };
}

function stripPrefix(path: string, prefix: string): string | undefined {
  return path.startsWith(prefix) ? path.slice(prefix.length) : undefined;
}

function closingQuote(value: string, from: number): number {
  for (let i = from; i < value.length; i++) {
    if (value[i] === '\\') i++;
    else if (value[i] === '"') return i;
  }
  return -1;
}

const C_ESCAPES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * Undo git's path quoting: `"src/donn\303\251es.ts"` → `src/données.ts`.
 * Octal escapes are raw bytes of a UTF-8 name. Unquoted paths pass through.
 */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    const slash = body.indexOf('\\', i);
    if (slash === -1) {
      bytes.push(...Buffer.from(body.slice(i), 'utf-8'));
      break;
    }
    bytes.push(...Buffer.from(body.slice(i, slash), 'utf-8'));

    const octal = /^[0-7]{3}/.exec(body.slice(slash + 1));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i = slash + 4;
      continue;
    }
    const next = body.charAt(slash + 1);
    const escaped = C_ESCAPES[next];
    if (escaped == null) {
      throw new InputError(`Invalid escape \\${next} in quoted path ${raw}`);
    }
    bytes.push(escaped);
    i = slash + 2;
  }
  return Buffer.from(bytes).toString('utf-8');
}

/**
 * Parse one hunk starting at `start`. The header's line counts decide where
 * the hunk ends, so blank context lines are kept.
 */
function parseHunk(
  lines: readonly string[],
  start: number,
): { hunk: Hunk; next: number } | null {
  const header = lines[start] ?? '';
  const match = HUNK_HEADER_PATTERN.exec(header);
  if (!match) return null;

  const oldStart = toInt(match[1], 0);
  const oldLines = toInt(match[2], 1);
  const newStart = toInt(match[3], 0);
  const newLines = toInt(match[4], 1);

  let oldRemaining = oldLines;
  let newRemaining = newLines;
  let oldLine = oldStart;
  let newLine = newStart;
  const hunkLines: DiffLine[] = [];
  let index = start + 1;

  while (index < lines.length && (oldRemaining > 0 || newRemaining > 0)) {
    const raw = lines[index] ?? '';
    if (raw.startsWith('\\')) {
      // "\ No newline at end of file"
      index++;
      continue;
    }
    if (raw.startsWith('diff --git ') || HUNK_HEADER_PATTERN.test(raw)) break;

    const marker = raw.charAt(0);
    const content = raw.slice(1);

    if (marker === '+') {
      hunkLines.push({ kind: 'added', content, newLine });
      newLine++;
      newRemaining--;
    } else if (marker === '-') {
      hunkLines.push({ kind: 'removed', content, oldLine });
      oldLine++;
      oldRemaining--;
    } else {
      // ' ' or a context line whose trailing space was stripped
      hunkLines.push({ kind: 'context', content, oldLine, newLine });
      oldLine++;
      newLine++;
      oldRemaining--;
      newRemaining--;
    }
    index++;
  }

  // Skip a trailing "\ No newline" marker that follows the last counted line
  while (index < lines.length && (lines[index] ?? '').startsWith('\\')) index++;

  return {
    hunk: { header, oldStart, oldLines, newStart, newLines, lines: hunkLines },
    next: index,
  };
}

function toInt(value: string | undefined, fallback: number): number {
  if (value == null) return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}
