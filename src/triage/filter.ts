import { minimatch } from 'minimatch';
import type { FileChange, FilteredFile } from '../types.js';

const LOCKFILE_NAMES = [
  'package-lock.json',
  'npm-shrinkwrap.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'bun.lockb',
  'bun.lock',
  'composer.lock',
  'gemfile.lock',
  'cargo.lock',
  'poetry.lock',
  'pipfile.lock',
  'go.sum',
  'flake.lock',
];

const GENERATED_PATTERNS = [
  /^dist\//,
  /^build\//,
  /^out\//,
  /^\.next\//,
  /^\.nuxt\//,
  /^\.output\//,
  /^coverage\//,
  /\.generated\.\w+$/,
  /\.g\.\w+$/, // e.g. .g.dart, .g.ts
  /(^|\/)vendor\//,
  /(^|\/)node_modules\//,
];

const MEDIA_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.svg',
  '.ico',
  '.webp',
  '.avif',
  '.mp3',
  '.mp4',
  '.wav',
  '.ogg',
  '.webm',
  '.ttf',
  '.otf',
  '.woff',
  '.woff2',
  '.eot',
  '.pdf',
  '.zip',
  '.tar',
  '.gz',
];

/**
 * Decide whether a file is evaluated or set aside, without reading it.
 * `ignore` holds user globs from the configuration file.
 */
export function filterFile(file: FileChange, ignore: readonly string[] = []): FilteredFile {
  const skip = (reason: string): FilteredFile => ({ file, decision: 'skip', reason });

  if (file.isBinary) return skip('binary file');

  const path = file.path.toLowerCase();

  if (isLockfile(path)) return skip('lockfile');
  if (/\.min\.(js|css|html)$/.test(path)) return skip('minified file');
  if (GENERATED_PATTERNS.some((p) => p.test(path))) return skip('generated/build output');
  if (path.endsWith('.snap') || path.includes('__snapshots__/')) return skip('snapshot file');
  if (path.endsWith('.map')) return skip('source map');
  if (MEDIA_EXTENSIONS.some((ext) => path.endsWith(ext))) return skip('media/asset file');

  const ignoredBy = ignore.find((glob) => minimatch(file.path, glob, { dot: true }));
  if (ignoredBy) return skip(`ignored by ${ignoredBy}`);

  if (file.kind === 'deleted') return skip('deleted file');
  if (file.additions === 0) return skip('no added lines');

  return { file, decision: 'evaluate', reason: `${file.additions} added line(s)` };
}

function isLockfile(path: string): boolean {
  const basename = path.split('/').pop() ?? '';
  return LOCKFILE_NAMES.includes(basename);
}
