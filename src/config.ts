import { resolve } from 'node:path';
import { ConfigError } from './errors.js';
import { isSeverity } from './evaluate/severity.js';
import { parseRange } from './input/diffReader.js';
import type { CliConfig, InputMode, OutputFormat, Severity } from './types.js';
import {
  ALL_FORMATS,
  ALL_SEVERITIES,
  DEFAULT_CONCURRENCY,
  DEFAULT_FAIL_ON,
  DEFAULT_FORMAT,
} from './types.js';

export interface RawCliArgs {
  readonly baseline?: string;
  readonly workingTree?: boolean;
  readonly staged?: boolean;
  readonly all?: boolean;
  readonly glob?: string;
  readonly diffFile?: string;
  readonly stdin?: boolean;
  readonly cwd?: string;
  readonly config?: string;
  readonly format?: string;
  readonly failOn?: string;
  readonly concurrency?: number;
  readonly verbose?: boolean;
  readonly listRules?: boolean;
}

/**
 * Resolve CLI config from args > env > defaults.
 */
export function resolveConfig(args: RawCliArgs): CliConfig {
  const cwd = resolve(args.cwd ?? process.env['HUNKCHECK_CWD'] ?? process.cwd());
  const configPath = args.config ?? process.env['HUNKCHECK_CONFIG'];
  const format = resolveFormat(args.format ?? process.env['HUNKCHECK_FORMAT']);
  const failOn = resolveFailOn(args.failOn ?? process.env['HUNKCHECK_FAIL_ON']);
  const concurrency =
    args.concurrency ?? parseEnvInt('HUNKCHECK_CONCURRENCY') ?? DEFAULT_CONCURRENCY;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  return {
    cwd,
    ...(configPath ? { configPath } : {}),
    format,
    failOn,
    concurrency,
    verbose: args.verbose ?? false,
    listRules: args.listRules ?? false,
  };
}

/**
 * Determine input mode from CLI args.
 * Priority: --all > --diff-file > --stdin > --staged > baseline > --working-tree > auto
 */
export function resolveInputMode(args: RawCliArgs): InputMode {
  if (args.all) {
    return args.glob ? { type: 'all', glob: args.glob } : { type: 'all' };
  }
  if (args.glob) {
    throw new ConfigError('--glob only applies to --all');
  }
  if (args.diffFile) {
    return { type: 'diff-file', filePath: args.diffFile };
  }
  if (args.stdin) {
    return { type: 'stdin' };
  }
  if (args.staged) {
    return { type: 'staged' };
  }
  if (args.baseline) {
    const range = parseRange(args.baseline);
    if (range) {
      return { type: 'range', ...range };
    }
    return { type: 'ref', ref: args.baseline };
  }
  if (args.workingTree) {
    return { type: 'working-tree' };
  }
  // Default: auto-detect (staged → unstaged → last commit)
  return { type: 'auto' };
}

function resolveFormat(raw?: string): OutputFormat {
  if (raw == null) return DEFAULT_FORMAT;
  const format = ALL_FORMATS.find((f) => f === raw.trim().toLowerCase());
  if (!format) {
    throw new ConfigError(`Unknown format "${raw}". Available: ${ALL_FORMATS.join(', ')}`);
  }
  return format;
}

function resolveFailOn(raw?: string): Severity {
  if (raw == null) return DEFAULT_FAIL_ON;
  const value = raw.trim().toLowerCase();
  if (!isSeverity(value)) {
    throw new ConfigError(`Unknown severity "${raw}". Available: ${ALL_SEVERITIES.join(', ')}`);
  }
  return value;
}

function parseEnvInt(key: string): number | undefined {
  const val = process.env[key];
  if (val == null) return undefined;
  const num = parseInt(val, 10);
  if (isNaN(num)) return undefined;
  return num;
}
