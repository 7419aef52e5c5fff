import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { fileURLToPath } from 'node:url';
import { EXIT_FATAL, run } from '../src/cli.js';

const fixtures = fileURLToPath(new URL('fixtures', import.meta.url));

function argv(...args: string[]): string[] {
  return ['node', 'hunkcheck', '--cwd', fixtures, ...args];
}

describe('run', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function jsonOutput(): unknown {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(logSpy.mock.calls[0]![0]));
  }

  it('fails when a finding reaches the default threshold', async () => {
    const code = await run(argv('--diff-file', 'multi-file.diff', '--format', 'json'));

    expect(code).toBe(1);
    expect(jsonOutput()).toMatchObject({
      baseline: 'file: multi-file.diff',
      total: 4,
      counts: { critical: 1, high: 0, medium: 1, low: 2, 'tooling-error': 0 },
      stats: { totalFiles: 6, evaluatedFiles: 3, skippedFiles: 3 },
    });
  });

  it('applies the config file and the fail-on option', async () => {
    const code = await run(
      argv(
        '--diff-file',
        'multi-file.diff',
        '--format',
        'json',
        '--config',
        'disable-secret.json',
        '--fail-on',
        'critical',
      ),
    );

    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({
      total: 3,
      counts: { critical: 0, high: 1, medium: 0, low: 2 },
    });
  });

  it('runs custom rules and honors ignore globs', async () => {
    await run(
      argv('--diff-file', 'multi-file.diff', '--format', 'json', '--config', 'custom-rules.json'),
    );

    const output = jsonOutput();
    expect(output).toHaveProperty('counts.high', 1);
    expect(output).toHaveProperty('groups.1.findings.0', {
      ruleId: 'custom/no-direct-compare',
      tier: 'high',
      category: 'security',
      file: 'src/auth.ts',
      line: 6,
      message: '`compare(` bypasses the timing-safe helper',
      suggestion: 'Use safeCompare',
      evidence: 'return compare(a, b);',
    });
    expect(output).toHaveProperty('stats.evaluatedFiles', 2);
  });

  it('exits cleanly with hints when there is nothing to review', async () => {
    const code = await run(argv('--diff-file', 'empty.diff'));

    expect(code).toBe(0);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Nothing to review'));
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('Provide a unified diff produced by git diff'),
    );
  });

  it('returns the fatal status for unreadable input', async () => {
    const code = await run(argv('--diff-file', 'missing.diff'));

    expect(code).toBe(EXIT_FATAL);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('InputError: Diff file not found'),
    );
  });

  it('returns the fatal status for an invalid option value', async () => {
    const code = await run(argv('--diff-file', 'multi-file.diff', '--format', 'html'));

    expect(code).toBe(EXIT_FATAL);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('ConfigError: Unknown format'));
  });

  it('returns the fatal status when an option value fails to parse', async () => {
    const code = await run(argv('--diff-file', 'multi-file.diff', '--concurrency', '0'));

    expect(code).toBe(EXIT_FATAL);
    expect(logSpy).not.toHaveBeenCalled();
    expect(process.stderr.write).toHaveBeenCalledWith(
      expect.stringContaining('Expected a positive integer.'),
    );
  });

  it('returns the fatal status for an unknown option', async () => {
    const code = await run(argv('--diff-file', 'multi-file.diff', '--bogus'));

    expect(code).toBe(EXIT_FATAL);
    expect(process.stderr.write).toHaveBeenCalledWith(
      expect.stringContaining("unknown option '--bogus'"),
    );
  });

  it('exits cleanly after printing the version', async () => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    expect(await run(argv('--version'))).toBe(0);
    expect(process.stdout.write).toHaveBeenCalledWith('0.1.0\n');
  });

  it('reviews a file whose path git quoted', async () => {
    const code = await run(argv('--diff-file', 'quoted-path.diff', '--format', 'json'));

    expect(code).toBe(1);
    expect(jsonOutput()).toHaveProperty('groups.0.findings.0.file', 'src/donn\u00e9es.ts');
  });

  it('lists the active rules', async () => {
    const code = await run(argv('--list-rules'));

    expect(code).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('security/hardcoded-secret'));
  });
});
