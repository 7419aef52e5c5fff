import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createSpinner } from 'nanospinner';
import pc from 'picocolors';
import { resolveConfig, resolveInputMode } from './config.js';
import type { RawCliArgs } from './config.js';
import { loadConfigFile } from './configFile.js';
import { EmptyChangeSetError, HunkcheckError } from './errors.js';
import { evaluateChangeSet } from './evaluate/evaluator.js';
import { collectChangeSet } from './input/index.js';
import { renderReport } from './output/index.js';
import { buildReport, exitCodeFor } from './report/builder.js';
import { buildRegistry } from './rules/index.js';
import type { RuleRegistry } from './rules/registry.js';
import type { ChangeSet } from './types.js';
import { ALL_FORMATS, ALL_SEVERITIES } from './types.js';

/** Exit status for fatal errors */
export const EXIT_FATAL = 2;

// A type alias, so commander's opts<T extends OptionValues>() accepts it
type CommandOptions = {
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
};

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Run the hunkcheck CLI and return the process exit status.
 *
 * Pipeline: collect diff → filter → select rules → evaluate → report → render
 */
export async function run(argv: string[]): Promise<number> {
  const program = new Command()
    .name('hunkcheck')
    .description('Apply a code-review checklist to a git diff and report findings by severity')
    .version('0.1.0')
    .argument('[baseline]', 'Branch, commit, or range (a..b, a...b) to compare against')
    .option('--working-tree', 'Review the working tree against HEAD')
    .option('--staged', 'Review staged changes only')
    .option('--all', 'Review every tracked file')
    .option('--glob <pattern>', 'Restrict --all to matching paths')
    .option('--diff-file <path>', 'Read a unified diff from a file')
    .option('--stdin', 'Read a unified diff from stdin')
    .option('--cwd <dir>', 'Repository root (default: current directory)')
    .option('--config <path>', 'Config file (default: .hunkcheck.json in the repository root)')
    .option('--format <format>', `Output format (${ALL_FORMATS.join(', ')})`)
    .option('--fail-on <severity>', `Lowest severity that fails the run (${ALL_SEVERITIES.join(', ')})`)
    .option('--concurrency <n>', 'Files evaluated simultaneously', parsePositiveInt)
    .option('--verbose', 'Show per-file rule selection and skip reasons')
    .option('--list-rules', 'Print the active rules and exit')
    .exitOverride();

  try {
    program.parse(argv);
  } catch (err) {
    // commander has already printed help, the version or the usage error
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : EXIT_FATAL;
    }
    throw err;
  }

  const opts = program.opts<CommandOptions>();
  const args: RawCliArgs = { ...opts, baseline: program.args[0] };

  try {
    return await execute(args);
  } catch (err) {
    if (err instanceof EmptyChangeSetError) {
      console.error(pc.yellow('Nothing to review. Widen the scope:'));
      for (const suggestion of err.suggestions) {
        console.error(pc.dim(`  - ${suggestion}`));
      }
      return 0;
    }
    if (err instanceof HunkcheckError && err.fatal) {
      console.error(pc.red(`${err.name}: ${err.message}`));
      return EXIT_FATAL;
    }
    throw err;
  }
}

async function execute(args: RawCliArgs): Promise<number> {
  const config = resolveConfig(args);
  const inputMode = resolveInputMode(args);
  const configFile = loadConfigFile(config.cwd, config.configPath);
  const registry = buildRegistry(configFile);

  if (config.listRules) {
    console.log(formatRuleList(registry));
    return 0;
  }

  // ─── Stage 1: Collect ─────────────────────────────────────

  const collectSpinner = createSpinner('Collecting changes...', { stream: process.stderr }).start();

  let changeSet: ChangeSet;
  try {
    changeSet = collectChangeSet(inputMode, config.cwd);
  } catch (err) {
    const text = err instanceof Error ? err.message : String(err);
    if (err instanceof EmptyChangeSetError) {
      collectSpinner.warn({ text });
    } else {
      collectSpinner.error({ text });
    }
    throw err;
  }

  const hunkCount = changeSet.files.reduce((n, f) => n + f.hunks.length, 0);
  collectSpinner.success({
    text: `Collected ${changeSet.files.length} file(s), ${hunkCount} hunk(s) (${changeSet.baseline})`,
  });

  // ─── Stage 2: Evaluate ────────────────────────────────────

  const evaluateSpinner = createSpinner('Evaluating rules...', { stream: process.stderr }).start();

  let completed = 0;
  const evaluation = await evaluateChangeSet(changeSet, registry, {
    concurrency: config.concurrency,
    ignore: configFile.ignore,
    onFileComplete: (file) => {
      completed++;
      evaluateSpinner.update({
        text: `Evaluating rules... ${completed}/${changeSet.files.length} ${pc.dim(file.path)}`,
      });
    },
  });

  const evaluatedCount = evaluation.files.filter((f) => f.decision === 'evaluate').length;
  evaluateSpinner.success({
    text:
      `Evaluated ${evaluatedCount} file(s), ${evaluation.rulesEvaluated} rule run(s)` +
      (evaluation.faults > 0 ? pc.yellow(`, ${evaluation.faults} rule fault(s)`) : ''),
  });

  if (config.verbose) {
    for (const file of evaluation.files) {
      const icon = file.decision === 'evaluate' ? pc.green('E') : pc.dim('S');
      console.error(`  ${icon} ${file.path} ${pc.dim(`(${file.reason})`)}`);
      if (file.ruleIds.length > 0) {
        console.error(pc.dim(`      rules: ${file.ruleIds.join(', ')}`));
      }
    }
  }

  // ─── Stage 3: Report ──────────────────────────────────────

  const report = buildReport(changeSet, evaluation);
  console.log(renderReport(report, config.format, { verbose: config.verbose }));

  return exitCodeFor(report, config.failOn);
}

function formatRuleList(registry: RuleRegistry): string {
  const lines: string[] = [];
  for (const set of registry.sets) {
    if (set.rules.length === 0) continue;
    const scope = set.globs.length === 0 ? 'all files' : set.globs.join(', ');
    lines.push(`${pc.bold(set.name)} ${pc.dim(`(${scope})`)}`);
    for (const rule of set.rules) {
      lines.push(`  ${rule.severity.padEnd(8)} ${rule.id.padEnd(40)} ${pc.dim(rule.title)}`);
    }
    lines.push('');
  }
  return lines.join('\n');
}
