import pc from 'picocolors';
import type { FileDecision, Finding, FindingTier, Report } from '../types.js';
import { planRender, formatLocation, summarizeCounts, TIER_TITLES } from './format.js';
import type { OmittedFinding } from './format.js';

type Colors = ReturnType<typeof pc.createColors>;

export interface TerminalOptions {
  readonly color?: boolean;
  readonly verbose?: boolean;
}

const DIVIDER = '─'.repeat(70);

function tierLabels(c: Colors): Record<FindingTier, string> {
  return {
    critical: c.bgRed(c.white(c.bold(' CRIT '))),
    high: c.bgMagenta(c.white(c.bold(' HIGH '))),
    medium: c.bgYellow(c.black(c.bold(' MED  '))),
    low: c.bgCyan(c.black(c.bold(' LOW  '))),
    'tooling-error': c.bgWhite(c.black(c.bold(' TOOL '))),
  };
}

function decisionIcons(c: Colors): Record<FileDecision, string> {
  return {
    evaluate: c.green('E'),
    skip: c.dim('S'),
  };
}

/**
 * Render the report for a terminal. Colors follow picocolors' detection
 * unless `color` is given.
 */
export function renderTerminal(report: Report, options: TerminalOptions = {}): string {
  const c = pc.createColors(options.color ?? pc.isColorSupported);
  const plan = planRender(report);
  const labels = tierLabels(c);
  const lines: string[] = [];

  lines.push('');
  lines.push(c.bold(c.underline('hunkcheck report')));
  lines.push(c.dim(`Baseline: ${report.baseline}`));
  lines.push('');

  const s = report.stats;
  lines.push(c.bold('Summary'));
  lines.push(c.dim(DIVIDER));
  lines.push(
    `  Files: ${s.totalFiles} total, ${c.green(`${s.evaluatedFiles} evaluated`)}, ` +
      `${c.dim(`${s.skippedFiles} skipped`)}`,
  );
  if (report.total === 0) {
    lines.push(`  ${c.green('No findings.')}`);
  } else {
    lines.push(`  Findings: ${report.total} total (${summarizeCounts(report)})`);
  }
  lines.push('');

  for (const group of plan.groups) {
    lines.push(`${labels[group.tier]} ${c.bold(TIER_TITLES[group.tier])} (${report.counts[group.tier]})`);
    lines.push(c.dim(DIVIDER));
    if (group.findings.length === 0) {
      lines.push(c.dim('  None'));
    }
    for (const finding of group.findings) {
      lines.push(...formatFinding(finding, c));
    }
    lines.push('');
  }

  if (plan.omitted.length > 0) {
    lines.push(...formatOmitted(plan.omitted, c));
  }

  if (options.verbose) {
    lines.push(...formatFiles(report, c));
  }

  return lines.join('\n');
}

function formatFinding(finding: Finding, c: Colors): string[] {
  const lines = [`  ${c.underline(formatLocation(finding))} ${c.dim(finding.ruleId)}`];
  lines.push(`    ${finding.message}`);
  if (finding.evidence) {
    lines.push(`    ${c.dim('>')} ${finding.evidence}`);
  }
  if (finding.suggestion) {
    lines.push(`    ${c.dim('->')} ${c.green(finding.suggestion)}`);
  }
  return lines;
}

function formatOmitted(omitted: readonly OmittedFinding[], c: Colors): string[] {
  const lines = [c.bold(c.yellow(`Could not render ${omitted.length} finding(s)`))];
  lines.push(c.dim(DIVIDER));
  for (const o of omitted) {
    lines.push(`  ${o.ruleId} (${o.tier}): ${o.reason}`);
  }
  lines.push('');
  return lines;
}

function formatFiles(report: Report, c: Colors): string[] {
  const icons = decisionIcons(c);
  const lines = [c.bold('Files'), c.dim(DIVIDER)];
  for (const file of report.files) {
    const path = file.decision === 'skip' ? c.dim(file.path) : file.path;
    lines.push(`  ${icons[file.decision]} ${path} ${c.dim(`(${file.kind}, ${file.reason})`)}`);
  }
  lines.push(
    c.dim(`  ${report.stats.rulesEvaluated} rule evaluation(s), ${report.stats.faults} fault(s)`),
  );
  lines.push('');
  return lines;
}
