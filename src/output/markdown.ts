import type { Finding, Report } from '../types.js';
import { formatLocation, planRender, summarizeCounts, TIER_TITLES } from './format.js';

/**
 * Render the report as GitHub-flavored markdown, e.g. for a PR comment.
 */
export function renderMarkdown(report: Report): string {
  const plan = planRender(report);
  const s = report.stats;
  const lines: string[] = ['# hunkcheck report', '', `Baseline: \`${report.baseline}\``, ''];

  lines.push(`**Files:** ${s.totalFiles} total, ${s.evaluatedFiles} evaluated, ${s.skippedFiles} skipped`);
  lines.push('');
  lines.push(
    report.total === 0
      ? '**No findings.**'
      : `**Findings:** ${report.total} total (${summarizeCounts(report)})`,
  );
  lines.push('');

  for (const group of plan.groups) {
    lines.push(`## ${TIER_TITLES[group.tier]} (${report.counts[group.tier]})`);
    lines.push('');
    if (group.findings.length === 0) {
      lines.push('_None_');
    }
    for (const finding of group.findings) {
      lines.push(...formatFinding(finding));
    }
    lines.push('');
  }

  if (plan.omitted.length > 0) {
    lines.push(`> ${plan.omitted.length} finding(s) could not be rendered:`);
    for (const o of plan.omitted) {
      lines.push(`> - \`${o.ruleId}\` (${o.tier}): ${o.reason}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function formatFinding(finding: Finding): string[] {
  const lines = [`- \`${formatLocation(finding)}\` \`${finding.ruleId}\`: ${finding.message}`];
  if (finding.suggestion) {
    lines.push(`  - Suggestion: ${finding.suggestion}`);
  }
  return lines;
}
