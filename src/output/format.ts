import { validateReport } from '../report/builder.js';
import type { Finding, FindingTier, Report, TierGroup } from '../types.js';
import { ALL_SEVERITIES } from '../types.js';

/** A finding left out of the listing because it could not be formatted */
export interface OmittedFinding {
  readonly ruleId: string;
  readonly tier: FindingTier;
  readonly reason: string;
}

/** Groups ready to print plus what had to be left out */
export interface RenderPlan {
  readonly groups: readonly TierGroup[];
  readonly omitted: readonly OmittedFinding[];
}

export const TIER_TITLES: Readonly<Record<FindingTier, string>> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
  'tooling-error': 'Tooling errors',
};

/**
 * `path:line` for a finding. Throws when the location cannot be printed.
 */
export function formatLocation(finding: Finding): string {
  if (!finding.file.trim()) {
    throw new Error('finding has no file path');
  }
  if (!Number.isInteger(finding.line) || finding.line < 1) {
    throw new Error(`invalid line ${finding.line} in ${finding.file}`);
  }
  return `${finding.file}:${finding.line}`;
}

/**
 * Validate the report, then decide what each renderer prints.
 * Every severity tier is kept even when empty; the tooling-error group only
 * when it has findings. Throws RenderError on broken invariants.
 */
export function planRender(report: Report): RenderPlan {
  validateReport(report);

  const omitted: OmittedFinding[] = [];
  const groups: TierGroup[] = [];

  for (const group of report.groups) {
    const isSeverityTier = (ALL_SEVERITIES as readonly FindingTier[]).includes(group.tier);
    if (!isSeverityTier && group.findings.length === 0) continue;

    const printable: Finding[] = [];
    for (const finding of group.findings) {
      try {
        formatLocation(finding);
        printable.push(finding);
      } catch (err) {
        omitted.push({
          ruleId: finding.ruleId,
          tier: finding.tier,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }
    groups.push({ tier: group.tier, findings: printable });
  }

  return { groups, omitted };
}

/** "1 critical, 2 low" style summary of non-zero tiers */
export function summarizeCounts(report: Report): string {
  return report.groups
    .filter((g) => report.counts[g.tier] > 0)
    .map((g) =>
      g.tier === 'tooling-error'
        ? `${report.counts[g.tier]} tooling error(s)`
        : `${report.counts[g.tier]} ${g.tier}`,
    )
    .join(', ');
}
