import { compareTiers, isAtLeast } from '../evaluate/severity.js';
import { RenderError } from '../errors.js';
import type {
  ChangeSet,
  EvaluationResult,
  FileSummary,
  Finding,
  FindingTier,
  Report,
  Severity,
  TierGroup,
} from '../types.js';
import { ALL_TIERS } from '../types.js';

/**
 * Total order on findings: tier, then file path, then line, then rule id.
 * Message breaks the remaining ties so the order never depends on input order.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    compareTiers(a.tier, b.tier) ||
    compareText(a.file, b.file) ||
    a.line - b.line ||
    compareText(a.ruleId, b.ruleId) ||
    compareText(a.message, b.message)
  );
}

/**
 * Build the report for one invocation. This is the join point after parallel
 * evaluation; everything downstream sees a fixed order.
 */
export function buildReport(changeSet: ChangeSet, evaluation: EvaluationResult): Report {
  const sorted = [...evaluation.findings].sort(compareFindings);

  const groups: TierGroup[] = ALL_TIERS.map((tier) => ({
    tier,
    findings: sorted.filter((f) => f.tier === tier),
  }));

  const counts = emptyCounts();
  for (const finding of sorted) {
    counts[finding.tier] += 1;
  }

  const evaluations = new Map(evaluation.files.map((f) => [f.path, f]));
  const files: FileSummary[] = changeSet.files.map((file) => {
    const evaluated = evaluations.get(file.path);
    return {
      path: file.path,
      kind: file.kind,
      decision: evaluated?.decision ?? 'skip',
      reason: evaluated?.reason ?? 'not evaluated',
      findingCount: evaluated?.findings.length ?? 0,
    };
  });

  const evaluatedFiles = files.filter((f) => f.decision === 'evaluate').length;

  return {
    baseline: changeSet.baseline,
    groups,
    counts,
    total: sorted.length,
    files,
    stats: {
      totalFiles: files.length,
      evaluatedFiles,
      skippedFiles: files.length - evaluatedFiles,
      rulesEvaluated: evaluation.rulesEvaluated,
      faults: evaluation.faults,
    },
  };
}

/**
 * Check the report's invariants. Throws RenderError when counts and groups
 * disagree or groups are out of order.
 */
export function validateReport(report: Report): void {
  let sum = 0;
  for (const tier of ALL_TIERS) {
    sum += report.counts[tier];
  }
  if (sum !== report.total) {
    throw new RenderError(`Report counts (${sum}) do not match total findings (${report.total})`);
  }

  let grouped = 0;
  let previous: FindingTier | null = null;
  for (const group of report.groups) {
    if (previous != null && compareTiers(previous, group.tier) >= 0) {
      throw new RenderError(`Tier group ${group.tier} is out of order`);
    }
    previous = group.tier;

    if (group.findings.length !== report.counts[group.tier]) {
      throw new RenderError(
        `Tier ${group.tier} groups ${group.findings.length} finding(s) but counts ${report.counts[group.tier]}`,
      );
    }
    if (group.findings.some((f) => f.tier !== group.tier)) {
      throw new RenderError(`Tier group ${group.tier} holds a finding of another tier`);
    }
    grouped += group.findings.length;
  }

  if (grouped !== report.total) {
    throw new RenderError(`Report groups ${grouped} finding(s) but total is ${report.total}`);
  }
}

/** True when any finding is at or above the fail threshold */
export function hasBlockingFindings(report: Report, failOn: Severity): boolean {
  return report.groups.some((g) => g.findings.length > 0 && isAtLeast(g.tier, failOn));
}

/** Process exit status for a rendered report */
export function exitCodeFor(report: Report, failOn: Severity): number {
  return hasBlockingFindings(report, failOn) ? 1 : 0;
}

function emptyCounts(): Record<FindingTier, number> {
  return { critical: 0, high: 0, medium: 0, low: 0, 'tooling-error': 0 };
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
