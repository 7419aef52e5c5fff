import { RuleEvaluationFault } from '../errors.js';
import { renderMessage } from '../rules/pattern.js';
import type { RuleRegistry } from '../rules/registry.js';
import { mapWithConcurrency } from '../shared/concurrency.js';
import { filterFile } from '../triage/filter.js';
import type {
  ChangeSet,
  EvaluationResult,
  FileChange,
  FileEvaluation,
  Finding,
  Hunk,
  Rule,
} from '../types.js';
import { DEFAULT_CONCURRENCY } from '../types.js';
import { classify } from './severity.js';

export interface EvaluateOptions {
  /** Files evaluated simultaneously */
  readonly concurrency?: number;
  /** Globs of files set aside before evaluation */
  readonly ignore?: readonly string[];
  /** Called once per rule fault, after it has been turned into a finding */
  readonly onRuleFault?: (fault: RuleEvaluationFault, file: FileChange) => void;
  /** Called when a file's evaluation completes */
  readonly onFileComplete?: (evaluation: FileEvaluation) => void;
}

type RuleOutcome =
  | { readonly ok: true; readonly findings: readonly Finding[] }
  | { readonly ok: false; readonly fault: RuleEvaluationFault; readonly finding: Finding };

type FileOutcome = FileEvaluation & { readonly rulesEvaluated: number; readonly faults: number };

function runRule(rule: Rule, hunk: Hunk, file: FileChange): RuleOutcome {
  try {
    const severity = classify(rule);
    const findings = rule.detect(hunk, file).map((detection) =>
      Object.freeze({
        ruleId: rule.id,
        tier: severity,
        category: rule.category,
        file: file.path,
        line: detection.line,
        message: renderMessage(rule.message, {
          match: detection.match,
          line: detection.line,
          file: file.path,
          rule: rule.id,
        }),
        ...(rule.suggestion ? { suggestion: rule.suggestion } : {}),
        evidence: detection.evidence,
      }),
    );
    return { ok: true, findings };
  } catch (err) {
    const fault = new RuleEvaluationFault(rule.id, err);
    return { ok: false, fault, finding: faultFinding(fault, rule, hunk, file) };
  }
}

/**
 * Evaluate one rule against one hunk.
 *
 * Pure: the same inputs always give the same findings. A rule that throws is
 * isolated into a single `tooling-error` finding at the hunk's first new line.
 */
export function evaluateRule(rule: Rule, hunk: Hunk, file: FileChange): readonly Finding[] {
  const outcome = runRule(rule, hunk, file);
  return outcome.ok ? outcome.findings : [outcome.finding];
}

/** The diagnostic finding a faulted rule is downgraded to */
export function faultFinding(
  fault: RuleEvaluationFault,
  rule: Rule,
  hunk: Hunk,
  file: FileChange,
): Finding {
  const finding: Finding = {
    ruleId: rule.id,
    tier: 'tooling-error',
    category: rule.category,
    file: file.path,
    line: Math.max(1, hunk.newStart),
    message: fault.message,
    evidence: hunk.header,
  };
  return Object.freeze(finding);
}

/**
 * Evaluate every rule that applies to a file against each of its hunks.
 */
export function evaluateFile(
  file: FileChange,
  rules: readonly Rule[],
  onRuleFault?: (fault: RuleEvaluationFault) => void,
): Finding[] {
  const findings: Finding[] = [];
  for (const hunk of file.hunks) {
    for (const rule of rules) {
      const outcome = runRule(rule, hunk, file);
      if (outcome.ok) {
        findings.push(...outcome.findings);
      } else {
        findings.push(outcome.finding);
        onRuleFault?.(outcome.fault);
      }
    }
  }
  return findings;
}

/**
 * Evaluate a whole change set. Files fan out over a worker pool; findings
 * come back unordered and the report builder sorts them.
 */
export async function evaluateChangeSet(
  changeSet: ChangeSet,
  registry: RuleRegistry,
  options: EvaluateOptions = {},
): Promise<EvaluationResult> {
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const ignore = options.ignore ?? [];

  const files = await mapWithConcurrency(
    changeSet.files,
    concurrency,
    async (file): Promise<FileOutcome> => {
      const filtered = filterFile(file, ignore);
      if (filtered.decision === 'skip') {
        const skipped: FileEvaluation = {
          path: file.path,
          decision: 'skip',
          reason: filtered.reason,
          ruleIds: [],
          findings: [],
        };
        options.onFileComplete?.(skipped);
        return { ...skipped, rulesEvaluated: 0, faults: 0 };
      }

      const rules = registry.rulesFor(file.path);
      let faults = 0;
      const findings = evaluateFile(file, rules, (fault) => {
        faults++;
        options.onRuleFault?.(fault, file);
      });

      const evaluation: FileEvaluation = {
        path: file.path,
        decision: 'evaluate',
        reason: filtered.reason,
        ruleIds: rules.map((rule) => rule.id),
        findings,
      };
      options.onFileComplete?.(evaluation);
      return { ...evaluation, rulesEvaluated: rules.length * file.hunks.length, faults };
    },
  );

  let rulesEvaluated = 0;
  let faults = 0;
  const findings: Finding[] = [];
  const fileEvaluations: FileEvaluation[] = [];

  for (const { rulesEvaluated: evaluated, faults: fileFaults, ...evaluation } of files) {
    rulesEvaluated += evaluated;
    faults += fileFaults;
    findings.push(...evaluation.findings);
    fileEvaluations.push(evaluation);
  }

  return { files: fileEvaluations, findings, rulesEvaluated, faults };
}
