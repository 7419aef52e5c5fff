/** Severity tier declared by a rule, highest first */
export type Severity = 'critical' | 'high' | 'medium' | 'low';

/** Tier of a finding: a severity, or a diagnostic for a rule that faulted */
export type FindingTier = Severity | 'tooling-error';

/** Checklist area a rule belongs to */
export type RuleCategory = 'security' | 'correctness' | 'performance' | 'maintainability' | 'testing';

/** All severities, highest first */
export const ALL_SEVERITIES: readonly Severity[] = ['critical', 'high', 'medium', 'low'] as const;

/** All finding tiers in rendering order */
export const ALL_TIERS: readonly FindingTier[] = [...ALL_SEVERITIES, 'tooling-error'] as const;

// ─── Stage 1: Collect ─────────────────────────────────────

export type ChangeKind = 'added' | 'modified' | 'deleted' | 'renamed';

export type DiffLineKind = 'added' | 'removed' | 'context';

/** One line of a hunk with its position on either side of the diff */
export interface DiffLine {
  readonly kind: DiffLineKind;
  readonly content: string;
  /** Line number in the old file (absent for added lines) */
  readonly oldLine?: number;
  /** Line number in the new file (absent for removed lines) */
  readonly newLine?: number;
}

/** A single `@@` hunk of a unified diff */
export interface Hunk {
  readonly header: string;
  readonly oldStart: number;
  readonly oldLines: number;
  readonly newStart: number;
  readonly newLines: number;
  readonly lines: readonly DiffLine[];
}

/** A single file extracted from a unified diff */
export interface FileChange {
  readonly path: string;
  readonly previousPath?: string;
  readonly kind: ChangeKind;
  readonly isBinary: boolean;
  readonly additions: number;
  readonly deletions: number;
  readonly hunks: readonly Hunk[];
}

/** The collection of file differences under review */
export interface ChangeSet {
  /** Human-readable description of what was compared */
  readonly baseline: string;
  readonly files: readonly FileChange[];
}

/** File read from the working tree for `--all` mode */
export interface FileContent {
  readonly path: string;
  readonly content: string;
  readonly isBinary: boolean;
}

// ─── Stage 2: Filter ──────────────────────────────────────

export type FileDecision = 'evaluate' | 'skip';

/** Filter result for a single file */
export interface FilteredFile {
  readonly file: FileChange;
  readonly decision: FileDecision;
  readonly reason: string;
}

// ─── Stage 3: Rules ───────────────────────────────────────

/** A match reported by a rule's detection predicate */
export interface Detection {
  /** New-side line number of the match */
  readonly line: number;
  /** Matched text, substituted for `{match}` in the message */
  readonly match: string;
  /** Source line the match was found on */
  readonly evidence: string;
}

/** A checklist rule. Frozen once the registry is created. */
export interface Rule {
  readonly id: string;
  readonly title: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  /** Message template; supports {match}, {line}, {file} and {rule} */
  readonly message: string;
  readonly suggestion?: string;
  readonly appliesTo: (path: string) => boolean;
  readonly detect: (hunk: Hunk, file: FileChange) => readonly Detection[];
}

/** A named group of rules selected by path globs */
export interface RuleSet {
  readonly name: string;
  /** Globs matched against the file path; an empty list matches every file */
  readonly globs: readonly string[];
  readonly rules: readonly Rule[];
}

// ─── Stage 4: Findings ────────────────────────────────────

/** One reported issue produced by matching one rule against one change */
export interface Finding {
  readonly ruleId: string;
  readonly tier: FindingTier;
  readonly category: RuleCategory;
  readonly file: string;
  readonly line: number;
  readonly message: string;
  readonly suggestion?: string;
  readonly evidence: string;
}

/** Per-file outcome of evaluation */
export interface FileEvaluation {
  readonly path: string;
  readonly decision: FileDecision;
  readonly reason: string;
  readonly ruleIds: readonly string[];
  readonly findings: readonly Finding[];
}

/** Output of evaluating a whole change set */
export interface EvaluationResult {
  readonly files: readonly FileEvaluation[];
  readonly findings: readonly Finding[];
  readonly rulesEvaluated: number;
  readonly faults: number;
}

// ─── Stage 5: Report ──────────────────────────────────────

export interface TierGroup {
  readonly tier: FindingTier;
  readonly findings: readonly Finding[];
}

export interface FileSummary {
  readonly path: string;
  readonly kind: ChangeKind;
  readonly decision: FileDecision;
  readonly reason: string;
  readonly findingCount: number;
}

export interface ReportStats {
  readonly totalFiles: number;
  readonly evaluatedFiles: number;
  readonly skippedFiles: number;
  readonly rulesEvaluated: number;
  readonly faults: number;
}

/** Severity-ordered grouping of findings for one review invocation */
export interface Report {
  readonly baseline: string;
  readonly groups: readonly TierGroup[];
  readonly counts: Readonly<Record<FindingTier, number>>;
  readonly total: number;
  readonly files: readonly FileSummary[];
  readonly stats: ReportStats;
}

export type OutputFormat = 'terminal' | 'markdown' | 'json';

export const ALL_FORMATS: readonly OutputFormat[] = ['terminal', 'markdown', 'json'] as const;

/** CLI configuration after resolving args > env > defaults */
export interface CliConfig {
  readonly cwd: string;
  readonly configPath?: string;
  readonly format: OutputFormat;
  readonly failOn: Severity;
  readonly concurrency: number;
  readonly verbose: boolean;
  readonly listRules: boolean;
}

/** Input mode for change set acquisition */
export type InputMode =
  | { readonly type: 'auto' }
  | { readonly type: 'working-tree' }
  | { readonly type: 'staged' }
  | { readonly type: 'ref'; readonly ref: string }
  | { readonly type: 'range'; readonly from: string; readonly to: string; readonly symmetric: boolean }
  | { readonly type: 'diff-file'; readonly filePath: string }
  | { readonly type: 'stdin' }
  | { readonly type: 'all'; readonly glob?: string };

/** Default output format */
export const DEFAULT_FORMAT: OutputFormat = 'terminal';

/** Default lowest severity that fails the run */
export const DEFAULT_FAIL_ON: Severity = 'high';

/** Default number of files evaluated simultaneously */
export const DEFAULT_CONCURRENCY = 4;

/** Config file looked up in the repository root when --config is not given */
export const DEFAULT_CONFIG_FILE = '.hunkcheck.json';
