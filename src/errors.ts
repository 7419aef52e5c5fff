export type ErrorCode =
  | 'BASELINE_NOT_FOUND'
  | 'EMPTY_CHANGE_SET'
  | 'RULE_FAULT'
  | 'RENDER_ERROR'
  | 'CONFIG_ERROR'
  | 'INPUT_ERROR';

/**
 * Base class for every error hunkcheck raises on purpose.
 * Fatal errors end the run with exit status 2.
 */
export class HunkcheckError extends Error {
  readonly code: ErrorCode;
  readonly fatal: boolean;

  constructor(code: ErrorCode, message: string, fatal: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.fatal = fatal;
  }
}

/** The comparison baseline does not resolve to a commit */
export class BaselineNotFoundError extends HunkcheckError {
  readonly baseline: string;

  constructor(baseline: string, detail?: string) {
    super(
      'BASELINE_NOT_FOUND',
      detail ? `Baseline not found: ${baseline} (${detail})` : `Baseline not found: ${baseline}`,
      true,
    );
    this.baseline = baseline;
  }
}

/** No changes exist for the requested scope. Recoverable by widening it. */
export class EmptyChangeSetError extends HunkcheckError {
  readonly baseline: string;
  readonly suggestions: readonly string[];

  constructor(baseline: string, suggestions: readonly string[]) {
    super('EMPTY_CHANGE_SET', `No changes found (${baseline})`, false);
    this.baseline = baseline;
    this.suggestions = suggestions;
  }
}

/** A rule threw while being evaluated */
export class RuleEvaluationFault extends HunkcheckError {
  readonly ruleId: string;

  constructor(ruleId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('RULE_FAULT', `Rule ${ruleId} failed: ${detail}`, false, { cause });
    this.ruleId = ruleId;
  }
}

/** The report violates its own invariants */
export class RenderError extends HunkcheckError {
  constructor(message: string) {
    super('RENDER_ERROR', message, true);
  }
}

/** Invalid configuration file or option value */
export class ConfigError extends HunkcheckError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_ERROR', message, true, options);
  }
}

/** Input could not be read (diff file, stdin, git) */
export class InputError extends HunkcheckError {
  constructor(message: string, options?: ErrorOptions) {
    super('INPUT_ERROR', message, true, options);
  }
}
