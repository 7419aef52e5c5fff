import { minimatch } from 'minimatch';
import type {
  DiffLine,
  Detection,
  FileChange,
  Hunk,
  Rule,
  RuleCategory,
  Severity,
} from '../types.js';

/** Placeholders a message template may reference */
export const MESSAGE_PLACEHOLDERS = ['match', 'line', 'file', 'rule'] as const;

export type MessagePlaceholder = (typeof MESSAGE_PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

/** Longest matched text substituted into a message */
const MAX_MATCH_LENGTH = 80;

export interface PatternRuleDefinition {
  readonly id: string;
  readonly title: string;
  readonly category: RuleCategory;
  readonly severity: Severity;
  readonly message: string;
  readonly suggestion?: string;
  /** Checked in order; the first pattern that matches a line wins */
  readonly pattern: RegExp | readonly RegExp[];
  /** Lines matching this pattern are never reported */
  readonly exclude?: RegExp;
  /** Path globs the rule is limited to; every path when absent */
  readonly files?: readonly string[];
  /** Mask the matched text in evidence */
  readonly redact?: boolean;
}

/**
 * Build a rule that reports at most one detection per added line.
 * Global and sticky flags are dropped so matching never carries lastIndex
 * state between calls.
 */
export function patternRule(definition: PatternRuleDefinition): Rule {
  const patterns = (
    definition.pattern instanceof RegExp ? [definition.pattern] : definition.pattern
  ).map(statelessRegExp);
  const exclude = definition.exclude ? statelessRegExp(definition.exclude) : undefined;
  const globs = definition.files ?? [];

  return {
    id: definition.id,
    title: definition.title,
    category: definition.category,
    severity: definition.severity,
    message: definition.message,
    ...(definition.suggestion ? { suggestion: definition.suggestion } : {}),
    appliesTo: (path) => matchesAnyGlob(path, globs),
    detect: (hunk) => {
      const detections: Detection[] = [];
      for (const line of addedLines(hunk)) {
        if (exclude?.test(line.content)) continue;
        for (const pattern of patterns) {
          const match = pattern.exec(line.content);
          if (!match) continue;
          const text = match[0];
          detections.push({
            line: line.newLine,
            match: truncate(text.trim()),
            evidence: definition.redact ? redact(line.content, text) : line.content.trim(),
          });
          break;
        }
      }
      return detections;
    },
  };
}

/** Added lines of a hunk with their new-side line numbers */
export function addedLines(hunk: Hunk): (DiffLine & { readonly newLine: number })[] {
  const result: (DiffLine & { readonly newLine: number })[] = [];
  for (const line of hunk.lines) {
    if (line.kind === 'added' && line.newLine != null) {
      result.push({ ...line, newLine: line.newLine });
    }
  }
  return result;
}

/** True when `globs` is empty or any glob matches `path` */
export function matchesAnyGlob(path: string, globs: readonly string[]): boolean {
  if (globs.length === 0) return true;
  return globs.some((glob) => minimatch(path, glob, { dot: true, nocase: true }));
}

/**
 * Substitute `{placeholder}` values into a template.
 * Throws on a placeholder that has no value.
 */
export function renderMessage(
  template: string,
  values: Readonly<Record<MessagePlaceholder, string | number>>,
): string {
  return template.replace(PLACEHOLDER_PATTERN, (_whole, name: string) => {
    if (!isPlaceholder(name)) {
      throw new Error(`Unknown placeholder {${name}} in message template`);
    }
    return String(values[name]);
  });
}

/** Placeholders in a template that renderMessage would reject */
export function unknownPlaceholders(template: string): string[] {
  const unknown: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name != null && !isPlaceholder(name)) unknown.push(name);
  }
  return unknown;
}

function isPlaceholder(name: string): name is MessagePlaceholder {
  return (MESSAGE_PLACEHOLDERS as readonly string[]).includes(name);
}

function statelessRegExp(pattern: RegExp): RegExp {
  const flags = pattern.flags.replace(/[gy]/g, '');
  return new RegExp(pattern.source, flags);
}

function truncate(text: string): string {
  return text.length > MAX_MATCH_LENGTH ? `${text.slice(0, MAX_MATCH_LENGTH - 1)}…` : text;
}

function redact(line: string, secret: string): string {
  const masked = secret.length > 4 ? `${secret.slice(0, 4)}${'*'.repeat(8)}` : '*'.repeat(8);
  return line.replace(secret, masked).trim();
}
