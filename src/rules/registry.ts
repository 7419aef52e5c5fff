import { ConfigError } from '../errors.js';
import type { Rule, RuleSet, Severity } from '../types.js';
import { matchesAnyGlob } from './pattern.js';

/** Options for building a registry snapshot */
export interface RegistryOptions {
  readonly sets: readonly RuleSet[];
  /** Rule ids removed from every lookup */
  readonly disable?: readonly string[];
  /** Declared severity replacements, applied before the rules are frozen */
  readonly severity?: Readonly<Record<string, Severity>>;
}

/**
 * Immutable mapping from a file path to the ordered rules that apply to it.
 */
export interface RuleRegistry {
  readonly sets: readonly RuleSet[];
  /** Base set first, then matching sets in registration order */
  rulesFor(path: string): readonly Rule[];
  /** Every enabled rule, in registration order */
  allRules(): readonly Rule[];
}

/**
 * Create a registry snapshot. Rule ids must be unique across sets; ids named
 * in `disable` or `severity` must exist.
 */
export function createRuleRegistry(options: RegistryOptions): RuleRegistry {
  const disabled = new Set(options.disable ?? []);
  const overrides = options.severity ?? {};
  const seen = new Set<string>();

  for (const set of options.sets) {
    for (const rule of set.rules) {
      if (seen.has(rule.id)) {
        throw new ConfigError(`Duplicate rule id: ${rule.id}`);
      }
      seen.add(rule.id);
    }
  }

  for (const id of [...disabled, ...Object.keys(overrides)]) {
    if (!seen.has(id)) {
      throw new ConfigError(`Unknown rule id in configuration: ${id}`);
    }
  }

  const sets: readonly RuleSet[] = Object.freeze(
    options.sets.map((set) =>
      Object.freeze({
        name: set.name,
        globs: Object.freeze([...set.globs]),
        rules: Object.freeze(
          set.rules
            .filter((rule) => !disabled.has(rule.id))
            .map((rule) => {
              const severity = overrides[rule.id];
              return Object.freeze(severity ? { ...rule, severity } : { ...rule });
            }),
        ),
      }),
    ),
  );

  const all: readonly Rule[] = Object.freeze(sets.flatMap((set) => set.rules));

  return Object.freeze({
    sets,
    rulesFor(path: string): readonly Rule[] {
      const rules: Rule[] = [];
      for (const set of sets) {
        if (!matchesAnyGlob(path, set.globs)) continue;
        for (const rule of set.rules) {
          if (rule.appliesTo(path)) rules.push(rule);
        }
      }
      return rules;
    },
    allRules(): readonly Rule[] {
      return all;
    },
  });
}
