import type { ConfigFile } from '../configFile.js';
import { customRuleSet } from '../configFile.js';
import { BUILTIN_RULE_SETS } from './builtin.js';
import { createRuleRegistry } from './registry.js';
import type { RuleRegistry } from './registry.js';

/**
 * Registry snapshot for one run: built-in sets, then the config file's
 * custom rules, with its disable list and severity overrides applied.
 */
export function buildRegistry(config: ConfigFile): RuleRegistry {
  return createRuleRegistry({
    sets: [...BUILTIN_RULE_SETS, customRuleSet(config)],
    disable: config.disable,
    severity: config.severity,
  });
}

export { BUILTIN_RULE_SETS } from './builtin.js';
export { createRuleRegistry } from './registry.js';
export type { RegistryOptions, RuleRegistry } from './registry.js';
export { patternRule, renderMessage, addedLines, matchesAnyGlob } from './pattern.js';
export type { PatternRuleDefinition } from './pattern.js';
