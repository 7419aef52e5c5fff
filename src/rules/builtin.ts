import type { RuleSet } from '../types.js';
import { baseRuleSet } from './sets/base.js';
import { goRuleSet } from './sets/go.js';
import { javascriptRuleSet, typescriptRuleSet } from './sets/javascript.js';
import { pythonRuleSet } from './sets/python.js';
import { dockerRuleSet, shellRuleSet } from './sets/shell.js';
import { sqlRuleSet } from './sets/sql.js';
import { testingRuleSet } from './sets/testing.js';

/** Built-in rule sets in registration order; base first */
export const BUILTIN_RULE_SETS: readonly RuleSet[] = [
  baseRuleSet,
  javascriptRuleSet,
  typescriptRuleSet,
  pythonRuleSet,
  goRuleSet,
  sqlRuleSet,
  shellRuleSet,
  dockerRuleSet,
  testingRuleSet,
];

export {
  baseRuleSet,
  goRuleSet,
  javascriptRuleSet,
  typescriptRuleSet,
  pythonRuleSet,
  dockerRuleSet,
  shellRuleSet,
  sqlRuleSet,
  testingRuleSet,
};
