import type { RuleSet } from '../../types.js';
import { patternRule } from '../pattern.js';

export const javascriptRuleSet: RuleSet = {
  name: 'javascript',
  globs: ['**/*.{js,jsx,mjs,cjs,ts,tsx,mts,cts,vue,svelte}'],
  rules: [
    patternRule({
      id: 'correctness/debugger-statement',
      title: 'Debugger statement',
      category: 'correctness',
      severity: 'high',
      pattern: /^\s*debugger\s*;?\s*$/,
      message: '`debugger` left in code',
      suggestion: 'Remove the statement',
    }),
    patternRule({
      id: 'security/dynamic-eval',
      title: 'Dynamic code evaluation',
      category: 'security',
      severity: 'high',
      pattern: [/\beval\s*\(/, /\bnew\s+Function\s*\(/],
      message: 'Dynamic code evaluation via `{match}`',
      suggestion: 'Parse the input or dispatch through a lookup table instead',
    }),
    patternRule({
      id: 'security/raw-html-injection',
      title: 'Raw HTML injection',
      category: 'security',
      severity: 'high',
      pattern: [/\.(?:innerHTML|outerHTML)\s*=(?!=)/, /\bdangerouslySetInnerHTML\b/, /\bdocument\.write\s*\(/],
      message: 'HTML written without escaping via `{match}`',
      suggestion: 'Use textContent or sanitize the markup first',
    }),
    patternRule({
      id: 'correctness/loose-equality',
      title: 'Loose equality',
      category: 'correctness',
      severity: 'medium',
      pattern: /(?<![=!<>])(?:==|!=)(?!=)/,
      exclude: /[!=]=\s*null\b/,
      message: 'Loose comparison `{match}` coerces its operands',
      suggestion: 'Use === or !==',
    }),
    patternRule({
      id: 'maintainability/console-output',
      title: 'Console output',
      category: 'maintainability',
      severity: 'low',
      pattern: /\bconsole\.(?:log|debug|trace)\s*\(/,
      message: '`{match}` left in code',
      suggestion: 'Remove it or route through the project logger',
    }),
  ],
};

export const typescriptRuleSet: RuleSet = {
  name: 'typescript',
  globs: ['**/*.{ts,tsx,mts,cts}'],
  rules: [
    patternRule({
      id: 'correctness/ts-suppression',
      title: 'Type checking suppressed',
      category: 'correctness',
      severity: 'medium',
      pattern: /@ts-(?:ignore|nocheck)\b/,
      message: '`{match}` hides type errors',
      suggestion: 'Fix the type error, or use @ts-expect-error with a reason',
    }),
    patternRule({
      id: 'maintainability/explicit-any',
      title: 'Explicit any',
      category: 'maintainability',
      severity: 'medium',
      pattern: /(?::\s*any\b|\bas\s+any\b|<any>|\bany\[\])/,
      message: 'Explicit `any` (`{match}`) turns off type checking',
      suggestion: 'Use unknown and narrow, or name the real type',
    }),
  ],
};
