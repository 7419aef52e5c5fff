import type { RuleSet } from '../../types.js';
import { patternRule } from '../pattern.js';

export const goRuleSet: RuleSet = {
  name: 'go',
  globs: ['**/*.go'],
  rules: [
    patternRule({
      id: 'correctness/ignored-error',
      title: 'Ignored error',
      category: 'correctness',
      severity: 'medium',
      pattern: [/,\s*_\s*:?=\s*[\w.]+\(/, /^\s*_\s*=\s*[\w.]+\(/],
      message: 'Returned error discarded: `{match}`',
      suggestion: 'Handle or wrap the error',
    }),
    patternRule({
      id: 'correctness/panic-call',
      title: 'Panic in code path',
      category: 'correctness',
      severity: 'medium',
      pattern: /\bpanic\s*\(/,
      message: '`panic` used for error handling',
      suggestion: 'Return an error to the caller',
    }),
    patternRule({
      id: 'maintainability/fmt-print',
      title: 'Debug print',
      category: 'maintainability',
      severity: 'low',
      pattern: /\bfmt\.Print(?:ln|f)?\s*\(/,
      message: '`{match}` left in code',
      suggestion: 'Use the structured logger',
    }),
  ],
};
