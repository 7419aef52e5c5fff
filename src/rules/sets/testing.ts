import type { RuleSet } from '../../types.js';
import { patternRule } from '../pattern.js';

export const testingRuleSet: RuleSet = {
  name: 'testing',
  globs: [
    '**/*.{test,spec}.*',
    '**/__tests__/**',
    '**/test_*.py',
    '**/*_test.py',
    '**/*_test.go',
  ],
  rules: [
    patternRule({
      id: 'testing/focused-test',
      title: 'Focused test',
      category: 'testing',
      severity: 'high',
      pattern: [/\b(?:describe|it|test|context)\.only\s*\(/, /\bf(?:it|describe)\s*\(/],
      message: '`{match}` skips every other test in the suite',
      suggestion: 'Remove the focus modifier',
    }),
    patternRule({
      id: 'testing/skipped-test',
      title: 'Skipped test',
      category: 'testing',
      severity: 'low',
      pattern: [
        /\b(?:describe|it|test)\.skip\s*\(/,
        /\bx(?:it|describe)\s*\(/,
        /@pytest\.mark\.skip\b/,
        /\bt\.Skip\(/,
      ],
      message: 'Test disabled with `{match}`',
      suggestion: 'Fix the test or delete it',
    }),
  ],
};
