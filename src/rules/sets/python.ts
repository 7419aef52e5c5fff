import type { RuleSet } from '../../types.js';
import { patternRule } from '../pattern.js';

export const pythonRuleSet: RuleSet = {
  name: 'python',
  globs: ['**/*.{py,pyi}'],
  rules: [
    patternRule({
      id: 'correctness/python-debugger',
      title: 'Debugger breakpoint',
      category: 'correctness',
      severity: 'high',
      pattern: [/\bbreakpoint\(\)/, /\b(?:i?pdb)\.set_trace\(\)/],
      message: '`{match}` left in code',
      suggestion: 'Remove the breakpoint',
    }),
    patternRule({
      id: 'security/python-eval',
      title: 'Dynamic code evaluation',
      category: 'security',
      severity: 'high',
      pattern: /(?<![\w.])(?:eval|exec)\s*\(/,
      message: 'Dynamic code evaluation via `{match}`',
      suggestion: 'Use ast.literal_eval or explicit parsing',
    }),
    patternRule({
      id: 'security/shell-injection',
      title: 'Shell command from code',
      category: 'security',
      severity: 'high',
      pattern: [/\bshell\s*=\s*True\b/, /\bos\.system\s*\(/, /\bos\.popen\s*\(/],
      message: 'Command run through a shell: `{match}`',
      suggestion: 'Pass an argument list to subprocess without shell=True',
    }),
    patternRule({
      id: 'security/unsafe-deserialization',
      title: 'Unsafe deserialization',
      category: 'security',
      severity: 'high',
      pattern: [/\bpickle\.loads?\s*\(/, /\bmarshal\.loads?\s*\(/, /\byaml\.load\s*\(/],
      exclude: /Loader\s*=\s*(?:yaml\.)?SafeLoader/,
      message: '`{match}` can execute code from untrusted input',
      suggestion: 'Use json, or yaml.safe_load',
    }),
    patternRule({
      id: 'correctness/bare-except',
      title: 'Bare except',
      category: 'correctness',
      severity: 'medium',
      pattern: /^\s*except\s*:/,
      message: 'Bare `except:` also catches SystemExit and KeyboardInterrupt',
      suggestion: 'Catch the specific exception, or Exception',
    }),
    patternRule({
      id: 'maintainability/print-statement',
      title: 'Print statement',
      category: 'maintainability',
      severity: 'low',
      pattern: /^\s*print\s*\(/,
      message: '`print` left in code',
      suggestion: 'Use the logging module',
    }),
  ],
};
