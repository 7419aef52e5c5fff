import type { Detection, RuleSet } from '../../types.js';
import { addedLines, patternRule } from '../pattern.js';

/** Added lines longer than this are reported */
export const MAX_LINE_LENGTH = 200;

const SECRET_ASSIGNMENT =
  /(?:api[_-]?key|secret|token|password|passwd|pwd|credential)[a-z0-9_-]*["']?\s*[:=]\s*["'][^"'\s]{8,}["']/i;
const AWS_ACCESS_KEY = /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/;
const BEARER_TOKEN = /\bBearer\s+[A-Za-z0-9._~+/-]{20,}=*/;
const SECRET_PLACEHOLDER = /(?:example|placeholder|changeme|your[_-]|<[^>]+>|\$\{|process\.env|os\.environ|getenv)/i;

/** Rules applied to every text file */
export const baseRuleSet: RuleSet = {
  name: 'base',
  globs: [],
  rules: [
    patternRule({
      id: 'security/hardcoded-secret',
      title: 'Hardcoded secret',
      category: 'security',
      severity: 'critical',
      pattern: [SECRET_ASSIGNMENT, AWS_ACCESS_KEY, BEARER_TOKEN],
      exclude: SECRET_PLACEHOLDER,
      redact: true,
      message: 'Secret-like value committed at {file}:{line}',
      suggestion: 'Load the value from the environment or a secret manager and rotate the exposed credential',
    }),
    patternRule({
      id: 'security/private-key',
      title: 'Private key material',
      category: 'security',
      severity: 'critical',
      pattern: /-----BEGIN (?:[A-Z]+ )?PRIVATE KEY-----/,
      message: 'Private key committed in {file}',
      suggestion: 'Remove the key from history and issue a new one',
    }),
    patternRule({
      id: 'correctness/merge-conflict-marker',
      title: 'Merge conflict marker',
      category: 'correctness',
      severity: 'high',
      pattern: /^(?:<{7}|>{7})(?: |$)/,
      message: 'Unresolved merge conflict marker `{match}`',
      suggestion: 'Resolve the conflict and remove the marker lines',
    }),
    patternRule({
      id: 'security/tls-verification-disabled',
      title: 'TLS verification disabled',
      category: 'security',
      severity: 'high',
      pattern: [
        /\brejectUnauthorized\s*:\s*false\b/,
        /\bNODE_TLS_REJECT_UNAUTHORIZED\s*=\s*["']?0/,
        /\bverify\s*=\s*False\b/,
        /\bInsecureSkipVerify\s*:\s*true\b/,
        /\bcurl\b.*\s(?:-k|--insecure)\b/,
      ],
      message: 'Certificate verification is turned off: `{match}`',
      suggestion: 'Keep verification on and trust the required CA explicitly',
    }),
    patternRule({
      id: 'security/insecure-http-url',
      title: 'Plain HTTP URL',
      category: 'security',
      severity: 'medium',
      pattern: /\bhttp:\/\/(?!localhost\b|127\.0\.0\.1\b|0\.0\.0\.0\b|\[::1\])[\w.-]+/,
      exclude: /xmlns|www\.w3\.org|schemas\./,
      message: 'Unencrypted URL `{match}`',
      suggestion: 'Use https',
    }),
    patternRule({
      id: 'maintainability/todo-comment',
      title: 'Unresolved TODO',
      category: 'maintainability',
      severity: 'low',
      pattern: /\b(?:TODO|FIXME|XXX|HACK)\b/,
      message: '{match} marker added',
      suggestion: 'Resolve it or link a tracked issue',
    }),
    {
      id: 'maintainability/long-line',
      title: 'Overlong line',
      category: 'maintainability',
      severity: 'low',
      message: `Line {line} is longer than ${MAX_LINE_LENGTH} characters`,
      appliesTo: () => true,
      detect: (hunk) => {
        const detections: Detection[] = [];
        for (const line of addedLines(hunk)) {
          if (line.content.length > MAX_LINE_LENGTH) {
            detections.push({
              line: line.newLine,
              match: `${line.content.length} characters`,
              evidence: `${line.content.slice(0, 60).trim()}…`,
            });
          }
        }
        return detections;
      },
    },
  ],
};
