import type { RuleSet } from '../../types.js';
import { patternRule } from '../pattern.js';

export const shellRuleSet: RuleSet = {
  name: 'shell',
  globs: ['**/*.{sh,bash,zsh}'],
  rules: [
    patternRule({
      id: 'security/curl-pipe-shell',
      title: 'Remote script piped to shell',
      category: 'security',
      severity: 'high',
      pattern: /\b(?:curl|wget)\b[^|]*\|\s*(?:sudo\s+)?(?:ba|z)?sh\b/,
      message: 'Downloaded script executed without verification',
      suggestion: 'Download, verify a checksum, then run',
    }),
    patternRule({
      id: 'correctness/rm-rf-variable',
      title: 'Recursive delete of a variable path',
      category: 'correctness',
      severity: 'high',
      pattern: /\brm\s+-[a-zA-Z]*r[a-zA-Z]*\s+["']?\$/,
      message: '`{match}` deletes whatever the variable expands to',
      suggestion: 'Guard with ${VAR:?} so an empty value aborts',
    }),
  ],
};

export const dockerRuleSet: RuleSet = {
  name: 'dockerfile',
  globs: ['**/Dockerfile', '**/Dockerfile.*', '**/*.dockerfile'],
  rules: [
    patternRule({
      id: 'security/unpinned-base-image',
      title: 'Unpinned base image',
      category: 'security',
      severity: 'medium',
      pattern: /^\s*FROM\s+(?:--platform=\S+\s+)?[^\s:@]+(?::latest)?(?:\s+AS\s+\S+)?\s*$/i,
      exclude: /^\s*FROM\s+scratch\b/i,
      message: 'Base image without a pinned tag: `{match}`',
      suggestion: 'Pin a version tag or digest',
    }),
    patternRule({
      id: 'security/remote-add',
      title: 'ADD from URL',
      category: 'security',
      severity: 'low',
      pattern: /^\s*ADD\s+https?:\/\//i,
      message: 'ADD fetches a remote file without verification',
      suggestion: 'Use RUN curl with checksum verification',
    }),
  ],
};
