import type { Detection, RuleSet } from '../../types.js';
import { addedLines, patternRule } from '../pattern.js';

const WRITE_STATEMENT = /^\s*(delete\s+from|update)\s+[\w."`[\]]+/i;

export const sqlRuleSet: RuleSet = {
  name: 'sql',
  globs: ['**/*.sql'],
  rules: [
    {
      id: 'correctness/unbounded-write',
      title: 'UPDATE or DELETE without WHERE',
      category: 'correctness',
      severity: 'high',
      message: '`{match}` statement has no WHERE clause and touches every row',
      suggestion: 'Add a WHERE clause, or TRUNCATE if every row really goes',
      appliesTo: () => true,
      // Statements may span several added lines, so the whole hunk is scanned
      detect: (hunk) => {
        const detections: Detection[] = [];
        let statement: { line: number; text: string; evidence: string } | null = null;

        for (const line of addedLines(hunk)) {
          const content = line.content.replace(/--.*$/, '');
          if (!statement) {
            if (!content.trim()) continue;
            statement = { line: line.newLine, text: '', evidence: line.content.trim() };
          }
          statement.text += ` ${content}`;
          if (content.includes(';')) {
            const detection = checkStatement(statement);
            if (detection) detections.push(detection);
            statement = null;
          }
        }

        if (statement) {
          const detection = checkStatement(statement);
          if (detection) detections.push(detection);
        }
        return detections;
      },
    },
    patternRule({
      id: 'performance/select-star',
      title: 'SELECT *',
      category: 'performance',
      severity: 'low',
      pattern: /\bselect\s+\*/i,
      message: '`{match}` reads every column',
      suggestion: 'List the columns the caller needs',
    }),
    patternRule({
      id: 'security/grant-all',
      title: 'Broad privilege grant',
      category: 'security',
      severity: 'medium',
      pattern: /\bgrant\s+all\b/i,
      message: '`{match}` grants every privilege',
      suggestion: 'Grant only the privileges the role needs',
    }),
  ],
};

function checkStatement(statement: {
  line: number;
  text: string;
  evidence: string;
}): Detection | null {
  const match = WRITE_STATEMENT.exec(statement.text);
  if (!match?.[1] || /\bwhere\b/i.test(statement.text)) return null;
  return {
    line: statement.line,
    match: match[1].toUpperCase().replace(/\s+/g, ' '),
    evidence: statement.evidence,
  };
}
