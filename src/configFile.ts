import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { patternRule, unknownPlaceholders } from './rules/pattern.js';
import type { RuleSet } from './types.js';
import { DEFAULT_CONFIG_FILE } from './types.js';

const severitySchema = z.enum(['critical', 'high', 'medium', 'low']);

const categorySchema = z.enum(['security', 'correctness', 'performance', 'maintainability', 'testing']);

function isValidRegExp(source: string, flags?: string): boolean {
  try {
    new RegExp(source, flags);
    return true;
  } catch {
    return false;
  }
}

/** Schema for one user-defined pattern rule */
const customRuleSchema = z
  .object({
    id: z
      .string()
      .regex(/^[a-z0-9-]+\/[a-z0-9-]+$/, 'Rule ids look like "category/name"')
      .describe('Unique rule identifier'),
    title: z.string().min(1),
    category: categorySchema.default('maintainability'),
    severity: severitySchema,
    files: z.array(z.string().min(1)).default([]).describe('Path globs; every file when empty'),
    pattern: z.string().min(1).describe('Regular expression matched against added lines'),
    flags: z
      .string()
      .regex(/^[imsu]*$/, 'Only the i, m, s and u flags are allowed')
      .optional(),
    exclude: z.string().min(1).optional(),
    message: z.string().min(1),
    suggestion: z.string().optional(),
  })
  .superRefine((rule, ctx) => {
    if (!isValidRegExp(rule.pattern, rule.flags)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['pattern'], message: 'Invalid regular expression' });
    }
    if (rule.exclude != null && !isValidRegExp(rule.exclude, rule.flags)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['exclude'], message: 'Invalid regular expression' });
    }
    for (const name of unknownPlaceholders(rule.message)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['message'],
        message: `Unknown placeholder {${name}}`,
      });
    }
  });

/** Schema for the `.hunkcheck.json` file */
export const configFileSchema = z
  .object({
    ignore: z.array(z.string().min(1)).default([]),
    disable: z.array(z.string().min(1)).default([]),
    severity: z.record(z.string(), severitySchema).default({}),
    rules: z.array(customRuleSchema).default([]),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export const EMPTY_CONFIG_FILE: ConfigFile = configFileSchema.parse({});

/**
 * Load the configuration file. An explicit path must exist; without one the
 * default file in `cwd` is used when present.
 */
export function loadConfigFile(cwd: string, explicitPath?: string): ConfigFile {
  const path = resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicitPath != null) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return EMPTY_CONFIG_FILE;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse JSON in ${path}`, { cause: err });
  }

  return parseConfigFile(raw, path);
}

/** Validate an already-parsed configuration object */
export function parseConfigFile(raw: unknown, source: string): ConfigFile {
  const validated = configFileSchema.safeParse(raw);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid config in ${source}:\n${issues}`);
  }
  return validated.data;
}

/** Turn the file's custom rules into a rule set registered after the built-ins */
export function customRuleSet(config: ConfigFile): RuleSet {
  return {
    name: 'custom',
    globs: [],
    rules: config.rules.map((rule) =>
      patternRule({
        id: rule.id,
        title: rule.title,
        category: rule.category,
        severity: rule.severity,
        pattern: new RegExp(rule.pattern, rule.flags),
        ...(rule.exclude != null ? { exclude: new RegExp(rule.exclude, rule.flags) } : {}),
        files: rule.files,
        message: rule.message,
        ...(rule.suggestion != null ? { suggestion: rule.suggestion } : {}),
      }),
    ),
  };
}
