import { describe, it, expect } from 'vitest';
import { parseConfigFile } from '../src/configFile.js';
import { ConfigError } from '../src/errors.js';
import { buildRegistry, createRuleRegistry, patternRule } from '../src/rules/index.js';
import type { RuleSet } from '../src/types.js';

function ruleSet(name: string, globs: string[], ids: string[]): RuleSet {
  return {
    name,
    globs,
    rules: ids.map((id) =>
      patternRule({ id, title: id, category: 'maintainability', severity: 'low', pattern: /x/, message: id }),
    ),
  };
}

describe('createRuleRegistry', () => {
  const sets = [
    ruleSet('base', [], ['base/one', 'base/two']),
    ruleSet('ts', ['**/*.ts'], ['ts/one']),
    ruleSet('tests', ['**/*.test.ts'], ['tests/one']),
  ];

  it('returns base rules first, then matching sets in registration order', () => {
    const registry = createRuleRegistry({ sets });
    expect(registry.rulesFor('src/a.test.ts').map((r) => r.id)).toEqual([
      'base/one',
      'base/two',
      'ts/one',
      'tests/one',
    ]);
    expect(registry.rulesFor('README.md').map((r) => r.id)).toEqual(['base/one', 'base/two']);
  });

  it('lists every rule', () => {
    expect(createRuleRegistry({ sets }).allRules()).toHaveLength(4);
  });

  it('rejects duplicate rule ids across sets', () => {
    const duplicate = [...sets, ruleSet('again', [], ['ts/one'])];
    expect(() => createRuleRegistry({ sets: duplicate })).toThrow(
      new ConfigError('Duplicate rule id: ts/one'),
    );
  });

  it('drops disabled rules', () => {
    const registry = createRuleRegistry({ sets, disable: ['base/two'] });
    expect(registry.rulesFor('a.ts').map((r) => r.id)).toEqual(['base/one', 'ts/one']);
  });

  it('applies severity overrides', () => {
    const registry = createRuleRegistry({ sets, severity: { 'ts/one': 'critical' } });
    expect(registry.rulesFor('a.ts').find((r) => r.id === 'ts/one')!.severity).toBe('critical');
    expect(sets[1]!.rules[0]!.severity).toBe('low');
  });

  it('rejects unknown ids in disable and severity', () => {
    expect(() => createRuleRegistry({ sets, disable: ['nope/rule'] })).toThrow(
      'Unknown rule id in configuration: nope/rule',
    );
    expect(() => createRuleRegistry({ sets, severity: { 'nope/rule': 'high' } })).toThrow(ConfigError);
  });

  it('freezes the snapshot', () => {
    const registry = createRuleRegistry({ sets });
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.sets)).toBe(true);
    expect(Object.isFrozen(registry.allRules()[0])).toBe(true);
  });
});

describe('buildRegistry', () => {
  it('registers custom rules after the built-ins', () => {
    const config = parseConfigFile(
      {
        rules: [
          {
            id: 'custom/no-foo',
            title: 'No foo',
            severity: 'medium',
            pattern: 'foo',
            message: 'foo',
          },
        ],
      },
      'test',
    );
    const ids = buildRegistry(config)
      .rulesFor('src/a.ts')
      .map((r) => r.id);
    expect(ids[0]).toBe('security/hardcoded-secret');
    expect(ids[ids.length - 1]).toBe('custom/no-foo');
  });

  it('applies the config file disable list and severity overrides', () => {
    const config = parseConfigFile(
      {
        disable: ['maintainability/todo-comment'],
        severity: { 'maintainability/long-line': 'medium' },
      },
      'test',
    );
    const rules = buildRegistry(config).rulesFor('notes.txt');
    expect(rules.map((r) => r.id)).not.toContain('maintainability/todo-comment');
    expect(rules.find((r) => r.id === 'maintainability/long-line')!.severity).toBe('medium');
  });

  it('fails on a custom rule that reuses a built-in id', () => {
    const config = parseConfigFile(
      {
        rules: [
          {
            id: 'security/private-key',
            title: 'Again',
            severity: 'low',
            pattern: 'x',
            message: 'x',
          },
        ],
      },
      'test',
    );
    expect(() => buildRegistry(config)).toThrow('Duplicate rule id: security/private-key');
  });
});
