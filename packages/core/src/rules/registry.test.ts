import { describe, it, expect } from 'vitest';
import { DuplicateRuleError } from '../errors/errors.js';
import { BUILTIN_RULES } from './catalog/index.js';
import { createLabel } from './helpers.js';
import { createDefaultRuleRegistry, RuleRegistry } from './registry.js';
import type { EscalationRule } from './types.js';

const customRule: EscalationRule = {
  id: 'custom-rule',
  description: 'Test rule',
  kind: 'escalation',
  capabilities: ['ssm:SendCommand'],
  scope: 'cross',
  evaluate: () => createLabel(customRule, 'Run a command'),
};

describe('RuleRegistry', () => {
  it('holds the built-in catalog sorted by id', () => {
    const registry = createDefaultRuleRegistry();
    const ids = registry.ids();

    expect(registry.size).toBe(BUILTIN_RULES.length);
    expect(ids).toEqual([...ids].sort());
    expect(ids).toContain('sts-assume-role');
    expect(ids).toContain('iam-create-policy-version');
  });

  it('rejects a duplicate id', () => {
    const registry = new RuleRegistry([customRule]);
    expect(() => registry.register(customRule)).toThrow(DuplicateRuleError);
    expect(() => registry.register(customRule)).toThrow("Escalation rule 'custom-rule' is already registered");
  });

  it('registers and unregisters rules', () => {
    const registry = createDefaultRuleRegistry().register(customRule);

    expect(registry.get('custom-rule')).toBe(customRule);
    expect(registry.unregister('custom-rule')).toBe(true);
    expect(registry.unregister('custom-rule')).toBe(false);
    expect(registry.has('custom-rule')).toBe(false);
  });

  it('finds rules by capability, ignoring case', () => {
    const registry = createDefaultRuleRegistry();
    expect(registry.findByCapability('iam:passrole').map(rule => rule.id)).toEqual([
      'cloudformation-create-stack',
      'ec2-run-instances',
      'lambda-create-function',
      'lambda-update-function-configuration',
    ]);
  });
});
