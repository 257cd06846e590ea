/**
 * Rule Registry
 *
 * Open catalog of escalation rules keyed by id. The engine asks the
 * registry for the rule list; adding a technique never touches the engine.
 */

import { DuplicateRuleError } from '../errors/errors.js';
import { compareStrings } from '../utils/sort.js';
import { BUILTIN_RULES } from './catalog/index.js';
import type { EscalationRule } from './types.js';

export class RuleRegistry {
  private readonly rules = new Map<string, EscalationRule>();

  constructor(rules: Iterable<EscalationRule> = []) {
    for (const rule of rules) {
      this.register(rule);
    }
  }

  /**
   * Add a rule. Ids are unique.
   */
  register(rule: EscalationRule): this {
    if (this.rules.has(rule.id)) {
      throw new DuplicateRuleError(rule.id);
    }
    this.rules.set(rule.id, rule);
    return this;
  }

  unregister(ruleId: string): boolean {
    return this.rules.delete(ruleId);
  }

  get(ruleId: string): EscalationRule | undefined {
    return this.rules.get(ruleId);
  }

  has(ruleId: string): boolean {
    return this.rules.has(ruleId);
  }

  /**
   * All rules, sorted by id
   */
  list(): EscalationRule[] {
    return [...this.rules.values()].sort((a, b) => compareStrings(a.id, b.id));
  }

  ids(): string[] {
    return this.list().map(rule => rule.id);
  }

  /**
   * Rules relying on the given action
   */
  findByCapability(action: string): EscalationRule[] {
    const wanted = action.toLowerCase();
    return this.list().filter(rule => rule.capabilities.some(capability => capability.toLowerCase() === wanted));
  }

  get size(): number {
    return this.rules.size;
  }
}

/**
 * Registry holding the built-in catalog
 */
export function createDefaultRuleRegistry(): RuleRegistry {
  return new RuleRegistry(BUILTIN_RULES);
}
