/**
 * Immutable rule set, built once at startup and passed by reference into
 * every evaluation.
 */

import { ConfigError } from "../errors.js";
import type { Rule } from "../types.js";

export type RuleSet = {
  /** Rules in registration order. */
  readonly rules: readonly Rule[];
  /** Every resource type at least one rule applies to. */
  readonly resourceTypes: readonly string[];
  get(name: string): Rule | undefined;
  forType(resourceType: string): readonly Rule[];
};

export function buildRuleSet(rules: readonly Rule[]): RuleSet {
  const byName = new Map<string, Rule>();
  const issues: string[] = [];

  for (const rule of rules) {
    if (byName.has(rule.name)) issues.push(`duplicate rule name "${rule.name}"`);
    if (rule.resourceTypes.length === 0) issues.push(`rule "${rule.name}" applies to no resource type`);
    byName.set(rule.name, rule);
  }
  if (issues.length > 0) throw new ConfigError("Invalid rule set", issues);

  const ordered = Object.freeze(rules.map((r) => Object.freeze(r)));
  const resourceTypes = Object.freeze([...new Set(ordered.flatMap((r) => r.resourceTypes))]);
  const byType = new Map<string, readonly Rule[]>();
  for (const type of resourceTypes) {
    byType.set(type, Object.freeze(ordered.filter((r) => r.resourceTypes.includes(type))));
  }

  return Object.freeze({
    rules: ordered,
    resourceTypes,
    get: (name: string) => byName.get(name),
    forType: (resourceType: string) => byType.get(resourceType) ?? [],
  });
}
