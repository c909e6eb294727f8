/**
 * Rule library — builds the startup rule set from configuration entries.
 */

import type { RuleEntry } from "../config.js";
import { ConfigError } from "../errors.js";
import type { Rule } from "../types.js";
import { createIamPolicyRequiredRule } from "./iam.js";
import { createNoOpenPortRule } from "./network.js";
import { buildRuleSet, type RuleSet } from "./ruleset.js";
import { createRequiredTagsRule } from "./tags.js";

export type RuleFactory = (params: unknown, name?: string) => Rule;

export const RULE_LIBRARY: Readonly<Record<string, RuleFactory>> = Object.freeze({
  "no-open-port": createNoOpenPortRule,
  "iam-policy-required": createIamPolicyRequiredRule,
  "required-tags": createRequiredTagsRule,
});

function withoutRemediation(rule: Rule): Rule {
  const { remediation: _unbound, ...rest } = rule;
  return rest;
}

export function createRule(entry: RuleEntry): Rule {
  const factory = Object.prototype.hasOwnProperty.call(RULE_LIBRARY, entry.use) ? RULE_LIBRARY[entry.use] : undefined;
  if (!factory) {
    throw new ConfigError(`Unknown rule "${entry.use}"`, [`available: ${Object.keys(RULE_LIBRARY).join(", ")}`]);
  }
  const rule = factory(entry.parameters ?? {}, entry.name);
  return entry.remediate ? rule : withoutRemediation(rule);
}

export function buildRuleSetFromConfig(entries: readonly RuleEntry[]): RuleSet {
  return buildRuleSet(entries.map(createRule));
}
