/**
 * Rule Evaluator
 *
 * Applies every rule whose resource-type filter matches a snapshot and
 * returns one verdict per rule, in registration order. A predicate that reads
 * an absent attribute yields NOT_APPLICABLE; a predicate that throws is
 * logged and also yields NOT_APPLICABLE, without affecting the other rules.
 */

import { EvaluationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { isoNow, systemClock, type Clock } from "../retry.js";
import type { AttributeReader, Compliance, ResourceSnapshot, Rule, RuleResult, Verdict } from "../types.js";
import type { RuleSet } from "./ruleset.js";

export type EvaluateOptions = {
  clock?: Clock;
  logger?: Logger;
};

class MissingAttributeError extends Error {
  constructor(public readonly key: string) {
    super(`attribute '${key}' not present`);
    this.name = "MissingAttributeError";
  }
}

const COMPLIANCE_VALUES: readonly Compliance[] = ["COMPLIANT", "NON_COMPLIANT", "NOT_APPLICABLE"];

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function createAttributeReader(snapshot: ResourceSnapshot): AttributeReader {
  const attrs = snapshot.attributes;
  const read = (key: string): unknown => (Object.prototype.hasOwnProperty.call(attrs, key) ? attrs[key] : undefined);
  return {
    snapshot,
    has: (key) => isPresent(read(key)),
    optional: (key) => {
      const value = read(key);
      return isPresent(value) ? value : undefined;
    },
    require: (key) => {
      const value = read(key);
      if (!isPresent(value)) throw new MissingAttributeError(key);
      return value;
    },
  };
}

function isRuleResult(value: unknown): value is RuleResult {
  if (!value || typeof value !== "object") return false;
  if (!("compliance" in value) || !("reason" in value)) return false;
  return COMPLIANCE_VALUES.some((c) => c === value.compliance) && typeof value.reason === "string";
}

function verdict(rule: Rule, snapshot: ResourceSnapshot, result: RuleResult, evaluatedAt: string, error?: string): Verdict {
  return Object.freeze({
    ruleName: rule.name,
    compliance: result.compliance,
    reason: result.reason,
    snapshot,
    evaluatedAt,
    ...(error !== undefined ? { error } : {}),
  });
}

/** Evaluate a single rule against a snapshot. Never throws. */
export function evaluateRule(rule: Rule, snapshot: ResourceSnapshot, options: EvaluateOptions = {}): Verdict {
  const evaluatedAt = isoNow(options.clock ?? systemClock);
  const logger = options.logger ?? silentLogger;

  if (!rule.resourceTypes.includes(snapshot.ref.resourceType)) {
    return verdict(rule, snapshot, { compliance: "NOT_APPLICABLE", reason: `rule does not apply to ${snapshot.ref.resourceType}` }, evaluatedAt);
  }

  try {
    const result: unknown = rule.evaluate(createAttributeReader(snapshot));
    if (!isRuleResult(result)) {
      throw new TypeError("predicate returned an invalid result");
    }
    return verdict(rule, snapshot, result, evaluatedAt);
  } catch (err) {
    if (err instanceof MissingAttributeError) {
      return verdict(rule, snapshot, { compliance: "NOT_APPLICABLE", reason: err.message }, evaluatedAt);
    }
    const failure = new EvaluationError(rule.name, err);
    logger.warn(`${failure.message} (resource ${snapshot.ref.resourceId})`);
    return verdict(rule, snapshot, { compliance: "NOT_APPLICABLE", reason: "rule evaluation failed" }, evaluatedAt, failure.message);
  }
}

/** Evaluate every applicable rule in registration order. */
export function evaluate(snapshot: ResourceSnapshot, ruleSet: RuleSet, options: EvaluateOptions = {}): Verdict[] {
  return ruleSet.forType(snapshot.ref.resourceType).map((rule) => evaluateRule(rule, snapshot, options));
}

/** True when any verdict is NON_COMPLIANT. */
export function hasViolations(verdicts: readonly Verdict[]): boolean {
  return verdicts.some((v) => v.compliance === "NON_COMPLIANT");
}
