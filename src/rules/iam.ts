/**
 * IAM rules — mandatory managed policies on users and roles.
 *
 * A user is compliant when its directly attached policies plus the policies
 * attached to its groups cover every required ARN; a role only counts its own
 * attachments. Excepted entities and service-linked roles are compliant.
 */

import { Type } from "@sinclair/typebox";
import { ConfigError } from "../errors.js";
import type {
  AttributeReader,
  RemediationAction,
  ResourceSnapshot,
  Rule,
  RuleResult,
  TargetState,
} from "../types.js";
import { parseParameters, stringList } from "./parameters.js";

export const IAM_USER_TYPE = "AWS::IAM::User";
export const IAM_ROLE_TYPE = "AWS::IAM::Role";

const POLICY_ARN_PATTERN = /^arn:(aws[a-zA-Z-]*)?:iam::(aws|\d{12}):policy\/[\w+=,.@/-]+$/;

export const iamPolicyRequiredParameters = Type.Object({
  policyArns: Type.Union([Type.String(), Type.Array(Type.String())]),
  exceptionList: Type.Union(
    [
      Type.String(),
      Type.Object({
        users: Type.Optional(Type.Array(Type.String())),
        roles: Type.Optional(Type.Array(Type.String())),
      }),
    ],
    { default: "" },
  ),
});

export type ExceptionList = { users: string[]; roles: string[] };

export function isValidPolicyArn(arn: string): boolean {
  return POLICY_ARN_PATTERN.test(arn);
}

export function parsePolicyArns(value: string | string[]): string[] {
  const arns = (typeof value === "string" ? value.split(",") : value).map((a) => a.trim());
  const invalid = arns.filter((a) => !isValidPolicyArn(a));
  if (arns.length === 0 || invalid.length > 0) {
    throw new ConfigError("Invalid policy ARNs specified in policyArns", invalid.map((a) => `"${a}"`));
  }
  return arns;
}

function extractEntities(entityType: "users" | "roles", exceptionList: string): string[] | undefined {
  const match = new RegExp(`${entityType}:\\s?\\[([\\w+=,.@ -]+)\\]`).exec(exceptionList);
  if (!match) return undefined;
  return match[1]
    .replace(/ /g, "")
    .split(",")
    .filter((n) => n.length > 0);
}

/** Parse `users:[a,b],roles:[c]` (or the object form) into entity names. */
export function parseExceptionList(value: string | { users?: string[]; roles?: string[] }): ExceptionList {
  if (typeof value !== "string") {
    return { users: value.users ?? [], roles: value.roles ?? [] };
  }
  const users = extractEntities("users", value);
  const roles = extractEntities("roles", value);
  if (!users && !roles && value.trim().length > 0) {
    throw new ConfigError("Invalid exceptionList; expected users:[name,...] and/or roles:[name,...]", [`"${value}"`]);
  }
  return { users: users ?? [], roles: roles ?? [] };
}

/** `arn:aws:iam::123456789012:role/aws-service-role/...` */
export function isServiceLinkedRole(arn: string | undefined): boolean {
  return arn !== undefined && arn.split("/")[1] === "aws-service-role";
}

function policyList(value: unknown, field: string): string[] {
  const list = stringList(value);
  if (!list) throw new TypeError(`${field} must be a list of policy ARNs`);
  return list;
}

function effectivePolicies(snapshot: ResourceSnapshot, direct: string[]): string[] {
  if (snapshot.ref.resourceType !== IAM_USER_TYPE) return direct;
  const groupPolicies = snapshot.attributes.groupPolicies;
  if (groupPolicies === undefined || groupPolicies === null) return direct;
  return [...direct, ...policyList(groupPolicies, "groupPolicies")];
}

export function createIamPolicyRequiredRule(params: unknown = {}, name = "iam-policy-required"): Rule {
  const parsed = parseParameters(name, iamPolicyRequiredParameters, params);
  const required = parsePolicyArns(parsed.policyArns);
  const exceptions = parseExceptionList(parsed.exceptionList);

  const missingFrom = (snapshot: ResourceSnapshot, direct: string[]) => {
    const have = new Set(effectivePolicies(snapshot, direct));
    return required.filter((arn) => !have.has(arn));
  };

  const remediation: RemediationAction = {
    name: "attach-required-policies",
    description: `Attach ${required.join(", ")}`,
    targetState(snapshot: ResourceSnapshot): TargetState {
      const direct = policyList(snapshot.attributes.attachedManagedPolicies, "attachedManagedPolicies");
      return { present: { attachedManagedPolicies: missingFrom(snapshot, direct) } };
    },
  };

  return {
    name,
    description: "IAM users and roles must have the mandatory managed policies attached",
    resourceTypes: [IAM_USER_TYPE, IAM_ROLE_TYPE],
    severity: "high",
    evaluate(attrs: AttributeReader): RuleResult {
      const { snapshot } = attrs;
      const entityName = snapshot.name ?? snapshot.ref.resourceId;
      const ignored =
        snapshot.ref.resourceType === IAM_USER_TYPE ? exceptions.users : exceptions.roles;
      const arnAttr = attrs.optional("arn");
      const arn = snapshot.arn ?? (typeof arnAttr === "string" ? arnAttr : undefined);

      if (ignored.includes(entityName) || isServiceLinkedRole(arn)) {
        return { compliance: "COMPLIANT", reason: "Ignored IAM entity" };
      }

      const direct = policyList(attrs.require("attachedManagedPolicies"), "attachedManagedPolicies");
      const missing = missingFrom(snapshot, direct);
      if (missing.length === 0) {
        return { compliance: "COMPLIANT", reason: "All expected policies attached" };
      }
      return { compliance: "NON_COMPLIANT", reason: `IAM entity missing policies: ${missing.join(", ")}` };
    },
    remediation,
  };
}
