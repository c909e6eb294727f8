import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors.js";
import { createSnapshot } from "../observer.js";
import { evaluateRule } from "./evaluator.js";
import {
  createIamPolicyRequiredRule,
  IAM_ROLE_TYPE,
  IAM_USER_TYPE,
  isServiceLinkedRole,
  parseExceptionList,
  parsePolicyArns,
} from "./iam.js";

const READ_ONLY = "arn:aws:iam::aws:policy/ReadOnlyAccess";
const BASELINE = "arn:aws:iam::123456789012:policy/security/Baseline";

function entity(resourceType: string, name: string, attributes: Record<string, unknown>, arn?: string) {
  return createSnapshot(
    { resourceType, resourceId: name, region: "global", accountId: "123456789012" },
    { name, ...(arn ? { arn } : {}), attributes },
    "2026-03-01T00:00:00.000Z",
  );
}

describe("iam-policy-required", () => {
  const rule = createIamPolicyRequiredRule({
    policyArns: `${READ_ONLY}, ${BASELINE}`,
    exceptionList: "users:[break-glass, ci-bot],roles:[legacy]",
  });

  it("passes a user covered by direct and group policies", () => {
    const verdict = evaluateRule(
      rule,
      entity(IAM_USER_TYPE, "alice", { attachedManagedPolicies: [READ_ONLY], groupPolicies: [BASELINE] }),
    );
    expect(verdict.compliance).toBe("COMPLIANT");
    expect(verdict.reason).toBe("All expected policies attached");
  });

  it("lists the policies a user is missing", () => {
    const verdict = evaluateRule(rule, entity(IAM_USER_TYPE, "bob", { attachedManagedPolicies: [], groupPolicies: [] }));
    expect(verdict.compliance).toBe("NON_COMPLIANT");
    expect(verdict.reason).toBe(`IAM entity missing policies: ${READ_ONLY}, ${BASELINE}`);
  });

  it("counts only a role's own attachments", () => {
    const verdict = evaluateRule(
      rule,
      entity(IAM_ROLE_TYPE, "app", { attachedManagedPolicies: [READ_ONLY], groupPolicies: [BASELINE] }),
    );
    expect(verdict.reason).toBe(`IAM entity missing policies: ${BASELINE}`);
  });

  it("ignores excepted entities and service-linked roles", () => {
    expect(evaluateRule(rule, entity(IAM_USER_TYPE, "ci-bot", { attachedManagedPolicies: [] })).reason).toBe(
      "Ignored IAM entity",
    );
    expect(evaluateRule(rule, entity(IAM_ROLE_TYPE, "legacy", { attachedManagedPolicies: [] })).compliance).toBe(
      "COMPLIANT",
    );
    const slr = entity(
      IAM_ROLE_TYPE,
      "AWSServiceRoleForSupport",
      { attachedManagedPolicies: [] },
      "arn:aws:iam::123456789012:role/aws-service-role/support.amazonaws.com/AWSServiceRoleForSupport",
    );
    expect(evaluateRule(rule, slr).reason).toBe("Ignored IAM entity");
  });

  it("does not except a user listed only under roles", () => {
    expect(evaluateRule(rule, entity(IAM_USER_TYPE, "legacy", { attachedManagedPolicies: [] })).compliance).toBe(
      "NON_COMPLIANT",
    );
  });

  it("targets only the missing policies for attachment", () => {
    const snapshot = entity(IAM_USER_TYPE, "carol", {
      attachedManagedPolicies: ["arn:aws:iam::aws:policy/job-function/ViewOnlyAccess"],
      groupPolicies: [READ_ONLY],
    });
    expect(rule.remediation?.targetState(snapshot)).toEqual({ present: { attachedManagedPolicies: [BASELINE] } });
  });
});

describe("IAM rule parameters", () => {
  it("splits and validates policy ARNs", () => {
    expect(parsePolicyArns(` ${READ_ONLY} ,${BASELINE}`)).toEqual([READ_ONLY, BASELINE]);
    expect(() => parsePolicyArns("arn:aws:s3:::bucket")).toThrow(
      'Invalid policy ARNs specified in policyArns: "arn:aws:s3:::bucket"',
    );
    expect(() => parsePolicyArns(`${READ_ONLY}x:y`)).toThrow(ConfigError);
  });

  it("requires policyArns", () => {
    expect(() => createIamPolicyRequiredRule({})).toThrow(ConfigError);
  });

  it("parses both exception list forms", () => {
    expect(parseExceptionList("users:[a, b],roles:[c]")).toEqual({ users: ["a", "b"], roles: ["c"] });
    expect(parseExceptionList("roles:[ops]")).toEqual({ users: [], roles: ["ops"] });
    expect(parseExceptionList({ users: ["x"] })).toEqual({ users: ["x"], roles: [] });
  });

  it("rejects an exception list with no recognizable entry", () => {
    expect(parseExceptionList("")).toEqual({ users: [], roles: [] });
    expect(parseExceptionList("  ")).toEqual({ users: [], roles: [] });
    expect(() => parseExceptionList("users:[bad name!]")).toThrow(
      'Invalid exceptionList; expected users:[name,...] and/or roles:[name,...]: "users:[bad name!]"',
    );
    expect(() =>
      createIamPolicyRequiredRule({ policyArns: READ_ONLY, exceptionList: "admins" }),
    ).toThrow(ConfigError);
  });

  it("recognizes service-linked role ARNs", () => {
    expect(isServiceLinkedRole("arn:aws:iam::123456789012:role/aws-service-role/x.amazonaws.com/R")).toBe(true);
    expect(isServiceLinkedRole("arn:aws:iam::123456789012:role/app")).toBe(false);
    expect(isServiceLinkedRole(undefined)).toBe(false);
  });
});
