/**
 * Network rules — security group ingress exposure.
 */

import { Type } from "@sinclair/typebox";
import type {
  AttributeReader,
  RemediationAction,
  ResourceSnapshot,
  Rule,
  RuleResult,
  TargetState,
} from "../types.js";
import { parseParameters } from "./parameters.js";

export const SECURITY_GROUP_TYPE = "AWS::EC2::SecurityGroup";

/** One flattened ingress permission: a port range opened to one source. */
export type IngressRule = {
  protocol: string;
  fromPort?: number;
  toPort?: number;
  /** IPv4/IPv6 CIDR, security group id or prefix list id. */
  source: string;
  description?: string;
};

export const noOpenPortParameters = Type.Object({
  port: Type.Integer({ minimum: 0, maximum: 65535, default: 22 }),
  protocols: Type.Array(Type.String(), { default: ["tcp"] }),
  openCidrs: Type.Array(Type.String(), { default: ["0.0.0.0/0", "::/0"] }),
});

function optionalPort(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) throw new TypeError(`ingress ${field} must be an integer`);
  return value;
}

export function parseIngress(value: unknown): IngressRule[] {
  if (!Array.isArray(value)) throw new TypeError("ingress must be a list");
  return value.map((entry: unknown): IngressRule => {
    if (!entry || typeof entry !== "object") throw new TypeError("ingress entry must be an object");
    const protocol = "protocol" in entry ? entry.protocol : undefined;
    const source = "source" in entry ? entry.source : undefined;
    if (typeof protocol !== "string" || typeof source !== "string") {
      throw new TypeError("ingress entry needs string protocol and source");
    }
    const description = "description" in entry && typeof entry.description === "string" ? entry.description : undefined;
    return {
      protocol,
      fromPort: optionalPort("fromPort" in entry ? entry.fromPort : undefined, "fromPort"),
      toPort: optionalPort("toPort" in entry ? entry.toPort : undefined, "toPort"),
      source,
      ...(description ? { description } : {}),
    };
  });
}

export function ingressKey(rule: IngressRule): string {
  return `${rule.protocol}:${rule.fromPort ?? "*"}:${rule.toPort ?? "*"}:${rule.source}`;
}

function coversPort(rule: IngressRule, port: number, protocols: readonly string[]): boolean {
  if (rule.protocol === "-1" || rule.protocol === "all") return true;
  if (!protocols.includes(rule.protocol)) return false;
  const from = rule.fromPort ?? 0;
  const to = rule.toPort ?? 65535;
  return from <= port && port <= to;
}

export function createNoOpenPortRule(params: unknown = {}, name?: string): Rule {
  const { port, protocols, openCidrs } = parseParameters("no-open-port", noOpenPortParameters, params);
  const ruleName = name ?? (port === 22 ? "no-open-ssh" : `no-open-port-${port}`);

  const isExposed = (rule: IngressRule) => openCidrs.includes(rule.source) && coversPort(rule, port, protocols);

  // Whole entries are revoked, including wide ranges that merely include the port
  const remediation: RemediationAction = {
    name: `revoke-open-port-${port}`,
    description: `Revoke ingress entries exposing port ${port} to ${openCidrs.join(", ")}`,
    targetState(snapshot: ResourceSnapshot): TargetState {
      const raw = snapshot.attributes.ingress;
      const ingress = parseIngress(raw);
      const entries = Array.isArray(raw) ? raw : [];
      return { absent: { ingress: entries.filter((_, i) => isExposed(ingress[i])) } };
    },
  };

  return {
    name: ruleName,
    description: `Port ${port} must not be reachable from ${openCidrs.join(" or ")}`,
    resourceTypes: [SECURITY_GROUP_TYPE],
    severity: port === 22 || port === 3389 ? "critical" : "high",
    evaluate(attrs: AttributeReader): RuleResult {
      const ingress = parseIngress(attrs.require("ingress"));
      const exposedTo = [...new Set(ingress.filter(isExposed).map((r) => r.source))];
      if (exposedTo.length === 0) {
        return { compliance: "COMPLIANT", reason: `port ${port} not open to ${openCidrs.join(" or ")}` };
      }
      return { compliance: "NON_COMPLIANT", reason: `port ${port} open to ${exposedTo.join(", ")}` };
    },
    remediation,
  };
}
