/**
 * AWS EC2 Security Group Provider
 *
 * Observes security groups as flattened ingress entries. `apply` revokes the
 * entries a target marks absent and authorizes the ones it marks present;
 * every other ingress entry is left in place.
 */

import {
  EC2Client,
  DescribeSecurityGroupsCommand,
  RevokeSecurityGroupIngressCommand,
  AuthorizeSecurityGroupIngressCommand,
  type IpPermission,
  type SecurityGroup,
} from "@aws-sdk/client-ec2";
import { ObservationError, RemediationError } from "../errors.js";
import { ingressKey, parseIngress, SECURITY_GROUP_TYPE, type IngressRule } from "../rules/network.js";
import type { ResourceRef, TargetState } from "../types.js";
import { errorName } from "./aws-errors.js";
import type { ApplyResult, RawResource, ResourceProvider } from "./types.js";

export type AwsProviderOptions = {
  region?: string;
  accountId?: string;
};

/**
 * Account part of a canonical ref. A provider works against the one account
 * its credentials reach, so refs naming that account (or none) collapse to
 * the configured id, or to no account when none is configured. Refs naming a
 * different account keep it.
 */
export function accountScope(ref: ResourceRef, options: AwsProviderOptions): Pick<ResourceRef, "accountId"> {
  if (ref.accountId && options.accountId && ref.accountId !== options.accountId) return { accountId: ref.accountId };
  return options.accountId ? { accountId: options.accountId } : {};
}

const NOT_FOUND_CODES = new Set(["InvalidGroup.NotFound", "InvalidGroupId.NotFound"]);

// =============================================================================
// Mapping
// =============================================================================

function portOf(protocol: string, port: number | undefined): number | undefined {
  if (protocol === "-1" || port === undefined || port < 0) return undefined;
  return port;
}

export function flattenPermissions(permissions: IpPermission[] = []): IngressRule[] {
  const rules: IngressRule[] = [];
  for (const perm of permissions) {
    const protocol = perm.IpProtocol ?? "-1";
    const base = { protocol, fromPort: portOf(protocol, perm.FromPort), toPort: portOf(protocol, perm.ToPort) };
    const push = (source: string | undefined, description: string | undefined) => {
      if (!source) return;
      rules.push({ ...base, source, ...(description ? { description } : {}) });
    };
    for (const r of perm.IpRanges ?? []) push(r.CidrIp, r.Description);
    for (const r of perm.Ipv6Ranges ?? []) push(r.CidrIpv6, r.Description);
    for (const r of perm.UserIdGroupPairs ?? []) push(r.GroupId, r.Description);
    for (const r of perm.PrefixListIds ?? []) push(r.PrefixListId, r.Description);
  }
  return rules;
}

export function toPermission(rule: IngressRule): IpPermission {
  const perm: IpPermission = { IpProtocol: rule.protocol };
  if (rule.protocol !== "-1") {
    perm.FromPort = rule.fromPort;
    perm.ToPort = rule.toPort;
  }
  const Description = rule.description;
  if (rule.source.startsWith("sg-")) {
    perm.UserIdGroupPairs = [{ GroupId: rule.source, Description }];
  } else if (rule.source.startsWith("pl-")) {
    perm.PrefixListIds = [{ PrefixListId: rule.source, Description }];
  } else if (rule.source.includes(":")) {
    perm.Ipv6Ranges = [{ CidrIpv6: rule.source, Description }];
  } else {
    perm.IpRanges = [{ CidrIp: rule.source, Description }];
  }
  return perm;
}

function tagMap(tags: { Key?: string; Value?: string }[] = []): Record<string, string> {
  const out: Record<string, string> = {};
  for (const t of tags) {
    if (t.Key) out[t.Key] = t.Value ?? "";
  }
  return out;
}

function mapSecurityGroup(sg: SecurityGroup): RawResource {
  return {
    name: sg.GroupName,
    attributes: {
      groupName: sg.GroupName,
      description: sg.Description,
      vpcId: sg.VpcId,
      ownerId: sg.OwnerId,
      ingress: flattenPermissions(sg.IpPermissions),
      tags: tagMap(sg.Tags),
    },
  };
}

// =============================================================================
// Provider
// =============================================================================

export class SecurityGroupProvider implements ResourceProvider {
  readonly name = "aws-ec2";
  readonly resourceTypes = [SECURITY_GROUP_TYPE];
  private readonly clients = new Map<string, EC2Client>();

  constructor(private readonly options: AwsProviderOptions = {}) {}

  private client(region?: string): EC2Client {
    const key = region ?? this.options.region ?? "us-east-1";
    let client = this.clients.get(key);
    if (!client) {
      client = new EC2Client({ region: key });
      this.clients.set(key, client);
    }
    return client;
  }

  async fetch(ref: ResourceRef): Promise<RawResource> {
    let groups: SecurityGroup[] | undefined;
    try {
      const response = await this.client(ref.region).send(new DescribeSecurityGroupsCommand({ GroupIds: [ref.resourceId] }));
      groups = response.SecurityGroups;
    } catch (err) {
      if (NOT_FOUND_CODES.has(errorName(err))) {
        throw new ObservationError(`Security group ${ref.resourceId} not found`, "not-found", ref, { cause: err });
      }
      throw err;
    }
    const sg = groups?.[0];
    if (!sg) throw new ObservationError(`Security group ${ref.resourceId} not found`, "not-found", ref);
    return mapSecurityGroup(sg);
  }

  async apply(ref: ResourceRef, target: TargetState): Promise<ApplyResult> {
    const unsupported = [...Object.keys(target.present ?? {}), ...Object.keys(target.absent ?? {})].filter(
      (k) => k !== "ingress",
    );
    if (unsupported.length > 0) {
      throw new RemediationError(`Cannot converge security group attributes: ${unsupported.join(", ")}`, true);
    }
    const absent = target.absent?.ingress;
    const present = target.present?.ingress;
    if (!absent?.length && !present?.length) return { changed: false, changes: [] };

    const current = await this.fetch(ref).then((raw) => parseIngress(raw.attributes.ingress));
    const currentKeys = new Set(current.map(ingressKey));
    const revokeKeys = new Set(parseIngress(absent ?? []).map(ingressKey));
    // Revoke the live entries so their descriptions match what EC2 holds
    const toRevoke = current.filter((r) => revokeKeys.has(ingressKey(r)));
    const toAuthorize = parseIngress(present ?? []).filter((r) => !currentKeys.has(ingressKey(r)));

    const client = this.client(ref.region);
    if (toRevoke.length > 0) {
      await client.send(
        new RevokeSecurityGroupIngressCommand({ GroupId: ref.resourceId, IpPermissions: toRevoke.map(toPermission) }),
      );
    }
    if (toAuthorize.length > 0) {
      await client.send(
        new AuthorizeSecurityGroupIngressCommand({ GroupId: ref.resourceId, IpPermissions: toAuthorize.map(toPermission) }),
      );
    }

    const changes = [
      ...toRevoke.map((r) => `revoke ${ingressKey(r)}`),
      ...toAuthorize.map((r) => `authorize ${ingressKey(r)}`),
    ];
    return { changed: changes.length > 0, changes };
  }

  async list(resourceType: string): Promise<ResourceRef[]> {
    if (resourceType !== SECURITY_GROUP_TYPE) return [];
    const region = this.options.region ?? "us-east-1";
    const refs: ResourceRef[] = [];
    let nextToken: string | undefined;
    do {
      const page = await this.client(region).send(new DescribeSecurityGroupsCommand({ NextToken: nextToken }));
      for (const sg of page.SecurityGroups ?? []) {
        if (!sg.GroupId) continue;
        const accountId = sg.OwnerId ?? this.options.accountId;
        refs.push({
          resourceType: SECURITY_GROUP_TYPE,
          resourceId: sg.GroupId,
          region,
          ...(accountId ? { accountId } : {}),
        });
      }
      nextToken = page.NextToken;
    } while (nextToken);
    return refs;
  }

  canonicalize(ref: ResourceRef): ResourceRef {
    return {
      resourceType: ref.resourceType,
      resourceId: ref.resourceId,
      region: ref.region ?? this.options.region ?? "us-east-1",
      ...accountScope(ref, this.options),
    };
  }

  resolve(resourceId: string): ResourceRef | undefined {
    if (!/^sg-[0-9a-f]+$/.test(resourceId)) return undefined;
    return {
      resourceType: SECURITY_GROUP_TYPE,
      resourceId,
      ...(this.options.region ? { region: this.options.region } : {}),
      ...(this.options.accountId ? { accountId: this.options.accountId } : {}),
    };
  }
}
