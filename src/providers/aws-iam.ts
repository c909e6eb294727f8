/**
 * AWS IAM Provider
 *
 * Users and roles, identified by entity name. Observes the managed policies
 * attached to the entity (and, for users, to their groups). `apply` attaches
 * the policies a target marks present and detaches the ones it marks absent;
 * any other attachment is left alone.
 */

import {
  IAMClient,
  GetUserCommand,
  GetRoleCommand,
  ListAttachedUserPoliciesCommand,
  ListAttachedRolePoliciesCommand,
  ListAttachedGroupPoliciesCommand,
  ListGroupsForUserCommand,
  ListUsersCommand,
  ListRolesCommand,
  AttachUserPolicyCommand,
  DetachUserPolicyCommand,
  AttachRolePolicyCommand,
  DetachRolePolicyCommand,
  type AttachedPolicy,
  type Tag,
} from "@aws-sdk/client-iam";
import { ObservationError, RemediationError } from "../errors.js";
import { IAM_ROLE_TYPE, IAM_USER_TYPE } from "../rules/iam.js";
import { stringList } from "../rules/parameters.js";
import type { ResourceRef, TargetState } from "../types.js";
import { errorName } from "./aws-errors.js";
import { accountScope, type AwsProviderOptions } from "./aws-ec2.js";
import type { ApplyResult, RawResource, ResourceProvider } from "./types.js";

/** IAM is a global service; references carry this region. */
export const IAM_REGION = "global";

const NOT_FOUND_CODES = new Set(["NoSuchEntity", "NoSuchEntityException"]);

type Page<T> = { items: T[]; marker?: string };

/** Follow `Marker` / `IsTruncated` pagination to the end. */
async function collectPages<T>(fetchPage: (marker: string | undefined) => Promise<Page<T>>): Promise<T[]> {
  const items: T[] = [];
  let marker: string | undefined;
  do {
    const page = await fetchPage(marker);
    items.push(...page.items);
    marker = page.marker;
  } while (marker);
  return items;
}

function nextMarker(response: { IsTruncated?: boolean; Marker?: string }): string | undefined {
  return response.IsTruncated ? response.Marker : undefined;
}

function policyArns(policies: AttachedPolicy[] = []): string[] {
  return policies.flatMap((p) => (p.PolicyArn ? [p.PolicyArn] : []));
}

function tagMap(tags: Tag[] = []): Record<string, string> {
  const out: Record<string, string> = {};
  for (const t of tags) {
    if (t.Key) out[t.Key] = t.Value ?? "";
  }
  return out;
}

function policyTarget(entries: readonly unknown[] | undefined): string[] {
  if (entries === undefined) return [];
  const arns = stringList(entries);
  if (!arns) throw new RemediationError("attachedManagedPolicies must be a list of policy ARNs", true);
  return arns;
}

export class IamProvider implements ResourceProvider {
  readonly name = "aws-iam";
  readonly resourceTypes = [IAM_USER_TYPE, IAM_ROLE_TYPE];
  private readonly client: IAMClient;

  constructor(private readonly options: AwsProviderOptions = {}) {
    // IAM endpoints are global; the SDK still needs a signing region
    this.client = new IAMClient({ region: options.region ?? "us-east-1" });
  }

  async fetch(ref: ResourceRef): Promise<RawResource> {
    try {
      return ref.resourceType === IAM_USER_TYPE ? await this.fetchUser(ref.resourceId) : await this.fetchRole(ref.resourceId);
    } catch (err) {
      if (NOT_FOUND_CODES.has(errorName(err))) {
        throw new ObservationError(`IAM entity ${ref.resourceId} not found`, "not-found", ref, { cause: err });
      }
      throw err;
    }
  }

  private async fetchUser(userName: string): Promise<RawResource> {
    const { User } = await this.client.send(new GetUserCommand({ UserName: userName }));
    if (!User) throw new ObservationError(`IAM user ${userName} not found`, "not-found", this.ref(IAM_USER_TYPE, userName));

    const attached = await collectPages(async (Marker) => {
      const res = await this.client.send(new ListAttachedUserPoliciesCommand({ UserName: userName, Marker }));
      return { items: policyArns(res.AttachedPolicies), marker: nextMarker(res) };
    });
    const groups = await collectPages(async (Marker) => {
      const res = await this.client.send(new ListGroupsForUserCommand({ UserName: userName, Marker }));
      return { items: (res.Groups ?? []).flatMap((g) => (g.GroupName ? [g.GroupName] : [])), marker: nextMarker(res) };
    });
    const groupPolicies: string[] = [];
    for (const group of groups) {
      const arns = await collectPages(async (Marker) => {
        const res = await this.client.send(new ListAttachedGroupPoliciesCommand({ GroupName: group, Marker }));
        return { items: policyArns(res.AttachedPolicies), marker: nextMarker(res) };
      });
      groupPolicies.push(...arns);
    }

    return {
      name: User.UserName,
      arn: User.Arn,
      attributes: {
        arn: User.Arn,
        path: User.Path,
        attachedManagedPolicies: attached,
        groups,
        groupPolicies: [...new Set(groupPolicies)],
        tags: tagMap(User.Tags),
      },
    };
  }

  private async fetchRole(roleName: string): Promise<RawResource> {
    const { Role } = await this.client.send(new GetRoleCommand({ RoleName: roleName }));
    if (!Role) throw new ObservationError(`IAM role ${roleName} not found`, "not-found", this.ref(IAM_ROLE_TYPE, roleName));

    const attached = await collectPages(async (Marker) => {
      const res = await this.client.send(new ListAttachedRolePoliciesCommand({ RoleName: roleName, Marker }));
      return { items: policyArns(res.AttachedPolicies), marker: nextMarker(res) };
    });

    return {
      name: Role.RoleName,
      arn: Role.Arn,
      attributes: {
        arn: Role.Arn,
        path: Role.Path,
        attachedManagedPolicies: attached,
        tags: tagMap(Role.Tags),
      },
    };
  }

  async apply(ref: ResourceRef, target: TargetState): Promise<ApplyResult> {
    const unsupported = [...Object.keys(target.present ?? {}), ...Object.keys(target.absent ?? {})].filter(
      (k) => k !== "attachedManagedPolicies",
    );
    if (unsupported.length > 0) {
      throw new RemediationError(`Cannot converge IAM attributes: ${unsupported.join(", ")}`, true);
    }
    const wanted = policyTarget(target.present?.attachedManagedPolicies);
    const unwanted = policyTarget(target.absent?.attachedManagedPolicies);
    if (wanted.length === 0 && unwanted.length === 0) return { changed: false, changes: [] };

    const current = await this.fetch(ref).then((raw) => stringList(raw.attributes.attachedManagedPolicies) ?? []);
    const toAttach = wanted.filter((arn) => !current.includes(arn));
    const toDetach = unwanted.filter((arn) => current.includes(arn));
    const isUser = ref.resourceType === IAM_USER_TYPE;

    for (const PolicyArn of toAttach) {
      if (isUser) {
        await this.client.send(new AttachUserPolicyCommand({ UserName: ref.resourceId, PolicyArn }));
      } else {
        await this.client.send(new AttachRolePolicyCommand({ RoleName: ref.resourceId, PolicyArn }));
      }
    }
    for (const PolicyArn of toDetach) {
      if (isUser) {
        await this.client.send(new DetachUserPolicyCommand({ UserName: ref.resourceId, PolicyArn }));
      } else {
        await this.client.send(new DetachRolePolicyCommand({ RoleName: ref.resourceId, PolicyArn }));
      }
    }

    const changes = [...toAttach.map((a) => `attach ${a}`), ...toDetach.map((a) => `detach ${a}`)];
    return { changed: changes.length > 0, changes };
  }

  async list(resourceType: string): Promise<ResourceRef[]> {
    if (resourceType === IAM_USER_TYPE) {
      const names = await collectPages(async (Marker) => {
        const res = await this.client.send(new ListUsersCommand({ Marker }));
        return { items: (res.Users ?? []).flatMap((u) => (u.UserName ? [u.UserName] : [])), marker: nextMarker(res) };
      });
      return names.map((n) => this.ref(IAM_USER_TYPE, n));
    }
    if (resourceType === IAM_ROLE_TYPE) {
      const names = await collectPages(async (Marker) => {
        const res = await this.client.send(new ListRolesCommand({ Marker }));
        return { items: (res.Roles ?? []).flatMap((r) => (r.RoleName ? [r.RoleName] : [])), marker: nextMarker(res) };
      });
      return names.map((n) => this.ref(IAM_ROLE_TYPE, n));
    }
    return [];
  }

  /** IAM is global: Config reports entities from the home region, sweeps under `global`. */
  canonicalize(ref: ResourceRef): ResourceRef {
    return {
      resourceType: ref.resourceType,
      resourceId: ref.resourceId,
      region: IAM_REGION,
      ...accountScope(ref, this.options),
    };
  }

  private ref(resourceType: string, resourceId: string): ResourceRef {
    return {
      resourceType,
      resourceId,
      region: IAM_REGION,
      ...(this.options.accountId ? { accountId: this.options.accountId } : {}),
    };
  }
}
