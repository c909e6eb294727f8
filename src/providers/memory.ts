/**
 * In-memory resource provider.
 *
 * Serves resources from a fixture file for offline runs, and stands in for
 * the cloud in tests. `apply` adds and removes list entries in the stored
 * attributes and leaves every other entry alone.
 */

import { readFileSync } from "node:fs";
import { isDeepStrictEqual } from "node:util";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, ObservationError, RemediationError, formatErrorMessage } from "../errors.js";
import { resourceKey, type ResourceRef, type TargetState } from "../types.js";
import type { ApplyResult, RawResource, ResourceProvider } from "./types.js";

const resourceRefSchema = Type.Object({
  resourceType: Type.String({ minLength: 1 }),
  resourceId: Type.String({ minLength: 1 }),
  region: Type.Optional(Type.String()),
  accountId: Type.Optional(Type.String()),
});

export const memoryResourceSchema = Type.Object({
  ref: resourceRefSchema,
  name: Type.Optional(Type.String()),
  arn: Type.Optional(Type.String()),
  attributes: Type.Record(Type.String(), Type.Unknown()),
});

export const fixtureFileSchema = Type.Object({
  resources: Type.Array(memoryResourceSchema),
});

export type MemoryResource = Static<typeof memoryResourceSchema>;

export class InMemoryResourceProvider implements ResourceProvider {
  readonly name: string;
  readonly resourceTypes: readonly string[];
  private readonly resources = new Map<string, MemoryResource>();

  constructor(resources: MemoryResource[], options: { name?: string; resourceTypes?: string[] } = {}) {
    this.name = options.name ?? "memory";
    for (const r of resources) this.resources.set(resourceKey(r.ref), structuredClone(r));
    this.resourceTypes = options.resourceTypes ?? [...new Set(resources.map((r) => r.ref.resourceType))];
  }

  async fetch(ref: ResourceRef): Promise<RawResource> {
    const stored = this.find(ref);
    if (!stored) {
      throw new ObservationError(`Resource ${ref.resourceType}/${ref.resourceId} not found`, "not-found", ref);
    }
    return {
      ...(stored.name !== undefined ? { name: stored.name } : {}),
      ...(stored.arn !== undefined ? { arn: stored.arn } : {}),
      attributes: structuredClone(stored.attributes),
    };
  }

  async apply(ref: ResourceRef, target: TargetState): Promise<ApplyResult> {
    const stored = this.find(ref);
    if (!stored) {
      throw new ObservationError(`Resource ${ref.resourceType}/${ref.resourceId} not found`, "not-found", ref);
    }
    const changes: string[] = [];
    for (const [key, entries] of Object.entries(target.absent ?? {})) {
      const current = listAttribute(stored, key);
      const kept = current.filter((have) => !entries.some((e) => isDeepStrictEqual(have, e)));
      if (kept.length === current.length) continue;
      stored.attributes[key] = kept;
      changes.push(`removed ${current.length - kept.length} from ${key}`);
    }
    for (const [key, entries] of Object.entries(target.present ?? {})) {
      const current = listAttribute(stored, key);
      const missing = entries.filter((e) => !current.some((have) => isDeepStrictEqual(have, e)));
      if (missing.length === 0) continue;
      stored.attributes[key] = [...current, ...structuredClone(missing)];
      changes.push(`added ${missing.length} to ${key}`);
    }
    return { changed: changes.length > 0, changes };
  }

  async list(resourceType: string): Promise<ResourceRef[]> {
    return [...this.resources.values()].filter((r) => r.ref.resourceType === resourceType).map((r) => ({ ...r.ref }));
  }

  canonicalize(ref: ResourceRef): ResourceRef {
    const stored = this.find(ref);
    return stored ? { ...stored.ref } : { ...ref };
  }

  resolve(resourceId: string): ResourceRef | undefined {
    const match = [...this.resources.values()].find((r) => r.ref.resourceId === resourceId);
    return match ? { ...match.ref } : undefined;
  }

  /** Add, replace or remove (undefined) a resource. */
  put(ref: ResourceRef, resource?: Omit<MemoryResource, "ref">): void {
    const existing = this.find(ref);
    if (existing) this.resources.delete(resourceKey(existing.ref));
    if (resource) this.resources.set(resourceKey(ref), structuredClone({ ...resource, ref }));
  }

  private find(ref: ResourceRef): MemoryResource | undefined {
    const exact = this.resources.get(resourceKey(ref));
    if (exact) return exact;
    // Fixture refs that omit region or account match any value for it
    return [...this.resources.values()].find(
      (r) =>
        r.ref.resourceType === ref.resourceType &&
        r.ref.resourceId === ref.resourceId &&
        (r.ref.region === undefined || r.ref.region === ref.region) &&
        (r.ref.accountId === undefined || r.ref.accountId === ref.accountId),
    );
  }
}

function listAttribute(resource: MemoryResource, key: string): unknown[] {
  const value = resource.attributes[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new RemediationError(`Attribute ${key} of ${resource.ref.resourceId} is not a list`, true);
  }
  return value;
}

export function loadFixtureProvider(filePath: string): InMemoryResourceProvider {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read fixture file ${filePath}`, [formatErrorMessage(err)]);
  }
  if (!Value.Check(fixtureFileSchema, raw)) {
    const issues = [...Value.Errors(fixtureFileSchema, raw)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`Invalid fixture file ${filePath}`, issues);
  }
  return new InMemoryResourceProvider(raw.resources, { name: "fixtures" });
}
