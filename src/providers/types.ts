/**
 * Resource provider contract — the cloud-facing collaborator behind
 * observation and remediation.
 */

import type { ResourceRef, TargetState } from "../types.js";

/** Provider-shaped resource state, before normalization into a snapshot. */
export type RawResource = {
  name?: string;
  arn?: string;
  attributes: Record<string, unknown>;
};

export type ApplyResult = {
  changed: boolean;
  /** Human-readable description of each mutation performed. */
  changes: string[];
};

export interface ResourceProvider {
  readonly name: string;
  readonly resourceTypes: readonly string[];
  /** Throws `ObservationError` with failure "not-found" when the resource is gone. */
  fetch(ref: ResourceRef): Promise<RawResource>;
  /** Converge the resource to `target`. Must be idempotent. */
  apply(ref: ResourceRef, target: TargetState): Promise<ApplyResult>;
  list(resourceType: string): Promise<ResourceRef[]>;
  /**
   * The one ref this provider uses for a resource, however a trigger spelled
   * it. Pipelines and locks are keyed on the canonical ref.
   */
  canonicalize?(ref: ResourceRef): ResourceRef;
  /** Map a bare resource id to a reference, when the provider recognizes it. */
  resolve?(resourceId: string): ResourceRef | undefined;
}
