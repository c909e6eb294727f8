// ─── Resource State Machine ────────────────────────────────────────────
//
// Per-resource pipeline state:
// IDLE → EVALUATING → (REMEDIATING →) IDLE
//
// Stateless functions — the router owns the current status per resource.
// ───────────────────────────────────────────────────────────────────────

import type { ResourceRef } from "../types.js";

export type ResourceState = "IDLE" | "EVALUATING" | "REMEDIATING";

export const STATE_TRANSITIONS: Record<ResourceState, readonly ResourceState[]> = {
  IDLE: ["EVALUATING"],
  EVALUATING: ["IDLE", "REMEDIATING"],
  REMEDIATING: ["IDLE"],
};

export type StateTransition = {
  from: ResourceState;
  to: ResourceState;
  at: string;
  reason: string;
};

export type ResourceStatus = {
  key: string;
  ref: ResourceRef;
  state: ResourceState;
  /** A coalesced trigger is waiting for the resource to become IDLE. */
  pending: boolean;
  /** Summary of the last completed run, e.g. `NON_COMPLIANT` or `FAILED (observation:not-found)`. */
  lastResult?: string;
  lastTransition?: StateTransition;
  updatedAt: string;
};

/* ------------------------------------------------------------------ */
/*  Transition                                                         */
/* ------------------------------------------------------------------ */

export type TransitionError = {
  success: false;
  error: string;
};

export type TransitionSuccess = {
  success: true;
  status: ResourceStatus;
};

export type TransitionResult = TransitionError | TransitionSuccess;

export function createResourceStatus(key: string, ref: ResourceRef, at: string): ResourceStatus {
  return { key, ref: { ...ref }, state: "IDLE", pending: false, updatedAt: at };
}

export function canTransition(from: ResourceState, to: ResourceState): boolean {
  return STATE_TRANSITIONS[from].includes(to);
}

/**
 * Attempt to move a resource to a new state.
 * Returns a new object (immutable pattern) or an error.
 */
export function transitionState(
  status: ResourceStatus,
  to: ResourceState,
  reason: string,
  at: string,
): TransitionResult {
  const allowed = STATE_TRANSITIONS[status.state];
  if (!allowed.includes(to)) {
    return {
      success: false,
      error: `Invalid transition: "${status.state}" → "${to}". Allowed: [${allowed.join(", ")}]`,
    };
  }
  return {
    success: true,
    status: {
      ...status,
      state: to,
      lastTransition: { from: status.state, to, at, reason },
      updatedAt: at,
    },
  };
}
