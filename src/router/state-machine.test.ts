import { describe, expect, it } from "vitest";
import { canTransition, createResourceStatus, STATE_TRANSITIONS, transitionState, type ResourceState } from "./state-machine.js";

const REF = { resourceType: "AWS::EC2::SecurityGroup", resourceId: "sg-1" };
const T0 = "2026-05-01T00:00:00.000Z";
const T1 = "2026-05-01T00:00:01.000Z";

describe("resource state machine", () => {
  it("starts IDLE with nothing pending", () => {
    expect(createResourceStatus("k", REF, T0)).toEqual({ key: "k", ref: REF, state: "IDLE", pending: false, updatedAt: T0 });
  });

  it("allows only the pipeline transitions", () => {
    const states: ResourceState[] = ["IDLE", "EVALUATING", "REMEDIATING"];
    const allowed = states.flatMap((from) => states.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`));
    expect(allowed).toEqual(["IDLE->EVALUATING", "EVALUATING->IDLE", "EVALUATING->REMEDIATING", "REMEDIATING->IDLE"]);
    expect(STATE_TRANSITIONS.REMEDIATING).toEqual(["IDLE"]);
  });

  it("records the transition on a new status object", () => {
    const idle = createResourceStatus("k", REF, T0);
    const result = transitionState(idle, "EVALUATING", "ConfigurationChanged trigger (auto)", T1);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.status).toEqual({
      key: "k",
      ref: REF,
      state: "EVALUATING",
      pending: false,
      updatedAt: T1,
      lastTransition: { from: "IDLE", to: "EVALUATING", at: T1, reason: "ConfigurationChanged trigger (auto)" },
    });
    expect(idle.state).toBe("IDLE");
  });

  it("rejects skipping evaluation", () => {
    const result = transitionState(createResourceStatus("k", REF, T0), "REMEDIATING", "", T1);
    expect(result).toEqual({ success: false, error: 'Invalid transition: "IDLE" → "REMEDIATING". Allowed: [EVALUATING]' });
  });
});
