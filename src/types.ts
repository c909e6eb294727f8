/**
 * driftwatch — Core Types
 *
 * Resource snapshots, rules, verdicts, remediation outcomes, triggers and
 * audit records shared by every stage of the compliance loop.
 */

// ─── Resources ─────────────────────────────────────────────────────────────────

export type ResourceRef = {
  resourceType: string;
  resourceId: string;
  region?: string;
  accountId?: string;
};

export type AttributeMap = Readonly<Record<string, unknown>>;

export type ResourceSnapshot = {
  readonly ref: ResourceRef;
  readonly name?: string;
  readonly arn?: string;
  readonly attributes: AttributeMap;
  readonly capturedAt: string; // ISO-8601
};

/** Identity key used to serialize work per resource. */
export function resourceKey(ref: ResourceRef): string {
  return [ref.accountId ?? "-", ref.region ?? "-", ref.resourceType, ref.resourceId].join(":");
}

// ─── Verdicts ──────────────────────────────────────────────────────────────────

export type Compliance = "COMPLIANT" | "NON_COMPLIANT" | "NOT_APPLICABLE";

export type RuleSeverity = "critical" | "high" | "medium" | "low";

export type Verdict = {
  readonly ruleName: string;
  readonly compliance: Compliance;
  readonly reason: string;
  readonly snapshot: ResourceSnapshot;
  readonly evaluatedAt: string;
  /** Set when the rule predicate threw. */
  readonly error?: string;
};

// ─── Rules ─────────────────────────────────────────────────────────────────────

/**
 * Attribute accessor handed to rule predicates. `require` aborts the
 * predicate when the attribute is absent and the evaluator turns that into
 * NOT_APPLICABLE.
 */
export interface AttributeReader {
  readonly snapshot: ResourceSnapshot;
  require(key: string): unknown;
  optional(key: string): unknown;
  has(key: string): boolean;
}

export type RuleResult = {
  compliance: Compliance;
  reason: string;
};

/**
 * Target state of a resource, scoped to what one action owns: per list
 * attribute, the entries that must be present and the entries that must be
 * absent. Entries named in neither list are left as the provider finds them.
 */
export type TargetState = {
  readonly present?: Readonly<Record<string, readonly unknown[]>>;
  readonly absent?: Readonly<Record<string, readonly unknown[]>>;
};

export interface RemediationAction {
  readonly name: string;
  readonly description: string;
  /** Entries the action adds or removes, derived from the current state. */
  targetState(snapshot: ResourceSnapshot): TargetState;
}

export interface Rule {
  readonly name: string;
  readonly description: string;
  readonly resourceTypes: readonly string[];
  readonly severity: RuleSeverity;
  evaluate(attrs: AttributeReader): RuleResult;
  readonly remediation?: RemediationAction;
}

// ─── Remediation ───────────────────────────────────────────────────────────────

export type RemediationStatus = "succeeded" | "failed" | "skipped";

export type RemediationOutcome = {
  actionName: string;
  ruleName: string;
  status: RemediationStatus;
  attempts: number;
  reason: string;
  /** Terminal failure that needs a human. */
  escalated: boolean;
  /** Verdict observed after the action ran. */
  verification?: Verdict;
  error?: { kind: string; message: string };
  startedAt: string;
  completedAt: string;
};

// ─── Triggers ──────────────────────────────────────────────────────────────────

export type ChangeDetail = {
  status?: string;
  capturedAt?: string;
  source?: string;
  deleted?: boolean;
};

export type ConfigurationChangedTrigger = {
  kind: "ConfigurationChanged";
  resourceRef: ResourceRef;
  changeDetail: ChangeDetail;
  /** AWS Config result token of the rule invocation that sent the event. */
  resultToken?: string;
};

export type PeriodicSweepTrigger = {
  kind: "PeriodicSweep";
  /** Resource types to sweep; empty means every type the rule set covers. */
  resourceTypeFilter: string[];
  resultToken?: string;
};

export type Trigger = ConfigurationChangedTrigger | PeriodicSweepTrigger;

/**
 * `evaluate` never executes remediation, `auto` follows the
 * auto-remediation setting, `remediate` always executes.
 */
export type RunMode = "evaluate" | "auto" | "remediate";

// ─── Audit ─────────────────────────────────────────────────────────────────────

export type AuditTriggerInfo = {
  kind: Trigger["kind"] | "Manual";
  mode: RunMode;
  acceptedAt: string;
  resultToken?: string;
};

export type VerdictAuditRecord = {
  id: string;
  kind: "verdict";
  resourceKey: string;
  resource: ResourceRef;
  trigger: AuditTriggerInfo;
  verdict: Verdict;
  remediation?: RemediationOutcome;
  recordedAt: string;
};

export type FailureAuditRecord = {
  id: string;
  kind: "failure";
  resourceKey: string;
  resource: ResourceRef;
  trigger: AuditTriggerInfo;
  error: { kind: string; name: string; message: string; terminal: boolean };
  recordedAt: string;
};

export type AuditRecord = VerdictAuditRecord | FailureAuditRecord;
