/**
 * Scheduler/Trigger Router
 *
 * Routes triggers to per-resource pipelines:
 *
 *   observe → evaluate → remediate (bound actions) → audit
 *
 * Each resource identity runs through the IDLE/EVALUATING/REMEDIATING state
 * machine, so work for one resource is serialized while different resources
 * run concurrently. Triggers that arrive while a resource is busy collapse
 * into a single pending trigger that runs once the resource is IDLE again.
 */

import type { AuditSink } from "../audit/sink.js";
import { ObservationError, describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ResourceObserver } from "../observer.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { RemediationDispatcher } from "../remediation/dispatcher.js";
import { isoNow, systemClock, type Clock } from "../retry.js";
import { evaluate } from "../rules/evaluator.js";
import type { RuleSet } from "../rules/ruleset.js";
import type { StatusStore } from "../status-store.js";
import {
  resourceKey,
  type AuditTriggerInfo,
  type ChangeDetail,
  type RemediationOutcome,
  type ResourceRef,
  type RunMode,
  type Trigger,
  type Verdict,
} from "../types.js";
import type { QueuedTrigger } from "./queue.js";
import {
  createResourceStatus,
  transitionState,
  type ResourceState,
  type ResourceStatus,
} from "./state-machine.js";

// =============================================================================
// Types
// =============================================================================

export type RunError = ReturnType<typeof describeError>;

/** What one pipeline run produced for a resource. */
export type ResourceRunResult = {
  key: string;
  ref: ResourceRef;
  trigger: AuditTriggerInfo;
  verdicts: Verdict[];
  /** One outcome per NON_COMPLIANT verdict with a bound action, in rule order. */
  outcomes: RemediationOutcome[];
  error?: RunError;
  /** The resource no longer exists and was removed from monitoring. */
  dropped: boolean;
};

export type RouterDeps = {
  ruleSet: RuleSet;
  providers: ProviderRegistry;
  observer: ResourceObserver;
  dispatcher: RemediationDispatcher;
  sink: AuditSink;
  statusStore?: StatusStore;
  autoRemediate: boolean;
  clock?: Clock;
  logger?: Logger;
};

type RunRequest = {
  trigger: AuditTriggerInfo;
  detail?: ChangeDetail;
  waiters: ((result: ResourceRunResult) => void)[];
};

type ResourceEntry = {
  ref: ResourceRef;
  status: ResourceStatus;
  active: boolean;
  pending?: RunRequest;
};

const MODE_STRENGTH: Record<RunMode, number> = { evaluate: 0, auto: 1, remediate: 2 };

export function strongerMode(a: RunMode, b: RunMode): RunMode {
  return MODE_STRENGTH[b] > MODE_STRENGTH[a] ? b : a;
}

function isDeletion(detail: ChangeDetail | undefined): boolean {
  if (!detail) return false;
  return detail.deleted === true || detail.status === "ResourceDeleted" || detail.status === "ResourceDeletedNotRecorded";
}

/** One-word summary of a run for the status view. */
export function summarizeRun(result: Pick<ResourceRunResult, "verdicts" | "outcomes" | "error">): string {
  if (result.error) return `FAILED (${result.error.kind})`;
  const outcomeFor = (v: Verdict) => result.outcomes.find((o) => o.ruleName === v.ruleName);
  const open = result.verdicts.filter(
    (v) => v.compliance === "NON_COMPLIANT" && outcomeFor(v)?.status !== "succeeded",
  );
  if (open.length > 0) return "NON_COMPLIANT";
  if (result.verdicts.some((v) => v.compliance === "NON_COMPLIANT")) return "REMEDIATED";
  if (result.verdicts.some((v) => v.compliance === "COMPLIANT")) return "COMPLIANT";
  return "NOT_APPLICABLE";
}

// =============================================================================
// Router
// =============================================================================

export class TriggerRouter {
  private readonly entries = new Map<string, ResourceEntry>();
  private readonly running = new Set<Promise<unknown>>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly deps: RouterDeps) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  /** Route a trigger; resolves with one result per affected resource. */
  async submit(trigger: Trigger, mode: RunMode = "auto"): Promise<ResourceRunResult[]> {
    const token = trigger.resultToken ? { resultToken: trigger.resultToken } : {};
    if (trigger.kind === "ConfigurationChanged") {
      const result = await this.enqueue(trigger.resourceRef, {
        trigger: { kind: trigger.kind, mode, acceptedAt: isoNow(this.clock), ...token },
        detail: trigger.changeDetail,
        waiters: [],
      });
      return [result];
    }

    const refs = await this.expandSweep(trigger.resourceTypeFilter);
    this.logger.info(`Periodic sweep: ${refs.length} resource(s)`);
    const acceptedAt = isoNow(this.clock);
    return Promise.all(
      refs.map((ref) => this.enqueue(ref, { trigger: { kind: trigger.kind, mode, acceptedAt, ...token }, waiters: [] })),
    );
  }

  /** Operator-initiated run for one resource (CLI `evaluate` / `remediate`). */
  check(ref: ResourceRef, mode: RunMode): Promise<ResourceRunResult> {
    return this.enqueue(ref, { trigger: { kind: "Manual", mode, acceptedAt: isoNow(this.clock) }, waiters: [] });
  }

  /** Consume a trigger queue until it is closed, then wait for in-flight work. */
  async consume(queue: AsyncIterable<QueuedTrigger>): Promise<void> {
    for await (const { trigger, mode } of queue) {
      this.track(
        this.submit(trigger, mode).catch((err: unknown) => {
          this.logger.error(`${trigger.kind} trigger failed: ${describeError(err).message}`);
        }),
      );
    }
    await this.drain();
  }

  /** Resolve once no pipeline is running. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  status(): ResourceStatus[] {
    return [...this.entries.values()]
      .map((e) => structuredClone(e.status))
      .sort((a, b) => a.key.localeCompare(b.key));
  }

  stateOf(ref: ResourceRef): ResourceState | undefined {
    return this.entries.get(resourceKey(this.deps.providers.canonicalize(ref)))?.status.state;
  }

  // ─── Scheduling ────────────────────────────────────────────────────────────

  private enqueue(incoming: ResourceRef, request: RunRequest): Promise<ResourceRunResult> {
    const ref = this.deps.providers.canonicalize(incoming);
    const key = resourceKey(ref);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { ref, status: createResourceStatus(key, ref, isoNow(this.clock)), active: false };
      this.entries.set(key, entry);
    }

    const served = new Promise<ResourceRunResult>((resolve) => request.waiters.push(resolve));

    if (!entry.active) {
      this.start(entry, request);
      return served;
    }

    // Busy: collapse into the single pending trigger
    const pending = entry.pending;
    if (pending) {
      pending.trigger = {
        ...pending.trigger,
        kind: request.trigger.kind,
        mode: strongerMode(pending.trigger.mode, request.trigger.mode),
        ...(request.trigger.resultToken ? { resultToken: request.trigger.resultToken } : {}),
      };
      if (request.detail) pending.detail = request.detail;
      pending.waiters.push(...request.waiters);
      this.logger.debug(`${key}: trigger coalesced into pending run`);
    } else {
      entry.pending = request;
      entry.status = { ...entry.status, pending: true, updatedAt: isoNow(this.clock) };
      this.publish(entry);
      this.logger.debug(`${key}: trigger deferred until ${entry.status.state} completes`);
    }
    return served;
  }

  private start(entry: ResourceEntry, request: RunRequest): void {
    entry.active = true;
    this.track(this.runAndContinue(entry, request));
  }

  private async runAndContinue(entry: ResourceEntry, request: RunRequest): Promise<void> {
    const result = await this.run(entry, request);
    for (const resolve of request.waiters) resolve(result);

    const next = entry.pending;
    if (next) {
      entry.pending = undefined;
      entry.status = { ...entry.status, pending: false, updatedAt: isoNow(this.clock) };
      this.publish(entry);
      this.start(entry, next);
      return;
    }

    entry.active = false;
    if (result.dropped) {
      this.entries.delete(entry.status.key);
      this.deps.statusStore?.remove(entry.status.key);
      this.logger.info(`${entry.status.key}: removed from monitoring`);
    }
  }

  private track(task: Promise<unknown>): void {
    this.running.add(task);
    void task.finally(() => this.running.delete(task));
  }

  private async expandSweep(filter: string[]): Promise<ResourceRef[]> {
    const types = filter.length > 0 ? filter : [...this.deps.ruleSet.resourceTypes];
    const refs: ResourceRef[] = [];
    for (const type of types) {
      const provider = this.deps.providers.forType(type);
      if (!provider) {
        this.logger.debug(`Sweep: no provider for ${type}`);
        continue;
      }
      try {
        refs.push(...(await provider.list(type)));
      } catch (err) {
        this.logger.error(`Sweep: listing ${type} via ${provider.name} failed: ${describeError(err).message}`);
      }
    }
    return refs;
  }

  // ─── Pipeline ──────────────────────────────────────────────────────────────

  private async run(entry: ResourceEntry, request: RunRequest): Promise<ResourceRunResult> {
    const { ref } = entry;
    const key = entry.status.key;
    const base = { key, ref, trigger: request.trigger, verdicts: [], outcomes: [], dropped: false };

    this.move(entry, "EVALUATING", `${request.trigger.kind} trigger (${request.trigger.mode})`);

    try {
      // A deletion notice is final; the provider is not asked again
      if (isDeletion(request.detail)) {
        throw new ObservationError(
          `Resource ${ref.resourceType}/${ref.resourceId} was deleted (${request.detail?.status ?? "deleted"})`,
          "not-found",
          ref,
        );
      }
      const snapshot = await this.deps.observer.observe(ref);

      const verdicts = evaluate(snapshot, this.deps.ruleSet, { clock: this.clock, logger: this.logger });
      const { mode } = request.trigger;
      const execute = mode === "remediate" || (mode === "auto" && this.deps.autoRemediate);
      const skipReason = mode === "evaluate" ? "evaluate-only run" : "auto-remediation disabled";
      const eligible = verdicts.filter(
        (v) => v.compliance === "NON_COMPLIANT" && this.deps.ruleSet.get(v.ruleName)?.remediation,
      );

      if (eligible.length > 0 && execute) {
        this.move(entry, "REMEDIATING", `${eligible.length} non-compliant verdict(s) with bound action`);
      }

      const outcomes: RemediationOutcome[] = [];
      for (const verdict of verdicts) {
        const rule = this.deps.ruleSet.get(verdict.ruleName);
        if (!rule || !eligible.includes(verdict)) {
          this.deps.sink.record({ kind: "verdict", resourceKey: key, resource: ref, trigger: request.trigger, verdict });
          continue;
        }
        const outcome = await this.deps.dispatcher.remediate(verdict, rule, { execute, skipReason });
        outcomes.push(outcome);
        this.deps.sink.record({
          kind: "verdict",
          resourceKey: key,
          resource: ref,
          trigger: request.trigger,
          verdict,
          remediation: outcome,
        });
      }

      const result: ResourceRunResult = { ...base, verdicts, outcomes };
      this.finish(entry, result);
      return result;
    } catch (err) {
      const error = describeError(err);
      const dropped = err instanceof ObservationError && err.notFound;
      this.deps.sink.record({ kind: "failure", resourceKey: key, resource: ref, trigger: request.trigger, error });
      if (dropped) this.logger.info(`${key}: ${error.message}`);
      else this.logger.error(`${key}: ${error.name}: ${error.message}`);

      const result: ResourceRunResult = { ...base, error, dropped };
      this.finish(entry, result);
      return result;
    }
  }

  private finish(entry: ResourceEntry, result: ResourceRunResult): void {
    const lastResult = summarizeRun(result);
    entry.status = { ...entry.status, lastResult };
    this.move(entry, "IDLE", lastResult);
  }

  private move(entry: ResourceEntry, to: ResourceState, reason: string): void {
    const transition = transitionState(entry.status, to, reason, isoNow(this.clock));
    if (!transition.success) {
      throw new Error(`${entry.status.key}: ${transition.error}`);
    }
    entry.status = transition.status;
    this.publish(entry);
  }

  private publish(entry: ResourceEntry): void {
    this.deps.statusStore?.put(entry.status);
  }
}
