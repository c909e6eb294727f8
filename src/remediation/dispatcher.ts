/**
 * Remediation Dispatcher
 *
 * Converges a non-compliant resource to the target state of the rule's bound
 * action, then re-observes and re-evaluates it to verify the fix.
 *
 * - At most one attempt per resource identity at a time
 * - Current state is checked first; an already-compliant resource is a no-op
 * - Transient failures and failed verification retry with backoff
 * - Exhausted or terminal failures are escalated, never re-attempted
 */

import { ObservationError, RemediationError, describeError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ResourceObserver } from "../observer.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { evaluateRule } from "../rules/evaluator.js";
import { isTransientError, isoNow, retryAsync, systemClock, type Clock, type RetryConfig } from "../retry.js";
import {
  resourceKey,
  type RemediationAction,
  type RemediationOutcome,
  type ResourceSnapshot,
  type Rule,
  type Verdict,
} from "../types.js";
import { ResourceLocks } from "./lock.js";

export type DispatcherOptions = {
  retry?: RetryConfig;
  clock?: Clock;
  logger?: Logger;
};

type OutcomeFactory = (
  status: RemediationOutcome["status"],
  reason: string,
  extra?: Partial<RemediationOutcome>,
) => RemediationOutcome;

export type RemediateOptions = {
  /** When false, the outcome is an explicit skip carrying `skipReason`. */
  execute: boolean;
  skipReason?: string;
};

function toRemediationError(err: unknown): RemediationError {
  if (err instanceof RemediationError) return err;
  if (err instanceof ObservationError) {
    return new RemediationError(`Re-observation failed: ${err.message}`, true, { cause: err });
  }
  return new RemediationError(formatErrorMessage(err), !isTransientError(err), { cause: err });
}

function isGone(err: unknown): boolean {
  if (err instanceof ObservationError) return err.notFound;
  return err instanceof RemediationError && err.cause instanceof ObservationError && err.cause.notFound;
}

export class RemediationDispatcher {
  private readonly locks = new ResourceLocks();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    private readonly providers: ProviderRegistry,
    private readonly observer: ResourceObserver,
    private readonly options: DispatcherOptions = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** True while a remediation for the resource is running or waiting. */
  isBusy(key: string): boolean {
    return this.locks.isHeld(key);
  }

  async remediate(verdict: Verdict, rule: Rule, options: RemediateOptions): Promise<RemediationOutcome> {
    const startedAt = isoNow(this.clock);
    const action = rule.remediation;
    const outcome: OutcomeFactory = (status, reason, extra = {}) => ({
      actionName: action?.name ?? "none",
      ruleName: rule.name,
      status,
      attempts: 0,
      reason,
      escalated: false,
      ...extra,
      startedAt,
      completedAt: isoNow(this.clock),
    });

    if (verdict.compliance !== "NON_COMPLIANT") {
      return outcome("skipped", `verdict is ${verdict.compliance}`);
    }
    if (!action) {
      return outcome("skipped", "no remediation action bound");
    }
    if (!options.execute) {
      return outcome("skipped", options.skipReason ?? "remediation not requested");
    }

    const ref = this.providers.canonicalize(verdict.snapshot.ref);
    const key = resourceKey(ref);
    const lock = await this.locks.acquire(key, () => isoNow(this.clock));
    try {
      let current: ResourceSnapshot;
      try {
        current = await this.observer.observe(ref);
      } catch (err) {
        if (isGone(err)) return outcome("skipped", "resource no longer exists");
        const error = toRemediationError(err);
        return this.escalate(outcome, action, error, 0);
      }

      const precheck = evaluateRule(rule, current, { clock: this.clock, logger: this.logger });
      if (precheck.compliance !== "NON_COMPLIANT") {
        this.logger.info(`${rule.name}: ${ref.resourceId} already compliant, nothing to do`);
        return outcome("succeeded", "already compliant", { verification: precheck });
      }

      return await this.converge(rule, action, current, outcome);
    } finally {
      lock.release();
    }
  }

  private async converge(
    rule: Rule,
    action: RemediationAction,
    initial: ResourceSnapshot,
    outcome: OutcomeFactory,
  ): Promise<RemediationOutcome> {
    const ref = initial.ref;
    const provider = this.providers.forType(ref.resourceType);
    if (!provider) {
      return this.escalate(outcome, action, new RemediationError(`No provider for ${ref.resourceType}`, true), 0);
    }

    let attempts = 0;
    let latest = initial;
    try {
      const verification = await retryAsync(
        async (attempt) => {
          attempts = attempt;
          try {
            if (attempt > 1) latest = await this.observer.observe(ref);
            const target = action.targetState(latest);
            const result = await provider.apply(ref, target);
            this.logger.debug(`${action.name} on ${ref.resourceId}: ${result.changes.join("; ") || "no changes"}`);

            const after = await this.observer.observe(ref);
            const check = evaluateRule(rule, after, { clock: this.clock, logger: this.logger });
            if (check.compliance === "NON_COMPLIANT") {
              throw new RemediationError(`Verification failed: ${check.reason}`, false);
            }
            return check;
          } catch (err) {
            throw toRemediationError(err);
          }
        },
        {
          ...this.options.retry,
          label: `${action.name} ${ref.resourceId}`,
          clock: this.clock,
          shouldRetry: (err) => err instanceof RemediationError && !err.terminal,
          onRetry: (info) =>
            this.logger.warn(
              `${info.label}: attempt ${info.attempt}/${info.maxAttempts} failed (${formatErrorMessage(info.err)}), retrying in ${info.delayMs}ms`,
            ),
        },
      );
      this.logger.info(`${action.name} remediated ${ref.resourceType}/${ref.resourceId} (${attempts} attempt(s))`);
      return outcome("succeeded", `remediated: ${verification.reason}`, { attempts, verification });
    } catch (err) {
      if (isGone(err)) return outcome("skipped", "resource no longer exists", { attempts });
      return this.escalate(outcome, action, toRemediationError(err), attempts);
    }
  }

  private escalate(
    outcome: OutcomeFactory,
    action: RemediationAction,
    error: RemediationError,
    attempts: number,
  ): RemediationOutcome {
    const { kind, message } = describeError(error);
    this.logger.error(`ESCALATION: ${action.name} failed after ${attempts} attempt(s): ${message}`);
    return outcome("failed", `remediation failed after ${attempts} attempt(s): ${message}`, {
      attempts,
      escalated: true,
      error: { kind, message },
    });
  }
}
