/**
 * Error taxonomy for the compliance loop.
 *
 * Every error carries a `kind` discriminator and a `terminal` flag; transient
 * errors are retried by the stage that raised them, terminal ones are recorded
 * and the pipeline for that resource stops.
 */

import type { ResourceRef } from "./types.js";

export class DriftwatchError extends Error {
  constructor(
    message: string,
    public readonly kind: string,
    public readonly terminal: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DriftwatchError";
  }
}

/** `rejected`: the provider answered with a non-retryable error (e.g. access denied). */
export type ObservationFailure = "not-found" | "unreachable" | "unsupported" | "rejected";

export class ObservationError extends DriftwatchError {
  constructor(
    message: string,
    public readonly failure: ObservationFailure,
    public readonly ref: ResourceRef,
    options?: { cause?: unknown },
  ) {
    // "unreachable" is only raised once retries are exhausted, so it ends the run too
    super(message, `observation:${failure}`, true, options);
    this.name = "ObservationError";
  }

  get notFound(): boolean {
    return this.failure === "not-found";
  }
}

export class EvaluationError extends DriftwatchError {
  constructor(public readonly ruleName: string, cause: unknown) {
    super(`Rule ${ruleName} failed: ${formatErrorMessage(cause)}`, "evaluation", false, { cause });
    this.name = "EvaluationError";
  }
}

export class RemediationError extends DriftwatchError {
  constructor(message: string, terminal: boolean, options?: { cause?: unknown }) {
    super(message, terminal ? "remediation:terminal" : "remediation:transient", terminal, options);
    this.name = "RemediationError";
  }
}

export class SinkError extends DriftwatchError {
  constructor(public readonly target: string, cause: unknown) {
    super(`Audit delivery to ${target} failed: ${formatErrorMessage(cause)}`, "sink", false, { cause });
    this.name = "SinkError";
  }
}

export class ConfigError extends DriftwatchError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "config", true);
    this.name = "ConfigError";
  }
}

export class TriggerParseError extends DriftwatchError {
  constructor(message: string) {
    super(message, "trigger", true);
    this.name = "TriggerParseError";
  }
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/** Flatten an error into the shape stored on audit records. */
export function describeError(err: unknown): { kind: string; name: string; message: string; terminal: boolean } {
  if (err instanceof DriftwatchError) {
    return { kind: err.kind, name: err.name, message: err.message, terminal: err.terminal };
  }
  const name = err instanceof Error ? err.name : "Error";
  return { kind: "internal", name, message: formatErrorMessage(err), terminal: true };
}
