/**
 * Inbound trigger parsing for `driftwatch watch`: one JSON document per
 * line, either a native trigger or an AWS Config event.
 */

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { TriggerParseError, formatErrorMessage } from "../errors.js";
import type { QueuedTrigger } from "../router/queue.js";
import type { RunMode } from "../types.js";
import { fromInvokingEvent, fromLambdaEvent, schemaIssues } from "./aws-config.js";

const runModeSchema = Type.Union([Type.Literal("evaluate"), Type.Literal("auto"), Type.Literal("remediate")]);

export const nativeTriggerSchema = Type.Union([
  Type.Object({
    kind: Type.Literal("ConfigurationChanged"),
    resourceRef: Type.Object({
      resourceType: Type.String({ minLength: 1 }),
      resourceId: Type.String({ minLength: 1 }),
      region: Type.Optional(Type.String()),
      accountId: Type.Optional(Type.String()),
    }),
    changeDetail: Type.Optional(
      Type.Object({
        status: Type.Optional(Type.String()),
        capturedAt: Type.Optional(Type.String()),
        source: Type.Optional(Type.String()),
        deleted: Type.Optional(Type.Boolean()),
      }),
    ),
    mode: Type.Optional(runModeSchema),
  }),
  Type.Object({
    kind: Type.Literal("PeriodicSweep"),
    resourceTypeFilter: Type.Optional(Type.Array(Type.String())),
    mode: Type.Optional(runModeSchema),
  }),
]);

export function parseTrigger(value: unknown, defaultMode: RunMode = "auto"): QueuedTrigger {
  if (!value || typeof value !== "object") {
    throw new TriggerParseError("Trigger must be a JSON object");
  }
  if ("invokingEvent" in value) return { trigger: fromLambdaEvent(value), mode: defaultMode };
  if ("messageType" in value) return { trigger: fromInvokingEvent(value), mode: defaultMode };

  if (!Value.Check(nativeTriggerSchema, value)) {
    throw new TriggerParseError(`Invalid trigger: ${schemaIssues(nativeTriggerSchema, value)}`);
  }
  const mode = value.mode ?? defaultMode;
  if (value.kind === "ConfigurationChanged") {
    return {
      trigger: { kind: value.kind, resourceRef: value.resourceRef, changeDetail: value.changeDetail ?? {} },
      mode,
    };
  }
  return { trigger: { kind: value.kind, resourceTypeFilter: value.resourceTypeFilter ?? [] }, mode };
}

/** Parse one NDJSON line. Blank lines yield `undefined`. */
export function parseTriggerLine(line: string, defaultMode: RunMode = "auto"): QueuedTrigger | undefined {
  const trimmed = line.trim();
  if (trimmed.length === 0) return undefined;
  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch (err) {
    throw new TriggerParseError(`Malformed trigger line: ${formatErrorMessage(err)}`);
  }
  return parseTrigger(value, defaultMode);
}
