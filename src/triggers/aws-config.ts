/**
 * AWS Config invoking-event adapter.
 *
 * Accepts either the Lambda event envelope (`invokingEvent` as a JSON
 * string) or the decoded invoking event, and maps it onto a trigger:
 *
 *   ConfigurationItemChangeNotification          → ConfigurationChanged
 *   OversizedConfigurationItemChangeNotification → ConfigurationChanged (from the summary)
 *   ScheduledNotification                        → PeriodicSweep (all types)
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { TriggerParseError, formatErrorMessage } from "../errors.js";
import type { ChangeDetail, Trigger } from "../types.js";

const configurationItemSchema = Type.Object({
  resourceType: Type.String({ minLength: 1 }),
  resourceId: Type.String({ minLength: 1 }),
  awsRegion: Type.Optional(Type.String()),
  awsAccountId: Type.Optional(Type.String()),
  configurationItemStatus: Type.Optional(Type.String()),
  configurationItemCaptureTime: Type.Optional(Type.String()),
});

export const invokingEventSchema = Type.Object({
  messageType: Type.String(),
  configurationItem: Type.Optional(Type.Union([configurationItemSchema, Type.Null()])),
  configurationItemSummary: Type.Optional(configurationItemSchema),
  notificationCreationTime: Type.Optional(Type.String()),
  awsAccountId: Type.Optional(Type.String()),
});

export const lambdaEventSchema = Type.Object({
  invokingEvent: Type.String(),
  eventLeftScope: Type.Optional(Type.Boolean()),
  ruleParameters: Type.Optional(Type.String()),
  resultToken: Type.Optional(Type.String()),
});

export type InvokingEvent = Static<typeof invokingEventSchema>;
export type ConfigurationItem = Static<typeof configurationItemSchema>;

/** Item statuses that mean the resource is gone. */
export const DELETED_STATUSES = ["ResourceDeleted", "ResourceDeletedNotRecorded"];

export function schemaIssues(schema: TSchema, value: unknown): string {
  return [...Value.Errors(schema, value)]
    .slice(0, 3)
    .map((e) => `${e.path || "/"}: ${e.message}`)
    .join("; ");
}

type EnvelopeOptions = { eventLeftScope?: boolean; resultToken?: string };

function changedTrigger(item: ConfigurationItem, notificationTime: string | undefined, options: EnvelopeOptions): Trigger {
  const status = item.configurationItemStatus;
  const capturedAt = item.configurationItemCaptureTime ?? notificationTime;
  const changeDetail: ChangeDetail = {
    source: "aws-config",
    ...(status ? { status } : {}),
    ...(capturedAt ? { capturedAt } : {}),
    // A resource that left the rule's scope is dropped like a deleted one
    ...((status && DELETED_STATUSES.includes(status)) || options.eventLeftScope ? { deleted: true } : {}),
  };
  return {
    kind: "ConfigurationChanged",
    resourceRef: {
      resourceType: item.resourceType,
      resourceId: item.resourceId,
      ...(item.awsRegion ? { region: item.awsRegion } : {}),
      ...(item.awsAccountId ? { accountId: item.awsAccountId } : {}),
    },
    changeDetail,
    ...(options.resultToken ? { resultToken: options.resultToken } : {}),
  };
}

/** Map a decoded invoking event onto a trigger. */
export function fromInvokingEvent(event: unknown, options: EnvelopeOptions = {}): Trigger {
  if (!Value.Check(invokingEventSchema, event)) {
    throw new TriggerParseError(`Invalid AWS Config invoking event: ${schemaIssues(invokingEventSchema, event)}`);
  }

  switch (event.messageType) {
    case "ConfigurationItemChangeNotification": {
      if (!event.configurationItem) {
        throw new TriggerParseError("ConfigurationItemChangeNotification without configurationItem");
      }
      return changedTrigger(event.configurationItem, event.notificationCreationTime, options);
    }
    case "OversizedConfigurationItemChangeNotification": {
      if (!event.configurationItemSummary) {
        throw new TriggerParseError("OversizedConfigurationItemChangeNotification without configurationItemSummary");
      }
      return changedTrigger(event.configurationItemSummary, event.notificationCreationTime, options);
    }
    case "ScheduledNotification":
      return {
        kind: "PeriodicSweep",
        resourceTypeFilter: [],
        ...(options.resultToken ? { resultToken: options.resultToken } : {}),
      };
    default:
      throw new TriggerParseError(`Unexpected message type ${event.messageType}`);
  }
}

/**
 * Map a Config rule Lambda event (`invokingEvent` JSON string) onto a
 * trigger. The envelope's `resultToken` rides along so evaluations can be
 * reported back to the invoking rule.
 */
export function fromLambdaEvent(event: unknown): Trigger {
  if (!Value.Check(lambdaEventSchema, event)) {
    throw new TriggerParseError(`Invalid AWS Config rule event: ${schemaIssues(lambdaEventSchema, event)}`);
  }
  let invoking: unknown;
  try {
    invoking = JSON.parse(event.invokingEvent);
  } catch (err) {
    throw new TriggerParseError(`invokingEvent is not valid JSON: ${formatErrorMessage(err)}`);
  }
  return fromInvokingEvent(invoking, { eventLeftScope: event.eventLeftScope, resultToken: event.resultToken });
}
