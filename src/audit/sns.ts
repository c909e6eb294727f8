/**
 * SNS audit publisher — fans audit records out to a topic for alerting and
 * dashboards. One message per record, with filterable message attributes.
 */

import { PublishCommand, SNSClient, type MessageAttributeValue } from "@aws-sdk/client-sns";
import type { AuditRecord } from "../types.js";
import type { AuditTarget } from "./types.js";
import { complianceOf, outcomeOf } from "./types.js";

/** Subject line; SNS caps subjects at 100 characters. */
export function subjectFor(record: AuditRecord): string {
  const id = `${record.resource.resourceType}/${record.resource.resourceId}`;
  const subject =
    record.kind === "failure"
      ? `driftwatch failure: ${id} (${record.error.kind})`
      : `driftwatch ${record.verdict.compliance}: ${record.verdict.ruleName} ${id}`;
  return subject.slice(0, 100);
}

export function messageAttributesFor(record: AuditRecord): Record<string, MessageAttributeValue> {
  const attrs: Record<string, MessageAttributeValue> = {
    kind: { DataType: "String", StringValue: record.kind },
    resourceType: { DataType: "String", StringValue: record.resource.resourceType },
  };
  const compliance = complianceOf(record);
  if (compliance) attrs.compliance = { DataType: "String", StringValue: compliance };
  const outcome = outcomeOf(record);
  if (outcome) attrs.outcome = { DataType: "String", StringValue: outcome };
  return attrs;
}

export class SnsAuditPublisher implements AuditTarget {
  readonly name = "sns";
  private readonly client: SNSClient;

  constructor(
    private readonly topicArn: string,
    options: { region?: string } = {},
  ) {
    this.client = new SNSClient({ region: options.region ?? "us-east-1" });
  }

  async deliver(records: AuditRecord[]): Promise<void> {
    for (const record of records) {
      await this.client.send(
        new PublishCommand({
          TopicArn: this.topicArn,
          Subject: subjectFor(record),
          Message: JSON.stringify(record),
          MessageAttributes: messageAttributesFor(record),
        }),
      );
    }
  }
}
