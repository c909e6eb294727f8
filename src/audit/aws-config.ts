/**
 * AWS Config evaluation publisher — reports results back to the Config rule
 * that invoked the run, through PutEvaluations.
 *
 * Each batch yields one evaluation per resource and result token:
 * NON_COMPLIANT while any rule's violation is still open, COMPLIANT once at
 * least one rule passed or was remediated, NOT_APPLICABLE otherwise. A
 * resource found gone is reported NOT_APPLICABLE so Config clears its stale
 * result.
 */

import { ConfigServiceClient, PutEvaluationsCommand, type Evaluation } from "@aws-sdk/client-config-service";
import { AssumeRoleCommand, STSClient } from "@aws-sdk/client-sts";
import type { AuditRecord, Compliance, ResourceRef } from "../types.js";
import type { AuditTarget } from "./types.js";

/** Token Config test harnesses send; such calls are always test-mode. */
export const TEST_MODE_TOKEN = "TESTMODE";

const MAX_EVALUATIONS_PER_CALL = 100;
const MAX_ANNOTATION_LENGTH = 256;
const CREDENTIAL_REFRESH_MARGIN_MS = 60_000;

export type ConfigEvaluationOptions = {
  region?: string;
  /** Used for records whose trigger carried no token of its own. */
  resultToken?: string;
  testMode?: boolean;
  /** Role assumed before reporting, for rules evaluated from another account. */
  executionRoleArn?: string;
};

type Tally = {
  token: string;
  ref: ResourceRef;
  open: string[];
  passed: boolean;
  gone: boolean;
  orderedAt: string;
};

function annotate(text: string): string {
  return text.length > MAX_ANNOTATION_LENGTH ? `${text.slice(0, MAX_ANNOTATION_LENGTH - 3)}...` : text;
}

function complianceOfTally(tally: Tally): Compliance {
  if (tally.open.length > 0) return "NON_COMPLIANT";
  if (tally.passed) return "COMPLIANT";
  return "NOT_APPLICABLE";
}

/**
 * Fold a batch into evaluations grouped by result token. Records with no
 * token (and no configured fallback) are not reportable and are skipped.
 */
export function evaluationsFor(records: AuditRecord[], fallbackToken?: string): Map<string, Evaluation[]> {
  const tallies = new Map<string, Tally>();
  for (const record of records) {
    const token = record.trigger.resultToken ?? fallbackToken;
    if (!token) continue;
    if (record.kind === "failure" && record.error.kind !== "observation:not-found") continue;

    const key = `${token}\n${record.resourceKey}`;
    let tally = tallies.get(key);
    if (!tally) {
      tally = { token, ref: record.resource, open: [], passed: false, gone: false, orderedAt: record.recordedAt };
      tallies.set(key, tally);
    }

    if (record.kind === "failure") {
      tally.gone = true;
      if (record.recordedAt > tally.orderedAt) tally.orderedAt = record.recordedAt;
      continue;
    }
    const { verdict, remediation } = record;
    if (verdict.evaluatedAt > tally.orderedAt) tally.orderedAt = verdict.evaluatedAt;
    if (verdict.compliance === "NON_COMPLIANT" && remediation?.status !== "succeeded") {
      tally.open.push(`${verdict.ruleName}: ${verdict.reason}`);
    } else if (verdict.compliance !== "NOT_APPLICABLE") {
      tally.passed = true;
    }
  }

  const byToken = new Map<string, Evaluation[]>();
  for (const tally of tallies.values()) {
    const compliance = complianceOfTally(tally);
    const annotation =
      tally.open.length > 0 ? tally.open.join("; ") : tally.gone && !tally.passed ? "resource no longer exists" : undefined;
    const evaluation: Evaluation = {
      ComplianceResourceType: tally.ref.resourceType,
      ComplianceResourceId: tally.ref.resourceId,
      ComplianceType: compliance,
      OrderingTimestamp: new Date(tally.orderedAt),
      ...(annotation ? { Annotation: annotate(annotation) } : {}),
    };
    const list = byToken.get(tally.token) ?? [];
    list.push(evaluation);
    byToken.set(tally.token, list);
  }
  return byToken;
}

export class ConfigEvaluationPublisher implements AuditTarget {
  readonly name = "aws-config";
  private readonly region: string;
  private baseClient: ConfigServiceClient | undefined;
  private assumed: { client: ConfigServiceClient; expiresAt: number } | undefined;

  constructor(private readonly options: ConfigEvaluationOptions = {}) {
    this.region = options.region ?? "us-east-1";
  }

  async deliver(records: AuditRecord[]): Promise<void> {
    const byToken = evaluationsFor(records, this.options.resultToken);
    if (byToken.size === 0) return;

    const client = await this.client();
    for (const [token, evaluations] of byToken) {
      const TestMode = this.options.testMode === true || token === TEST_MODE_TOKEN;
      for (let i = 0; i < evaluations.length; i += MAX_EVALUATIONS_PER_CALL) {
        const response = await client.send(
          new PutEvaluationsCommand({
            Evaluations: evaluations.slice(i, i + MAX_EVALUATIONS_PER_CALL),
            ResultToken: token,
            TestMode,
          }),
        );
        const failed = response.FailedEvaluations ?? [];
        if (failed.length > 0) {
          const ids = failed.map((e) => e.ComplianceResourceId ?? "?").join(", ");
          throw new Error(`AWS Config rejected ${failed.length} evaluation(s): ${ids}`);
        }
      }
    }
  }

  private async client(): Promise<ConfigServiceClient> {
    const roleArn = this.options.executionRoleArn;
    if (!roleArn) {
      if (!this.baseClient) this.baseClient = new ConfigServiceClient({ region: this.region });
      return this.baseClient;
    }
    if (this.assumed && this.assumed.expiresAt - CREDENTIAL_REFRESH_MARGIN_MS > Date.now()) {
      return this.assumed.client;
    }

    const sts = new STSClient({ region: this.region });
    const { Credentials } = await sts.send(
      new AssumeRoleCommand({ RoleArn: roleArn, RoleSessionName: "driftwatch-evaluations" }),
    );
    if (!Credentials?.AccessKeyId || !Credentials.SecretAccessKey) {
      throw new Error(`AssumeRole ${roleArn} returned no credentials`);
    }
    const client = new ConfigServiceClient({
      region: this.region,
      credentials: {
        accessKeyId: Credentials.AccessKeyId,
        secretAccessKey: Credentials.SecretAccessKey,
        sessionToken: Credentials.SessionToken,
        expiration: Credentials.Expiration,
      },
    });
    this.assumed = { client, expiresAt: Credentials.Expiration?.getTime() ?? Number.POSITIVE_INFINITY };
    return client;
  }
}
