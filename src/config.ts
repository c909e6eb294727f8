/**
 * driftwatch configuration schema (TypeBox), defaults and file loading.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, formatErrorMessage } from "./errors.js";

const backoffSchema = (maxRetries: number, minDelayMs: number) =>
  Type.Object(
    {
      maxRetries: Type.Integer({ minimum: 0, default: maxRetries, description: "Retries after the first attempt" }),
      minDelayMs: Type.Integer({ minimum: 0, default: minDelayMs }),
      maxDelayMs: Type.Integer({ minimum: 0, default: 30_000 }),
      jitter: Type.Number({ minimum: 0, maximum: 1, default: 0.2 }),
    },
    { default: {} },
  );

export const ruleEntrySchema = Type.Object({
  use: Type.String({ minLength: 1, description: "Rule library entry, e.g. no-open-port" }),
  name: Type.Optional(Type.String({ minLength: 1 })),
  parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  remediate: Type.Boolean({ default: true, description: "Bind the rule's remediation action" }),
});

export const configSchema = Type.Object({
  region: Type.Optional(Type.String({ description: "Default AWS region (falls back to AWS_REGION)" })),
  accountId: Type.Optional(Type.String()),
  autoRemediate: Type.Boolean({ default: true }),
  verbose: Type.Boolean({ default: false }),
  providers: Type.Object(
    {
      aws: Type.Boolean({ default: true, description: "Register the EC2 and IAM providers" }),
      fixtures: Type.Optional(Type.String({ description: "JSON file of resources served from memory" })),
    },
    { default: {} },
  ),
  observation: backoffSchema(3, 200),
  remediation: backoffSchema(3, 500),
  sweep: Type.Object(
    {
      intervalMs: Type.Integer({ minimum: 0, default: 3_600_000, description: "0 disables periodic sweeps" }),
      resourceTypes: Type.Array(Type.String(), { default: [] }),
    },
    { default: {} },
  ),
  audit: Type.Object(
    {
      storage: Type.Object(
        {
          type: Type.Union([Type.Literal("sqlite"), Type.Literal("memory")], { default: "sqlite" }),
          path: Type.String({ default: "~/.driftwatch/audit.db" }),
        },
        { default: {} },
      ),
      flushIntervalMs: Type.Integer({ minimum: 0, default: 1000 }),
      maxBufferSize: Type.Integer({ minimum: 1, default: 100 }),
      retryIntervalMs: Type.Integer({ minimum: 0, default: 5000 }),
      maxDeliveryAttempts: Type.Integer({ minimum: 1, default: 5 }),
      retentionDays: Type.Integer({ minimum: 1, default: 90 }),
      snsTopicArn: Type.Optional(Type.String()),
      awsConfig: Type.Optional(
        Type.Object({
          enabled: Type.Boolean({ default: true, description: "Report evaluations back through PutEvaluations" }),
          resultToken: Type.Optional(Type.String({ description: "Token for runs whose trigger carried none" })),
          testMode: Type.Boolean({ default: false }),
          executionRoleArn: Type.Optional(Type.String()),
        }),
      ),
    },
    { default: {} },
  ),
  status: Type.Object(
    {
      path: Type.String({ default: "~/.driftwatch/status.json" }),
    },
    { default: {} },
  ),
  rules: Type.Array(ruleEntrySchema, { default: [{ use: "no-open-port" }] }),
});

export type DriftwatchConfig = Static<typeof configSchema>;
export type RuleEntry = Static<typeof ruleEntrySchema>;

export const DEFAULT_CONFIG_PATH = join(homedir(), ".driftwatch", "config.json");

export function expandHome(p: string): string {
  if (p === "~") return homedir();
  if (p.startsWith("~/")) return join(homedir(), p.slice(2));
  return p;
}

/** Apply defaults and validate a raw config object. */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): DriftwatchConfig {
  const value = Value.Default(configSchema, Value.Clone(raw ?? {}));
  if (!Value.Check(configSchema, value)) {
    const issues = [...Value.Errors(configSchema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }
  const region = value.region ?? env.AWS_REGION ?? env.AWS_DEFAULT_REGION;
  return region ? { ...value, region } : value;
}

/**
 * Load the config file. An explicit path (argument or DRIFTWATCH_CONFIG) must
 * exist; the default location is optional.
 */
export function loadConfig(path?: string, env: NodeJS.ProcessEnv = process.env): DriftwatchConfig {
  const explicit = path ?? env.DRIFTWATCH_CONFIG;
  const filePath = explicit ? expandHome(explicit) : DEFAULT_CONFIG_PATH;

  if (!existsSync(filePath)) {
    if (explicit) throw new ConfigError(`Config file not found: ${filePath}`);
    return parseConfig({}, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [formatErrorMessage(err)]);
  }
  return parseConfig(raw, env);
}
