/**
 * driftwatch — public entry point for embedding the compliance loop.
 */

export * from "./types.js";
export * from "./errors.js";
export { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logger.js";
export { configSchema, loadConfig, parseConfig, type DriftwatchConfig, type RuleEntry } from "./config.js";
export { retryAsync, systemClock, type Clock, type RetryConfig } from "./retry.js";

export type { ResourceProvider, RawResource, ApplyResult } from "./providers/types.js";
export { ProviderRegistry } from "./providers/registry.js";
export { InMemoryResourceProvider, loadFixtureProvider } from "./providers/memory.js";
export { SecurityGroupProvider } from "./providers/aws-ec2.js";
export { IamProvider } from "./providers/aws-iam.js";
export { ResourceObserver } from "./observer.js";

export { evaluate, evaluateRule } from "./rules/evaluator.js";
export { buildRuleSet, type RuleSet } from "./rules/ruleset.js";
export { RULE_LIBRARY, buildRuleSetFromConfig, createRule } from "./rules/library.js";
export { createNoOpenPortRule } from "./rules/network.js";
export { createIamPolicyRequiredRule } from "./rules/iam.js";
export { createRequiredTagsRule } from "./rules/tags.js";

export { RemediationDispatcher } from "./remediation/dispatcher.js";
export { ResourceLocks } from "./remediation/lock.js";

export type { AuditQuery, AuditStorage, AuditSummary, AuditTarget } from "./audit/types.js";
export { AuditSink } from "./audit/sink.js";
export { InMemoryAuditStorage } from "./audit/memory-store.js";
export { SQLiteAuditStorage } from "./audit/sqlite-store.js";
export { SnsAuditPublisher } from "./audit/sns.js";
export { ConfigEvaluationPublisher, evaluationsFor, type ConfigEvaluationOptions } from "./audit/aws-config.js";

export { TriggerQueue } from "./router/queue.js";
export { TriggerRouter, summarizeRun, type ResourceRunResult } from "./router/router.js";
export { STATE_TRANSITIONS, transitionState, type ResourceState, type ResourceStatus } from "./router/state-machine.js";
export { FileStatusStore, InMemoryStatusStore, type StatusStore } from "./status-store.js";
export { parseTrigger, parseTriggerLine } from "./triggers/parse.js";
export { fromInvokingEvent, fromLambdaEvent } from "./triggers/aws-config.js";

export { Engine, createEngine, type EngineOptions } from "./engine.js";
