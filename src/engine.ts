/**
 * Engine — wires configuration into the compliance loop:
 * providers, observer, rule set, dispatcher, audit sink, status store and
 * router. The CLI and embedding code both start here.
 */

import { SQLiteAuditStorage } from "./audit/sqlite-store.js";
import { InMemoryAuditStorage } from "./audit/memory-store.js";
import { AuditSink } from "./audit/sink.js";
import { ConfigEvaluationPublisher } from "./audit/aws-config.js";
import { SnsAuditPublisher } from "./audit/sns.js";
import type { AuditStorage, AuditTarget } from "./audit/types.js";
import { expandHome, type DriftwatchConfig } from "./config.js";
import { createLogger, type LoggerOptions } from "./logger.js";
import { ResourceObserver } from "./observer.js";
import { SecurityGroupProvider } from "./providers/aws-ec2.js";
import { IamProvider } from "./providers/aws-iam.js";
import { loadFixtureProvider } from "./providers/memory.js";
import { ProviderRegistry } from "./providers/registry.js";
import type { ResourceProvider } from "./providers/types.js";
import { RemediationDispatcher } from "./remediation/dispatcher.js";
import { systemClock, toRetryConfig, type Clock } from "./retry.js";
import type { TriggerQueue } from "./router/queue.js";
import { TriggerRouter, type ResourceRunResult } from "./router/router.js";
import { buildRuleSetFromConfig } from "./rules/library.js";
import type { RuleSet } from "./rules/ruleset.js";
import { FileStatusStore, type StatusStore } from "./status-store.js";
import type { ResourceRef, RunMode } from "./types.js";

export type EngineOptions = {
  /** Replaces the providers named by the configuration. */
  providers?: ResourceProvider[];
  auditStorage?: AuditStorage;
  publishers?: AuditTarget[];
  statusStore?: StatusStore;
  clock?: Clock;
  log?: LoggerOptions["sink"];
};

export class Engine {
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;

  constructor(
    readonly config: DriftwatchConfig,
    readonly ruleSet: RuleSet,
    readonly providers: ProviderRegistry,
    readonly sink: AuditSink,
    readonly statusStore: StatusStore,
    readonly router: TriggerRouter,
  ) {}

  start(): void {
    if (this.started) return;
    this.started = true;
    this.sink.start();
  }

  /**
   * Resolve `<Type>/<id>` or a bare id, defaulting region and account from
   * config, to the canonical ref the loop keys the resource by.
   */
  resolve(resource: string): ResourceRef {
    const ref = this.providers.resolve(resource, {
      ...(this.config.region ? { region: this.config.region } : {}),
      ...(this.config.accountId ? { accountId: this.config.accountId } : {}),
    });
    return this.providers.canonicalize(ref);
  }

  /** One forced run for a single resource. */
  async runOnce(resource: string, mode: RunMode): Promise<ResourceRunResult> {
    return this.router.check(this.resolve(resource), mode);
  }

  /** Push a PeriodicSweep onto `queue` every `sweep.intervalMs`. */
  scheduleSweeps(queue: TriggerQueue): void {
    const { intervalMs, resourceTypes } = this.config.sweep;
    if (intervalMs <= 0 || this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      if (!queue.isClosed) queue.push({ kind: "PeriodicSweep", resourceTypeFilter: [...resourceTypes] });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.router.drain();
    await this.sink.close();
  }
}

function buildProviders(config: DriftwatchConfig): ResourceProvider[] {
  const providers: ResourceProvider[] = [];
  if (config.providers.fixtures) {
    providers.push(loadFixtureProvider(expandHome(config.providers.fixtures)));
  }
  if (config.providers.aws) {
    const aws = {
      ...(config.region ? { region: config.region } : {}),
      ...(config.accountId ? { accountId: config.accountId } : {}),
    };
    const served = new Set(providers.flatMap((p) => p.resourceTypes));
    // Fixture resources take precedence over the live provider for their types
    for (const provider of [new SecurityGroupProvider(aws), new IamProvider(aws)]) {
      if (!provider.resourceTypes.some((t) => served.has(t))) providers.push(provider);
    }
  }
  return providers;
}

export function defaultPublishers(config: DriftwatchConfig): AuditTarget[] {
  const region = config.region ? { region: config.region } : {};
  const publishers: AuditTarget[] = [];
  if (config.audit.snsTopicArn) publishers.push(new SnsAuditPublisher(config.audit.snsTopicArn, region));
  const awsConfig = config.audit.awsConfig;
  if (awsConfig?.enabled) {
    publishers.push(
      new ConfigEvaluationPublisher({
        ...region,
        testMode: awsConfig.testMode,
        ...(awsConfig.resultToken ? { resultToken: awsConfig.resultToken } : {}),
        ...(awsConfig.executionRoleArn ? { executionRoleArn: awsConfig.executionRoleArn } : {}),
      }),
    );
  }
  return publishers;
}

export async function createEngine(config: DriftwatchConfig, options: EngineOptions = {}): Promise<Engine> {
  const logOptions: LoggerOptions = { verbose: config.verbose, ...(options.log ? { sink: options.log } : {}) };
  const clock = options.clock ?? systemClock;

  const ruleSet = buildRuleSetFromConfig(config.rules);
  const providers = new ProviderRegistry(options.providers ?? buildProviders(config));

  const observer = new ResourceObserver(providers, {
    retry: toRetryConfig(config.observation),
    clock,
    logger: createLogger("observer", logOptions),
  });
  const dispatcher = new RemediationDispatcher(providers, observer, {
    retry: toRetryConfig(config.remediation),
    clock,
    logger: createLogger("remediation", logOptions),
  });

  const storage =
    options.auditStorage ??
    (config.audit.storage.type === "memory"
      ? new InMemoryAuditStorage()
      : new SQLiteAuditStorage(expandHome(config.audit.storage.path)));
  await storage.initialize();

  const publishers = options.publishers ?? defaultPublishers(config);

  const sink = new AuditSink(storage, {
    publishers,
    config: {
      flushIntervalMs: config.audit.flushIntervalMs,
      maxBufferSize: config.audit.maxBufferSize,
      retryIntervalMs: config.audit.retryIntervalMs,
      maxDeliveryAttempts: config.audit.maxDeliveryAttempts,
      retentionDays: config.audit.retentionDays,
    },
    clock,
    logger: createLogger("audit", logOptions),
  });

  const statusStore =
    options.statusStore ?? new FileStatusStore(expandHome(config.status.path), createLogger("status", logOptions));

  const router = new TriggerRouter({
    ruleSet,
    providers,
    observer,
    dispatcher,
    sink,
    statusStore,
    autoRemediate: config.autoRemediate,
    clock,
    logger: createLogger("router", logOptions),
  });

  return new Engine(config, ruleSet, providers, sink, statusStore, router);
}
