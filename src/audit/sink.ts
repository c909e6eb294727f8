/**
 * Audit/Notification Sink
 *
 * Buffered, append-only record stream. `record` never throws and never
 * waits on delivery: batches are flushed on size, on the flush timer or on
 * demand to every target (the audit store first, then publishers). A target
 * that fails gets the batch re-queued with exponential backoff; after
 * `maxDeliveryAttempts` the batch is dropped for that target and logged.
 * Later batches for a target wait behind its queued ones, so each target
 * receives records in the order they were recorded.
 */

import { randomUUID } from "node:crypto";
import { SinkError, formatErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { backoffDelay, systemClock, type Clock } from "../retry.js";
import type { AuditRecord } from "../types.js";
import type { AuditQuery, AuditSinkConfig, AuditStorage, AuditSummary, AuditTarget, AuditTimeline } from "./types.js";
import { DEFAULT_SINK_CONFIG } from "./types.js";

const MAX_RETRY_DELAY_MS = 5 * 60_000;

/** Distributes over the union so each record kind keeps its own fields. */
type WithoutIdentity<T> = T extends unknown ? Omit<T, "id" | "recordedAt"> & { id?: string; recordedAt?: string } : never;

export type AuditRecordInput = WithoutIdentity<AuditRecord>;

type PendingDelivery = {
  target: AuditTarget;
  records: AuditRecord[];
  attempts: number;
  dueAt: number;
};

export type AuditSinkStats = {
  buffered: number;
  pendingRetries: number;
  delivered: number;
  dropped: number;
};

export function storageTarget(storage: AuditStorage): AuditTarget {
  return {
    name: "store",
    deliver: async (records) => storage.saveBatch(records),
  };
}

export class AuditSink {
  private readonly config: AuditSinkConfig;
  private readonly targets: AuditTarget[];
  private readonly clock: Clock;
  private readonly logger: Logger;
  private buffer: AuditRecord[] = [];
  private retryQueue: PendingDelivery[] = [];
  private readonly redelivering = new Set<AuditTarget>();
  private readonly inflight = new Set<Promise<void>>();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private retryTimer: ReturnType<typeof setInterval> | null = null;
  private delivered = 0;
  private dropped = 0;

  constructor(
    private readonly storage: AuditStorage,
    options: {
      publishers?: AuditTarget[];
      config?: Partial<AuditSinkConfig>;
      clock?: Clock;
      logger?: Logger;
    } = {},
  ) {
    this.config = { ...DEFAULT_SINK_CONFIG, ...options.config };
    this.targets = [storageTarget(storage), ...(options.publishers ?? [])];
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** Start the flush and redelivery timers and prune expired records. */
  start(): void {
    if (this.config.flushIntervalMs > 0 && !this.flushTimer) {
      this.flushTimer = setInterval(() => this.track(this.flush()), this.config.flushIntervalMs);
      // Unref so it doesn't keep the process alive
      this.flushTimer.unref();
    }
    if (this.config.retryIntervalMs > 0 && !this.retryTimer) {
      this.retryTimer = setInterval(() => this.track(this.retryPending()), this.config.retryIntervalMs);
      this.retryTimer.unref();
    }
    this.pruneExpired();
  }

  /** Stop the timers and deliver whatever is buffered. */
  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
    await this.flush();
    await this.drain();
  }

  async close(): Promise<void> {
    await this.stop();
    if (this.retryQueue.length > 0) {
      const count = this.retryQueue.reduce((n, p) => n + p.records.length, 0);
      this.logger.error(`Closing with ${count} undelivered record(s) in the redelivery queue`);
    }
    this.storage.close();
  }

  // ─── Recording ─────────────────────────────────────────────────────────────

  /** Append a record (buffered). Never throws. */
  record(input: AuditRecordInput): AuditRecord {
    const record: AuditRecord = {
      ...input,
      id: input.id ?? randomUUID(),
      recordedAt: input.recordedAt ?? new Date(this.clock.now()).toISOString(),
    };
    this.buffer.push(record);
    if (this.buffer.length >= this.config.maxBufferSize) {
      this.track(this.flush());
    }
    return record;
  }

  /** Deliver buffered records to every target. Never rejects. */
  async flush(): Promise<void> {
    if (this.buffer.length === 0) return;
    const records = this.buffer.splice(0);
    for (const target of this.targets) {
      const backlog = this.retryQueue.find((p) => p.target === target);
      if (backlog || this.redelivering.has(target)) {
        this.retryQueue.push({ target, records, attempts: 0, dueAt: backlog?.dueAt ?? this.clock.now() });
        this.logger.debug(`Holding ${records.length} record(s) for ${target.name} behind pending redelivery`);
        continue;
      }
      await this.deliver({ target, records, attempts: 0, dueAt: this.clock.now() });
    }
  }

  /**
   * Redeliver queued batches whose backoff has elapsed (all of them when
   * `force` is set). Runs on the retry timer.
   */
  async retryPending(force = false): Promise<void> {
    const now = this.clock.now();
    const blocked = new Set<AuditTarget>();
    for (const pending of [...this.retryQueue]) {
      if (blocked.has(pending.target) || this.redelivering.has(pending.target)) continue;
      // Batches behind one that is not due yet keep waiting
      if (!force && pending.dueAt > now) {
        blocked.add(pending.target);
        continue;
      }
      this.retryQueue = this.retryQueue.filter((p) => p !== pending);
      this.redelivering.add(pending.target);
      try {
        if (!(await this.deliver(pending))) blocked.add(pending.target);
      } finally {
        this.redelivering.delete(pending.target);
      }
    }
  }

  /** Wait for in-flight flushes and redeliveries started in the background. */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  stats(): AuditSinkStats {
    return {
      buffered: this.buffer.length,
      pendingRetries: this.retryQueue.length,
      delivered: this.delivered,
      dropped: this.dropped,
    };
  }

  // ─── Querying ──────────────────────────────────────────────────────────────

  async query(filter: AuditQuery): Promise<AuditRecord[]> {
    await this.flush();
    return this.storage.query(filter);
  }

  async getTimeline(resourceKey: string, limit?: number): Promise<AuditTimeline> {
    await this.flush();
    const records = this.storage.getTimeline(resourceKey, limit);
    return {
      resourceKey,
      records,
      firstSeen: records[0]?.recordedAt ?? "",
      lastSeen: records[records.length - 1]?.recordedAt ?? "",
    };
  }

  async getSummary(startDate: string, endDate: string): Promise<AuditSummary> {
    await this.flush();
    return this.storage.getSummary(startDate, endDate);
  }

  // ─── Maintenance ───────────────────────────────────────────────────────────

  /** Delete records older than the retention period. */
  prune(): number {
    const cutoff = new Date(this.clock.now() - this.config.retentionDays * 86_400_000);
    return this.storage.prune(cutoff.toISOString());
  }

  // ─── Private Helpers ───────────────────────────────────────────────────────

  private pruneExpired(): void {
    if (this.config.retentionDays <= 0) return;
    try {
      const pruned = this.prune();
      if (pruned > 0) this.logger.info(`Pruned ${pruned} audit record(s) older than ${this.config.retentionDays} days`);
    } catch (err) {
      this.logger.warn(`Audit retention pruning failed: ${formatErrorMessage(err)}`);
    }
  }

  private track(task: Promise<void>): void {
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  /** Resolves false when the batch was re-queued. */
  private async deliver(pending: PendingDelivery): Promise<boolean> {
    const attempts = pending.attempts + 1;
    try {
      await pending.target.deliver(pending.records);
      this.delivered += pending.records.length;
      return true;
    } catch (err) {
      const failure = new SinkError(pending.target.name, err);
      if (attempts >= this.config.maxDeliveryAttempts) {
        this.dropped += pending.records.length;
        this.logger.error(
          `${failure.message}; dropping ${pending.records.length} record(s) after ${attempts} attempt(s)`,
        );
        return true;
      }
      const delayMs = backoffDelay(attempts, this.config.retryIntervalMs, MAX_RETRY_DELAY_MS);
      this.logger.warn(`${failure.message}; redelivery ${attempts + 1}/${this.config.maxDeliveryAttempts} in ${delayMs}ms`);
      // Ahead of any batch held for the same target
      const next = this.retryQueue.findIndex((p) => p.target === pending.target);
      const requeued = { ...pending, attempts, dueAt: this.clock.now() + delayMs };
      this.retryQueue.splice(next === -1 ? this.retryQueue.length : next, 0, requeued);
      return false;
    }
  }
}
