/**
 * Audit Trail — Types
 *
 * Storage and delivery contracts for the append-only record stream.
 */

import type { AuditRecord, Compliance, RemediationStatus } from "../types.js";

// ─── Query ─────────────────────────────────────────────────────────────────────

export type AuditQuery = {
  startDate?: string;
  endDate?: string;
  kinds?: AuditRecord["kind"][];
  resourceKey?: string;
  resourceTypes?: string[];
  ruleName?: string;
  compliance?: Compliance[];
  outcome?: RemediationStatus[];
  escalatedOnly?: boolean;
  limit?: number;
  offset?: number;
};

export type AuditSummary = {
  totalRecords: number;
  timeRange: { start: string; end: string };
  byKind: Partial<Record<AuditRecord["kind"], number>>;
  byCompliance: Partial<Record<Compliance, number>>;
  byOutcome: Partial<Record<RemediationStatus, number>>;
  escalations: number;
  topResources: { key: string; count: number }[];
};

export type AuditTimeline = {
  resourceKey: string;
  records: AuditRecord[];
  firstSeen: string;
  lastSeen: string;
};

// ─── Storage ───────────────────────────────────────────────────────────────────

export interface AuditStorage {
  initialize(): Promise<void>;
  saveBatch(records: AuditRecord[]): void;
  query(filter: AuditQuery): AuditRecord[];
  getById(id: string): AuditRecord | undefined;
  /** Records for one resource, oldest first. */
  getTimeline(resourceKey: string, limit?: number): AuditRecord[];
  getSummary(startDate: string, endDate: string): AuditSummary;
  getRecordCount(): number;
  prune(beforeDate: string): number;
  close(): void;
}

/** A destination the sink delivers record batches to. */
export interface AuditTarget {
  readonly name: string;
  deliver(records: AuditRecord[]): Promise<void>;
}

// ─── Configuration ─────────────────────────────────────────────────────────────

export type AuditSinkConfig = {
  flushIntervalMs: number;
  maxBufferSize: number;
  /** Base delay before redelivering a failed batch; doubles per attempt. */
  retryIntervalMs: number;
  maxDeliveryAttempts: number;
  retentionDays: number;
};

export const DEFAULT_SINK_CONFIG: AuditSinkConfig = {
  flushIntervalMs: 1000,
  maxBufferSize: 100,
  retryIntervalMs: 5000,
  maxDeliveryAttempts: 5,
  retentionDays: 90,
};

// ─── Record helpers ────────────────────────────────────────────────────────────

export function complianceOf(record: AuditRecord): Compliance | undefined {
  return record.kind === "verdict" ? record.verdict.compliance : undefined;
}

export function outcomeOf(record: AuditRecord): RemediationStatus | undefined {
  return record.kind === "verdict" ? record.remediation?.status : undefined;
}

export function ruleNameOf(record: AuditRecord): string | undefined {
  return record.kind === "verdict" ? record.verdict.ruleName : undefined;
}

export function isEscalated(record: AuditRecord): boolean {
  return record.kind === "verdict" && record.remediation?.escalated === true;
}

/** Shape check for records read back from storage. */
export function isAuditRecord(value: unknown): value is AuditRecord {
  if (!value || typeof value !== "object") return false;
  if (!("id" in value) || !("kind" in value) || !("resourceKey" in value) || !("recordedAt" in value)) return false;
  if (typeof value.id !== "string" || typeof value.resourceKey !== "string" || typeof value.recordedAt !== "string") {
    return false;
  }
  if (value.kind === "verdict") return "verdict" in value && typeof value.verdict === "object" && value.verdict !== null;
  if (value.kind === "failure") return "error" in value && typeof value.error === "object" && value.error !== null;
  return false;
}
