/**
 * Audit Trail — In-Memory Storage
 *
 * Lightweight in-memory implementation for tests and offline runs.
 */

import type { AuditRecord, Compliance, RemediationStatus } from "../types.js";
import type { AuditQuery, AuditStorage, AuditSummary } from "./types.js";
import { complianceOf, isEscalated, outcomeOf, ruleNameOf } from "./types.js";

export function matchesQuery(record: AuditRecord, filter: AuditQuery): boolean {
  if (filter.startDate && record.recordedAt < filter.startDate) return false;
  if (filter.endDate && record.recordedAt > filter.endDate) return false;
  if (filter.kinds?.length && !filter.kinds.includes(record.kind)) return false;
  if (filter.resourceKey && record.resourceKey !== filter.resourceKey) return false;
  if (filter.resourceTypes?.length && !filter.resourceTypes.includes(record.resource.resourceType)) return false;
  if (filter.ruleName && ruleNameOf(record) !== filter.ruleName) return false;
  if (filter.compliance?.length) {
    const compliance = complianceOf(record);
    if (!compliance || !filter.compliance.includes(compliance)) return false;
  }
  if (filter.outcome?.length) {
    const outcome = outcomeOf(record);
    if (!outcome || !filter.outcome.includes(outcome)) return false;
  }
  if (filter.escalatedOnly && !isEscalated(record)) return false;
  return true;
}

export class InMemoryAuditStorage implements AuditStorage {
  private records: AuditRecord[] = [];

  async initialize(): Promise<void> {
    // Nothing to open
  }

  saveBatch(records: AuditRecord[]): void {
    for (const record of records) {
      // Append-only: a redelivered id is ignored
      if (this.records.some((r) => r.id === record.id)) continue;
      this.records.push(structuredClone(record));
    }
  }

  query(filter: AuditQuery): AuditRecord[] {
    const offset = filter.offset ?? 0;
    const limit = filter.limit ?? 100;
    // Newest first; insertion order breaks ties
    return this.records
      .map((record, seq) => ({ record, seq }))
      .filter(({ record }) => matchesQuery(record, filter))
      .sort((a, b) => b.record.recordedAt.localeCompare(a.record.recordedAt) || b.seq - a.seq)
      .slice(offset, offset + limit)
      .map(({ record }) => structuredClone(record));
  }

  getById(id: string): AuditRecord | undefined {
    const found = this.records.find((r) => r.id === id);
    return found ? structuredClone(found) : undefined;
  }

  getTimeline(resourceKey: string, limit = 50): AuditRecord[] {
    return this.records
      .filter((r) => r.resourceKey === resourceKey)
      .slice(-limit)
      .map((r) => structuredClone(r));
  }

  getSummary(startDate: string, endDate: string): AuditSummary {
    const filtered = this.records.filter((r) => r.recordedAt >= startDate && r.recordedAt <= endDate);

    const byKind: AuditSummary["byKind"] = {};
    const byCompliance: Partial<Record<Compliance, number>> = {};
    const byOutcome: Partial<Record<RemediationStatus, number>> = {};
    const resourceCounts = new Map<string, number>();
    let escalations = 0;

    for (const r of filtered) {
      byKind[r.kind] = (byKind[r.kind] ?? 0) + 1;
      const compliance = complianceOf(r);
      if (compliance) byCompliance[compliance] = (byCompliance[compliance] ?? 0) + 1;
      const outcome = outcomeOf(r);
      if (outcome) byOutcome[outcome] = (byOutcome[outcome] ?? 0) + 1;
      if (isEscalated(r)) escalations++;
      resourceCounts.set(r.resourceKey, (resourceCounts.get(r.resourceKey) ?? 0) + 1);
    }

    const topResources = [...resourceCounts.entries()]
      .map(([key, count]) => ({ key, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, 10);

    return {
      totalRecords: filtered.length,
      timeRange: { start: startDate, end: endDate },
      byKind,
      byCompliance,
      byOutcome,
      escalations,
      topResources,
    };
  }

  getRecordCount(): number {
    return this.records.length;
  }

  prune(beforeDate: string): number {
    const before = this.records.length;
    this.records = this.records.filter((r) => r.recordedAt >= beforeDate);
    return before - this.records.length;
  }

  close(): void {
    this.records = [];
  }
}
