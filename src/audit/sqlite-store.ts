/**
 * Audit Trail — SQLite Storage
 *
 * WAL-mode SQLite database for the append-only record stream. Filterable
 * fields are lifted into indexed columns; the full record is kept as JSON.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { AuditRecord } from "../types.js";
import type { AuditQuery, AuditStorage, AuditSummary } from "./types.js";
import { complianceOf, isAuditRecord, isEscalated, outcomeOf, ruleNameOf } from "./types.js";

const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS audit_records (
  id TEXT PRIMARY KEY,
  recorded_at TEXT NOT NULL,
  kind TEXT NOT NULL,
  resource_key TEXT NOT NULL,
  resource_type TEXT NOT NULL,
  resource_id TEXT NOT NULL,
  rule_name TEXT,
  compliance TEXT,
  outcome TEXT,
  escalated INTEGER NOT NULL DEFAULT 0,
  payload TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_audit_recorded_at ON audit_records(recorded_at);
CREATE INDEX IF NOT EXISTS idx_audit_resource_key ON audit_records(resource_key);
CREATE INDEX IF NOT EXISTS idx_audit_resource_type ON audit_records(resource_type);
CREATE INDEX IF NOT EXISTS idx_audit_rule_name ON audit_records(rule_name);
CREATE INDEX IF NOT EXISTS idx_audit_compliance ON audit_records(compliance);
CREATE INDEX IF NOT EXISTS idx_audit_outcome ON audit_records(outcome);
`;

type RecordRow = {
  id: string;
  recorded_at: string;
  kind: string;
  resource_key: string;
  resource_type: string;
  resource_id: string;
  rule_name: string | null;
  compliance: string | null;
  outcome: string | null;
  escalated: number;
  payload: string;
};

type CountRow = { label: string | null; cnt: number };

function recordToRow(r: AuditRecord): RecordRow {
  return {
    id: r.id,
    recorded_at: r.recordedAt,
    kind: r.kind,
    resource_key: r.resourceKey,
    resource_type: r.resource.resourceType,
    resource_id: r.resource.resourceId,
    rule_name: ruleNameOf(r) ?? null,
    compliance: complianceOf(r) ?? null,
    outcome: outcomeOf(r) ?? null,
    escalated: isEscalated(r) ? 1 : 0,
    payload: JSON.stringify(r),
  };
}

function rowToRecord(row: RecordRow): AuditRecord {
  const parsed: unknown = JSON.parse(row.payload);
  if (!isAuditRecord(parsed)) {
    throw new Error(`Corrupt audit record ${row.id}`);
  }
  return parsed;
}

function inClause(column: string, prefix: string, values: readonly string[], params: Record<string, unknown>): string {
  const placeholders = values.map((v, i) => {
    params[`${prefix}${i}`] = v;
    return `@${prefix}${i}`;
  });
  return `${column} IN (${placeholders.join(", ")})`;
}

type Connection = {
  db: Database.Database;
  insertBatch: Database.Transaction<(records: AuditRecord[]) => void>;
};

export class SQLiteAuditStorage implements AuditStorage {
  private conn: Connection | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    if (this.conn) return;
    if (this.dbPath !== ":memory:") mkdirSync(dirname(this.dbPath), { recursive: true });

    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");
    db.exec(SCHEMA_DDL);

    // Records are append-only: a replayed id is ignored, never overwritten
    const insert = db.prepare<RecordRow>(`
      INSERT OR IGNORE INTO audit_records
        (id, recorded_at, kind, resource_key, resource_type, resource_id,
         rule_name, compliance, outcome, escalated, payload)
      VALUES
        (@id, @recorded_at, @kind, @resource_key, @resource_type, @resource_id,
         @rule_name, @compliance, @outcome, @escalated, @payload)
    `);
    const insertBatch = db.transaction((records: AuditRecord[]) => {
      for (const record of records) insert.run(recordToRow(record));
    });

    this.conn = { db, insertBatch };
  }

  private get db(): Database.Database {
    if (!this.conn) throw new Error("Audit storage is not initialized");
    return this.conn.db;
  }

  saveBatch(records: AuditRecord[]): void {
    if (records.length === 0) return;
    if (!this.conn) throw new Error("Audit storage is not initialized");
    this.conn.insertBatch(records);
  }

  query(filter: AuditQuery): AuditRecord[] {
    const conditions: string[] = [];
    const params: Record<string, unknown> = {};

    if (filter.startDate) {
      conditions.push("recorded_at >= @startDate");
      params.startDate = filter.startDate;
    }
    if (filter.endDate) {
      conditions.push("recorded_at <= @endDate");
      params.endDate = filter.endDate;
    }
    if (filter.kinds?.length) conditions.push(inClause("kind", "k", filter.kinds, params));
    if (filter.resourceKey) {
      conditions.push("resource_key = @resourceKey");
      params.resourceKey = filter.resourceKey;
    }
    if (filter.resourceTypes?.length) conditions.push(inClause("resource_type", "rt", filter.resourceTypes, params));
    if (filter.ruleName) {
      conditions.push("rule_name = @ruleName");
      params.ruleName = filter.ruleName;
    }
    if (filter.compliance?.length) conditions.push(inClause("compliance", "c", filter.compliance, params));
    if (filter.outcome?.length) conditions.push(inClause("outcome", "o", filter.outcome, params));
    if (filter.escalatedOnly) conditions.push("escalated = 1");

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.limit = filter.limit ?? 100;
    params.offset = filter.offset ?? 0;

    const sql = `SELECT * FROM audit_records ${where} ORDER BY recorded_at DESC, rowid DESC LIMIT @limit OFFSET @offset`;
    return this.db.prepare<Record<string, unknown>, RecordRow>(sql).all(params).map(rowToRecord);
  }

  getById(id: string): AuditRecord | undefined {
    const row = this.db.prepare<[string], RecordRow>("SELECT * FROM audit_records WHERE id = ?").get(id);
    return row ? rowToRecord(row) : undefined;
  }

  getTimeline(resourceKey: string, limit = 50): AuditRecord[] {
    const rows = this.db
      .prepare<[string, number], RecordRow>(
        `SELECT * FROM (
           SELECT rowid AS seq, * FROM audit_records WHERE resource_key = ? ORDER BY rowid DESC LIMIT ?
         ) ORDER BY seq ASC`,
      )
      .all(resourceKey, limit);
    return rows.map(rowToRecord);
  }

  getSummary(startDate: string, endDate: string): AuditSummary {
    const base = "WHERE recorded_at >= ? AND recorded_at <= ?";
    const count = (column: string) =>
      this.db
        .prepare<[string, string], CountRow>(
          `SELECT ${column} AS label, COUNT(*) AS cnt FROM audit_records ${base} AND ${column} IS NOT NULL GROUP BY ${column}`,
        )
        .all(startDate, endDate);

    const total = this.db
      .prepare<[string, string], { cnt: number; escalations: number | null }>(
        `SELECT COUNT(*) AS cnt, SUM(escalated) AS escalations FROM audit_records ${base}`,
      )
      .get(startDate, endDate);

    const topResources = this.db
      .prepare<[string, string], { resource_key: string; cnt: number }>(
        `SELECT resource_key, COUNT(*) AS cnt FROM audit_records ${base} GROUP BY resource_key ORDER BY cnt DESC LIMIT 10`,
      )
      .all(startDate, endDate);

    const summary: AuditSummary = {
      totalRecords: total?.cnt ?? 0,
      timeRange: { start: startDate, end: endDate },
      byKind: {},
      byCompliance: {},
      byOutcome: {},
      escalations: total?.escalations ?? 0,
      topResources: topResources.map((r) => ({ key: r.resource_key, count: r.cnt })),
    };
    for (const row of count("kind")) {
      if (row.label === "verdict" || row.label === "failure") summary.byKind[row.label] = row.cnt;
    }
    for (const row of count("compliance")) {
      if (row.label === "COMPLIANT" || row.label === "NON_COMPLIANT" || row.label === "NOT_APPLICABLE") {
        summary.byCompliance[row.label] = row.cnt;
      }
    }
    for (const row of count("outcome")) {
      if (row.label === "succeeded" || row.label === "failed" || row.label === "skipped") {
        summary.byOutcome[row.label] = row.cnt;
      }
    }
    return summary;
  }

  getRecordCount(): number {
    const row = this.db.prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM audit_records").get();
    return row?.cnt ?? 0;
  }

  prune(beforeDate: string): number {
    return this.db.prepare<[string]>("DELETE FROM audit_records WHERE recorded_at < ?").run(beforeDate).changes;
  }

  close(): void {
    this.conn?.db.close();
    this.conn = null;
  }
}
