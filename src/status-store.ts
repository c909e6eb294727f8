/**
 * Status Store
 *
 * Latest state-machine status per resource, published by the router after
 * every transition and read by `driftwatch status`. The file store keeps a
 * JSON document at `~/.driftwatch/status.json`.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { formatErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { ResourceStatus } from "./router/state-machine.js";

const stateSchema = Type.Union([Type.Literal("IDLE"), Type.Literal("EVALUATING"), Type.Literal("REMEDIATING")]);

const resourceStatusSchema = Type.Object({
  key: Type.String(),
  ref: Type.Object({
    resourceType: Type.String(),
    resourceId: Type.String(),
    region: Type.Optional(Type.String()),
    accountId: Type.Optional(Type.String()),
  }),
  state: stateSchema,
  pending: Type.Boolean(),
  lastResult: Type.Optional(Type.String()),
  lastTransition: Type.Optional(
    Type.Object({ from: stateSchema, to: stateSchema, at: Type.String(), reason: Type.String() }),
  ),
  updatedAt: Type.String(),
});

export const statusFileSchema = Type.Object({
  updatedAt: Type.String(),
  resources: Type.Array(resourceStatusSchema),
});

/** Interface for status storage backends. */
export interface StatusStore {
  put(status: ResourceStatus): void;
  remove(key: string): void;
  get(key: string): ResourceStatus | undefined;
  /** All statuses, ordered by key. */
  list(): ResourceStatus[];
}

export class InMemoryStatusStore implements StatusStore {
  protected readonly statuses = new Map<string, ResourceStatus>();

  put(status: ResourceStatus): void {
    this.statuses.set(status.key, structuredClone(status));
  }

  remove(key: string): void {
    this.statuses.delete(key);
  }

  get(key: string): ResourceStatus | undefined {
    const status = this.statuses.get(key);
    return status ? structuredClone(status) : undefined;
  }

  list(): ResourceStatus[] {
    return [...this.statuses.values()]
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((s) => structuredClone(s));
  }
}

/**
 * File-backed status store. Every change rewrites the file; a write failure
 * is logged and the in-memory view stays authoritative.
 */
export class FileStatusStore extends InMemoryStatusStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = silentLogger,
  ) {
    super();
    this.load();
  }

  override put(status: ResourceStatus): void {
    super.put(status);
    this.persist();
  }

  override remove(key: string): void {
    super.remove(key);
    this.persist();
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;
    try {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf-8"));
      if (!Value.Check(statusFileSchema, raw)) {
        this.logger.warn(`Ignoring malformed status file ${this.filePath}`);
        return;
      }
      for (const status of raw.resources) this.statuses.set(status.key, status);
    } catch (err) {
      this.logger.warn(`Cannot read status file ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }

  private persist(): void {
    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      const doc = { updatedAt: new Date().toISOString(), resources: this.list() };
      writeFileSync(this.filePath, JSON.stringify(doc, null, 2));
    } catch (err) {
      this.logger.warn(`Cannot write status file ${this.filePath}: ${formatErrorMessage(err)}`);
    }
  }
}

/** Read a status file without keeping a store around (used by `driftwatch status`). */
export function readStatusFile(filePath: string, logger?: Logger): ResourceStatus[] {
  return new FileStatusStore(filePath, logger).list();
}
