import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Clock } from "../retry.js";
import { parsePositiveInt, resolveRelativeDate, runCli, type CliIO } from "./program.js";

// ─── Test Helpers ────────────────────────────────────────────────────────────

const SG = "AWS::EC2::SecurityGroup";
const OPEN_KEY = `-:-:${SG}:sg-0open`;
const SSH_WORLD = { protocol: "tcp", fromPort: 22, toPort: 22, source: "0.0.0.0/0" };
const HTTPS_WORLD = { protocol: "tcp", fromPort: 443, toPort: 443, source: "0.0.0.0/0" };

const clock: Clock = { now: () => Date.parse("2026-06-01T10:00:00.000Z"), sleep: async () => {} };

type Captured = { logs: string[]; warnings: string[]; errors: string[] };

let dir: string;
let configPath: string;

function writeWorkspace(): void {
  const fixtures = join(dir, "resources.json");
  writeFileSync(
    fixtures,
    JSON.stringify({
      resources: [
        { ref: { resourceType: SG, resourceId: "sg-0open" }, attributes: { ingress: [SSH_WORLD, HTTPS_WORLD], tags: { owner: "web" } } },
        { ref: { resourceType: SG, resourceId: "sg-0closed" }, attributes: { ingress: [HTTPS_WORLD], tags: { owner: "web" } } },
      ],
    }),
  );
  writeFileSync(
    configPath,
    JSON.stringify({
      region: "us-east-1",
      providers: { aws: false, fixtures },
      observation: { maxRetries: 0, minDelayMs: 0 },
      remediation: { maxRetries: 0, minDelayMs: 0 },
      sweep: { intervalMs: 0 },
      audit: { storage: { type: "sqlite", path: join(dir, "audit.db") }, flushIntervalMs: 0, retryIntervalMs: 0 },
      status: { path: join(dir, "status.json") },
      rules: [{ use: "no-open-port" }, { use: "required-tags", parameters: { tags: ["owner"], resourceTypes: [SG] } }],
    }),
  );
}

async function cli(args: string[], stdinLines: string[] = []): Promise<Captured & { code: number }> {
  const captured: Captured = { logs: [], warnings: [], errors: [] };
  const io: CliIO = {
    out: {
      log: (...data: unknown[]) => captured.logs.push(data.join(" ")),
      warn: (...data: unknown[]) => captured.warnings.push(data.join(" ")),
      error: (...data: unknown[]) => captured.errors.push(data.join(" ")),
    },
    stdin: Readable.from(stdinLines.map((line) => `${line}\n`)),
    env: {},
    engine: { clock },
    now: () => Date.parse("2026-06-01T12:00:00.000Z"),
  };
  const code = await runCli(["node", "driftwatch", "--config", configPath, ...args], io);
  return { code, ...captured };
}

/** Command output without the subsystem log lines. */
const output = (logs: string[]) => logs.filter((line) => !line.startsWith("[driftwatch:"));

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "driftwatch-cli-"));
  configPath = join(dir, "config.json");
  writeWorkspace();
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

// ─── evaluate / remediate ────────────────────────────────────────────────────

describe("evaluate", () => {
  it("reports violations and exits 1", async () => {
    const run = await cli(["evaluate", "sg-0open"]);

    expect(run.code).toBe(1);
    expect(output(run.logs)).toEqual([
      `${SG}/sg-0open (${OPEN_KEY})`,
      "  NON_COMPLIANT  no-open-ssh: port 22 open to 0.0.0.0/0",
      "    remediation revoke-open-port-22: skipped (evaluate-only run)",
      "  COMPLIANT      required-tags: all required tags present",
      "Result: NON_COMPLIANT",
    ]);
    expect(run.errors).toEqual([]);
  });

  it("exits 0 for a compliant resource", async () => {
    const run = await cli(["evaluate", `${SG}/sg-0closed`]);
    expect(run.code).toBe(0);
    expect(output(run.logs).at(-1)).toBe("Result: COMPLIANT");
  });

  it("exits 2 when the resource cannot be observed", async () => {
    const run = await cli(["evaluate", `${SG}/sg-gone`]);

    expect(run.code).toBe(2);
    expect(output(run.logs)).toEqual([`${SG}/sg-gone (-:us-east-1:${SG}:sg-gone)`, "Result: FAILED (observation:not-found)"]);
    expect(run.errors).toEqual([`ObservationError: Resource ${SG}/sg-gone not found`]);
  });

  it("exits 2 for an id no provider recognizes", async () => {
    const run = await cli(["evaluate", "sg-unknown"]);
    expect(run.code).toBe(2);
    expect(run.errors).toEqual(['ObservationError: Cannot resolve resource "sg-unknown"; use <ResourceType>/<id>']);
  });
});

describe("remediate", () => {
  it("fixes the violation, exits 0 and publishes the status", async () => {
    const run = await cli(["remediate", "sg-0open"]);

    expect(run.code).toBe(0);
    expect(output(run.logs)).toContain(
      "    remediation revoke-open-port-22: succeeded (remediated: port 22 not open to 0.0.0.0/0 or ::/0)",
    );
    expect(output(run.logs).at(-1)).toBe("Result: REMEDIATED");
    expect(run.logs).toContain(`[driftwatch:remediation] revoke-open-port-22 remediated ${SG}/sg-0open (1 attempt(s))`);

    const status = await cli(["status"]);
    expect(status.logs).toEqual([`${OPEN_KEY} IDLE - REMEDIATED`]);
  });
});

// ─── configuration and usage errors ──────────────────────────────────────────

describe("usage errors", () => {
  it("exits 2 when the config file is missing", async () => {
    configPath = join(dir, "missing.json");
    const run = await cli(["evaluate", "sg-0open"]);
    expect(run.code).toBe(2);
    expect(run.errors).toEqual([`ConfigError: Config file not found: ${configPath}`]);
  });

  it("exits 2 on a missing argument", async () => {
    const run = await cli(["evaluate"]);
    expect(run.code).toBe(2);
    expect(run.errors).toEqual(["error: missing required argument 'resource-id'"]);
  });
});

// ─── status / watch ──────────────────────────────────────────────────────────

describe("status", () => {
  it("says so when nothing has run yet", async () => {
    expect((await cli(["status"])).logs).toEqual(["No resources tracked."]);
  });
});

describe("watch", () => {
  it("runs triggers from stdin and skips malformed lines", async () => {
    const trigger = { kind: "ConfigurationChanged", resourceRef: { resourceType: SG, resourceId: "sg-0open" }, mode: "evaluate" };
    const run = await cli(["watch"], [JSON.stringify(trigger), "", "{not json"]);

    expect(run.code).toBe(0);
    expect(run.warnings).toHaveLength(1);
    expect(run.warnings[0]?.startsWith("[driftwatch:watch] Dropping trigger: Malformed trigger line: ")).toBe(true);
    expect(run.logs).toContain("[driftwatch:watch] Processed 1 trigger(s); dropped 1 malformed");

    const status = await cli(["status"]);
    expect(status.logs).toEqual([`${OPEN_KEY} IDLE - NON_COMPLIANT`]);
  });
});

// ─── audit ───────────────────────────────────────────────────────────────────

describe("audit", () => {
  beforeEach(async () => {
    await cli(["evaluate", "sg-0open"]);
  });

  it("lists records matching the filters", async () => {
    const run = await cli(["audit", "list", "--rule", "no-open-ssh"]);
    expect(run.logs).toEqual([
      `2026-06-01T10:00:00 | ${SG}/sg-0open | NON_COMPLIANT no-open-ssh | revoke-open-port-22 skipped`,
    ]);

    const none = await cli(["audit", "list", "--escalated"]);
    expect(none.logs).toEqual(["No audit records found."]);
  });

  it("shows the timeline of one resource", async () => {
    const run = await cli(["audit", "history", "sg-0open"]);
    expect(run.logs[0]).toBe(`${OPEN_KEY}: 2 record(s) from 2026-06-01T10:00:00.000Z to 2026-06-01T10:00:00.000Z`);
    expect(run.logs).toHaveLength(3);
  });

  it("keeps one history for a resource reached by id and by trigger", async () => {
    const trigger = { kind: "ConfigurationChanged", resourceRef: { resourceType: SG, resourceId: "sg-0open", region: "us-east-1" }, mode: "evaluate" };
    await cli(["watch"], [JSON.stringify(trigger)]);

    const run = await cli(["audit", "history", "sg-0open"]);
    expect(run.logs[0]).toBe(`${OPEN_KEY}: 4 record(s) from 2026-06-01T10:00:00.000Z to 2026-06-01T10:00:00.000Z`);
  });

  it("caps listings with --limit", async () => {
    const run = await cli(["audit", "list", "-n", "1"]);
    expect(run.code).toBe(0);
    expect(run.logs).toHaveLength(1);
  });

  it("rejects a limit that is not a positive integer", async () => {
    const list = await cli(["audit", "list", "-n", "abc"]);
    expect(list.code).toBe(2);
    expect(list.errors).toEqual(["error: option '-n, --limit <n>' argument 'abc' is invalid. Expected a positive integer."]);

    const history = await cli(["audit", "history", "sg-0open", "--limit", "0"]);
    expect(history.code).toBe(2);
    expect(history.errors).toEqual(["error: option '-n, --limit <n>' argument '0' is invalid. Expected a positive integer."]);
  });

  it("summarizes the last day", async () => {
    const run = await cli(["audit", "summary"]);
    expect(run.logs[0]).toBe("Audit Summary (2026-05-31T12:00 → 2026-06-01T12:00)");
    expect(run.logs).toContain("Total records: 2");
    expect(run.logs).toContain("  NON_COMPLIANT  1");
    expect(run.logs).toContain("  skipped        1");
    expect(run.logs.at(-1)).toBe("Escalations: 0");
  });
});

describe("parsePositiveInt", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInt("25")).toBe(25);
    expect(() => parsePositiveInt("-3")).toThrow("Expected a positive integer.");
    expect(() => parsePositiveInt("2.5")).toThrow("Expected a positive integer.");
  });
});

describe("resolveRelativeDate", () => {
  const now = Date.parse("2026-06-01T12:00:00.000Z");

  it("subtracts minutes, hours and days", () => {
    expect(resolveRelativeDate("30m", now)).toBe("2026-06-01T11:30:00.000Z");
    expect(resolveRelativeDate("7d", now)).toBe("2026-05-25T12:00:00.000Z");
  });

  it("passes absolute dates through", () => {
    expect(resolveRelativeDate("2026-01-01", now)).toBe("2026-01-01");
  });
});
