import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { expandHome, loadConfig, parseConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({}, {});
    expect(config.autoRemediate).toBe(true);
    expect(config.observation).toEqual({ maxRetries: 3, minDelayMs: 200, maxDelayMs: 30_000, jitter: 0.2 });
    expect(config.remediation.minDelayMs).toBe(500);
    expect(config.audit.storage).toEqual({ type: "sqlite", path: "~/.driftwatch/audit.db" });
    expect(config.audit.maxDeliveryAttempts).toBe(5);
    expect(config.sweep).toEqual({ intervalMs: 3_600_000, resourceTypes: [] });
    expect(config.rules).toEqual([{ use: "no-open-port", remediate: true }]);
    expect(config.region).toBeUndefined();
  });

  it("falls back to AWS_REGION", () => {
    expect(parseConfig({}, { AWS_REGION: "eu-west-1" }).region).toBe("eu-west-1");
    expect(parseConfig({ region: "us-west-2" }, { AWS_REGION: "eu-west-1" }).region).toBe("us-west-2");
  });

  it("keeps explicit values", () => {
    const config = parseConfig(
      { autoRemediate: false, audit: { storage: { type: "memory" } }, rules: [{ use: "required-tags", remediate: false }] },
      {},
    );
    expect(config.autoRemediate).toBe(false);
    expect(config.audit.storage).toEqual({ type: "memory", path: "~/.driftwatch/audit.db" });
    expect(config.rules).toEqual([{ use: "required-tags", remediate: false }]);
  });

  it("fills in AWS Config reporting defaults when the section is present", () => {
    expect(parseConfig({}, {}).audit.awsConfig).toBeUndefined();
    expect(parseConfig({ audit: { awsConfig: { resultToken: "test-token" } } }, {}).audit.awsConfig).toEqual({
      enabled: true,
      testMode: false,
      resultToken: "test-token",
    });
  });

  it("reports invalid fields", () => {
    expect(() => parseConfig({ observation: { maxRetries: -1 } }, {})).toThrow(ConfigError);
    try {
      parseConfig({ audit: { storage: { type: "postgres" } } }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && err.issues.some((i) => i.startsWith("/audit/storage/type"))).toBe(true);
    }
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "driftwatch-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads an explicit config file", () => {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ verbose: true, sweep: { intervalMs: 0 } }));
    const config = loadConfig(path, {});
    expect(config.verbose).toBe(true);
    expect(config.sweep.intervalMs).toBe(0);
  });

  it("takes the path from DRIFTWATCH_CONFIG", () => {
    const path = join(dir, "env.json");
    writeFileSync(path, JSON.stringify({ accountId: "123456789012" }));
    expect(loadConfig(undefined, { DRIFTWATCH_CONFIG: path }).accountId).toBe("123456789012");
  });

  it("fails when an explicit file is missing", () => {
    const path = join(dir, "missing.json");
    expect(() => loadConfig(path, {})).toThrow(`Config file not found: ${path}`);
  });

  it("fails on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path, {})).toThrow(`Cannot read config file ${path}`);
  });
});

describe("expandHome", () => {
  it("expands a leading tilde only", () => {
    expect(expandHome("~/x/y.db")).toBe(join(homedir(), "x/y.db"));
    expect(expandHome("/var/lib/x.db")).toBe("/var/lib/x.db");
    expect(expandHome("a/~/b")).toBe("a/~/b");
  });
});
