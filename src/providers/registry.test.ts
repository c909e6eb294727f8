import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, ObservationError, RemediationError } from "../errors.js";
import { InMemoryResourceProvider, loadFixtureProvider } from "./memory.js";
import { ProviderRegistry } from "./registry.js";

const SG = "AWS::EC2::SecurityGroup";

function sampleProvider(): InMemoryResourceProvider {
  return new InMemoryResourceProvider([
    {
      ref: { resourceType: SG, resourceId: "sg-111" },
      name: "web",
      attributes: { ingress: [], tags: { owner: "web-team" } },
    },
    {
      ref: { resourceType: "AWS::IAM::User", resourceId: "erin", region: "global", accountId: "123456789012" },
      attributes: { attachedManagedPolicies: [] },
    },
  ]);
}

describe("ProviderRegistry", () => {
  it("routes resource types to their provider", () => {
    const provider = sampleProvider();
    const registry = new ProviderRegistry([provider]);
    expect(registry.forType(SG)).toBe(provider);
    expect(registry.forType("AWS::S3::Bucket")).toBeUndefined();
    expect(registry.resourceTypes).toEqual([SG, "AWS::IAM::User"]);
  });

  it("refuses two providers for one type", () => {
    const registry = new ProviderRegistry([sampleProvider()]);
    expect(() => registry.register(sampleProvider())).toThrow(
      `Resource type ${SG} is served by both memory and memory`,
    );
    expect(() => registry.register(sampleProvider())).toThrow(ConfigError);
  });

  it("resolves typed ids with config defaults", () => {
    const registry = new ProviderRegistry([]);
    expect(registry.resolve("AWS::S3::Bucket/logs", { region: "us-east-1" })).toEqual({
      resourceType: "AWS::S3::Bucket",
      resourceId: "logs",
      region: "us-east-1",
    });
  });

  it("resolves bare ids through the providers, keeping the provider's scope", () => {
    const registry = new ProviderRegistry([sampleProvider()]);
    expect(registry.resolve("erin", { region: "us-east-1", accountId: "999999999999" })).toEqual({
      resourceType: "AWS::IAM::User",
      resourceId: "erin",
      region: "global",
      accountId: "123456789012",
    });
  });

  it("canonicalizes refs through the owning provider", () => {
    const registry = new ProviderRegistry([sampleProvider()]);
    expect(registry.canonicalize({ resourceType: SG, resourceId: "sg-111", region: "us-east-1", accountId: "123456789012" })).toEqual({
      resourceType: SG,
      resourceId: "sg-111",
    });
    const unknown = { resourceType: "AWS::S3::Bucket", resourceId: "logs", region: "us-east-1" };
    expect(registry.canonicalize(unknown)).toBe(unknown);
  });

  it("rejects ids nobody recognizes", () => {
    const registry = new ProviderRegistry([sampleProvider()]);
    expect(() => registry.resolve("i-0abc")).toThrow(ObservationError);
    expect(() => registry.resolve("i-0abc")).toThrow('Cannot resolve resource "i-0abc"; use <ResourceType>/<id>');
  });
});

describe("InMemoryResourceProvider", () => {
  it("serves copies of stored attributes", async () => {
    const provider = sampleProvider();
    const raw = await provider.fetch({ resourceType: SG, resourceId: "sg-111" });
    expect(raw).toEqual({ name: "web", attributes: { ingress: [], tags: { owner: "web-team" } } });

    raw.attributes.tags = {};
    const again = await provider.fetch({ resourceType: SG, resourceId: "sg-111" });
    expect(again.attributes.tags).toEqual({ owner: "web-team" });
  });

  it("matches unscoped fixtures from any region", async () => {
    const provider = sampleProvider();
    const raw = await provider.fetch({ resourceType: SG, resourceId: "sg-111", region: "eu-west-1" });
    expect(raw.name).toBe("web");
  });

  it("reports missing resources as not-found", async () => {
    const provider = sampleProvider();
    const err = await provider.fetch({ resourceType: SG, resourceId: "sg-999" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ObservationError);
    expect(err instanceof ObservationError && err.notFound).toBe(true);
  });

  it("adds and removes only the named list entries", async () => {
    const provider = sampleProvider();
    const ref = { resourceType: SG, resourceId: "sg-111" };
    const https = { protocol: "tcp", fromPort: 443, toPort: 443, source: "0.0.0.0/0" };
    const office = { protocol: "tcp", fromPort: 22, toPort: 22, source: "10.0.0.0/8" };
    provider.put(ref, { name: "web", attributes: { ingress: [https, office], tags: { owner: "web-team" } } });

    expect(await provider.apply(ref, { absent: { ingress: [https] } })).toEqual({
      changed: true,
      changes: ["removed 1 from ingress"],
    });
    expect(await provider.apply(ref, { absent: { ingress: [https] } })).toEqual({ changed: false, changes: [] });
    expect(await provider.apply(ref, { present: { ingress: [office] } })).toEqual({ changed: false, changes: [] });

    const attributes = (await provider.fetch(ref)).attributes;
    expect(attributes.ingress).toEqual([office]);
    expect(attributes.tags).toEqual({ owner: "web-team" });
  });

  it("appends missing entries after the ones already present", async () => {
    const provider = sampleProvider();
    const ref = { resourceType: "AWS::IAM::User", resourceId: "erin", region: "global", accountId: "123456789012" };
    const required = "arn:aws:iam::aws:policy/ReadOnlyAccess";
    const other = "arn:aws:iam::123456789012:policy/added-meanwhile";
    provider.put(ref, { attributes: { attachedManagedPolicies: [other] } });

    expect(await provider.apply(ref, { present: { attachedManagedPolicies: [required] } })).toEqual({
      changed: true,
      changes: ["added 1 to attachedManagedPolicies"],
    });
    expect((await provider.fetch(ref)).attributes.attachedManagedPolicies).toEqual([other, required]);
  });

  it("rejects changes to attributes that are not lists", async () => {
    const provider = sampleProvider();
    const ref = { resourceType: SG, resourceId: "sg-111" };
    await expect(provider.apply(ref, { present: { tags: ["owner"] } })).rejects.toThrow(RemediationError);
  });

  it("lists, replaces and removes resources", async () => {
    const provider = sampleProvider();
    const ref = { resourceType: SG, resourceId: "sg-222" };
    provider.put(ref, { attributes: { ingress: [] } });
    expect(await provider.list(SG)).toEqual([{ resourceType: SG, resourceId: "sg-111" }, ref]);

    provider.put({ resourceType: SG, resourceId: "sg-111" });
    expect(await provider.list(SG)).toEqual([ref]);
  });
});

describe("loadFixtureProvider", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "driftwatch-fixtures-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads resources from a fixture file", async () => {
    const path = join(dir, "resources.json");
    writeFileSync(
      path,
      JSON.stringify({ resources: [{ ref: { resourceType: SG, resourceId: "sg-333" }, attributes: { ingress: [] } }] }),
    );
    const provider = loadFixtureProvider(path);
    expect(provider.name).toBe("fixtures");
    expect(provider.resourceTypes).toEqual([SG]);
    expect(provider.resolve("sg-333")).toEqual({ resourceType: SG, resourceId: "sg-333" });
  });

  it("rejects fixtures that do not match the schema", () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ resources: [{ ref: { resourceType: SG } }] }));
    expect(() => loadFixtureProvider(path)).toThrow(`Invalid fixture file ${path}`);
  });
});
