import { describe, expect, it } from "vitest";
import { TriggerParseError } from "../errors.js";
import { parseTrigger, parseTriggerLine } from "./parse.js";

describe("parseTrigger", () => {
  it("accepts a native ConfigurationChanged trigger", () => {
    const parsed = parseTrigger({
      kind: "ConfigurationChanged",
      resourceRef: { resourceType: "AWS::IAM::User", resourceId: "deploy-bot" },
      mode: "evaluate",
    });
    expect(parsed).toEqual({
      trigger: {
        kind: "ConfigurationChanged",
        resourceRef: { resourceType: "AWS::IAM::User", resourceId: "deploy-bot" },
        changeDetail: {},
      },
      mode: "evaluate",
    });
  });

  it("applies the default mode and an empty sweep filter", () => {
    expect(parseTrigger({ kind: "PeriodicSweep" }, "remediate")).toEqual({
      trigger: { kind: "PeriodicSweep", resourceTypeFilter: [] },
      mode: "remediate",
    });
  });

  it("routes AWS Config events through the adapter", () => {
    expect(parseTrigger({ messageType: "ScheduledNotification" })).toEqual({
      trigger: { kind: "PeriodicSweep", resourceTypeFilter: [] },
      mode: "auto",
    });
    const lambda = parseTrigger({ invokingEvent: JSON.stringify({ messageType: "ScheduledNotification" }) }, "evaluate");
    expect(lambda.mode).toBe("evaluate");
  });

  it("rejects documents that are not triggers", () => {
    expect(() => parseTrigger("sweep")).toThrow("Trigger must be a JSON object");
    expect(() => parseTrigger({ kind: "ConfigurationChanged", resourceRef: { resourceType: "" } })).toThrow(
      /^Invalid trigger: /,
    );
    expect(() => parseTrigger({ kind: "PeriodicSweep", mode: "fix" })).toThrow(TriggerParseError);
  });
});

describe("parseTriggerLine", () => {
  it("skips blank lines", () => {
    expect(parseTriggerLine("   ")).toBeUndefined();
  });

  it("parses one JSON document per line", () => {
    expect(parseTriggerLine(' {"kind":"PeriodicSweep","resourceTypeFilter":["AWS::IAM::User"]} ')).toEqual({
      trigger: { kind: "PeriodicSweep", resourceTypeFilter: ["AWS::IAM::User"] },
      mode: "auto",
    });
  });

  it("reports malformed JSON as a parse error", () => {
    expect(() => parseTriggerLine("{kind:")).toThrow(TriggerParseError);
    expect(() => parseTriggerLine("{kind:")).toThrow(/^Malformed trigger line: /);
  });
});
