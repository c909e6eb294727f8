import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "../errors.js";

/** Default and validate a rule's parameters against its schema. */
export function parseParameters<T extends TSchema>(ruleName: string, schema: T, params: unknown): Static<T> {
  const value = Value.Default(schema, Value.Clone(params ?? {}));
  if (!Value.Check(schema, value)) {
    const issues = [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`Invalid parameters for rule ${ruleName}`, issues);
  }
  return value;
}

export function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return undefined;
    out.push(item);
  }
  return out;
}
