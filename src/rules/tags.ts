import { Type } from "@sinclair/typebox";
import type { AttributeReader, Rule, RuleResult } from "../types.js";
import { IAM_ROLE_TYPE, IAM_USER_TYPE } from "./iam.js";
import { SECURITY_GROUP_TYPE } from "./network.js";
import { parseParameters } from "./parameters.js";

export const requiredTagsParameters = Type.Object({
  tags: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  resourceTypes: Type.Array(Type.String(), {
    minItems: 1,
    default: [SECURITY_GROUP_TYPE, IAM_USER_TYPE, IAM_ROLE_TYPE],
  }),
});

// No remediation: tag values cannot be derived from the resource.
export function createRequiredTagsRule(params: unknown = {}, name = "required-tags"): Rule {
  const { tags, resourceTypes } = parseParameters(name, requiredTagsParameters, params);

  return {
    name,
    description: `Resources must carry the tags ${tags.join(", ")}`,
    resourceTypes,
    severity: "low",
    evaluate(attrs: AttributeReader): RuleResult {
      const present = attrs.require("tags");
      if (typeof present !== "object" || present === null || Array.isArray(present)) {
        throw new TypeError("tags must be a key/value mapping");
      }
      const missing = tags.filter((key) => !Object.prototype.hasOwnProperty.call(present, key));
      if (missing.length === 0) {
        return { compliance: "COMPLIANT", reason: "all required tags present" };
      }
      return { compliance: "NON_COMPLIANT", reason: `missing tags: ${missing.join(", ")}` };
    },
  };
}
