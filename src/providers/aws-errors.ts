import { extractErrorCode } from "../retry.js";

/**
 * SDK v3 service errors carry the service error code as `name`; older
 * shapes and Node network errors use `Code` / `code`.
 */
export function errorName(err: unknown): string {
  if (!err || typeof err !== "object") return "";
  if ("Code" in err && typeof err.Code === "string") return err.Code;
  const code = extractErrorCode(err);
  if (code) return code;
  return err instanceof Error ? err.name : "";
}
