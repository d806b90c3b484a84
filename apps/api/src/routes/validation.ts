import type { ZodError } from "zod";

export function invalidRequest(error: ZodError) {
  return {
    ok: false,
    error: "invalid_request",
    issues: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
  };
}
