import type { ZodError } from "zod";

export function formatIssues(error: ZodError): string {
  return error.issues
    .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
    .join("\n");
}
