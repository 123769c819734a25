import { z } from "zod";

/**
 * Shape a model reply must have to be used as an article summary.
 * Anything else counts as a failed summarization for that article.
 */
export function summaryTextSchema(maxLength: number) {
  return z
    .string()
    .trim()
    .min(1, "model returned an empty summary")
    .max(maxLength, `model summary exceeds ${maxLength} characters`);
}

export function parseSummary(
  text: string,
  maxLength: number,
): { readonly success: true; readonly summary: string } | { readonly success: false; readonly error: string } {
  const result = summaryTextSchema(maxLength).safeParse(text);
  if (result.success) {
    return { success: true, summary: result.data };
  }
  return {
    success: false,
    error: result.error.issues.map((issue) => issue.message).join("; "),
  };
}
