import { classifyFailureStatus } from "@keyrelay/resilience";
import { ProviderCallError } from "@keyrelay/shared";
import type { ZodError } from "zod";

/** Provider errors (openai SDK `APIError` and friends) expose the HTTP status */
function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    return typeof error.status === "number" ? error.status : undefined;
  }
  return undefined;
}

/**
 * Turn an HTTP failure into a classified `ProviderCallError`.
 * Errors without a status (aborts, socket errors) pass through unchanged
 * and end up as transport failures.
 */
export function toProviderCallError(error: unknown, label: string): unknown {
  if (error instanceof ProviderCallError) return error;

  const status = statusOf(error);
  if (status === undefined) return error;

  const detail = error instanceof Error ? error.message : String(error);
  return new ProviderCallError(classifyFailureStatus(status), `${label} failed: ${detail}`, status);
}

/** First validation issue as "field message" */
export function describeIssue(error: ZodError): { field?: string; message: string } {
  const issue = error.issues[0];
  if (!issue) return { message: "invalid parameters" };
  const field = issue.path.join(".");
  return field ? { field, message: `${field} ${issue.message}` } : { message: issue.message };
}
