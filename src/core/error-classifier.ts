/**
 * Transient vs permanent classification for action failures.
 * Callers extend the default per external collaborator by composing
 * classifiers; the first one with an opinion wins.
 */
import { ActionError } from "./errors.js";
import type { FailureCategory } from "./errors.js";

/** Returns null when it has no opinion about the error. */
export type PartialErrorClassifier = (error: Error) => FailureCategory | null;

export type ErrorClassifierFn = (error: Error) => FailureCategory;

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
]);

const TRANSIENT_STATUS = new Set([408, 425, 429, 500, 502, 503, 504]);
const PERMANENT_STATUS = new Set([400, 401, 403, 404, 405, 410, 422]);

export function extractStatusCode(error: Error): number | null {
  if (error instanceof ActionError && error.status !== undefined) return error.status;

  const props: Record<string, unknown> = { ...error };
  if (typeof props.status === "number") return props.status;
  if (typeof props.statusCode === "number") return props.statusCode;

  const statusMatch = error.message.match(/\b(4\d{2}|5\d{2})\b/);
  if (statusMatch?.[1]) return parseInt(statusMatch[1], 10);

  return null;
}

export const defaultErrorClassifier: ErrorClassifierFn = (error) => {
  if (error instanceof ActionError && error.category) return error.category;

  const msg = error.message.toLowerCase();
  const code = (error as NodeJS.ErrnoException).code;
  const statusCode = extractStatusCode(error);

  // Network errors
  if (code && TRANSIENT_CODES.has(code)) return "transient";

  if (statusCode !== null && TRANSIENT_STATUS.has(statusCode)) return "transient";
  if (statusCode !== null && PERMANENT_STATUS.has(statusCode)) return "permanent";

  if (
    msg.includes("rate limit") ||
    msg.includes("too many requests") ||
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("temporarily unavailable") ||
    msg.includes("network")
  ) {
    return "transient";
  }

  if (
    msg.includes("unauthorized") ||
    msg.includes("authentication") ||
    msg.includes("permission") ||
    msg.includes("forbidden") ||
    msg.includes("not found")
  ) {
    return "permanent";
  }

  // Unknown errors are not retried.
  return "permanent";
};

export function composeClassifiers(
  ...classifiers: [...PartialErrorClassifier[], ErrorClassifierFn]
): ErrorClassifierFn {
  return (error) => {
    for (const classifier of classifiers) {
      const category = classifier(error);
      if (category) return category;
    }
    return "permanent";
  };
}

/** Message-pattern classifier built from configuration. */
export function patternClassifier(patterns: {
  transient: readonly string[];
  permanent: readonly string[];
}): PartialErrorClassifier {
  const transient = patterns.transient.map((p) => new RegExp(p, "i"));
  const permanent = patterns.permanent.map((p) => new RegExp(p, "i"));
  return (error) => {
    if (permanent.some((re) => re.test(error.message))) return "permanent";
    if (transient.some((re) => re.test(error.message))) return "transient";
    return null;
  };
}
