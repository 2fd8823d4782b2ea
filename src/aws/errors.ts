/**
 * AWS error classification
 */

/** Rate-limit errors: the only class that is retried */
export const RATE_LIMIT_CODES = new Set([
  "RequestLimitExceeded",
  "Throttling",
  "ThrottlingException",
]);

/**
 * Error code of an AWS SDK error (its `Code` field, falling back to the error name)
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("Code" in err && typeof err.Code === "string") return err.Code;
  if ("code" in err && typeof err.code === "string") return err.code;
  if (err instanceof Error) return err.name;
  return undefined;
}

export function isRateLimitError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && RATE_LIMIT_CODES.has(code);
}

/** EC2 refused the call in this region */
export function isUnauthorizedOperation(err: unknown): boolean {
  return errorCode(err) === "UnauthorizedOperation";
}

/** STS refused access to the whole account (e.g. the role cannot be assumed) */
export function isAccessDenied(err: unknown): boolean {
  return errorCode(err) === "AccessDenied";
}

/** Organizations refused to list accounts */
export function isOrgAccessDenied(err: unknown): boolean {
  return errorCode(err) === "AccessDeniedException";
}

export function formatAwsError(err: unknown): string {
  if (err instanceof Error) {
    const code = errorCode(err);
    return code && code !== err.name ? `${code}: ${err.message}` : `${err.name}: ${err.message}`;
  }
  return String(err);
}
