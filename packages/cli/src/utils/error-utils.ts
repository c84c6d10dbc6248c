/**
 * Extract a human-readable error message from an unknown error value.
 * @param err - The caught error (Error, string, or other)
 * @param fallback - Optional fallback when err is not an Error instance
 */
export function getErrorMessage(err: unknown, fallback?: string): string {
  if (err instanceof Error) return err.message;
  return fallback !== undefined ? fallback : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** HTTP status carried by SDK errors (OpenAI and Anthropic both expose `status`). */
function getStatus(err: unknown): number | string | undefined {
  if (!isRecord(err)) return undefined;
  const status = err.status ?? err.statusCode;
  return typeof status === "number" || typeof status === "string" ? status : undefined;
}

/** Limit-error patterns for OpenAI and Anthropic (429, rate limit, quota, overloaded). */
const LIMIT_ERROR_PATTERNS = [
  /429/,
  /rate_limit_exceeded/i,
  /rate\s*limit/i,
  /ratelimiterror/i,
  /overloaded/i,
  /quota\s+exceeded/i,
  /quota_exceeded/i,
  /insufficient_quota/i,
  /too\s+many\s+requests/i,
  /resource\s+exhausted/i,
];

/** Extract all string content from an error for pattern matching. */
function getErrorStrings(err: unknown): string[] {
  if (err == null) return [];
  if (typeof err === "string") return [err];
  if (err instanceof Error) return [err.message];
  if (!isRecord(err)) return [];

  const strings: string[] = [];
  for (const key of ["message", "statusText", "code", "error"]) {
    const value = err[key];
    if (typeof value === "string") strings.push(value);
  }
  const nested = err.error;
  if (isRecord(nested)) {
    if (typeof nested.message === "string") strings.push(nested.message);
    if (typeof nested.code === "string") strings.push(nested.code);
  }
  return strings;
}

function matchesAny(err: unknown, patterns: RegExp[]): boolean {
  const toCheck = getErrorStrings(err).join(" ");
  if (!toCheck) return false;
  return patterns.some((re) => re.test(toCheck));
}

/** Detect limit-related API errors (429, rate limit, overloaded, quota exceeded). */
export function isLimitError(err: unknown): boolean {
  if (err == null) return false;
  const status = getStatus(err);
  if (status === 429 || status === "429") return true;
  return matchesAny(err, LIMIT_ERROR_PATTERNS);
}

/** Auth-error patterns (401, invalid key, unauthorized). */
const AUTH_ERROR_PATTERNS = [
  /401/,
  /api\s*key.*invalid|invalid.*api\s*key/i,
  /incorrect\s+api\s*key/i,
  /unauthorized/i,
  /authentication\s*required/i,
  /invalid\s*token/i,
  /authentication\s*failed/i,
];

/** Detect auth-related API errors (401, invalid key, unauthorized). */
export function isAuthError(err: unknown): boolean {
  if (err == null) return false;
  const status = getStatus(err);
  if (status === 401 || status === "401") return true;
  return matchesAny(err, AUTH_ERROR_PATTERNS);
}

/** Out-of-credit patterns (distinct from rate limit: the user has to add credits). */
const OUT_OF_CREDIT_PATTERNS = [
  /out\s*of\s*credit/i,
  /insufficient\s*(quota|credit|balance)/i,
  /payment\s*required/i,
  /billing/i,
  /credit\s*balance/i,
];

export function isOutOfCreditError(err: unknown): boolean {
  if (err == null) return false;
  return matchesAny(err, OUT_OF_CREDIT_PATTERNS);
}

/** Classification for model API failures — picks the hint shown to the user. */
export type AgentApiErrorKind = "rate_limit" | "auth" | "out_of_credit";

/**
 * Classify an error as a model API failure type, or null if not API-related.
 * Order: auth first, then out_of_credit, then rate_limit.
 */
export function classifyAgentApiError(err: unknown): AgentApiErrorKind | null {
  if (err == null) return null;
  if (isAuthError(err)) return "auth";
  if (isOutOfCreditError(err)) return "out_of_credit";
  if (isLimitError(err)) return "rate_limit";
  return null;
}
