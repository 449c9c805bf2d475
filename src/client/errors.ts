/**
 * Error taxonomy for the call pipeline.
 *
 * Callers branch on `kind` instead of on exception classes:
 * - fatal: auth/scope/bad-request class, never retried
 * - transient: rate limit or upstream 5xx, retried with backoff
 * - network: transport failure, retried like transient
 * - validation: malformed request or response shape
 * - workflow: plan/pack/batch/confirmation violations raised locally
 * - rejected: any other upstream error that is not worth retrying
 */

export type ErrorKind =
  | "fatal"
  | "transient"
  | "network"
  | "validation"
  | "workflow"
  | "rejected";

export const FATAL_ERROR_CODES: ReadonlySet<string> = new Set([
  "WRONG_AUTH_TYPE",
  "insufficient_scope",
  "INVALID_CREDENTIALS",
  "NO_AUTH_FOUND",
  "METHOD_NOT_FOUND",
  "ERROR_METHOD_NOT_FOUND",
  "INVALID_REQUEST",
  "ACCESS_DENIED",
  "PAYMENT_REQUIRED",
]);

export const RATE_LIMIT_CODES: ReadonlySet<string> = new Set([
  "QUERY_LIMIT_EXCEEDED",
]);

export const EXPIRED_TOKEN_CODE = "expired_token";

export interface ApiErrorInit {
  status?: number;
  code?: string;
  payload?: Record<string, unknown>;
  /** Set for locally raised errors; upstream errors derive their kind. */
  kind?: "validation" | "workflow" | "network";
  cause?: unknown;
}

export class ApiError extends Error {
  readonly status: number;
  readonly code: string;
  readonly payload: Record<string, unknown>;
  private readonly localKind: ApiErrorInit["kind"];

  constructor(message: string, init: ApiErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = "ApiError";
    this.status = init.status ?? 0;
    this.code = init.code ?? "";
    this.payload = init.payload ?? {};
    this.localKind = init.kind;
  }

  get fatal(): boolean {
    return FATAL_ERROR_CODES.has(this.code);
  }

  get retryable(): boolean {
    if (this.fatal) return false;
    return RATE_LIMIT_CODES.has(this.code) || this.status >= 500;
  }

  get kind(): ErrorKind {
    if (this.fatal) return "fatal";
    if (this.localKind) return this.localKind;
    return this.retryable ? "transient" : "rejected";
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      code: this.code,
      status: this.status,
      message: this.message,
    };
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ApiError };

export function success<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function failure<T>(error: ApiError): Result<T> {
  return { ok: false, error };
}

export function workflowError(code: string, message: string): ApiError {
  return new ApiError(message, { code, kind: "workflow" });
}

export function validationError(code: string, message: string): ApiError {
  return new ApiError(message, { code, kind: "validation" });
}

/**
 * Map a response body into an ApiError using the two recognized shapes:
 * `{ error: "CODE", error_description }` and `{ error: { code, message } }`.
 * Returns null when the body carries no error.
 */
export function toApiError(
  status: number,
  body: Record<string, unknown>,
): ApiError | null {
  const raw = body.error;
  if (typeof raw === "string" && raw) {
    const description = body.error_description;
    const message =
      typeof description === "string" && description ? description : raw;
    return new ApiError(message, { status, code: raw, payload: body });
  }
  if (typeof raw === "object" && raw !== null && !Array.isArray(raw)) {
    const code = "code" in raw && typeof raw.code === "string" ? raw.code : "";
    const message =
      "message" in raw && typeof raw.message === "string" && raw.message
        ? raw.message
        : code;
    if (code || message) {
      return new ApiError(message, { status, code, payload: body });
    }
  }
  return null;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
