/**
 * Call executor: rate limit → auth injection → send → classify → retry.
 *
 * Every attempt takes one limiter token. Transient failures back off
 * exponentially with jitter, `expired_token` triggers one singleflight
 * refresh per call, and fatal codes abort immediately. Nothing call-local is
 * stored on the instance, so one executor serves concurrent calls.
 */

import { logger } from "@elizaos/core";
import { NoopRateLimiter, type RateLimiter } from "../limits/rate-limiter.js";
import { isRecord } from "../utils/records.js";
import { sleep } from "../utils/sleep.js";
import { CredentialState } from "./credentials.js";
import { buildMethodUrl } from "./endpoints.js";
import {
  ApiError,
  describeError,
  EXPIRED_TOKEN_CODE,
  failure,
  success,
  toApiError,
  validationError,
  workflowError,
  type Result,
} from "./errors.js";
import type { TokenRefresher } from "./token-refresher.js";
import {
  tenantKey,
  type ApiResponse,
  type CallOptions,
  type CallParams,
  type TenantIdentity,
} from "./types.js";

export const MAX_BACKOFF_MS = 30_000;
export const BASE_BACKOFF_MS = 500;
export const MAX_JITTER_MS = 250;
export const MAX_BATCH_COMMANDS = 50;

export type CallResult = Result<ApiResponse>;

export interface CallExecutorOptions {
  credentials?: CredentialState;
  rateLimiter?: RateLimiter;
  refresher?: TokenRefresher | null;
  maxAttempts?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

type AttemptOutcome =
  | { type: "response"; status: number; body: ApiResponse | null }
  | { type: "network"; error: unknown };

export function backoffDelayMs(attempt: number, random: () => number): number {
  const base = Math.min(BASE_BACKOFF_MS * 2 ** (attempt - 1), MAX_BACKOFF_MS);
  const jitter = Math.floor(random() * (MAX_JITTER_MS + 1));
  return base + jitter;
}

/** Non-object JSON is wrapped as `{ result }`; invalid JSON yields null. */
export function parseResponseBody(raw: string): ApiResponse | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  return isRecord(data) ? data : { result: data };
}

export class CallExecutor {
  readonly tenant: TenantIdentity;
  readonly credentials: CredentialState;
  private readonly rateLimiter: RateLimiter;
  private readonly refresher: TokenRefresher | null;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(tenant: TenantIdentity, opts: CallExecutorOptions = {}) {
    this.tenant = tenant;
    this.credentials = opts.credentials ?? new CredentialState();
    this.rateLimiter = opts.rateLimiter ?? new NoopRateLimiter();
    this.refresher = opts.refresher ?? null;
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 5);
    this.timeoutMs = Math.max(1_000, opts.timeoutMs ?? 30_000);
    this.sleep = opts.sleep ?? sleep;
    this.random = opts.random ?? Math.random;
  }

  async execute(
    method: string,
    params: CallParams = {},
    opts: CallOptions = {},
  ): Promise<CallResult> {
    if (!method.trim()) {
      return failure(validationError("INVALID_METHOD", "method name is required"));
    }

    let url: string;
    try {
      url = buildMethodUrl(this.tenant, method, opts.restV3 ?? false);
    } catch (err) {
      if (err instanceof ApiError) return failure(err);
      throw err;
    }

    const key = tenantKey(this.tenant);
    let refreshed = false;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      await this.rateLimiter.acquire(key);

      const payload: CallParams = { ...params };
      if (this.tenant.authMode === "oauth") {
        payload.auth = this.credentials.snapshot().accessToken;
      }

      const outcome = await this.send(url, payload);
      const isLast = attempt === this.maxAttempts;

      if (outcome.type === "network") {
        if (isLast) {
          return failure(
            new ApiError(`Network error: ${describeError(outcome.error)}`, {
              code: "NETWORK_ERROR",
              kind: "network",
              cause: outcome.error,
            }),
          );
        }
        logger.warn(
          `[executor] ${method} attempt ${attempt}/${this.maxAttempts} network failure: ${describeError(outcome.error)}`,
        );
        await this.sleep(backoffDelayMs(attempt, this.random));
        continue;
      }

      const error = this.classify(outcome.status, outcome.body);
      if (!error) {
        return success(outcome.body ?? {});
      }

      if (
        error.code === EXPIRED_TOKEN_CODE &&
        !refreshed &&
        this.tenant.authMode === "oauth" &&
        this.refresher
      ) {
        refreshed = await this.refresher.refresh(this.tenant, this.credentials);
        if (refreshed) {
          // Same attempt slot, no backoff.
          attempt -= 1;
          continue;
        }
      }

      if (error.fatal) {
        logger.error(
          `[executor] ${method} aborted on fatal code ${error.code} (status ${error.status})`,
        );
        return failure(error);
      }
      if (!error.retryable) return failure(error);
      if (isLast) {
        return failure(
          new ApiError(
            `Retries exhausted after ${this.maxAttempts} attempts: ${error.message}`,
            {
              status: error.status,
              code: "RETRIES_EXHAUSTED",
              payload: error.payload,
              cause: error,
            },
          ),
        );
      }

      logger.warn(
        `[executor] ${method} attempt ${attempt}/${this.maxAttempts} failed with ${error.code || error.status}, backing off`,
      );
      await this.sleep(backoffDelayMs(attempt, this.random));
    }

    return failure(
      new ApiError("Retries exhausted", { code: "RETRIES_EXHAUSTED", status: 500 }),
    );
  }

  /** Throwing form of `execute` for internal consumers. */
  async call(
    method: string,
    params: CallParams = {},
    opts: CallOptions = {},
  ): Promise<ApiResponse> {
    const result = await this.execute(method, params, opts);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /** Runs up to 50 `method?query` commands in one request. */
  async batch(
    commands: Record<string, string>,
    opts: CallOptions & { halt?: boolean } = {},
  ): Promise<CallResult> {
    if (Object.keys(commands).length > MAX_BATCH_COMMANDS) {
      return failure(
        workflowError(
          "BATCH_TOO_LARGE",
          `Batch is limited to ${MAX_BATCH_COMMANDS} commands`,
        ),
      );
    }
    return this.execute(
      "batch",
      { halt: opts.halt === false ? 0 : 1, cmd: commands },
      { restV3: opts.restV3 },
    );
  }

  /**
   * Iterates every item of a paginated list method, following `next` until
   * the upstream stops returning it.
   */
  async *iterList(
    method: string,
    params: CallParams = {},
    opts: CallOptions = {},
  ): AsyncGenerator<unknown, void, undefined> {
    let start: unknown = 0;
    for (;;) {
      const response = await this.call(method, { ...params, start }, opts);
      const result = response.result;
      if (Array.isArray(result)) {
        yield* result;
      } else if (isRecord(result)) {
        for (const item of Object.values(result)) {
          if (isRecord(item)) yield item;
        }
      }
      if (response.next === undefined || response.next === null) return;
      start = response.next;
    }
  }

  private async send(url: string, payload: CallParams): Promise<AttemptOutcome> {
    try {
      const resp = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const raw = await resp.text();
      return { type: "response", status: resp.status, body: parseResponseBody(raw) };
    } catch (err) {
      return { type: "network", error: err };
    }
  }

  private classify(status: number, body: ApiResponse | null): ApiError | null {
    if (body === null) {
      // Garbage from a failing upstream is still a 5xx worth retrying.
      if (status >= 500) {
        return new ApiError(`Upstream returned HTTP ${status}`, { status });
      }
      return new ApiError("Invalid JSON response", {
        status,
        code: "INVALID_JSON",
        kind: "validation",
      });
    }
    const mapped = toApiError(status, body);
    if (mapped) return mapped;
    if (status >= 400) {
      return new ApiError(`Upstream returned HTTP ${status}`, {
        status,
        code: `HTTP_${status}`,
        payload: body,
      });
    }
    return null;
  }
}
