/**
 * Environment configuration, read once per process.
 *
 * Numbers are clamped to a floor. A missing domain or an unknown auth mode
 * stops startup.
 */

import { validationError } from "../client/errors.js";
import { CredentialState } from "../client/credentials.js";
import {
  createTenantIdentity,
  type AuthMode,
  type TenantIdentity,
} from "../client/types.js";
import type { RateLimiterConfig } from "../limits/rate-limiter.js";
import { resolveStateFile } from "./paths.js";

export const DEFAULT_OAUTH_TOKEN_URL = "https://oauth.bitrix24.tech/oauth/token/";

export interface OAuthClientConfig {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface RelayConfig {
  rateLimiter: RateLimiterConfig;
  planFile: string;
  planTtlSec: number;
  idempotencyFile: string;
  idempotencyTtlSec: number;
  auditFile: string | null;
  retryStateFile: string;
  dlqFile: string;
  requirePlan: boolean;
  methodAllowlist: string | undefined;
  packs: string | undefined;
  oauth: OAuthClientConfig;
  maxAttempts: number;
  timeoutMs: number;
}

function envNumber(raw: string | undefined, fallback: number): number {
  const value = Number(raw ?? fallback);
  return Number.isFinite(value) ? value : fallback;
}

/** `1`, `true`, `yes` and `on` enable; anything else keeps `fallback`. */
export function parseBoolEnv(raw: string | undefined, fallback = false): boolean {
  if (raw === undefined) return fallback;
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  return fallback;
}

export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const limiterMode = (env.B24_RATE_LIMITER ?? "file").trim().toLowerCase();
  const auditRaw = env.B24_AUDIT_FILE;

  return {
    rateLimiter: {
      mode: ["", "off", "none", "noop"].includes(limiterMode) ? "off" : "file",
      stateFile: resolveStateFile(env, "B24_RATE_LIMITER_FILE", "rate-limiter.json"),
      ratePerSec: Math.max(0.1, envNumber(env.B24_RATE_LIMITER_RATE, 2)),
      burst: Math.max(1, envNumber(env.B24_RATE_LIMITER_BURST, 10)),
      stateTtlSec: Math.max(60, envNumber(env.B24_RATE_LIMITER_TTL_SEC, 3600)),
    },
    planFile: resolveStateFile(env, "B24_PLAN_FILE", "plans.json"),
    planTtlSec: Math.max(60, envNumber(env.B24_PLAN_TTL_SEC, 1800)),
    idempotencyFile: resolveStateFile(env, "B24_IDEMPOTENCY_FILE", "idempotency.json"),
    idempotencyTtlSec: Math.max(60, envNumber(env.B24_IDEMPOTENCY_TTL_SEC, 86_400)),
    // An explicitly empty value disables the audit file.
    auditFile:
      auditRaw !== undefined && !auditRaw.trim()
        ? null
        : resolveStateFile(env, "B24_AUDIT_FILE", "audit.jsonl"),
    retryStateFile: resolveStateFile(env, "B24_OFFLINE_STATE_FILE", "offline-retry-state.json"),
    dlqFile: resolveStateFile(env, "B24_OFFLINE_DLQ_FILE", "offline-dlq.jsonl"),
    requirePlan: parseBoolEnv(env.B24_REQUIRE_PLAN),
    methodAllowlist: env.B24_METHOD_ALLOWLIST,
    packs: env.B24_PACKS,
    oauth: {
      tokenUrl: env.B24_OAUTH_TOKEN_URL?.trim() || DEFAULT_OAUTH_TOKEN_URL,
      clientId: env.B24_CLIENT_ID?.trim() ?? "",
      clientSecret: env.B24_CLIENT_SECRET?.trim() ?? "",
    },
    maxAttempts: Math.max(1, envNumber(env.B24_MAX_ATTEMPTS, 5)),
    timeoutMs: Math.max(1000, envNumber(env.B24_TIMEOUT_SEC, 30) * 1000),
  };
}

export interface TenantSetup {
  tenant: TenantIdentity;
  credentials: CredentialState;
}

export function loadTenantFromEnv(env: NodeJS.ProcessEnv = process.env): TenantSetup {
  const domain = env.B24_DOMAIN?.trim() ?? "";
  if (!domain) {
    throw validationError("MISSING_DOMAIN", "B24_DOMAIN is required");
  }
  const mode = (env.B24_AUTH_MODE ?? "webhook").trim().toLowerCase();
  if (mode !== "webhook" && mode !== "oauth") {
    throw validationError(
      "INVALID_AUTH_MODE",
      "B24_AUTH_MODE must be 'webhook' or 'oauth'",
    );
  }
  const authMode: AuthMode = mode;

  if (authMode === "webhook") {
    return {
      tenant: createTenantIdentity({
        domain,
        authMode,
        webhookUserId: env.B24_WEBHOOK_USER_ID?.trim() || undefined,
        webhookCode: env.B24_WEBHOOK_CODE?.trim() || undefined,
      }),
      credentials: new CredentialState(),
    };
  }

  return {
    tenant: createTenantIdentity({ domain, authMode }),
    credentials: new CredentialState({
      accessToken: env.B24_ACCESS_TOKEN?.trim() || null,
      refreshToken: env.B24_REFRESH_TOKEN?.trim() || null,
    }),
  };
}
